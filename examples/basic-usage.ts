/**
 * Basic usage of the relay API.
 *
 * Starts a local echo server, a SOCKS5 listener and an HTTP proxy listener,
 * sends one request through the SOCKS5 listener and prints the counters.
 *
 * Run with: npx tsx examples/basic-usage.ts
 */
import net from "net";
import { once } from "events";

import { RelayServer, formatBytes } from "../src";

async function startEchoServer() {
  const server = net.createServer((socket) => socket.pipe(socket));
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("echo server has no port");
  return { server, port: address.port };
}

function socks5Connect(proxyPort: number, targetPort: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(proxyPort, "127.0.0.1");
    let stage = 0;
    socket.on("error", reject);
    socket.on("connect", () => socket.write(Buffer.from([0x05, 0x01, 0x00])));
    socket.on("data", function onData(data) {
      if (stage === 0) {
        stage = 1;
        const port = Buffer.alloc(2);
        port.writeUInt16BE(targetPort, 0);
        socket.write(Buffer.concat([Buffer.from([0x05, 0x01, 0x00, 0x01, 127, 0, 0, 1]), port]));
        return;
      }
      socket.off("data", onData);
      if (data[1] !== 0x00) {
        reject(new Error(`socks5 reply ${data[1]}`));
        return;
      }
      resolve(socket);
    });
  });
}

async function main() {
  const echo = await startEchoServer();

  const relay = new RelayServer({
    listeners: [
      { name: "socks", protocol: "socks5", host: "127.0.0.1", port: 0, enabled: true, auth: null },
      { name: "http", protocol: "http", host: "127.0.0.1", port: 0, enabled: true, auth: null },
    ],
    policy: { allowedIps: ["127.0.0.0/8", "::1"], idleTimeoutMs: 30_000 },
    debug: ["relay"],
  });
  relay.on("log", (line: string) => console.log(line));

  try {
    const addresses = await relay.start();
    console.log("listening:", addresses);

    const socket = await socks5Connect(addresses.socks.port, echo.port);
    socket.write("hello through the relay");
    const [reply] = await once(socket, "data");
    console.log("echoed:", String(reply));
    socket.end();
    await once(socket, "close");

    const stats = relay.snapshot();
    console.log(`sessions: ${stats.totalSessions}`);
    console.log(`upload: ${formatBytes(stats.upload)}, download: ${formatBytes(stats.download)}`);
  } finally {
    await relay.shutdown(1000);
    echo.server.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
