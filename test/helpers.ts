import { once } from "node:events";
import net from "node:net";

import type { AccessPolicy, ListenerConfig } from "../src/config";
import type { ListenerAddress } from "../src/listener";
import { RelayServer } from "../src/server";

export type EchoServer = {
  port: number;
  /** connections accepted so far */
  readonly connections: number;
  close(): Promise<void>;
};

/**
 * TCP server on 127.0.0.1 that writes back whatever it reads.
 */
export async function startEchoServer(): Promise<EchoServer> {
  const sockets = new Set<net.Socket>();
  let connections = 0;
  const server = net.createServer((socket) => {
    connections += 1;
    sockets.add(socket);
    socket.on("data", (chunk: Buffer) => socket.write(chunk));
    socket.on("end", () => socket.end());
    socket.on("error", () => socket.destroy());
    socket.on("close", () => sockets.delete(socket));
  });
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("echo server has no port");

  return {
    port: address.port,
    get connections() {
      return connections;
    },
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/** A port on 127.0.0.1 that nothing listens on. */
export async function findClosedPort(): Promise<number> {
  const server = net.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("no port");
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

/**
 * Buffers everything a socket receives and hands it out on demand.
 */
export class ByteCollector {
  private buffer = Buffer.alloc(0);
  private closed = false;
  private waiters: Array<() => void> = [];

  constructor(readonly socket: net.Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.wake();
    });
    socket.on("error", () => {
      this.closed = true;
      this.wake();
    });
    socket.on("close", () => {
      this.closed = true;
      this.wake();
    });
  }

  get isClosed() {
    return this.closed;
  }

  /** Resolve with exactly `n` bytes; rejects if the socket closes first. */
  async read(n: number, timeoutMs = 2000): Promise<Buffer> {
    await this.until(() => this.buffer.length >= n, timeoutMs, `${n} bytes`);
    const out = this.buffer.subarray(0, n);
    this.buffer = this.buffer.subarray(n);
    return out;
  }

  /** Whatever is buffered, waiting for at least one byte. */
  async readSome(timeoutMs = 2000): Promise<Buffer> {
    await this.until(() => this.buffer.length > 0, timeoutMs, "data");
    const out = this.buffer;
    this.buffer = Buffer.alloc(0);
    return out;
  }

  /** Everything received until the socket closes. */
  async readToClose(timeoutMs = 2000): Promise<Buffer> {
    await this.until(() => this.closed, timeoutMs, "close");
    const out = this.buffer;
    this.buffer = Buffer.alloc(0);
    return out;
  }

  private until(ready: () => boolean, timeoutMs: number, what: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((waiter) => waiter !== check);
        reject(new Error(`timed out waiting for ${what}`));
      }, timeoutMs);
      const check = () => {
        if (ready()) {
          clearTimeout(timer);
          this.waiters = this.waiters.filter((waiter) => waiter !== check);
          resolve();
          return;
        }
        if (this.closed) {
          clearTimeout(timer);
          this.waiters = this.waiters.filter((waiter) => waiter !== check);
          reject(new Error(`socket closed before ${what}`));
        }
      };
      this.waiters.push(check);
      check();
    });
  }

  private wake() {
    for (const waiter of [...this.waiters]) waiter();
  }
}

export async function connectClient(port: number): Promise<ByteCollector> {
  const socket = net.connect(port, "127.0.0.1");
  const collector = new ByteCollector(socket);
  await once(socket, "connect");
  return collector;
}

export type StartedRelay = {
  relay: RelayServer;
  addresses: Record<string, ListenerAddress>;
};

export async function startRelay(
  listeners: ListenerConfig[],
  policy: Partial<AccessPolicy> = {}
): Promise<StartedRelay> {
  const relay = new RelayServer({ listeners, policy, debug: false });
  const addresses = await relay.start();
  return { relay, addresses };
}

/** Poll `condition` until it holds. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export function portBytes(port: number): Buffer {
  const out = Buffer.alloc(2);
  out.writeUInt16BE(port, 0);
  return out;
}

/**
 * Two connected sockets over 127.0.0.1.
 */
export async function createSocketPair(): Promise<[net.Socket, net.Socket]> {
  const server = net.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("no port");

  const accepted = once(server, "connection");
  const client = net.connect(address.port, "127.0.0.1");
  await once(client, "connect");
  const [peer] = await accepted;
  server.close();
  if (!(peer instanceof net.Socket)) throw new Error("no peer socket");
  return [client, peer];
}
