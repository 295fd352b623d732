import assert from "node:assert/strict";
import test from "node:test";

import { TokenBucket } from "../src/token-bucket";
import { RelayIOError } from "../src/errors";
import { RelayPump } from "../src/relay";
import { RelayServer } from "../src/server";
import { Session } from "../src/session";
import { TrafficAccountant } from "../src/traffic";
import { ByteCollector, connectClient, createSocketPair, portBytes, startEchoServer, startRelay, waitFor } from "./helpers";

function createSession(now?: () => number) {
  return new Session({ protocol: "socks5", listener: "socks", clientAddress: "127.0.0.1", clientPort: 40000, now });
}

async function createPump(options: { idleTimeoutMs?: number; rate?: number; now?: () => number } = {}) {
  const [clientApp, clientSide] = await createSocketPair();
  const [upstreamSide, upstreamApp] = await createSocketPair();
  const session = createSession(options.now);
  const accountant = new TrafficAccountant();
  const bandwidth = options.rate
    ? {
        upload: new TokenBucket(options.rate),
        download: new TokenBucket(options.rate),
        release: () => {},
      }
    : null;
  const pump = new RelayPump(session, clientSide, upstreamSide, {
    idleTimeoutMs: options.idleTimeoutMs ?? 0,
    accountant,
    bandwidth,
  });
  return {
    pump,
    session,
    accountant,
    client: new ByteCollector(clientApp),
    upstream: new ByteCollector(upstreamApp),
  };
}

test("relay: copies both directions and ends on eof", async () => {
  const { pump, session, accountant, client, upstream } = await createPump();
  const outcome = pump.run(Buffer.from("head"));

  assert.equal((await upstream.read(4)).toString(), "head");
  client.socket.write("up");
  assert.equal((await upstream.read(2)).toString(), "up");
  upstream.socket.write("down");
  assert.equal((await client.read(4)).toString(), "down");

  client.socket.end();
  assert.deepEqual(await outcome, { reason: "eof", error: null });
  assert.equal(session.bytesUp, 6);
  assert.equal(session.bytesDown, 4);
  assert.equal(session.state, "closing");
  const stats = accountant.snapshot();
  assert.equal(stats.protocols.socks5.upload, 6);
  assert.equal(stats.protocols.socks5.download, 4);
});

test("relay: upstream eof closes the client", async () => {
  const { pump, client, upstream } = await createPump();
  const outcome = pump.run();
  upstream.socket.end("bye");

  assert.equal((await client.readToClose()).toString(), "bye");
  assert.equal((await outcome).reason, "eof");
});

test("relay: idle sessions close with reason idle", async () => {
  const { pump, client } = await createPump({ idleTimeoutMs: 80 });
  const started = Date.now();
  const outcome = await pump.run();
  assert.deepEqual(outcome, { reason: "idle", error: null });
  assert.ok(Date.now() - started >= 70);
  await client.readToClose();
});

test("relay: traffic postpones the idle timeout", async () => {
  const { pump, client, upstream } = await createPump({ idleTimeoutMs: 150 });
  const outcome = pump.run();

  for (let i = 0; i < 4; i++) {
    await new Promise((resolve) => setTimeout(resolve, 60));
    client.socket.write("k");
    await upstream.read(1);
  }
  assert.equal(client.isClosed, false);
  assert.equal((await outcome).reason, "idle");
});

test("relay: idle tracking follows the session clock", async () => {
  const { pump, client, upstream } = await createPump({ idleTimeoutMs: 150, now: () => performance.now() });
  const outcome = pump.run();

  for (let i = 0; i < 4; i++) {
    await new Promise((resolve) => setTimeout(resolve, 60));
    client.socket.write("k");
    await upstream.read(1);
  }
  assert.equal(client.isClosed, false);
  assert.deepEqual(await outcome, { reason: "idle", error: null });
});

test("relay: server clock drives the idle timeout", async () => {
  const echo = await startEchoServer();
  const relay = new RelayServer({
    listeners: [{ name: "socks", protocol: "socks5", host: "127.0.0.1", port: 0, enabled: true, auth: null }],
    policy: { idleTimeoutMs: 200 },
    debug: false,
    now: () => performance.now(),
  });
  const addresses = await relay.start();
  try {
    const client = await connectClient(addresses.socks.port);
    client.socket.write(
      Buffer.concat([Buffer.from([0x05, 0x01, 0x00, 0x05, 0x01, 0x00, 0x01, 127, 0, 0, 1]), portBytes(echo.port)])
    );
    await client.read(12);

    for (let i = 0; i < 5; i++) {
      await new Promise((resolve) => setTimeout(resolve, 80));
      client.socket.write("k");
      assert.equal((await client.read(1)).toString(), "k");
    }
    assert.equal(relay.snapshot().closed.idle, 0);
    assert.equal(relay.snapshot().activeSessions, 1);
    client.socket.destroy();
  } finally {
    await relay.shutdown(100);
    await echo.close();
  }
});

test("relay: session abort stops the pump", async () => {
  const { pump, session, client } = await createPump();
  const outcome = pump.run();
  session.abort("shutdown");
  assert.deepEqual(await outcome, { reason: "shutdown", error: null });
  await client.readToClose();
});

test("relay: upstream reset is an io error", async () => {
  const { pump, upstream } = await createPump();
  const outcome = pump.run();
  upstream.socket.resetAndDestroy();

  const result = await outcome;
  assert.equal(result.reason, "error");
  assert.ok(result.error instanceof RelayIOError);
});

test("relay: bandwidth limit paces the copy", async () => {
  const { pump, client, upstream } = await createPump({ rate: 1000 });
  const outcome = pump.run();
  const started = Date.now();

  client.socket.write(Buffer.alloc(300));
  await upstream.read(300, 3000);
  // 100 tokens are available up front, the other 200 take 200ms to refill
  assert.ok(Date.now() - started >= 150);

  client.socket.end();
  assert.equal((await outcome).reason, "eof");
});

test("relay: idle timeout is counted once per session", async () => {
  const echo = await startEchoServer();
  const { relay, addresses } = await startRelay(
    [{ name: "socks", protocol: "socks5", host: "127.0.0.1", port: 0, enabled: true, auth: null }],
    { idleTimeoutMs: 100 }
  );
  try {
    const client = await connectClient(addresses.socks.port);
    client.socket.write(
      Buffer.concat([Buffer.from([0x05, 0x01, 0x00, 0x05, 0x01, 0x00, 0x01, 127, 0, 0, 1]), portBytes(echo.port)])
    );
    await client.read(12);
    await client.readToClose(3000);

    await waitFor(() => relay.snapshot().closed.idle === 1);
    await new Promise((resolve) => setTimeout(resolve, 150));
    const stats = relay.snapshot();
    assert.equal(stats.closed.idle, 1);
    assert.equal(stats.closed.eof, 0);
    assert.equal(stats.closed.error, 0);
    assert.equal(stats.errors, 0);
    assert.equal(stats.activeSessions, 0);
  } finally {
    await relay.shutdown(100);
    await echo.close();
  }
});
