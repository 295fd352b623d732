import assert from "node:assert/strict";
import { once } from "node:events";
import test from "node:test";

import { WebSocket } from "ws";

import type { ListenerConfig } from "../src/config";
import { ManagementServer } from "../src/management-server";
import { parseClientMessage, type ServerMessage } from "../src/management-protocol";
import { RelayServer } from "../src/server";

const TOKEN = "test-token";

function socksListener(name = "socks"): ListenerConfig {
  return { name, protocol: "socks5", host: "127.0.0.1", port: 0, enabled: true, auth: null };
}

class ManagementClient {
  private readonly queue: ServerMessage[] = [];
  private waiter: (() => void) | null = null;

  constructor(readonly ws: WebSocket) {
    ws.on("message", (data) => {
      const message: ServerMessage = JSON.parse(String(data));
      this.queue.push(message);
      const waiter = this.waiter;
      this.waiter = null;
      waiter?.();
    });
  }

  async next(timeoutMs = 2000): Promise<ServerMessage> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const message = this.queue.shift();
      if (message) return message;
      if (Date.now() > deadline) throw new Error("timed out waiting for a message");
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
        setTimeout(resolve, 50);
      });
    }
  }

  async request(message: unknown): Promise<ServerMessage> {
    this.ws.send(JSON.stringify(message));
    return this.next();
  }

  close() {
    this.ws.close();
  }
}

async function connect(url: string, headers: Record<string, string> = { "x-relay-token": TOKEN }) {
  const ws = new WebSocket(url, { headers });
  const client = new ManagementClient(ws);
  await once(ws, "open");
  return client;
}

async function startStack() {
  const relay = new RelayServer({ listeners: [socksListener()], debug: false });
  await relay.start();
  const management = new ManagementServer(relay, { port: 0, token: TOKEN });
  const address = await management.start();
  return {
    relay,
    management,
    url: address.url,
    stop: async () => {
      await management.stop();
      await relay.shutdown(100);
    },
  };
}

test("management protocol: validates client messages", () => {
  assert.deepEqual(parseClientMessage('{"type":"stats"}'), { ok: true, message: { type: "stats" } });
  assert.deepEqual(parseClientMessage("{"), { ok: false, code: "invalid_json", message: "failed to parse JSON" });
  assert.deepEqual(parseClientMessage("[]"), {
    ok: false,
    code: "invalid_message",
    message: "message must be an object with a type",
  });
  assert.deepEqual(parseClientMessage('{"type":"listener","name":"a","action":"pause"}'), {
    ok: false,
    code: "invalid_message",
    message: "listener.action must be start or stop",
  });
  assert.deepEqual(parseClientMessage('{"type":"shutdown","graceMs":-1}'), {
    ok: false,
    code: "invalid_message",
    message: "shutdown.graceMs must be a non-negative integer",
  });
  assert.deepEqual(parseClientMessage('{"type":"shutdown","graceMs":250}'), {
    ok: true,
    message: { type: "shutdown", graceMs: 250 },
  });
});

test("management: connections without the token are refused", async () => {
  const stack = await startStack();
  try {
    const ws = new WebSocket(stack.url);
    const [err] = await once(ws, "error");
    assert.ok(err instanceof Error);
    assert.equal(err.message, "Unexpected server response: 401");

    const wrong = new WebSocket(stack.url, { headers: { "x-relay-token": "nope" } });
    const [wrongErr] = await once(wrong, "error");
    assert.ok(wrongErr instanceof Error);
    assert.equal(wrongErr.message, "Unexpected server response: 401");
  } finally {
    await stack.stop();
  }
});

test("management: bearer tokens are accepted", async () => {
  const stack = await startStack();
  try {
    const client = await connect(stack.url, { authorization: `Bearer ${TOKEN}` });
    const reply = await client.request({ type: "stats" });
    assert.equal(reply.type, "stats");
    client.close();
  } finally {
    await stack.stop();
  }
});

test("management: stats, sessions and listeners", async () => {
  const stack = await startStack();
  try {
    const client = await connect(stack.url);

    const stats = await client.request({ type: "stats" });
    assert.equal(stats.type, "stats");
    if (stats.type === "stats") {
      assert.equal(stats.stats.totalSessions, 0);
      assert.equal(stats.stats.upload, 0);
      assert.deepEqual(stats.stats.rejected, { ip_denied: 0, ip_limit: 0, total_limit: 0 });
    }

    assert.deepEqual(await client.request({ type: "sessions" }), { type: "sessions", sessions: [] });

    const listeners = await client.request({ type: "listeners" });
    assert.equal(listeners.type, "listeners");
    if (listeners.type === "listeners") {
      assert.equal(listeners.listeners.length, 1);
      assert.equal(listeners.listeners[0].name, "socks");
      assert.equal(listeners.listeners[0].state, "running");
    }
    client.close();
  } finally {
    await stack.stop();
  }
});

test("management: reports malformed requests", async () => {
  const stack = await startStack();
  try {
    const client = await connect(stack.url);

    client.ws.send("not json");
    assert.deepEqual(await client.next(), { type: "error", code: "invalid_json", message: "failed to parse JSON" });

    assert.deepEqual(await client.request({ type: "bogus" }), {
      type: "error",
      code: "unknown_type",
      message: "unsupported message type: bogus",
    });

    client.ws.send(Buffer.from([1, 2, 3]), { binary: true });
    assert.deepEqual(await client.next(), {
      type: "error",
      code: "invalid_message",
      message: "binary frames are not supported",
    });
    client.close();
  } finally {
    await stack.stop();
  }
});

test("management: stops and starts listeners", async () => {
  const stack = await startStack();
  try {
    const client = await connect(stack.url);

    assert.deepEqual(await client.request({ type: "listener", name: "socks", action: "stop" }), {
      type: "ok",
      request: "listener",
    });
    assert.equal(stack.relay.listeners()[0].state, "stopped");

    assert.deepEqual(await client.request({ type: "listener", name: "socks", action: "start" }), {
      type: "ok",
      request: "listener",
    });
    assert.equal(stack.relay.listeners()[0].state, "running");

    assert.deepEqual(await client.request({ type: "listener", name: "nope", action: "stop" }), {
      type: "error",
      code: "unknown_listener",
      message: "unknown listener: nope",
    });
    client.close();
  } finally {
    await stack.stop();
  }
});

test("management: shutdown request drains the relay", async () => {
  const stack = await startStack();
  try {
    const client = await connect(stack.url);
    const shutdown = once(stack.management, "shutdown");

    assert.deepEqual(await client.request({ type: "shutdown", graceMs: 50 }), { type: "ok", request: "shutdown" });
    await shutdown;
    assert.equal(stack.relay.listeners()[0].state, "stopped");
    client.close();
  } finally {
    await stack.stop();
  }
});
