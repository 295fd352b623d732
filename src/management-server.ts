import { EventEmitter } from "events";
import type { IncomingHttpHeaders } from "http";
import type { AddressInfo } from "net";
import { WebSocket, WebSocketServer, type RawData } from "ws";

import { safeEqual } from "./codecs/credentials";
import { getErrorMessage } from "./errors";
import { parseClientMessage, type ClientMessage, type ErrorMessage, type ServerMessage } from "./management-protocol";
import type { RelayServer } from "./server";

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_MAX_JSON_BYTES = 64 * 1024;

export type ManagementServerOptions = {
  /** bind address */
  host?: string;
  /** bind port (0 picks an ephemeral port) */
  port?: number;
  /** shared secret; connections without it are refused with 401 */
  token?: string;
  /** largest accepted frame in `bytes` */
  maxJsonBytes?: number;
};

export type ManagementServerAddress = {
  host: string;
  port: number;
  url: string;
};

function formatHost(host: string) {
  return host.includes(":") ? `[${host}]` : host;
}

function resolveAddress(host: string, address: AddressInfo | string | null): ManagementServerAddress {
  const port = address && typeof address !== "string" ? address.port : 0;
  return { host, port, url: `ws://${formatHost(host)}:${port}` };
}

function validateToken(headers: IncomingHttpHeaders, token?: string) {
  if (!token) return true;
  const headerToken = headers["x-relay-token"];
  if (typeof headerToken === "string" && safeEqual(headerToken, token)) {
    return true;
  }
  const auth = headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) {
    return safeEqual(auth.slice("Bearer ".length), token);
  }
  return false;
}

function safeSend(ws: WebSocket, data: string): boolean {
  if (ws.readyState !== WebSocket.OPEN) return false;
  try {
    ws.send(data);
    return true;
  } catch {
    return false;
  }
}

function sendJson(ws: WebSocket, message: ServerMessage): boolean {
  return safeSend(ws, JSON.stringify(message));
}

function sendError(ws: WebSocket, error: ErrorMessage): boolean {
  return sendJson(ws, error);
}

function frameSize(data: RawData): number {
  if (Buffer.isBuffer(data)) return data.length;
  if (Array.isArray(data)) return data.reduce((total, chunk) => total + chunk.length, 0);
  return data.byteLength;
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * WebSocket control channel over a RelayServer: read-only stats and
 * session views plus listener start/stop and shutdown.
 *
 * Emits `shutdown` once a client-requested shutdown has completed.
 */
export class ManagementServer extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private address: ManagementServerAddress | null = null;
  private startPromise: Promise<ManagementServerAddress> | null = null;
  private stopPromise: Promise<void> | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly token: string | undefined;
  private readonly maxJsonBytes: number;

  constructor(
    private readonly relay: RelayServer,
    options: ManagementServerOptions = {}
  ) {
    super();
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? 0;
    this.token = options.token;
    this.maxJsonBytes = options.maxJsonBytes ?? DEFAULT_MAX_JSON_BYTES;
  }

  async start(): Promise<ManagementServerAddress> {
    if (this.startPromise) return this.startPromise;

    this.startPromise = this.startInternal().finally(() => {
      this.startPromise = null;
    });

    return this.startPromise;
  }

  async stop(): Promise<void> {
    if (this.stopPromise) return this.stopPromise;

    this.stopPromise = this.stopInternal().finally(() => {
      this.stopPromise = null;
    });

    return this.stopPromise;
  }

  private async startInternal(): Promise<ManagementServerAddress> {
    if (this.wss) {
      return this.address ?? resolveAddress(this.host, this.wss.address());
    }

    const wss = new WebSocketServer({
      host: this.host,
      port: this.port,
      maxPayload: this.maxJsonBytes,
      verifyClient: (info, done) => {
        if (!validateToken(info.req.headers, this.token)) {
          done(false, 401, "Unauthorized");
          return;
        }
        done(true);
      },
    });
    this.wss = wss;

    wss.on("connection", (ws) => this.handleConnection(ws));

    return new Promise<ManagementServerAddress>((resolve, reject) => {
      const handleError = (err: Error) => {
        cleanup();
        this.wss = null;
        reject(err);
      };

      const handleListening = () => {
        cleanup();
        wss.on("error", (err) => this.emit("error", err));
        const resolved = resolveAddress(this.host, wss.address());
        this.address = resolved;
        resolve(resolved);
      };

      const cleanup = () => {
        wss.off("error", handleError);
        wss.off("listening", handleListening);
      };

      wss.once("error", handleError);
      wss.once("listening", handleListening);
    });
  }

  private async stopInternal() {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    this.address = null;

    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => {
      let finished = false;
      const finish = () => {
        if (finished) return;
        finished = true;
        clearTimeout(timeout);
        resolve();
      };

      const timeout = setTimeout(() => {
        finish();
      }, 1000);

      wss.close(() => finish());
    });
  }

  private handleConnection(ws: WebSocket) {
    ws.on("message", (data, isBinary) => {
      if (isBinary) {
        sendError(ws, {
          type: "error",
          code: "invalid_message",
          message: "binary frames are not supported",
        });
        return;
      }

      if (frameSize(data) > this.maxJsonBytes) {
        sendError(ws, {
          type: "error",
          code: "payload_too_large",
          message: "message exceeds size limit",
        });
        return;
      }

      const parsed = parseClientMessage(frameText(data));
      if (!parsed.ok) {
        sendError(ws, { type: "error", code: parsed.code, message: parsed.message });
        return;
      }

      this.handleMessage(ws, parsed.message).catch((err) => {
        sendError(ws, { type: "error", code: "listener_error", message: getErrorMessage(err) });
      });
    });
  }

  private async handleMessage(ws: WebSocket, message: ClientMessage) {
    switch (message.type) {
      case "stats":
        sendJson(ws, { type: "stats", stats: this.relay.snapshot() });
        return;
      case "sessions":
        sendJson(ws, { type: "sessions", sessions: this.relay.listSessions() });
        return;
      case "listeners":
        sendJson(ws, { type: "listeners", listeners: this.relay.listeners() });
        return;
      case "listener":
        await this.handleListener(ws, message.name, message.action);
        return;
      case "shutdown":
        sendJson(ws, { type: "ok", request: "shutdown" });
        await this.relay.shutdown(message.graceMs);
        this.emit("shutdown");
        return;
    }
  }

  private async handleListener(ws: WebSocket, name: string, action: "start" | "stop") {
    if (!this.relay.listeners().some((listener) => listener.name === name)) {
      sendError(ws, { type: "error", code: "unknown_listener", message: `unknown listener: ${name}` });
      return;
    }
    if (action === "start") {
      await this.relay.startListener(name);
    } else {
      await this.relay.stopListener(name);
    }
    sendJson(ws, { type: "ok", request: "listener" });
  }
}
