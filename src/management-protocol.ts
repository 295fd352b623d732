/**
 * Management control channel protocol.
 *
 * Transport: WebSocket text frames carrying one JSON object each.
 *
 * Client → Server:
 * - stats { type: "stats" }
 * - sessions { type: "sessions" }
 * - listeners { type: "listeners" }
 * - listener { type: "listener", name, action: "start" | "stop" }
 * - shutdown { type: "shutdown", graceMs? }
 *
 * Server → Client:
 * - stats { type: "stats", stats }
 * - sessions { type: "sessions", sessions }
 * - listeners { type: "listeners", listeners }
 * - ok { type: "ok", request }
 * - error { type: "error", code, message }
 */
import type { ListenerStatus } from "./listener";
import type { SessionInfo } from "./session";
import type { TrafficSnapshot } from "./traffic";

export type StatsRequestMessage = { type: "stats" };
export type SessionsRequestMessage = { type: "sessions" };
export type ListenersRequestMessage = { type: "listeners" };

export type ListenerCommandMessage = {
  type: "listener";
  name: string;
  action: "start" | "stop";
};

export type ShutdownCommandMessage = {
  type: "shutdown";
  /** override for the configured grace period in `ms` */
  graceMs?: number;
};

export type ClientMessage =
  | StatsRequestMessage
  | SessionsRequestMessage
  | ListenersRequestMessage
  | ListenerCommandMessage
  | ShutdownCommandMessage;

export type StatsMessage = {
  type: "stats";
  stats: TrafficSnapshot;
};

export type SessionsMessage = {
  type: "sessions";
  sessions: SessionInfo[];
};

export type ListenersMessage = {
  type: "listeners";
  listeners: ListenerStatus[];
};

export type OkMessage = {
  type: "ok";
  /** type of the request being acknowledged */
  request: ClientMessage["type"];
};

export type ErrorCode =
  | "invalid_json"
  | "invalid_message"
  | "unknown_type"
  | "payload_too_large"
  | "unknown_listener"
  | "listener_error";

export type ErrorMessage = {
  type: "error";
  code: ErrorCode;
  message: string;
};

export type ServerMessage = StatsMessage | SessionsMessage | ListenersMessage | OkMessage | ErrorMessage;

export type ParseResult =
  | { ok: true; message: ClientMessage }
  | { ok: false; code: ErrorCode; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate one client frame.
 */
export function parseClientMessage(raw: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, code: "invalid_json", message: "failed to parse JSON" };
  }

  if (!isRecord(value) || typeof value.type !== "string") {
    return { ok: false, code: "invalid_message", message: "message must be an object with a type" };
  }

  switch (value.type) {
    case "stats":
    case "sessions":
    case "listeners":
      return { ok: true, message: { type: value.type } };
    case "listener": {
      const { name, action } = value;
      if (typeof name !== "string" || name.length === 0) {
        return { ok: false, code: "invalid_message", message: "listener.name must be a non-empty string" };
      }
      if (action !== "start" && action !== "stop") {
        return { ok: false, code: "invalid_message", message: "listener.action must be start or stop" };
      }
      return { ok: true, message: { type: "listener", name, action } };
    }
    case "shutdown": {
      const { graceMs } = value;
      if (graceMs === undefined) return { ok: true, message: { type: "shutdown" } };
      if (typeof graceMs !== "number" || !Number.isInteger(graceMs) || graceMs < 0) {
        return { ok: false, code: "invalid_message", message: "shutdown.graceMs must be a non-negative integer" };
      }
      return { ok: true, message: { type: "shutdown", graceMs } };
    }
    default:
      return { ok: false, code: "unknown_type", message: `unsupported message type: ${value.type}` };
  }
}
