/**
 * Error taxonomy for session handling.
 *
 * Every error raised while a session is handshaking or relaying is one of the
 * `RelayError` subclasses below; the dispatcher maps `closeReason` onto the
 * traffic accountant's termination counters.
 */

export type RelayErrorKind =
  | "policy"
  | "handshake"
  | "auth"
  | "decrypt"
  | "upstream"
  | "relay_io";

/** Reason a session reached the closed state */
export type CloseReason =
  | "eof"
  | "idle"
  | "shutdown"
  | "error"
  | "decrypt"
  | "upstream"
  | "handshake"
  | "auth"
  | "policy";

/** Close reasons that do not count as errors */
export const BENIGN_CLOSE_REASONS: ReadonlySet<CloseReason> = new Set<CloseReason>([
  "eof",
  "idle",
  "shutdown",
]);

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;
  abstract readonly closeReason: CloseReason;
}

/** ip denied or connection limit exceeded (rejected before the handshake) */
export class PolicyError extends RelayError {
  readonly kind = "policy";
  readonly closeReason = "policy";

  constructor(
    message: string,
    readonly rule: "ip_denied" | "ip_limit" | "total_limit"
  ) {
    super(message);
    this.name = "PolicyError";
  }
}

/** malformed greeting / request, or handshake timeout */
export class HandshakeError extends RelayError {
  readonly kind = "handshake";
  readonly closeReason = "handshake";

  constructor(message: string) {
    super(message);
    this.name = "HandshakeError";
  }
}

/** bad or missing credentials */
export class AuthError extends RelayError {
  readonly kind = "auth";
  readonly closeReason = "auth";

  constructor(message = "authentication failed") {
    super(message);
    this.name = "AuthError";
  }
}

/** AEAD tag mismatch or replayed salt; always fatal */
export class DecryptError extends RelayError {
  readonly kind = "decrypt";
  readonly closeReason = "decrypt";

  constructor(message = "decryption failed") {
    super(message);
    this.name = "DecryptError";
  }
}

/** target unreachable or connect timeout */
export class UpstreamConnectError extends RelayError {
  readonly kind = "upstream";
  readonly closeReason = "upstream";

  constructor(
    message: string,
    /** errno-style code (`ECONNREFUSED`, `ETIMEDOUT`, ...) */
    readonly code: string
  ) {
    super(message);
    this.name = "UpstreamConnectError";
  }
}

/** peer reset or write failure mid-stream */
export class RelayIOError extends RelayError {
  readonly kind = "relay_io";
  readonly closeReason = "error";

  constructor(message: string, readonly side: "client" | "upstream") {
    super(message);
    this.name = "RelayIOError";
  }
}

export class ListenerBindError extends Error {
  constructor(
    readonly listener: string,
    readonly host: string,
    readonly port: number,
    readonly code: string
  ) {
    super(`failed to bind port ${port} on ${host} for listener ${listener} (${code})`);
    this.name = "ListenerBindError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (err === null || err === undefined) return "unknown error";
  return String(err);
}

export function getErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}
