import fs from "fs";

import { AEAD_METHODS, type AeadMethod } from "./codecs/aead";
import { parseAllowList } from "./access-control";
import { ConfigError } from "./errors";

export type ProtocolTag = "shadowsocks" | "socks5" | "http";

export const PROTOCOLS: ReadonlyArray<ProtocolTag> = ["shadowsocks", "socks5", "http"];

export type UserPassCredentials = {
  username: string;
  password: string;
};

type ListenerBase = {
  /** unique listener name used by the management surface */
  name: string;
  /** bind address */
  host: string;
  /** bind port (0 picks an ephemeral port) */
  port: number;
  enabled: boolean;
};

export type ShadowsocksListenerConfig = ListenerBase & {
  protocol: "shadowsocks";
  method: AeadMethod;
  password: string;
};

export type Socks5ListenerConfig = ListenerBase & {
  protocol: "socks5";
  /** null disables authentication */
  auth: UserPassCredentials | null;
};

export type HttpListenerConfig = ListenerBase & {
  protocol: "http";
  /** null disables Proxy-Authorization checks */
  auth: UserPassCredentials | null;
};

export type ListenerConfig = ShadowsocksListenerConfig | Socks5ListenerConfig | HttpListenerConfig;

export type BandwidthScope = "session" | "ip" | "global";

export type AccessPolicy = {
  /** allowed CIDR ranges or bare addresses (empty allows all) */
  allowedIps: string[];
  /** simultaneous sessions per client ip (0 = unlimited) */
  maxConnectionsPerIp: number;
  /** simultaneous sessions overall (0 = unlimited) */
  maxConnectionsTotal: number;
  /** per-direction rate in `bytes/sec` (0 = unlimited) */
  bandwidthLimit: number;
  bandwidthScope: BandwidthScope;
  replayProtection: boolean;
  /** how long a seen salt is remembered in `ms` */
  replayTtlMs: number;
  replayMaxEntries: number;
  /** upstream connect timeout in `ms` */
  connectTimeoutMs: number;
  /** close sessions without traffic for this long in `ms` (0 disables) */
  idleTimeoutMs: number;
  /** deadline for the protocol handshake in `ms` */
  handshakeTimeoutMs: number;
  /** time in-flight sessions get on shutdown in `ms` */
  shutdownGraceMs: number;
  /** whether client addresses appear in log lines */
  logClientIps: boolean;
};

export type ManagementConfig = {
  host: string;
  port: number;
  token?: string;
};

export type RelayConfig = {
  listeners: ListenerConfig[];
  policy: AccessPolicy;
  management: ManagementConfig | null;
};

export type ConfigValidationResult =
  | { ok: true; config: RelayConfig }
  | { ok: false; errors: string[] };

export const DEFAULT_LISTEN_HOST = "0.0.0.0";

export const DEFAULT_ACCESS_POLICY: Readonly<AccessPolicy> = {
  allowedIps: [],
  maxConnectionsPerIp: 0,
  maxConnectionsTotal: 1000,
  bandwidthLimit: 0,
  bandwidthScope: "session",
  replayProtection: true,
  replayTtlMs: 60_000,
  replayMaxEntries: 100_000,
  connectTimeoutMs: 10_000,
  idleTimeoutMs: 300_000,
  handshakeTimeoutMs: 10_000,
  shutdownGraceMs: 5_000,
  logClientIps: true,
};

export function resolveAccessPolicy(partial: Partial<AccessPolicy> = {}): AccessPolicy {
  return {
    ...DEFAULT_ACCESS_POLICY,
    ...partial,
    allowedIps: [...(partial.allowedIps ?? DEFAULT_ACCESS_POLICY.allowedIps)],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAeadMethod(value: unknown): value is AeadMethod {
  return typeof value === "string" && AEAD_METHODS.some((method) => method === value);
}

function isProtocol(value: unknown): value is ProtocolTag {
  return typeof value === "string" && PROTOCOLS.some((protocol) => protocol === value);
}

function isBandwidthScope(value: unknown): value is BandwidthScope {
  return value === "session" || value === "ip" || value === "global";
}

function isPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 65535;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function readCredentials(
  value: unknown,
  where: string,
  errors: string[]
): UserPassCredentials | null {
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) {
    errors.push(`${where}.auth must be an object`);
    return null;
  }
  const { username, password } = value;
  if (typeof username !== "string" || username.length === 0 || Buffer.byteLength(username) > 255) {
    errors.push(`${where}.auth.username must be a non-empty string of at most 255 bytes`);
    return null;
  }
  if (typeof password !== "string" || password.length === 0 || Buffer.byteLength(password) > 255) {
    errors.push(`${where}.auth.password must be a non-empty string of at most 255 bytes`);
    return null;
  }
  return { username, password };
}

function readListener(value: unknown, index: number, errors: string[]): ListenerConfig | null {
  const where = `listeners[${index}]`;
  if (!isRecord(value)) {
    errors.push(`${where} must be an object`);
    return null;
  }

  const before = errors.length;
  const { protocol } = value;
  if (!isProtocol(protocol)) {
    errors.push(`${where}.protocol must be one of ${PROTOCOLS.join(", ")}`);
    return null;
  }

  const name = value.name ?? `${protocol}-${index}`;
  if (typeof name !== "string" || name.length === 0) {
    errors.push(`${where}.name must be a non-empty string`);
  }
  const host = value.host ?? DEFAULT_LISTEN_HOST;
  if (typeof host !== "string" || host.length === 0) {
    errors.push(`${where}.host must be a non-empty string`);
  }
  if (!isPort(value.port)) {
    errors.push(`${where}.port must be an integer between 0 and 65535`);
  }
  const enabled = value.enabled ?? true;
  if (typeof enabled !== "boolean") {
    errors.push(`${where}.enabled must be a boolean`);
  }

  if (
    typeof name !== "string" ||
    typeof host !== "string" ||
    !isPort(value.port) ||
    typeof enabled !== "boolean"
  ) {
    return null;
  }

  const base = { name, host, port: value.port, enabled };

  if (protocol === "shadowsocks") {
    if (!isAeadMethod(value.method)) {
      errors.push(`${where}.method must be one of ${AEAD_METHODS.join(", ")}`);
    }
    if (typeof value.password !== "string" || value.password.length === 0) {
      errors.push(`${where}.password must be a non-empty string`);
    }
    if (!isAeadMethod(value.method) || typeof value.password !== "string") return null;
    if (errors.length !== before) return null;
    return { ...base, protocol, method: value.method, password: value.password };
  }

  const auth = readCredentials(value.auth, where, errors);
  if (errors.length !== before) return null;
  return { ...base, protocol, auth };
}

function readPolicy(value: unknown, errors: string[]): AccessPolicy {
  if (value === undefined) return resolveAccessPolicy();
  if (!isRecord(value)) {
    errors.push("policy must be an object");
    return resolveAccessPolicy();
  }

  const policy = resolveAccessPolicy();

  if (value.allowedIps !== undefined) {
    if (!Array.isArray(value.allowedIps) || !value.allowedIps.every((e) => typeof e === "string")) {
      errors.push("policy.allowedIps must be an array of strings");
    } else {
      const entries: string[] = value.allowedIps;
      const parsed = parseAllowList(entries);
      for (const invalid of parsed.invalid) {
        errors.push(`policy.allowedIps contains an invalid range: ${invalid}`);
      }
      policy.allowedIps = entries;
    }
  }

  const integerFields = [
    "maxConnectionsPerIp",
    "maxConnectionsTotal",
    "bandwidthLimit",
    "replayTtlMs",
    "replayMaxEntries",
    "connectTimeoutMs",
    "idleTimeoutMs",
    "handshakeTimeoutMs",
    "shutdownGraceMs",
  ] as const;

  for (const field of integerFields) {
    const raw = value[field];
    if (raw === undefined) continue;
    if (!isNonNegativeInteger(raw)) {
      errors.push(`policy.${field} must be a non-negative integer`);
      continue;
    }
    policy[field] = raw;
  }

  for (const field of ["connectTimeoutMs", "handshakeTimeoutMs", "replayTtlMs", "replayMaxEntries"] as const) {
    if (value[field] !== undefined && policy[field] === 0) {
      errors.push(`policy.${field} must be greater than 0`);
    }
  }

  if (value.bandwidthScope !== undefined) {
    if (!isBandwidthScope(value.bandwidthScope)) {
      errors.push("policy.bandwidthScope must be one of session, ip, global");
    } else {
      policy.bandwidthScope = value.bandwidthScope;
    }
  }

  for (const field of ["replayProtection", "logClientIps"] as const) {
    const raw = value[field];
    if (raw === undefined) continue;
    if (typeof raw !== "boolean") {
      errors.push(`policy.${field} must be a boolean`);
      continue;
    }
    policy[field] = raw;
  }

  return policy;
}

function readManagement(value: unknown, errors: string[]): ManagementConfig | null {
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) {
    errors.push("management must be an object");
    return null;
  }
  const host = value.host ?? "127.0.0.1";
  if (typeof host !== "string" || host.length === 0) {
    errors.push("management.host must be a non-empty string");
    return null;
  }
  if (!isPort(value.port)) {
    errors.push("management.port must be an integer between 0 and 65535");
    return null;
  }
  if (value.token !== undefined && (typeof value.token !== "string" || value.token.length === 0)) {
    errors.push("management.token must be a non-empty string");
    return null;
  }
  return {
    host,
    port: value.port,
    ...(typeof value.token === "string" ? { token: value.token } : {}),
  };
}

/**
 * Validate an untrusted configuration value and apply defaults.
 */
export function validateRelayConfig(value: unknown): ConfigValidationResult {
  const errors: string[] = [];

  if (!isRecord(value)) {
    return { ok: false, errors: ["configuration must be an object"] };
  }

  const listeners: ListenerConfig[] = [];
  if (!Array.isArray(value.listeners) || value.listeners.length === 0) {
    errors.push("listeners must be a non-empty array");
  } else {
    value.listeners.forEach((entry: unknown, index: number) => {
      const listener = readListener(entry, index, errors);
      if (listener) listeners.push(listener);
    });
  }

  const names = new Set<string>();
  const binds = new Set<string>();
  for (const listener of listeners) {
    if (names.has(listener.name)) {
      errors.push(`duplicate listener name: ${listener.name}`);
    }
    names.add(listener.name);

    if (listener.enabled && listener.port !== 0) {
      const bind = `${listener.host}:${listener.port}`;
      if (binds.has(bind)) {
        errors.push(`duplicate listener address: ${bind}`);
      }
      binds.add(bind);
    }
  }

  const policy = readPolicy(value.policy, errors);
  const management = readManagement(value.management, errors);

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, config: { listeners, policy, management } };
}

export function parseRelayConfig(json: string): RelayConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ConfigError([`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const result = validateRelayConfig(parsed);
  if (!result.ok) {
    throw new ConfigError(result.errors);
  }
  return result.config;
}

export function loadRelayConfig(filePath: string): RelayConfig {
  return parseRelayConfig(fs.readFileSync(filePath, "utf8"));
}

/**
 * Serialize a configuration to JSON.
 */
export function serializeRelayConfig(config: RelayConfig): string {
  return JSON.stringify(config, null, 2);
}
