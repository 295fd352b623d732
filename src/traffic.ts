import type { ProtocolTag } from "./config";
import { BENIGN_CLOSE_REASONS, type CloseReason } from "./errors";
import type { Session, SessionInfo, TrafficDirection } from "./session";

export type RejectionRule = "ip_denied" | "ip_limit" | "total_limit";

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_HISTORY_HOURS = 24;

export type ProtocolTraffic = {
  activeSessions: number;
  totalSessions: number;
  /** client to upstream in `bytes` */
  upload: number;
  /** upstream to client in `bytes` */
  download: number;
};

export type HourlyTraffic = {
  /** hours since the epoch */
  hour: number;
  /** start of the hour in `ms` since the epoch */
  timestamp: number;
  upload: number;
  download: number;
  totalSessions: number;
  protocols: Record<ProtocolTag, ProtocolTraffic>;
};

export type TrafficSnapshot = {
  startedAt: number;
  uptimeMs: number;
  upload: number;
  download: number;
  activeSessions: number;
  totalSessions: number;
  protocols: Record<ProtocolTag, ProtocolTraffic>;
  closed: Record<CloseReason, number>;
  /** closes whose reason is not eof, idle or shutdown */
  errors: number;
  rejected: Record<RejectionRule, number>;
  hourly: HourlyTraffic[];
};

export type TrafficAccountantOptions = {
  now?: () => number;
  /** hourly entries to keep */
  historyHours?: number;
};

function emptyProtocols(): Record<ProtocolTag, ProtocolTraffic> {
  const zero = (): ProtocolTraffic => ({ activeSessions: 0, totalSessions: 0, upload: 0, download: 0 });
  return { shadowsocks: zero(), socks5: zero(), http: zero() };
}

function copyProtocols(protocols: Record<ProtocolTag, ProtocolTraffic>): Record<ProtocolTag, ProtocolTraffic> {
  return {
    shadowsocks: { ...protocols.shadowsocks },
    socks5: { ...protocols.socks5 },
    http: { ...protocols.http },
  };
}

function emptyCloseCounters(): Record<CloseReason, number> {
  return {
    eof: 0,
    idle: 0,
    shutdown: 0,
    error: 0,
    decrypt: 0,
    upstream: 0,
    handshake: 0,
    auth: 0,
    policy: 0,
  };
}

function emptyRejectionCounters(): Record<RejectionRule, number> {
  return { ip_denied: 0, ip_limit: 0, total_limit: 0 };
}

/**
 * Process-wide traffic and session counters.
 *
 * Every mutation is one synchronous call, so updates from concurrent sessions
 * never interleave. Readers get copies.
 */
export class TrafficAccountant {
  private readonly now: () => number;
  private readonly historyHours: number;
  private startedAt: number;
  private upload = 0;
  private download = 0;
  private totalSessions = 0;
  private protocols = emptyProtocols();
  private closed = emptyCloseCounters();
  private errors = 0;
  private rejected = emptyRejectionCounters();
  private hourly: HourlyTraffic[] = [];
  private lastHour: number;
  private readonly sessions = new Map<string, Session>();

  constructor(options: TrafficAccountantOptions = {}) {
    this.now = options.now ?? Date.now;
    this.historyHours = options.historyHours ?? DEFAULT_HISTORY_HOURS;
    this.startedAt = this.now();
    this.lastHour = Math.floor(this.startedAt / HOUR_MS);
  }

  addBytes(direction: TrafficDirection, protocol: ProtocolTag, amount: number) {
    if (amount <= 0) return;
    this.rollHour();
    if (direction === "upload") {
      this.upload += amount;
      this.protocols[protocol].upload += amount;
    } else {
      this.download += amount;
      this.protocols[protocol].download += amount;
    }
  }

  sessionOpened(session: Session) {
    if (this.sessions.has(session.id)) return;
    this.rollHour();
    this.sessions.set(session.id, session);
    this.totalSessions += 1;
    const stats = this.protocols[session.protocol];
    stats.activeSessions += 1;
    stats.totalSessions += 1;
  }

  /**
   * Record the end of a session.
   *
   * @returns false when `session` was not open (already closed)
   */
  sessionClosed(session: Session, reason: CloseReason): boolean {
    if (!this.sessions.delete(session.id)) return false;
    this.protocols[session.protocol].activeSessions -= 1;
    this.closed[reason] += 1;
    if (!BENIGN_CLOSE_REASONS.has(reason)) {
      this.errors += 1;
    }
    return true;
  }

  recordRejected(rule: RejectionRule) {
    this.rejected[rule] += 1;
  }

  get activeSessions() {
    return this.sessions.size;
  }

  snapshot(): TrafficSnapshot {
    this.rollHour();
    const now = this.now();
    return {
      startedAt: this.startedAt,
      uptimeMs: now - this.startedAt,
      upload: this.upload,
      download: this.download,
      activeSessions: this.sessions.size,
      totalSessions: this.totalSessions,
      protocols: copyProtocols(this.protocols),
      closed: { ...this.closed },
      errors: this.errors,
      rejected: { ...this.rejected },
      hourly: this.hourly.map((entry) => ({ ...entry, protocols: copyProtocols(entry.protocols) })),
    };
  }

  listSessions(): SessionInfo[] {
    return Array.from(this.sessions.values(), (session) => session.info());
  }

  /**
   * Zero all counters. Live sessions stay registered.
   */
  reset() {
    this.startedAt = this.now();
    this.lastHour = Math.floor(this.startedAt / HOUR_MS);
    this.upload = 0;
    this.download = 0;
    this.totalSessions = 0;
    const active = emptyProtocols();
    for (const session of this.sessions.values()) {
      active[session.protocol].activeSessions += 1;
    }
    this.protocols = active;
    this.closed = emptyCloseCounters();
    this.errors = 0;
    this.rejected = emptyRejectionCounters();
    this.hourly = [];
  }

  private rollHour() {
    const hour = Math.floor(this.now() / HOUR_MS);
    if (hour <= this.lastHour) return;
    this.hourly.push({
      hour,
      timestamp: hour * HOUR_MS,
      upload: this.upload,
      download: this.download,
      totalSessions: this.totalSessions,
      protocols: copyProtocols(this.protocols),
    });
    if (this.hourly.length > this.historyHours) {
      this.hourly = this.hourly.slice(-this.historyHours);
    }
    this.lastHour = hour;
  }
}

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}
