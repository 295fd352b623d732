import { randomUUID } from "crypto";

import type { TargetAddress } from "./address";
import type { ProtocolTag } from "./config";
import { HandshakeError, type CloseReason } from "./errors";

export type SessionState = "handshaking" | "relaying" | "closing" | "closed";

const STATE_ORDER: Record<SessionState, number> = {
  handshaking: 0,
  relaying: 1,
  closing: 2,
  closed: 3,
};

export type TrafficDirection = "upload" | "download";

export type SessionInfo = {
  id: string;
  protocol: ProtocolTag;
  listener: string;
  clientAddress: string;
  clientPort: number;
  target: TargetAddress | null;
  state: SessionState;
  /** client to upstream in `bytes` */
  bytesUp: number;
  /** upstream to client in `bytes` */
  bytesDown: number;
  createdAt: number;
  lastActivity: number;
  durationMs: number;
};

export type SessionInit = {
  protocol: ProtocolTag;
  listener: string;
  clientAddress: string;
  clientPort: number;
  now?: () => number;
};

/**
 * One accepted client connection.
 *
 * State only moves forward: handshaking -> relaying -> closing -> closed.
 */
export class Session {
  readonly id = randomUUID();
  readonly protocol: ProtocolTag;
  readonly listener: string;
  readonly clientAddress: string;
  readonly clientPort: number;
  readonly createdAt: number;
  target: TargetAddress | null = null;
  bytesUp = 0;
  bytesDown = 0;
  lastActivity: number;
  /** set by the first abort() */
  abortReason: CloseReason | null = null;

  private stateValue: SessionState = "handshaking";
  private readonly controller = new AbortController();
  private readonly now: () => number;

  constructor(init: SessionInit) {
    this.protocol = init.protocol;
    this.listener = init.listener;
    this.clientAddress = init.clientAddress;
    this.clientPort = init.clientPort;
    this.now = init.now ?? Date.now;
    this.createdAt = this.now();
    this.lastActivity = this.createdAt;
  }

  get state(): SessionState {
    return this.stateValue;
  }

  /** aborted on shutdown, handshake timeout or teardown */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Move to `next` if it is ahead of the current state.
   *
   * @returns whether the state changed
   */
  transition(next: SessionState): boolean {
    if (STATE_ORDER[next] <= STATE_ORDER[this.stateValue]) return false;
    this.stateValue = next;
    return true;
  }

  addBytes(direction: TrafficDirection, amount: number) {
    if (direction === "upload") {
      this.bytesUp += amount;
    } else {
      this.bytesDown += amount;
    }
    this.touch();
  }

  touch() {
    this.lastActivity = this.now();
  }

  /** time since the last byte in either direction in `ms`, on the session clock */
  idleFor(): number {
    return this.now() - this.lastActivity;
  }

  abort(reason: CloseReason, error?: Error) {
    if (this.controller.signal.aborted) return;
    this.abortReason = reason;
    this.controller.abort(error ?? new HandshakeError(`session aborted (${reason})`));
  }

  info(): SessionInfo {
    const now = this.now();
    return {
      id: this.id,
      protocol: this.protocol,
      listener: this.listener,
      clientAddress: this.clientAddress,
      clientPort: this.clientPort,
      target: this.target,
      state: this.stateValue,
      bytesUp: this.bytesUp,
      bytesDown: this.bytesDown,
      createdAt: this.createdAt,
      lastActivity: this.lastActivity,
      durationMs: now - this.createdAt,
    };
  }
}
