import { EventEmitter } from "events";
import type net from "net";

import { AccessControl, normalizeAddress, type BandwidthLease, type ConnectionSlot } from "./access-control";
import { formatTarget } from "./address";
import { createCodec, type HandshakeResult, type ProtocolCodec } from "./codecs";
import { resolveAccessPolicy, type AccessPolicy, type ListenerConfig } from "./config";
import {
  type DebugComponent,
  type DebugConfig,
  type DebugFlag,
  debugFlagsToArray,
  formatClientAddress,
  formatDebugLine,
  resolveDebugFlags,
  stripTrailingNewline,
} from "./debug";
import {
  DecryptError,
  HandshakeError,
  PolicyError,
  RelayError,
  UpstreamConnectError,
  getErrorMessage,
  type CloseReason,
} from "./errors";
import { Listener, type ListenerAddress, type ListenerStatus } from "./listener";
import { RelayPump } from "./relay";
import { ReplayCache } from "./replay-cache";
import { Session, type SessionInfo } from "./session";
import { SocketReader } from "./socket-reader";
import { TrafficAccountant, formatBytes, type TrafficSnapshot } from "./traffic";
import { connectUpstream } from "./upstream";

/** handshake read-ahead cap in `bytes` */
const MAX_HANDSHAKE_BYTES = 64 * 1024 + 512;

export type RelayServerOptions = {
  /** listeners to run; disabled ones are registered but not bound */
  listeners: ListenerConfig[];
  /** access policy overrides */
  policy?: Partial<AccessPolicy>;
  /** debug components to log */
  debug?: DebugConfig;
  /** clock override for accounting and idle tracking */
  now?: () => number;
  /** hostname resolver for domain targets (defaults to dns.lookup) */
  lookup?: net.LookupFunction;
};

type ActiveSession = {
  session: Session;
  done: Promise<void>;
};

/**
 * Runs every configured listener and owns the sessions they accept.
 *
 * Emits `debug(component, message)` and `log(line)` events.
 */
export class RelayServer extends EventEmitter {
  readonly policy: AccessPolicy;
  readonly accountant: TrafficAccountant;
  readonly access: AccessControl;
  readonly replayCache: ReplayCache;

  private readonly listenersByName = new Map<string, Listener>();
  private readonly codecs = new Map<string, ProtocolCodec>();
  private readonly active = new Map<string, ActiveSession>();
  private readonly debugFlags: ReadonlySet<DebugFlag>;
  private readonly now: () => number;
  private readonly lookup: net.LookupFunction | undefined;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: RelayServerOptions) {
    super();
    this.now = options.now ?? Date.now;
    this.lookup = options.lookup;
    this.policy = resolveAccessPolicy(options.policy);
    this.accountant = new TrafficAccountant({ now: this.now });
    this.access = new AccessControl(this.policy, this.now);
    this.replayCache = new ReplayCache({
      ttlMs: this.policy.replayTtlMs,
      maxEntries: this.policy.replayMaxEntries,
      now: this.now,
    });
    this.debugFlags = resolveDebugFlags(options.debug);

    for (const config of options.listeners) {
      if (this.listenersByName.has(config.name)) {
        throw new Error(`duplicate listener name: ${config.name}`);
      }
      const listener = new Listener(config, (socket, owner) => this.handleConnection(socket, owner));
      listener.on("error", (err: Error) => {
        this.emitDebug("error", `listener ${config.name} error: ${err.message}`);
      });
      listener.on("state", (state: string) => {
        this.emitDebug("net", `listener ${config.name} ${state}`);
      });
      this.listenersByName.set(config.name, listener);
      this.codecs.set(config.name, createCodec(config));
    }
  }

  /** enabled debug components */
  getDebugFlags() {
    return debugFlagsToArray(new Set(this.debugFlags));
  }

  /**
   * Bind every enabled listener.
   *
   * If one fails to bind the ones already started are stopped again and the
   * ListenerBindError is rethrown.
   */
  async start(): Promise<Record<string, ListenerAddress>> {
    if (this.shutdownPromise) throw new Error("relay server is shut down");
    if (this.policy.replayProtection) this.replayCache.start();

    const started: Listener[] = [];
    const addresses: Record<string, ListenerAddress> = {};
    try {
      for (const listener of this.listenersByName.values()) {
        if (!listener.config.enabled) continue;
        addresses[listener.name] = await listener.start();
        started.push(listener);
      }
    } catch (err) {
      await Promise.all(started.map((listener) => listener.stop()));
      this.replayCache.stop();
      throw err;
    }
    return addresses;
  }

  async startListener(name: string): Promise<ListenerAddress> {
    if (this.shutdownPromise) throw new Error("relay server is shut down");
    return this.getListener(name).start();
  }

  /** Stop accepting on `name`; its live sessions keep running. */
  async stopListener(name: string): Promise<void> {
    await this.getListener(name).stop();
  }

  listeners(): ListenerStatus[] {
    return Array.from(this.listenersByName.values(), (listener) => listener.status());
  }

  snapshot(): TrafficSnapshot {
    return this.accountant.snapshot();
  }

  listSessions(): SessionInfo[] {
    return this.accountant.listSessions();
  }

  /**
   * Stop accepting, give live sessions `graceMs` to finish, then abort the
   * rest. Resolves once every session is closed.
   */
  shutdown(graceMs = this.policy.shutdownGraceMs): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(graceMs);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(graceMs: number) {
    this.emitDebug("relay", `shutting down (${this.active.size} active sessions)`);
    await Promise.all(Array.from(this.listenersByName.values(), (listener) => listener.stop()));

    if (this.active.size > 0) {
      let timer: NodeJS.Timeout | undefined;
      const graceExpired = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), graceMs);
      });
      const drained = Promise.all(Array.from(this.active.values(), (entry) => entry.done)).then(() => false);
      const expired = await Promise.race([drained, graceExpired]);
      clearTimeout(timer);

      if (expired) {
        this.emitDebug("relay", `grace period over, aborting ${this.active.size} sessions`);
        for (const { session } of this.active.values()) {
          session.abort("shutdown");
        }
        await Promise.all(Array.from(this.active.values(), (entry) => entry.done));
      }
    }

    this.replayCache.stop();
    const stats = this.accountant.snapshot();
    this.emitDebug(
      "relay",
      `stopped: sessions=${stats.totalSessions} up=${formatBytes(stats.upload)} down=${formatBytes(stats.download)}`
    );
  }

  private getListener(name: string): Listener {
    const listener = this.listenersByName.get(name);
    if (!listener) throw new Error(`unknown listener: ${name}`);
    return listener;
  }

  private getCodec(name: string): ProtocolCodec {
    const codec = this.codecs.get(name);
    if (!codec) throw new Error(`no codec for listener: ${name}`);
    return codec;
  }

  private handleConnection(socket: net.Socket, listener: Listener) {
    socket.on("error", (err) => {
      this.emitDebug("net", `client socket error: ${err.message}`);
    });

    const ip = normalizeAddress(socket.remoteAddress);
    const port = socket.remotePort ?? 0;
    const client = formatClientAddress(ip, port, this.policy.logClientIps);

    if (this.shutdownPromise) {
      socket.destroy();
      return;
    }

    if (!this.access.isAllowed(ip)) {
      this.rejectConnection(socket, listener, new PolicyError(`${client} is not in the allow list`, "ip_denied"));
      return;
    }
    const limit = this.access.limitFor(ip);
    const slot = limit === null ? this.access.reserve(ip) : null;
    if (!slot) {
      const rule = limit ?? "total_limit";
      this.rejectConnection(socket, listener, new PolicyError(`${client} exceeds the connection limit`, rule));
      return;
    }

    const session = new Session({
      protocol: listener.config.protocol,
      listener: listener.name,
      clientAddress: ip,
      clientPort: port,
      now: this.now,
    });
    this.accountant.sessionOpened(session);
    this.emitDebug("relay", `session ${session.id} accepted ${client} on ${listener.name}`);

    const done = this.runSession(socket, session, slot).finally(() => {
      this.active.delete(session.id);
    });
    this.active.set(session.id, { session, done });
  }

  /** Policy rejections are silent: no reply, just a close. */
  private rejectConnection(socket: net.Socket, listener: Listener, err: PolicyError) {
    this.accountant.recordRejected(err.rule);
    this.emitDebug("policy", `rejected on ${listener.name} (${err.rule}): ${err.message}`);
    socket.destroy();
  }

  /**
   * Handshake, connect, relay and tear down one session. Never rejects.
   */
  private async runSession(socket: net.Socket, session: Session, slot: ConnectionSlot) {
    let reason: CloseReason = "eof";
    let failure: unknown = null;
    let upstream: net.Socket | null = null;
    let result: HandshakeResult | null = null;
    let lease: BandwidthLease | null = null;

    try {
      const handshake = await this.performHandshake(this.getCodec(session.listener), socket, session);
      result = handshake;
      handshake.stream.on("error", (err) => {
        this.emitDebug("net", `session ${session.id} client stream error: ${err.message}`);
        // a bad tag while the upstream is still connecting ends the session now
        if (err instanceof DecryptError) session.abort("decrypt", err);
      });
      session.target = handshake.target;

      try {
        upstream = await connectUpstream(handshake.target, {
          timeoutMs: this.policy.connectTimeoutMs,
          signal: session.signal,
          lookup: this.lookup,
          onError: (err) => {
            this.emitDebug("net", `session ${session.id} upstream error: ${err.message}`);
          },
        });
      } catch (err) {
        if (err instanceof UpstreamConnectError) {
          await handshake.reject(err);
        }
        throw err;
      }

      this.emitDebug("relay", `session ${session.id} connected to ${formatTarget(handshake.target)}`);
      await handshake.accept(upstream);

      lease = this.access.acquireBandwidth(slot.ip);
      const pump = new RelayPump(session, handshake.stream, upstream, {
        idleTimeoutMs: this.policy.idleTimeoutMs,
        accountant: this.accountant,
        bandwidth: lease,
        debug: (message) => this.emitDebug("relay", message),
      });
      const outcome = await pump.run(handshake.head);
      reason = outcome.reason;
      failure = outcome.error;
    } catch (err) {
      failure = err;
      reason = session.abortReason ?? (err instanceof RelayError ? err.closeReason : "error");
    } finally {
      socket.destroy();
      result?.stream.destroy();
      upstream?.destroy();
      lease?.release();
      slot.release();
      session.transition("closing");
      if (session.transition("closed")) {
        this.accountant.sessionClosed(session, reason);
      }
    }

    const detail = failure ? `: ${getErrorMessage(failure)}` : "";
    this.emitDebug(
      reason === "eof" || reason === "idle" || reason === "shutdown" ? "relay" : "error",
      `session ${session.id} closed (${reason}) up=${session.bytesUp} down=${session.bytesDown}${detail}`
    );
  }

  /**
   * Run the codec handshake under the handshake deadline.
   */
  private async performHandshake(codec: ProtocolCodec, socket: net.Socket, session: Session) {
    const timer = setTimeout(() => {
      session.abort("handshake", new HandshakeError("handshake timed out"));
    }, this.policy.handshakeTimeoutMs);
    const reader = new SocketReader(socket, {
      signal: session.signal,
      maxBufferedBytes: MAX_HANDSHAKE_BYTES,
    });

    try {
      return await codec.handshake({
        socket,
        reader,
        policy: this.policy,
        replayCache: this.replayCache,
        debug: (message) => this.emitDebug("codec", `session ${session.id} ${message}`),
      });
    } finally {
      clearTimeout(timer);
      reader.detach();
    }
  }

  private hasDebug(flag: DebugFlag) {
    return this.debugFlags.has(flag);
  }

  private emitDebug(component: DebugComponent, message: string) {
    if (component !== "error" && !this.hasDebug(component)) return;
    this.emit("debug", component, stripTrailingNewline(message));
    this.emit("log", formatDebugLine(component, message));
  }
}
