import { once } from "events";
import type { Duplex } from "stream";
import { finished } from "stream/promises";

import type { BandwidthLease } from "./access-control";
import { RelayError, RelayIOError, getErrorMessage, type CloseReason } from "./errors";
import type { Session, TrafficDirection } from "./session";
import type { TrafficAccountant } from "./traffic";

export type RelayPumpOptions = {
  /** close after this long without traffic in `ms` (0 disables) */
  idleTimeoutMs: number;
  accountant: TrafficAccountant;
  /** null when bandwidth is unlimited */
  bandwidth: BandwidthLease | null;
  debug?: (message: string) => void;
};

export type RelayOutcome = {
  reason: CloseReason;
  error: Error | null;
};

/**
 * Copies bytes between the client stream and the upstream socket until
 * either side finishes, fails, idles out or the session is aborted.
 */
export class RelayPump {
  private outcome: RelayOutcome | null = null;
  private readonly controller = new AbortController();
  private idleTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly session: Session,
    private readonly client: Duplex,
    private readonly upstream: Duplex,
    private readonly options: RelayPumpOptions
  ) {}

  /**
   * Relay until closed. `head` is written upstream first.
   *
   * Never rejects.
   */
  async run(head: Buffer = Buffer.alloc(0)): Promise<RelayOutcome> {
    this.session.transition("relaying");
    this.session.touch();

    const onAbort = () => {
      this.close(this.session.abortReason ?? "shutdown", null);
    };
    if (this.session.signal.aborted) {
      onAbort();
    } else {
      this.session.signal.addEventListener("abort", onAbort, { once: true });
      this.armIdleTimer();
    }

    try {
      await Promise.all([
        this.copy(this.client, this.upstream, "upload", head),
        this.copy(this.upstream, this.client, "download", Buffer.alloc(0)),
      ]);
    } finally {
      this.session.signal.removeEventListener("abort", onAbort);
      this.clearIdleTimer();
    }

    return this.outcome ?? { reason: "eof", error: null };
  }

  private async copy(source: Duplex, dest: Duplex, direction: TrafficDirection, head: Buffer) {
    const signal = this.controller.signal;
    try {
      if (head.length > 0) {
        await this.forward(dest, head, direction);
      }
      for await (const chunk of source) {
        if (signal.aborted) return;
        if (!Buffer.isBuffer(chunk)) continue;
        await this.forward(dest, chunk, direction);
      }
      if (signal.aborted) return;
      dest.end();
      await finished(dest, { readable: false, signal });
      this.close("eof", null);
    } catch (err) {
      if (signal.aborted) return;
      this.close(...this.classify(err, direction));
    }
  }

  private async forward(dest: Duplex, chunk: Buffer, direction: TrafficDirection) {
    const signal = this.controller.signal;
    const bucket = this.options.bandwidth?.[direction];
    if (bucket) {
      await bucket.take(chunk.length, signal);
    }
    signal.throwIfAborted();

    this.session.addBytes(direction, chunk.length);
    this.options.accountant.addBytes(direction, this.session.protocol, chunk.length);

    if (!dest.write(chunk)) {
      await once(dest, "drain", { signal });
    }
  }

  private classify(err: unknown, direction: TrafficDirection): [CloseReason, Error] {
    if (err instanceof RelayError) return [err.closeReason, err];
    const side = direction === "upload" ? "client" : "upstream";
    return ["error", new RelayIOError(getErrorMessage(err), side)];
  }

  private close(reason: CloseReason, error: Error | null) {
    if (this.outcome) return;
    this.outcome = { reason, error };
    this.session.transition("closing");
    this.clearIdleTimer();
    this.options.debug?.(
      `session ${this.session.id} closing (${reason})${error ? `: ${error.message}` : ""}`
    );
    this.controller.abort();
    this.client.destroy();
    this.upstream.destroy();
  }

  private armIdleTimer() {
    const idleMs = this.options.idleTimeoutMs;
    if (idleMs <= 0) return;

    const check = () => {
      this.idleTimer = null;
      if (this.outcome) return;
      const quietFor = this.session.idleFor();
      if (quietFor >= idleMs) {
        this.close("idle", null);
        return;
      }
      this.idleTimer = setTimeout(check, idleMs - quietFor);
    };
    this.idleTimer = setTimeout(check, idleMs);
  }

  private clearIdleTimer() {
    if (!this.idleTimer) return;
    clearTimeout(this.idleTimer);
    this.idleTimer = null;
  }
}
