import { setTimeout as delay } from "timers/promises";

/** burst allowance expressed as time at the configured rate in `ms` */
const DEFAULT_BURST_MS = 100;

/**
 * Token bucket measured in bytes.
 *
 * Starts full. `take()` waits for tokens instead of failing, and requests
 * larger than the capacity are taken in capacity-sized slices.
 */
export class TokenBucket {
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;

  constructor(
    /** refill rate in `bytes/sec` */
    readonly rate: number,
    capacity?: number,
    private readonly now: () => number = Date.now
  ) {
    if (!(rate > 0)) {
      throw new Error(`token bucket rate must be positive (got ${rate})`);
    }
    this.capacity = capacity ?? Math.max(1, Math.floor((rate * DEFAULT_BURST_MS) / 1000));
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  tryTake(amount: number): boolean {
    this.refill();
    if (this.tokens < amount) return false;
    this.tokens -= amount;
    return true;
  }

  /**
   * Wait until `amount` tokens have been consumed.
   *
   * Rejects with an AbortError when `signal` fires.
   */
  async take(amount: number, signal?: AbortSignal): Promise<void> {
    let remaining = amount;
    while (remaining > 0) {
      signal?.throwIfAborted();
      const slice = Math.min(remaining, this.capacity);
      if (this.tryTake(slice)) {
        remaining -= slice;
        continue;
      }
      const waitMs = Math.max(1, Math.ceil(((slice - this.tokens) / this.rate) * 1000));
      await delay(waitMs, undefined, { signal });
    }
  }

  private refill() {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.rate) / 1000);
    this.lastRefill = now;
  }
}
