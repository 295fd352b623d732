export type ReplayCacheOptions = {
  /** how long an entry is remembered in `ms` */
  ttlMs: number;
  /** entry cap; the oldest entry is evicted beyond it */
  maxEntries?: number;
  /** expiry sweep period in `ms` */
  sweepIntervalMs?: number;
  /** clock override */
  now?: () => number;
};

const DEFAULT_MAX_ENTRIES = 100_000;
const DEFAULT_SWEEP_INTERVAL_MS = 10_000;

/**
 * Time-bounded set of salts used to reject replayed encrypted streams.
 *
 * Entries keep insertion order, so the first key of the map is always the
 * oldest one.
 */
export class ReplayCache {
  private readonly entries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: ReplayCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get size() {
    return this.entries.size;
  }

  has(value: Buffer): boolean {
    const expiresAt = this.entries.get(value.toString("hex"));
    return expiresAt !== undefined && expiresAt > this.now();
  }

  /**
   * Insert `value` unless it is already present and unexpired.
   *
   * @returns false when `value` was seen within the ttl
   */
  checkAndInsert(value: Buffer): boolean {
    const key = value.toString("hex");
    const now = this.now();
    const expiresAt = this.entries.get(key);
    if (expiresAt !== undefined) {
      if (expiresAt > now) return false;
      this.entries.delete(key);
    }
    this.insert(key, now);
    return true;
  }

  /** Remember `value` regardless of whether it was seen before. */
  add(value: Buffer) {
    const key = value.toString("hex");
    this.entries.delete(key);
    this.insert(key, this.now());
  }

  /**
   * Drop expired entries.
   *
   * @returns number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, expiresAt] of this.entries) {
      if (expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear() {
    this.entries.clear();
  }

  start() {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop() {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  private insert(key: string, now: number) {
    if (this.entries.size >= this.maxEntries) {
      this.sweep();
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, now + this.ttlMs);
  }
}
