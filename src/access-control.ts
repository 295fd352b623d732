import ipaddr from "ipaddr.js";

import type { AccessPolicy } from "./config";
import { TokenBucket } from "./token-bucket";

export type AllowList = {
  v4: Array<[ipaddr.IPv4, number]>;
  v6: Array<[ipaddr.IPv6, number]>;
};

export type ParsedAllowList = {
  ranges: AllowList;
  /** entries that are neither an address nor a CIDR range */
  invalid: string[];
};

/**
 * Parse allow-list entries (`10.0.0.0/8`, `::1`, `192.0.2.7`, ...).
 *
 * IPv4-mapped IPv6 ranges are folded into their IPv4 form so they match
 * clients that arrive on a dual-stack socket.
 */
export function parseAllowList(entries: ReadonlyArray<string>): ParsedAllowList {
  const ranges: AllowList = { v4: [], v6: [] };
  const invalid: string[] = [];

  for (const entry of entries) {
    const raw = entry.trim();
    let address: ipaddr.IPv4 | ipaddr.IPv6;
    let bits: number;
    try {
      if (raw.includes("/")) {
        [address, bits] = ipaddr.parseCIDR(raw);
      } else {
        address = ipaddr.parse(raw);
        bits = address.kind() === "ipv4" ? 32 : 128;
      }
    } catch {
      invalid.push(entry);
      continue;
    }

    if (address instanceof ipaddr.IPv6 && address.isIPv4MappedAddress() && bits >= 96) {
      ranges.v4.push([address.toIPv4Address(), bits - 96]);
    } else if (address instanceof ipaddr.IPv4) {
      ranges.v4.push([address, bits]);
    } else if (address instanceof ipaddr.IPv6) {
      ranges.v6.push([address, bits]);
    }
  }

  return { ranges, invalid };
}

/**
 * Strip IPv4-mapped prefixes and zone ids; returns `address` unchanged when
 * it is not an IP literal.
 */
export function normalizeAddress(address: string | undefined): string {
  if (!address) return "unknown";
  const withoutZone = address.split("%")[0];
  if (!ipaddr.isValid(withoutZone)) return address;
  return ipaddr.process(withoutZone).toString();
}

export function isAddressAllowed(ranges: AllowList, address: string): boolean {
  if (ranges.v4.length === 0 && ranges.v6.length === 0) return true;
  if (!ipaddr.isValid(address)) return false;

  const parsed = ipaddr.process(address);
  if (parsed instanceof ipaddr.IPv4) {
    return ranges.v4.some(([range, bits]) => parsed.match(range, bits));
  }
  if (parsed instanceof ipaddr.IPv6) {
    return ranges.v6.some(([range, bits]) => parsed.match(range, bits));
  }
  return false;
}

export type ConnectionSlot = {
  readonly ip: string;
  /** idempotent */
  release(): void;
};

export type BandwidthLease = {
  upload: TokenBucket;
  download: TokenBucket;
  /** idempotent */
  release(): void;
};

type SharedBuckets = {
  upload: TokenBucket;
  download: TokenBucket;
  holders: number;
};

export type ConnectionCounts = {
  total: number;
  perIp: Record<string, number>;
};

/**
 * Admission control: CIDR allow-list, connection caps and bandwidth buckets.
 *
 * `reserve()` is the only place counters increase; every slot it hands out
 * decrements them exactly once.
 */
export class AccessControl {
  private readonly ranges: AllowList;
  private readonly perIp = new Map<string, number>();
  private total = 0;
  private readonly sharedBuckets = new Map<string, SharedBuckets>();

  constructor(
    readonly policy: AccessPolicy,
    private readonly now: () => number = Date.now
  ) {
    this.ranges = parseAllowList(policy.allowedIps).ranges;
  }

  isAllowed(ip: string): boolean {
    return isAddressAllowed(this.ranges, ip);
  }

  /**
   * Claim a connection slot for `ip`.
   *
   * @returns null when the per-ip or total cap is reached
   */
  reserve(ip: string): ConnectionSlot | null {
    if (this.limitFor(ip) !== null) return null;

    this.perIp.set(ip, (this.perIp.get(ip) ?? 0) + 1);
    this.total += 1;

    let released = false;
    return {
      ip,
      release: () => {
        if (released) return;
        released = true;
        this.total -= 1;
        const remaining = (this.perIp.get(ip) ?? 1) - 1;
        if (remaining <= 0) {
          this.perIp.delete(ip);
        } else {
          this.perIp.set(ip, remaining);
        }
      },
    };
  }

  /** Which cap `reserve(ip)` would hit, if any. */
  limitFor(ip: string): "total_limit" | "ip_limit" | null {
    if (this.policy.maxConnectionsTotal > 0 && this.total >= this.policy.maxConnectionsTotal) {
      return "total_limit";
    }
    if (this.policy.maxConnectionsPerIp > 0 && (this.perIp.get(ip) ?? 0) >= this.policy.maxConnectionsPerIp) {
      return "ip_limit";
    }
    return null;
  }

  counts(): ConnectionCounts {
    return { total: this.total, perIp: Object.fromEntries(this.perIp) };
  }

  /**
   * Buckets for one session according to the bandwidth scope.
   *
   * @returns null when bandwidth is unlimited
   */
  acquireBandwidth(ip: string): BandwidthLease | null {
    const rate = this.policy.bandwidthLimit;
    if (rate <= 0) return null;

    if (this.policy.bandwidthScope === "session") {
      return {
        upload: new TokenBucket(rate, undefined, this.now),
        download: new TokenBucket(rate, undefined, this.now),
        release: () => {},
      };
    }

    const key = this.policy.bandwidthScope === "global" ? "*" : ip;
    let shared = this.sharedBuckets.get(key);
    if (!shared) {
      shared = {
        upload: new TokenBucket(rate, undefined, this.now),
        download: new TokenBucket(rate, undefined, this.now),
        holders: 0,
      };
      this.sharedBuckets.set(key, shared);
    }
    shared.holders += 1;

    const entry = shared;
    let released = false;
    return {
      upload: entry.upload,
      download: entry.download,
      release: () => {
        if (released) return;
        released = true;
        entry.holders -= 1;
        if (entry.holders <= 0 && this.sharedBuckets.get(key) === entry) {
          this.sharedBuckets.delete(key);
        }
      },
    };
  }
}
