/**
 * Threadkeeper — src/lib/ttlCache.ts
 * WHAT: Bounded cache with explicit TTL and per-key invalidation.
 * WHY: Guild config is read on every messageCreate in a monitored forum; the
 *      store invalidates a guild's entry on every write so reads never go stale
 *      past a mutation, and the TTL caps staleness for writes made elsewhere.
 * DOCS:
 *  - Map iteration order: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Map
 *
 * IMPLEMENTATION NOTES:
 *  - Map insertion order doubles as LRU order (delete + re-insert on hit)
 *  - Expiry is lazy: checked on get(); sweepExpired() drops the rest
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * @example
 * const cache = new TtlCache<string, GuildConfig | null>(1000, 5 * 60 * 1000);
 * cache.set("guild-123", config);
 * cache.get("guild-123"); // { value: config } or undefined on miss
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, { value: V; expiresAt: number }>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(maxSize: number, ttlMs: number, now: () => number = Date.now) {
    if (maxSize <= 0) {
      throw new Error("TtlCache maxSize must be a positive number");
    }
    if (ttlMs <= 0) {
      throw new Error("TtlCache ttlMs must be a positive number");
    }
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /**
   * Returns the hit wrapped in `{ value }` so a cached `null`/`undefined` is
   * distinguishable from a miss.
   */
  get(key: K): { value: V } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return { value: entry.value };
  }

  set(key: K, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /** Drop one key. Returns true when an entry was present. */
  invalidate(key: K): boolean {
    return this.entries.delete(key);
  }

  /** Drop expired entries; returns how many were removed. */
  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Includes expired entries not yet swept. */
  get size(): number {
    return this.entries.size;
  }
}
