export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

const MIN_TTL_MS = 1;

export type CachedValue<T> = {
  value: T;
  cachedAtEpochMs: number;
};

export type TtlCacheStats = {
  size: number;
  ttlMs: number;
  keys: string[];
  oldestAgeMs?: number;
};

export type TtlCacheOptions = {
  ttlMs?: number;
  now?: () => number;
};

/**
 * In-memory map with a fixed time-to-live per entry.
 *
 * Expired entries read as absent and are dropped on access; `evictExpired`
 * reclaims the rest. All operations are synchronous, so concurrent async
 * callers on the event loop never observe a half-applied update.
 */
export class TtlCache<T> {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, CachedValue<T>>();

  constructor(options: TtlCacheOptions = {}) {
    const ttl = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.ttlMs = Number.isFinite(ttl) ? Math.max(MIN_TTL_MS, Math.floor(ttl)) : DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get ttl(): number {
    return this.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CachedValue<T>, now: number): boolean {
    return now - entry.cachedAtEpochMs > this.ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: T): void {
    this.entries.set(key, { value, cachedAtEpochMs: this.now() });
  }

  /**
   * Removes every entry and returns how many were held.
   */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  /**
   * Removes expired entries and returns how many were dropped.
   */
  evictExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Live (unexpired) entries as `[key, value]` pairs.
   */
  liveEntries(): Array<[string, T]> {
    const now = this.now();
    const live: Array<[string, T]> = [];
    for (const [key, entry] of this.entries) {
      if (!this.isExpired(entry, now)) {
        live.push([key, entry.value]);
      }
    }
    return live;
  }

  stats(): TtlCacheStats {
    const now = this.now();
    let oldest: number | undefined;
    for (const entry of this.entries.values()) {
      if (oldest === undefined || entry.cachedAtEpochMs < oldest) {
        oldest = entry.cachedAtEpochMs;
      }
    }
    const stats: TtlCacheStats = {
      size: this.entries.size,
      ttlMs: this.ttlMs,
      keys: Array.from(this.entries.keys()),
    };
    if (oldest !== undefined) {
      stats.oldestAgeMs = now - oldest;
    }
    return stats;
  }
}
