import type { CacheEntry, CacheStore, Clock, RateLimitStore } from '../types';

type Counter = {
  count: number;
  windowStart: number;
  expiresAt: number; // windowStart + windowMs
};

export type MemoryStoreOptions = {
  now?: Clock;
};

export class MemoryStore<V = unknown> implements RateLimitStore, CacheStore<V> {
  private readonly counters = new Map<string, Counter>();
  private readonly cache = new Map<string, { entry: CacheEntry<V>; expiresAt: number }>();
  private readonly now: Clock;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  // Runs without awaiting anything, so concurrent calls for one key cannot interleave
  async increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }> {
    const now = this.now();
    const record = this.counters.get(key);
    if (!record || now - record.windowStart >= windowMs) {
      const expiresAt = now + windowMs;
      this.counters.set(key, { count: 1, windowStart: now, expiresAt });
      return { totalHits: 1, ttlMs: windowMs };
    }
    record.count += 1;
    return { totalHits: record.count, ttlMs: record.expiresAt - now };
  }

  async get(key: string): Promise<CacheEntry<V> | undefined> {
    const slot = this.cache.get(key);
    if (!slot) return undefined;
    if (slot.expiresAt < this.now()) {
      this.cache.delete(key);
      return undefined;
    }
    return { ...slot.entry };
  }

  async set(key: string, entry: CacheEntry<V>, ttlMs: number) {
    this.cache.set(key, { entry: { ...entry }, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string) {
    this.cache.delete(key);
  }

  /** Drops rate-limit windows that have ended and cache slots past their TTL. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, counter] of this.counters) {
      if (counter.expiresAt <= now) {
        this.counters.delete(key);
        removed += 1;
      }
    }
    for (const [key, slot] of this.cache) {
      if (slot.expiresAt < now) {
        this.cache.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): { counters: number; entries: number } {
    return { counters: this.counters.size, entries: this.cache.size };
  }
}
