import type Redis from 'ioredis';
import { z } from 'zod';
import type { CacheEntry, CacheStore, RateLimitStore } from '../types';

const entryMetaSchema = z.object({
  key: z.string(),
  value: z.unknown(),
  createdAt: z.number(),
  expiresAt: z.number(),
  lastAccessAt: z.number(),
  slidingMs: z.number().optional(),
});

export type RedisStoreOptions<V> = {
  // Cached values come back from Redis as untyped JSON
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>;
  prefix?: string;
};

export class RedisStore<V> implements RateLimitStore, CacheStore<V> {
  private readonly valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>;
  private readonly prefix: string;

  constructor(
    private readonly client: Redis,
    options: RedisStoreOptions<V>,
  ) {
    this.valueSchema = options.valueSchema;
    this.prefix = options.prefix ?? 'cachegate:';
  }

  async increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }> {
    const redisKey = this.prefix + key;
    // NX keeps the expiry set by the first hit, so the window never slides
    const results = await this.client
      .multi()
      .set(redisKey, '0', 'PX', windowMs, 'NX')
      .incr(redisKey)
      .pttl(redisKey)
      .exec();
    if (!results) throw new Error(`Rate limit transaction for ${key} was aborted`);
    const [, incr, pttl] = results;
    if (incr[0]) throw incr[0];
    const totalHits = Number(incr[1]);
    const ttl = Number(pttl[1]);
    return { totalHits, ttlMs: ttl > 0 ? ttl : windowMs };
  }

  async get(key: string): Promise<CacheEntry<V> | undefined> {
    const raw = await this.client.get(this.prefix + key);
    if (!raw) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // Unreadable payloads count as a miss and get overwritten by the next load
      return undefined;
    }
    const meta = entryMetaSchema.safeParse(parsed);
    if (!meta.success) return undefined;
    const value = this.valueSchema.safeParse(meta.data.value);
    if (!value.success) return undefined;
    const { key: entryKey, createdAt, expiresAt, lastAccessAt, slidingMs } = meta.data;
    return { key: entryKey, value: value.data, createdAt, expiresAt, lastAccessAt, slidingMs };
  }

  async set(key: string, entry: CacheEntry<V>, ttlMs: number) {
    await this.client.set(this.prefix + key, JSON.stringify(entry), 'PX', Math.max(1, Math.ceil(ttlMs)));
  }

  async delete(key: string) {
    await this.client.del(this.prefix + key);
  }
}
