import RedisMock from 'ioredis-mock';
import { downstreamResponseSchema } from '../src/lib/downstream';
import { RedisStore } from '../src/stores/redisStore';
import type { CacheEntry, DownstreamResponse } from '../src/types';

const response: DownstreamResponse = {
  status: 200,
  headers: { 'content-type': 'application/json; charset=utf-8' },
  body: '[]',
};

function entry(key: string): CacheEntry<DownstreamResponse> {
  return { key, value: response, createdAt: 1, expiresAt: 300_001, lastAccessAt: 1, slidingMs: 120_000 };
}

describe('RedisStore', () => {
  const redis = new RedisMock();
  const store = new RedisStore(redis, { valueSchema: downstreamResponseSchema, prefix: 'test:' });

  beforeEach(async () => {
    await redis.flushall();
  });

  afterAll(() => {
    redis.disconnect();
  });

  test('increments a counter whose expiry is set by the first hit', async () => {
    const first = await store.increment('rl:orders:client:a', 60_000);
    const second = await store.increment('rl:orders:client:a', 60_000);

    expect(first.totalHits).toBe(1);
    expect(second.totalHits).toBe(2);
    expect(second.ttlMs).toBeGreaterThan(0);
    expect(second.ttlMs).toBeLessThanOrEqual(60_000);
  });

  test('stores entries as JSON with a PX expiry and reads them back', async () => {
    await store.set('orders:all', entry('orders:all'), 5_000);

    expect(await store.get('orders:all')).toEqual(entry('orders:all'));
    const ttl = await redis.pttl('test:orders:all');
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(5_000);
  });

  test('treats values that fail validation as a miss', async () => {
    await redis.set('test:orders:1', JSON.stringify({ ...entry('orders:1'), value: { status: 'ok' } }));
    await redis.set('test:orders:2', 'not json');

    expect(await store.get('orders:1')).toBeUndefined();
    expect(await store.get('orders:2')).toBeUndefined();
    expect(await store.get('orders:3')).toBeUndefined();
  });

  test('delete removes the key', async () => {
    await store.set('orders:all', entry('orders:all'), 5_000);
    await store.delete('orders:all');
    expect(await redis.exists('test:orders:all')).toBe(0);
  });
});
