import { RateLimiter, rateLimitKey, type RateLimitedRoute } from '../src/lib/rateLimit';
import { MemoryStore } from '../src/stores/memoryStore';
import type { RateLimitStore } from '../src/types';
import { captureLogger } from './helpers/fixtures';

const orders: RateLimitedRoute = { key: 'GET,POST /api/orders', rateLimit: { windowMs: 60_000, limit: 30 } };

describe('RateLimiter', () => {
  let now = 0;
  let store: MemoryStore;

  beforeEach(() => {
    now = 0;
    store = new MemoryStore({ now: () => now });
  });

  test('admits 30 calls per 60s window, denies the 31st, and resets after the window', async () => {
    const limiter = new RateLimiter({ store });

    for (let call = 1; call <= 30; call++) {
      now = (call - 1) * 1000;
      const admission = await limiter.admit('client:a', orders);
      expect(admission).toEqual({ allowed: true, exempt: false, limit: 30, remaining: 30 - call, resetMs: 60_000 - now });
    }

    now = 30_000;
    expect(await limiter.admit('client:a', orders)).toEqual({ allowed: false, limit: 30, retryAfterMs: 30_000 });

    now = 61_000;
    expect(await limiter.admit('client:a', orders)).toEqual({
      allowed: true,
      exempt: false,
      limit: 30,
      remaining: 29,
      resetMs: 60_000,
    });
  });

  test('counts clients and routes separately', async () => {
    const limiter = new RateLimiter({ store });
    const tight: RateLimitedRoute = { key: 'GET /api/catalog-items', rateLimit: { windowMs: 60_000, limit: 1 } };

    expect((await limiter.admit('client:a', tight)).allowed).toBe(true);
    expect((await limiter.admit('client:a', tight)).allowed).toBe(false);
    expect((await limiter.admit('client:b', tight)).allowed).toBe(true);
    expect((await limiter.admit('client:a', orders)).allowed).toBe(true);
  });

  test('concurrent calls never admit more than the limit', async () => {
    const limiter = new RateLimiter({ store });
    const admissions = await Promise.all(Array.from({ length: 40 }, () => limiter.admit('client:a', orders)));
    expect(admissions.filter((a) => a.allowed)).toHaveLength(30);
  });

  test('routes without a policy are exempt', async () => {
    const limiter = new RateLimiter({ store });
    expect(await limiter.admit('client:a', { key: 'GET /health' })).toEqual({ allowed: true, exempt: true });
    expect(store.size.counters).toBe(0);
  });

  test('allow-listed clients are admitted without being counted', async () => {
    const limiter = new RateLimiter({ store, allowList: ['partner'] });
    const perRoute: RateLimitedRoute = {
      key: 'GET /api/orders',
      rateLimit: { windowMs: 60_000, limit: 1, allowList: ['10.0.0.1'] },
    };

    for (let i = 0; i < 5; i++) {
      expect(await limiter.admit('client:partner', perRoute)).toEqual({ allowed: true, exempt: true });
      expect(await limiter.admit('client-ip:10.0.0.1', perRoute)).toEqual({ allowed: true, exempt: true });
    }
    expect(store.size.counters).toBe(0);
  });

  test('fires hooks for allowed and blocked calls', async () => {
    const events: string[] = [];
    const limiter = new RateLimiter({
      store,
      hooks: {
        onAllowed: ({ key, totalHits, remaining }) => events.push(`allowed:${key}:${totalHits}:${remaining}`),
        onBlocked: ({ key, totalHits, retryAfterMs }) => events.push(`blocked:${key}:${totalHits}:${retryAfterMs}`),
      },
    });
    const single: RateLimitedRoute = { key: 'GET /a', rateLimit: { windowMs: 10_000, limit: 1 } };

    await limiter.admit('client:a', single);
    now = 4_000;
    await limiter.admit('client:a', single);

    expect(events).toEqual(['allowed:rl:GET /a:client:a:1:0', 'blocked:rl:GET /a:client:a:2:6000']);
  });

  test('fails open when the store is unavailable', async () => {
    const broken: RateLimitStore = {
      increment: () => Promise.reject(new Error('connection refused')),
    };
    const { logger, lines } = captureLogger();
    const errors: unknown[] = [];
    const limiter = new RateLimiter({ store: broken, logger, hooks: { onError: ({ error }) => errors.push(error) } });

    expect(await limiter.admit('client:a', orders)).toEqual({ allowed: true, exempt: true });
    expect(errors).toHaveLength(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'error',
      message: 'Rate limit store failed, admitting request',
      key: rateLimitKey(orders, 'client:a'),
      error: 'connection refused',
    });
  });

  test('prune drops finished windows from the in-process store', async () => {
    const limiter = new RateLimiter({ store });
    await limiter.admit('client:a', orders);
    now = 60_000;
    expect(await limiter.prune()).toBe(1);
    expect(store.size.counters).toBe(0);
  });
});
