import { KeyedMutex } from '../src/lib/keyedMutex';
import { MemoryStore } from '../src/stores/memoryStore';
import type { CacheEntry } from '../src/types';

function entry(key: string, value: string): CacheEntry<string> {
  return { key, value, createdAt: 0, expiresAt: 1_000, lastAccessAt: 0 };
}

describe('MemoryStore', () => {
  let now = 0;
  let store: MemoryStore<string>;

  beforeEach(() => {
    now = 0;
    store = new MemoryStore<string>({ now: () => now });
  });

  test('counts hits in a fixed window that restarts once it has elapsed', async () => {
    expect(await store.increment('rl', 1_000)).toEqual({ totalHits: 1, ttlMs: 1_000 });
    now = 500;
    expect(await store.increment('rl', 1_000)).toEqual({ totalHits: 2, ttlMs: 500 });
    now = 1_000;
    expect(await store.increment('rl', 1_000)).toEqual({ totalHits: 1, ttlMs: 1_000 });
  });

  test('drops entries once their medium TTL has passed', async () => {
    await store.set('a', entry('a', 'x'), 100);
    now = 100;
    expect(await store.get('a')).toEqual(entry('a', 'x'));
    now = 101;
    expect(await store.get('a')).toBeUndefined();
    expect(store.size.entries).toBe(0);
  });

  test('hands out copies, not the stored entry', async () => {
    const original = entry('a', 'x');
    await store.set('a', original, 100);
    original.lastAccessAt = 99;
    const read = await store.get('a');
    expect(read?.lastAccessAt).toBe(0);
  });

  test('prune removes finished windows and expired entries', async () => {
    await store.increment('rl', 1_000);
    await store.set('a', entry('a', 'x'), 2_000);
    await store.set('b', entry('b', 'y'), 500);

    now = 1_000;
    expect(store.prune()).toBe(2);
    expect(store.size).toEqual({ counters: 0, entries: 1 });
  });

  test('delete removes an entry', async () => {
    await store.set('a', entry('a', 'x'), 100);
    await store.delete('a');
    expect(await store.get('a')).toBeUndefined();
  });
});

describe('KeyedMutex', () => {
  test('runs tasks for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const task = (name: string, ms: number) => async () => {
      order.push(`start:${name}`);
      await new Promise((resolve) => setTimeout(resolve, ms));
      order.push(`end:${name}`);
      return name;
    };

    const results = await Promise.all([mutex.runExclusive('k', task('a', 20)), mutex.runExclusive('k', task('b', 1))]);

    expect(results).toEqual(['a', 'b']);
    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
    expect(mutex.size).toBe(0);
  });

  test('different keys do not wait for each other', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseSlow: () => void = () => undefined;

    const slow = mutex.runExclusive('a', () => new Promise<void>((resolve) => (releaseSlow = resolve)));
    await mutex.runExclusive('b', async () => {
      order.push('b');
    });
    order.push('after b');
    releaseSlow();
    await slow;

    expect(order).toEqual(['b', 'after b']);
  });

  test('a failing task releases the key', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    expect(await mutex.runExclusive('k', async () => 'next')).toBe('next');
    expect(mutex.size).toBe(0);
  });
});
