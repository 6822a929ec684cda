import type { CacheEntry, CachePolicy, CacheStore, Clock, Result } from '../types';
import { describeError } from './errors';
import { silentLogger, type Logger } from './logger';

export class LoadAbortedError extends Error {
  constructor(key: string) {
    super(`Caller stopped waiting for "${key}"`);
    this.name = 'LoadAbortedError';
  }
}

export type Loader<V, E> = (signal: AbortSignal) => Promise<Result<V, E>>;

export type CacheOptions<V> = {
  store: CacheStore<V>;
  defaultPolicy: CachePolicy;
  now?: Clock;
  logger?: Logger;
  hooks?: {
    onHit?: (info: { key: string }) => void;
    onMiss?: (info: { key: string; coalesced: boolean }) => void;
    onLoad?: (info: { key: string; ok: boolean; stored: boolean; durationMs: number }) => void;
    onInvalidated?: (info: { keys: string[] }) => void;
    onError?: (info: { key: string; operation: 'get' | 'set' | 'delete'; error: unknown }) => void;
  };
};

export type GetOrLoadOptions<V> = {
  policy?: CachePolicy;
  // Aborting releases this caller only; the load stops once nobody is waiting
  signal?: AbortSignal;
  cacheable?: (value: V) => boolean;
};

export type Lookup<V, E> = {
  source: 'hit' | 'loaded' | 'coalesced';
  result: Result<V, E>;
};

export type InvalidationOutcome = {
  invalidated: string[];
  failed: string[];
};

type Flight<V, E> = {
  promise: Promise<Result<V, E>>;
  controller: AbortController;
  waiters: number;
  // Set by invalidate(): the result still reaches its waiters but is never stored
  detached: boolean;
};

export function isLive<V>(entry: CacheEntry<V>, now: number): boolean {
  if (now > entry.expiresAt) return false;
  return entry.slidingMs === undefined || now <= entry.lastAccessAt + entry.slidingMs;
}

/**
 * Cache-aside access with single-flight loading.
 *
 * Absolute TTL is a hard ceiling: a hit refreshes `lastAccessAt` for sliding
 * expiry, and the medium TTL is rewritten to what is left of the absolute
 * window, never more. A failed load leaves the key absent.
 */
export class CacheAsideStore<V, E> {
  private readonly store: CacheStore<V>;
  private readonly defaultPolicy: CachePolicy;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly hooks: NonNullable<CacheOptions<V>['hooks']>;
  private readonly inflight = new Map<string, Flight<V, E>>();
  // Write counts for keys with a read in progress; a read only touches what it read
  private readonly reading = new Map<string, { readers: number; writes: number }>();
  private epoch = 0;

  constructor(options: CacheOptions<V>) {
    this.store = options.store;
    this.defaultPolicy = options.defaultPolicy;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.hooks = options.hooks ?? {};
  }

  async getOrLoad(key: string, loader: Loader<V, E>, options: GetOrLoadOptions<V> = {}): Promise<Result<V, E>> {
    return (await this.lookup(key, loader, options)).result;
  }

  /** Same as `getOrLoad`, also telling whether the value was cached, loaded, or shared with another caller's load. */
  async lookup(key: string, loader: Loader<V, E>, options: GetOrLoadOptions<V> = {}): Promise<Lookup<V, E>> {
    if (options.signal?.aborted) throw new LoadAbortedError(key);

    const joined = this.inflight.get(key);
    if (joined) {
      this.hooks.onMiss?.({ key, coalesced: true });
      return { source: 'coalesced', result: await this.wait(key, joined, options.signal) };
    }

    const cached = await this.read(key);
    if (cached !== undefined) {
      this.hooks.onHit?.({ key });
      return { source: 'hit', result: { ok: true, value: cached.value } };
    }

    if (options.signal?.aborted) throw new LoadAbortedError(key);

    // Another caller may have started the load while we were reading
    const raced = this.inflight.get(key);
    if (raced) {
      this.hooks.onMiss?.({ key, coalesced: true });
      return { source: 'coalesced', result: await this.wait(key, raced, options.signal) };
    }

    this.hooks.onMiss?.({ key, coalesced: false });
    const flight = this.startFlight(key, loader, options);
    return { source: 'loaded', result: await this.wait(key, flight, options.signal) };
  }

  async set(key: string, value: V, policy: CachePolicy = this.defaultPolicy): Promise<void> {
    await this.persist(key, value, policy);
  }

  async peek(key: string): Promise<V | undefined> {
    try {
      const entry = await this.store.get(key);
      return entry && isLive(entry, this.now()) ? entry.value : undefined;
    } catch (error) {
      this.reportError(key, 'get', error);
      return undefined;
    }
  }

  /**
   * Removes the keys and detaches in-flight loads for them, so the next
   * `getOrLoad` is a miss. Medium failures are logged and reported, never thrown.
   */
  async invalidate(keys: Iterable<string>): Promise<InvalidationOutcome> {
    const unique = [...new Set(keys)];
    this.epoch += 1;
    for (const key of unique) {
      const flight = this.inflight.get(key);
      if (flight) {
        flight.detached = true;
        this.inflight.delete(key);
      }
    }

    // Deletes are issued before the first await so reads started afterwards queue behind them
    const deletions = unique.map((key) => {
      try {
        return Promise.resolve(this.store.delete(key));
      } catch (error) {
        return Promise.reject(error);
      }
    });
    const settled = await Promise.allSettled(deletions);

    const outcome: InvalidationOutcome = { invalidated: [], failed: [] };
    settled.forEach((result, index) => {
      const key = unique[index];
      if (result.status === 'fulfilled') {
        outcome.invalidated.push(key);
        return;
      }
      outcome.failed.push(key);
      this.logger.warn('Cache invalidation failed', {
        kind: 'CacheInvalidationFailure',
        key,
        error: describeError(result.reason),
      });
      this.hooks.onError?.({ key, operation: 'delete', error: result.reason });
    });
    if (outcome.invalidated.length > 0) this.hooks.onInvalidated?.({ keys: outcome.invalidated });
    return outcome;
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  private async read(key: string): Promise<CacheEntry<V> | undefined> {
    const tracked = this.reading.get(key) ?? { readers: 0, writes: 0 };
    tracked.readers += 1;
    this.reading.set(key, tracked);
    try {
      return await this.readTracked(key, tracked);
    } finally {
      tracked.readers -= 1;
      if (tracked.readers === 0 && this.reading.get(key) === tracked) this.reading.delete(key);
    }
  }

  private async readTracked(key: string, tracked: { writes: number }): Promise<CacheEntry<V> | undefined> {
    const epoch = this.epoch;
    const writes = tracked.writes;
    let entry: CacheEntry<V> | undefined;
    try {
      entry = await this.store.get(key);
    } catch (error) {
      this.reportError(key, 'get', error);
      return undefined;
    }
    if (!entry) return undefined;

    const now = this.now();
    if (!isLive(entry, now)) {
      await this.remove(key);
      return undefined;
    }
    // Skip the touch if an invalidation or a write ran meanwhile, or it would put back the old entry
    if (entry.slidingMs !== undefined && epoch === this.epoch && writes === tracked.writes) {
      const touched = { ...entry, lastAccessAt: now };
      try {
        await this.store.set(key, touched, entry.expiresAt - now);
      } catch (error) {
        this.reportError(key, 'set', error);
      }
    }
    return entry;
  }

  private startFlight(key: string, loader: Loader<V, E>, options: GetOrLoadOptions<V>): Flight<V, E> {
    const policy = options.policy ?? this.defaultPolicy;
    const controller = new AbortController();
    const flight: Flight<V, E> = {
      controller,
      waiters: 0,
      detached: false,
      promise: this.run(key, loader, controller.signal, () => flight.detached, policy, options.cacheable),
    };
    this.inflight.set(key, flight);

    const release = () => {
      if (this.inflight.get(key) === flight) this.inflight.delete(key);
    };
    flight.promise.then(release, release);
    return flight;
  }

  private async run(
    key: string,
    loader: Loader<V, E>,
    signal: AbortSignal,
    isDetached: () => boolean,
    policy: CachePolicy,
    cacheable?: (value: V) => boolean,
  ): Promise<Result<V, E>> {
    // Yield once so the flight is registered before the loader can settle
    await Promise.resolve();
    const started = this.now();
    const result = await loader(signal);
    let stored = false;
    if (result.ok && !isDetached() && (cacheable?.(result.value) ?? true)) {
      stored = await this.persist(key, result.value, policy);
    }
    this.hooks.onLoad?.({ key, ok: result.ok, stored, durationMs: this.now() - started });
    return result;
  }

  private wait(key: string, flight: Flight<V, E>, signal?: AbortSignal): Promise<Result<V, E>> {
    flight.waiters += 1;
    return new Promise<Result<V, E>>((resolve, reject) => {
      let settled = false;
      const leave = () => {
        settled = true;
        flight.waiters -= 1;
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        if (settled) return;
        leave();
        if (flight.waiters === 0) {
          flight.controller.abort();
          if (this.inflight.get(key) === flight) this.inflight.delete(key);
        }
        reject(new LoadAbortedError(key));
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      flight.promise.then(
        (result) => {
          if (settled) return;
          leave();
          resolve(result);
        },
        (error: unknown) => {
          if (settled) return;
          leave();
          reject(error);
        },
      );
    });
  }

  // Issues the write synchronously so callers can check state right before calling
  private async persist(key: string, value: V, policy: CachePolicy): Promise<boolean> {
    const tracked = this.reading.get(key);
    if (tracked) tracked.writes += 1;
    const now = this.now();
    const entry: CacheEntry<V> = {
      key,
      value,
      createdAt: now,
      expiresAt: now + policy.ttlMs,
      lastAccessAt: now,
      slidingMs: policy.slidingMs,
    };
    try {
      await this.store.set(key, entry, policy.ttlMs);
      return true;
    } catch (error) {
      this.reportError(key, 'set', error);
      return false;
    }
  }

  private async remove(key: string): Promise<void> {
    try {
      await this.store.delete(key);
    } catch (error) {
      this.reportError(key, 'delete', error);
    }
  }

  private reportError(key: string, operation: 'get' | 'set' | 'delete', error: unknown) {
    this.logger.warn('Cache medium error', { key, operation, error: describeError(error) });
    this.hooks.onError?.({ key, operation, error });
  }
}
