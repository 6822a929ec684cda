import type { RateLimitStore } from '../types';
import { describeError } from './errors';
import { KeyedMutex } from './keyedMutex';
import { clientIdOf } from './keys';
import { silentLogger, type Logger } from './logger';

export type RateLimitPolicy = {
  windowMs: number;
  limit: number;
  allowList?: readonly string[];
};

export interface RateLimitedRoute {
  key: string;
  rateLimit?: RateLimitPolicy;
}

export type Admission =
  | { allowed: true; exempt: true }
  | { allowed: true; exempt: false; limit: number; remaining: number; resetMs: number }
  | { allowed: false; limit: number; retryAfterMs: number };

export type RateLimitOptions = {
  store: RateLimitStore;
  allowList?: Iterable<string>;
  logger?: Logger;
  hooks?: {
    onAllowed?: (info: { key: string; totalHits: number; remaining: number }) => void;
    onBlocked?: (info: { key: string; totalHits: number; retryAfterMs: number }) => void;
    onError?: (info: { key: string; error: unknown }) => void;
  };
};

export function rateLimitKey(route: RateLimitedRoute, clientKey: string): string {
  return `rl:${route.key}:${clientKey}`;
}

/**
 * Fixed-window admission per (client, route).
 *
 * The window opens on a client's first request and the counter restarts once
 * `windowMs` has passed since then. This is bursty at the boundary: a client can
 * spend its full limit at the end of one window and again at the start of the
 * next, so up to twice the limit can pass within one window length.
 *
 * Store failures fail open: the request is admitted and the error reported.
 */
export class RateLimiter {
  private readonly store: RateLimitStore;
  private readonly allowList: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly hooks: NonNullable<RateLimitOptions['hooks']>;
  private readonly mutex = new KeyedMutex();

  constructor(options: RateLimitOptions) {
    this.store = options.store;
    this.allowList = new Set(options.allowList ?? []);
    this.logger = options.logger ?? silentLogger;
    this.hooks = options.hooks ?? {};
  }

  async admit(clientKey: string, route: RateLimitedRoute): Promise<Admission> {
    const policy = route.rateLimit;
    if (!policy) return { allowed: true, exempt: true };
    if (this.isAllowListed(clientKey, policy)) return { allowed: true, exempt: true };

    const key = rateLimitKey(route, clientKey);
    let totalHits: number;
    let ttlMs: number;
    try {
      ({ totalHits, ttlMs } = await this.mutex.runExclusive(key, () => this.store.increment(key, policy.windowMs)));
    } catch (error) {
      this.logger.error('Rate limit store failed, admitting request', { key, error: describeError(error) });
      this.hooks.onError?.({ key, error });
      return { allowed: true, exempt: true };
    }

    if (totalHits > policy.limit) {
      const retryAfterMs = Math.max(1, ttlMs);
      this.hooks.onBlocked?.({ key, totalHits, retryAfterMs });
      return { allowed: false, limit: policy.limit, retryAfterMs };
    }

    const remaining = Math.max(0, policy.limit - totalHits);
    this.hooks.onAllowed?.({ key, totalHits, remaining });
    return { allowed: true, exempt: false, limit: policy.limit, remaining, resetMs: ttlMs };
  }

  // Lists hold raw client ids or IPs; keys arrive prefixed by their generator
  private isAllowListed(clientKey: string, policy: RateLimitPolicy): boolean {
    const candidates = [clientKey, clientIdOf(clientKey)];
    return candidates.some((id) => this.allowList.has(id) || policy.allowList?.includes(id) === true);
  }

  /** Drops finished windows, when the store keeps them in process. */
  async prune(): Promise<number> {
    return this.store.prune ? await this.store.prune() : 0;
  }
}
