export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface RateLimitStore {
  // Fixed window: the counter restarts once windowMs has elapsed since the window opened
  increment(key: string, windowMs: number): Promise<{ totalHits: number; ttlMs: number }>; // ttlMs remaining
  prune?(): Promise<number> | number;
}

export interface CachePolicy {
  ttlMs: number; // absolute ceiling
  slidingMs?: number;
}

export interface CacheEntry<V> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number;
  lastAccessAt: number;
  slidingMs?: number;
}

export interface CacheStore<V> {
  get(key: string): Promise<CacheEntry<V> | undefined>;
  set(key: string, entry: CacheEntry<V>, ttlMs: number): Promise<void> | void;
  delete(key: string): Promise<void> | void;
}

export type Clock = () => number;

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export type HeaderMap = Record<string, string>;

export interface DownstreamRequest {
  method: HttpMethod;
  path: string;
  query: string; // raw, without the leading '?'
  headers: HeaderMap;
  body?: unknown;
}

export interface DownstreamResponse {
  status: number;
  headers: HeaderMap;
  body: string;
}
