import { randomUUID } from 'crypto';
import type { DownstreamRequest, DownstreamResponse, HeaderMap } from '../types';
import type { CacheAsideStore } from './cache';
import type { GlobalConfig } from './config';
import { isSuccess, type Downstream, type DownstreamResult } from './downstream';
import { describeError, err, gatewayError, toErrorBody, type GatewayError } from './errors';
import { headerValue, stripHopByHop, type IncomingHeaders } from './headers';
import { CORRELATION_HEADER, readCorrelationId } from './logEnrichment';
import { silentLogger, type Logger } from './logger';
import type { Admission, RateLimiter } from './rateLimit';
import type { Route, RouteMatch, RouteTableHolder } from './routeTable';

export interface GatewayRequest {
  method: string;
  path: string;
  query: string;
  headers: IncomingHeaders;
  body?: unknown;
  clientKey: string;
  correlationId?: string;
}

export type CacheStatus = 'HIT' | 'MISS' | 'BYPASS';

export interface GatewayResponse {
  status: number;
  headers: HeaderMap;
  body: string;
  cacheStatus: CacheStatus;
  route?: string;
  error?: GatewayError;
}

export type DispatcherOptions = {
  routes: RouteTableHolder;
  limiter: RateLimiter;
  cache: CacheAsideStore<DownstreamResponse, GatewayError>;
  resolveDownstream: (route: Route) => Downstream;
  global: GlobalConfig;
  exposeErrorDetail?: boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const READ_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);
const RETRYABLE = new Set(['UpstreamTimeout', 'UpstreamUnavailable']);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function collectionKey(entity: string): string {
  return `${entity}:all`;
}

export function itemKey(entity: string, id: string): string {
  return `${entity}:${id}`;
}

export function pathKey(path: string, query = ''): string {
  return `path:${path}${query ? `?${query}` : ''}`;
}

function entityIdOf(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'id' in parsed) {
      const { id } = parsed;
      if (typeof id === 'string' || typeof id === 'number') return String(id);
    }
  } catch {
    // not JSON: nothing beyond the route binding to invalidate
  }
  return undefined;
}

function rateLimitHeaders(admission: Admission): HeaderMap {
  if (admission.allowed) {
    if (admission.exempt) return {};
    return {
      'x-ratelimit-limit': String(admission.limit),
      'x-ratelimit-remaining': String(admission.remaining),
      'x-ratelimit-reset': String(Math.ceil(admission.resetMs / 1000)),
    };
  }
  return {
    'x-ratelimit-limit': String(admission.limit),
    'x-ratelimit-remaining': '0',
    'retry-after': String(Math.ceil(admission.retryAfterMs / 1000)),
  };
}

/**
 * Runs one request through the gateway: route, admit, then either serve a
 * read through the cache or forward a write and invalidate what it touched.
 * Routing and admission failures return before any downstream call.
 */
export class GatewayDispatcher {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async dispatch(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse> {
    const correlationId =
      request.correlationId ?? readCorrelationId(headerValue(request.headers, CORRELATION_HEADER)) ?? randomUUID();
    const log = this.logger.child({ correlationId });

    // One snapshot per request; a concurrent reload swaps the holder, not this table
    const matched = this.options.routes.table.match(request.method, request.path);
    if (!matched.ok) return this.fail(matched.error, correlationId, log);
    const match = matched.value;
    const { route } = match;

    if (route.authKey && !headerValue(request.headers, 'authorization')) {
      return this.fail(gatewayError('Unauthorized', 'Authorization is required for this route'), correlationId, log, route);
    }

    const admission = await this.options.limiter.admit(request.clientKey, route);
    const limitHeaders = rateLimitHeaders(admission);
    if (!admission.allowed) {
      const { quotaExceededMessage, httpStatusCode } = this.options.global.rateLimit;
      const denied = gatewayError('RateLimitExceeded', quotaExceededMessage, {
        status: httpStatusCode,
        retryAfterMs: admission.retryAfterMs,
      });
      return this.fail(denied, correlationId, log, route, limitHeaders);
    }

    const { method } = match;
    const outbound: DownstreamRequest = {
      method,
      path: match.downstreamPath,
      query: request.query,
      headers: { ...stripHopByHop(request.headers), [CORRELATION_HEADER]: correlationId },
      body: READ_METHODS.has(method) ? undefined : request.body,
    };
    const downstream = this.options.resolveDownstream(route);

    let result: DownstreamResult;
    let cacheStatus: CacheStatus = 'BYPASS';
    const cacheKey = method === 'GET' ? this.readKey(match, request.query) : undefined;
    if (cacheKey !== undefined && route.cache) {
      const lookup = await this.options.cache.lookup(
        cacheKey,
        (loadSignal) => this.call(downstream, outbound, route, loadSignal, log),
        { policy: route.cache, signal, cacheable: (response) => isSuccess(response.status) },
      );
      result = lookup.result;
      cacheStatus = lookup.source === 'hit' ? 'HIT' : 'MISS';
    } else if (READ_METHODS.has(method)) {
      result = await this.call(downstream, outbound, route, signal, log);
    } else {
      // A write runs to completion even if the caller hangs up; it may already have committed
      result = await this.call(downstream, outbound, route, undefined, log);
    }

    if (!READ_METHODS.has(method)) {
      if (result.ok && isSuccess(result.value.status)) {
        await this.invalidateAfterWrite(match, result.value, log);
      } else if (!result.ok && result.error.kind === 'UpstreamTimeout') {
        // Outcome unknown: drop what the write would have touched
        await this.invalidateAfterWrite(match, undefined, log);
      }
    }

    if (!result.ok) return this.fail(result.error, correlationId, log, route, limitHeaders);

    return {
      status: result.value.status,
      headers: {
        ...result.value.headers,
        ...limitHeaders,
        [CORRELATION_HEADER]: correlationId,
        'x-cache': cacheStatus,
      },
      body: method === 'HEAD' ? '' : result.value.body,
      cacheStatus,
      route: route.key,
    };
  }

  // Entity routes use "<entity>:all" / "<entity>:<id>"; query strings are not cached under them
  private readKey(match: RouteMatch, query: string): string | undefined {
    const { route, params } = match;
    if (!route.entity) return pathKey(match.downstreamPath, query);
    if (query) return undefined;
    const id = params[route.idParam];
    return id === undefined ? collectionKey(route.entity) : itemKey(route.entity, id);
  }

  // Runs once the downstream answered 2xx, or when a timeout leaves the outcome unknown
  private async invalidateAfterWrite(match: RouteMatch, response: DownstreamResponse | undefined, log: Logger) {
    const { route, params } = match;
    const keys: string[] = [];
    if (route.entity) {
      keys.push(collectionKey(route.entity));
      const id = params[route.idParam] ?? (response && entityIdOf(response.body));
      if (id !== undefined) keys.push(itemKey(route.entity, id));
    } else {
      // Without an entity type, only a cached read of the same downstream path is known to be affected
      keys.push(pathKey(match.downstreamPath));
    }
    const outcome = await this.options.cache.invalidate(keys);
    if (outcome.failed.length > 0) {
      log.warn('Write committed but cache entries may be stale', { route: route.key, keys: outcome.failed });
    } else {
      log.debug('Invalidated cache after write', { route: route.key, keys: outcome.invalidated });
    }
  }

  private async call(
    downstream: Downstream,
    request: DownstreamRequest,
    route: Route,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<DownstreamResult> {
    // Retries are opt-in per route and only ever for reads
    const retries = request.method === 'GET' && route.retry ? route.retry.attempts : 0;
    let result = await this.callOnce(downstream, request, route, signal);
    for (let attempt = 1; attempt <= retries; attempt++) {
      if (result.ok || !RETRYABLE.has(result.error.kind) || signal?.aborted) break;
      const delay = (route.retry?.backoffMs ?? 0) * 2 ** (attempt - 1);
      log.warn('Retrying downstream call', { route: route.key, attempt, delay, kind: result.error.kind });
      await this.sleep(delay);
      result = await this.callOnce(downstream, request, route, signal);
    }
    return result;
  }

  private async callOnce(
    downstream: Downstream,
    request: DownstreamRequest,
    route: Route,
    signal: AbortSignal | undefined,
  ): Promise<DownstreamResult> {
    const timeoutMs = route.timeoutMs ?? this.options.global.timeoutMs;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<DownstreamResult>((resolve) => {
      // Settle before aborting so the timeout wins over whatever the abort makes the call return
      timer = setTimeout(() => {
        resolve(err(gatewayError('UpstreamTimeout', `Downstream did not answer within ${timeoutMs}ms`)));
        controller.abort();
      }, timeoutMs);
    });
    const sent = downstream
      .send(request, controller.signal)
      .catch((error: unknown) =>
        err(gatewayError('CollaboratorFailure', `Downstream call failed: ${describeError(error)}`, { cause: error })),
      );
    try {
      return await Promise.race([sent, timedOut]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private fail(error: GatewayError, correlationId: string, log: Logger, route?: Route, extra: HeaderMap = {}): GatewayResponse {
    const headers: HeaderMap = {
      ...extra,
      'content-type': 'application/json; charset=utf-8',
      [CORRELATION_HEADER]: correlationId,
      'x-cache': 'BYPASS',
    };
    if (error.allowedMethods) headers.allow = error.allowedMethods.join(', ');
    if (error.retryAfterMs !== undefined) headers['retry-after'] = String(Math.ceil(error.retryAfterMs / 1000));

    const fields = { kind: error.kind, status: error.status, route: route?.key };
    if (error.status >= 500) log.error(error.message, { ...fields, cause: error.cause });
    else log.info(error.message, fields);

    return {
      status: error.status,
      headers,
      body: JSON.stringify(toErrorBody(error, this.options.exposeErrorDetail)),
      cacheStatus: 'BYPASS',
      route: route?.key,
      error,
    };
  }
}
