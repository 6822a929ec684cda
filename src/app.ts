import cors from 'cors';
import express, { type Express } from 'express';
import type { AxiosInstance } from 'axios';
import { CacheAsideStore } from './lib/cache';
import type { GatewayConfig } from './lib/config';
import { GatewayDispatcher } from './lib/dispatcher';
import { HttpDownstream, type Downstream } from './lib/downstream';
import { errorHandler } from './lib/errorHandler';
import type { GatewayError } from './lib/errors';
import { gateway } from './lib/gateway';
import { healthRouter } from './lib/health';
import { keyByHeader } from './lib/keys';
import { logEnrichment } from './lib/logEnrichment';
import { silentLogger, type Logger } from './lib/logger';
import { MetricsCollector } from './lib/metrics';
import { createMetricsMiddleware, prometheusMetrics } from './lib/prometheus';
import { RateLimiter } from './lib/rateLimit';
import { RouteTable, RouteTableHolder, type Route } from './lib/routeTable';
import { MemoryStore } from './stores/memoryStore';
import type { CacheStore, Clock, DownstreamResponse, RateLimitStore, Result } from './types';

export interface GatewayAppOptions {
  config: GatewayConfig;
  rateLimitStore?: RateLimitStore;
  cacheStore?: CacheStore<DownstreamResponse>;
  // Defaults to one HttpDownstream per scheme://host:port
  resolveDownstream?: (route: Route) => Downstream;
  httpClient?: AxiosInstance;
  // Source of fresh configuration for reload()
  reloadConfig?: () => Promise<Result<GatewayConfig, string[]>>;
  // Exposes reload() as POST /admin/reload
  adminReload?: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
  exposeErrorDetail?: boolean;
  requestLogging?: boolean;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface GatewayApp {
  app: Express;
  dispatcher: GatewayDispatcher;
  routes: RouteTableHolder;
  cache: CacheAsideStore<DownstreamResponse, GatewayError>;
  limiter: RateLimiter;
  metrics: MetricsCollector;
  /** Re-reads the configuration and swaps the route table; the old table stays on failure. */
  reload(): Promise<Result<RouteTable, string[]>>;
}

function httpResolver(client?: AxiosInstance): (route: Route) => Downstream {
  const byOrigin = new Map<string, Downstream>();
  return (route) => {
    const { scheme, host, port } = route.downstream;
    const origin = `${scheme}://${host}:${port}`;
    let downstream = byOrigin.get(origin);
    if (!downstream) {
      downstream = new HttpDownstream(route.downstream, client);
      byOrigin.set(origin, downstream);
    }
    return downstream;
  };
}

export function createGatewayApp(options: GatewayAppOptions): Result<GatewayApp, string[]> {
  const { config, logger = silentLogger, metrics = new MetricsCollector(), exposeErrorDetail = false } = options;

  const table = RouteTable.build(config.routes);
  if (!table.ok) return table;
  const routes = new RouteTableHolder(table.value);

  const memory = new MemoryStore<DownstreamResponse>({ now: options.now });
  const rateLimitStore = options.rateLimitStore ?? memory;
  const cacheStore = options.cacheStore ?? memory;

  const limiter = new RateLimiter({
    store: rateLimitStore,
    allowList: config.global.rateLimit.clientAllowList,
    logger,
    hooks: {
      onBlocked: () => metrics.recordRateLimitBlock(),
      onError: () => metrics.recordRateLimitError(),
    },
  });

  const { defaultTtlSeconds, defaultSlidingSeconds } = config.global.cache;
  const cache = new CacheAsideStore<DownstreamResponse, GatewayError>({
    store: cacheStore,
    defaultPolicy: {
      ttlMs: defaultTtlSeconds * 1000,
      slidingMs: defaultSlidingSeconds === undefined ? undefined : defaultSlidingSeconds * 1000,
    },
    now: options.now,
    logger,
    hooks: {
      onHit: () => metrics.recordCacheHit(),
      onMiss: ({ coalesced }) => metrics.recordCacheMiss(coalesced),
      onInvalidated: ({ keys }) => metrics.recordInvalidation(keys.length),
      onError: ({ operation }) => {
        if (operation === 'delete') metrics.recordInvalidationFailure();
      },
    },
  });

  const dispatcher = new GatewayDispatcher({
    routes,
    limiter,
    cache,
    resolveDownstream: options.resolveDownstream ?? httpResolver(options.httpClient),
    global: config.global,
    exposeErrorDetail,
    logger,
    sleep: options.sleep,
  });

  const reload = async (): Promise<Result<RouteTable, string[]>> => {
    if (!options.reloadConfig) return { ok: false, error: ['reloading is not configured'] };
    const loaded = await options.reloadConfig();
    if (!loaded.ok) {
      logger.error('Configuration reload failed, keeping current routes', { problems: loaded.error });
      return loaded;
    }
    const rebuilt = routes.reload(loaded.value.routes);
    if (rebuilt.ok) logger.info('Route table reloaded', { routes: rebuilt.value.routes.length });
    else logger.error('Configuration reload failed, keeping current routes', { problems: rebuilt.error });
    return rebuilt;
  };

  const app = express();
  app.disable('x-powered-by');
  // Any origin, method and header, as the services behind it expect browser callers
  app.use(cors());
  app.use(express.json());
  app.use(logEnrichment({ logger, enabled: options.requestLogging ?? true }));
  app.use(createMetricsMiddleware(metrics));
  app.use(prometheusMetrics({ collector: metrics, path: '/metrics' }));
  app.use(
    healthRouter({
      service: 'gateway',
      details: () => ({ baseUrl: config.global.baseUrl, routes: routes.table.routes.length }),
    }),
  );

  if (options.adminReload && options.reloadConfig) {
    app.post('/admin/reload', (_req, res, next) => {
      reload()
        .then((result) => {
          if (result.ok) {
            res.status(200).json({ status: 200, message: 'Routes reloaded', routes: result.value.routes.length });
          } else {
            res.status(400).json({ status: 400, message: 'Configuration rejected', detail: result.error });
          }
        })
        .catch(next);
    });
  }

  app.use(
    gateway({
      dispatcher,
      keyGenerator: keyByHeader(config.global.rateLimit.clientIdHeader, { fallbackToIp: true }),
      logger,
    }),
  );
  app.use(errorHandler({ exposeDetail: exposeErrorDetail, logger }));

  return { ok: true, value: { app, dispatcher, routes, cache, limiter, metrics, reload } };
}
