export * from './app';
export * from './services';
export * from './lib/cache';
export * from './lib/config';
export * from './lib/dispatcher';
export * from './lib/downstream';
export * from './lib/entityRouter';
export * from './lib/errorHandler';
export * from './lib/errors';
export * from './lib/gateway';
export * from './lib/headers';
export * from './lib/health';
export * from './lib/keyedMutex';
export * from './lib/keys';
export * from './lib/logEnrichment';
export * from './lib/logger';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './lib/rateLimit';
export * from './lib/routeTable';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export * from './entities/repository';
export * from './entities/orders';
export * from './entities/catalogItems';
export type {
  CacheEntry,
  CachePolicy,
  CacheStore,
  Clock,
  DownstreamRequest,
  DownstreamResponse,
  HeaderMap,
  HttpMethod,
  RateLimitStore,
  Result,
} from './types';
