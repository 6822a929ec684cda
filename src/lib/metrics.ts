export interface MetricsData {
  cacheHits: number;
  cacheMisses: number;
  coalescedLoads: number;
  invalidations: number;
  invalidationFailures: number;
  rateLimitBlocks: number;
  rateLimitErrors: number;
  totalRequests: number;
  responseTimeSum: number;
  responseTimeCount: number;
  responseTimeBuckets: Map<number, number>; // upper bound in seconds -> count
  routeHits: Map<string, number>;
  statusCodes: Map<number, number>;
}

// Histogram buckets for response time, in seconds
export const RESPONSE_TIME_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function emptyMetrics(): MetricsData {
  return {
    cacheHits: 0,
    cacheMisses: 0,
    coalescedLoads: 0,
    invalidations: 0,
    invalidationFailures: 0,
    rateLimitBlocks: 0,
    rateLimitErrors: 0,
    totalRequests: 0,
    responseTimeSum: 0,
    responseTimeCount: 0,
    responseTimeBuckets: new Map(),
    routeHits: new Map(),
    statusCodes: new Map(),
  };
}

function increment<K>(map: Map<K, number>, key: K, by = 1) {
  map.set(key, (map.get(key) ?? 0) + by);
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export class MetricsCollector {
  private metrics = emptyMetrics();

  constructor(private readonly prefix = 'cachegate_') {}

  recordCacheHit(): void {
    this.metrics.cacheHits++;
  }

  recordCacheMiss(coalesced = false): void {
    this.metrics.cacheMisses++;
    if (coalesced) this.metrics.coalescedLoads++;
  }

  recordInvalidation(keys: number): void {
    this.metrics.invalidations += keys;
  }

  recordInvalidationFailure(): void {
    this.metrics.invalidationFailures++;
  }

  recordRateLimitBlock(): void {
    this.metrics.rateLimitBlocks++;
  }

  recordRateLimitError(): void {
    this.metrics.rateLimitErrors++;
  }

  recordRequest(route: string, statusCode: number, responseTimeMs: number): void {
    this.metrics.totalRequests++;
    this.metrics.responseTimeSum += responseTimeMs;
    this.metrics.responseTimeCount++;
    increment(this.metrics.routeHits, route);
    increment(this.metrics.statusCodes, statusCode);

    const seconds = responseTimeMs / 1000;
    const bucket = RESPONSE_TIME_BUCKETS.find((upper) => seconds <= upper) ?? Number.POSITIVE_INFINITY;
    increment(this.metrics.responseTimeBuckets, bucket);
  }

  getCurrentMetrics(): MetricsData {
    return {
      ...this.metrics,
      responseTimeBuckets: new Map(this.metrics.responseTimeBuckets),
      routeHits: new Map(this.metrics.routeHits),
      statusCodes: new Map(this.metrics.statusCodes),
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }

  getPrometheusMetrics(): string {
    const current = this.metrics;
    const lookups = current.cacheHits + current.cacheMisses;
    const hitRatio = lookups > 0 ? current.cacheHits / lookups : 0;
    const lines: string[] = [];
    const metric = (name: string, type: 'counter' | 'gauge' | 'histogram', help: string, samples: string[]) => {
      lines.push(`# HELP ${this.prefix}${name} ${help}`, `# TYPE ${this.prefix}${name} ${type}`, ...samples, '');
    };
    const sample = (name: string, value: number, labels = '') => `${this.prefix}${name}${labels} ${value}`;

    metric('cache_hits_total', 'counter', 'Total number of cache hits', [sample('cache_hits_total', current.cacheHits)]);
    metric('cache_misses_total', 'counter', 'Total number of cache misses', [
      sample('cache_misses_total', current.cacheMisses),
    ]);
    metric('cache_coalesced_loads_total', 'counter', 'Misses served by a load another request started', [
      sample('cache_coalesced_loads_total', current.coalescedLoads),
    ]);
    metric('cache_hit_ratio', 'gauge', 'Cache hit ratio (0-1)', [sample('cache_hit_ratio', hitRatio)]);
    metric('cache_invalidations_total', 'counter', 'Cache keys removed after writes', [
      sample('cache_invalidations_total', current.invalidations),
    ]);
    metric('cache_invalidation_failures_total', 'counter', 'Cache keys that could not be removed', [
      sample('cache_invalidation_failures_total', current.invalidationFailures),
    ]);
    metric('rate_limit_blocks_total', 'counter', 'Total number of rate limit blocks', [
      sample('rate_limit_blocks_total', current.rateLimitBlocks),
    ]);
    metric('rate_limit_errors_total', 'counter', 'Rate limit store failures (requests admitted)', [
      sample('rate_limit_errors_total', current.rateLimitErrors),
    ]);
    metric('requests_total', 'counter', 'Total number of requests', [sample('requests_total', current.totalRequests)]);

    let cumulative = 0;
    const buckets = RESPONSE_TIME_BUCKETS.map((upper) => {
      cumulative += current.responseTimeBuckets.get(upper) ?? 0;
      return sample('response_time_seconds_bucket', cumulative, `{le="${upper}"}`);
    });
    metric('response_time_seconds', 'histogram', 'Response time histogram', [
      ...buckets,
      sample('response_time_seconds_bucket', current.responseTimeCount, '{le="+Inf"}'),
      sample('response_time_seconds_sum', current.responseTimeSum / 1000),
      sample('response_time_seconds_count', current.responseTimeCount),
    ]);

    if (current.routeHits.size > 0) {
      metric(
        'route_hits_total',
        'counter',
        'Total hits per route',
        [...current.routeHits].map(([route, hits]) => sample('route_hits_total', hits, `{route="${escapeLabel(route)}"}`)),
      );
    }
    if (current.statusCodes.size > 0) {
      metric(
        'responses_total',
        'counter',
        'Responses per status code',
        [...current.statusCodes].map(([code, count]) => sample('responses_total', count, `{status="${code}"}`)),
      );
    }
    return lines.join('\n');
  }
}
