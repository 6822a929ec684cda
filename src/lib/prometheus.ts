import type { NextFunction, Request, Response } from 'express';
import type { MetricsCollector } from './metrics';

export interface PrometheusOptions {
  collector: MetricsCollector;
  path?: string;
}

export function prometheusMetrics(options: PrometheusOptions) {
  const { collector, path = '/metrics' } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.method !== 'GET' || req.path !== path) return next();

    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    // end() rather than send(): send() would rewrite the content type's parameter order
    res.status(200).end(collector.getPrometheusMetrics());
  };
}

/** Times every response; the gateway leaves the matched route key in `res.locals.route`. */
export function createMetricsMiddleware(collector: MetricsCollector) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on('finish', () => {
      const route: unknown = res.locals.route;
      collector.recordRequest(typeof route === 'string' ? route : 'unmatched', res.statusCode, Date.now() - startTime);
    });
    next();
  };
}
