import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { Logger } from './logger';

export const CORRELATION_HEADER = 'x-correlation-id';

export interface LogEnrichmentOptions {
  logger: Logger;
  // When false, requests still get a correlation id and req.log, but nothing is logged
  enabled?: boolean;
}

export function readCorrelationId(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw && raw.length <= 128 ? raw : undefined;
}

/**
 * Gives every request a correlation id and a child logger carrying it, then
 * logs request start and completion with the cache and rate-limit outcome.
 */
export function logEnrichment(options: LogEnrichmentOptions) {
  const { logger, enabled = true } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const correlationId = readCorrelationId(req.headers[CORRELATION_HEADER]) ?? randomUUID();
    req.correlationId = correlationId;
    const log = logger.child({ correlationId });
    req.log = log;

    if (!enabled) return next();

    log.info('Request started', {
      method: req.method,
      url: req.originalUrl,
      ip: req.ip,
      userAgent: req.get('User-Agent'),
    });

    res.on('finish', () => {
      log.info('Request completed', {
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime,
        cacheStatus: res.getHeader('X-Cache'),
        rateLimitRemaining: res.getHeader('X-RateLimit-Remaining'),
      });
    });

    next();
  };
}

declare global {
  namespace Express {
    interface Request {
      log?: Logger;
      correlationId?: string;
    }
  }
}
