import type { NextFunction, Request, Response } from 'express';
import { LoadAbortedError } from './cache';
import type { GatewayDispatcher, GatewayRequest, GatewayResponse } from './dispatcher';
import { keyByIp, type KeyGenerator } from './keys';
import { silentLogger, type Logger } from './logger';

export interface GatewayOptions {
  dispatcher: GatewayDispatcher;
  keyGenerator?: KeyGenerator;
  logger?: Logger;
}

function rawQuery(originalUrl: string): string {
  const start = originalUrl.indexOf('?');
  return start === -1 ? '' : originalUrl.slice(start + 1);
}

function write(res: Response, response: GatewayResponse) {
  if (response.route) res.locals.route = response.route;
  res.status(response.status);
  for (const [name, value] of Object.entries(response.headers)) res.setHeader(name, value);
  res.end(response.body);
}

export function toGatewayRequest(req: Request, clientKey: string): GatewayRequest {
  return {
    method: req.method,
    path: req.path,
    query: rawQuery(req.originalUrl),
    headers: req.headers,
    body: req.is('application/json') ? req.body : undefined,
    clientKey,
    correlationId: req.correlationId,
  };
}

/**
 * Express binding for the dispatcher. Mount it after `express.json()` and
 * `logEnrichment`; every request reaching it is answered by the gateway.
 */
export function gateway(options: GatewayOptions) {
  const { dispatcher, keyGenerator = keyByIp(), logger = silentLogger } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const log = req.log ?? logger;
    const controller = new AbortController();
    // The caller hung up: stop waiting, and let a shared load go if nobody else needs it
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    dispatcher
      .dispatch(toGatewayRequest(req, keyGenerator(req)), controller.signal)
      .then((response) => {
        if (controller.signal.aborted) return;
        write(res, response);
      })
      .catch((error: unknown) => {
        if (error instanceof LoadAbortedError) {
          log.debug('Client disconnected before the response was ready', { url: req.originalUrl });
          return;
        }
        next(error);
      });
  };
}
