import type { NextFunction, Request, Response } from 'express';
import { describeError, gatewayError, isGatewayError, toErrorBody, type GatewayError } from './errors';
import { silentLogger, type Logger } from './logger';

export interface ErrorHandlerOptions {
  exposeDetail?: boolean;
  logger?: Logger;
}

// body-parser tags the errors it raises with an HTTP status
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function asGatewayError(error: unknown): GatewayError {
  if (isGatewayError(error)) return error;
  const status = clientErrorStatus(error);
  if (status !== undefined) {
    return gatewayError('ValidationFailed', describeError(error), { status, cause: error });
  }
  return gatewayError('CollaboratorFailure', describeError(error), { cause: error });
}

/**
 * Last-resort Express error handler. Writes the `{ status, message, detail? }`
 * envelope; stack traces only go out when `exposeDetail` is set.
 */
export function errorHandler(options: ErrorHandlerOptions = {}) {
  const { exposeDetail = false, logger = silentLogger } = options;

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error);

    const failure = asGatewayError(error);
    const log = req.log ?? logger;
    if (failure.status >= 500) log.error('An unhandled exception occurred', { error, url: req.originalUrl });
    else log.info('Request rejected', { status: failure.status, message: failure.message });

    res.status(failure.status).json(toErrorBody(failure, exposeDetail));
  };
}
