export type GatewayErrorKind =
  | 'RouteNotFound'
  | 'MethodNotAllowed'
  | 'RateLimitExceeded'
  | 'Unauthorized'
  | 'UpstreamTimeout'
  | 'UpstreamUnavailable'
  | 'EntityNotFound'
  | 'ValidationFailed'
  | 'CollaboratorFailure'
  | 'CacheInvalidationFailure';

export interface GatewayError {
  kind: GatewayErrorKind;
  status: number;
  message: string;
  retryAfterMs?: number;
  allowedMethods?: string[];
  details?: unknown;
  cause?: unknown;
}

export interface ErrorBody {
  status: number;
  message: string;
  detail?: unknown;
}

const DEFAULT_STATUS: Record<GatewayErrorKind, number> = {
  RouteNotFound: 404,
  MethodNotAllowed: 405,
  RateLimitExceeded: 429,
  Unauthorized: 401,
  UpstreamTimeout: 504,
  UpstreamUnavailable: 502,
  EntityNotFound: 404,
  ValidationFailed: 400,
  CollaboratorFailure: 500,
  CacheInvalidationFailure: 500,
};

const GENERIC_MESSAGE = 'An unexpected error occurred';

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function gatewayError(
  kind: GatewayErrorKind,
  message: string,
  extra: Partial<Omit<GatewayError, 'kind' | 'message'>> = {},
): GatewayError {
  return { ...extra, kind, message, status: extra.status ?? DEFAULT_STATUS[kind] };
}

export function isGatewayError(value: unknown): value is GatewayError {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('message' in value)) return false;
  return typeof value.kind === 'string' && value.kind in DEFAULT_STATUS && typeof value.message === 'string';
}

// Errors raised inside Node's own modules fail instanceof checks under some module loaders
export function isErrorLike(value: unknown): value is { name?: unknown; message: string; stack?: unknown } {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

export function describeError(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/**
 * Turn a taxonomy error into the `{ status, message }` envelope sent to callers.
 * Collaborator failures never leak their message; `detail` is attached only
 * when `exposeDetail` is set (development mode).
 */
export function toErrorBody(error: GatewayError, exposeDetail = false): ErrorBody {
  const message = error.kind === 'CollaboratorFailure' && !exposeDetail ? GENERIC_MESSAGE : error.message;
  const body: ErrorBody = { status: error.status, message };
  if (exposeDetail) {
    const detail = error.details ?? (isErrorLike(error.cause) && typeof error.cause.stack === 'string' ? error.cause.stack : error.cause);
    if (detail !== undefined) body.detail = detail;
  } else if (error.kind === 'ValidationFailed' && error.details !== undefined) {
    body.detail = error.details;
  }
  return body;
}
