import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Entity, EntityDefinition, EntityRepository, RepositoryError } from '../entities/repository';
import type { DownstreamRequest, DownstreamResponse, HeaderMap, Result } from '../types';
import { err, gatewayError, ok, type GatewayError } from './errors';
import { stripHopByHop } from './headers';
import type { DownstreamTarget } from './routeTable';
import { splitPath } from './routeTable';

// For media that hand cached responses back as untyped JSON
export const downstreamResponseSchema: z.ZodType<DownstreamResponse, z.ZodTypeDef, unknown> = z.object({
  status: z.number().int(),
  headers: z.record(z.string()),
  body: z.string(),
});

export type DownstreamResult = Result<DownstreamResponse, GatewayError>;

/** A backing service the gateway forwards to. Transport failures come back as values, not throws. */
export interface Downstream {
  send(request: DownstreamRequest, signal: AbortSignal): Promise<DownstreamResult>;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function jsonResponse(status: number, payload: unknown): DownstreamResponse {
  return {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
    body: JSON.stringify(payload),
  };
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

function classifyTransportError(error: unknown, url: string): GatewayError {
  if (axios.isAxiosError(error)) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return gatewayError('UpstreamTimeout', `Downstream ${url} timed out`, { cause: error });
    }
    return gatewayError('UpstreamUnavailable', `Downstream ${url} is unavailable`, { cause: error });
  }
  return gatewayError('CollaboratorFailure', `Request to ${url} failed`, { cause: error });
}

function flattenHeaders(headers: Record<string, unknown>): HeaderMap {
  const flat: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') flat[name] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') flat[name] = String(value);
    else if (Array.isArray(value)) flat[name] = value.map(String);
  }
  return stripHopByHop(flat);
}

/** Forwards to a service over HTTP and relays whatever status and body it answers with. */
export class HttpDownstream implements Downstream {
  constructor(
    private readonly target: DownstreamTarget,
    private readonly client: AxiosInstance = axios.create(),
  ) {}

  async send(request: DownstreamRequest, signal: AbortSignal): Promise<DownstreamResult> {
    const { scheme, host, port } = this.target;
    const url = `${scheme}://${host}:${port}${request.path}${request.query ? `?${request.query}` : ''}`;
    try {
      const response = await this.client.request<string>({
        url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        signal,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        maxRedirects: 0,
      });
      const body = typeof response.data === 'string' ? response.data : '';
      return ok({ status: response.status, headers: flattenHeaders(response.headers), body });
    } catch (error) {
      return err(classifyTransportError(error, url));
    }
  }
}

export function fromRepositoryError(error: RepositoryError): GatewayError {
  switch (error.kind) {
    case 'NotFound':
      return gatewayError('EntityNotFound', error.message);
    case 'Validation':
      return gatewayError('ValidationFailed', error.message, { details: error.details });
    default:
      return gatewayError('CollaboratorFailure', error.message, { cause: error.cause });
  }
}

export function validationError(issues: { path: (string | number)[]; message: string }[]): GatewayError {
  const details = issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }));
  return gatewayError('ValidationFailed', 'One or more validation errors occurred', { details });
}

/**
 * Serves the REST shape of one entity type straight from its repository:
 * `<base>` for the collection and `<base>/<id>` for one item.
 */
export class RepositoryDownstream<E extends Entity, C, P> implements Downstream {
  private readonly base: string[];

  constructor(
    private readonly repository: EntityRepository<E, C, P>,
    private readonly definition: EntityDefinition<C, P>,
    basePath: string,
  ) {
    this.base = splitPath(basePath).map((part) => part.toLowerCase());
  }

  // Repository calls are not cancellable; the signal is accepted to satisfy Downstream
  async send(request: DownstreamRequest, _signal?: AbortSignal): Promise<DownstreamResult> {
    const parts = splitPath(request.path);
    const inBase = this.base.every((part, i) => parts[i]?.toLowerCase() === part);
    const rest = parts.slice(this.base.length);
    if (!inBase || rest.length > 1) {
      return ok(jsonResponse(404, { status: 404, message: `No ${this.definition.type} resource at ${request.path}` }));
    }
    try {
      return await this.dispatch(request, rest[0]);
    } catch (error) {
      return err(gatewayError('CollaboratorFailure', `${this.definition.type} repository failed`, { cause: error }));
    }
  }

  private async dispatch(request: DownstreamRequest, id: string | undefined): Promise<DownstreamResult> {
    const { method } = request;
    if (id === undefined) {
      if (method === 'GET' || method === 'HEAD') return this.reply(200, await this.repository.getAll());
      if (method === 'POST') {
        const input = this.definition.createSchema.safeParse(request.body);
        if (!input.success) return err(validationError(input.error.issues));
        return this.reply(201, await this.repository.create(input.data));
      }
      return ok(this.methodNotAllowed(method, 'GET, HEAD, POST'));
    }

    switch (method) {
      case 'GET':
      case 'HEAD':
        return this.reply(200, await this.repository.getById(id));
      case 'PUT': {
        const input = this.definition.createSchema.safeParse(request.body);
        if (!input.success) return err(validationError(input.error.issues));
        return this.reply(200, await this.repository.update(id, input.data));
      }
      case 'PATCH': {
        const changes = this.definition.patchSchema.safeParse(request.body);
        if (!changes.success) return err(validationError(changes.error.issues));
        return this.reply(200, await this.repository.patch(id, changes.data));
      }
      case 'DELETE':
        return this.reply(200, await this.repository.delete(id));
      default:
        return ok(this.methodNotAllowed(method, 'GET, HEAD, PUT, PATCH, DELETE'));
    }
  }

  private reply<T>(status: number, result: Result<T, RepositoryError>): DownstreamResult {
    return result.ok ? ok(jsonResponse(status, result.value)) : err(fromRepositoryError(result.error));
  }

  private methodNotAllowed(method: string, allow: string): DownstreamResponse {
    const response = jsonResponse(405, { status: 405, message: `Method ${method} is not allowed` });
    response.headers.allow = allow;
    return response;
  }
}
