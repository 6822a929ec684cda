import type { CachePolicy, HttpMethod, Result } from '../types';
import type { RouteDefinition } from './config';
import { gatewayError, type GatewayError } from './errors';
import type { RateLimitPolicy } from './rateLimit';

export type ParamType = 'int' | 'guid' | 'alpha';

type Segment =
  | { kind: 'literal'; value: string }
  | { kind: 'variable'; name: string; type?: ParamType }
  | { kind: 'wildcard'; name: string };

export interface DownstreamTarget {
  scheme: 'http' | 'https';
  host: string;
  port: number;
  pathTemplate: string;
}

export interface Route {
  // Stable across reloads; rate-limit counters are kept under it
  key: string;
  index: number;
  upstreamPathTemplate: string;
  methods: ReadonlySet<HttpMethod>;
  downstream: DownstreamTarget;
  entity?: string;
  idParam: string;
  rateLimit?: RateLimitPolicy;
  cache?: CachePolicy;
  authKey?: string;
  timeoutMs?: number;
  retry?: { attempts: number; backoffMs: number };
  readonly segments: readonly Segment[];
  readonly variableCount: number;
  readonly wildcardCount: number;
}

export interface RouteMatch {
  route: Route;
  method: HttpMethod;
  params: Readonly<Record<string, string>>;
  downstreamPath: string;
}

const PARAM_PATTERNS: Record<ParamType, RegExp> = {
  int: /^-?\d+$/,
  guid: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  alpha: /^[a-z]+$/i,
};

const PLACEHOLDER = /^\{(\*)?([A-Za-z_][A-Za-z0-9_]*)(?::([a-z]+))?\}$/;

export function splitPath(path: string): string[] {
  return path
    .split('?')[0]
    .split('/')
    .filter((part) => part.length > 0)
    .map((part) => {
      try {
        return decodeURIComponent(part);
      } catch {
        return part; // malformed escapes are matched literally
      }
    });
}

function parseTemplate(template: string): Result<Segment[], string> {
  const segments: Segment[] = [];
  const seen = new Set<string>();
  const parts = template.split('/').filter((part) => part.length > 0);
  for (const [position, part] of parts.entries()) {
    const placeholder = PLACEHOLDER.exec(part);
    if (!placeholder) {
      if (part.includes('{') || part.includes('}')) return { ok: false, error: `malformed segment "${part}"` };
      segments.push({ kind: 'literal', value: part.toLowerCase() });
      continue;
    }
    const [, star, name, type] = placeholder;
    if (seen.has(name)) return { ok: false, error: `duplicate parameter "${name}"` };
    seen.add(name);
    if (star) {
      if (position !== parts.length - 1) return { ok: false, error: `wildcard "{*${name}}" must be the last segment` };
      segments.push({ kind: 'wildcard', name });
      continue;
    }
    if (type !== undefined && !isParamType(type)) return { ok: false, error: `unknown parameter type "${type}"` };
    segments.push({ kind: 'variable', name, type });
  }
  return { ok: true, value: segments };
}

function isParamType(value: string): value is ParamType {
  return value in PARAM_PATTERNS;
}

function placeholderNames(segments: readonly Segment[]): string[] {
  return segments.flatMap((segment) => (segment.kind === 'literal' ? [] : [segment.name]));
}

function compileRoute(definition: RouteDefinition, index: number): Result<Route, string> {
  const upstream = parseTemplate(definition.upstreamPathTemplate);
  if (!upstream.ok) return { ok: false, error: `routes.${index}.upstreamPathTemplate: ${upstream.error}` };
  const downstream = parseTemplate(definition.downstream.pathTemplate);
  if (!downstream.ok) return { ok: false, error: `routes.${index}.downstream.pathTemplate: ${downstream.error}` };

  const bound = new Set(placeholderNames(upstream.value));
  const unbound = placeholderNames(downstream.value).filter((name) => !bound.has(name));
  if (unbound.length > 0) {
    return { ok: false, error: `routes.${index}.downstream.pathTemplate: unbound parameter(s) ${unbound.join(', ')}` };
  }

  const methods = new Set<HttpMethod>(definition.upstreamMethods);
  const segments = upstream.value;
  return {
    ok: true,
    value: {
      key: `${[...methods].sort().join(',')} ${definition.upstreamPathTemplate}`,
      index,
      upstreamPathTemplate: definition.upstreamPathTemplate,
      methods,
      downstream: { ...definition.downstream },
      entity: definition.entity,
      idParam: definition.idParam,
      rateLimit: definition.rateLimit && {
        windowMs: definition.rateLimit.windowSeconds * 1000,
        limit: definition.rateLimit.limit,
        allowList: definition.rateLimit.allowList,
      },
      cache: definition.cache && {
        ttlMs: definition.cache.ttlSeconds * 1000,
        slidingMs: definition.cache.slidingSeconds === undefined ? undefined : definition.cache.slidingSeconds * 1000,
      },
      authKey: definition.authKey,
      timeoutMs: definition.timeoutMs,
      retry: definition.retry,
      segments,
      variableCount: segments.filter((segment) => segment.kind === 'variable').length,
      wildcardCount: segments.filter((segment) => segment.kind === 'wildcard').length,
    },
  };
}

function matchSegments(segments: readonly Segment[], parts: readonly string[]): Record<string, string> | undefined {
  const params: Record<string, string> = {};
  for (const [i, segment] of segments.entries()) {
    if (segment.kind === 'wildcard') {
      params[segment.name] = parts.slice(i).join('/');
      return params;
    }
    const part = parts[i];
    if (part === undefined) return undefined;
    if (segment.kind === 'literal') {
      if (part.toLowerCase() !== segment.value) return undefined;
      continue;
    }
    if (segment.type && !PARAM_PATTERNS[segment.type].test(part)) return undefined;
    params[segment.name] = part;
  }
  return parts.length === segments.length ? params : undefined;
}

export function expandTemplate(template: string, params: Readonly<Record<string, string>>): string {
  const parts = template.split('/').filter((part) => part.length > 0);
  const expanded = parts.map((part) => {
    const placeholder = PLACEHOLDER.exec(part);
    if (!placeholder) return part;
    const [, star, name] = placeholder;
    const value = params[name] ?? '';
    return star ? value.split('/').map(encodeURIComponent).join('/') : encodeURIComponent(value);
  });
  const path = '/' + expanded.filter((part) => part.length > 0).join('/');
  return template.endsWith('/') && path !== '/' ? `${path}/` : path;
}

// Fewer wildcards first, then fewer variables, then registration order
function bySpecificity(a: Route, b: Route): number {
  return a.wildcardCount - b.wildcardCount || a.variableCount - b.variableCount || a.index - b.index;
}

function allows(route: Route, method: HttpMethod): boolean {
  return route.methods.has(method) || (method === 'HEAD' && route.methods.has('GET'));
}

/**
 * Immutable table of compiled routes.
 *
 * When several templates match a path, the most specific one that allows the
 * method wins: fewest wildcard segments, then fewest variable segments, then
 * the one registered first. A path that only matches templates not declaring
 * the method yields `MethodNotAllowed` instead of `RouteNotFound`.
 */
export class RouteTable {
  private readonly ranked: readonly Route[];

  private constructor(readonly routes: readonly Route[]) {
    this.ranked = Object.freeze([...routes].sort(bySpecificity));
    Object.freeze(this);
  }

  static build(definitions: readonly RouteDefinition[]): Result<RouteTable, string[]> {
    const routes: Route[] = [];
    const problems: string[] = [];
    definitions.forEach((definition, index) => {
      const compiled = compileRoute(definition, index);
      if (compiled.ok) routes.push(Object.freeze(compiled.value));
      else problems.push(compiled.error);
    });
    return problems.length > 0 ? { ok: false, error: problems } : { ok: true, value: new RouteTable(Object.freeze(routes)) };
  }

  static empty(): RouteTable {
    return new RouteTable([]);
  }

  match(method: string, path: string): Result<RouteMatch, GatewayError> {
    const verb = method.toUpperCase();
    const parts = splitPath(path);
    const allowed = new Set<string>();
    for (const route of this.ranked) {
      const params = matchSegments(route.segments, parts);
      if (!params) continue;
      if (isHttpMethod(verb) && allows(route, verb)) {
        const downstreamPath = expandTemplate(route.downstream.pathTemplate, params);
        return { ok: true, value: { route, method: verb, params, downstreamPath } };
      }
      route.methods.forEach((m) => allowed.add(m));
    }
    if (allowed.size > 0) {
      const allowedMethods = [...allowed].sort();
      return {
        ok: false,
        error: gatewayError('MethodNotAllowed', `Method ${verb} is not allowed for ${path}`, { allowedMethods }),
      };
    }
    return { ok: false, error: gatewayError('RouteNotFound', `No route matches ${path}`) };
  }
}

function isHttpMethod(value: string): value is HttpMethod {
  return ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'].includes(value);
}

/**
 * Holds the active table. Reloads build a complete table first and swap a
 * single reference, so a lookup sees either the old table or the new one.
 */
export class RouteTableHolder {
  private current: RouteTable;

  constructor(initial: RouteTable = RouteTable.empty()) {
    this.current = initial;
  }

  get table(): RouteTable {
    return this.current;
  }

  reload(definitions: readonly RouteDefinition[]): Result<RouteTable, string[]> {
    const built = RouteTable.build(definitions);
    if (built.ok) this.current = built.value;
    return built;
  }

  match(method: string, path: string): Result<RouteMatch, GatewayError> {
    return this.current.match(method, path);
  }
}
