import type { HeaderMap } from '../types';

export type IncomingHeaders = Record<string, string | string[] | number | undefined>;

export const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// Recomputed by whoever writes the body next
const FRAMING = new Set(['host', 'content-length', 'content-encoding']);

export function headerValue(headers: IncomingHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value === undefined ? undefined : String(value);
}

/**
 * Copies headers with lower-cased names, dropping hop-by-hop headers, any
 * header the `Connection` header nominates, and body framing headers.
 */
export function stripHopByHop(headers: IncomingHeaders): HeaderMap {
  const nominated = new Set(
    (headerValue(headers, 'connection') ?? '')
      .split(',')
      .map((name) => name.trim().toLowerCase())
      .filter(Boolean),
  );
  const out: HeaderMap = {};
  for (const [rawName, value] of Object.entries(headers)) {
    const name = rawName.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(name) || FRAMING.has(name) || nominated.has(name)) continue;
    out[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return out;
}
