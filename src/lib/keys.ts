import type { Request } from 'express';

/** Derives the client identity that rate-limit counters are kept under. */
export type KeyGenerator = (req: Request) => string;

type KeyOptions = { fallbackToIp?: boolean; prefix?: string };

function fallback(req: Request, prefix: string, options?: KeyOptions): string {
  if (options?.fallbackToIp) return `${prefix}-ip:${req.ip ?? 'unknown'}`;
  return `${prefix}:anonymous`;
}

export function keyByIp(): KeyGenerator {
  return (req) => `ip:${req.ip ?? 'unknown'}`;
}

export function keyByHeader(headerName: string = 'clientid', options?: KeyOptions): KeyGenerator {
  const normalized = headerName.toLowerCase();
  const prefix = options?.prefix ?? 'client';
  return (req) => {
    const headerValue = req.header(normalized);
    if (typeof headerValue === 'string' && headerValue.length > 0) {
      return `${prefix}:${headerValue}`;
    }
    return fallback(req, prefix, options);
  };
}

/** Strips the prefix a generator added, for matching against allow-lists of raw client ids. */
export function clientIdOf(key: string): string {
  const separator = key.indexOf(':');
  return separator === -1 ? key : key.slice(separator + 1);
}
