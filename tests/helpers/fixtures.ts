import { gatewayConfigSchema, routeDefinitionSchema, type GatewayConfig, type RouteDefinition } from '../../src/lib/config';
import { createLogger, type Logger, type LogFields } from '../../src/lib/logger';

export function route(input: Record<string, unknown>): RouteDefinition {
  return routeDefinitionSchema.parse({
    downstream: { host: 'localhost', port: 5001, pathTemplate: '/' },
    ...input,
  });
}

export function gatewayConfig(input: Record<string, unknown>): GatewayConfig {
  return gatewayConfigSchema.parse(input);
}

export type CapturedLog = LogFields & { level: string; message: string };

/** A debug-level logger that keeps parsed lines instead of printing them. */
export function captureLogger(): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({
    level: 'debug',
    sink: (level, line) => {
      const parsed: unknown = JSON.parse(line);
      const fields = typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
      lines.push({ ...fields, level, message: 'message' in fields ? String(fields.message) : '' });
    },
  });
  return { logger, lines };
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
