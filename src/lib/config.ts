import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Result } from '../types';
import { describeError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

const methodSchema = z
  .string()
  .transform((m) => m.toUpperCase())
  .pipe(z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']));

const pathTemplateSchema = z.string().startsWith('/', 'path templates must start with "/"');

export const routeDefinitionSchema = z.object({
  upstreamPathTemplate: pathTemplateSchema,
  upstreamMethods: z.array(methodSchema).min(1),
  downstream: z.object({
    scheme: z.enum(['http', 'https']).default('http'),
    host: z.string().min(1),
    port: z.number().int().positive().max(65535),
    pathTemplate: pathTemplateSchema,
  }),
  entity: z.string().regex(/^[a-z0-9][a-z0-9-_]*$/i).optional(),
  idParam: z.string().default('id'),
  rateLimit: z
    .object({
      windowSeconds: z.number().positive(),
      limit: z.number().int().positive(),
      allowList: z.array(z.string()).optional(),
    })
    .optional(),
  cache: z
    .object({
      ttlSeconds: z.number().positive(),
      slidingSeconds: z.number().positive().optional(),
    })
    .optional(),
  authKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(5),
      backoffMs: z.number().int().nonnegative().default(100),
    })
    .optional(),
});

export const globalConfigSchema = z.object({
  // Address clients reach the gateway at; reported by /health and at startup
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(10_000),
  rateLimit: z
    .object({
      quotaExceededMessage: z.string().default('API calls quota exceeded!'),
      httpStatusCode: z.number().int().min(400).max(599).default(429),
      clientIdHeader: z.string().default('ClientId'),
      clientAllowList: z.array(z.string()).default([]),
    })
    .default({}),
  cache: z
    .object({
      defaultTtlSeconds: z.number().positive().default(300),
      defaultSlidingSeconds: z.number().positive().optional(),
    })
    .default({}),
});

export const gatewayConfigSchema = z.object({
  global: globalConfigSchema.default({}),
  routes: z.array(routeDefinitionSchema),
});

export type RouteDefinition = z.infer<typeof routeDefinitionSchema>;
export type GlobalConfig = z.infer<typeof globalConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseGatewayConfig(input: unknown): Result<GatewayConfig, string[]> {
  const parsed = gatewayConfigSchema.safeParse(input);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: formatIssues(parsed.error) };
}

export async function loadGatewayConfig(filePath: string): Promise<Result<GatewayConfig, string[]>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    return { ok: false, error: [`cannot read ${filePath}: ${describeError(error)}`] };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: [`${filePath} is not valid JSON: ${describeError(error)}`] };
  }
  return parseGatewayConfig(json);
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  GATEWAY_CONFIG: z.string().default('config/gateway.json'),
  REDIS_URL: z.string().url().optional(),
  LOG_LEVEL: z
    .string()
    .default('info')
    .refine(isLogLevel, 'expected one of debug, info, warn, error, silent'),
  ADMIN_RELOAD: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type Environment = {
  port: number;
  environment: 'development' | 'production' | 'test';
  configPath: string;
  redisUrl?: string;
  logLevel: LogLevel;
  adminReload: boolean;
};

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): Result<Environment, string[]> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
  const { PORT, NODE_ENV, GATEWAY_CONFIG, REDIS_URL, LOG_LEVEL, ADMIN_RELOAD } = parsed.data;
  return {
    ok: true,
    value: {
      port: PORT,
      environment: NODE_ENV,
      configPath: GATEWAY_CONFIG,
      redisUrl: REDIS_URL,
      logLevel: LOG_LEVEL,
      adminReload: ADMIN_RELOAD,
    },
  };
}
