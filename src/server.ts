import 'dotenv/config';
import Redis from 'ioredis';
import { createGatewayApp } from './app';
import { loadGatewayConfig, readEnvironment } from './lib/config';
import { downstreamResponseSchema } from './lib/downstream';
import { createLogger, type Logger } from './lib/logger';
import { MemoryStore } from './stores/memoryStore';
import { RedisStore } from './stores/redisStore';
import type { DownstreamResponse } from './types';

const PRUNE_INTERVAL_MS = 60_000;

function fatal(logger: Logger, message: string, problems: string[]): never {
  logger.error(message, { problems });
  process.exit(1);
}

async function main() {
  const env = readEnvironment();
  if (!env.ok) fatal(createLogger(), 'Invalid environment', env.error);
  const { port, environment, configPath, redisUrl, logLevel, adminReload } = env.value;
  const logger = createLogger({ level: logLevel, fields: { service: 'cachegate' } });

  const config = await loadGatewayConfig(configPath);
  if (!config.ok) fatal(logger, `Invalid gateway configuration in ${configPath}`, config.error);

  const memory = new MemoryStore<DownstreamResponse>();
  const redis = redisUrl ? new Redis(redisUrl) : undefined;
  const shared = redis ? new RedisStore(redis, { valueSchema: downstreamResponseSchema }) : memory;
  redis?.on('error', (error: Error) => logger.warn('Redis connection error', { error: error.message }));

  const built = createGatewayApp({
    config: config.value,
    rateLimitStore: shared,
    cacheStore: shared,
    logger,
    exposeErrorDetail: environment === 'development',
    reloadConfig: () => loadGatewayConfig(configPath),
    adminReload,
  });
  if (!built.ok) fatal(logger, 'Route table could not be built', built.error);
  const gatewayApp = built.value;

  process.on('SIGHUP', () => {
    gatewayApp.reload().catch((error: unknown) => logger.error('Configuration reload crashed', { error }));
  });

  // Only the in-process store keeps finished windows around
  const pruner = setInterval(() => {
    const removed = memory.prune();
    if (removed > 0) logger.debug('Pruned expired entries', { removed });
  }, PRUNE_INTERVAL_MS);
  pruner.unref();

  const server = gatewayApp.app.listen(port, () => {
    logger.info('Gateway listening', {
      port,
      baseUrl: config.value.global.baseUrl,
      environment,
      routes: gatewayApp.routes.table.routes.length,
      redis: Boolean(redis),
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    clearInterval(pruner);
    server.close(() => {
      redis?.disconnect();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ level: 'error', message: 'Gateway failed to start', error: String(error) }));
  process.exit(1);
});
