import express, { type Express } from 'express';
import { createCatalogItemRepository, catalogItemDefinition } from './entities/catalogItems';
import { createOrderRepository, orderDefinition } from './entities/orders';
import type { Entity, EntityDefinition, EntityRepository } from './entities/repository';
import { entityRouter } from './lib/entityRouter';
import { errorHandler } from './lib/errorHandler';
import { healthRouter } from './lib/health';
import { logEnrichment } from './lib/logEnrichment';
import { silentLogger, type Logger } from './lib/logger';

export interface ServiceOptions {
  logger?: Logger;
  exposeDetail?: boolean;
}

/** One CRUD microservice: an entity router mounted under `basePath`. */
export function createServiceApp<E extends Entity, C, P>(
  basePath: string,
  repository: EntityRepository<E, C, P>,
  definition: EntityDefinition<C, P>,
  options: ServiceOptions = {},
): Express {
  const { logger = silentLogger, exposeDetail = false } = options;
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());
  app.use(logEnrichment({ logger }));
  app.use(healthRouter({ service: definition.type }));
  app.use(basePath, entityRouter(repository, { definition, exposeDetail, logger }));
  app.use(errorHandler({ exposeDetail, logger }));
  return app;
}

export function createOrdersService(options: ServiceOptions = {}) {
  const repository = createOrderRepository();
  return { repository, app: createServiceApp('/api/orders', repository, orderDefinition, options) };
}

export function createCatalogService(options: ServiceOptions = {}) {
  const repository = createCatalogItemRepository();
  return { repository, app: createServiceApp('/api/catalogitems', repository, catalogItemDefinition, options) };
}
