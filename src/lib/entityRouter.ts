import { Router, type NextFunction, type Request, type Response } from 'express';
import type { Entity, EntityDefinition, EntityRepository, RepositoryResult } from '../entities/repository';
import { validationError, fromRepositoryError } from './downstream';
import { toErrorBody, type GatewayError } from './errors';
import { errorHandler } from './errorHandler';
import { silentLogger, type Logger } from './logger';

export interface EntityRouterOptions<C, P> {
  definition: EntityDefinition<C, P>;
  exposeDetail?: boolean;
  logger?: Logger;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function handle(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * The CRUD service for one entity type, as an Express router:
 * `GET /`, `GET /:id`, `POST /`, `PUT /:id`, `PATCH /:id` and `DELETE /:id`.
 */
export function entityRouter<E extends Entity, C, P>(
  repository: EntityRepository<E, C, P>,
  options: EntityRouterOptions<C, P>,
): Router {
  const { definition, exposeDetail = false, logger = silentLogger } = options;
  const router = Router();

  const fail = (res: Response, error: GatewayError) => {
    res.status(error.status).json(toErrorBody(error, exposeDetail));
  };

  const reply = async <T>(res: Response, status: number, pending: RepositoryResult<T>) => {
    const result = await pending;
    if (result.ok) res.status(status).json(result.value);
    else fail(res, fromRepositoryError(result.error));
  };

  router.get(
    '/',
    handle(async (req, res) => {
      (req.log ?? logger).info(`Fetching all ${definition.type}`);
      await reply(res, 200, repository.getAll());
    }),
  );

  router.get(
    '/:id',
    handle((req, res) => reply(res, 200, repository.getById(req.params.id))),
  );

  router.post(
    '/',
    handle(async (req, res) => {
      const input = definition.createSchema.safeParse(req.body);
      if (!input.success) return fail(res, validationError(input.error.issues));
      const result = await repository.create(input.data);
      if (!result.ok) return fail(res, fromRepositoryError(result.error));
      res.location(`${req.baseUrl}/${encodeURIComponent(result.value.id)}`);
      res.status(201).json(result.value);
    }),
  );

  router.put(
    '/:id',
    handle(async (req, res) => {
      const input = definition.createSchema.safeParse(req.body);
      if (!input.success) return fail(res, validationError(input.error.issues));
      await reply(res, 200, repository.update(req.params.id, input.data));
    }),
  );

  router.patch(
    '/:id',
    handle(async (req, res) => {
      const changes = definition.patchSchema.safeParse(req.body);
      if (!changes.success) return fail(res, validationError(changes.error.issues));
      await reply(res, 200, repository.patch(req.params.id, changes.data));
    }),
  );

  router.delete(
    '/:id',
    handle((req, res) => reply(res, 200, repository.delete(req.params.id))),
  );

  router.use(errorHandler({ exposeDetail, logger }));
  return router;
}
