import { Router, type Request, type Response } from 'express';
import { describeError } from './errors';

export type HealthDetails = Record<string, unknown>;

export interface HealthOptions {
  service: string;
  // Must stay cheap: runs on every health check
  details?: () => HealthDetails | Promise<HealthDetails>;
}

/** `GET /health`: 200 `Healthy` while the process serves, 503 `Unhealthy` if `details` throws. */
export function healthRouter(options: HealthOptions): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    Promise.resolve()
      .then(() => options.details?.() ?? {})
      .then(
        (details) => {
          res.status(200).json({ service: options.service, status: 'Healthy', ...details });
        },
        (error: unknown) => {
          res.status(503).json({ service: options.service, status: 'Unhealthy', error: describeError(error) });
        },
      );
  });

  return router;
}
