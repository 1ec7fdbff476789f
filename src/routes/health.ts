import { Router, Request, Response } from 'express';

/**
 * Connectivity probe of one backing service (database, redis, ...)
 */
export interface DependencyStatus {
  connected: boolean;
  readyState?: number;
}

export type DependencyChecks = Record<string, () => DependencyStatus>;

const collect = (checks: DependencyChecks) => {
  const services: Record<string, DependencyStatus> = {};
  let healthy = true;
  for (const [name, check] of Object.entries(checks)) {
    const status = check();
    services[name] = status;
    healthy = healthy && status.connected;
  }
  return { healthy, services };
};

/**
 * /health, /health/live and /health/ready over the given dependency checks
 */
export const createHealthRoutes = (checks: DependencyChecks): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const { healthy, services } = collect(checks);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const { healthy } = collect(checks);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
