import express, { Application, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import {
  errorHandler,
  notFoundHandler,
  createApiLimiter,
  requestScope,
  ScopeFactory,
} from './middlewares';
import { createHealthRoutes, DependencyChecks } from './routes/health';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export interface ServiceAppOptions<TScope> {
  name: string;
  description: string;
  /** Builds the per-request unit of work and services */
  scopeFactory: ScopeFactory<TScope>;
  /** Mounted under /api/v1 */
  routes: Router;
  healthChecks: DependencyChecks;
}

/**
 * Express application shell shared by the catalog and transactions services
 */
export const createServiceApp = <TScope>(options: ServiceAppOptions<TScope>): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(config.isProduction ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(options.healthChecks));
  app.use('/api', createApiLimiter());
  app.use('/api/v1', requestScope(options.scopeFactory), options.routes);

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: options.name,
      version: config.app.version,
      description: options.description,
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
