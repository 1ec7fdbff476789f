// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export type { LogContext } from './log-context';
export {
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  runWithContext,
  withLogFields,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  domainErrorsTotal,
  unitOfWorkWritesTotal,
  replicationRunsTotal,
  replicationRecordsTotal,
  replicationDuration,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export { initTracing, shutdownTracing, getTracer, withSpan, traceReplication } from './tracing';
