import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'finance-manager' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Domain Metrics
// ============================================

/**
 * Expected business-rule failures returned to clients, by error code
 */
export const domainErrorsTotal = new Counter({
  name: 'domain_errors_total',
  help: 'Business rule failures by error code',
  labelNames: ['code'] as const,
  registers: [registry],
});

/**
 * Entities written by unit of work commits
 */
export const unitOfWorkWritesTotal = new Counter({
  name: 'unit_of_work_writes_total',
  help: 'Entities written by unit of work commits',
  registers: [registry],
});

// ============================================
// Replication Metrics
// ============================================

export const replicationRunsTotal = new Counter({
  name: 'replication_runs_total',
  help: 'Replication runs by entity kind and outcome',
  labelNames: ['kind', 'outcome'] as const, // success, failure
  registers: [registry],
});

export const replicationRecordsTotal = new Counter({
  name: 'replication_records_total',
  help: 'Replicated records by entity kind and operation',
  labelNames: ['kind', 'operation'] as const, // inserted, updated
  registers: [registry],
});

export const replicationDuration = new Histogram({
  name: 'replication_duration_seconds',
  help: 'Replication duration per entity kind in seconds',
  labelNames: ['kind'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
