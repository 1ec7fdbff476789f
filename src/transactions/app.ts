import { Application, Router } from 'express';

import { createServiceApp } from '../app';
import { config } from '../config';
import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';
import { ScopeFactory } from '../middlewares/requestScope';
import { getReplicationQueueStats, isReplicationWorkerRunning } from '../queues';
import { DependencyChecks } from '../routes/health';
import environmentRoutes from '../routes/environment';
import { TransactionsScope } from './scope';
import { createReplicationRoutes, ReplicationStatusProvider } from './services/replication';
import { transactionRoutes } from './services/transaction';
import { transferRoutes } from './services/transfer';

export interface TransactionsAppOptions {
  scopeFactory: ScopeFactory<TransactionsScope>;
  healthChecks?: DependencyChecks;
  replicationStatus?: ReplicationStatusProvider;
}

/**
 * Database and Redis, plus the replication worker while replication is on
 */
export const defaultTransactionsHealthChecks = (
  replicationEnabled: boolean = config.replication.enabled
): DependencyChecks => ({
  database: getDatabaseStatus,
  redis: () => ({ connected: isRedisConnected() }),
  ...(replicationEnabled && {
    replicationWorker: () => ({ connected: isReplicationWorkerRunning() }),
  }),
});

export const queueReplicationStatus =
  (replicationEnabled: boolean = config.replication.enabled): ReplicationStatusProvider =>
  async () => {
    if (!replicationEnabled) {
      return { enabled: false, workerRunning: false, queue: null };
    }
    return {
      enabled: true,
      workerRunning: isReplicationWorkerRunning(),
      queue: await getReplicationQueueStats(),
    };
  };

export const createTransactionsRoutes = (replicationStatus: ReplicationStatusProvider): Router => {
  const router = Router();
  router.use('/transaction', transactionRoutes);
  router.use('/transfer', transferRoutes);
  router.use('/replication', createReplicationRoutes(replicationStatus));
  router.use('/environment', environmentRoutes);
  return router;
};

export const createTransactionsApp = (options: TransactionsAppOptions): Application =>
  createServiceApp({
    name: 'Finance Manager Transactions API',
    description: 'Transactions, transfers and catalog replication',
    scopeFactory: options.scopeFactory,
    routes: createTransactionsRoutes(options.replicationStatus ?? queueReplicationStatus()),
    healthChecks: options.healthChecks ?? defaultTransactionsHealthChecks(),
  });
