import mongoose from 'mongoose';

import { config } from '../config';
import { connectDatabase, disconnectDatabase } from '../config/database';
import { connectRedis, disconnectRedis } from '../config/redis';
import { directTransactionRunner, MongooseTransactionRunner } from '../common/persistence/transaction-runner';
import { createServiceLogger, initTracing, shutdownTracing } from '../observability';
import {
  closeReplicationQueue,
  enqueueReplication,
  scheduleReplication,
  startReplicationWorker,
  stopReplicationWorker,
} from '../queues';
import { createTransactionsApp } from './app';
import { createMongooseTransactionsCollections, createTransactionsScope } from './scope';
import { CatalogApiClient } from './services/replication';

const logger = createServiceLogger('transactions-server');

const startServer = async (): Promise<void> => {
  initTracing('finance-transactions');

  try {
    await connectDatabase(config.mongodb.databases.transactions);

    const collections = createMongooseTransactionsCollections();
    const transactionRunner = config.mongodb.useTransactions
      ? new MongooseTransactionRunner(mongoose.connection)
      : directTransactionRunner;
    const catalog = new CatalogApiClient();
    const createScope = () => createTransactionsScope(collections, transactionRunner, catalog);

    if (config.replication.enabled) {
      await connectRedis();
      startReplicationWorker(async () => {
        const result = await createScope().replicationService.replicateAll();
        // replicateAll reports failures per kind and never fails as a whole
        return result.ok ? result.value : [];
      });
      await scheduleReplication();
      if (config.replication.runOnStartup) {
        await enqueueReplication('startup');
      }
    } else {
      logger.warn('Catalog replication is disabled');
    }

    const app = createTransactionsApp({ scopeFactory: createScope });

    const server = app.listen(config.api.transactionsPort, () => {
      logger.info(
        { port: config.api.transactionsPort, environment: config.nodeEnv },
        `Transactions API listening, health check: http://localhost:${config.api.transactionsPort}/health`
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');
        stopReplicationWorker()
          .then(closeReplicationQueue)
          .then(disconnectRedis)
          .then(disconnectDatabase)
          .then(shutdownTracing)
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start transactions server');
    process.exit(1);
  }
};

void startServer();
