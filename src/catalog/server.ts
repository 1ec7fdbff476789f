import mongoose from 'mongoose';

import { config } from '../config';
import { connectDatabase, disconnectDatabase } from '../config/database';
import { directTransactionRunner, MongooseTransactionRunner } from '../common/persistence/transaction-runner';
import { createServiceLogger, initTracing, shutdownTracing } from '../observability';
import { createCatalogApp } from './app';
import { createCatalogScope, createMongooseCatalogCollections } from './scope';
import { JsonFileSeeder } from './seeding/seeder';

const logger = createServiceLogger('catalog-server');

const startServer = async (): Promise<void> => {
  initTracing('finance-catalog');

  try {
    await connectDatabase(config.mongodb.databases.catalog);

    const collections = createMongooseCatalogCollections();
    const transactionRunner = config.mongodb.useTransactions
      ? new MongooseTransactionRunner(mongoose.connection)
      : directTransactionRunner;

    if (config.seeding.enabled) {
      const seeded = await new JsonFileSeeder(collections).seed();
      logger.info({ seeded }, 'Seeding completed');
    }

    const app = createCatalogApp({
      scopeFactory: () => createCatalogScope(collections, transactionRunner),
    });

    const server = app.listen(config.api.catalogPort, () => {
      logger.info(
        { port: config.api.catalogPort, environment: config.nodeEnv },
        `Catalog API listening, health check: http://localhost:${config.api.catalogPort}/health`
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');
        disconnectDatabase()
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
    logger.fatal({ err: error }, 'Failed to start catalog server');
    process.exit(1);
  }
};

void startServer();
