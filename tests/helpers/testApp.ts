import { Application } from 'express';

import { createCatalogApp } from '../../src/catalog/app';
import { CatalogCollections } from '../../src/catalog/scope';
import { DependencyChecks } from '../../src/routes/health';
import { createTransactionsApp } from '../../src/transactions/app';
import { TransactionsCollections } from '../../src/transactions/scope';
import { CatalogClient, ReplicationStatusProvider } from '../../src/transactions/services/replication';
import { catalogScope } from './catalogScope';
import { transactionsScope } from './transactionsScope';

export const healthyDependencies: DependencyChecks = {
  database: () => ({ connected: true, readyState: 1 }),
};

export const getCatalogTestApp = (
  collections: CatalogCollections,
  healthChecks: DependencyChecks = healthyDependencies
): Application =>
  createCatalogApp({
    scopeFactory: () => catalogScope(collections),
    healthChecks,
  });

export const getTransactionsTestApp = (
  collections: TransactionsCollections,
  catalog: CatalogClient,
  healthChecks: DependencyChecks = healthyDependencies,
  replicationStatus?: ReplicationStatusProvider
): Application =>
  createTransactionsApp({
    scopeFactory: () => transactionsScope(collections, catalog),
    healthChecks,
    replicationStatus,
  });
