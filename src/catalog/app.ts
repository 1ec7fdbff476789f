import { Application, Router } from 'express';

import { createServiceApp } from '../app';
import { getDatabaseStatus } from '../config/database';
import { ScopeFactory } from '../middlewares/requestScope';
import { DependencyChecks } from '../routes/health';
import environmentRoutes from '../routes/environment';
import { CatalogScope } from './scope';
import { accountRoutes } from './services/account';
import { accountTypeRoutes } from './services/account-type';
import { bankRoutes } from './services/bank';
import { categoryRoutes } from './services/category';
import { countryRoutes } from './services/country';
import { currencyRoutes } from './services/currency';
import { exchangeRateRoutes } from './services/exchange-rate';
import { registryHolderRoutes } from './services/registry-holder';

export interface CatalogAppOptions {
  scopeFactory: ScopeFactory<CatalogScope>;
  healthChecks?: DependencyChecks;
}

export const createCatalogRoutes = (): Router => {
  const router = Router();
  router.use('/registry-holder', registryHolderRoutes);
  router.use('/country', countryRoutes);
  router.use('/bank', bankRoutes);
  router.use('/currency', currencyRoutes);
  router.use('/account-type', accountTypeRoutes);
  router.use('/category', categoryRoutes);
  router.use('/account', accountRoutes);
  router.use('/exchange-rate', exchangeRateRoutes);
  router.use('/environment', environmentRoutes);
  return router;
};

export const createCatalogApp = (options: CatalogAppOptions): Application =>
  createServiceApp({
    name: 'Finance Manager Catalog API',
    description: 'Accounts, banks, currencies, categories and exchange rates',
    scopeFactory: options.scopeFactory,
    routes: createCatalogRoutes(),
    healthChecks: options.healthChecks ?? { database: getDatabaseStatus },
  });
