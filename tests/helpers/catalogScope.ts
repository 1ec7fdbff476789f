import { directTransactionRunner } from '../../src/common/persistence/transaction-runner';
import { CatalogCollections, CatalogScope, createCatalogScope } from '../../src/catalog/scope';
import { accountMapper } from '../../src/catalog/services/account';
import { accountTypeMapper } from '../../src/catalog/services/account-type';
import { bankMapper } from '../../src/catalog/services/bank';
import { categoryMapper } from '../../src/catalog/services/category';
import { countryMapper } from '../../src/catalog/services/country';
import { currencyMapper } from '../../src/catalog/services/currency';
import { exchangeRateMapper } from '../../src/catalog/services/exchange-rate';
import { registryHolderMapper } from '../../src/catalog/services/registry-holder';
import { InMemoryCollection } from './inMemoryCollection';

export const createInMemoryCatalogCollections = () => ({
  registryHolders: new InMemoryCollection('RegistryHolder', registryHolderMapper),
  countries: new InMemoryCollection('Country', countryMapper),
  banks: new InMemoryCollection('Bank', bankMapper),
  currencies: new InMemoryCollection('Currency', currencyMapper),
  accountTypes: new InMemoryCollection('AccountType', accountTypeMapper),
  categories: new InMemoryCollection('Category', categoryMapper),
  accounts: new InMemoryCollection('Account', accountMapper),
  exchangeRates: new InMemoryCollection('ExchangeRate', exchangeRateMapper),
});

export type InMemoryCatalogCollections = ReturnType<typeof createInMemoryCatalogCollections>;

/**
 * Fresh scope over shared collections, as one request would get
 */
export const catalogScope = (collections: CatalogCollections): CatalogScope =>
  createCatalogScope(collections, directTransactionRunner);
