import { ExternalApiError } from '../../src/common/exceptions';
import { directTransactionRunner } from '../../src/common/persistence/transaction-runner';
import { createTransactionsScope, TransactionsCollections, TransactionsScope } from '../../src/transactions/scope';
import {
  TransactionHolder,
  TransactionsAccount,
  TransactionsAccountType,
  TransactionsCategory,
  TransactionsCurrency,
  transactionHolderMapper,
  transactionsAccountMapper,
  transactionsAccountTypeMapper,
  transactionsCategoryMapper,
  transactionsCurrencyMapper,
} from '../../src/transactions/services/reference';
import { CatalogClient, ReplicationKind } from '../../src/transactions/services/replication';
import { transactionMapper } from '../../src/transactions/services/transaction';
import { transferMapper } from '../../src/transactions/services/transfer';
import { InMemoryCollection } from './inMemoryCollection';

export const createInMemoryTransactionsCollections = () => ({
  holders: new InMemoryCollection('TransactionHolder', transactionHolderMapper),
  accountTypes: new InMemoryCollection('TransactionsAccountType', transactionsAccountTypeMapper),
  currencies: new InMemoryCollection('TransactionsCurrency', transactionsCurrencyMapper),
  accounts: new InMemoryCollection('TransactionsAccount', transactionsAccountMapper),
  categories: new InMemoryCollection('TransactionsCategory', transactionsCategoryMapper),
  transactions: new InMemoryCollection('Transaction', transactionMapper),
  transfers: new InMemoryCollection('Transfer', transferMapper),
});

export type InMemoryTransactionsCollections = ReturnType<typeof createInMemoryTransactionsCollections>;

const byId = <T extends { id: string }>(records: T[], id: string): T | null =>
  records.find((record) => record.id === id) ?? null;

/**
 * Catalog client serving records from memory. Kinds listed in `failing`
 * throw ExternalApiError the way an unreachable catalog would.
 */
export class FakeCatalogClient implements CatalogClient {
  holders: TransactionHolder[] = [];
  accountTypes: TransactionsAccountType[] = [];
  currencies: TransactionsCurrency[] = [];
  accounts: TransactionsAccount[] = [];
  categories: TransactionsCategory[] = [];
  readonly failing = new Set<ReplicationKind>();
  readonly calls: ReplicationKind[] = [];

  async getAllHolders(): Promise<TransactionHolder[]> {
    return this.serve('holders', this.holders);
  }

  async getHolderById(id: string): Promise<TransactionHolder | null> {
    return byId(this.holders, id);
  }

  async getAllAccountTypes(): Promise<TransactionsAccountType[]> {
    return this.serve('accountTypes', this.accountTypes);
  }

  async getAccountTypeById(id: string): Promise<TransactionsAccountType | null> {
    return byId(this.accountTypes, id);
  }

  async getAllCurrencies(): Promise<TransactionsCurrency[]> {
    return this.serve('currencies', this.currencies);
  }

  async getCurrencyById(id: string): Promise<TransactionsCurrency | null> {
    return byId(this.currencies, id);
  }

  async getAllAccounts(): Promise<TransactionsAccount[]> {
    return this.serve('accounts', this.accounts);
  }

  async getAccountById(id: string): Promise<TransactionsAccount | null> {
    return byId(this.accounts, id);
  }

  async getAllCategories(): Promise<TransactionsCategory[]> {
    return this.serve('categories', this.categories);
  }

  async getCategoryById(id: string): Promise<TransactionsCategory | null> {
    return byId(this.categories, id);
  }

  private serve<T>(kind: ReplicationKind, records: T[]): T[] {
    this.calls.push(kind);
    if (this.failing.has(kind)) {
      throw new ExternalApiError('connect ECONNREFUSED 127.0.0.1:5000');
    }
    return records.map((record) => ({ ...record }));
  }
}

export const transactionsScope = (
  collections: TransactionsCollections,
  catalog: CatalogClient = new FakeCatalogClient()
): TransactionsScope => createTransactionsScope(collections, directTransactionRunner, catalog);
