import { EntityCollection } from '../common/persistence/collection';
import { MongooseCollection } from '../common/persistence/mongoose.collection';
import { TransactionRunner } from '../common/persistence/transaction-runner';
import { UnitOfWork } from '../common/persistence/unit-of-work';
import { ScopedRequest } from '../middlewares/requestScope';
import {
  ITransaction,
  ITransactionHolder,
  ITransactionsAccount,
  ITransactionsAccountType,
  ITransactionsCategory,
  ITransactionsCurrency,
  ITransfer,
  TransactionHolderModel,
  TransactionModel,
  TransactionsAccountModel,
  TransactionsAccountTypeModel,
  TransactionsCategoryModel,
  TransactionsCurrencyModel,
  TransferModel,
} from './models';
import {
  ReferenceRepository,
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
} from './services/reference';
import { CatalogClient, ReplicationErrorsFactory, ReplicationService } from './services/replication';
import {
  Transaction,
  TransactionErrorsFactory,
  TransactionRepository,
  TransactionService,
  transactionMapper,
} from './services/transaction';
import { Transfer, TransferErrorsFactory, TransferRepository, TransferService, transferMapper } from './services/transfer';

/**
 * Storage of the transactions service: own data plus the replicated catalog copies
 */
export interface TransactionsCollections {
  holders: EntityCollection<TransactionHolder, ITransactionHolder>;
  accountTypes: EntityCollection<TransactionsAccountType, ITransactionsAccountType>;
  currencies: EntityCollection<TransactionsCurrency, ITransactionsCurrency>;
  accounts: EntityCollection<TransactionsAccount, ITransactionsAccount>;
  categories: EntityCollection<TransactionsCategory, ITransactionsCategory>;
  transactions: EntityCollection<Transaction, ITransaction>;
  transfers: EntityCollection<Transfer, ITransfer>;
}

export const createMongooseTransactionsCollections = (): TransactionsCollections => ({
  holders: new MongooseCollection(TransactionHolderModel, transactionHolderMapper),
  accountTypes: new MongooseCollection(TransactionsAccountTypeModel, transactionsAccountTypeMapper),
  currencies: new MongooseCollection(TransactionsCurrencyModel, transactionsCurrencyMapper),
  accounts: new MongooseCollection(TransactionsAccountModel, transactionsAccountMapper),
  categories: new MongooseCollection(TransactionsCategoryModel, transactionsCategoryMapper),
  transactions: new MongooseCollection(TransactionModel, transactionMapper),
  transfers: new MongooseCollection(TransferModel, transferMapper),
});

const errors = {
  transaction: new TransactionErrorsFactory(),
  transfer: new TransferErrorsFactory(),
  replication: new ReplicationErrorsFactory(),
};

export interface TransactionsScope {
  unitOfWork: UnitOfWork;
  transactionService: TransactionService;
  transferService: TransferService;
  replicationService: ReplicationService;
}

export type TransactionsRequest = ScopedRequest<TransactionsScope>;

export const createTransactionsScope = (
  collections: TransactionsCollections,
  transactionRunner: TransactionRunner,
  catalog: CatalogClient
): TransactionsScope => {
  const unitOfWork = new UnitOfWork(transactionRunner);
  const c = collections;

  const replicas = {
    holders: new ReferenceRepository(c.holders, unitOfWork),
    accountTypes: new ReferenceRepository(c.accountTypes, unitOfWork),
    currencies: new ReferenceRepository(c.currencies, unitOfWork),
    accounts: new ReferenceRepository(c.accounts, unitOfWork),
    categories: new ReferenceRepository(c.categories, unitOfWork),
  };

  return {
    unitOfWork,
    transactionService: new TransactionService(
      unitOfWork,
      new TransactionRepository(c.transactions, unitOfWork),
      { accounts: replicas.accounts, categories: replicas.categories },
      errors.transaction
    ),
    transferService: new TransferService(
      unitOfWork,
      new TransferRepository(c.transfers, unitOfWork),
      replicas.accounts,
      errors.transfer
    ),
    replicationService: new ReplicationService(unitOfWork, replicas, catalog, errors.replication),
  };
};
