export { TransactionService } from './transaction.service';
export type { TransactionReferences } from './transaction.service';
export { TransactionRepository, transactionMapper } from './transaction.repository';
export { TransactionErrorsFactory } from './transaction.errors';
export { transactionController } from './transaction.controller';
export { default as transactionRoutes } from './transaction.routes';
export * from './transaction.types';
