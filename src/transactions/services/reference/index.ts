export * from './reference.types';
export {
  ReferenceRepository,
  transactionHolderMapper,
  transactionsAccountMapper,
  transactionsAccountTypeMapper,
  transactionsCategoryMapper,
  transactionsCurrencyMapper,
} from './reference.repository';
