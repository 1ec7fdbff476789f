export { TransactionHolderModel, ITransactionHolder } from './TransactionHolder';
export { TransactionsAccountTypeModel, ITransactionsAccountType } from './TransactionsAccountType';
export { TransactionsCurrencyModel, ITransactionsCurrency } from './TransactionsCurrency';
export { TransactionsAccountModel, ITransactionsAccount } from './TransactionsAccount';
export { TransactionsCategoryModel, ITransactionsCategory } from './TransactionsCategory';
export { TransactionModel, ITransaction } from './Transaction';
export { TransferModel, ITransfer } from './Transfer';
