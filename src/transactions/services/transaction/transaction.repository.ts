import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, inRange } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { ITransaction } from '../../models/Transaction';
import { Transaction, TransactionFilter } from './transaction.types';

export const transactionMapper: DocumentMapper<Transaction, ITransaction> = {
  toDocument: (transaction) => ({
    _id: transaction.id,
    date: transaction.date,
    accountId: transaction.accountId,
    categoryId: transaction.categoryId,
    amount: transaction.amount,
    description: transaction.description,
    createdAt: transaction.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    date: doc.date,
    accountId: doc.accountId,
    categoryId: doc.categoryId,
    amount: doc.amount,
    description: doc.description ?? '',
    createdAt: doc.createdAt,
  }),
};

export class TransactionRepository extends BaseRepository<Transaction, ITransaction, TransactionFilter> {
  constructor(collection: EntityCollection<Transaction, ITransaction>, unitOfWork: UnitOfWork) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: TransactionFilter): FilterQuery<ITransaction> {
    const query: FilterQuery<ITransaction> = {};
    if (filter.accountId) query.accountId = filter.accountId;
    if (filter.categoryId) query.categoryId = filter.categoryId;
    if (filter.descriptionContains) query.description = containsIgnoreCase(filter.descriptionContains);

    const date = inRange(filter.dateFrom, filter.dateTo);
    if (date) query.date = date;
    const amount = inRange(filter.amountFrom, filter.amountTo);
    if (amount) query.amount = amount;
    return query;
  }
}
