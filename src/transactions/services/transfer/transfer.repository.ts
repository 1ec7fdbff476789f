import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, inRange } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { ITransfer } from '../../models/Transfer';
import { Transfer, TransferFilter } from './transfer.types';

export const transferMapper: DocumentMapper<Transfer, ITransfer> = {
  toDocument: (transfer) => ({
    _id: transfer.id,
    date: transfer.date,
    fromAccountId: transfer.fromAccountId,
    toAccountId: transfer.toAccountId,
    fromAmount: transfer.fromAmount,
    toAmount: transfer.toAmount,
    description: transfer.description,
    createdAt: transfer.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    date: doc.date,
    fromAccountId: doc.fromAccountId,
    toAccountId: doc.toAccountId,
    fromAmount: doc.fromAmount,
    toAmount: doc.toAmount,
    description: doc.description ?? '',
    createdAt: doc.createdAt,
  }),
};

export class TransferRepository extends BaseRepository<Transfer, ITransfer, TransferFilter> {
  constructor(collection: EntityCollection<Transfer, ITransfer>, unitOfWork: UnitOfWork) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: TransferFilter): FilterQuery<ITransfer> {
    const query: FilterQuery<ITransfer> = {};
    if (filter.fromAccountId) query.fromAccountId = filter.fromAccountId;
    if (filter.toAccountId) query.toAccountId = filter.toAccountId;
    if (filter.descriptionContains) query.description = containsIgnoreCase(filter.descriptionContains);

    const date = inRange(filter.dateFrom, filter.dateTo);
    if (date) query.date = date;
    const fromAmount = inRange(filter.fromAmountFrom, filter.fromAmountTo);
    if (fromAmount) query.fromAmount = fromAmount;
    const toAmount = inRange(filter.toAmountFrom, filter.toAmountTo);
    if (toAmount) query.toAmount = toAmount;
    return query;
  }
}
