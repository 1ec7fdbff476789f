import { FilterQuery } from 'mongoose';

import { PageFilter } from '../../../common/pagination';
import { EntityCollection } from '../../../common/persistence/collection';
import { BaseDocument, DocumentMapper, Entity } from '../../../common/persistence/entity';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import {
  ITransactionHolder,
  ITransactionsAccount,
  ITransactionsAccountType,
  ITransactionsCategory,
  ITransactionsCurrency,
} from '../../models';
import {
  TransactionHolder,
  TransactionsAccount,
  TransactionsAccountType,
  TransactionsCategory,
  TransactionsCurrency,
} from './reference.types';

export const transactionHolderMapper: DocumentMapper<TransactionHolder, ITransactionHolder> = {
  toDocument: (holder) => ({
    _id: holder.id,
    telegramId: holder.telegramId,
    role: holder.role,
    createdAt: holder.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    telegramId: doc.telegramId,
    role: doc.role,
    createdAt: doc.createdAt,
  }),
};

export const transactionsAccountTypeMapper: DocumentMapper<TransactionsAccountType, ITransactionsAccountType> = {
  toDocument: (accountType) => ({
    _id: accountType.id,
    code: accountType.code,
    description: accountType.description,
    isDeleted: accountType.isDeleted,
    createdAt: accountType.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    code: doc.code,
    description: doc.description ?? '',
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

export const transactionsCurrencyMapper: DocumentMapper<TransactionsCurrency, ITransactionsCurrency> = {
  toDocument: (currency) => ({
    _id: currency.id,
    name: currency.name,
    charCode: currency.charCode,
    numCode: currency.numCode,
    sign: currency.sign,
    emoji: currency.emoji,
    isDeleted: currency.isDeleted,
    createdAt: currency.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    name: doc.name,
    charCode: doc.charCode,
    numCode: doc.numCode,
    sign: doc.sign ?? '',
    emoji: doc.emoji ?? '',
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

export const transactionsAccountMapper: DocumentMapper<TransactionsAccount, ITransactionsAccount> = {
  toDocument: (account) => ({
    _id: account.id,
    holderId: account.holderId,
    accountTypeId: account.accountTypeId,
    currencyId: account.currencyId,
    creditLimit: account.creditLimit,
    isArchived: account.isArchived,
    isDeleted: account.isDeleted,
    createdAt: account.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    holderId: doc.holderId,
    accountTypeId: doc.accountTypeId,
    currencyId: doc.currencyId,
    creditLimit: doc.creditLimit ?? null,
    isArchived: doc.isArchived ?? false,
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

export const transactionsCategoryMapper: DocumentMapper<TransactionsCategory, ITransactionsCategory> = {
  toDocument: (category) => ({
    _id: category.id,
    holderId: category.holderId,
    income: category.income,
    expense: category.expense,
    isDeleted: category.isDeleted,
    createdAt: category.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    holderId: doc.holderId,
    income: doc.income ?? false,
    expense: doc.expense ?? false,
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

/**
 * Repository over a replicated collection; lookups by id and full listings only
 */
export class ReferenceRepository<T extends Entity, TDoc extends BaseDocument> extends BaseRepository<
  T,
  TDoc,
  PageFilter
> {
  constructor(collection: EntityCollection<T, TDoc>, unitOfWork: UnitOfWork) {
    super(collection, unitOfWork);
  }

  protected buildFilter(_filter: PageFilter): FilterQuery<TDoc> {
    return {};
  }
}
