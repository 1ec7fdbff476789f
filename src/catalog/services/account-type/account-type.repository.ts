import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, equalsIgnoreCase } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IAccount } from '../../models/Account';
import { IAccountType } from '../../models/AccountType';
import { Account } from '../account/account.types';
import { AccountType, AccountTypeFilter } from './account-type.types';

export const accountTypeMapper: DocumentMapper<AccountType, IAccountType> = {
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

export class AccountTypeRepository extends BaseRepository<AccountType, IAccountType, AccountTypeFilter> {
  constructor(
    collection: EntityCollection<AccountType, IAccountType>,
    unitOfWork: UnitOfWork,
    private readonly accounts: EntityCollection<Account, IAccount>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: AccountTypeFilter): FilterQuery<IAccountType> {
    const query: FilterQuery<IAccountType> = {};
    if (!filter.includeDeleted) query.isDeleted = false;
    if (filter.codeContains) query.code = containsIgnoreCase(filter.codeContains);
    if (filter.descriptionContains) query.description = containsIgnoreCase(filter.descriptionContains);
    return query;
  }

  async isCodeUnique(code: string, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<IAccountType> = { code: equalsIgnoreCase(code) };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  async existsByCode(code: string, signal?: AbortSignal): Promise<boolean> {
    return this.collection.exists({ code: equalsIgnoreCase(code) }, signal);
  }

  async canBeDeleted(id: string, signal?: AbortSignal): Promise<boolean> {
    return !(await this.accounts.exists({ accountTypeId: id }, signal));
  }
}
