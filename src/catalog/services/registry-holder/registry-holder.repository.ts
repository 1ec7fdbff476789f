import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IAccount } from '../../models/Account';
import { ICategory } from '../../models/Category';
import { IRegistryHolder } from '../../models/RegistryHolder';
import { Account } from '../account/account.types';
import { Category } from '../category/category.types';
import { RegistryHolder, RegistryHolderFilter } from './registry-holder.types';

export const registryHolderMapper: DocumentMapper<RegistryHolder, IRegistryHolder> = {
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

export class RegistryHolderRepository extends BaseRepository<RegistryHolder, IRegistryHolder, RegistryHolderFilter> {
  constructor(
    collection: EntityCollection<RegistryHolder, IRegistryHolder>,
    unitOfWork: UnitOfWork,
    private readonly accounts: EntityCollection<Account, IAccount>,
    private readonly categories: EntityCollection<Category, ICategory>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: RegistryHolderFilter): FilterQuery<IRegistryHolder> {
    const query: FilterQuery<IRegistryHolder> = {};
    if (filter.telegramId !== undefined) query.telegramId = filter.telegramId;
    if (filter.role !== undefined) query.role = filter.role;
    return query;
  }

  async isTelegramIdUnique(telegramId: number, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<IRegistryHolder> = { telegramId };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  /**
   * A holder can be removed only while it owns no accounts and no categories
   */
  async canBeDeleted(id: string, signal?: AbortSignal): Promise<boolean> {
    const [hasAccounts, hasCategories] = await Promise.all([
      this.accounts.exists({ registryHolderId: id }, signal),
      this.categories.exists({ registryHolderId: id }, signal),
    ]);
    return !hasAccounts && !hasCategories;
  }
}
