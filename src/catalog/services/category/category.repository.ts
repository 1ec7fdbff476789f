import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, equalsIgnoreCase } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { ICategory } from '../../models/Category';
import { IRegistryHolder } from '../../models/RegistryHolder';
import { RegistryHolder } from '../registry-holder/registry-holder.types';
import { Category, CategoryFilter } from './category.types';

export const categoryMapper: DocumentMapper<Category, ICategory> = {
  toDocument: (category) => ({
    _id: category.id,
    registryHolderId: category.registryHolderId,
    name: category.name,
    income: category.income,
    expense: category.expense,
    emoji: category.emoji,
    icon: category.icon,
    parentId: category.parentId,
    isDeleted: category.isDeleted,
    createdAt: category.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    registryHolderId: doc.registryHolderId,
    name: doc.name,
    income: doc.income ?? false,
    expense: doc.expense ?? false,
    emoji: doc.emoji ?? '',
    icon: doc.icon ?? '',
    parentId: doc.parentId ?? null,
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

export class CategoryRepository extends BaseRepository<Category, ICategory, CategoryFilter> {
  constructor(
    collection: EntityCollection<Category, ICategory>,
    unitOfWork: UnitOfWork,
    private readonly registryHolders: EntityCollection<RegistryHolder, IRegistryHolder>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: CategoryFilter): FilterQuery<ICategory> {
    const query: FilterQuery<ICategory> = {};
    if (!filter.includeDeleted) query.isDeleted = false;
    if (filter.registryHolderId) query.registryHolderId = filter.registryHolderId;
    if (filter.nameContains) query.name = containsIgnoreCase(filter.nameContains);
    if (filter.income !== undefined) query.income = filter.income;
    if (filter.expense !== undefined) query.expense = filter.expense;
    if (filter.parentId) query.parentId = filter.parentId;
    return query;
  }

  protected async loadRelated(categories: Category[], signal?: AbortSignal): Promise<void> {
    for (const category of categories) {
      category.registryHolder = (await this.registryHolders.findById(category.registryHolderId, signal)) ?? undefined;
      if (category.parentId) {
        category.parent = (await this.collection.findById(category.parentId, signal)) ?? undefined;
      }
    }
  }

  async getByRegistryHolderId(registryHolderId: string, signal?: AbortSignal): Promise<Category[]> {
    return this.collection.find({ registryHolderId, isDeleted: false }, { signal });
  }

  /**
   * Names are unique among the siblings of one holder, ignoring case
   */
  async isNameUniqueInScope(
    registryHolderId: string,
    name: string,
    parentId: string | null,
    excludeId?: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    const query: FilterQuery<ICategory> = {
      registryHolderId,
      parentId,
      name: equalsIgnoreCase(name),
    };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  /**
   * False when `parentId` is the category itself or when the ancestor chain
   * starting at `parentId` reaches the category or runs in a loop
   */
  async isParentChangeValid(id: string, parentId: string, signal?: AbortSignal): Promise<boolean> {
    const visited = new Set<string>();
    let current: string | null = parentId;

    while (current !== null) {
      if (current === id || visited.has(current)) {
        return false;
      }
      visited.add(current);
      const ancestor: Category | null = await this.collection.findById(current, signal);
      current = ancestor?.parentId ?? null;
    }
    return true;
  }

  async hasChildren(id: string, signal?: AbortSignal): Promise<boolean> {
    return this.collection.exists({ parentId: id }, signal);
  }
}
