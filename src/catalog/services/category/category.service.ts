import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError } from '../../../types/errors';
import { RegistryHolderRepository } from '../registry-holder/registry-holder.repository';
import { CategoryErrorsFactory } from './category.errors';
import { CategoryRepository } from './category.repository';
import { Category, CategoryFilter, CreateCategoryDto, UpdateCategoryDto } from './category.types';

export class CategoryService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly categories: CategoryRepository,
    private readonly registryHolders: RegistryHolderRepository,
    private readonly errors: CategoryErrorsFactory,
    private readonly logger: Logger = createServiceLogger('category-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Category>> {
    const category = await this.categories.getById(id, { includeRelated: true, disableTracking: true, signal });
    return category ? ok(category) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: CategoryFilter, signal?: AbortSignal): Promise<Result<Category[]>> {
    return ok(await this.categories.getPaged(filter, { signal }));
  }

  async getByRegistryHolderId(registryHolderId: string, signal?: AbortSignal): Promise<Result<Category[]>> {
    return ok(await this.categories.getByRegistryHolderId(registryHolderId, signal));
  }

  async create(dto: CreateCategoryDto, signal?: AbortSignal): Promise<Result<Category>> {
    const name = dto.name?.trim();
    if (!name) {
      return fail(this.errors.nameIsRequired());
    }
    if (!(await this.registryHolders.any(dto.registryHolderId, signal))) {
      return fail(this.errors.registryHolderNotFound(dto.registryHolderId));
    }

    const parentId = dto.parentId ?? null;
    if (parentId !== null) {
      const parentError = await this.checkParent(parentId, dto.registryHolderId, signal);
      if (parentError) return fail(parentError);
    }

    if (!(await this.categories.isNameUniqueInScope(dto.registryHolderId, name, parentId, undefined, signal))) {
      return fail(this.errors.nameAlreadyExistsInScope(name));
    }

    const category = this.categories.add({
      id: uuid(),
      registryHolderId: dto.registryHolderId,
      name,
      income: dto.income ?? false,
      expense: dto.expense ?? false,
      emoji: dto.emoji ?? '',
      icon: dto.icon ?? '',
      parentId,
      isDeleted: false,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info({ categoryId: category.id, registryHolderId: category.registryHolderId }, 'Category created');
    return ok(category);
  }

  async update(dto: UpdateCategoryDto, signal?: AbortSignal): Promise<Result<Category>> {
    const category = await this.categories.getById(dto.id, { signal });
    if (!category) {
      return fail(this.errors.notFound(dto.id));
    }

    let name = category.name;
    if (dto.name !== undefined) {
      name = dto.name.trim();
      if (!name) return fail(this.errors.nameIsRequired());
    }

    let parentId = category.parentId;
    if (dto.parentId !== undefined && dto.parentId !== category.parentId) {
      if (dto.parentId !== null) {
        const parentError = await this.checkParent(dto.parentId, category.registryHolderId, signal);
        if (parentError) return fail(parentError);
        if (!(await this.categories.isParentChangeValid(category.id, dto.parentId, signal))) {
          return fail(this.errors.recursiveParentRelation(category.id, dto.parentId));
        }
      }
      parentId = dto.parentId;
    }

    if (name !== category.name || parentId !== category.parentId) {
      const unique = await this.categories.isNameUniqueInScope(
        category.registryHolderId,
        name,
        parentId,
        category.id,
        signal
      );
      if (!unique) return fail(this.errors.nameAlreadyExistsInScope(name));
      category.name = name;
      category.parentId = parentId;
    }

    if (dto.income !== undefined) category.income = dto.income;
    if (dto.expense !== undefined) category.expense = dto.expense;
    if (dto.emoji !== undefined) category.emoji = dto.emoji;
    if (dto.icon !== undefined) category.icon = dto.icon;

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ categoryId: category.id }, 'Category updated');
    }
    return ok(category);
  }

  async softDelete(id: string, signal?: AbortSignal): Promise<Result> {
    const category = await this.categories.getById(id, { signal });
    if (!category) {
      return fail(this.errors.notFound(id));
    }
    if (!category.isDeleted) {
      category.isDeleted = true;
      await this.unitOfWork.commit(signal);
      this.logger.info({ categoryId: id }, 'Category soft-deleted');
    }
    return done();
  }

  async restore(id: string, signal?: AbortSignal): Promise<Result> {
    const category = await this.categories.getById(id, { signal });
    if (!category) {
      return fail(this.errors.notFound(id));
    }
    if (category.isDeleted) {
      category.isDeleted = false;
      await this.unitOfWork.commit(signal);
      this.logger.info({ categoryId: id }, 'Category restored');
    }
    return done();
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const category = await this.categories.getById(id, { signal });
    if (!category) {
      return done();
    }
    if (await this.categories.hasChildren(id, signal)) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.categories.delete(category);
    await this.unitOfWork.commit(signal);
    this.logger.info({ categoryId: id }, 'Category deleted');
    return done();
  }

  private async checkParent(
    parentId: string,
    registryHolderId: string,
    signal?: AbortSignal
  ): Promise<DomainError | undefined> {
    const parent = await this.categories.getById(parentId, { disableTracking: true, signal });
    if (!parent) {
      return this.errors.parentNotFound(parentId);
    }
    if (parent.registryHolderId !== registryHolderId) {
      return this.errors.parentRegistryHolderDiffers(parentId);
    }
    return undefined;
  }
}
