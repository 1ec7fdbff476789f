import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { Role } from '../../../types/role';
import { RegistryHolderErrorsFactory } from './registry-holder.errors';
import { RegistryHolderRepository } from './registry-holder.repository';
import {
  CreateRegistryHolderDto,
  RegistryHolder,
  RegistryHolderFilter,
  UpdateRegistryHolderDto,
} from './registry-holder.types';

export class RegistryHolderService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly registryHolders: RegistryHolderRepository,
    private readonly errors: RegistryHolderErrorsFactory,
    private readonly logger: Logger = createServiceLogger('registry-holder-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<RegistryHolder>> {
    const holder = await this.registryHolders.getById(id, { disableTracking: true, signal });
    if (!holder) {
      return fail(this.errors.notFound(id));
    }
    return ok(holder);
  }

  async getPaged(filter: RegistryHolderFilter, signal?: AbortSignal): Promise<Result<RegistryHolder[]>> {
    const holders = await this.registryHolders.getPaged(filter, { signal });
    this.logger.debug({ filter, count: holders.length }, 'Registry holders listed');
    return ok(holders);
  }

  async create(dto: CreateRegistryHolderDto, signal?: AbortSignal): Promise<Result<RegistryHolder>> {
    if (!dto.telegramId) {
      return fail(this.errors.telegramIdIsRequired());
    }
    if (!(await this.registryHolders.isTelegramIdUnique(dto.telegramId, undefined, signal))) {
      return fail(this.errors.telegramIdAlreadyExists(dto.telegramId));
    }

    const holder = this.registryHolders.add({
      id: uuid(),
      telegramId: dto.telegramId,
      role: dto.role ?? Role.User,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info({ registryHolderId: holder.id, telegramId: holder.telegramId }, 'Registry holder created');
    return ok(holder);
  }

  async update(dto: UpdateRegistryHolderDto, signal?: AbortSignal): Promise<Result<RegistryHolder>> {
    const holder = await this.registryHolders.getById(dto.id, { signal });
    if (!holder) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.telegramId !== undefined && dto.telegramId !== holder.telegramId) {
      if (dto.telegramId <= 0) {
        return fail(this.errors.telegramIdIsRequired());
      }
      if (!(await this.registryHolders.isTelegramIdUnique(dto.telegramId, dto.id, signal))) {
        return fail(this.errors.telegramIdAlreadyExists(dto.telegramId));
      }
      holder.telegramId = dto.telegramId;
    }

    if (dto.role !== undefined && dto.role !== holder.role) {
      holder.role = dto.role;
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ registryHolderId: holder.id }, 'Registry holder updated');
    }
    return ok(holder);
  }

  /**
   * Delete a holder. A missing holder is not an error.
   */
  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const holder = await this.registryHolders.getById(id, { signal });
    if (!holder) {
      return done();
    }
    if (!(await this.registryHolders.canBeDeleted(id, signal))) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.registryHolders.delete(holder);
    await this.unitOfWork.commit(signal);

    this.logger.info({ registryHolderId: id }, 'Registry holder deleted');
    return done();
  }
}
