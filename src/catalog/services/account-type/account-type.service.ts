import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { AccountTypeErrorsFactory } from './account-type.errors';
import { AccountTypeRepository } from './account-type.repository';
import { AccountType, AccountTypeFilter, CreateAccountTypeDto, UpdateAccountTypeDto } from './account-type.types';

export class AccountTypeService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly accountTypes: AccountTypeRepository,
    private readonly errors: AccountTypeErrorsFactory,
    private readonly logger: Logger = createServiceLogger('account-type-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<AccountType>> {
    const accountType = await this.accountTypes.getById(id, { disableTracking: true, signal });
    return accountType ? ok(accountType) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: AccountTypeFilter, signal?: AbortSignal): Promise<Result<AccountType[]>> {
    return ok(await this.accountTypes.getPaged(filter, { signal }));
  }

  async getAll(signal?: AbortSignal): Promise<Result<AccountType[]>> {
    return ok(await this.accountTypes.getAll({ signal }));
  }

  async existsByCode(code: string, signal?: AbortSignal): Promise<Result<boolean>> {
    return ok(await this.accountTypes.existsByCode(code, signal));
  }

  async create(dto: CreateAccountTypeDto, signal?: AbortSignal): Promise<Result<AccountType>> {
    const code = dto.code?.trim();
    if (!code) {
      return fail(this.errors.codeIsRequired());
    }
    if (!(await this.accountTypes.isCodeUnique(code, undefined, signal))) {
      return fail(this.errors.codeAlreadyExists(code));
    }

    const accountType = this.accountTypes.add({
      id: uuid(),
      code,
      description: dto.description ?? '',
      isDeleted: false,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info({ accountTypeId: accountType.id, code }, 'Account type created');
    return ok(accountType);
  }

  async update(dto: UpdateAccountTypeDto, signal?: AbortSignal): Promise<Result<AccountType>> {
    const accountType = await this.accountTypes.getById(dto.id, { signal });
    if (!accountType) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.code !== undefined && dto.code !== accountType.code) {
      const code = dto.code.trim();
      if (!code) return fail(this.errors.codeIsRequired());
      if (!(await this.accountTypes.isCodeUnique(code, accountType.id, signal))) {
        return fail(this.errors.codeAlreadyExists(code));
      }
      accountType.code = code;
    }
    if (dto.description !== undefined) {
      accountType.description = dto.description;
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ accountTypeId: accountType.id }, 'Account type updated');
    }
    return ok(accountType);
  }

  async softDelete(id: string, signal?: AbortSignal): Promise<Result> {
    const accountType = await this.accountTypes.getById(id, { signal });
    if (!accountType) {
      return fail(this.errors.notFound(id));
    }
    if (!accountType.isDeleted) {
      accountType.isDeleted = true;
      await this.unitOfWork.commit(signal);
      this.logger.info({ accountTypeId: id }, 'Account type soft-deleted');
    }
    return done();
  }

  async restore(id: string, signal?: AbortSignal): Promise<Result> {
    const accountType = await this.accountTypes.getById(id, { signal });
    if (!accountType) {
      return fail(this.errors.notFound(id));
    }
    if (accountType.isDeleted) {
      accountType.isDeleted = false;
      await this.unitOfWork.commit(signal);
      this.logger.info({ accountTypeId: id }, 'Account type restored');
    }
    return done();
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const accountType = await this.accountTypes.getById(id, { signal });
    if (!accountType) {
      return done();
    }
    if (!(await this.accountTypes.canBeDeleted(id, signal))) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.accountTypes.delete(accountType);
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountTypeId: id }, 'Account type deleted');
    return done();
  }
}
