import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError } from '../../../types/errors';
import { AccountTypeRepository } from '../account-type/account-type.repository';
import { BankRepository } from '../bank/bank.repository';
import { CurrencyRepository } from '../currency/currency.repository';
import { RegistryHolderRepository } from '../registry-holder/registry-holder.repository';
import { AccountErrorsFactory } from './account.errors';
import { AccountRepository } from './account.repository';
import { Account, AccountFilter, CreateAccountDto, UpdateAccountDto } from './account.types';

export interface AccountReferences {
  registryHolders: RegistryHolderRepository;
  accountTypes: AccountTypeRepository;
  currencies: CurrencyRepository;
  banks: BankRepository;
}

/**
 * Accounts of a registry holder, with the default-account rules:
 * at most one default per holder, and a default is never archived or deleted.
 */
export class AccountService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly accounts: AccountRepository,
    private readonly references: AccountReferences,
    private readonly errors: AccountErrorsFactory,
    private readonly logger: Logger = createServiceLogger('account-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Account>> {
    const account = await this.accounts.getById(id, { includeRelated: true, disableTracking: true, signal });
    return account ? ok(account) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: AccountFilter, signal?: AbortSignal): Promise<Result<Account[]>> {
    return ok(await this.accounts.getPaged(filter, { includeRelated: true, signal }));
  }

  async getDefault(registryHolderId: string, signal?: AbortSignal): Promise<Result<Account>> {
    const account = await this.accounts.getDefaultAccount(registryHolderId, {
      includeRelated: true,
      disableTracking: true,
      signal,
    });
    return account ? ok(account) : fail(this.errors.defaultAccountNotFound(registryHolderId));
  }

  async create(dto: CreateAccountDto, signal?: AbortSignal): Promise<Result<Account>> {
    const name = dto.name?.trim();
    if (!name) {
      return fail(this.errors.nameIsRequired());
    }

    const referenceError =
      (await this.checkRegistryHolder(dto.registryHolderId, signal)) ??
      (await this.checkAccountType(dto.accountTypeId, signal)) ??
      (await this.checkCurrency(dto.currencyId, signal)) ??
      (dto.bankId ? await this.checkBank(dto.bankId, signal) : undefined);
    if (referenceError) {
      return fail(referenceError);
    }

    const isDefault = dto.isDefault ?? false;
    if (isDefault) {
      await this.unsetCurrentDefault(dto.registryHolderId, signal);
    }

    const account = this.accounts.add({
      id: uuid(),
      registryHolderId: dto.registryHolderId,
      accountTypeId: dto.accountTypeId,
      currencyId: dto.currencyId,
      bankId: dto.bankId ?? null,
      name,
      isIncludeInBalance: dto.isIncludeInBalance ?? true,
      isDefault,
      isArchived: false,
      isDeleted: false,
      creditLimit: dto.creditLimit ?? null,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info({ accountId: account.id, registryHolderId: account.registryHolderId, isDefault }, 'Account created');
    return ok(account);
  }

  /**
   * Partial update; only fields that differ from the stored account are applied
   */
  async update(dto: UpdateAccountDto, signal?: AbortSignal): Promise<Result<Account>> {
    const account = await this.accounts.getById(dto.id, { signal });
    if (!account) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.isDefault === false && account.isDefault) {
      return fail(this.errors.unsetDefaultRequiresReplacement(account.id));
    }

    const isDefault = dto.isDefault ?? account.isDefault;
    const isArchived = dto.isArchived ?? account.isArchived;
    if (isDefault && (isArchived || account.isDeleted)) {
      return fail(this.errors.cannotArchiveDefault(account.id));
    }

    if (dto.accountTypeId !== undefined && dto.accountTypeId !== account.accountTypeId) {
      const error = await this.checkAccountType(dto.accountTypeId, signal);
      if (error) return fail(error);
      account.accountTypeId = dto.accountTypeId;
    }
    if (dto.currencyId !== undefined && dto.currencyId !== account.currencyId) {
      const error = await this.checkCurrency(dto.currencyId, signal);
      if (error) return fail(error);
      account.currencyId = dto.currencyId;
    }
    if (dto.bankId !== undefined && dto.bankId !== account.bankId) {
      const error = dto.bankId === null ? undefined : await this.checkBank(dto.bankId, signal);
      if (error) return fail(error);
      account.bankId = dto.bankId;
    }

    if (dto.name !== undefined) {
      const name = dto.name.trim();
      if (!name) return fail(this.errors.nameIsRequired());
      account.name = name;
    }
    if (dto.isIncludeInBalance !== undefined) account.isIncludeInBalance = dto.isIncludeInBalance;
    if (dto.isArchived !== undefined) account.isArchived = dto.isArchived;
    if (dto.creditLimit !== undefined) account.creditLimit = dto.creditLimit;

    if (dto.isDefault === true && !account.isDefault) {
      await this.unsetCurrentDefault(account.registryHolderId, signal);
      account.isDefault = true;
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ accountId: account.id }, 'Account updated');
    }
    return ok(account);
  }

  async softDelete(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (account.isDeleted) {
      return done();
    }
    if (account.isDefault) {
      return fail(this.errors.cannotSoftDeleteDefault(id));
    }

    account.isDeleted = true;
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountId: id }, 'Account soft-deleted');
    return done();
  }

  async restore(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (!account.isDeleted) {
      return done();
    }

    account.isDeleted = false;
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountId: id }, 'Account restored');
    return done();
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return done();
    }
    if (account.isDefault) {
      return fail(this.errors.cannotDeleteDefault(id));
    }

    this.accounts.delete(account);
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountId: id }, 'Account deleted');
    return done();
  }

  async archive(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (account.isDefault) {
      return fail(this.errors.cannotArchiveDefault(id));
    }
    if (account.isArchived) {
      return done();
    }

    account.isArchived = true;
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountId: id }, 'Account archived');
    return done();
  }

  async unarchive(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (!account.isArchived) {
      return done();
    }

    account.isArchived = false;
    await this.unitOfWork.commit(signal);
    this.logger.info({ accountId: id }, 'Account unarchived');
    return done();
  }

  /**
   * Make the account the holder's default; the previous default is cleared in the same commit
   */
  async setAsDefault(id: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (account.isDefault) {
      return done();
    }
    if (account.isArchived || account.isDeleted) {
      return fail(this.errors.cannotBeDefaultIfArchivedOrDeleted(id));
    }

    await this.unsetCurrentDefault(account.registryHolderId, signal);
    account.isDefault = true;
    await this.unitOfWork.commit(signal);

    this.logger.info({ accountId: id, registryHolderId: account.registryHolderId }, 'Default account changed');
    return done();
  }

  /**
   * Move the default flag from the account to a replacement of the same holder
   */
  async unsetAsDefault(id: string, replacementDefaultAccountId: string, signal?: AbortSignal): Promise<Result> {
    const account = await this.accounts.getById(id, { signal });
    if (!account) {
      return fail(this.errors.notFound(id));
    }
    if (!account.isDefault) {
      return done();
    }

    const replacement = await this.accounts.getById(replacementDefaultAccountId, { signal });
    if (!replacement) {
      return fail(this.errors.replacementDefaultNotFound(replacementDefaultAccountId));
    }
    if (replacement.isArchived || replacement.isDeleted) {
      return fail(this.errors.replacementCannotBeDefault(replacementDefaultAccountId));
    }
    if (replacement.registryHolderId !== account.registryHolderId) {
      return fail(this.errors.registryHolderDiffers(id, replacementDefaultAccountId));
    }

    account.isDefault = false;
    replacement.isDefault = true;
    await this.unitOfWork.commit(signal);

    this.logger.info({ accountId: id, replacementDefaultAccountId }, 'Default account replaced');
    return done();
  }

  private async unsetCurrentDefault(registryHolderId: string, signal?: AbortSignal): Promise<void> {
    const previous = await this.accounts.getDefaultAccount(registryHolderId, { signal });
    if (previous) {
      previous.isDefault = false;
      this.logger.debug({ accountId: previous.id, registryHolderId }, 'Previous default account cleared');
    }
  }

  private async checkRegistryHolder(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const exists = await this.references.registryHolders.any(id, signal);
    return exists ? undefined : this.errors.registryHolderNotFound(id);
  }

  private async checkAccountType(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const accountType = await this.references.accountTypes.getById(id, { disableTracking: true, signal });
    if (!accountType) return this.errors.accountTypeNotFound(id);
    if (accountType.isDeleted) return this.errors.accountTypeIsSoftDeleted(id);
    return undefined;
  }

  private async checkCurrency(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const currency = await this.references.currencies.getById(id, { disableTracking: true, signal });
    if (!currency) return this.errors.currencyNotFound(id);
    if (currency.isDeleted) return this.errors.currencyIsSoftDeleted(id);
    return undefined;
  }

  private async checkBank(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const exists = await this.references.banks.any(id, signal);
    return exists ? undefined : this.errors.bankNotFound(id);
  }
}
