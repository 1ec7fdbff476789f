import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { CountryRepository } from '../country/country.repository';
import { BankErrorsFactory } from './bank.errors';
import { BankRepository } from './bank.repository';
import { AccountsCountOptions, Bank, BankFilter, CreateBankDto, UpdateBankDto } from './bank.types';

export class BankService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly banks: BankRepository,
    private readonly countries: CountryRepository,
    private readonly errors: BankErrorsFactory,
    private readonly logger: Logger = createServiceLogger('bank-service')
  ) {}

  async getById(id: string, includeRelated = false, signal?: AbortSignal): Promise<Result<Bank>> {
    const bank = await this.banks.getById(id, { includeRelated, disableTracking: true, signal });
    return bank ? ok(bank) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: BankFilter, signal?: AbortSignal): Promise<Result<Bank[]>> {
    return ok(await this.banks.getPaged(filter, { includeRelated: true, signal }));
  }

  async getAccountsCount(id: string, options: AccountsCountOptions, signal?: AbortSignal): Promise<Result<number>> {
    if (!(await this.banks.any(id, signal))) {
      return fail(this.errors.notFound(id));
    }
    return ok(await this.banks.getAccountsCount(id, options, signal));
  }

  async create(dto: CreateBankDto, signal?: AbortSignal): Promise<Result<Bank>> {
    const name = dto.name?.trim();
    if (!name) {
      return fail(this.errors.nameIsRequired());
    }
    if (!(await this.countries.any(dto.countryId, signal))) {
      return fail(this.errors.countryNotFound(dto.countryId));
    }
    if (!(await this.banks.isNameUnique(name, dto.countryId, undefined, signal))) {
      return fail(this.errors.nameAlreadyExists(name));
    }

    const bank = this.banks.add({ id: uuid(), countryId: dto.countryId, name, createdAt: new Date() });
    await this.unitOfWork.commit(signal);

    this.logger.info({ bankId: bank.id, countryId: bank.countryId }, 'Bank created');
    return ok(bank);
  }

  async update(dto: UpdateBankDto, signal?: AbortSignal): Promise<Result<Bank>> {
    const bank = await this.banks.getById(dto.id, { signal });
    if (!bank) {
      return fail(this.errors.notFound(dto.id));
    }

    let name = bank.name;
    let countryId = bank.countryId;

    if (dto.name !== undefined) {
      name = dto.name.trim();
      if (!name) {
        return fail(this.errors.nameIsRequired());
      }
    }
    if (dto.countryId !== undefined && dto.countryId !== bank.countryId) {
      if (!(await this.countries.any(dto.countryId, signal))) {
        return fail(this.errors.countryNotFound(dto.countryId));
      }
      countryId = dto.countryId;
    }

    if (name !== bank.name || countryId !== bank.countryId) {
      if (!(await this.banks.isNameUnique(name, countryId, bank.id, signal))) {
        return fail(this.errors.nameAlreadyExists(name));
      }
      bank.name = name;
      bank.countryId = countryId;
      await this.unitOfWork.commit(signal);
      this.logger.info({ bankId: bank.id }, 'Bank updated');
    }
    return ok(bank);
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const bank = await this.banks.getById(id, { signal });
    if (!bank) {
      return done();
    }
    if (!(await this.banks.canBeDeleted(id, signal))) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.banks.delete(bank);
    await this.unitOfWork.commit(signal);
    this.logger.info({ bankId: id }, 'Bank deleted');
    return done();
  }
}
