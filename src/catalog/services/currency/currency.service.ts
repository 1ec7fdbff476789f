import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { CurrencyErrorsFactory } from './currency.errors';
import { CurrencyRepository } from './currency.repository';
import { CreateCurrencyDto, Currency, CurrencyFilter, UpdateCurrencyDto } from './currency.types';

export class CurrencyService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly currencies: CurrencyRepository,
    private readonly errors: CurrencyErrorsFactory,
    private readonly logger: Logger = createServiceLogger('currency-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Currency>> {
    const currency = await this.currencies.getById(id, { disableTracking: true, signal });
    return currency ? ok(currency) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: CurrencyFilter, signal?: AbortSignal): Promise<Result<Currency[]>> {
    return ok(await this.currencies.getPaged(filter, { signal }));
  }

  async getAll(signal?: AbortSignal): Promise<Result<Currency[]>> {
    return ok(await this.currencies.getAll({ signal }));
  }

  async create(dto: CreateCurrencyDto, signal?: AbortSignal): Promise<Result<Currency>> {
    const name = dto.name?.trim();
    const charCode = dto.charCode?.trim();
    const numCode = dto.numCode?.trim();

    if (!name) return fail(this.errors.nameIsRequired());
    if (!charCode) return fail(this.errors.charCodeIsRequired());
    if (!numCode) return fail(this.errors.numCodeIsRequired());

    if (!(await this.currencies.isCharCodeUnique(charCode, undefined, signal))) {
      return fail(this.errors.charCodeAlreadyExists(charCode));
    }
    if (!(await this.currencies.isNumCodeUnique(numCode, undefined, signal))) {
      return fail(this.errors.numCodeAlreadyExists(numCode));
    }

    const currency = this.currencies.add({
      id: uuid(),
      name,
      charCode,
      numCode,
      sign: dto.sign ?? '',
      emoji: dto.emoji ?? '',
      isDeleted: false,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info({ currencyId: currency.id, charCode }, 'Currency created');
    return ok(currency);
  }

  async update(dto: UpdateCurrencyDto, signal?: AbortSignal): Promise<Result<Currency>> {
    const currency = await this.currencies.getById(dto.id, { signal });
    if (!currency) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.name !== undefined && dto.name !== currency.name) {
      const name = dto.name.trim();
      if (!name) return fail(this.errors.nameIsRequired());
      currency.name = name;
    }

    if (dto.charCode !== undefined && dto.charCode !== currency.charCode) {
      const charCode = dto.charCode.trim();
      if (!charCode) return fail(this.errors.charCodeIsRequired());
      if (!(await this.currencies.isCharCodeUnique(charCode, currency.id, signal))) {
        return fail(this.errors.charCodeAlreadyExists(charCode));
      }
      currency.charCode = charCode;
    }

    if (dto.numCode !== undefined && dto.numCode !== currency.numCode) {
      const numCode = dto.numCode.trim();
      if (!numCode) return fail(this.errors.numCodeIsRequired());
      if (!(await this.currencies.isNumCodeUnique(numCode, currency.id, signal))) {
        return fail(this.errors.numCodeAlreadyExists(numCode));
      }
      currency.numCode = numCode;
    }

    if (dto.sign !== undefined) currency.sign = dto.sign;
    if (dto.emoji !== undefined) currency.emoji = dto.emoji;

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ currencyId: currency.id }, 'Currency updated');
    }
    return ok(currency);
  }

  async softDelete(id: string, signal?: AbortSignal): Promise<Result> {
    const currency = await this.currencies.getById(id, { signal });
    if (!currency) {
      return fail(this.errors.notFound(id));
    }
    if (currency.isDeleted) {
      return done();
    }

    currency.isDeleted = true;
    await this.unitOfWork.commit(signal);
    this.logger.info({ currencyId: id }, 'Currency soft-deleted');
    return done();
  }

  async restore(id: string, signal?: AbortSignal): Promise<Result> {
    const currency = await this.currencies.getById(id, { signal });
    if (!currency) {
      return fail(this.errors.notFound(id));
    }
    if (!currency.isDeleted) {
      return done();
    }

    currency.isDeleted = false;
    await this.unitOfWork.commit(signal);
    this.logger.info({ currencyId: id }, 'Currency restored');
    return done();
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const currency = await this.currencies.getById(id, { signal });
    if (!currency) {
      return done();
    }
    if (!(await this.currencies.canBeDeleted(id, signal))) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.currencies.delete(currency);
    await this.unitOfWork.commit(signal);
    this.logger.info({ currencyId: id }, 'Currency deleted');
    return done();
  }
}
