import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { formatIsoDate, parseUtcDate } from '../../../common/dates';
import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { CurrencyRepository } from '../currency/currency.repository';
import { ExchangeRateErrorsFactory } from './exchange-rate.errors';
import { ExchangeRateRepository } from './exchange-rate.repository';
import {
  CreateExchangeRateDto,
  DeleteByPeriodDto,
  ExchangeRate,
  ExchangeRateFilter,
  UpdateExchangeRateDto,
} from './exchange-rate.types';

const pairKey = (currencyId: string, rateDate: Date): string => `${currencyId}:${formatIsoDate(rateDate)}`;

export class ExchangeRateService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly exchangeRates: ExchangeRateRepository,
    private readonly currencies: CurrencyRepository,
    private readonly errors: ExchangeRateErrorsFactory,
    private readonly logger: Logger = createServiceLogger('exchange-rate-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<ExchangeRate>> {
    const rate = await this.exchangeRates.getById(id, { disableTracking: true, signal });
    return rate ? ok(rate) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: ExchangeRateFilter, signal?: AbortSignal): Promise<Result<ExchangeRate[]>> {
    return ok(await this.exchangeRates.getPaged(filter, { signal }));
  }

  async create(dto: CreateExchangeRateDto, signal?: AbortSignal): Promise<Result<ExchangeRate>> {
    if (!dto.currencyId) {
      return fail(this.errors.currencyIsRequired());
    }
    const rateDate = parseUtcDate(dto.rateDate);
    if (!rateDate) {
      return fail(this.errors.rateDateIsRequired());
    }
    if (!dto.rate) {
      return fail(this.errors.rateValueIsRequired());
    }
    if (!(await this.currencies.any(dto.currencyId, signal))) {
      return fail(this.errors.currencyNotFound(dto.currencyId));
    }
    if (await this.exchangeRates.existsForCurrencyAndDate(dto.currencyId, rateDate, signal)) {
      return fail(this.errors.alreadyExists(dto.currencyId, rateDate));
    }

    const rate = this.exchangeRates.add({
      id: uuid(),
      currencyId: dto.currencyId,
      rateDate,
      rate: dto.rate,
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info(
      { exchangeRateId: rate.id, currencyId: rate.currencyId, rateDate: formatIsoDate(rateDate) },
      'Exchange rate created'
    );
    return ok(rate);
  }

  /**
   * Bulk insert. Items that fail validation, reference an unknown currency,
   * or repeat an existing or earlier (currency, date) pair are skipped.
   */
  async addRange(items: CreateExchangeRateDto[], signal?: AbortSignal): Promise<Result<number>> {
    const seen = new Set<string>();
    const knownCurrencies = new Map<string, boolean>();
    let added = 0;

    for (const item of items) {
      const rateDate = parseUtcDate(item.rateDate);
      if (!item.currencyId || !rateDate || !item.rate) continue;

      const key = pairKey(item.currencyId, rateDate);
      if (seen.has(key)) continue;
      seen.add(key);

      let currencyExists = knownCurrencies.get(item.currencyId);
      if (currencyExists === undefined) {
        currencyExists = await this.currencies.any(item.currencyId, signal);
        knownCurrencies.set(item.currencyId, currencyExists);
      }
      if (!currencyExists) continue;
      if (await this.exchangeRates.existsForCurrencyAndDate(item.currencyId, rateDate, signal)) continue;

      this.exchangeRates.add({
        id: uuid(),
        currencyId: item.currencyId,
        rateDate,
        rate: item.rate,
        createdAt: new Date(),
      });
      added++;
    }

    if (added > 0) {
      await this.unitOfWork.commit(signal);
    }
    this.logger.info({ received: items.length, added, skipped: items.length - added }, 'Exchange rates added');
    return ok(added);
  }

  async update(dto: UpdateExchangeRateDto, signal?: AbortSignal): Promise<Result<ExchangeRate>> {
    const rate = await this.exchangeRates.getById(dto.id, { signal });
    if (!rate) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.rateDate !== undefined) {
      const rateDate = parseUtcDate(dto.rateDate);
      if (!rateDate) {
        return fail(this.errors.rateDateIsRequired());
      }
      if (rateDate.getTime() !== rate.rateDate.getTime()) {
        if (await this.exchangeRates.existsForCurrencyAndDate(rate.currencyId, rateDate, signal)) {
          return fail(this.errors.alreadyExists(rate.currencyId, rateDate));
        }
        rate.rateDate = rateDate;
      }
    }

    if (dto.rate !== undefined) {
      if (!dto.rate) {
        return fail(this.errors.rateValueIsRequired());
      }
      rate.rate = dto.rate;
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ exchangeRateId: rate.id }, 'Exchange rate updated');
    }
    return ok(rate);
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    if (await this.exchangeRates.deleteById(id, signal)) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ exchangeRateId: id }, 'Exchange rate deleted');
    }
    return done();
  }

  async existsForCurrencyAndDate(currencyId: string, date: Date, signal?: AbortSignal): Promise<Result<boolean>> {
    const rateDate = parseUtcDate(date) ?? date;
    return ok(await this.exchangeRates.existsForCurrencyAndDate(currencyId, rateDate, signal));
  }

  async getLastRateDate(currencyId: string, signal?: AbortSignal): Promise<Result<Date | null>> {
    return ok(await this.exchangeRates.getLastRateDate(currencyId, signal));
  }

  async deleteByPeriod(dto: DeleteByPeriodDto, signal?: AbortSignal): Promise<Result<number>> {
    const dateFrom = parseUtcDate(dto.dateFrom) ?? dto.dateFrom;
    const dateTo = parseUtcDate(dto.dateTo) ?? dto.dateTo;
    const removed = await this.exchangeRates.deleteByPeriod(dto.currencyId, dateFrom, dateTo, signal);

    this.logger.info(
      { currencyId: dto.currencyId, dateFrom: formatIsoDate(dateFrom), dateTo: formatIsoDate(dateTo), removed },
      'Exchange rates deleted for period'
    );
    return ok(removed);
  }
}
