import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { inRange } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IExchangeRate } from '../../models/ExchangeRate';
import { ExchangeRate, ExchangeRateFilter } from './exchange-rate.types';

export const exchangeRateMapper: DocumentMapper<ExchangeRate, IExchangeRate> = {
  toDocument: (rate) => ({
    _id: rate.id,
    currencyId: rate.currencyId,
    rateDate: rate.rateDate,
    rate: rate.rate,
    createdAt: rate.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    currencyId: doc.currencyId,
    rateDate: doc.rateDate,
    rate: doc.rate,
    createdAt: doc.createdAt,
  }),
};

export class ExchangeRateRepository extends BaseRepository<ExchangeRate, IExchangeRate, ExchangeRateFilter> {
  constructor(collection: EntityCollection<ExchangeRate, IExchangeRate>, unitOfWork: UnitOfWork) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: ExchangeRateFilter): FilterQuery<IExchangeRate> {
    const query: FilterQuery<IExchangeRate> = {};
    if (filter.currencyId) query.currencyId = filter.currencyId;

    const rateDate = inRange(filter.dateFrom, filter.dateTo);
    if (rateDate) query.rateDate = rateDate;
    const rate = inRange(filter.rateFrom, filter.rateTo);
    if (rate) query.rate = rate;
    return query;
  }

  async existsForCurrencyAndDate(currencyId: string, rateDate: Date, signal?: AbortSignal): Promise<boolean> {
    return this.collection.exists({ currencyId, rateDate }, signal);
  }

  async getLastRateDate(currencyId: string, signal?: AbortSignal): Promise<Date | null> {
    const [latest] = await this.collection.find({ currencyId }, { sort: { rateDate: -1 }, limit: 1, signal });
    return latest ? latest.rateDate : null;
  }

  /**
   * Removes the currency's rates dated within [dateFrom, dateTo] right away,
   * outside the unit of work. Returns the removed count.
   */
  async deleteByPeriod(currencyId: string, dateFrom: Date, dateTo: Date, signal?: AbortSignal): Promise<number> {
    return this.collection.removeMany(
      { currencyId, rateDate: { $gte: dateFrom, $lte: dateTo } },
      { signal }
    );
  }
}
