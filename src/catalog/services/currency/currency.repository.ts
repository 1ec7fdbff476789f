import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, equalsIgnoreCase } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IAccount } from '../../models/Account';
import { ICurrency } from '../../models/Currency';
import { IExchangeRate } from '../../models/ExchangeRate';
import { Account } from '../account/account.types';
import { ExchangeRate } from '../exchange-rate/exchange-rate.types';
import { Currency, CurrencyFilter } from './currency.types';

export const currencyMapper: DocumentMapper<Currency, ICurrency> = {
  toDocument: (currency) => ({
    _id: currency.id,
    name: currency.name,
    charCode: currency.charCode,
    numCode: currency.numCode,
    sign: currency.sign,
    emoji: currency.emoji,
    isDeleted: currency.isDeleted,
    createdAt: currency.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    name: doc.name,
    charCode: doc.charCode,
    numCode: doc.numCode,
    sign: doc.sign ?? '',
    emoji: doc.emoji ?? '',
    isDeleted: doc.isDeleted ?? false,
    createdAt: doc.createdAt,
  }),
};

export class CurrencyRepository extends BaseRepository<Currency, ICurrency, CurrencyFilter> {
  constructor(
    collection: EntityCollection<Currency, ICurrency>,
    unitOfWork: UnitOfWork,
    private readonly accounts: EntityCollection<Account, IAccount>,
    private readonly exchangeRates: EntityCollection<ExchangeRate, IExchangeRate>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: CurrencyFilter): FilterQuery<ICurrency> {
    const query: FilterQuery<ICurrency> = {};
    if (!filter.includeDeleted) query.isDeleted = false;
    if (filter.nameContains) query.name = containsIgnoreCase(filter.nameContains);
    if (filter.charCode) query.charCode = equalsIgnoreCase(filter.charCode);
    if (filter.numCode) query.numCode = equalsIgnoreCase(filter.numCode);
    return query;
  }

  async isCharCodeUnique(charCode: string, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<ICurrency> = { charCode: equalsIgnoreCase(charCode) };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  async isNumCodeUnique(numCode: string, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<ICurrency> = { numCode: equalsIgnoreCase(numCode) };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  /**
   * Referenced currencies (by accounts or exchange rates) cannot be removed
   */
  async canBeDeleted(id: string, signal?: AbortSignal): Promise<boolean> {
    const [hasAccounts, hasRates] = await Promise.all([
      this.accounts.exists({ currencyId: id }, signal),
      this.exchangeRates.exists({ currencyId: id }, signal),
    ]);
    return !hasAccounts && !hasRates;
  }
}
