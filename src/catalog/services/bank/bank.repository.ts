import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, equalsIgnoreCase } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IAccount } from '../../models/Account';
import { IBank } from '../../models/Bank';
import { ICountry } from '../../models/Country';
import { Account } from '../account/account.types';
import { Country } from '../country/country.types';
import { AccountsCountOptions, Bank, BankFilter } from './bank.types';

export const bankMapper: DocumentMapper<Bank, IBank> = {
  toDocument: (bank) => ({
    _id: bank.id,
    countryId: bank.countryId,
    name: bank.name,
    createdAt: bank.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    countryId: doc.countryId,
    name: doc.name,
    createdAt: doc.createdAt,
  }),
};

export class BankRepository extends BaseRepository<Bank, IBank, BankFilter> {
  constructor(
    collection: EntityCollection<Bank, IBank>,
    unitOfWork: UnitOfWork,
    private readonly countries: EntityCollection<Country, ICountry>,
    private readonly accounts: EntityCollection<Account, IAccount>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: BankFilter): FilterQuery<IBank> {
    const query: FilterQuery<IBank> = {};
    if (filter.countryId) query.countryId = filter.countryId;
    if (filter.nameContains) query.name = containsIgnoreCase(filter.nameContains);
    return query;
  }

  protected async loadRelated(banks: Bank[], signal?: AbortSignal): Promise<void> {
    for (const bank of banks) {
      bank.country = (await this.countries.findById(bank.countryId, signal)) ?? undefined;
    }
  }

  /**
   * Bank names are unique within a country, ignoring case
   */
  async isNameUnique(name: string, countryId: string, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<IBank> = { countryId, name: equalsIgnoreCase(name) };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  async getAccountsCount(id: string, options: AccountsCountOptions, signal?: AbortSignal): Promise<number> {
    const query: FilterQuery<IAccount> = { bankId: id };
    if (!options.includeArchived) query.isArchived = false;
    if (!options.includeDeleted) query.isDeleted = false;
    return this.accounts.count(query, signal);
  }

  async canBeDeleted(id: string, signal?: AbortSignal): Promise<boolean> {
    return !(await this.accounts.exists({ bankId: id }, signal));
  }
}
