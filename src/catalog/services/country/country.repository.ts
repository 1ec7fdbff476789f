import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, equalsIgnoreCase } from '../../../common/persistence/query';
import { BaseRepository } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IBank } from '../../models/Bank';
import { ICountry } from '../../models/Country';
import { Bank } from '../bank/bank.types';
import { Country, CountryFilter } from './country.types';

export const countryMapper: DocumentMapper<Country, ICountry> = {
  toDocument: (country) => ({ _id: country.id, name: country.name, createdAt: country.createdAt }),
  toEntity: (doc) => ({ id: doc._id, name: doc.name, createdAt: doc.createdAt }),
};

export class CountryRepository extends BaseRepository<Country, ICountry, CountryFilter> {
  constructor(
    collection: EntityCollection<Country, ICountry>,
    unitOfWork: UnitOfWork,
    private readonly banks: EntityCollection<Bank, IBank>
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: CountryFilter): FilterQuery<ICountry> {
    const query: FilterQuery<ICountry> = {};
    if (filter.nameContains) query.name = containsIgnoreCase(filter.nameContains);
    return query;
  }

  async isNameUnique(name: string, excludeId?: string, signal?: AbortSignal): Promise<boolean> {
    const query: FilterQuery<ICountry> = { name: equalsIgnoreCase(name) };
    if (excludeId !== undefined) query._id = { $ne: excludeId };
    return !(await this.collection.exists(query, signal));
  }

  async canBeDeleted(id: string, signal?: AbortSignal): Promise<boolean> {
    return !(await this.banks.exists({ countryId: id }, signal));
  }
}
