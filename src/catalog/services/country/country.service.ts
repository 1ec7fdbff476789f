import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { CountryErrorsFactory } from './country.errors';
import { CountryRepository } from './country.repository';
import { Country, CountryFilter, CreateCountryDto, UpdateCountryDto } from './country.types';

export class CountryService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly countries: CountryRepository,
    private readonly errors: CountryErrorsFactory,
    private readonly logger: Logger = createServiceLogger('country-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Country>> {
    const country = await this.countries.getById(id, { disableTracking: true, signal });
    return country ? ok(country) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: CountryFilter, signal?: AbortSignal): Promise<Result<Country[]>> {
    return ok(await this.countries.getPaged(filter, { signal }));
  }

  async getAll(signal?: AbortSignal): Promise<Result<Country[]>> {
    return ok(await this.countries.getAll({ signal }));
  }

  async create(dto: CreateCountryDto, signal?: AbortSignal): Promise<Result<Country>> {
    const name = dto.name?.trim();
    if (!name) {
      return fail(this.errors.nameIsRequired());
    }
    if (!(await this.countries.isNameUnique(name, undefined, signal))) {
      return fail(this.errors.nameAlreadyExists(name));
    }

    const country = this.countries.add({ id: uuid(), name, createdAt: new Date() });
    await this.unitOfWork.commit(signal);

    this.logger.info({ countryId: country.id, name }, 'Country created');
    return ok(country);
  }

  async update(dto: UpdateCountryDto, signal?: AbortSignal): Promise<Result<Country>> {
    const country = await this.countries.getById(dto.id, { signal });
    if (!country) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.name !== undefined) {
      const name = dto.name.trim();
      if (!name) {
        return fail(this.errors.nameIsRequired());
      }
      if (name !== country.name) {
        if (!(await this.countries.isNameUnique(name, dto.id, signal))) {
          return fail(this.errors.nameAlreadyExists(name));
        }
        country.name = name;
      }
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ countryId: country.id }, 'Country updated');
    }
    return ok(country);
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    const country = await this.countries.getById(id, { signal });
    if (!country) {
      return done();
    }
    if (!(await this.countries.canBeDeleted(id, signal))) {
      return fail(this.errors.cannotDeleteUsed(id));
    }

    this.countries.delete(country);
    await this.unitOfWork.commit(signal);
    this.logger.info({ countryId: id }, 'Country deleted');
    return done();
  }
}
