import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';
import { Country } from '../country/country.types';

export interface Bank extends Entity {
  countryId: string;
  name: string;
  country?: Country;
}

export interface BankFilter extends PageFilter {
  countryId?: string;
  nameContains?: string;
}

export interface CreateBankDto {
  countryId: string;
  name: string;
}

export interface UpdateBankDto {
  id: string;
  countryId?: string;
  name?: string;
}

export interface AccountsCountOptions {
  includeArchived?: boolean;
  includeDeleted?: boolean;
}
