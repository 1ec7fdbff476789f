import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';

export interface Country extends Entity {
  name: string;
}

export interface CountryFilter extends PageFilter {
  nameContains?: string;
}

export interface CreateCountryDto {
  name: string;
}

export interface UpdateCountryDto {
  id: string;
  name?: string;
}
