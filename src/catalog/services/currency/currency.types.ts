import { PageFilter } from '../../../common/pagination';
import { SoftDeletableEntity } from '../../../common/persistence/entity';

export interface Currency extends SoftDeletableEntity {
  name: string;
  charCode: string;
  numCode: string;
  sign: string;
  emoji: string;
}

export interface CurrencyFilter extends PageFilter {
  nameContains?: string;
  charCode?: string;
  numCode?: string;
  includeDeleted?: boolean;
}

export interface CreateCurrencyDto {
  name: string;
  charCode: string;
  numCode: string;
  sign?: string;
  emoji?: string;
}

export interface UpdateCurrencyDto {
  id: string;
  name?: string;
  charCode?: string;
  numCode?: string;
  sign?: string;
  emoji?: string;
}
