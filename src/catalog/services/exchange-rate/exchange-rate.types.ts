import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';

export interface ExchangeRate extends Entity {
  currencyId: string;
  /** UTC midnight of the rate day */
  rateDate: Date;
  rate: number;
}

export interface ExchangeRateFilter extends PageFilter {
  currencyId?: string;
  dateFrom?: Date;
  dateTo?: Date;
  rateFrom?: number;
  rateTo?: number;
}

export interface CreateExchangeRateDto {
  currencyId: string;
  rateDate: string | Date;
  rate: number;
}

export interface UpdateExchangeRateDto {
  id: string;
  rateDate?: string | Date;
  rate?: number;
}

export interface DeleteByPeriodDto {
  currencyId: string;
  dateFrom: Date;
  dateTo: Date;
}
