import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';

/**
 * Movement of money between two accounts. Amounts are kept per side since
 * the accounts may be in different currencies.
 */
export interface Transfer extends Entity {
  date: Date;
  fromAccountId: string;
  toAccountId: string;
  fromAmount: number;
  toAmount: number;
  description: string;
}

export interface TransferFilter extends PageFilter {
  fromAccountId?: string;
  toAccountId?: string;
  dateFrom?: Date;
  dateTo?: Date;
  fromAmountFrom?: number;
  fromAmountTo?: number;
  toAmountFrom?: number;
  toAmountTo?: number;
  descriptionContains?: string;
}

export interface CreateTransferDto {
  date: string | Date;
  fromAccountId: string;
  toAccountId: string;
  fromAmount: number;
  toAmount: number;
  description?: string;
}

export interface UpdateTransferDto {
  id: string;
  date?: string | Date;
  fromAccountId?: string;
  toAccountId?: string;
  fromAmount?: number;
  toAmount?: number;
  description?: string;
}
