import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';

export interface Transaction extends Entity {
  date: Date;
  accountId: string;
  categoryId: string;
  /** Signed; never zero */
  amount: number;
  description: string;
}

export interface TransactionFilter extends PageFilter {
  dateFrom?: Date;
  dateTo?: Date;
  accountId?: string;
  categoryId?: string;
  amountFrom?: number;
  amountTo?: number;
  descriptionContains?: string;
}

export interface CreateTransactionDto {
  date: string | Date;
  accountId: string;
  categoryId: string;
  amount: number;
  description?: string;
}

export interface UpdateTransactionDto {
  id: string;
  date?: string | Date;
  accountId?: string;
  categoryId?: string;
  amount?: number;
  description?: string;
}
