import { Entity, SoftDeletableEntity } from '../../../common/persistence/entity';
import { Role } from '../../../types/role';

/*
 * Local copies of catalog reference data. Written only by replication.
 */

export interface TransactionHolder extends Entity {
  telegramId: number;
  role: Role;
}

export interface TransactionsAccountType extends SoftDeletableEntity {
  code: string;
  description: string;
}

export interface TransactionsCurrency extends SoftDeletableEntity {
  name: string;
  charCode: string;
  numCode: string;
  sign: string;
  emoji: string;
}

export interface TransactionsAccount extends SoftDeletableEntity {
  holderId: string;
  accountTypeId: string;
  currencyId: string;
  creditLimit: number | null;
  isArchived: boolean;
}

export interface TransactionsCategory extends SoftDeletableEntity {
  holderId: string;
  income: boolean;
  expense: boolean;
}
