import { PageFilter } from '../../../common/pagination';
import { SoftDeletableEntity } from '../../../common/persistence/entity';
import { AccountType } from '../account-type/account-type.types';
import { Bank } from '../bank/bank.types';
import { Currency } from '../currency/currency.types';
import { RegistryHolder } from '../registry-holder/registry-holder.types';

export interface Account extends SoftDeletableEntity {
  registryHolderId: string;
  accountTypeId: string;
  currencyId: string;
  bankId: string | null;
  name: string;
  isIncludeInBalance: boolean;
  isDefault: boolean;
  isArchived: boolean;
  creditLimit: number | null;
  registryHolder?: RegistryHolder;
  accountType?: AccountType;
  currency?: Currency;
  bank?: Bank;
}

export interface AccountFilter extends PageFilter {
  registryHolderId?: string;
  accountTypeId?: string;
  currencyId?: string;
  bankId?: string;
  nameContains?: string;
  isIncludeInBalance?: boolean;
  isDefault?: boolean;
  isArchived?: boolean;
  includeDeleted?: boolean;
  creditLimitFrom?: number;
  creditLimitTo?: number;
}

export interface CreateAccountDto {
  registryHolderId: string;
  accountTypeId: string;
  currencyId: string;
  bankId?: string | null;
  name: string;
  isIncludeInBalance?: boolean;
  isDefault?: boolean;
  creditLimit?: number | null;
}

export interface UpdateAccountDto {
  id: string;
  accountTypeId?: string;
  currencyId?: string;
  bankId?: string | null;
  name?: string;
  isIncludeInBalance?: boolean;
  isDefault?: boolean;
  isArchived?: boolean;
  creditLimit?: number | null;
}
