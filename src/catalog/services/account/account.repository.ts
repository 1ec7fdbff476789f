import { FilterQuery } from 'mongoose';

import { EntityCollection } from '../../../common/persistence/collection';
import { DocumentMapper } from '../../../common/persistence/entity';
import { containsIgnoreCase, inRange } from '../../../common/persistence/query';
import { BaseRepository, ReadOptions } from '../../../common/persistence/repository';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { IAccount } from '../../models/Account';
import { IAccountType } from '../../models/AccountType';
import { IBank } from '../../models/Bank';
import { ICurrency } from '../../models/Currency';
import { IRegistryHolder } from '../../models/RegistryHolder';
import { AccountType } from '../account-type/account-type.types';
import { Bank } from '../bank/bank.types';
import { Currency } from '../currency/currency.types';
import { RegistryHolder } from '../registry-holder/registry-holder.types';
import { Account, AccountFilter } from './account.types';

export const accountMapper: DocumentMapper<Account, IAccount> = {
  toDocument: (account) => ({
    _id: account.id,
    registryHolderId: account.registryHolderId,
    accountTypeId: account.accountTypeId,
    currencyId: account.currencyId,
    bankId: account.bankId,
    name: account.name,
    isIncludeInBalance: account.isIncludeInBalance,
    isDefault: account.isDefault,
    isArchived: account.isArchived,
    isDeleted: account.isDeleted,
    creditLimit: account.creditLimit,
    createdAt: account.createdAt,
  }),
  toEntity: (doc) => ({
    id: doc._id,
    registryHolderId: doc.registryHolderId,
    accountTypeId: doc.accountTypeId,
    currencyId: doc.currencyId,
    bankId: doc.bankId ?? null,
    name: doc.name,
    isIncludeInBalance: doc.isIncludeInBalance ?? true,
    isDefault: doc.isDefault ?? false,
    isArchived: doc.isArchived ?? false,
    isDeleted: doc.isDeleted ?? false,
    creditLimit: doc.creditLimit ?? null,
    createdAt: doc.createdAt,
  }),
};

export interface AccountRelations {
  registryHolders: EntityCollection<RegistryHolder, IRegistryHolder>;
  accountTypes: EntityCollection<AccountType, IAccountType>;
  currencies: EntityCollection<Currency, ICurrency>;
  banks: EntityCollection<Bank, IBank>;
}

export class AccountRepository extends BaseRepository<Account, IAccount, AccountFilter> {
  constructor(
    collection: EntityCollection<Account, IAccount>,
    unitOfWork: UnitOfWork,
    private readonly relations: AccountRelations
  ) {
    super(collection, unitOfWork);
  }

  protected buildFilter(filter: AccountFilter): FilterQuery<IAccount> {
    const query: FilterQuery<IAccount> = {};
    if (!filter.includeDeleted) query.isDeleted = false;
    if (filter.registryHolderId) query.registryHolderId = filter.registryHolderId;
    if (filter.accountTypeId) query.accountTypeId = filter.accountTypeId;
    if (filter.currencyId) query.currencyId = filter.currencyId;
    if (filter.bankId) query.bankId = filter.bankId;
    if (filter.nameContains) query.name = containsIgnoreCase(filter.nameContains);
    if (filter.isIncludeInBalance !== undefined) query.isIncludeInBalance = filter.isIncludeInBalance;
    if (filter.isDefault !== undefined) query.isDefault = filter.isDefault;
    if (filter.isArchived !== undefined) query.isArchived = filter.isArchived;

    const creditLimit = inRange(filter.creditLimitFrom, filter.creditLimitTo);
    if (creditLimit) query.creditLimit = creditLimit;
    return query;
  }

  protected async loadRelated(accounts: Account[], signal?: AbortSignal): Promise<void> {
    const { registryHolders, accountTypes, currencies, banks } = this.relations;
    for (const account of accounts) {
      account.registryHolder = (await registryHolders.findById(account.registryHolderId, signal)) ?? undefined;
      account.accountType = (await accountTypes.findById(account.accountTypeId, signal)) ?? undefined;
      account.currency = (await currencies.findById(account.currencyId, signal)) ?? undefined;
      if (account.bankId) {
        account.bank = (await banks.findById(account.bankId, signal)) ?? undefined;
      }
    }
  }

  /**
   * The holder's current default account, tracked for modification
   */
  async getDefaultAccount(
    registryHolderId: string,
    options: ReadOptions = {}
  ): Promise<Account | null> {
    return this.findOne({ registryHolderId, isDefault: true }, options);
  }
}
