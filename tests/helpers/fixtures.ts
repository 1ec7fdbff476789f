import { Account } from '../../src/catalog/services/account';
import { AccountType } from '../../src/catalog/services/account-type';
import { Currency } from '../../src/catalog/services/currency';
import { RegistryHolder } from '../../src/catalog/services/registry-holder';
import { TransactionsAccount, TransactionsCategory } from '../../src/transactions/services/reference';
import { Role } from '../../src/types/role';

/*
 * Fixed ids and entity builders shared by the suites
 */

export const ids = {
  holder: '11111111-1111-4111-8111-111111111111',
  otherHolder: '22222222-2222-4222-8222-222222222222',
  accountType: '33333333-3333-4333-8333-333333333333',
  currency: '44444444-4444-4444-8444-444444444444',
  account: '55555555-5555-4555-8555-555555555555',
  otherAccount: '66666666-6666-4666-8666-666666666666',
  category: '77777777-7777-4777-8777-777777777777',
  missing: '99999999-9999-4999-8999-999999999999',
};

export const createdAt = (minute: number): Date => new Date(Date.UTC(2024, 0, 1, 0, minute));

export const holder = (overrides: Partial<RegistryHolder> = {}): RegistryHolder => ({
  id: ids.holder,
  telegramId: 1001,
  role: Role.User,
  createdAt: createdAt(0),
  ...overrides,
});

export const accountType = (overrides: Partial<AccountType> = {}): AccountType => ({
  id: ids.accountType,
  code: 'CASH',
  description: 'Cash',
  isDeleted: false,
  createdAt: createdAt(0),
  ...overrides,
});

export const currency = (overrides: Partial<Currency> = {}): Currency => ({
  id: ids.currency,
  name: 'Euro',
  charCode: 'EUR',
  numCode: '978',
  sign: '€',
  emoji: '🇪🇺',
  isDeleted: false,
  createdAt: createdAt(0),
  ...overrides,
});

export const account = (overrides: Partial<Account> = {}): Account => ({
  id: ids.account,
  registryHolderId: ids.holder,
  accountTypeId: ids.accountType,
  currencyId: ids.currency,
  bankId: null,
  name: 'Wallet',
  isIncludeInBalance: true,
  isDefault: false,
  isArchived: false,
  isDeleted: false,
  creditLimit: null,
  createdAt: createdAt(1),
  ...overrides,
});

export const replicaAccount = (overrides: Partial<TransactionsAccount> = {}): TransactionsAccount => ({
  id: ids.account,
  holderId: ids.holder,
  accountTypeId: ids.accountType,
  currencyId: ids.currency,
  creditLimit: null,
  isArchived: false,
  isDeleted: false,
  createdAt: createdAt(1),
  ...overrides,
});

export const replicaCategory = (overrides: Partial<TransactionsCategory> = {}): TransactionsCategory => ({
  id: ids.category,
  holderId: ids.holder,
  income: false,
  expense: true,
  isDeleted: false,
  createdAt: createdAt(1),
  ...overrides,
});
