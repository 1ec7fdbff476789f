import { EntityCollection } from '../common/persistence/collection';
import { MongooseCollection } from '../common/persistence/mongoose.collection';
import { TransactionRunner } from '../common/persistence/transaction-runner';
import { UnitOfWork } from '../common/persistence/unit-of-work';
import { ScopedRequest } from '../middlewares/requestScope';
import {
  AccountModel,
  AccountTypeModel,
  BankModel,
  CategoryModel,
  CountryModel,
  CurrencyModel,
  ExchangeRateModel,
  IAccount,
  IAccountType,
  IBank,
  ICategory,
  ICountry,
  ICurrency,
  IExchangeRate,
  IRegistryHolder,
  RegistryHolderModel,
} from './models';
import { Account, AccountErrorsFactory, AccountRepository, AccountService, accountMapper } from './services/account';
import {
  AccountType,
  AccountTypeErrorsFactory,
  AccountTypeRepository,
  AccountTypeService,
  accountTypeMapper,
} from './services/account-type';
import { Bank, BankErrorsFactory, BankRepository, BankService, bankMapper } from './services/bank';
import { Category, CategoryErrorsFactory, CategoryRepository, CategoryService, categoryMapper } from './services/category';
import { Country, CountryErrorsFactory, CountryRepository, CountryService, countryMapper } from './services/country';
import { Currency, CurrencyErrorsFactory, CurrencyRepository, CurrencyService, currencyMapper } from './services/currency';
import {
  ExchangeRate,
  ExchangeRateErrorsFactory,
  ExchangeRateRepository,
  ExchangeRateService,
  exchangeRateMapper,
} from './services/exchange-rate';
import {
  RegistryHolder,
  RegistryHolderErrorsFactory,
  RegistryHolderRepository,
  RegistryHolderService,
  registryHolderMapper,
} from './services/registry-holder';

/**
 * Storage of every catalog entity
 */
export interface CatalogCollections {
  registryHolders: EntityCollection<RegistryHolder, IRegistryHolder>;
  countries: EntityCollection<Country, ICountry>;
  banks: EntityCollection<Bank, IBank>;
  currencies: EntityCollection<Currency, ICurrency>;
  accountTypes: EntityCollection<AccountType, IAccountType>;
  categories: EntityCollection<Category, ICategory>;
  accounts: EntityCollection<Account, IAccount>;
  exchangeRates: EntityCollection<ExchangeRate, IExchangeRate>;
}

export const createMongooseCatalogCollections = (): CatalogCollections => ({
  registryHolders: new MongooseCollection(RegistryHolderModel, registryHolderMapper),
  countries: new MongooseCollection(CountryModel, countryMapper),
  banks: new MongooseCollection(BankModel, bankMapper),
  currencies: new MongooseCollection(CurrencyModel, currencyMapper),
  accountTypes: new MongooseCollection(AccountTypeModel, accountTypeMapper),
  categories: new MongooseCollection(CategoryModel, categoryMapper),
  accounts: new MongooseCollection(AccountModel, accountMapper),
  exchangeRates: new MongooseCollection(ExchangeRateModel, exchangeRateMapper),
});

// Stateless; shared by every scope
const errors = {
  registryHolder: new RegistryHolderErrorsFactory(),
  country: new CountryErrorsFactory(),
  bank: new BankErrorsFactory(),
  currency: new CurrencyErrorsFactory(),
  accountType: new AccountTypeErrorsFactory(),
  category: new CategoryErrorsFactory(),
  account: new AccountErrorsFactory(),
  exchangeRate: new ExchangeRateErrorsFactory(),
};

export interface CatalogScope {
  unitOfWork: UnitOfWork;
  registryHolderService: RegistryHolderService;
  countryService: CountryService;
  bankService: BankService;
  currencyService: CurrencyService;
  accountTypeService: AccountTypeService;
  categoryService: CategoryService;
  accountService: AccountService;
  exchangeRateService: ExchangeRateService;
}

export type CatalogRequest = ScopedRequest<CatalogScope>;

/**
 * One unit of work with its repositories and services, for a single request
 */
export const createCatalogScope = (
  collections: CatalogCollections,
  transactionRunner: TransactionRunner
): CatalogScope => {
  const unitOfWork = new UnitOfWork(transactionRunner);
  const c = collections;

  const registryHolders = new RegistryHolderRepository(c.registryHolders, unitOfWork, c.accounts, c.categories);
  const countries = new CountryRepository(c.countries, unitOfWork, c.banks);
  const banks = new BankRepository(c.banks, unitOfWork, c.countries, c.accounts);
  const currencies = new CurrencyRepository(c.currencies, unitOfWork, c.accounts, c.exchangeRates);
  const accountTypes = new AccountTypeRepository(c.accountTypes, unitOfWork, c.accounts);
  const categories = new CategoryRepository(c.categories, unitOfWork, c.registryHolders);
  const accounts = new AccountRepository(c.accounts, unitOfWork, {
    registryHolders: c.registryHolders,
    accountTypes: c.accountTypes,
    currencies: c.currencies,
    banks: c.banks,
  });
  const exchangeRates = new ExchangeRateRepository(c.exchangeRates, unitOfWork);

  return {
    unitOfWork,
    registryHolderService: new RegistryHolderService(unitOfWork, registryHolders, errors.registryHolder),
    countryService: new CountryService(unitOfWork, countries, errors.country),
    bankService: new BankService(unitOfWork, banks, countries, errors.bank),
    currencyService: new CurrencyService(unitOfWork, currencies, errors.currency),
    accountTypeService: new AccountTypeService(unitOfWork, accountTypes, errors.accountType),
    categoryService: new CategoryService(unitOfWork, categories, registryHolders, errors.category),
    accountService: new AccountService(
      unitOfWork,
      accounts,
      { registryHolders, accountTypes, currencies, banks },
      errors.account
    ),
    exchangeRateService: new ExchangeRateService(unitOfWork, exchangeRates, currencies, errors.exchangeRate),
  };
};
