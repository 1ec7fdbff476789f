export { RegistryHolderModel, IRegistryHolder } from './RegistryHolder';
export { CountryModel, ICountry } from './Country';
export { BankModel, IBank } from './Bank';
export { CurrencyModel, ICurrency } from './Currency';
export { AccountTypeModel, IAccountType } from './AccountType';
export { CategoryModel, ICategory } from './Category';
export { AccountModel, IAccount } from './Account';
export { ExchangeRateModel, IExchangeRate } from './ExchangeRate';
