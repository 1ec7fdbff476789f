export { CurrencyService } from './currency.service';
export { CurrencyRepository, currencyMapper } from './currency.repository';
export { CurrencyErrorsFactory } from './currency.errors';
export { currencyController } from './currency.controller';
export { default as currencyRoutes } from './currency.routes';
export * from './currency.types';
