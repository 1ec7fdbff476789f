export { ExchangeRateService } from './exchange-rate.service';
export { ExchangeRateRepository, exchangeRateMapper } from './exchange-rate.repository';
export { ExchangeRateErrorsFactory } from './exchange-rate.errors';
export { exchangeRateController } from './exchange-rate.controller';
export { default as exchangeRateRoutes } from './exchange-rate.routes';
export * from './exchange-rate.types';
