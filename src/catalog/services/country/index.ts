export { CountryService } from './country.service';
export { CountryRepository, countryMapper } from './country.repository';
export { CountryErrorsFactory } from './country.errors';
export { countryController } from './country.controller';
export { default as countryRoutes } from './country.routes';
export * from './country.types';
