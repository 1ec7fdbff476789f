export { AccountTypeService } from './account-type.service';
export { AccountTypeRepository, accountTypeMapper } from './account-type.repository';
export { AccountTypeErrorsFactory } from './account-type.errors';
export { accountTypeController } from './account-type.controller';
export { default as accountTypeRoutes } from './account-type.routes';
export * from './account-type.types';
