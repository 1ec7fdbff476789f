export { AccountService } from './account.service';
export type { AccountReferences } from './account.service';
export { AccountRepository, accountMapper } from './account.repository';
export type { AccountRelations } from './account.repository';
export { AccountErrorsFactory } from './account.errors';
export { accountController } from './account.controller';
export { default as accountRoutes } from './account.routes';
export * from './account.types';
