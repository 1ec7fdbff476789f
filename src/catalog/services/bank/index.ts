export { BankService } from './bank.service';
export { BankRepository, bankMapper } from './bank.repository';
export { BankErrorsFactory } from './bank.errors';
export { bankController } from './bank.controller';
export { default as bankRoutes } from './bank.routes';
export * from './bank.types';
