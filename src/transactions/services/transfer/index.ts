export { TransferService } from './transfer.service';
export { TransferRepository, transferMapper } from './transfer.repository';
export { TransferErrorsFactory } from './transfer.errors';
export { transferController } from './transfer.controller';
export { default as transferRoutes } from './transfer.routes';
export * from './transfer.types';
