export { RegistryHolderService } from './registry-holder.service';
export { RegistryHolderRepository, registryHolderMapper } from './registry-holder.repository';
export { RegistryHolderErrorsFactory } from './registry-holder.errors';
export { registryHolderController } from './registry-holder.controller';
export { default as registryHolderRoutes } from './registry-holder.routes';
export * from './registry-holder.types';
