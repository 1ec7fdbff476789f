export { CatalogApiClient, createCatalogHttpClient } from './catalog.client';
export type { CatalogClient } from './catalog.client';
export { ReplicationService } from './replication.service';
export type { ReplicaRepositories } from './replication.service';
export { ReplicationErrorsFactory } from './replication.errors';
export { ReplicationController } from './replication.controller';
export { createReplicationRoutes } from './replication.routes';
export * from './replication.types';
