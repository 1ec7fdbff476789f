import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_DATABASES,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  APP_INFO,
  CATALOG_API_CONFIG,
  REPLICATION_CONFIG,
  SEEDING_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object shared by both services
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    databases: MONGODB_DATABASES,
    ...MONGODB_CONFIG,
  },

  // Redis (BullMQ)
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // API
  api: API_CONFIG,
  app: APP_INFO,

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Catalog API client
  catalogApi: CATALOG_API_CONFIG,

  // Replication job
  replication: REPLICATION_CONFIG,

  // Seeding
  seeding: SEEDING_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,
};
