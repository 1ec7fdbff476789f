/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values
 * shared by the catalog and transactions services.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, CATALOG_API_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const readBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB server URI by environment (database name is chosen per service)
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017';

/**
 * Database names of the two services
 */
export const MONGODB_DATABASES = {
  catalog: process.env.MONGODB_CATALOG_DB || (isTest ? 'catalog-test' : 'catalog'),
  transactions: process.env.MONGODB_TRANSACTIONS_DB || (isTest ? 'transactions-test' : 'transactions'),
};

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
  // Multi-document transactions need a replica set; standalone dev servers can turn them off
  useTransactions: readBoolean(process.env.MONGODB_USE_TRANSACTIONS, isProduction),
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting for the /api routes
 *
 * Set RATE_LIMIT_DISABLED=true to turn limiting off entirely.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: readBoolean(process.env.RATE_LIMIT_DISABLED, false),
  api: {
    windowMs: parseInt(process.env.API_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.API_RATE_LIMIT_MAX || '300', 10)
      : isTest
      ? 10000
      : parseInt(process.env.API_RATE_LIMIT_MAX || '1000', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '100kb',
  catalogPort: parseInt(process.env.CATALOG_PORT || '5000', 10),
  transactionsPort: parseInt(process.env.TRANSACTIONS_PORT || '5100', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'],
};

/**
 * Reported by /api/v1/environment/info
 */
export const APP_INFO = {
  name: process.env.APP_NAME || 'finance-manager',
  version: process.env.APP_VERSION || process.env.npm_package_version || '1.0.0',
};

// =============================================================================
// CATALOG API CLIENT (used by the transactions service)
// =============================================================================

export const CATALOG_API_CONFIG = {
  baseUrl: process.env.CATALOG_API_URL || `http://localhost:${API_CONFIG.catalogPort}`,
  timeoutMs: parseInt(process.env.CATALOG_API_TIMEOUT_MS || '30000', 10),
  pageSize: 1000,
};

// =============================================================================
// REPLICATION JOB
// =============================================================================

export const REPLICATION_CONFIG = {
  enabled: readBoolean(process.env.REPLICATION_ENABLED, !isTest),
  // Every hour at minute 0
  pattern: process.env.REPLICATION_CRON || '0 * * * *',
  runOnStartup: readBoolean(process.env.REPLICATION_RUN_ON_STARTUP, true),
};

// =============================================================================
// SEEDING
// =============================================================================

export const SEEDING_CONFIG = {
  enabled: readBoolean(process.env.SEED_DATABASE, isDevelopment),
  dataDir: process.env.SEED_DATA_DIR || '',
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: readBoolean(process.env.OTEL_ENABLED, isProduction),
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['MONGODB_URI', 'REDIS_HOST', 'CATALOG_API_URL', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.replace(/^mongodb(\+srv)?:\/\//, '').split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  catalogApiUrl: CATALOG_API_CONFIG.baseUrl,
});
