/**
 * BullMQ Queue Configuration
 *
 * Provides connection settings and default job options for all queues.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

/**
 * Redis connection configuration for BullMQ
 */
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Default job options for catalog replication
 */
export const replicationJobOptions: DefaultJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 5000, // 5s, 10s, 20s
  },
  removeOnComplete: {
    count: 24, // One day of hourly runs
  },
  removeOnFail: {
    count: 100,
  },
};

/**
 * Queue names
 * Note: BullMQ doesn't allow colons in queue names as they are used as Redis key separators
 */
export const QUEUE_NAMES = {
  REPLICATION: 'finance-catalog-replication',
} as const;

/**
 * Job names within the replication queue
 */
export const JOB_NAMES = {
  SCHEDULED_REPLICATION: 'replicate-catalog',
  MANUAL_REPLICATION: 'replicate-catalog-now',
} as const;

/**
 * Worker concurrency settings
 */
export const WORKER_CONCURRENCY = {
  // Runs must not overlap
  REPLICATION: 1,
} as const;
