/**
 * Replication Queue
 *
 * Holds the repeatable job that pulls catalog reference data into the
 * transactions service.
 */

import { Job, Queue } from 'bullmq';

import { config } from '../config';
import { logger } from '../observability';
import type {
  ReplicationKindReport,
  ReplicationQueueCounts,
} from '../transactions/services/replication/replication.types';
import { JOB_NAMES, QUEUE_NAMES, queueConnection, replicationJobOptions } from './queue.config';

export interface ReplicationJobData {
  trigger: 'schedule' | 'startup' | 'manual';
}

export interface ReplicationJobResult {
  reports: ReplicationKindReport[];
}

let replicationQueue: Queue<ReplicationJobData, ReplicationJobResult> | null = null;

/**
 * Get or create the replication queue
 */
export function getReplicationQueue(): Queue<ReplicationJobData, ReplicationJobResult> {
  if (!replicationQueue) {
    replicationQueue = new Queue<ReplicationJobData, ReplicationJobResult>(QUEUE_NAMES.REPLICATION, {
      connection: queueConnection,
      defaultJobOptions: replicationJobOptions,
    });
    logger.info('Replication queue initialized');
  }
  return replicationQueue;
}

/**
 * Register the repeatable replication job. Re-registering the same pattern is
 * a no-op in BullMQ, so every instance may call this on startup.
 */
export async function scheduleReplication(
  pattern: string = config.replication.pattern
): Promise<Job<ReplicationJobData, ReplicationJobResult>> {
  const queue = getReplicationQueue();
  const job = await queue.add(
    JOB_NAMES.SCHEDULED_REPLICATION,
    { trigger: 'schedule' },
    { repeat: { pattern } }
  );
  logger.info({ pattern, jobId: job.id }, 'Replication job scheduled');
  return job;
}

/**
 * Queue a single replication run outside the schedule
 */
export async function enqueueReplication(
  trigger: ReplicationJobData['trigger'] = 'manual'
): Promise<Job<ReplicationJobData, ReplicationJobResult>> {
  const queue = getReplicationQueue();
  const job = await queue.add(JOB_NAMES.MANUAL_REPLICATION, { trigger });
  logger.debug({ jobId: job.id, trigger }, 'Replication job added');
  return job;
}

/**
 * Close the replication queue connection
 */
export async function closeReplicationQueue(): Promise<void> {
  if (replicationQueue) {
    await replicationQueue.close();
    replicationQueue = null;
    logger.info('Replication queue closed');
  }
}

/**
 * Get queue statistics
 */
export async function getReplicationQueueStats(): Promise<ReplicationQueueCounts> {
  const queue = getReplicationQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
