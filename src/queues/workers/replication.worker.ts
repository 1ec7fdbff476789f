/**
 * Replication Worker
 *
 * Runs catalog replication jobs one at a time.
 */

import { Job, Worker } from 'bullmq';

import { runWithContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import type { ReplicationKindReport } from '../../transactions/services/replication/replication.types';
import { QUEUE_NAMES, WORKER_CONCURRENCY, queueConnection } from '../queue.config';
import { ReplicationJobData, ReplicationJobResult } from '../replication.queue';

/**
 * Performs one full replication and returns the per-kind reports
 */
export type ReplicationRunner = () => Promise<ReplicationKindReport[]>;

const log = createServiceLogger('replication-worker');

let replicationWorker: Worker<ReplicationJobData, ReplicationJobResult> | null = null;

/**
 * Process a replication job
 */
export async function processReplicationJob(
  job: Pick<Job<ReplicationJobData, ReplicationJobResult>, 'id' | 'data' | 'attemptsMade'>,
  run: ReplicationRunner
): Promise<ReplicationJobResult> {
  log.info({ jobId: job.id, trigger: job.data.trigger, attempt: job.attemptsMade + 1 }, 'Replication job started');

  const reports = await run();
  const failed = reports.filter((report) => !report.success);
  if (failed.length === reports.length && reports.length > 0) {
    // Nothing could be read; let BullMQ retry with backoff
    throw new Error(`Replication failed for every kind: ${failed.map((report) => report.kind).join(', ')}`);
  }

  return { reports };
}

function setupWorkerEvents(worker: Worker<ReplicationJobData, ReplicationJobResult>): void {
  worker.on('completed', (job, result) => {
    const failed = result.reports.filter((report) => !report.success).map((report) => report.kind);
    log.info({ jobId: job.id, failed }, 'Replication job completed');
  });

  worker.on('failed', (job, err) => {
    log.error({ jobId: job?.id, attempts: job?.attemptsMade, err }, 'Replication job failed');
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Replication worker error');
  });
}

/**
 * Start the replication worker
 */
export function startReplicationWorker(run: ReplicationRunner): Worker<ReplicationJobData, ReplicationJobResult> {
  if (replicationWorker) {
    return replicationWorker;
  }

  replicationWorker = new Worker<ReplicationJobData, ReplicationJobResult>(
    QUEUE_NAMES.REPLICATION,
    (job) =>
      runWithContext({ correlationId: `replication-${job.id ?? 'unknown'}`, jobId: job.id }, () =>
        processReplicationJob(job, run)
      ),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.REPLICATION,
    }
  );

  setupWorkerEvents(replicationWorker);
  log.info('Replication worker started');

  return replicationWorker;
}

/**
 * Stop the replication worker
 */
export async function stopReplicationWorker(): Promise<void> {
  if (replicationWorker) {
    await replicationWorker.close();
    replicationWorker = null;
    log.info('Replication worker stopped');
  }
}

/**
 * Check if worker is running
 */
export function isReplicationWorkerRunning(): boolean {
  return replicationWorker !== null && !replicationWorker.closing;
}
