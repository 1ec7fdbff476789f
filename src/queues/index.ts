/**
 * Queue Module Exports
 */

// Configuration
export { queueConnection, replicationJobOptions, QUEUE_NAMES, JOB_NAMES, WORKER_CONCURRENCY } from './queue.config';

// Replication Queue
export {
  ReplicationJobData,
  ReplicationJobResult,
  getReplicationQueue,
  scheduleReplication,
  enqueueReplication,
  closeReplicationQueue,
  getReplicationQueueStats,
} from './replication.queue';

// Workers
export {
  ReplicationRunner,
  processReplicationJob,
  startReplicationWorker,
  stopReplicationWorker,
  isReplicationWorkerRunning,
} from './workers/replication.worker';
