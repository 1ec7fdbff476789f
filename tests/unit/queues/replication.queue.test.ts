/**
 * Replication Queue Unit Tests
 *
 * Tests replication queue operations with mocked BullMQ.
 */

// Mock BullMQ Queue
const mockAdd = jest.fn().mockResolvedValue({ id: 'job-123' });
const mockClose = jest.fn().mockResolvedValue(undefined);
const mockGetWaitingCount = jest.fn().mockResolvedValue(1);
const mockGetActiveCount = jest.fn().mockResolvedValue(0);
const mockGetCompletedCount = jest.fn().mockResolvedValue(24);
const mockGetFailedCount = jest.fn().mockResolvedValue(2);
const mockGetDelayedCount = jest.fn().mockResolvedValue(1);
const mockQueue = jest.fn();

jest.mock('bullmq', () => ({
  Queue: mockQueue.mockImplementation(() => ({
    add: mockAdd,
    close: mockClose,
    getWaitingCount: mockGetWaitingCount,
    getActiveCount: mockGetActiveCount,
    getCompletedCount: mockGetCompletedCount,
    getFailedCount: mockGetFailedCount,
    getDelayedCount: mockGetDelayedCount,
  })),
}));

// Mock queue config
jest.mock('../../../src/queues/queue.config', () => ({
  queueConnection: { host: 'localhost', port: 6379 },
  replicationJobOptions: { attempts: 3 },
  QUEUE_NAMES: { REPLICATION: 'replication' },
  JOB_NAMES: { SCHEDULED_REPLICATION: 'replicate-catalog', MANUAL_REPLICATION: 'replicate-catalog-now' },
}));

describe('Replication Queue', () => {
  let queueModule: typeof import('../../../src/queues/replication.queue');

  beforeEach(async () => {
    jest.resetModules();
    queueModule = await import('../../../src/queues/replication.queue');
  });

  afterEach(async () => {
    await queueModule.closeReplicationQueue();
  });

  describe('getReplicationQueue', () => {
    it('should create the queue once with the configured connection', () => {
      const first = queueModule.getReplicationQueue();
      const second = queueModule.getReplicationQueue();

      expect(first).toBe(second);
      expect(mockQueue).toHaveBeenCalledTimes(1);
      expect(mockQueue).toHaveBeenCalledWith('replication', {
        connection: { host: 'localhost', port: 6379 },
        defaultJobOptions: { attempts: 3 },
      });
    });
  });

  describe('scheduleReplication', () => {
    it('should add a repeatable job with the given cron pattern', async () => {
      const job = await queueModule.scheduleReplication('*/5 * * * *');

      expect(job).toEqual({ id: 'job-123' });
      expect(mockAdd).toHaveBeenCalledWith(
        'replicate-catalog',
        { trigger: 'schedule' },
        { repeat: { pattern: '*/5 * * * *' } }
      );
    });

    it('should default to the hourly pattern', async () => {
      await queueModule.scheduleReplication();

      expect(mockAdd).toHaveBeenCalledWith(
        'replicate-catalog',
        { trigger: 'schedule' },
        { repeat: { pattern: '0 * * * *' } }
      );
    });
  });

  describe('enqueueReplication', () => {
    it('should add a one-off job carrying its trigger', async () => {
      await queueModule.enqueueReplication('startup');

      expect(mockAdd).toHaveBeenCalledWith('replicate-catalog-now', { trigger: 'startup' });
    });
  });

  describe('closeReplicationQueue', () => {
    it('should close an open queue once', async () => {
      queueModule.getReplicationQueue();

      await queueModule.closeReplicationQueue();
      await queueModule.closeReplicationQueue();

      expect(mockClose).toHaveBeenCalledTimes(1);
    });
  });

  describe('getReplicationQueueStats', () => {
    it('should collect the job counts', async () => {
      await expect(queueModule.getReplicationQueueStats()).resolves.toEqual({
        waiting: 1,
        active: 0,
        completed: 24,
        failed: 2,
        delayed: 1,
      });
    });
  });
});
