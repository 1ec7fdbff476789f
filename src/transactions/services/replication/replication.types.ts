/**
 * Reference data kinds pulled from the catalog, in replication order:
 * accounts and categories point at holders, account types and currencies.
 */
export const REPLICATION_KINDS = ['holders', 'accountTypes', 'currencies', 'accounts', 'categories'] as const;

export type ReplicationKind = (typeof REPLICATION_KINDS)[number];

export interface ReplicationOutcome {
  inserted: number;
  updated: number;
}

/**
 * Per-kind entry of a full replication run
 */
export interface ReplicationKindReport extends ReplicationOutcome {
  kind: ReplicationKind;
  success: boolean;
  error?: {
    code: string;
    message: string;
  };
}

export interface ReplicationQueueCounts {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

/**
 * State of the scheduled replication; `queue` is null while replication is
 * disabled
 */
export interface ReplicationStatus {
  enabled: boolean;
  workerRunning: boolean;
  queue: ReplicationQueueCounts | null;
}

export type ReplicationStatusProvider = () => Promise<ReplicationStatus>;
