import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuid } from 'uuid';

/**
 * Fields every log line written inside the context carries
 */
export interface LogContext {
  correlationId: string;
  jobId?: string;
  replicationKind?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Get the current correlation ID from the async context
 */
export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Run a function within a specific log context
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};

/**
 * Run a function in a child of the current context with extra fields.
 * Outside any request or job a fresh correlation id is made.
 */
export const withLogFields = <T>(fields: Pick<LogContext, 'jobId' | 'replicationKind'>, fn: () => T): T => {
  const parent = getLogContext();
  return asyncLocalStorage.run(
    { correlationId: parent?.correlationId ?? uuid(), jobId: parent?.jobId, ...fields },
    fn
  );
};
