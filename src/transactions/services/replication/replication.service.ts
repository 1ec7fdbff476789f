import { Logger } from 'pino';

import { ExternalApiError } from '../../../common/exceptions';
import { KeyedMutex } from '../../../common/keyed-mutex';
import { fail, ok, Result } from '../../../common/result';
import { BaseDocument, Entity } from '../../../common/persistence/entity';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { replicationDuration, replicationRecordsTotal, replicationRunsTotal } from '../../../observability/metrics';
import { traceReplication } from '../../../observability/tracing';
import {
  ITransactionHolder,
  ITransactionsAccount,
  ITransactionsAccountType,
  ITransactionsCategory,
  ITransactionsCurrency,
} from '../../models';
import {
  ReferenceRepository,
  TransactionHolder,
  TransactionsAccount,
  TransactionsAccountType,
  TransactionsCategory,
  TransactionsCurrency,
} from '../reference';
import { CatalogClient } from './catalog.client';
import { ReplicationErrorsFactory } from './replication.errors';
import { REPLICATION_KINDS, ReplicationKind, ReplicationKindReport, ReplicationOutcome } from './replication.types';

export interface ReplicaRepositories {
  holders: ReferenceRepository<TransactionHolder, ITransactionHolder>;
  accountTypes: ReferenceRepository<TransactionsAccountType, ITransactionsAccountType>;
  currencies: ReferenceRepository<TransactionsCurrency, ITransactionsCurrency>;
  accounts: ReferenceRepository<TransactionsAccount, ITransactionsAccount>;
  categories: ReferenceRepository<TransactionsCategory, ITransactionsCategory>;
}

// Shared by every scope so a scheduled run and an on-demand run never overlap per kind
const replicationLocks = new KeyedMutex<ReplicationKind>();

/**
 * Copies reference data from the catalog into the local replica collections.
 */
export class ReplicationService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly replicas: ReplicaRepositories,
    private readonly catalog: CatalogClient,
    private readonly errors: ReplicationErrorsFactory,
    private readonly locks: KeyedMutex<ReplicationKind> = replicationLocks,
    private readonly logger: Logger = createServiceLogger('replication-service')
  ) {}

  /**
   * Pull every record of one kind: absent ids are inserted, present ones
   * overwritten in place, all in a single commit. Nothing is written when the
   * catalog cannot be read.
   */
  async replicate(kind: ReplicationKind, signal?: AbortSignal): Promise<Result<ReplicationOutcome>> {
    if (this.locks.isLocked(kind)) {
      this.logger.info({ kind }, 'Waiting for the running replication of this kind to finish');
    }
    return this.locks.runExclusive(kind, () =>
      traceReplication(kind, async () => {
        const endTimer = replicationDuration.startTimer({ kind });
        try {
          const result = await this.replicateKind(kind, signal);
          replicationRunsTotal.inc({ kind, outcome: result.ok ? 'success' : 'failure' });
          return result;
        } catch (error) {
          replicationRunsTotal.inc({ kind, outcome: 'failure' });
          throw error;
        } finally {
          endTimer();
        }
      })
    );
  }

  /**
   * Replicate all kinds in dependency order. A failed kind does not stop the
   * ones after it.
   */
  async replicateAll(signal?: AbortSignal): Promise<Result<ReplicationKindReport[]>> {
    const reports: ReplicationKindReport[] = [];
    for (const kind of REPLICATION_KINDS) {
      const result = await this.replicate(kind, signal);
      reports.push(
        result.ok
          ? { kind, success: true, ...result.value }
          : {
              kind,
              success: false,
              inserted: 0,
              updated: 0,
              error: { code: result.error.code, message: result.error.message },
            }
      );
    }

    const failed = reports.filter((report) => !report.success).map((report) => report.kind);
    if (failed.length > 0) {
      this.logger.warn({ failed }, 'Replication finished with failures');
    } else {
      this.logger.info({ reports }, 'Replication finished');
    }
    return ok(reports);
  }

  private async replicateKind(kind: ReplicationKind, signal?: AbortSignal): Promise<Result<ReplicationOutcome>> {
    switch (kind) {
      case 'holders':
        return this.pull(kind, () => this.catalog.getAllHolders(signal), this.replicas.holders, signal);
      case 'accountTypes':
        return this.pull(kind, () => this.catalog.getAllAccountTypes(signal), this.replicas.accountTypes, signal);
      case 'currencies':
        return this.pull(kind, () => this.catalog.getAllCurrencies(signal), this.replicas.currencies, signal);
      case 'accounts':
        return this.pull(kind, () => this.catalog.getAllAccounts(signal), this.replicas.accounts, signal);
      case 'categories':
        return this.pull(kind, () => this.catalog.getAllCategories(signal), this.replicas.categories, signal);
    }
  }

  private async pull<T extends Entity, TDoc extends BaseDocument>(
    kind: ReplicationKind,
    fetch: () => Promise<T[]>,
    repository: ReferenceRepository<T, TDoc>,
    signal?: AbortSignal
  ): Promise<Result<ReplicationOutcome>> {
    let records: T[];
    try {
      records = await fetch();
    } catch (error) {
      if (error instanceof ExternalApiError) {
        return fail(this.errors.externalApiFailed(kind, error.message));
      }
      throw error;
    }

    const existing = new Map(
      (await repository.getAll({ disableTracking: false, signal })).map((entity) => [entity.id, entity])
    );

    const outcome: ReplicationOutcome = { inserted: 0, updated: 0 };
    for (const record of records) {
      const current = existing.get(record.id);
      if (current) {
        Object.assign(current, record);
        outcome.updated++;
      } else {
        repository.add(record);
        existing.set(record.id, record);
        outcome.inserted++;
      }
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
    }

    replicationRecordsTotal.inc({ kind, operation: 'inserted' }, outcome.inserted);
    replicationRecordsTotal.inc({ kind, operation: 'updated' }, outcome.updated);
    this.logger.info({ kind, ...outcome }, 'Replicated catalog records');
    return ok(outcome);
  }
}
