import { Logger } from 'pino';

import { createServiceLogger } from '../../observability/logger';
import { unitOfWorkWritesTotal } from '../../observability/metrics';
import { EntityCollection, WriteContext } from './collection';
import { BaseDocument, Entity } from './entity';
import { TransactionRunner } from './transaction-runner';

type EntryState = 'added' | 'unchanged' | 'modified' | 'deleted';

/**
 * Type-erased view of a tracked entity, as seen by the unit of work
 */
interface ChangeEntry {
  readonly key: string;
  readonly state: EntryState;
  hasChanges(): boolean;
  flush(context: WriteContext): Promise<void>;
  accept(): void;
  markDeleted(): void;
  markModified(): void;
}

class TrackedEntry<T extends Entity, TDoc extends BaseDocument> implements ChangeEntry {
  private snapshot: string;

  constructor(
    private readonly collection: EntityCollection<T, TDoc>,
    private readonly entity: T,
    public state: EntryState
  ) {
    this.snapshot = this.serialize();
  }

  get key(): string {
    return entryKey(this.collection, this.entity.id);
  }

  hasChanges(): boolean {
    return this.state !== 'unchanged' || this.serialize() !== this.snapshot;
  }

  async flush(context: WriteContext): Promise<void> {
    switch (this.state) {
      case 'added':
        await this.collection.insert([this.entity], context);
        return;
      case 'deleted':
        await this.collection.remove([this.entity.id], context);
        return;
      default:
        await this.collection.replace(this.entity, context);
    }
  }

  accept(): void {
    this.snapshot = this.serialize();
    this.state = 'unchanged';
  }

  markDeleted(): void {
    this.state = 'deleted';
  }

  markModified(): void {
    if (this.state === 'unchanged') this.state = 'modified';
  }

  private serialize(): string {
    return JSON.stringify(this.collection.toDocument(this.entity));
  }
}

const entryKey = <T extends Entity, TDoc extends BaseDocument>(
  collection: EntityCollection<T, TDoc>,
  id: string
): string => `${collection.name}:${id}`;

/**
 * Change tracker plus the single commit boundary of one logical operation.
 *
 * Entities read with tracking are snapshotted; mutating them in place and
 * calling commit() writes every pending insert, modification and delete in
 * one flush. Nothing reaches storage before commit().
 */
export class UnitOfWork {
  private readonly entries = new Map<string, ChangeEntry>();
  private readonly logger: Logger;

  constructor(private readonly transactions: TransactionRunner, logger?: Logger) {
    this.logger = logger ?? createServiceLogger('unit-of-work');
  }

  track<T extends Entity, TDoc extends BaseDocument>(collection: EntityCollection<T, TDoc>, entity: T): void {
    const key = entryKey(collection, entity.id);
    if (!this.entries.has(key)) {
      this.entries.set(key, new TrackedEntry(collection, entity, 'unchanged'));
    }
  }

  registerNew<T extends Entity, TDoc extends BaseDocument>(collection: EntityCollection<T, TDoc>, entity: T): void {
    this.entries.set(entryKey(collection, entity.id), new TrackedEntry(collection, entity, 'added'));
  }

  registerModified<T extends Entity, TDoc extends BaseDocument>(
    collection: EntityCollection<T, TDoc>,
    entity: T
  ): void {
    const existing = this.entries.get(entryKey(collection, entity.id));
    if (existing) {
      existing.markModified();
      return;
    }
    this.entries.set(entryKey(collection, entity.id), new TrackedEntry(collection, entity, 'modified'));
  }

  registerDeleted<T extends Entity, TDoc extends BaseDocument>(
    collection: EntityCollection<T, TDoc>,
    entity: T
  ): void {
    const key = entryKey(collection, entity.id);
    const existing = this.entries.get(key);
    if (existing?.state === 'added') {
      // Never stored, nothing to remove
      this.entries.delete(key);
      return;
    }
    if (existing) {
      existing.markDeleted();
      return;
    }
    const entry = new TrackedEntry(collection, entity, 'deleted');
    this.entries.set(key, entry);
  }

  hasChanges(): boolean {
    for (const entry of this.entries.values()) {
      if (entry.hasChanges()) return true;
    }
    return false;
  }

  /**
   * Flush all pending changes at once. Returns the number of entities written.
   */
  async commit(signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();

    const pending = [...this.entries.values()].filter((entry) => entry.hasChanges());
    if (pending.length === 0) {
      return 0;
    }

    await this.transactions.run(async (session) => {
      for (const entry of pending) {
        await entry.flush({ session, signal });
      }
    });

    for (const entry of pending) {
      if (entry.state === 'deleted') {
        this.entries.delete(entry.key);
      } else {
        entry.accept();
      }
    }

    unitOfWorkWritesTotal.inc(pending.length);
    this.logger.debug({ written: pending.length }, 'Unit of work committed');
    return pending.length;
  }
}
