import { ClientSession, FilterQuery } from 'mongoose';

import { BaseDocument, Entity } from './entity';

export type SortOrder = 1 | -1;

export interface FindOptions {
  /** Defaults to creation order */
  sort?: Record<string, SortOrder>;
  skip?: number;
  limit?: number;
  signal?: AbortSignal;
}

/**
 * Write context handed to collections while a unit of work flushes
 */
export interface WriteContext {
  session?: ClientSession;
  signal?: AbortSignal;
}

/**
 * Storage port behind the repositories.
 *
 * Filters are MongoDB query documents over the stored document shape.
 * Results are ordered by creation time, then id.
 */
export interface EntityCollection<T extends Entity, TDoc extends BaseDocument> {
  readonly name: string;

  toDocument(entity: T): TDoc;

  findById(id: string, signal?: AbortSignal): Promise<T | null>;
  findAll(options?: FindOptions): Promise<T[]>;
  find(filter: FilterQuery<TDoc>, options?: FindOptions): Promise<T[]>;
  findOne(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<T | null>;
  count(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<number>;
  exists(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<boolean>;
  isEmpty(signal?: AbortSignal): Promise<boolean>;

  insert(entities: T[], context?: WriteContext): Promise<void>;
  replace(entity: T, context?: WriteContext): Promise<void>;
  remove(ids: string[], context?: WriteContext): Promise<void>;
  removeMany(filter: FilterQuery<TDoc>, context?: WriteContext): Promise<number>;
}
