import { FilterQuery } from 'mongoose';

import { PageFilter, toSkipTake } from '../pagination';
import { EntityCollection } from './collection';
import { BaseDocument, Entity } from './entity';
import { UnitOfWork } from './unit-of-work';

export interface ReadOptions {
  /** Load referenced entities (holder, currency, ...) onto the result */
  includeRelated?: boolean;
  /** Return a detached copy that the unit of work will not persist */
  disableTracking?: boolean;
  signal?: AbortSignal;
}

/**
 * Generic CRUD contract shared by all repositories
 */
export interface Repository<T extends Entity, TFilter extends PageFilter> {
  getById(id: string, options?: ReadOptions): Promise<T | null>;
  getPaged(filter: TFilter, options?: ReadOptions): Promise<T[]>;
  getAll(options?: ReadOptions): Promise<T[]>;
  count(filter: TFilter, signal?: AbortSignal): Promise<number>;
  add(entity: T): T;
  update(entity: T): T;
  delete(entity: T): void;
  deleteById(id: string, signal?: AbortSignal): Promise<boolean>;
  any(id?: string, signal?: AbortSignal): Promise<boolean>;
}

/**
 * Base repository over an EntityCollection.
 *
 * Reads are tracked by the unit of work unless `disableTracking` is set;
 * an entity already tracked in this scope is returned as the same instance.
 * Writes are only registered here and reach storage on commit.
 */
export abstract class BaseRepository<T extends Entity, TDoc extends BaseDocument, TFilter extends PageFilter>
  implements Repository<T, TFilter>
{
  private readonly identityMap = new Map<string, T>();

  protected constructor(
    protected readonly collection: EntityCollection<T, TDoc>,
    protected readonly unitOfWork: UnitOfWork
  ) {}

  /**
   * Translate the entity filter (without paging) into a query document
   */
  protected abstract buildFilter(filter: TFilter): FilterQuery<TDoc>;

  /**
   * Attach referenced entities; repositories without relations keep the default
   */
  protected async loadRelated(_entities: T[], _signal?: AbortSignal): Promise<void> {
    return;
  }

  async getById(id: string, options: ReadOptions = {}): Promise<T | null> {
    const tracked = options.disableTracking ? undefined : this.identityMap.get(id);
    const entity = tracked ?? (await this.collection.findById(id, options.signal));
    if (!entity) {
      return null;
    }
    const [result] = await this.materialize([entity], options);
    return result;
  }

  async getPaged(filter: TFilter, options: ReadOptions = {}): Promise<T[]> {
    const { skip, take } = toSkipTake(filter);
    const entities = await this.collection.find(this.buildFilter(filter), {
      skip,
      limit: take,
      signal: options.signal,
    });
    return this.materialize(entities, { disableTracking: true, ...options });
  }

  async getAll(options: ReadOptions = {}): Promise<T[]> {
    const entities = await this.collection.findAll({ signal: options.signal });
    return this.materialize(entities, { disableTracking: true, ...options });
  }

  async count(filter: TFilter, signal?: AbortSignal): Promise<number> {
    return this.collection.count(this.buildFilter(filter), signal);
  }

  add(entity: T): T {
    this.identityMap.set(entity.id, entity);
    this.unitOfWork.registerNew(this.collection, entity);
    return entity;
  }

  update(entity: T): T {
    if (this.identityMap.get(entity.id) === entity) {
      // Tracked instances are diffed against their snapshot on commit
      return entity;
    }
    this.identityMap.set(entity.id, entity);
    this.unitOfWork.registerModified(this.collection, entity);
    return entity;
  }

  delete(entity: T): void {
    this.identityMap.delete(entity.id);
    this.unitOfWork.registerDeleted(this.collection, entity);
  }

  async deleteById(id: string, signal?: AbortSignal): Promise<boolean> {
    const entity = await this.getById(id, { signal });
    if (!entity) {
      return false;
    }
    this.delete(entity);
    return true;
  }

  async any(id?: string, signal?: AbortSignal): Promise<boolean> {
    if (id === undefined) {
      return !(await this.collection.isEmpty(signal));
    }
    if (this.identityMap.has(id)) {
      return true;
    }
    return (await this.collection.findById(id, signal)) !== null;
  }

  /**
   * First match of a query, tracked unless `disableTracking` is set
   */
  protected async findOne(filter: FilterQuery<TDoc>, options: ReadOptions = {}): Promise<T | null> {
    const entity = await this.collection.findOne(filter, options.signal);
    if (!entity) {
      return null;
    }
    const [result] = await this.materialize([entity], options);
    return result;
  }

  private async materialize(entities: T[], options: ReadOptions): Promise<T[]> {
    const results = options.disableTracking ? entities : entities.map((entity) => this.attach(entity));
    if (options.includeRelated) {
      await this.loadRelated(results, options.signal);
    }
    return results;
  }

  private attach(entity: T): T {
    const existing = this.identityMap.get(entity.id);
    if (existing) {
      return existing;
    }
    this.identityMap.set(entity.id, entity);
    this.unitOfWork.track(this.collection, entity);
    return entity;
  }
}
