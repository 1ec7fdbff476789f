import { FilterQuery, Model } from 'mongoose';

import { EntityCollection, FindOptions, WriteContext } from './collection';
import { BaseDocument, DocumentMapper, Entity } from './entity';

const CREATION_ORDER = { createdAt: 1, _id: 1 } as const;

/**
 * EntityCollection backed by a mongoose model. Reads use lean documents;
 * writes join the session of the committing unit of work.
 */
export class MongooseCollection<T extends Entity, TDoc extends BaseDocument>
  implements EntityCollection<T, TDoc>
{
  constructor(
    private readonly model: Model<TDoc>,
    private readonly mapper: DocumentMapper<T, TDoc>
  ) {}

  get name(): string {
    return this.model.modelName;
  }

  toDocument(entity: T): TDoc {
    return this.mapper.toDocument(entity);
  }

  async findById(id: string, signal?: AbortSignal): Promise<T | null> {
    signal?.throwIfAborted();
    const doc = await this.model.findById(id).lean<TDoc>().exec();
    return doc ? this.mapper.toEntity(doc) : null;
  }

  async findAll(options: FindOptions = {}): Promise<T[]> {
    options.signal?.throwIfAborted();
    const docs = await this.model
      .find()
      .sort(options.sort ?? CREATION_ORDER)
      .skip(options.skip ?? 0)
      .limit(options.limit ?? 0)
      .lean<TDoc[]>()
      .exec();
    return docs.map((doc) => this.mapper.toEntity(doc));
  }

  async find(filter: FilterQuery<TDoc>, options: FindOptions = {}): Promise<T[]> {
    options.signal?.throwIfAborted();
    const docs = await this.model
      .find(filter)
      .sort(options.sort ?? CREATION_ORDER)
      .skip(options.skip ?? 0)
      .limit(options.limit ?? 0)
      .lean<TDoc[]>()
      .exec();
    return docs.map((doc) => this.mapper.toEntity(doc));
  }

  async findOne(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<T | null> {
    signal?.throwIfAborted();
    const doc = await this.model.findOne(filter).sort(CREATION_ORDER).lean<TDoc>().exec();
    return doc ? this.mapper.toEntity(doc) : null;
  }

  async count(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    return this.model.countDocuments(filter).exec();
  }

  async exists(filter: FilterQuery<TDoc>, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const found = await this.model.exists(filter).exec();
    return found !== null;
  }

  async isEmpty(signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const total = await this.model.estimatedDocumentCount().exec();
    return total === 0;
  }

  async insert(entities: T[], context: WriteContext = {}): Promise<void> {
    context.signal?.throwIfAborted();
    if (entities.length === 0) return;
    await this.model.insertMany(
      entities.map((entity) => this.mapper.toDocument(entity)),
      { session: context.session ?? null }
    );
  }

  async replace(entity: T, context: WriteContext = {}): Promise<void> {
    context.signal?.throwIfAborted();
    await this.model
      .replaceOne(undefined, this.mapper.toDocument(entity))
      .where('_id', entity.id)
      .session(context.session ?? null)
      .exec();
  }

  async remove(ids: string[], context: WriteContext = {}): Promise<void> {
    context.signal?.throwIfAborted();
    if (ids.length === 0) return;
    await this.model
      .deleteMany()
      .where('_id')
      .in(ids)
      .session(context.session ?? null)
      .exec();
  }

  async removeMany(filter: FilterQuery<TDoc>, context: WriteContext = {}): Promise<number> {
    context.signal?.throwIfAborted();
    const result = await this.model
      .deleteMany(filter)
      .session(context.session ?? null)
      .exec();
    return result.deletedCount;
  }
}
