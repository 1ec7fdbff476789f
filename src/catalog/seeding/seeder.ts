import fs from 'fs/promises';
import path from 'path';
import { Logger } from 'pino';
import { z } from 'zod';

import { config } from '../../config';
import { EntityCollection } from '../../common/persistence/collection';
import { BaseDocument, Entity } from '../../common/persistence/entity';
import { createServiceLogger } from '../../observability/logger';
import { CatalogCollections } from '../scope';

const DEFAULT_DATA_DIR = path.resolve(__dirname, '../../../data/seeding');

const countrySchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
});

const currencySchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  charCode: z.string().min(1),
  numCode: z.string().min(1),
  sign: z.string().default(''),
  emoji: z.string().default(''),
});

const accountTypeSchema = z.object({
  id: z.string().uuid(),
  code: z.string().min(1),
  description: z.string().default(''),
});

const bankSchema = z.object({
  id: z.string().uuid(),
  countryId: z.string().uuid(),
  name: z.string().min(1),
});

interface SeedSource<T extends Entity, TDoc extends BaseDocument, TItem> {
  file: string;
  schema: z.ZodType<TItem, z.ZodTypeDef, unknown>;
  collection: EntityCollection<T, TDoc>;
  toEntity(item: TItem, createdAt: Date): T;
}

export class JsonFileSeeder {
  private readonly logger: Logger;

  constructor(
    private readonly collections: CatalogCollections,
    private readonly dataDir: string = config.seeding.dataDir || DEFAULT_DATA_DIR,
    logger?: Logger
  ) {
    this.logger = logger ?? createServiceLogger('seeder');
  }

  /**
   * Seed reference data. Banks go last since they point at countries.
   * Returns the number of inserted records per file.
   */
  async seed(): Promise<Record<string, number>> {
    const { countries, currencies, accountTypes, banks } = this.collections;

    return {
      'countries.json': await this.seedFile({
        file: 'countries.json',
        schema: countrySchema,
        collection: countries,
        toEntity: (item, createdAt) => ({ ...item, createdAt }),
      }),
      'currencies.json': await this.seedFile({
        file: 'currencies.json',
        schema: currencySchema,
        collection: currencies,
        toEntity: (item, createdAt) => ({ ...item, isDeleted: false, createdAt }),
      }),
      'account_types.json': await this.seedFile({
        file: 'account_types.json',
        schema: accountTypeSchema,
        collection: accountTypes,
        toEntity: (item, createdAt) => ({ ...item, isDeleted: false, createdAt }),
      }),
      'banks.json': await this.seedFile({
        file: 'banks.json',
        schema: bankSchema,
        collection: banks,
        toEntity: (item, createdAt) => ({ ...item, createdAt }),
      }),
    };
  }

  private async seedFile<T extends Entity, TDoc extends BaseDocument, TItem>(
    source: SeedSource<T, TDoc, TItem>
  ): Promise<number> {
    const log = this.logger.child({ file: source.file, collection: source.collection.name });

    if (!(await source.collection.isEmpty())) {
      log.info('Collection already has data, seeding skipped');
      return 0;
    }

    const raw = await this.readFile(source.file);
    if (raw === null) {
      log.warn('Seeding file not found');
      return 0;
    }

    const items = z.array(source.schema).parse(JSON.parse(raw));
    if (items.length === 0) {
      log.warn('Seeding file is empty');
      return 0;
    }

    const createdAt = new Date();
    await source.collection.insert(items.map((item) => source.toEntity(item, createdAt)));
    log.info({ count: items.length }, 'Collection seeded');
    return items.length;
  }

  private async readFile(file: string): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.dataDir, file), 'utf8');
    } catch (error) {
      if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
