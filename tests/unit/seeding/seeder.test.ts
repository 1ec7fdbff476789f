/**
 * JSON File Seeder Unit Tests
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { JsonFileSeeder } from '../../../src/catalog/seeding/seeder';
import { createInMemoryCatalogCollections, currency, InMemoryCatalogCollections } from '../../helpers';

const countryId = 'a1a1a1a1-a1a1-4a1a-8a1a-a1a1a1a1a1a1';
const bankId = 'b2b2b2b2-b2b2-4b2b-8b2b-b2b2b2b2b2b2';

describe('JsonFileSeeder', () => {
  let dataDir: string;
  let collections: InMemoryCatalogCollections;

  const writeFile = (file: string, content: unknown) =>
    fs.writeFile(path.join(dataDir, file), typeof content === 'string' ? content : JSON.stringify(content));

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'seeder-'));
    collections = createInMemoryCatalogCollections();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('should insert every record of the files that exist', async () => {
    await writeFile('countries.json', [{ id: countryId, name: 'Georgia' }]);
    await writeFile('banks.json', [{ id: bankId, countryId, name: 'Bank of Georgia' }]);

    const counts = await new JsonFileSeeder(collections, dataDir).seed();

    expect(counts).toEqual({ 'countries.json': 1, 'currencies.json': 0, 'account_types.json': 0, 'banks.json': 1 });
    expect(collections.countries.all().map((country) => country.name)).toEqual(['Georgia']);
    expect(collections.banks.all()[0]).toMatchObject({ id: bankId, countryId, name: 'Bank of Georgia' });
  });

  it('should fill defaults for optional fields', async () => {
    await writeFile('account_types.json', [{ id: countryId, code: 'CASH' }]);

    await new JsonFileSeeder(collections, dataDir).seed();

    expect(collections.accountTypes.all()[0]).toMatchObject({ code: 'CASH', description: '', isDeleted: false });
  });

  it('should skip collections that already hold data', async () => {
    collections.currencies.seed(currency());
    await writeFile('currencies.json', [{ id: countryId, name: 'Lari', charCode: 'GEL', numCode: '981' }]);

    const counts = await new JsonFileSeeder(collections, dataDir).seed();

    expect(counts['currencies.json']).toBe(0);
    expect(collections.currencies.all().map((item) => item.charCode)).toEqual(['EUR']);
  });

  it('should treat an empty file as nothing to seed', async () => {
    await writeFile('countries.json', []);

    const counts = await new JsonFileSeeder(collections, dataDir).seed();

    expect(counts['countries.json']).toBe(0);
    expect(collections.countries.size).toBe(0);
  });

  it('should reject malformed JSON', async () => {
    await writeFile('countries.json', '[{ "id": ');

    await expect(new JsonFileSeeder(collections, dataDir).seed()).rejects.toThrow(SyntaxError);
  });

  it('should reject records that fail validation', async () => {
    await writeFile('countries.json', [{ id: 'not-a-uuid', name: '' }]);

    await expect(new JsonFileSeeder(collections, dataDir).seed()).rejects.toThrow();
    expect(collections.countries.size).toBe(0);
  });
});
