import { TransactionRunner } from '../../../src/common/persistence/transaction-runner';
import { UnitOfWork } from '../../../src/common/persistence/unit-of-work';
import { ICountry } from '../../../src/catalog/models';
import { bankMapper } from '../../../src/catalog/services/bank';
import { Country, CountryRepository, countryMapper } from '../../../src/catalog/services/country';
import { createdAt, InMemoryCollection } from '../../helpers';

const countryId = (n: number): string => `00000000-0000-4000-8000-00000000000${n}`;

const country = (n: number, name: string): Country => ({ id: countryId(n), name, createdAt: createdAt(n) });

describe('UnitOfWork', () => {
  let countries: InMemoryCollection<Country, ICountry>;
  let runs: number;
  let unitOfWork: UnitOfWork;
  let repository: CountryRepository;

  beforeEach(() => {
    countries = new InMemoryCollection('Country', countryMapper);
    countries.seed(country(1, 'Serbia'), country(2, 'Georgia'));
    runs = 0;
    const runner: TransactionRunner = {
      run: async (work) => {
        runs++;
        await work();
      },
    };
    unitOfWork = new UnitOfWork(runner);
    repository = new CountryRepository(countries, unitOfWork, new InMemoryCollection('Bank', bankMapper));
  });

  it('should write nothing before commit', async () => {
    const serbia = await repository.getById(countryId(1));
    if (!serbia) throw new Error('seed missing');
    serbia.name = 'Republic of Serbia';
    repository.add(country(3, 'Armenia'));

    expect(countries.size).toBe(2);
    expect((await countries.findById(countryId(1)))?.name).toBe('Serbia');
  });

  it('should flush every pending change in one run and report the count', async () => {
    const serbia = await repository.getById(countryId(1));
    const georgia = await repository.getById(countryId(2));
    if (!serbia || !georgia) throw new Error('seed missing');

    serbia.name = 'Republic of Serbia';
    repository.delete(georgia);
    repository.add(country(3, 'Armenia'));

    expect(unitOfWork.hasChanges()).toBe(true);
    await expect(unitOfWork.commit()).resolves.toBe(3);
    expect(runs).toBe(1);
    expect(countries.all().map((c) => c.name)).toEqual(['Republic of Serbia', 'Armenia']);
    expect(unitOfWork.hasChanges()).toBe(false);
  });

  it('should not count tracked entities that were read but not changed', async () => {
    await repository.getById(countryId(1));

    expect(unitOfWork.hasChanges()).toBe(false);
    await expect(unitOfWork.commit()).resolves.toBe(0);
    expect(runs).toBe(0);
  });

  it('should see an assignment back to the original value as no change', async () => {
    const serbia = await repository.getById(countryId(1));
    if (!serbia) throw new Error('seed missing');

    serbia.name = 'Serbia ';
    serbia.name = 'Serbia';

    expect(unitOfWork.hasChanges()).toBe(false);
  });

  it('should return the tracked instance for repeated reads', async () => {
    const first = await repository.getById(countryId(1));
    const second = await repository.getById(countryId(1));
    const detached = await repository.getById(countryId(1), { disableTracking: true });

    expect(second).toBe(first);
    expect(detached).not.toBe(first);
  });

  it('should drop an added entity deleted before commit', async () => {
    const armenia = repository.add(country(3, 'Armenia'));
    repository.delete(armenia);

    await expect(unitOfWork.commit()).resolves.toBe(0);
    expect(countries.size).toBe(2);
  });

  it('should fail fast when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    repository.add(country(3, 'Armenia'));

    await expect(unitOfWork.commit(controller.signal)).rejects.toThrow();
    expect(countries.size).toBe(2);
  });
});
