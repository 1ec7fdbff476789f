/**
 * Replication Service Integration Tests
 *
 * Replicates from an in-process catalog client into in-memory replica collections.
 */

import pino from 'pino';

import { KeyedMutex } from '../../../src/common/keyed-mutex';
import { TransactionRunner } from '../../../src/common/persistence/transaction-runner';
import { UnitOfWork } from '../../../src/common/persistence/unit-of-work';
import { createTransactionsScope } from '../../../src/transactions/scope';
import { ReferenceRepository } from '../../../src/transactions/services/reference';
import {
  ReplicationErrorsFactory,
  ReplicationKind,
  ReplicationService,
} from '../../../src/transactions/services/replication';
import { ErrorCode } from '../../../src/types/errors';
import { Role } from '../../../src/types/role';
import {
  createdAt,
  createInMemoryTransactionsCollections,
  FakeCatalogClient,
  ids,
  InMemoryTransactionsCollections,
  replicaAccount,
  replicaCategory,
  transactionsScope,
} from '../../helpers';

describe('Replication Service Integration Tests', () => {
  let collections: InMemoryTransactionsCollections;
  let catalog: FakeCatalogClient;
  let commits: number;

  const countingRunner: TransactionRunner = {
    run: async (work) => {
      commits++;
      await work();
    },
  };
  const service = () => createTransactionsScope(collections, countingRunner, catalog).replicationService;

  beforeEach(() => {
    collections = createInMemoryTransactionsCollections();
    catalog = new FakeCatalogClient();
    commits = 0;

    catalog.holders = [{ id: ids.holder, telegramId: 1001, role: Role.User, createdAt: createdAt(0) }];
    catalog.accountTypes = [
      { id: ids.accountType, code: 'CASH', description: 'Cash', isDeleted: false, createdAt: createdAt(0) },
    ];
    catalog.currencies = [
      {
        id: ids.currency,
        name: 'Euro',
        charCode: 'EUR',
        numCode: '978',
        sign: '€',
        emoji: '',
        isDeleted: false,
        createdAt: createdAt(0),
      },
    ];
    catalog.accounts = [replicaAccount(), replicaAccount({ id: ids.otherAccount, createdAt: createdAt(2) })];
    catalog.categories = [replicaCategory()];
  });

  describe('replicate', () => {
    it('should insert records missing from the replica', async () => {
      const result = await service().replicate('accounts');

      expect(result).toEqual({ ok: true, value: { inserted: 2, updated: 0 } });
      expect(commits).toBe(1);
      expect(collections.accounts.all().map((account) => account.id)).toEqual([ids.account, ids.otherAccount]);
    });

    it('should overwrite records already present', async () => {
      collections.accounts.seed(replicaAccount());
      catalog.accounts = [replicaAccount({ isArchived: true, creditLimit: 500 })];

      const result = await service().replicate('accounts');

      expect(result).toEqual({ ok: true, value: { inserted: 0, updated: 1 } });
      expect(collections.accounts.all()).toEqual([replicaAccount({ isArchived: true, creditLimit: 500 })]);
    });

    it('should carry soft deletions over from the catalog', async () => {
      collections.categories.seed(replicaCategory());
      catalog.categories = [replicaCategory({ isDeleted: true })];

      await service().replicate('categories');

      expect(collections.categories.all()[0].isDeleted).toBe(true);
    });

    it('should keep replica records the catalog no longer returns', async () => {
      collections.holders.seed({ id: ids.otherHolder, telegramId: 2002, role: Role.Administrator, createdAt: createdAt(5) });

      await service().replicate('holders');

      expect(collections.holders.all().map((holder) => holder.id)).toEqual([ids.holder, ids.otherHolder]);
    });

    it('should not commit when the catalog returns nothing', async () => {
      catalog.currencies = [];

      const result = await service().replicate('currencies');

      expect(result).toEqual({ ok: true, value: { inserted: 0, updated: 0 } });
      expect(commits).toBe(0);
    });

    it('should return an external API failure and write nothing when the catalog is unreachable', async () => {
      catalog.failing.add('currencies');

      const result = await service().replicate('currencies');

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.REPLICATION_EXTERNAL_API_FAILED,
          statusCode: 502,
          message: 'Failed to replicate currencies from the catalog API: connect ECONNREFUSED 127.0.0.1:5000',
        }),
      });
      expect(commits).toBe(0);
      expect(collections.currencies.size).toBe(0);
    });

    it('should rethrow errors that do not come from the catalog API', async () => {
      jest.spyOn(catalog, 'getAllHolders').mockRejectedValueOnce(new TypeError('boom'));

      await expect(service().replicate('holders')).rejects.toThrow('boom');
    });

    it('should run replications of the same kind one after another across scopes', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const fetchAccounts = catalog.getAllAccounts.bind(catalog);
      const spy = jest.spyOn(catalog, 'getAllAccounts').mockImplementationOnce(async () => {
        await gate;
        return fetchAccounts();
      });

      const first = service().replicate('accounts');
      const second = service().replicate('accounts');
      await new Promise((resolve) => setImmediate(resolve));

      expect(spy).toHaveBeenCalledTimes(1);
      release();

      await expect(first).resolves.toEqual({ ok: true, value: { inserted: 2, updated: 0 } });
      await expect(second).resolves.toEqual({ ok: true, value: { inserted: 0, updated: 2 } });
    });

    it('should log when a replication has to wait for a running one of the same kind', async () => {
      const logger = pino({ level: 'silent' });
      const info = jest.spyOn(logger, 'info');
      const locks = new KeyedMutex<ReplicationKind>();
      const serviceWithLogger = () => {
        const unitOfWork = new UnitOfWork(countingRunner);
        const replicas = {
          holders: new ReferenceRepository(collections.holders, unitOfWork),
          accountTypes: new ReferenceRepository(collections.accountTypes, unitOfWork),
          currencies: new ReferenceRepository(collections.currencies, unitOfWork),
          accounts: new ReferenceRepository(collections.accounts, unitOfWork),
          categories: new ReferenceRepository(collections.categories, unitOfWork),
        };
        return new ReplicationService(unitOfWork, replicas, catalog, new ReplicationErrorsFactory(), locks, logger);
      };

      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const fetchHolders = catalog.getAllHolders.bind(catalog);
      jest.spyOn(catalog, 'getAllHolders').mockImplementationOnce(async () => {
        await gate;
        return fetchHolders();
      });

      const first = serviceWithLogger().replicate('holders');
      const second = serviceWithLogger().replicate('holders');

      expect(info).toHaveBeenCalledTimes(1);
      expect(info).toHaveBeenCalledWith({ kind: 'holders' }, 'Waiting for the running replication of this kind to finish');

      release();
      await Promise.all([first, second]);
    });
  });

  describe('replicateAll', () => {
    it('should replicate every kind in dependency order', async () => {
      const result = await transactionsScope(collections, catalog).replicationService.replicateAll();

      expect(catalog.calls).toEqual(['holders', 'accountTypes', 'currencies', 'accounts', 'categories']);
      expect(result).toEqual({
        ok: true,
        value: [
          { kind: 'holders', success: true, inserted: 1, updated: 0 },
          { kind: 'accountTypes', success: true, inserted: 1, updated: 0 },
          { kind: 'currencies', success: true, inserted: 1, updated: 0 },
          { kind: 'accounts', success: true, inserted: 2, updated: 0 },
          { kind: 'categories', success: true, inserted: 1, updated: 0 },
        ],
      });
    });

    it('should keep going after a kind fails', async () => {
      catalog.failing.add('accountTypes');

      const result = await service().replicateAll();

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value[1]).toEqual({
        kind: 'accountTypes',
        success: false,
        inserted: 0,
        updated: 0,
        error: {
          code: ErrorCode.REPLICATION_EXTERNAL_API_FAILED,
          message: 'Failed to replicate accountTypes from the catalog API: connect ECONNREFUSED 127.0.0.1:5000',
        },
      });
      expect(result.value.filter((report) => report.success).map((report) => report.kind)).toEqual([
        'holders',
        'currencies',
        'accounts',
        'categories',
      ]);
      expect(collections.accountTypes.size).toBe(0);
      expect(collections.categories.size).toBe(1);
    });

    it('should update on a second run', async () => {
      await service().replicateAll();
      const result = await service().replicateAll();

      expect(result.ok && result.value.map((report) => [report.inserted, report.updated])).toEqual([
        [0, 1],
        [0, 1],
        [0, 1],
        [0, 2],
        [0, 1],
      ]);
    });
  });
});
