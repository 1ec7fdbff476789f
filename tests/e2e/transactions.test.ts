import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import { Role } from '../../src/types/role';
import {
  createdAt,
  createInMemoryTransactionsCollections,
  FakeCatalogClient,
  getTransactionsTestApp,
  healthyDependencies,
  ids,
  InMemoryTransactionsCollections,
  replicaAccount,
  replicaCategory,
} from '../helpers';

describe('Transactions Endpoints', () => {
  let collections: InMemoryTransactionsCollections;
  let catalog: FakeCatalogClient;
  let app: ReturnType<typeof getTransactionsTestApp>;

  beforeEach(() => {
    collections = createInMemoryTransactionsCollections();
    catalog = new FakeCatalogClient();
    catalog.holders = [{ id: ids.holder, telegramId: 1001, role: Role.User, createdAt: createdAt(0) }];
    catalog.accounts = [replicaAccount(), replicaAccount({ id: ids.otherAccount, createdAt: createdAt(2) })];
    catalog.categories = [replicaCategory()];
    app = getTransactionsTestApp(collections, catalog);
  });

  describe('POST /api/v1/replication/run', () => {
    it('should replicate every kind and report the outcome', async () => {
      const response = await request(app).post('/api/v1/replication/run');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: [
          { kind: 'holders', success: true, inserted: 1, updated: 0 },
          { kind: 'accountTypes', success: true, inserted: 0, updated: 0 },
          { kind: 'currencies', success: true, inserted: 0, updated: 0 },
          { kind: 'accounts', success: true, inserted: 2, updated: 0 },
          { kind: 'categories', success: true, inserted: 1, updated: 0 },
        ],
      });
      expect(collections.accounts.size).toBe(2);
    });

    it('should report failed kinds without failing the request', async () => {
      catalog.failing.add('holders');

      const response = await request(app).post('/api/v1/replication/run');

      expect(response.status).toBe(200);
      expect(response.body.data[0]).toEqual({
        kind: 'holders',
        success: false,
        inserted: 0,
        updated: 0,
        error: {
          code: ErrorCode.REPLICATION_EXTERNAL_API_FAILED,
          message: 'Failed to replicate holders from the catalog API: connect ECONNREFUSED 127.0.0.1:5000',
        },
      });
    });
  });

  describe('GET /api/v1/replication/status', () => {
    it('should report the queue and worker state', async () => {
      const statusApp = getTransactionsTestApp(collections, catalog, healthyDependencies, async () => ({
        enabled: true,
        workerRunning: true,
        queue: { waiting: 0, active: 1, completed: 24, failed: 0, delayed: 1 },
      }));

      const response = await request(statusApp).get('/api/v1/replication/status');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: {
          enabled: true,
          workerRunning: true,
          queue: { waiting: 0, active: 1, completed: 24, failed: 0, delayed: 1 },
        },
      });
    });

    it('should report replication as disabled when the job is turned off', async () => {
      const response = await request(app).get('/api/v1/replication/status');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ enabled: false, workerRunning: false, queue: null });
    });
  });

  describe('Transactions', () => {
    beforeEach(async () => {
      await request(app).post('/api/v1/replication/run');
    });

    it('should create, list and count transactions', async () => {
      const created = await request(app).post('/api/v1/transaction').send({
        date: '2024-02-10T09:30:00Z',
        accountId: ids.account,
        categoryId: ids.category,
        amount: -12.5,
        description: 'Coffee',
      });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({
        date: '2024-02-10T09:30:00.000Z',
        accountId: ids.account,
        amount: -12.5,
        description: 'Coffee',
      });

      const list = await request(app).get('/api/v1/transaction').query({ accountId: ids.account, amountTo: 0 });
      const count = await request(app).get('/api/v1/transaction/count').query({ descriptionContains: 'coffee' });

      expect(list.body.data.map((item: { id: string }) => item.id)).toEqual([created.body.data.id]);
      expect(count.body).toEqual({ success: true, data: 1 });
    });

    it('should reject a zero amount with 400 problem details', async () => {
      const response = await request(app).post('/api/v1/transaction').send({
        date: '2024-02-10',
        accountId: ids.account,
        categoryId: ids.category,
        amount: 0,
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        code: ErrorCode.TRANSACTION_INVALID_AMOUNT,
        detail: 'Transaction amount must not be zero.',
      });
    });

    it('should reject an account the catalog does not know', async () => {
      const response = await request(app).post('/api/v1/transaction').send({
        date: '2024-02-10',
        accountId: ids.missing,
        categoryId: ids.category,
        amount: 5,
      });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe(ErrorCode.TRANSACTION_ACCOUNT_NOT_FOUND);
    });

    it('should convert a string amount and still reject "0"', async () => {
      const zero = await request(app).post('/api/v1/transaction').send({
        date: '2024-02-10',
        accountId: ids.account,
        categoryId: ids.category,
        amount: '0',
      });

      expect(zero.status).toBe(400);
      expect(zero.body.code).toBe(ErrorCode.TRANSACTION_INVALID_AMOUNT);
      expect(collections.transactions.size).toBe(0);

      const created = await request(app).post('/api/v1/transaction').send({
        date: '2024-02-10',
        accountId: ids.account,
        categoryId: ids.category,
        amount: '-7.25',
      });

      expect(created.status).toBe(201);
      expect(created.body.data.amount).toBe(-7.25);

      const updated = await request(app).put('/api/v1/transaction').send({ id: created.body.data.id, amount: '0' });

      expect(updated.status).toBe(400);
      expect(updated.body.code).toBe(ErrorCode.TRANSACTION_INVALID_AMOUNT);
      expect(collections.transactions.all()[0].amount).toBe(-7.25);
    });

    it('should validate the request body', async () => {
      const response = await request(app).post('/api/v1/transaction').send({ accountId: ids.account });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(Object.keys(response.body.errors).sort()).toEqual(['amount', 'categoryId', 'date']);
    });
  });

  describe('Transfers', () => {
    beforeEach(async () => {
      await request(app).post('/api/v1/replication/run');
    });

    it('should create a transfer and read it by id', async () => {
      const created = await request(app).post('/api/v1/transfer').send({
        date: '2024-02-11',
        fromAccountId: ids.account,
        toAccountId: ids.otherAccount,
        fromAmount: 100,
        toAmount: 100,
      });

      expect(created.status).toBe(201);

      const fetched = await request(app).get(`/api/v1/transfer/${created.body.data.id}`);

      expect(fetched.status).toBe(200);
      expect(fetched.body.data).toMatchObject({ fromAccountId: ids.account, toAccountId: ids.otherAccount, description: '' });
    });

    it('should convert string amounts and still reject "0"', async () => {
      const zero = await request(app).post('/api/v1/transfer').send({
        date: '2024-02-11',
        fromAccountId: ids.account,
        toAccountId: ids.otherAccount,
        fromAmount: '0',
        toAmount: '10',
      });

      expect(zero.status).toBe(400);
      expect(zero.body.code).toBe(ErrorCode.TRANSFER_INVALID_AMOUNT);

      const created = await request(app).post('/api/v1/transfer').send({
        date: '2024-02-11',
        fromAccountId: ids.account,
        toAccountId: ids.otherAccount,
        fromAmount: '50',
        toAmount: '45.5',
      });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ fromAmount: 50, toAmount: 45.5 });

      const updated = await request(app).put('/api/v1/transfer').send({ id: created.body.data.id, toAmount: '0' });

      expect(updated.status).toBe(400);
      expect(updated.body.code).toBe(ErrorCode.TRANSFER_INVALID_AMOUNT);
      expect(collections.transfers.all()[0].toAmount).toBe(45.5);
    });

    it('should refuse a transfer to the same account', async () => {
      const response = await request(app).post('/api/v1/transfer').send({
        date: '2024-02-11',
        fromAccountId: ids.account,
        toAccountId: ids.account,
        fromAmount: 100,
        toAmount: 100,
      });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCode.TRANSFER_SAME_ACCOUNT);
    });
  });
});
