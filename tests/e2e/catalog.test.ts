import request from 'supertest';

import { ErrorCode } from '../../src/types/errors';
import {
  accountType,
  createInMemoryCatalogCollections,
  currency,
  getCatalogTestApp,
  holder,
  ids,
  InMemoryCatalogCollections,
} from '../helpers';

describe('Catalog Endpoints', () => {
  let collections: InMemoryCatalogCollections;
  let app: ReturnType<typeof getCatalogTestApp>;

  beforeEach(() => {
    collections = createInMemoryCatalogCollections();
    app = getCatalogTestApp(collections);
  });

  describe('Registry holder and account flow', () => {
    it('should create a holder and a default account, then read it back', async () => {
      const holderResponse = await request(app).post('/api/v1/registry-holder').send({ telegramId: 4242 });

      expect(holderResponse.status).toBe(201);
      expect(holderResponse.body.success).toBe(true);
      expect(holderResponse.body.data).toMatchObject({ telegramId: 4242, role: 'User' });
      const registryHolderId: string = holderResponse.body.data.id;

      collections.accountTypes.seed(accountType());
      collections.currencies.seed(currency());

      const accountResponse = await request(app).post('/api/v1/account').send({
        registryHolderId,
        accountTypeId: ids.accountType,
        currencyId: ids.currency,
        name: 'Wallet',
        isDefault: true,
      });

      expect(accountResponse.status).toBe(201);
      expect(accountResponse.body.data).toMatchObject({ name: 'Wallet', isDefault: true, bankId: null });

      const defaultResponse = await request(app).get(`/api/v1/account/default/${registryHolderId}`);

      expect(defaultResponse.status).toBe(200);
      expect(defaultResponse.body.data.id).toBe(accountResponse.body.data.id);
      expect(defaultResponse.body.data.currency.charCode).toBe('EUR');
    });

    it('should answer 409 problem details when archiving the default account', async () => {
      collections.registryHolders.seed(holder());
      collections.accountTypes.seed(accountType());
      collections.currencies.seed(currency());
      const created = await request(app).post('/api/v1/account').send({
        registryHolderId: ids.holder,
        accountTypeId: ids.accountType,
        currencyId: ids.currency,
        name: 'Wallet',
        isDefault: true,
      });
      const accountId: string = created.body.data.id;

      const response = await request(app).post(`/api/v1/account/${accountId}/archive`);

      expect(response.status).toBe(409);
      expect(response.headers['content-type']).toMatch(/^application\/problem\+json/);
      expect(response.body).toMatchObject({
        type: 'https://httpstatuses.io/409',
        title: 'Conflict',
        status: 409,
        detail: `Default account '${accountId}' cannot be archived or deleted.`,
        instance: `/api/v1/account/${accountId}/archive`,
        code: ErrorCode.ACCOUNT_CANNOT_ARCHIVE_DEFAULT,
      });
    });

    it('should answer success with null data for commands', async () => {
      const response = await request(app).delete(`/api/v1/account/${ids.missing}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, data: null });
    });
  });

  describe('Problem details', () => {
    it('should return 404 for a missing entity', async () => {
      const response = await request(app).get(`/api/v1/currency/${ids.missing}`);

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        status: 404,
        title: 'Not Found',
        code: ErrorCode.CURRENCY_NOT_FOUND,
        detail: `Currency with id '${ids.missing}' not found.`,
      });
    });

    it('should return field errors for invalid input and echo the correlation id', async () => {
      const response = await request(app)
        .post('/api/v1/currency')
        .set('x-correlation-id', 'trace-abc')
        .send({ name: 'Euro', charCode: 'EURO', numCode: '978' });

      expect(response.status).toBe(400);
      expect(response.headers['x-correlation-id']).toBe('trace-abc');
      expect(response.body).toEqual({
        type: 'https://httpstatuses.io/400',
        title: 'Bad Request',
        status: 400,
        detail: 'Validation failed',
        instance: '/api/v1/currency',
        traceId: 'trace-abc',
        code: ErrorCode.VALIDATION_ERROR,
        errors: { charCode: ['charCode must be at most 3 characters'] },
      });
    });

    it('should reject a malformed id parameter', async () => {
      const response = await request(app).get('/api/v1/account/not-a-uuid');

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual({ id: ['id must be a valid UUID'] });
    });

    it('should return 404 for an unknown route', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        code: ErrorCode.ROUTE_NOT_FOUND,
        detail: 'Route GET /api/v1/unknown not found',
      });
    });

    it('should map duplicate telegram ids to 409', async () => {
      collections.registryHolders.seed(holder());

      const response = await request(app).post('/api/v1/registry-holder').send({ telegramId: 1001 });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe(ErrorCode.REGISTRYHOLDER_TELEGRAMID_EXISTS);
    });
  });

  describe('Exchange rates', () => {
    beforeEach(() => {
      collections.currencies.seed(currency());
    });

    it('should bulk add rates and report the last rate date', async () => {
      const added = await request(app)
        .post('/api/v1/exchange-rate/range')
        .send([
          { currencyId: ids.currency, rateDate: '2024-03-01', rate: 1.08 },
          { currencyId: ids.currency, rateDate: '2024-03-04', rate: 1.09 },
          { currencyId: ids.currency, rateDate: '2024-03-04', rate: 1.1 },
        ]);

      expect(added.status).toBe(201);
      expect(added.body.data).toBe(2);

      const last = await request(app).get(`/api/v1/exchange-rate/last-date/${ids.currency}`);

      expect(last.status).toBe(200);
      expect(last.body.data).toBe('2024-03-04T00:00:00.000Z');
    });

    it('should delete rates of a period', async () => {
      await request(app)
        .post('/api/v1/exchange-rate/range')
        .send([
          { currencyId: ids.currency, rateDate: '2024-03-01', rate: 1.08 },
          { currencyId: ids.currency, rateDate: '2024-03-02', rate: 1.09 },
        ]);

      const response = await request(app)
        .delete('/api/v1/exchange-rate/period')
        .query({ currencyId: ids.currency, dateFrom: '2024-03-02', dateTo: '2024-03-31' });

      expect(response.status).toBe(200);
      expect(response.body.data).toBe(1);
      expect(collections.exchangeRates.size).toBe(1);
    });
  });

  describe('Numbers and booleans sent as strings', () => {
    beforeEach(() => {
      collections.registryHolders.seed(holder());
      collections.accountTypes.seed(accountType());
      collections.currencies.seed(currency());
    });

    const createAccount = (body: Record<string, unknown>) =>
      request(app)
        .post('/api/v1/account')
        .send({ registryHolderId: ids.holder, accountTypeId: ids.accountType, currencyId: ids.currency, ...body });

    it('should keep the current default when a new account is sent with isDefault "false"', async () => {
      const wallet = await createAccount({ name: 'Wallet', isDefault: true });

      const second = await createAccount({ name: 'Second', isDefault: 'false', creditLimit: '250.5' });

      expect(second.status).toBe(201);
      expect(second.body.data).toMatchObject({ name: 'Second', isDefault: false, creditLimit: 250.5 });

      const defaultResponse = await request(app).get(`/api/v1/account/default/${ids.holder}`);

      expect(defaultResponse.body.data.id).toBe(wallet.body.data.id);
      expect(defaultResponse.body.data.isDefault).toBe(true);
    });

    it('should move the default when an update sends isDefault "true"', async () => {
      await createAccount({ name: 'Wallet', isDefault: true });
      const second = await createAccount({ name: 'Second' });

      const updated = await request(app)
        .put('/api/v1/account')
        .send({ id: second.body.data.id, isDefault: 'true', isIncludeInBalance: 'false' });

      expect(updated.status).toBe(200);
      expect(updated.body.data).toMatchObject({ isDefault: true, isIncludeInBalance: false });

      const defaultResponse = await request(app).get(`/api/v1/account/default/${ids.holder}`);

      expect(defaultResponse.body.data.id).toBe(second.body.data.id);
    });

    it('should reject an exchange rate of "0" on create and update', async () => {
      const zero = await request(app)
        .post('/api/v1/exchange-rate')
        .send({ currencyId: ids.currency, rateDate: '2024-03-01', rate: '0' });

      expect(zero.status).toBe(400);
      expect(zero.body).toMatchObject({
        code: ErrorCode.EXCHANGERATE_VALUE_REQUIRED,
        detail: "Exchange rate Rate can't be empty.",
      });

      const created = await request(app)
        .post('/api/v1/exchange-rate')
        .send({ currencyId: ids.currency, rateDate: '2024-03-01', rate: '1.25' });

      expect(created.status).toBe(201);
      expect(created.body.data.rate).toBe(1.25);

      const updated = await request(app).put('/api/v1/exchange-rate').send({ id: created.body.data.id, rate: '0' });

      expect(updated.status).toBe(400);
      expect(updated.body.code).toBe(ErrorCode.EXCHANGERATE_VALUE_REQUIRED);
      expect(collections.exchangeRates.all()[0].rate).toBe(1.25);
    });

    it('should skip "0" rates in a bulk add', async () => {
      const added = await request(app)
        .post('/api/v1/exchange-rate/range')
        .send([
          { currencyId: ids.currency, rateDate: '2024-03-01', rate: '0' },
          { currencyId: ids.currency, rateDate: '2024-03-02', rate: '1.1' },
        ]);

      expect(added.status).toBe(201);
      expect(added.body.data).toBe(1);
      expect(collections.exchangeRates.all().map((rate) => rate.rate)).toEqual([1.1]);
    });
  });
});
