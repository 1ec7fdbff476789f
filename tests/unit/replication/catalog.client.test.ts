/**
 * Catalog API Client Unit Tests
 *
 * Drives the client through an in-process axios adapter.
 */

import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';

import { ExternalApiError } from '../../../src/common/exceptions';
import { CatalogApiClient } from '../../../src/transactions/services/replication';
import { ids } from '../../helpers';

interface CannedResponse {
  status: number;
  data?: unknown;
}

const createClient = (respond: (request: InternalAxiosRequestConfig) => CannedResponse | Error) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'http://catalog.test',
    validateStatus: () => true,
    adapter: async (request) => {
      requests.push(request);
      const response = respond(request);
      if (response instanceof Error) {
        throw response;
      }
      return { data: response.data, status: response.status, statusText: '', headers: {}, config: request };
    },
  });
  return { client: new CatalogApiClient(http, undefined, 50), requests };
};

const catalogAccount = {
  id: ids.account,
  registryHolderId: ids.holder,
  accountTypeId: ids.accountType,
  currencyId: ids.currency,
  bankId: null,
  name: 'Wallet',
  isDefault: true,
  isArchived: false,
  isDeleted: false,
  creditLimit: 250,
  createdAt: '2024-01-01T00:01:00.000Z',
};

describe('CatalogApiClient', () => {
  describe('list requests', () => {
    it('should unwrap the envelope and map catalog fields to the local shape', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: { success: true, data: [catalogAccount] } }));

      const accounts = await client.getAllAccounts();

      expect(accounts).toEqual([
        {
          id: ids.account,
          holderId: ids.holder,
          accountTypeId: ids.accountType,
          currencyId: ids.currency,
          creditLimit: 250,
          isArchived: false,
          isDeleted: false,
          createdAt: new Date('2024-01-01T00:01:00.000Z'),
        },
      ]);
      expect(requests[0].url).toBe('/api/v1/account');
    });

    it('should ask for soft-deleted records of soft-deletable resources', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: { success: true, data: [] } }));

      await client.getAllCurrencies();

      expect(requests[0].params).toEqual({ Page: 1, ItemsPerPage: 50, includeDeleted: true });
    });

    it('should not send includeDeleted for registry holders', async () => {
      const { client, requests } = createClient(() => ({ status: 200, data: { success: true, data: [] } }));

      await client.getAllHolders();

      expect(requests[0].url).toBe('/api/v1/registry-holder');
      expect(requests[0].params).toEqual({ Page: 1, ItemsPerPage: 50 });
    });

    it('should default optional text fields to empty strings', async () => {
      const { client } = createClient(() => ({
        status: 200,
        data: {
          success: true,
          data: [{ id: ids.accountType, code: 'CASH', description: null, isDeleted: false, createdAt: '2024-01-01T00:00:00.000Z' }],
        },
      }));

      const [accountType] = await client.getAllAccountTypes();

      expect(accountType.description).toBe('');
    });

    it('should fail when the list endpoint is missing', async () => {
      const { client } = createClient(() => ({ status: 404 }));

      const error = await client.getAllCategories().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExternalApiError);
      expect(error).toMatchObject({ statusCode: 404, message: 'Catalog resource /api/v1/category not found' });
    });
  });

  describe('single record requests', () => {
    it('should return null when the record does not exist', async () => {
      const { client, requests } = createClient(() => ({ status: 404 }));

      await expect(client.getAccountById(ids.missing)).resolves.toBeNull();
      expect(requests[0].url).toBe(`/api/v1/account/${ids.missing}`);
    });

    it('should map a single record', async () => {
      const { client } = createClient(() => ({
        status: 200,
        data: { success: true, data: { id: ids.holder, telegramId: 1001, role: 'User', createdAt: '2024-01-01T00:00:00.000Z' } },
      }));

      await expect(client.getHolderById(ids.holder)).resolves.toEqual({
        id: ids.holder,
        telegramId: 1001,
        role: 'User',
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
      });
    });
  });

  describe('failures', () => {
    it('should raise ExternalApiError on an error status', async () => {
      const { client } = createClient(() => ({ status: 500, data: { title: 'Internal Server Error' } }));

      const error = await client.getAllHolders().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExternalApiError);
      expect(error).toMatchObject({
        statusCode: 500,
        message: 'Catalog API request /api/v1/registry-holder returned status 500',
      });
    });

    it('should raise ExternalApiError on a payload of the wrong shape', async () => {
      const { client } = createClient(() => ({ status: 200, data: { success: true, data: [{ id: 'not-a-uuid' }] } }));

      await expect(client.getAllAccounts()).rejects.toThrow(
        'Catalog API request /api/v1/account returned an unexpected payload'
      );
    });

    it('should raise ExternalApiError when the body has no success envelope', async () => {
      const { client } = createClient(() => ({ status: 200, data: [catalogAccount] }));

      await expect(client.getAllAccounts()).rejects.toBeInstanceOf(ExternalApiError);
    });

    it('should raise ExternalApiError when the catalog is unreachable', async () => {
      const { client } = createClient(
        (request) => new AxiosError('connect ECONNREFUSED 127.0.0.1:5000', 'ECONNREFUSED', request)
      );

      await expect(client.getAllCurrencies()).rejects.toThrow(
        'Catalog API request /api/v1/currency failed: connect ECONNREFUSED 127.0.0.1:5000'
      );
    });
  });
});
