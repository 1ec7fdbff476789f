/**
 * Catalog API Client
 *
 * Reads reference data from the catalog service over HTTP. Every failure
 * (transport, non-2xx status, unexpected payload) surfaces as ExternalApiError.
 */

import axios, { AxiosInstance } from 'axios';
import { Logger } from 'pino';
import { z } from 'zod';

import { config } from '../../../config';
import { ExternalApiError } from '../../../common/exceptions';
import { createServiceLogger } from '../../../observability/logger';
import {
  TransactionHolder,
  TransactionsAccount,
  TransactionsAccountType,
  TransactionsCategory,
  TransactionsCurrency,
} from '../reference';
import {
  catalogAccountSchema,
  catalogAccountTypeSchema,
  catalogCategorySchema,
  catalogCurrencySchema,
  catalogHolderSchema,
  successEnvelope,
} from './catalog.schemas';

export interface CatalogClient {
  getAllHolders(signal?: AbortSignal): Promise<TransactionHolder[]>;
  getHolderById(id: string, signal?: AbortSignal): Promise<TransactionHolder | null>;
  getAllAccountTypes(signal?: AbortSignal): Promise<TransactionsAccountType[]>;
  getAccountTypeById(id: string, signal?: AbortSignal): Promise<TransactionsAccountType | null>;
  getAllCurrencies(signal?: AbortSignal): Promise<TransactionsCurrency[]>;
  getCurrencyById(id: string, signal?: AbortSignal): Promise<TransactionsCurrency | null>;
  getAllAccounts(signal?: AbortSignal): Promise<TransactionsAccount[]>;
  getAccountById(id: string, signal?: AbortSignal): Promise<TransactionsAccount | null>;
  getAllCategories(signal?: AbortSignal): Promise<TransactionsCategory[]>;
  getCategoryById(id: string, signal?: AbortSignal): Promise<TransactionsCategory | null>;
}

interface Resource<S extends z.ZodTypeAny> {
  path: string;
  schema: S;
  /** Ask for soft-deleted rows too so deletions reach the local copy */
  softDeletable: boolean;
}

const RESOURCES = {
  holders: { path: '/api/v1/registry-holder', schema: catalogHolderSchema, softDeletable: false },
  accountTypes: { path: '/api/v1/account-type', schema: catalogAccountTypeSchema, softDeletable: true },
  currencies: { path: '/api/v1/currency', schema: catalogCurrencySchema, softDeletable: true },
  accounts: { path: '/api/v1/account', schema: catalogAccountSchema, softDeletable: true },
  categories: { path: '/api/v1/category', schema: catalogCategorySchema, softDeletable: true },
};

export const createCatalogHttpClient = (): AxiosInstance =>
  axios.create({
    baseURL: config.catalogApi.baseUrl,
    timeout: config.catalogApi.timeoutMs,
    headers: { Accept: 'application/json' },
    // Status codes are checked by the client itself
    validateStatus: () => true,
  });

export class CatalogApiClient implements CatalogClient {
  constructor(
    private readonly http: AxiosInstance = createCatalogHttpClient(),
    private readonly logger: Logger = createServiceLogger('catalog-api-client'),
    private readonly pageSize: number = config.catalogApi.pageSize
  ) {}

  getAllHolders(signal?: AbortSignal): Promise<TransactionHolder[]> {
    return this.fetchAll(RESOURCES.holders, signal);
  }

  getHolderById(id: string, signal?: AbortSignal): Promise<TransactionHolder | null> {
    return this.fetchById(RESOURCES.holders, id, signal);
  }

  getAllAccountTypes(signal?: AbortSignal): Promise<TransactionsAccountType[]> {
    return this.fetchAll(RESOURCES.accountTypes, signal);
  }

  getAccountTypeById(id: string, signal?: AbortSignal): Promise<TransactionsAccountType | null> {
    return this.fetchById(RESOURCES.accountTypes, id, signal);
  }

  getAllCurrencies(signal?: AbortSignal): Promise<TransactionsCurrency[]> {
    return this.fetchAll(RESOURCES.currencies, signal);
  }

  getCurrencyById(id: string, signal?: AbortSignal): Promise<TransactionsCurrency | null> {
    return this.fetchById(RESOURCES.currencies, id, signal);
  }

  getAllAccounts(signal?: AbortSignal): Promise<TransactionsAccount[]> {
    return this.fetchAll(RESOURCES.accounts, signal);
  }

  getAccountById(id: string, signal?: AbortSignal): Promise<TransactionsAccount | null> {
    return this.fetchById(RESOURCES.accounts, id, signal);
  }

  getAllCategories(signal?: AbortSignal): Promise<TransactionsCategory[]> {
    return this.fetchAll(RESOURCES.categories, signal);
  }

  getCategoryById(id: string, signal?: AbortSignal): Promise<TransactionsCategory | null> {
    return this.fetchById(RESOURCES.categories, id, signal);
  }

  private async fetchAll<S extends z.ZodTypeAny>(resource: Resource<S>, signal?: AbortSignal): Promise<z.output<S>[]> {
    const params: Record<string, string | number | boolean> = { Page: 1, ItemsPerPage: this.pageSize };
    if (resource.softDeletable) params.includeDeleted = true;

    const body = await this.get(resource.path, params, signal);
    if (body === null) {
      throw new ExternalApiError(`Catalog resource ${resource.path} not found`, { statusCode: 404 });
    }
    const records = this.parse(z.array(resource.schema), this.unwrap(body, resource.path), resource.path);
    this.logger.info({ path: resource.path, count: records.length }, 'Fetched catalog records');
    return records;
  }

  private async fetchById<S extends z.ZodTypeAny>(
    resource: Resource<S>,
    id: string,
    signal?: AbortSignal
  ): Promise<z.output<S> | null> {
    const path = `${resource.path}/${encodeURIComponent(id)}`;
    const body = await this.get(path, {}, signal);
    return body === null ? null : this.parse(resource.schema, this.unwrap(body, path), path);
  }

  /**
   * Response body of a GET; null on 404
   */
  private async get(
    path: string,
    params: Record<string, string | number | boolean>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const response = await this.http.get<unknown>(path, { params, signal }).catch((error: unknown) => {
      const message = axios.isAxiosError(error) ? error.message : 'Unknown error';
      this.logger.error({ err: error, path }, 'Catalog API request failed');
      throw new ExternalApiError(`Catalog API request ${path} failed: ${message}`, { cause: error });
    });

    if (response.status === 404) {
      return null;
    }
    if (response.status < 200 || response.status >= 300) {
      this.logger.error({ path, statusCode: response.status }, 'Catalog API returned an error status');
      throw new ExternalApiError(`Catalog API request ${path} returned status ${response.status}`, {
        statusCode: response.status,
      });
    }
    return response.data;
  }

  private unwrap(body: unknown, path: string): unknown {
    return this.parse(successEnvelope, body, path).data;
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.output<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.error({ path, issues: parsed.error.issues }, 'Catalog API returned an unexpected payload');
      throw new ExternalApiError(`Catalog API request ${path} returned an unexpected payload`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
