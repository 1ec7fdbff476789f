/**
 * Reference Data Service Integration Tests
 *
 * Currencies, countries and banks through request scopes over in-memory collections.
 */

import { createCatalogScope } from '../../../src/catalog/scope';
import { TransactionRunner } from '../../../src/common/persistence/transaction-runner';
import { ErrorCode } from '../../../src/types/errors';
import {
  account,
  catalogScope,
  createdAt,
  createInMemoryCatalogCollections,
  currency,
  ids,
  InMemoryCatalogCollections,
} from '../../helpers';

const countryId = 'c0c0c0c0-c0c0-4c0c-8c0c-c0c0c0c0c0c0';
const bankId = 'b0b0b0b0-b0b0-4b0b-8b0b-b0b0b0b0b0b0';
const rateId = 'e0e0e0e0-e0e0-4e0e-8e0e-e0e0e0e0e0e0';

describe('Reference Data Service Integration Tests', () => {
  let collections: InMemoryCatalogCollections;
  let commits: number;

  const countingRunner: TransactionRunner = {
    run: async (work) => {
      commits++;
      await work();
    },
  };
  const scope = () => catalogScope(collections);

  beforeEach(() => {
    collections = createInMemoryCatalogCollections();
    commits = 0;
    collections.currencies.seed(currency());
    collections.countries.seed({ id: countryId, name: 'Georgia', createdAt: createdAt(0) });
  });

  describe('Currency', () => {
    it('should treat char codes as unique regardless of case', async () => {
      const result = await scope().currencyService.create({ name: 'Euro again', charCode: 'eur', numCode: '999' });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.CURRENCY_CHARCODE_EXISTS,
          statusCode: 409,
          message: "Currency with CharCode 'eur' already exists.",
        }),
      });
    });

    it('should reject a duplicate numeric code', async () => {
      const result = await scope().currencyService.create({ name: 'Lari', charCode: 'GEL', numCode: '978' });

      expect(!result.ok && result.error.code).toBe(ErrorCode.CURRENCY_NUMCODE_EXISTS);
    });

    it('should require every code', async () => {
      const result = await scope().currencyService.create({ name: 'Lari', charCode: ' ', numCode: '981' });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({ code: ErrorCode.CURRENCY_CHARCODE_REQUIRED, message: "Currency CharCode can't be empty." }),
      });
    });

    it('should refuse to delete a currency used by an account', async () => {
      collections.accounts.seed(account());

      const result = await scope().currencyService.delete(ids.currency);

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.CURRENCY_IN_USE,
          message: `Cannot delete currency '${ids.currency}' because it is used in other entities`,
        }),
      });
      expect(collections.currencies.size).toBe(1);
    });

    it('should keep its own char code on update', async () => {
      const result = await scope().currencyService.update({ id: ids.currency, charCode: 'EUR', sign: 'E' });

      expect(result.ok).toBe(true);
      expect(collections.currencies.all()[0]).toMatchObject({ charCode: 'EUR', sign: 'E' });
    });
  });

  describe('Country', () => {
    it('should not commit an update that changes nothing', async () => {
      const result = await createCatalogScope(collections, countingRunner).countryService.update({
        id: countryId,
        name: '  Georgia ',
      });

      expect(result.ok).toBe(true);
      expect(commits).toBe(0);
    });

    it('should reject a name taken by another country', async () => {
      collections.countries.seed({ id: ids.missing, name: 'Armenia', createdAt: createdAt(1) });

      const result = await scope().countryService.update({ id: ids.missing, name: 'GEORGIA' });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({ code: ErrorCode.COUNTRY_NAME_EXISTS, message: "Country with Name 'GEORGIA' already exists." }),
      });
    });

    it('should refuse to delete a country that has banks', async () => {
      collections.banks.seed({ id: bankId, countryId, name: 'TBC', createdAt: createdAt(1) });

      const result = await scope().countryService.delete(countryId);

      expect(!result.ok && result.error.code).toBe(ErrorCode.COUNTRY_IN_USE);
    });

    it('should delete an unused country in one commit', async () => {
      const result = await createCatalogScope(collections, countingRunner).countryService.delete(countryId);

      expect(result.ok).toBe(true);
      expect(commits).toBe(1);
      expect(collections.countries.size).toBe(0);
    });
  });

  describe('Bank', () => {
    it('should reject an unknown country', async () => {
      const result = await scope().bankService.create({ countryId: ids.missing, name: 'TBC' });

      expect(!result.ok && result.error.code).toBe(ErrorCode.BANK_COUNTRY_NOT_FOUND);
      expect(collections.banks.size).toBe(0);
    });

    it('should create a bank of a known country', async () => {
      const result = await scope().bankService.create({ countryId, name: ' TBC ' });

      expect(result.ok).toBe(true);
      expect(collections.banks.all()[0]).toMatchObject({ countryId, name: 'TBC' });
    });
  });

  describe('Exchange rate', () => {
    const rateOn = (day: number, rate = 1.1) => ({
      id: rateId.replace(/.$/, String(day)),
      currencyId: ids.currency,
      rateDate: new Date(Date.UTC(2024, 2, day)),
      rate,
      createdAt: createdAt(day),
    });

    it('should store the rate date as UTC midnight', async () => {
      const result = await scope().exchangeRateService.create({
        currencyId: ids.currency,
        rateDate: '2024-03-05T17:45:00Z',
        rate: 1.09,
      });

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.rateDate).toEqual(new Date('2024-03-05T00:00:00.000Z'));
    });

    it('should reject a second rate for the same currency and day', async () => {
      collections.exchangeRates.seed(rateOn(5));

      const result = await scope().exchangeRateService.create({
        currencyId: ids.currency,
        rateDate: '2024-03-05T08:00:00Z',
        rate: 1.2,
      });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.EXCHANGERATE_EXISTS,
          message: `Exchange rate with CurrencyId:RateDate '${ids.currency}:2024-03-05' already exists.`,
        }),
      });
    });

    it('should skip invalid, unknown, repeated and existing items in a bulk add', async () => {
      collections.exchangeRates.seed(rateOn(1));

      const result = await createCatalogScope(collections, countingRunner).exchangeRateService.addRange([
        { currencyId: ids.currency, rateDate: '2024-03-01', rate: 1.1 },
        { currencyId: ids.currency, rateDate: '2024-03-02', rate: 1.2 },
        { currencyId: ids.currency, rateDate: '2024-03-02T12:00:00Z', rate: 1.3 },
        { currencyId: ids.missing, rateDate: '2024-03-02', rate: 1.4 },
        { currencyId: ids.currency, rateDate: 'not a date', rate: 1.5 },
        { currencyId: ids.currency, rateDate: '2024-03-03', rate: 0 },
        { currencyId: ids.currency, rateDate: '2024-03-04', rate: 1.6 },
      ]);

      expect(result).toEqual({ ok: true, value: 2 });
      expect(commits).toBe(1);
      expect(collections.exchangeRates.all().map((rate) => rate.rate)).toEqual(expect.arrayContaining([1.1, 1.2, 1.6]));
      expect(collections.exchangeRates.size).toBe(3);
    });

    it('should not commit a bulk add with nothing to insert', async () => {
      const result = await createCatalogScope(collections, countingRunner).exchangeRateService.addRange([
        { currencyId: ids.missing, rateDate: '2024-03-02', rate: 1.4 },
      ]);

      expect(result).toEqual({ ok: true, value: 0 });
      expect(commits).toBe(0);
    });

    it('should return the latest rate date of a currency', async () => {
      collections.exchangeRates.seed(rateOn(3), rateOn(9), rateOn(6));

      await expect(scope().exchangeRateService.getLastRateDate(ids.currency)).resolves.toEqual({
        ok: true,
        value: new Date(Date.UTC(2024, 2, 9)),
      });
      await expect(scope().exchangeRateService.getLastRateDate(ids.missing)).resolves.toEqual({ ok: true, value: null });
    });

    it('should delete the rates inside a period, bounds included', async () => {
      collections.exchangeRates.seed(rateOn(1), rateOn(2), rateOn(3), rateOn(4));

      const result = await scope().exchangeRateService.deleteByPeriod({
        currencyId: ids.currency,
        dateFrom: new Date(Date.UTC(2024, 2, 2)),
        dateTo: new Date(Date.UTC(2024, 2, 3)),
      });

      expect(result).toEqual({ ok: true, value: 2 });
      expect(collections.exchangeRates.all().map((rate) => rate.rateDate.getUTCDate())).toEqual([1, 4]);
    });

    it('should treat deleting a missing rate as done', async () => {
      await expect(scope().exchangeRateService.delete(ids.missing)).resolves.toEqual({ ok: true, value: undefined });
    });
  });
});
