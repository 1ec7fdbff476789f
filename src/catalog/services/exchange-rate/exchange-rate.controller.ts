import { NextFunction, Response } from 'express';

import { readDate, readNumber, readPageFilter, readString, sendResult } from '../../../common/http';
import { requireArgument } from '../../../common/exceptions';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { CreateExchangeRateDto, ExchangeRateFilter, UpdateExchangeRateDto } from './exchange-rate.types';

export class ExchangeRateController {
  /**
   * GET /api/v1/exchange-rate/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).exchangeRateService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/exchange-rate?Page&ItemsPerPage&currencyId&dateFrom&dateTo&rateFrom&rateTo
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: ExchangeRateFilter = {
        ...readPageFilter(req.query),
        currencyId: readString(req.query, 'currencyId'),
        dateFrom: readDate(req.query, 'dateFrom'),
        dateTo: readDate(req.query, 'dateTo'),
        rateFrom: readNumber(req.query, 'rateFrom'),
        rateTo: readNumber(req.query, 'rateTo'),
      };
      const result = await getScope(req).exchangeRateService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/exchange-rate/exists?currencyId&date
   */
  async exists(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).exchangeRateService.existsForCurrencyAndDate(
        requireArgument(readString(req.query, 'currencyId'), 'currencyId'),
        requireArgument(readDate(req.query, 'date'), 'date'),
        req.abortSignal
      );
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Date of the latest stored rate, null when the currency has none
   * GET /api/v1/exchange-rate/last-date/:currencyId
   */
  async getLastRateDate(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).exchangeRateService.getLastRateDate(req.params.currencyId, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/exchange-rate
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateExchangeRateDto = req.body;
      const result = await getScope(req).exchangeRateService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/exchange-rate/range
   */
  async addRange(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const items: CreateExchangeRateDto[] = req.body;
      const result = await getScope(req).exchangeRateService.addRange(items, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/exchange-rate
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateExchangeRateDto = req.body;
      const result = await getScope(req).exchangeRateService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/exchange-rate/period?currencyId&dateFrom&dateTo
   */
  async deleteByPeriod(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).exchangeRateService.deleteByPeriod(
        {
          currencyId: requireArgument(readString(req.query, 'currencyId'), 'currencyId'),
          dateFrom: requireArgument(readDate(req.query, 'dateFrom'), 'dateFrom'),
          dateTo: requireArgument(readDate(req.query, 'dateTo'), 'dateTo'),
        },
        req.abortSignal
      );
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/exchange-rate/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).exchangeRateService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const exchangeRateController = new ExchangeRateController();
