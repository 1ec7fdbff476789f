import { NextFunction, Response } from 'express';

import { readBool, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { CreateCurrencyDto, CurrencyFilter, UpdateCurrencyDto } from './currency.types';

export class CurrencyController {
  /**
   * GET /api/v1/currency/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).currencyService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/currency?Page&ItemsPerPage&nameContains&charCode&numCode&includeDeleted
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: CurrencyFilter = {
        ...readPageFilter(req.query),
        nameContains: readString(req.query, 'nameContains'),
        charCode: readString(req.query, 'charCode'),
        numCode: readString(req.query, 'numCode'),
        includeDeleted: readBool(req.query, 'includeDeleted') ?? false,
      };
      const result = await getScope(req).currencyService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/currency/all
   */
  async getAll(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).currencyService.getAll(req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/currency
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateCurrencyDto = req.body;
      const result = await getScope(req).currencyService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/currency
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateCurrencyDto = req.body;
      const result = await getScope(req).currencyService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/currency/:id/soft
   */
  async softDelete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).currencyService.softDelete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/currency/:id/restore
   */
  async restore(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).currencyService.restore(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/currency/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).currencyService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const currencyController = new CurrencyController();
