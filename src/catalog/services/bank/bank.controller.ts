import { NextFunction, Response } from 'express';

import { readBool, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { BankFilter, CreateBankDto, UpdateBankDto } from './bank.types';

export class BankController {
  /**
   * Get bank by id, with its country when includeRelated=true
   * GET /api/v1/bank/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const includeRelated = readBool(req.query, 'includeRelated') ?? false;
      const result = await getScope(req).bankService.getById(req.params.id, includeRelated, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/bank?Page&ItemsPerPage&countryId&nameContains
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: BankFilter = {
        ...readPageFilter(req.query),
        countryId: readString(req.query, 'countryId'),
        nameContains: readString(req.query, 'nameContains'),
      };
      const result = await getScope(req).bankService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Number of accounts opened in the bank
   * GET /api/v1/bank/:id/accounts-count?includeArchived&includeDeleted
   */
  async getAccountsCount(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).bankService.getAccountsCount(
        req.params.id,
        {
          includeArchived: readBool(req.query, 'includeArchived') ?? false,
          includeDeleted: readBool(req.query, 'includeDeleted') ?? false,
        },
        req.abortSignal
      );
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/bank
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateBankDto = req.body;
      const result = await getScope(req).bankService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/bank
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateBankDto = req.body;
      const result = await getScope(req).bankService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/bank/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).bankService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const bankController = new BankController();
