import { NextFunction, Response } from 'express';

import { readBool, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { AccountTypeFilter, CreateAccountTypeDto, UpdateAccountTypeDto } from './account-type.types';

export class AccountTypeController {
  /**
   * GET /api/v1/account-type/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/account-type?Page&ItemsPerPage&codeContains&descriptionContains&includeDeleted
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: AccountTypeFilter = {
        ...readPageFilter(req.query),
        codeContains: readString(req.query, 'codeContains'),
        descriptionContains: readString(req.query, 'descriptionContains'),
        includeDeleted: readBool(req.query, 'includeDeleted') ?? false,
      };
      const result = await getScope(req).accountTypeService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/account-type/all
   */
  async getAll(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.getAll(req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Case-insensitive code lookup
   * GET /api/v1/account-type/exists/:code
   */
  async existsByCode(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.existsByCode(req.params.code, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/account-type
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateAccountTypeDto = req.body;
      const result = await getScope(req).accountTypeService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/account-type
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateAccountTypeDto = req.body;
      const result = await getScope(req).accountTypeService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/account-type/:id/soft
   */
  async softDelete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.softDelete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/account-type/:id/restore
   */
  async restore(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.restore(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/account-type/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountTypeService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const accountTypeController = new AccountTypeController();
