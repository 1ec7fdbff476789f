import { NextFunction, Response } from 'express';

import { readBool, readNumber, readPageFilter, readString, sendResult } from '../../../common/http';
import { Result } from '../../../common/result';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { AccountService } from './account.service';
import { AccountFilter, CreateAccountDto, UpdateAccountDto } from './account.types';

type AccountCommand = (service: AccountService, id: string, signal?: AbortSignal) => Promise<Result>;

export class AccountController {
  /**
   * GET /api/v1/account/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/account?Page&ItemsPerPage&registryHolderId&...&creditLimitFrom&creditLimitTo
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: AccountFilter = {
        ...readPageFilter(req.query),
        registryHolderId: readString(req.query, 'registryHolderId'),
        accountTypeId: readString(req.query, 'accountTypeId'),
        currencyId: readString(req.query, 'currencyId'),
        bankId: readString(req.query, 'bankId'),
        nameContains: readString(req.query, 'nameContains'),
        isIncludeInBalance: readBool(req.query, 'isIncludeInBalance'),
        isDefault: readBool(req.query, 'isDefault'),
        isArchived: readBool(req.query, 'isArchived'),
        includeDeleted: readBool(req.query, 'includeDeleted') ?? false,
        creditLimitFrom: readNumber(req.query, 'creditLimitFrom'),
        creditLimitTo: readNumber(req.query, 'creditLimitTo'),
      };
      const result = await getScope(req).accountService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/account/default/:registryHolderId
   */
  async getDefault(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).accountService.getDefault(req.params.registryHolderId, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/account
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateAccountDto = req.body;
      const result = await getScope(req).accountService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/account
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateAccountDto = req.body;
      const result = await getScope(req).accountService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/account/:id/unset-default { replacementDefaultAccountId }
   */
  async unsetAsDefault(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const replacementId: string = req.body.replacementDefaultAccountId;
      const result = await getScope(req).accountService.unsetAsDefault(req.params.id, replacementId, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  // Single-id state changes share one handler shape
  softDelete = this.command((service, id, signal) => service.softDelete(id, signal));
  restore = this.command((service, id, signal) => service.restore(id, signal));
  delete = this.command((service, id, signal) => service.delete(id, signal));
  archive = this.command((service, id, signal) => service.archive(id, signal));
  unarchive = this.command((service, id, signal) => service.unarchive(id, signal));
  setAsDefault = this.command((service, id, signal) => service.setAsDefault(id, signal));

  private command(action: AccountCommand) {
    return async (req: CatalogRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const result = await action(getScope(req).accountService, req.params.id, req.abortSignal);
        sendResult(req, res, result);
      } catch (error) {
        next(error);
      }
    };
  }
}

export const accountController = new AccountController();
