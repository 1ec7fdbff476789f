import { NextFunction, Response } from 'express';

import { readInt, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { Role } from '../../../types/role';
import { CatalogRequest } from '../../scope';
import { CreateRegistryHolderDto, RegistryHolderFilter, UpdateRegistryHolderDto } from './registry-holder.types';

const readRole = (value: string | undefined): Role | undefined =>
  Object.values(Role).find((role) => role === value);

export class RegistryHolderController {
  /**
   * Get registry holder by id
   * GET /api/v1/registry-holder/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { registryHolderService } = getScope(req);
      const result = await registryHolderService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * List registry holders
   * GET /api/v1/registry-holder?Page&ItemsPerPage&telegramId&role
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { registryHolderService } = getScope(req);
      const filter: RegistryHolderFilter = {
        ...readPageFilter(req.query),
        telegramId: readInt(req.query, 'telegramId'),
        role: readRole(readString(req.query, 'role')),
      };
      const result = await registryHolderService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/registry-holder
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { registryHolderService } = getScope(req);
      const dto: CreateRegistryHolderDto = req.body;
      const result = await registryHolderService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/registry-holder
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { registryHolderService } = getScope(req);
      const dto: UpdateRegistryHolderDto = req.body;
      const result = await registryHolderService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/registry-holder/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { registryHolderService } = getScope(req);
      const result = await registryHolderService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const registryHolderController = new RegistryHolderController();
