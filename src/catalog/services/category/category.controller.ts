import { NextFunction, Response } from 'express';

import { readBool, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { CategoryFilter, CreateCategoryDto, UpdateCategoryDto } from './category.types';

export class CategoryController {
  /**
   * Get category with its holder and parent
   * GET /api/v1/category/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).categoryService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/category?Page&ItemsPerPage&registryHolderId&nameContains&income&expense&parentId&includeDeleted
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: CategoryFilter = {
        ...readPageFilter(req.query),
        registryHolderId: readString(req.query, 'registryHolderId'),
        nameContains: readString(req.query, 'nameContains'),
        income: readBool(req.query, 'income'),
        expense: readBool(req.query, 'expense'),
        parentId: readString(req.query, 'parentId'),
        includeDeleted: readBool(req.query, 'includeDeleted') ?? false,
      };
      const result = await getScope(req).categoryService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/category/registry-holder/:registryHolderId
   */
  async getByRegistryHolderId(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).categoryService.getByRegistryHolderId(
        req.params.registryHolderId,
        req.abortSignal
      );
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/category
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateCategoryDto = req.body;
      const result = await getScope(req).categoryService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/category
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateCategoryDto = req.body;
      const result = await getScope(req).categoryService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/category/:id/soft
   */
  async softDelete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).categoryService.softDelete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/category/:id/restore
   */
  async restore(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).categoryService.restore(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/category/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).categoryService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const categoryController = new CategoryController();
