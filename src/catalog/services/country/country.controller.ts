import { NextFunction, Response } from 'express';

import { readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { CatalogRequest } from '../../scope';
import { CountryFilter, CreateCountryDto, UpdateCountryDto } from './country.types';

export class CountryController {
  /**
   * GET /api/v1/country/:id
   */
  async getById(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).countryService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/country?Page&ItemsPerPage&nameContains
   */
  async getPaged(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter: CountryFilter = {
        ...readPageFilter(req.query),
        nameContains: readString(req.query, 'nameContains'),
      };
      const result = await getScope(req).countryService.getPaged(filter, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/country/all
   */
  async getAll(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).countryService.getAll(req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/country
   */
  async create(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateCountryDto = req.body;
      const result = await getScope(req).countryService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/country
   */
  async update(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateCountryDto = req.body;
      const result = await getScope(req).countryService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/country/:id
   */
  async delete(req: CatalogRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).countryService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const countryController = new CountryController();
