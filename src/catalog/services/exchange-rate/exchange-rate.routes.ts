import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { exchangeRateController } from './exchange-rate.controller';
import {
  addRangeValidation,
  createValidation,
  deleteByPeriodValidation,
  existsValidation,
  getPagedValidation,
  idValidation,
  lastDateValidation,
  updateValidation,
} from './exchange-rate.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.getPaged(req, res, next));

router.get('/exists', existsValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.exists(req, res, next));

router.get('/last-date/:currencyId', lastDateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.getLastRateDate(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.create(req, res, next));

router.post('/range', addRangeValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.addRange(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.update(req, res, next));

router.delete('/period', deleteByPeriodValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.deleteByPeriod(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => exchangeRateController.delete(req, res, next));

export default router;
