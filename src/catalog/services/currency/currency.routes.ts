import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { currencyController } from './currency.controller';
import { createValidation, getPagedValidation, idValidation, updateValidation } from './currency.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.getPaged(req, res, next));

router.get('/all', (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.getAll(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.update(req, res, next));

router.delete('/:id/soft', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.softDelete(req, res, next));

router.post('/:id/restore', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.restore(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => currencyController.delete(req, res, next));

export default router;
