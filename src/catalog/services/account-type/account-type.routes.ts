import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { accountTypeController } from './account-type.controller';
import {
  createValidation,
  existsByCodeValidation,
  getPagedValidation,
  idValidation,
  updateValidation,
} from './account-type.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.getPaged(req, res, next));

router.get('/all', (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.getAll(req, res, next));

router.get('/exists/:code', existsByCodeValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.existsByCode(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.update(req, res, next));

router.delete('/:id/soft', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.softDelete(req, res, next));

router.post('/:id/restore', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.restore(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountTypeController.delete(req, res, next));

export default router;
