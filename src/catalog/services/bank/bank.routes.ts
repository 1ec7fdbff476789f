import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { bankController } from './bank.controller';
import {
  accountsCountValidation,
  createValidation,
  deleteValidation,
  getByIdValidation,
  getPagedValidation,
  updateValidation,
} from './bank.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.getPaged(req, res, next));

router.get('/:id', getByIdValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.getById(req, res, next));

router.get('/:id/accounts-count', accountsCountValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.getAccountsCount(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.update(req, res, next));

router.delete('/:id', deleteValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => bankController.delete(req, res, next));

export default router;
