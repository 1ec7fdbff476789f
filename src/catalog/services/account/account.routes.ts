import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { accountController } from './account.controller';
import {
  createValidation,
  getDefaultValidation,
  getPagedValidation,
  idValidation,
  unsetDefaultValidation,
  updateValidation,
} from './account.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.getPaged(req, res, next));

router.get('/default/:registryHolderId', getDefaultValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.getDefault(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.update(req, res, next));

router.delete('/:id/soft', idValidation, validateRequest, accountController.softDelete);

router.post('/:id/restore', idValidation, validateRequest, accountController.restore);

router.post('/:id/archive', idValidation, validateRequest, accountController.archive);

router.post('/:id/unarchive', idValidation, validateRequest, accountController.unarchive);

router.post('/:id/set-default', idValidation, validateRequest, accountController.setAsDefault);

router.post('/:id/unset-default', unsetDefaultValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => accountController.unsetAsDefault(req, res, next));

router.delete('/:id', idValidation, validateRequest, accountController.delete);

export default router;
