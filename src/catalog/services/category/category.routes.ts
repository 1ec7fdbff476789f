import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { categoryController } from './category.controller';
import {
  byRegistryHolderValidation,
  createValidation,
  getPagedValidation,
  idValidation,
  updateValidation,
} from './category.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.getPaged(req, res, next));

router.get('/registry-holder/:registryHolderId', byRegistryHolderValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.getByRegistryHolderId(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.update(req, res, next));

router.delete('/:id/soft', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.softDelete(req, res, next));

router.post('/:id/restore', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.restore(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => categoryController.delete(req, res, next));

export default router;
