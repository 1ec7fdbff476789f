import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { registryHolderController } from './registry-holder.controller';
import {
  createValidation,
  deleteValidation,
  getByIdValidation,
  getPagedValidation,
  updateValidation,
} from './registry-holder.validation';

const router = Router();

// GET /registry-holder - List registry holders
router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => registryHolderController.getPaged(req, res, next));

// GET /registry-holder/:id - Get registry holder by id
router.get('/:id', getByIdValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => registryHolderController.getById(req, res, next));

// POST /registry-holder - Create registry holder
router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => registryHolderController.create(req, res, next));

// PUT /registry-holder - Update registry holder
router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => registryHolderController.update(req, res, next));

// DELETE /registry-holder/:id - Delete registry holder
router.delete('/:id', deleteValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => registryHolderController.delete(req, res, next));

export default router;
