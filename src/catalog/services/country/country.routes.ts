import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { CatalogRequest } from '../../scope';
import { countryController } from './country.controller';
import {
  createValidation,
  deleteValidation,
  getByIdValidation,
  getPagedValidation,
  updateValidation,
} from './country.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => countryController.getPaged(req, res, next));

// Registered before /:id so "all" is not taken for an id
router.get('/all', (req: CatalogRequest, res: Response, next: NextFunction) => countryController.getAll(req, res, next));

router.get('/:id', getByIdValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => countryController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => countryController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => countryController.update(req, res, next));

router.delete('/:id', deleteValidation, validateRequest, (req: CatalogRequest, res: Response, next: NextFunction) => countryController.delete(req, res, next));

export default router;
