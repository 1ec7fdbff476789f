import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { TransactionsRequest } from '../../scope';
import { transferController } from './transfer.controller';
import {
  countValidation,
  createValidation,
  getPagedValidation,
  idValidation,
  updateValidation,
} from './transfer.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.getPaged(req, res, next));

router.get('/count', countValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.count(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.update(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transferController.delete(req, res, next));

export default router;
