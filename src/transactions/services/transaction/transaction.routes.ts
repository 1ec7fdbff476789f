import { NextFunction, Response, Router } from 'express';

import { validateRequest } from '../../../middlewares/validateRequest';
import { TransactionsRequest } from '../../scope';
import { transactionController } from './transaction.controller';
import {
  countValidation,
  createValidation,
  getPagedValidation,
  idValidation,
  updateValidation,
} from './transaction.validation';

const router = Router();

router.get('/', getPagedValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.getPaged(req, res, next));

router.get('/count', countValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.count(req, res, next));

router.get('/:id', idValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.getById(req, res, next));

router.post('/', createValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.create(req, res, next));

router.put('/', updateValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.update(req, res, next));

router.delete('/:id', idValidation, validateRequest, (req: TransactionsRequest, res: Response, next: NextFunction) => transactionController.delete(req, res, next));

export default router;
