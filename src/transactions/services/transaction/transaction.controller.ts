import { NextFunction, Response } from 'express';

import { readDate, readNumber, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { TransactionsRequest } from '../../scope';
import { CreateTransactionDto, TransactionFilter, UpdateTransactionDto } from './transaction.types';

const readFilter = (req: TransactionsRequest): TransactionFilter => ({
  ...readPageFilter(req.query),
  dateFrom: readDate(req.query, 'dateFrom'),
  dateTo: readDate(req.query, 'dateTo'),
  accountId: readString(req.query, 'accountId'),
  categoryId: readString(req.query, 'categoryId'),
  amountFrom: readNumber(req.query, 'amountFrom'),
  amountTo: readNumber(req.query, 'amountTo'),
  descriptionContains: readString(req.query, 'descriptionContains'),
});

export class TransactionController {
  /**
   * GET /api/v1/transaction/:id
   */
  async getById(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transactionService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/transaction?Page&ItemsPerPage&dateFrom&dateTo&accountId&categoryId&amountFrom&amountTo&descriptionContains
   */
  async getPaged(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transactionService.getPaged(readFilter(req), req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Number of transactions matching the filter, paging ignored
   * GET /api/v1/transaction/count
   */
  async count(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transactionService.count(readFilter(req), req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/transaction
   */
  async create(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateTransactionDto = req.body;
      const result = await getScope(req).transactionService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/transaction
   */
  async update(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateTransactionDto = req.body;
      const result = await getScope(req).transactionService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/transaction/:id
   */
  async delete(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transactionService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const transactionController = new TransactionController();
