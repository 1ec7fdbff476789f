import { NextFunction, Response } from 'express';

import { readDate, readNumber, readPageFilter, readString, sendResult } from '../../../common/http';
import { getScope } from '../../../middlewares/requestScope';
import { TransactionsRequest } from '../../scope';
import { CreateTransferDto, TransferFilter, UpdateTransferDto } from './transfer.types';

const readFilter = (req: TransactionsRequest): TransferFilter => ({
  ...readPageFilter(req.query),
  fromAccountId: readString(req.query, 'fromAccountId'),
  toAccountId: readString(req.query, 'toAccountId'),
  dateFrom: readDate(req.query, 'dateFrom'),
  dateTo: readDate(req.query, 'dateTo'),
  fromAmountFrom: readNumber(req.query, 'fromAmountFrom'),
  fromAmountTo: readNumber(req.query, 'fromAmountTo'),
  toAmountFrom: readNumber(req.query, 'toAmountFrom'),
  toAmountTo: readNumber(req.query, 'toAmountTo'),
  descriptionContains: readString(req.query, 'descriptionContains'),
});

export class TransferController {
  async getById(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transferService.getById(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  async getPaged(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transferService.getPaged(readFilter(req), req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  async count(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transferService.count(readFilter(req), req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  async create(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateTransferDto = req.body;
      const result = await getScope(req).transferService.create(dto, req.abortSignal);
      sendResult(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  }

  async update(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: UpdateTransferDto = req.body;
      const result = await getScope(req).transferService.update(dto, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  async delete(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).transferService.delete(req.params.id, req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }
}

export const transferController = new TransferController();
