import { NextFunction, Request, Response } from 'express';

import { sendResult } from '../../../common/http';
import { ok } from '../../../common/result';
import { getScope } from '../../../middlewares/requestScope';
import { TransactionsRequest } from '../../scope';
import { ReplicationStatusProvider } from './replication.types';

export class ReplicationController {
  constructor(private readonly status: ReplicationStatusProvider) {}

  /**
   * Replicate every reference kind now and report per-kind outcomes
   * POST /api/v1/replication/run
   */
  async run(req: TransactionsRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await getScope(req).replicationService.replicateAll(req.abortSignal);
      sendResult(req, res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Worker state and job counts of the scheduled replication
   * GET /api/v1/replication/status
   */
  async getStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      sendResult(req, res, ok(await this.status()));
    } catch (error) {
      next(error);
    }
  }
}
