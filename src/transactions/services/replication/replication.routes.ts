import { NextFunction, Request, Response, Router } from 'express';

import { TransactionsRequest } from '../../scope';
import { ReplicationController } from './replication.controller';
import { ReplicationStatusProvider } from './replication.types';

export const createReplicationRoutes = (status: ReplicationStatusProvider): Router => {
  const router = Router();
  const controller = new ReplicationController(status);

  router.get('/status', (req: Request, res: Response, next: NextFunction) => controller.getStatus(req, res, next));
  router.post('/run', (req: TransactionsRequest, res: Response, next: NextFunction) => controller.run(req, res, next));

  return router;
};
