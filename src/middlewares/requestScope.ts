import { Request, Response, NextFunction } from 'express';

import { InvalidOperationError } from '../common/exceptions';

/**
 * Request carrying its per-request service scope and a signal that fires when
 * the client goes away before the response is finished
 */
export interface ScopedRequest<TScope> extends Request {
  scope?: TScope;
  abortSignal?: AbortSignal;
}

export type ScopeFactory<TScope> = () => TScope;

/**
 * Build a fresh scope (unit of work, repositories, services) for every request
 */
export const requestScope =
  <TScope>(createScope: ScopeFactory<TScope>) =>
  (req: ScopedRequest<TScope>, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    req.abortSignal = controller.signal;
    req.scope = createScope();
    next();
  };

export const getScope = <TScope>(req: ScopedRequest<TScope>): TScope => {
  if (req.scope === undefined) {
    throw new InvalidOperationError('Request scope is not initialized; requestScope middleware is missing');
  }
  return req.scope;
};
