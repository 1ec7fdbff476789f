import { Request, Response } from 'express';

import { domainErrorsTotal } from '../../observability/metrics';
import { SuccessResponse } from '../../types/errors';
import { Result } from '../result';
import { buildProblemDetails, sendProblem } from './problem-details';

/**
 * Write a service Result to the response: the success envelope with the given
 * status, or the DomainError as problem details.
 */
export const sendResult = <T>(req: Request, res: Response, result: Result<T>, successStatus = 200): void => {
  if (!result.ok) {
    const { error } = result;
    domainErrorsTotal.inc({ code: error.code });
    sendProblem(res, buildProblemDetails(req, error.statusCode, error.code, error.message));
    return;
  }

  const body: SuccessResponse<T | null> = {
    success: true,
    data: result.value === undefined ? null : result.value,
  };
  res.status(successStatus).json(body);
};
