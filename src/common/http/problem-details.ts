import { STATUS_CODES } from 'http';
import { Request, Response } from 'express';

import { getCorrelationId } from '../../observability/log-context';
import { ErrorCode, ProblemDetails } from '../../types/errors';

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export const buildProblemDetails = (
  req: Request,
  status: number,
  code: ErrorCode,
  detail: string,
  errors?: Record<string, string[]>
): ProblemDetails => ({
  type: `https://httpstatuses.io/${status}`,
  title: STATUS_CODES[status] ?? 'Error',
  status,
  detail,
  instance: req.originalUrl,
  traceId: getCorrelationId() ?? 'unknown',
  code,
  ...(errors && { errors }),
});

export const sendProblem = (res: Response, problem: ProblemDetails): void => {
  res.status(problem.status).type(PROBLEM_CONTENT_TYPE).json(problem);
};
