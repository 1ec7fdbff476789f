/**
 * Error Handling Middleware
 *
 * Turns everything thrown past a controller into an RFC 9457 problem details
 * response. Expected business failures never get here; they are written by
 * sendResult. What does arrive is validation failures (ApiError), programming
 * errors (ArgumentError, InvalidOperationError), aborted requests and bugs.
 */

import { Request, Response, NextFunction } from 'express';

import { ArgumentError, InvalidOperationError } from '../common/exceptions';
import { buildProblemDetails, sendProblem } from '../common/http/problem-details';
import { config } from '../config';
import { logger } from '../observability/logger';
import { getCorrelationId } from '../observability/log-context';
import { ErrorCode } from '../types/errors';

/**
 * Operational error raised by the HTTP layer itself
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly errorCode: ErrorCode;
  readonly validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: { statusCode?: number; validationErrors?: Record<string, string[]> }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode ?? 500;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { statusCode: 400, validationErrors });
  }

  static rateLimitExceeded(message = 'Too many requests, please try again later'): ApiError {
    return new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, message, { statusCode: 429 });
  }
}

interface ErrorMapping {
  status: number;
  code: ErrorCode;
  errors?: Record<string, string[]>;
}

/**
 * Errors raised by body-parser carry a client status and `expose: true`
 */
const isClientHttpError = (err: Error): err is Error & { status: number } => {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 && Reflect.get(err, 'expose') === true;
};

const mapError = (err: Error): ErrorMapping => {
  if (err instanceof ApiError) {
    return { status: err.statusCode, code: err.errorCode, errors: err.validationErrors };
  }
  if (err instanceof ArgumentError) {
    return { status: 400, code: ErrorCode.INVALID_ARGUMENT };
  }
  if (err instanceof InvalidOperationError) {
    return { status: 422, code: ErrorCode.INVALID_OPERATION };
  }
  if (err.name === 'AbortError') {
    // nginx convention for "client closed request"
    return { status: 499, code: ErrorCode.REQUEST_ABORTED };
  }
  if (isClientHttpError(err)) {
    return { status: err.status, code: ErrorCode.VALIDATION_ERROR };
  }
  return { status: 500, code: ErrorCode.INTERNAL_ERROR };
};

/**
 * Main error handler middleware
 */
export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, code, errors } = mapError(err);
  const logPayload = {
    correlationId: getCorrelationId(),
    errorCode: code,
    statusCode: status,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
  };

  if (status >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request failed: ${err.message}`);
  }

  const detail = config.isProduction && status >= 500 ? 'Internal server error' : err.message || 'An error occurred';

  sendProblem(res, buildProblemDetails(req, status, code, detail, errors));
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  sendProblem(
    res,
    buildProblemDetails(req, 404, ErrorCode.ROUTE_NOT_FOUND, `Route ${req.method} ${req.path} not found`)
  );
};
