/**
 * Rate Limiting Middleware
 *
 * One limiter for the /api routes, keyed by client IP, using the in-memory
 * store of express-rate-limit. Each service instance counts on its own.
 *
 * Set RATE_LIMIT_DISABLED=true to turn limiting off (load tests).
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { logger } from '../observability/logger';
import { ApiError } from './errorHandler';

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

export const createApiLimiter = (): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }

  return rateLimit({
    windowMs: RATE_LIMIT_CONFIG.api.windowMs,
    limit: RATE_LIMIT_CONFIG.api.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    // Rendered as problem details by the error handler
    handler: (_req, _res, next, options) => {
      next(ApiError.rateLimitExceeded(String(options.message)));
    },
    message: 'API rate limit exceeded, please slow down',
  });
};
