/**
 * Middleware Exports
 */

export { errorHandler, notFoundHandler, ApiError } from './errorHandler';
export { validateRequest } from './validateRequest';
export { requestScope, getScope } from './requestScope';
export type { ScopedRequest, ScopeFactory } from './requestScope';
export { createApiLimiter } from './rateLimiter';
