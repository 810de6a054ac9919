/**
 * Middleware exports
 * Centralized middleware module
 */
export { errorHandler, notFoundHandler } from './errorHandler.js';
export { requestLogger } from './logger.js';
export { validateRequest, asyncHandler, type ParsedBodyRequest } from './validator.js';
export { securityMiddleware, loginRateLimiter } from './security.js';
export { requestTimeout } from './timeout.js';
export { scopedHandler, type ScopedResult } from './request-scope.js';
