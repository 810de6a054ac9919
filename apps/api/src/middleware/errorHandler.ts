import { Request, Response, NextFunction } from 'express';
import { config } from '../config/index.js';
import {
  AppError,
  NotFoundError,
  PoolExhaustedError,
  ValidationError,
  formatErrorResponse,
} from '../utils/errors.js';
import { logger, logHelpers } from '../utils/logger.js';

/**
 * express.json() reports an unparseable body as a SyntaxError carrying
 * `type: 'entity.parse.failed'`.
 */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';
}

/**
 * Global error handler
 * Maps the error taxonomy to status codes and the standard error body.
 */
export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  const error = isBodyParseError(err) ? new ValidationError('Request body is not valid JSON') : err;
  const statusCode = error instanceof AppError ? error.statusCode : 500;

  if (statusCode >= 500) {
    logHelpers.logError(error, { path: req.path, method: req.method, statusCode });
  } else {
    logger.warn('Request failed', {
      path: req.path,
      method: req.method,
      statusCode,
      code: error instanceof AppError ? error.code : undefined,
    });
  }

  if (res.headersSent) {
    // The timeout middleware already answered; the error only needs logging.
    if (!res.writableEnded) {
      next(err);
    }
    return;
  }

  if (error instanceof PoolExhaustedError) {
    res.setHeader('Retry-After', String(Math.max(1, Math.ceil(error.timeoutMs / 1000))));
  }

  res.status(statusCode).json(formatErrorResponse(error, req.path, config.app.isDevelopment));
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}
