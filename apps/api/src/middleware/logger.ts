import { Request, Response, NextFunction } from 'express';
import { logHelpers } from '../utils/logger.js';

/**
 * Log each response with its status and duration
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  res.on('finish', () => {
    logHelpers.logResponse({ method: req.method, url: req.originalUrl }, res.statusCode, Date.now() - startedAt);
  });
  next();
}
