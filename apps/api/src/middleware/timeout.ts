import { Request, Response, NextFunction } from 'express';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

const MAX_TIMEOUT_MS = 300000; // 5 minutes maximum

declare global {
  namespace Express {
    interface Request {
      /** Aborted when the request times out or the client goes away */
      abortSignal?: AbortSignal;
    }
  }
}

/**
 * Timeout middleware
 * Enforces a maximum request duration. On timeout it answers 504 and aborts
 * `req.abortSignal`, which rolls back the request's unit of work. A client
 * that disconnects before the response is written aborts the signal too.
 *
 * @param timeoutMs - Timeout in milliseconds (capped at 5min)
 */
export function requestTimeout(timeoutMs: number = config.app.requestTimeoutMs) {
  const timeout = Math.min(timeoutMs, MAX_TIMEOUT_MS);

  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    req.abortSignal = controller.signal;

    const timeoutId = setTimeout(() => {
      logger.warn('Request timeout', {
        path: req.path,
        method: req.method,
        timeout,
      });
      controller.abort();

      if (!res.headersSent) {
        res.status(504).json({
          success: false,
          error: {
            code: 'REQUEST_TIMEOUT',
            message: `Request exceeded maximum duration of ${timeout}ms`,
            timestamp: new Date().toISOString(),
            path: req.path,
          },
        });
      }
    }, timeout);

    res.on('finish', () => clearTimeout(timeoutId));
    res.on('close', () => {
      clearTimeout(timeoutId);
      if (!res.writableFinished && !controller.signal.aborted) {
        logger.info('Client closed connection before response', { path: req.path, method: req.method });
        controller.abort();
      }
    });

    next();
  };
}
