import { Request, Response } from 'express';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { config } from '../config/index.js';

function rateLimitMessage(message: string) {
  return {
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message,
      timestamp: new Date().toISOString(),
    },
  };
}

/**
 * Security middleware configuration
 * Applied to every request. The API serves JSON only, so the CSP is locked
 * down completely.
 */
export function securityMiddleware() {
  return [
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      crossOriginResourcePolicy: { policy: 'same-origin' },
      frameguard: { action: 'deny' },
      hsts: config.app.isProduction
        ? {
            maxAge: 31536000,
            includeSubDomains: true,
          }
        : false,
      referrerPolicy: { policy: 'no-referrer' },
    }),

    compression({
      level: 6,
      threshold: 1024, // Only compress responses > 1KB
      filter: (req: Request, res: Response) => {
        if (req.headers['x-no-compression']) {
          return false;
        }
        return compression.filter(req, res);
      },
    }),

    rateLimit({
      windowMs: config.security.rateLimit.windowMs,
      limit: config.security.rateLimit.maxRequests,
      message: rateLimitMessage('Too many requests from this IP, please try again later'),
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req: Request) => req.path === '/health',
    }),
  ];
}

/**
 * Login attempts per client IP
 */
export function loginRateLimiter() {
  return rateLimit({
    windowMs: config.security.loginRateLimit.windowMs,
    limit: config.security.loginRateLimit.maxAttempts,
    message: rateLimitMessage('Too many login attempts, please try again later'),
    standardHeaders: true,
    legacyHeaders: false,
  });
}
