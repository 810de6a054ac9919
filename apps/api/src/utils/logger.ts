import winston from 'winston';
import { config } from '../config/index.js';
import { sanitizeContext, sanitizeLogData } from './log-sanitizer.js';

/**
 * Structured logging configuration using Winston
 * Supports different log levels and formats based on environment
 * Production: Sanitizes sensitive data from logs
 */
const sanitizeFormat = winston.format((info) => {
  // Sanitize metadata in production
  if (config.app.isProduction && info.meta) {
    info.meta = sanitizeLogData(info.meta);
  }
  // Sanitize any additional fields
  if (config.app.isProduction) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(info)) {
      if (key.includes('password') || key.includes('token') || key.includes('secret') || key.includes('credential')) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = value;
      }
    }
    Object.assign(info, sanitized);
  }
  return info;
});

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  sanitizeFormat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `${timestamp} [${level}]: ${message} ${metaString}`;
  })
);

/**
 * Winston logger instance
 * - Development: Console output with colors
 * - Production: JSON structured logs
 */
export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: {
    service: 'taskvault-api',
    environment: config.app.env,
  },
  transports: [
    // Console transport (all environments, silenced under test)
    new winston.transports.Console({
      format: config.app.isDevelopment ? consoleFormat : logFormat,
      silent: config.app.isTest,
    }),
    // File transports for production
    ...(config.app.isProduction
      ? [
          new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error',
            maxsize: 5242880, // 5MB
            maxFiles: 5,
          }),
          new winston.transports.File({
            filename: 'logs/combined.log',
            maxsize: 5242880, // 5MB
            maxFiles: 5,
          }),
        ]
      : []),
  ],
});

/**
 * Logger helper functions for structured logging
 */
export const logHelpers = {
  /**
   * Log HTTP response
   */
  logResponse: (
    req: { method: string; url: string },
    statusCode: number,
    responseTime: number
  ) => {
    logger.info('HTTP Response', {
      method: req.method,
      url: req.url,
      statusCode,
      responseTime: `${responseTime}ms`,
    });
  },

  /**
   * Log error with context (sanitized)
   */
  logError: (error: Error, context?: Record<string, unknown>) => {
    const sanitizedContext = config.app.isProduction && context
      ? sanitizeContext(context)
      : context;
    logger.error('Error occurred', {
      message: error.message,
      name: error.name,
      stack: error.stack,
      ...sanitizedContext,
    });
  },

  /**
   * Session-context invariant breach. Highest severity the logger has,
   * tagged so alerting can match on it.
   */
  logInvariantBreach: (message: string, context: Record<string, unknown>) => {
    logger.error(message, {
      severity: 'critical',
      alert: 'tenant-context-leakage',
      ...context,
    });
  },
};
