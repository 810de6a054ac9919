import type { Server } from 'node:http';
import express, { type Express } from 'express';
import { config } from './config/index.js';
import { createDatabase, type Database } from './database/index.js';
import {
  errorHandler,
  notFoundHandler,
  requestLogger,
  requestTimeout,
  securityMiddleware,
} from './middleware/index.js';
import { createApiRouter } from './routes/index.js';
import { createHealthRouter } from './routes/health.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  /** Per-request deadline; config default when omitted */
  requestTimeoutMs?: number;
}

/**
 * Build the express application around an existing database wiring.
 * Nothing here opens a connection; the pool grows on first request.
 */
export function createApp(db: Database, options: AppOptions = {}): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(securityMiddleware());
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(requestLogger);
  app.use(requestTimeout(options.requestTimeoutMs ?? config.app.requestTimeoutMs));

  app.use('/health', createHealthRouter(db));
  app.use(createApiRouter(db));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start the HTTP server. Resolves once it is listening; the returned
 * `stop` closes the server and then the pool.
 */
export async function startServer(db: Database = createDatabase()): Promise<{ stop: () => Promise<void> }> {
  const app = createApp(db);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.app.port, () => resolve(listening));
    listening.once('error', reject);
  });

  logger.info('Server started', {
    port: config.app.port,
    environment: config.app.env,
    poolSize: config.database.poolSize,
  });

  const stop = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await db.close();
    logger.info('Server stopped');
  };

  return { stop };
}
