/**
 * Application entry point
 * Starts the server and shuts it down cleanly on SIGTERM/SIGINT.
 */
import { startServer } from './app.js';
import { logger } from './utils/logger.js';

try {
  const { stop } = await startServer();

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
} catch (error) {
  logger.error('Failed to start server', { error });
  process.exit(1);
}
