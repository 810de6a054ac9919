import { Router, Request, Response } from 'express';
import type { Database } from '../database/index.js';
import { asyncHandler } from '../middleware/index.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

/**
 * Health routes. Reports pool and binder counters without touching the
 * database, so a saturated pool still answers.
 */
export function createHealthRouter(db: Pick<Database, 'pool' | 'binder'>): Router {
  const router = Router();

  /**
   * GET /health
   * 503 when callers are queueing for a connection and none is free.
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const pool = db.pool.stats();
      const binder = db.binder.stats();
      const saturated = pool.waiting > 0 && pool.idle === 0 && pool.total >= pool.capacity;
      const status = saturated ? 'degraded' : 'healthy';

      if (saturated) {
        logger.warn('Health check: connection pool saturated', { pool });
      }

      res.status(saturated ? 503 : 200).json({
        success: !saturated,
        status,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: config.app.env,
        service: 'api',
        checks: { pool, binder },
      });
    })
  );

  /**
   * GET /health/live
   */
  router.get('/live', (req: Request, res: Response) => {
    res.status(200).json({
      success: true,
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
}
