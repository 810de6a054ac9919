import { Router } from 'express';
import type { Database } from '../database/index.js';
import { createAuthRouter } from './auth.js';
import { createSettingsRouter } from './settings.js';
import { createTasksRouter } from './tasks.js';

/**
 * API routes registration
 * Health routes are mounted by the app itself.
 */
export function createApiRouter(db: Database): Router {
  const router = Router();

  router.use('/auth', createAuthRouter(db.pool));
  router.use('/tasks', createTasksRouter(db.scopes));
  router.use('/settings', createSettingsRouter(db.scopes));

  return router;
}
