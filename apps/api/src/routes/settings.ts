import { Router } from 'express';
import { z } from 'zod';
import type { RequestScopeFactory } from '../database/request-scope.js';
import { scopedHandler, validateRequest } from '../middleware/index.js';
import { SETTINGS_THEMES, UserSettingsRepository, type UserSettingsChanges } from '../models/user-settings.js';

/**
 * Partial settings update. Every field is optional; the accent color is
 * stored upper case.
 */
export const settingsUpdateSchema = z.object({
  language: z
    .string()
    .min(2, 'Language must be at least 2 characters')
    .max(5, 'Language must be at most 5 characters')
    .optional(),
  theme: z.enum(SETTINGS_THEMES).optional(),
  accent_color: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/, 'accent_color must be a hex color (#RRGGBB)')
    .transform((value) => value.toUpperCase())
    .optional(),
});

/**
 * Settings of the calling user
 */
export function createSettingsRouter(scopes: RequestScopeFactory): Router {
  const router = Router();

  /**
   * GET /settings
   * Defaults are created on first read.
   */
  router.get(
    '/',
    scopedHandler(scopes, async (scope) => {
      const settings = await UserSettingsRepository.get(scope);
      return { status: 200, body: { success: true, data: settings } };
    })
  );

  /**
   * PUT /settings
   */
  router.put(
    '/',
    validateRequest({ body: settingsUpdateSchema }),
    scopedHandler<UserSettingsChanges>(scopes, async (scope, req) => {
      const settings = await UserSettingsRepository.update(scope, req.body);
      return { status: 200, body: { success: true, data: settings } };
    })
  );

  return router;
}
