import type { RequestScope } from '../database/request-scope.js';
import { config } from '../config/index.js';
import { scopedQuery } from './scoped-query.js';

export const SETTINGS_THEMES = ['light', 'dark'] as const;

export type Theme = (typeof SETTINGS_THEMES)[number];

/**
 * One row per tenant. Like tasks, `tenant_id` comes from the session claim
 * and the row policies make only the caller's row visible.
 */
export interface UserSettings {
  id: string;
  tenant_id: string;
  language: string;
  theme: Theme;
  /** #RRGGBB, upper case */
  accent_color: string;
  created_at: Date;
  updated_at: Date;
}

export type UserSettingsValues = Pick<UserSettings, 'language' | 'theme' | 'accent_color'>;

export type UserSettingsChanges = Partial<UserSettingsValues>;

export function defaultUserSettings(): UserSettingsValues {
  return {
    language: 'it',
    theme: 'light',
    accent_color: config.settings.defaultAccentColor,
  };
}

const SETTINGS_COLUMNS = 'id, tenant_id, language, theme, accent_color, created_at, updated_at';

/**
 * User settings repository. No statement names a tenant: the policies on
 * user_settings restrict every read and write to the session's own row.
 */
export class UserSettingsRepository {
  /**
   * Current settings, created with defaults on first read
   */
  static async get(scope: RequestScope): Promise<UserSettings> {
    return scopedQuery(scope, 'UserSettingsRepository.get', async (connection) => {
      const existing = await connection.query<UserSettings>(`SELECT ${SETTINGS_COLUMNS} FROM user_settings`);
      const row = existing.rows[0];
      if (row) {
        return row;
      }

      const defaults = defaultUserSettings();
      const inserted = await connection.query<UserSettings>(
        `INSERT INTO user_settings (language, theme, accent_color)
         VALUES ($1, $2, $3)
         ON CONFLICT (tenant_id) DO NOTHING
         RETURNING ${SETTINGS_COLUMNS}`,
        [defaults.language, defaults.theme, defaults.accent_color]
      );
      const created = inserted.rows[0];
      if (created) {
        return created;
      }

      // A concurrent request for the same tenant inserted first
      const raced = await connection.query<UserSettings>(`SELECT ${SETTINGS_COLUMNS} FROM user_settings`);
      const winner = raced.rows[0];
      if (!winner) {
        throw new Error('user_settings row missing after insert');
      }
      return winner;
    });
  }

  /**
   * Apply the given fields; omitted fields keep their value. With no
   * changes this is `get`.
   */
  static async update(scope: RequestScope, changes: UserSettingsChanges): Promise<UserSettings> {
    const current = await UserSettingsRepository.get(scope);
    if (changes.language === undefined && changes.theme === undefined && changes.accent_color === undefined) {
      return current;
    }

    return scopedQuery(scope, 'UserSettingsRepository.update', async (connection) => {
      const result = await connection.query<UserSettings>(
        `UPDATE user_settings
         SET language = COALESCE($1, language),
             theme = COALESCE($2, theme),
             accent_color = COALESCE($3, accent_color),
             updated_at = now()
         RETURNING ${SETTINGS_COLUMNS}`,
        [changes.language ?? null, changes.theme ?? null, changes.accent_color ?? null]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('UPDATE user_settings matched no row');
      }
      return row;
    });
  }
}
