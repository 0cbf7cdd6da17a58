/**
 * User Settings Database Operations
 * Free-form JSON preferences keyed by username
 */

import { getDb } from '../db';
import { log } from '../logger';

export type UserSettings = Record<string, unknown>;

interface SettingsRow {
  settings: string;
}

function parseSettings(raw: string, username: string): UserSettings {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (err) {
    log.warn('Stored settings are not valid JSON', {
      username,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return {};
}

/**
 * Get a user's settings
 * @returns Stored settings, or {} when none are saved or the row is corrupt
 */
export function getUserSettings(username: string): UserSettings {
  const row = getDb()
    .prepare<[string], SettingsRow>('SELECT settings FROM user_settings WHERE username = ?')
    .get(username);
  if (!row) return {};
  return parseSettings(row.settings, username);
}

/**
 * Insert or replace a user's settings, keeping the original created_at
 */
export function saveUserSettings(username: string, settings: UserSettings): UserSettings {
  const now = Date.now();
  getDb().prepare(`
    INSERT INTO user_settings (username, settings, created_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(username) DO UPDATE SET
      settings = excluded.settings,
      updated_at = excluded.updated_at
  `).run(username, JSON.stringify(settings), now, now);
  log.db('Saved user settings', { username, keys: Object.keys(settings).length });
  return settings;
}

export function deleteUserSettings(username: string): boolean {
  const result = getDb().prepare('DELETE FROM user_settings WHERE username = ?').run(username);
  return result.changes > 0;
}
