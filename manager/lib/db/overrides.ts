/**
 * Manager Override Database Operations
 * Per-user restrictions on selectable cores, memory, window managers, queues and OS images
 */

import { getDb } from '../db';
import { log } from '../logger';
import type { ManagerOverride, OverrideFields } from '../../types';

interface OverrideRow {
  username: string;
  cores: string | null;
  memory: string | null;
  window_managers: string | null;
  queues: string | null;
  os_options: string | null;
  updated_by: string | null;
  created_at: number;
  updated_at: number;
}

function parseNumberList(raw: string | null): number[] | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : null;
  } catch {
    return null;
  }
}

function parseStringList(raw: string | null): string[] | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : null;
  } catch {
    return null;
  }
}

const encode = (list: unknown[] | null): string | null => (list === null ? null : JSON.stringify(list));

/**
 * Convert database row to override object
 * Corrupt list columns read back as null (global list)
 */
function rowToOverride(row: OverrideRow): ManagerOverride {
  return {
    username: row.username,
    cores: parseNumberList(row.cores),
    memory: parseNumberList(row.memory),
    window_managers: parseStringList(row.window_managers),
    queues: parseStringList(row.queues),
    os_options: parseStringList(row.os_options),
    updated_by: row.updated_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function getOverride(username: string): ManagerOverride | null {
  const row = getDb()
    .prepare<[string], OverrideRow>('SELECT * FROM manager_overrides WHERE username = ?')
    .get(username);
  return row ? rowToOverride(row) : null;
}

export function listOverrides(): ManagerOverride[] {
  return getDb()
    .prepare<[], OverrideRow>('SELECT * FROM manager_overrides ORDER BY username')
    .all()
    .map(rowToOverride);
}

/**
 * Insert or replace an override
 * @param updatedBy - Manager making the change
 */
export function saveOverride(username: string, fields: OverrideFields, updatedBy: string): ManagerOverride {
  const now = Date.now();
  getDb().prepare(`
    INSERT INTO manager_overrides (
      username, cores, memory, window_managers, queues, os_options,
      updated_by, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(username) DO UPDATE SET
      cores = excluded.cores,
      memory = excluded.memory,
      window_managers = excluded.window_managers,
      queues = excluded.queues,
      os_options = excluded.os_options,
      updated_by = excluded.updated_by,
      updated_at = excluded.updated_at
  `).run(
    username,
    encode(fields.cores),
    encode(fields.memory),
    encode(fields.window_managers),
    encode(fields.queues),
    encode(fields.os_options),
    updatedBy,
    now,
    now,
  );
  log.db('Saved manager override', { username, updatedBy });

  const saved = getOverride(username);
  if (!saved) {
    throw new Error(`Override for ${username} was not persisted`);
  }
  return saved;
}

export function deleteOverride(username: string): boolean {
  const result = getDb().prepare('DELETE FROM manager_overrides WHERE username = ?').run(username);
  return result.changes > 0;
}
