/**
 * Login Session Database Operations
 * Rows behind the signed session_id cookie
 */

import crypto from 'crypto';
import { getDb } from '../db';
import { log } from '../logger';
import type { AuthSession, AuthUser, AuthMethod } from '../../types';

interface SessionRow {
  session_id: string;
  username: string;
  display_name: string | null;
  email: string | null;
  groups: string;
  auth_method: string;
  created_at: number;
  expires_at: number;
  last_access: number;
}

function toAuthMethod(value: string): AuthMethod {
  return value === 'ldap' || value === 'entra' ? value : '';
}

function parseGroups(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((g): g is string => typeof g === 'string') : [];
  } catch {
    return [];
  }
}

function rowToSession(row: SessionRow): AuthSession {
  return {
    session_id: row.session_id,
    username: row.username,
    display_name: row.display_name ?? row.username,
    email: row.email ?? '',
    groups: parseGroups(row.groups),
    auth_method: toAuthMethod(row.auth_method),
    created_at: row.created_at,
    expires_at: row.expires_at,
    last_access: row.last_access,
  };
}

/**
 * Create a session for an authenticated user
 * @param ttlMs - Lifetime from now
 */
export function createAuthSession(user: AuthUser, ttlMs: number, now: number = Date.now()): AuthSession {
  const sessionId = crypto.randomUUID();
  getDb().prepare(`
    INSERT INTO auth_sessions (
      session_id, username, display_name, email, groups, auth_method,
      created_at, expires_at, last_access
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    sessionId,
    user.username,
    user.display_name,
    user.email,
    JSON.stringify(user.groups),
    user.auth_method,
    now,
    now + ttlMs,
    now,
  );
  log.db('Created auth session', { username: user.username });
  return {
    ...user,
    session_id: sessionId,
    created_at: now,
    expires_at: now + ttlMs,
    last_access: now,
  };
}

export function getAuthSession(sessionId: string): AuthSession | null {
  const row = getDb()
    .prepare<[string], SessionRow>('SELECT * FROM auth_sessions WHERE session_id = ?')
    .get(sessionId);
  return row ? rowToSession(row) : null;
}

export function touchAuthSession(sessionId: string, now: number = Date.now()): void {
  getDb().prepare('UPDATE auth_sessions SET last_access = ? WHERE session_id = ?').run(now, sessionId);
}

export function deleteAuthSession(sessionId: string): boolean {
  const result = getDb().prepare('DELETE FROM auth_sessions WHERE session_id = ?').run(sessionId);
  return result.changes > 0;
}

/**
 * Remove expired sessions
 * @returns Number of rows removed
 */
export function purgeExpiredSessions(now: number = Date.now()): number {
  const result = getDb().prepare('DELETE FROM auth_sessions WHERE expires_at <= ?').run(now);
  if (result.changes > 0) {
    log.db('Purged expired sessions', { count: result.changes });
  }
  return result.changes;
}
