/**
 * Database Connection and Schema Management
 * SQLite store for user settings, manager overrides and login sessions
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { log } from './logger';

type DatabaseInstance = Database.Database;

// Database path priority:
// 1. DB_PATH env var (for testing or custom paths)
// 2. <datadir>/app.db from server_config.json
// 3. manager/data/app.db (local development fallback)
export function resolveDbPath(datadir?: string): string {
  if (process.env.DB_PATH) return process.env.DB_PATH;
  if (datadir) return path.join(datadir, 'app.db');
  return path.join(__dirname, '..', 'data', 'app.db');
}

let db: DatabaseInstance | null = null;

const SCHEMA = `
  -- Per-user UI preferences, stored as a JSON blob
  CREATE TABLE IF NOT EXISTS user_settings (
    username TEXT PRIMARY KEY,
    settings TEXT NOT NULL DEFAULT '{}',
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  -- Manager-set restrictions; NULL column = use the global list
  CREATE TABLE IF NOT EXISTS manager_overrides (
    username TEXT PRIMARY KEY,
    cores TEXT,
    memory TEXT,
    window_managers TEXT,
    queues TEXT,
    os_options TEXT,
    updated_by TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  -- Login sessions referenced by the session_id cookie
  CREATE TABLE IF NOT EXISTS auth_sessions (
    session_id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    display_name TEXT,
    email TEXT,
    groups TEXT NOT NULL DEFAULT '[]',
    auth_method TEXT NOT NULL DEFAULT '',
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    last_access INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_auth_sessions_expires ON auth_sessions(expires_at);
  CREATE INDEX IF NOT EXISTS idx_auth_sessions_username ON auth_sessions(username);
`;

/**
 * Initialize database connection and schema
 * @param dbPath - Database file, or ':memory:'
 */
export function initializeDb(dbPath: string = resolveDbPath()): DatabaseInstance {
  if (db) return db;

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);

  log.db('Database initialized', { path: dbPath });
  return db;
}

/**
 * Get database connection (initializes if needed)
 */
export function getDb(dbPath?: string): DatabaseInstance {
  return db ?? initializeDb(dbPath);
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Reset database connection (for testing)
 */
export function resetDb(dbPath?: string): DatabaseInstance {
  closeDb();
  return initializeDb(dbPath);
}
