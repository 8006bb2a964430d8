/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection to the chunk store using
 * better-sqlite3. The path comes from `storage.database_path` or `--db`.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolveDataPath } from '../config/paths.js';

const MEMORY_PATH = ':memory:';

// Module-level singleton instance
let db: Database.Database | null = null;
let dbPath: string | null = null;
let exitHookRegistered = false;

/**
 * Open a chunk store without touching the singleton.
 *
 * Creates the parent directory for file databases. `:memory:` is passed
 * through untouched (used by tests).
 */
export function openDatabase(path: string): Database.Database {
  if (path === MEMORY_PATH) {
    return new Database(MEMORY_PATH);
  }

  const resolved = resolveDataPath(path);
  const dir = dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const connection = new Database(resolved);
  try {
    // First read of the file; fails here when it is not a SQLite database
    connection.pragma('journal_mode = WAL');
  } catch (error) {
    connection.close();
    throw error;
  }
  return connection;
}

/**
 * Get the shared database instance for `path`.
 *
 * Subsequent calls with the same path return the same instance; a
 * different path closes the old connection first.
 *
 * @example
 * ```ts
 * const db = getDb(config.storage.database_path);
 * const rows = db.prepare('SELECT * FROM markdown_chunks').all();
 * ```
 */
export function getDb(path: string): Database.Database {
  const resolved = path === MEMORY_PATH ? path : resolveDataPath(path);

  if (db && dbPath === resolved) {
    return db;
  }

  closeDb();
  db = openDatabase(resolved);
  dbPath = resolved;

  if (!exitHookRegistered) {
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    dbPath = null;
  }
}

/**
 * Path of the currently open database, or null.
 */
export function getDbPath(): string | null {
  return dbPath;
}
