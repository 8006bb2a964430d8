/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { toError } from '../errors/index.js';

/**
 * Connections already migrated this process. Tracked per connection since
 * `kbi chunk --db a.db` and a test's `:memory:` store can coexist.
 */
let initialized = new WeakSet<Database.Database>();

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the built CLI needs no asset files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-text-chunks.sql',
    sql: `
-- Migration 001: text chunk tables

CREATE TABLE IF NOT EXISTS markdown_chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  source_url TEXT NOT NULL DEFAULT ''
);

CREATE INDEX IF NOT EXISTS idx_markdown_chunks_file ON markdown_chunks(file_path);

CREATE TABLE IF NOT EXISTS discourse_chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  post_id INTEGER NOT NULL,
  topic_id INTEGER NOT NULL,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  source_url TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_discourse_chunks_topic ON discourse_chunks(topic_id);
    `.trim(),
  },
  {
    name: '002-image-chunks.sql',
    sql: `
-- Migration 002: image references found in markdown documents

CREATE TABLE IF NOT EXISTS image_chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL,
  image_url TEXT NOT NULL
);
    `.trim(),
  },
];

const MigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

function hasMigrationsTable(db: Database.Database): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  return row !== undefined;
}

/**
 * Run all pending migrations against `db`.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(getDb(path));
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  if (initialized.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(getAppliedMigrations(db).map((row) => row.name));

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      done.add(migration.name);
    } catch (error) {
      failed.push({ name: migration.name, error: toError(error).message });
    }
  }

  // Only cache on success so the next invocation retries
  if (failed.length === 0) {
    initialized.add(db);
  }

  return { applied, failed };
}

/**
 * @returns true if there are pending migrations
 */
export function hasPendingMigrations(db: Database.Database): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

/**
 * List applied migrations with timestamps, oldest first.
 */
export function getAppliedMigrations(
  db: Database.Database
): Array<{ name: string; applied_at: string }> {
  if (!hasMigrationsTable(db)) {
    return [];
  }

  return db
    .prepare('SELECT name, applied_at FROM _migrations ORDER BY id')
    .all()
    .map((row) => MigrationRowSchema.parse(row));
}

/**
 * Forget which connections were migrated.
 * FOR TESTING ONLY.
 */
export function resetMigrationState(): void {
  initialized = new WeakSet();
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
