/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in the
 * `_migrations` table. Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded so the compiled CLI needs no SQL files beside it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-index-records.sql',
    sql: `
      CREATE TABLE IF NOT EXISTS index_records (
        chunk_id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        content_version TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        source_text TEXT NOT NULL,
        embedding BLOB NOT NULL,
        indexed_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_index_records_document
        ON index_records(document_id);

      CREATE INDEX IF NOT EXISTS idx_index_records_version
        ON index_records(document_id, content_version);
    `,
  },
];

const MigrationRowSchema = z.object({
  name: z.string(),
  applied_at: z.string(),
});

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Apply every pending migration, each in its own transaction.
 *
 * A failed migration is reported, not thrown, so the caller decides how
 * fatal it is.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  ensureMigrationsTable(db);

  const done = new Set(getAppliedMigrations(db).map((m) => m.name));
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

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
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Applied migrations, oldest first. Empty before the first run.
 */
export function getAppliedMigrations(
  db: Database.Database
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  const rows = db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all();
  return validateRows(MigrationRowSchema, rows, '_migrations');
}

export function hasPendingMigrations(db: Database.Database): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
