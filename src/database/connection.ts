/**
 * Database Connection Module
 *
 * Opens the local SQLite index using better-sqlite3.
 * The default location is ~/.billrag/index.db; tests pass ':memory:'.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError } from '../errors/index.js';

export const IN_MEMORY = ':memory:';

/**
 * Open a database file, creating its parent directory on first use.
 *
 * @example
 * ```ts
 * const db = openDatabase(expandHome('~/.billrag/index.db'));
 * runMigrations(db);
 * ```
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let db: Database.Database;
  try {
    db = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open SQLite index at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  // WAL lets `status` read while `ingest` writes
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  return db;
}

/**
 * Close a connection. Safe to call twice.
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
