/**
 * Database Module
 *
 * SQLite storage for the local index store.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations } from './database/index.js';
 *
 * const db = openDatabase(':memory:');
 * runMigrations(db);
 * ```
 */

export { openDatabase, closeDatabase, IN_MEMORY } from './connection.js';

export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

export type { IndexRecordRow } from './schema.js';
export { embeddingToBlob, blobToEmbedding } from './schema.js';

export {
  IndexRecordRowSchema,
  VersionRowSchema,
  DocumentSummaryRowSchema,
  type IndexRecordRowParsed,
  type DocumentSummaryRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
