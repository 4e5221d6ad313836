/**
 * Local SQLite index store.
 *
 * Vectors live as Float32 BLOBs in `index_records`; search is a brute-force
 * cosine scan. Fine for a household's worth of bills and needs no server.
 */

import type Database from 'better-sqlite3';

import {
  openDatabase,
  closeDatabase,
  runMigrations,
  embeddingToBlob,
  blobToEmbedding,
  IndexRecordRowSchema,
  VersionRowSchema,
  DocumentSummaryRowSchema,
  validateRow,
  validateRows,
} from '../database/index.js';
import { DatabaseError, IndexWriteError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/retry.js';
import { compareIndexedDocuments, cosineSimilarity, rankHits } from './ranking.js';
import type { IndexedDocument, IndexRecord, IndexStore, ScoredRecord } from './types.js';

const SearchRowSchema = IndexRecordRowSchema.omit({ indexed_at: true });

export interface SqliteIndexStoreOptions {
  db: Database.Database;
  dimensions: number;
  description?: string;
  logger?: Logger;
  /** Clock for `indexed_at` */
  now?: () => Date;
}

function isBusy(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return typeof code === 'string' && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

function toWriteError(action: string, error: unknown): IndexWriteError {
  if (error instanceof IndexWriteError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new IndexWriteError(`SQLite ${action} failed: ${cause.message}`, {
    transient: isBusy(error),
    cause,
  });
}

export class SqliteIndexStore implements IndexStore {
  readonly description: string;
  readonly dimensions: number;

  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SqliteIndexStoreOptions) {
    this.db = options.db;
    this.dimensions = options.dimensions;
    this.description = options.description ?? `sqlite:${this.db.name}`;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open (or create) the database file at `path`.
   */
  static open(path: string, dimensions: number, logger?: Logger): SqliteIndexStore {
    return new SqliteIndexStore({
      db: openDatabase(path),
      dimensions,
      description: `sqlite:${path}`,
      logger,
    });
  }

  async ensureReady(): Promise<void> {
    const result = runMigrations(this.db);
    for (const name of result.applied) {
      this.logger.debug?.(`Applied migration ${name}`);
    }
    const [firstFailure] = result.failed;
    if (firstFailure) {
      throw new DatabaseError(`Migration ${firstFailure.name} failed: ${firstFailure.error}`);
    }
  }

  async getVersion(documentId: string): Promise<string | undefined> {
    const [newest] = await this.listVersions(documentId);
    return newest;
  }

  async listVersions(documentId: string): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT content_version, MAX(indexed_at) AS last_indexed
         FROM index_records
         WHERE document_id = ?
         GROUP BY content_version
         ORDER BY last_indexed DESC, content_version ASC`
      )
      .all(documentId);

    return validateRows(VersionRowSchema, rows, `index_records.document_id=${documentId}`).map(
      (row) => row.content_version
    );
  }

  async hasChunk(chunkId: string): Promise<boolean> {
    const row = this.db.prepare('SELECT 1 FROM index_records WHERE chunk_id = ?').get(chunkId);
    return row !== undefined;
  }

  async upsertBatch(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    for (const record of records) {
      if (record.embedding.length !== this.dimensions) {
        throw new IndexWriteError(
          `Embedding for ${record.chunkId} has ${record.embedding.length} dimensions, index expects ${this.dimensions}`
        );
      }
    }

    const indexedAt = this.now().toISOString();
    const insert = this.db.prepare(
      `INSERT INTO index_records
         (chunk_id, document_id, content_version, chunk_index, source_text, embedding, indexed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(chunk_id) DO UPDATE SET
         document_id = excluded.document_id,
         content_version = excluded.content_version,
         chunk_index = excluded.chunk_index,
         source_text = excluded.source_text,
         embedding = excluded.embedding,
         indexed_at = excluded.indexed_at`
    );

    try {
      this.db.transaction((batch: IndexRecord[]) => {
        for (const r of batch) {
          insert.run(
            r.chunkId,
            r.documentId,
            r.contentVersion,
            r.chunkIndex,
            r.sourceText,
            embeddingToBlob(r.embedding),
            indexedAt
          );
        }
      })(records);
    } catch (error) {
      throw toWriteError('upsert', error);
    }
  }

  async deleteVersion(documentId: string, contentVersion: string): Promise<void> {
    try {
      const result = this.db
        .prepare('DELETE FROM index_records WHERE document_id = ? AND content_version = ?')
        .run(documentId, contentVersion);
      this.logger.debug?.(`Deleted ${result.changes} chunk(s) of ${documentId}@${contentVersion}`);
    } catch (error) {
      throw toWriteError('delete', error);
    }
  }

  async deleteDocument(documentId: string): Promise<void> {
    try {
      this.db.prepare('DELETE FROM index_records WHERE document_id = ?').run(documentId);
    } catch (error) {
      throw toWriteError('delete', error);
    }
  }

  async search(queryEmbedding: number[], topK: number, signal?: AbortSignal): Promise<ScoredRecord[]> {
    throwIfAborted(signal);
    if (queryEmbedding.length !== this.dimensions) {
      throw new RangeError(
        `Query embedding has ${queryEmbedding.length} dimensions, index expects ${this.dimensions}`
      );
    }
    if (topK <= 0) {
      return [];
    }

    const hits: ScoredRecord[] = [];
    const rows = this.db
      .prepare(
        `SELECT chunk_id, document_id, content_version, chunk_index, source_text, embedding
         FROM index_records`
      )
      .iterate();

    for (const raw of rows) {
      const row = validateRow(SearchRowSchema, raw, 'index_records');
      hits.push({
        chunkId: row.chunk_id,
        documentId: row.document_id,
        contentVersion: row.content_version,
        chunkIndex: row.chunk_index,
        sourceText: row.source_text,
        score: cosineSimilarity(queryEmbedding, blobToEmbedding(row.embedding)),
      });
    }

    return rankHits(hits, topK);
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    const rows = this.db
      .prepare(
        `SELECT document_id, content_version, COUNT(*) AS chunk_count, MAX(indexed_at) AS last_indexed
         FROM index_records
         GROUP BY document_id, content_version`
      )
      .all();

    return validateRows(DocumentSummaryRowSchema, rows, 'index_records')
      .map((row) => ({
        documentId: row.document_id,
        contentVersion: row.content_version,
        chunkCount: row.chunk_count,
        lastIndexed: row.last_indexed,
      }))
      .sort(compareIndexedDocuments);
  }

  async close(): Promise<void> {
    closeDatabase(this.db);
  }
}
