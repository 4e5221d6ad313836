/**
 * Database Row Validation
 *
 * Zod schemas for rows read back from SQLite. better-sqlite3 types every
 * row as `unknown`, so reads go through `validateRow` instead of a cast.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM index_records WHERE chunk_id = ?').get(id);
 * return row ? validateRow(IndexRecordRowSchema, row, `index_records.chunk_id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

/**
 * Full `index_records` row, matching `IndexRecordRow` in schema.ts.
 */
export const IndexRecordRowSchema = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  content_version: z.string(),
  chunk_index: z.number().int().nonnegative(),
  source_text: z.string(),
  // better-sqlite3 returns BLOBs as Buffers
  embedding: z.instanceof(Buffer),
  indexed_at: z.string(),
});

export type IndexRecordRowParsed = z.infer<typeof IndexRecordRowSchema>;

/**
 * One row per stored version of a document, newest first.
 */
export const VersionRowSchema = z.object({
  content_version: z.string(),
  last_indexed: z.string(),
});

/**
 * Aggregate row used by `status` and pruning.
 */
export const DocumentSummaryRowSchema = z.object({
  document_id: z.string(),
  content_version: z.string(),
  chunk_count: z.number().int().nonnegative(),
  last_indexed: z.string(),
});

export type DocumentSummaryRow = z.infer<typeof DocumentSummaryRowSchema>;

/**
 * Thrown when a row does not match what the code expects: a failed
 * migration, a hand-edited database, or a newer schema.
 *
 * Exit code 5 (database)
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe index may have been written by a different version.\n` +
      `Try: delete the SQLite file and run  billrag ingest  again`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

/**
 * Validate a single row.
 *
 * @param context - Where the row came from, for the error message
 * @throws SchemaValidationError
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row, failing on the first mismatch.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
