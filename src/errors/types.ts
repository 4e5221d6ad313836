/**
 * Error type definitions for billrag
 *
 * Every error the application raises on purpose extends CLIError, so the
 * CLI can print a message, a recovery hint, and exit with a stable code.
 *
 * Exit codes:
 *   1   general / partial ingestion failure
 *   2   configuration
 *   3   path not found
 *   5   database
 *   7   extraction
 *   8   embedding
 *   9   index write
 *   10  tool arguments
 *   11  service unavailable
 *   130 cancelled by the user
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors, including invalid chunking
 * parameters. Always fatal at startup.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: billrag config list  to see the effective configuration',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown for local SQLite index errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Try running: billrag status  to check index health',
      5
    );
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a document cannot be turned into text (corrupt, encrypted,
 * or image-only PDF). The document is skipped; the run continues.
 *
 * Exit code 7
 */
export class ExtractionError extends CLIError {
  public readonly documentId: string;
  public override readonly cause?: Error;

  constructor(documentId: string, reason: string, cause?: Error) {
    super(
      `Cannot extract text from ${documentId}: ${reason}`,
      'Check that the file is a readable, text-based PDF',
      7
    );
    this.name = 'ExtractionError';
    this.documentId = documentId;
    this.cause = cause;
  }
}

/**
 * Thrown when a document's bytes no longer match the version it was listed
 * with. The document fails for this run; the next listing picks up the new
 * version.
 */
export class ContentChangedError extends CLIError {
  public readonly documentId: string;
  public readonly expectedVersion: string;

  constructor(documentId: string, expectedVersion: string) {
    super(
      `${documentId} changed after it was listed (expected version ${expectedVersion})`,
      'Run billrag ingest again to index the new version',
      1
    );
    this.name = 'ContentChangedError';
    this.documentId = documentId;
    this.expectedVersion = expectedVersion;
  }
}

/**
 * Thrown when the embedding model call fails or returns malformed vectors.
 * A whole `embed()` call fails together, never a partial batch.
 *
 * Exit code 8
 */
export class EmbeddingError extends CLIError {
  /** Whether retrying the same call may succeed */
  public readonly transient: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: { transient?: boolean; cause?: Error } = {}) {
    super(
      message,
      'Check that the embedding model is pulled and the Ollama host is reachable',
      8
    );
    this.name = 'EmbeddingError';
    this.transient = options.transient ?? false;
    this.cause = options.cause;
  }
}

/**
 * Thrown when a batch upsert or delete against the index store fails.
 * Batches are keyed by chunk_id, so the caller can retry them safely.
 *
 * Exit code 9
 */
export class IndexWriteError extends CLIError {
  public readonly transient: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: { transient?: boolean; cause?: Error } = {}) {
    super(message, 'Check the vector store connection and try again', 9);
    this.name = 'IndexWriteError';
    this.transient = options.transient ?? false;
    this.cause = options.cause;
  }
}

/**
 * Raised for a malformed tool call issued by the model. The agent loop
 * returns it to the model as a tool result; it never reaches the user.
 *
 * Exit code 10
 */
export class ToolArgumentError extends CLIError {
  public readonly toolName: string;
  public readonly issues: string[];

  constructor(toolName: string, message: string, issues: string[] = []) {
    super(message, issues.length > 0 ? issues.join('; ') : undefined, 10);
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
    this.issues = issues;
  }
}

/**
 * Thrown when a storage, vector-store, or model endpoint stays unreachable
 * after the configured retries.
 *
 * Exit code 11
 */
export class ServiceUnavailableError extends CLIError {
  public readonly service: string;
  public readonly attempts: number;
  public override readonly cause?: Error;

  constructor(service: string, attempts: number, cause?: Error) {
    super(
      `${service} is unavailable after ${attempts} attempt(s)` +
        (cause ? `: ${cause.message}` : ''),
      'Check that the service is running and the configured host/port are correct',
      11
    );
    this.name = 'ServiceUnavailableError';
    this.service = service;
    this.attempts = attempts;
    this.cause = cause;
  }
}

/**
 * Thrown by `billrag ingest` when at least one document failed.
 */
export class IngestionFailedError extends CLIError {
  public readonly failedDocuments: string[];

  constructor(failedDocuments: string[]) {
    super(
      `${failedDocuments.length} document(s) failed to ingest`,
      'Re-run with --verbose to see the failure for each document',
      1
    );
    this.name = 'IngestionFailedError';
    this.failedDocuments = failedDocuments;
  }
}

/**
 * Thrown when ingestion is cancelled through its AbortSignal.
 */
export class IngestionCancelledError extends CLIError {
  constructor() {
    super('Ingestion cancelled', undefined, 130);
    this.name = 'IngestionCancelledError';
  }
}

/**
 * Thrown when the user cancels a chat turn. The turn is dropped from the
 * conversation history.
 */
export class TurnCancelledError extends CLIError {
  constructor() {
    super('Turn cancelled', undefined, 130);
    this.name = 'TurnCancelledError';
  }
}

/**
 * Thrown when an operation exceeds its timeout. Counted as transient.
 */
export class OperationTimeoutError extends Error {
  public readonly transient = true;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'OperationTimeoutError';
  }
}
