/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('chunk_overlap must be smaller than chunk_size');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  ValidationError,
  ExtractionError,
  ContentChangedError,
  EmbeddingError,
  IndexWriteError,
  ToolArgumentError,
  ServiceUnavailableError,
  IngestionFailedError,
  IngestionCancelledError,
  TurnCancelledError,
  OperationTimeoutError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  describeError,
  errorName,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
