/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, silentLogger, scopedLogger, type Logger } from './logger.js';

export { parseJson, normalizeToolArguments, type JsonParseResult } from './json.js';

export {
  withRetry,
  withTimeout,
  raceAbort,
  isTransientError,
  backoffDelay,
  sleep,
  throwIfAborted,
  isAbortError,
  AbortError,
  retryPolicyFrom,
  type RetryOptions,
  type RetryPolicy,
} from './retry.js';

export { KeyedMutex, mapWithConcurrency } from './concurrency.js';

export { formatTable, visibleLength, type Column, type Row, type Alignment } from './table.js';
