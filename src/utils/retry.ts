/**
 * Timeout and Retry Helpers
 *
 * Every call that leaves the process (object storage, embedding model,
 * vector store, chat model) goes through withRetry. Only transient failures
 * are retried; permanent ones (validation, schema, 4xx) surface immediately.
 * When the retries for a transient failure run out, the caller gets a
 * ServiceUnavailableError naming the service.
 */

import { OperationTimeoutError, ServiceUnavailableError } from '../errors/index.js';

/** Network error codes worth another attempt */
const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_MESSAGE = /fetch failed|socket hang up|ECONNREFUSED|ECONNRESET|ETIMEDOUT|network error/i;

export interface RetryOptions {
  /** Service or operation name used in errors and log lines */
  label: string;
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  /** First backoff delay; doubles on every retry */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay (default: 30s) */
  maxDelayMs?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Classifier for retryable errors (default: isTransientError) */
  isRetryable?: (error: unknown) => boolean;
  /** Rejects the pending attempt or backoff wait and prevents further attempts */
  signal?: AbortSignal;
  /** Called before every backoff wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * The tunable part of RetryOptions, as read from a config section.
 */
export type RetryPolicy = Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'timeoutMs'>;

/**
 * Build a RetryPolicy from a config section's snake_case fields.
 */
export function retryPolicyFrom(section: {
  max_retries: number;
  retry_base_delay_ms: number;
  timeout_ms: number;
}): RetryPolicy {
  return {
    maxRetries: section.max_retries,
    baseDelayMs: section.retry_base_delay_ms,
    timeoutMs: section.timeout_ms,
  };
}

/**
 * Error raised when an AbortSignal fires without a reason of its own.
 */
export class AbortError extends Error {
  constructor(message = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new AbortError();
}

/**
 * Throw if the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Wait, rejecting early when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Reject as soon as the signal fires, without waiting for the promise to
 * settle. The listener is always removed.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  let onAbort = (): void => undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Race a promise against a timer and, when given, an abort signal. The
 * timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await raceAbort(Promise.race([promise, timeout]), signal);
  } finally {
    clearTimeout(timer);
  }
}

function httpStatusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  // AWS SDK v3 errors
  if (
    '$metadata' in error &&
    typeof error.$metadata === 'object' &&
    error.$metadata !== null &&
    'httpStatusCode' in error.$metadata &&
    typeof error.$metadata.httpStatusCode === 'number'
  ) {
    return error.$metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * Decide whether an error is worth retrying.
 *
 * Order: explicit `transient` flag, abort, network error code, HTTP status,
 * then the cause chain and the message.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('transient' in error && typeof error.transient === 'boolean') {
    return error.transient;
  }
  if (isAbortError(error) || error instanceof ServiceUnavailableError) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) {
    return true;
  }

  const status = httpStatusOf(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  if (error.cause !== undefined && error.cause !== error && isTransientError(error.cause)) {
    return true;
  }
  return TRANSIENT_MESSAGE.test(error.message);
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run an operation with timeout and bounded retries.
 *
 * @example
 * ```typescript
 * const points = await withRetry(() => client.search(collection, query), {
 *   label: 'Qdrant',
 *   maxRetries: 3,
 *   baseDelayMs: 500,
 *   timeoutMs: 30_000,
 * });
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    label,
    maxRetries,
    baseDelayMs,
    maxDelayMs = 30_000,
    timeoutMs,
    isRetryable = isTransientError,
    signal,
    onRetry,
  } = options;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);

    try {
      const pending = operation(attempt);
      return await (timeoutMs !== undefined && timeoutMs > 0
        ? withTimeout(pending, timeoutMs, label, signal)
        : raceAbort(pending, signal));
    } catch (error) {
      if (signal?.aborted || !isRetryable(error)) {
        throw error;
      }
      if (attempt > maxRetries) {
        throw new ServiceUnavailableError(
          label,
          attempt,
          error instanceof Error ? error : new Error(String(error))
        );
      }
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }
}
