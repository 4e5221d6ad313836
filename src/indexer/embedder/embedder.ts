/**
 * Embedder
 *
 * Converts texts into vectors with the model's document/query prefix
 * convention. Work is split into batches; each batch has a timeout and
 * bounded retries for transient failures.
 *
 * A call either returns one vector per input, in input order, or throws.
 * Callers never see a partial result, so a retry cannot write half a
 * document twice.
 */

import { CLIError, EmbeddingError } from '../../errors/index.js';
import { isTransientError, throwIfAborted, withRetry, type RetryPolicy } from '../../utils/retry.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { EmbedderOptions, EmbeddingMode, EmbeddingModel } from './types.js';

const DEFAULT_BATCH_SIZE = 32;

/**
 * Errors the model client throws are either transient (left as is so the
 * retry loop sees them) or permanent (wrapped as EmbeddingError).
 */
function classifyModelError(error: unknown): Error {
  if (error instanceof CLIError) {
    return error;
  }
  if (isTransientError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  const cause = error instanceof Error ? error : undefined;
  return new EmbeddingError(`Embedding model call failed: ${cause?.message ?? String(error)}`, {
    cause,
  });
}

export class Embedder {
  readonly dimensions: number;

  private readonly model: EmbeddingModel;
  private readonly documentPrefix: string;
  private readonly queryPrefix: string;
  private readonly batchSize: number;
  private readonly retry: RetryPolicy;
  private readonly serviceName: string;
  private readonly onProgress?: (processed: number, total: number) => void;
  private readonly logger: Logger;

  constructor(model: EmbeddingModel, options: EmbedderOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new EmbeddingError(`Invalid embedding dimensions: ${options.dimensions}`);
    }
    this.model = model;
    this.dimensions = options.dimensions;
    this.documentPrefix = options.documentPrefix;
    this.queryPrefix = options.queryPrefix;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.retry = options.retry;
    this.serviceName = options.serviceName ?? 'Embedding model';
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Prefix for a mode, exposed so callers can log what is sent.
   */
  prefixFor(mode: EmbeddingMode): string {
    return mode === 'document' ? this.documentPrefix : this.queryPrefix;
  }

  /**
   * Embed texts, one vector per input, in input order.
   *
   * @throws EmbeddingError on empty input, malformed vectors or a permanent model failure
   * @throws ServiceUnavailableError when transient failures outlast the retries
   */
  async embed(
    texts: readonly string[],
    mode: EmbeddingMode,
    signal?: AbortSignal
  ): Promise<number[][]> {
    if (texts.length === 0) {
      throw new EmbeddingError('Cannot embed an empty list of texts');
    }

    const prefix = this.prefixFor(mode);
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      throwIfAborted(signal);

      const batch = texts.slice(start, start + this.batchSize).map((text) => prefix + text);
      const result = await withRetry(
        async () => {
          try {
            return await this.model.embedDocuments(batch);
          } catch (error) {
            throw classifyModelError(error);
          }
        },
        {
          ...this.retry,
          label: this.serviceName,
          signal,
          onRetry: (error, attempt, delayMs) =>
            this.logger.debug?.(
              `Embedding batch at ${start} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${
                error instanceof Error ? error.message : String(error)
              }`
            ),
        }
      );

      this.validateBatch(result, batch.length);
      vectors.push(...result);
      this.onProgress?.(vectors.length, texts.length);
    }

    return vectors;
  }

  /**
   * Embed a single search query.
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], 'query', signal);
    if (!vector) {
      throw new EmbeddingError('Embedding model returned no vector for the query');
    }
    return vector;
  }

  private validateBatch(vectors: number[][], expected: number): void {
    if (vectors.length !== expected) {
      throw new EmbeddingError(
        `Embedding model returned ${vectors.length} vector(s) for ${expected} input(s)`
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new EmbeddingError(
          `Embedding dimension mismatch: expected ${this.dimensions}, got ${vector.length}`
        );
      }
      if (!vector.every(Number.isFinite)) {
        throw new EmbeddingError('Embedding model returned a vector with non-finite values');
      }
    }
  }
}
