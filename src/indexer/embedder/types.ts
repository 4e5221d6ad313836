/**
 * Embedder Types
 */

import type { Logger } from '../../utils/logger.js';
import type { RetryPolicy } from '../../utils/retry.js';

/**
 * Which side of the retrieval the text is on. nomic-embed-text and similar
 * models are trained with a different task prefix for each.
 */
export type EmbeddingMode = 'document' | 'query';

/**
 * The one capability we need from an embedding model.
 * LangChain's OllamaEmbeddings satisfies it as is.
 */
export interface EmbeddingModel {
  embedDocuments(texts: string[]): Promise<number[][]>;
}

/**
 * Options for the Embedder.
 * Mirrors the [embedding] section in config.toml.
 */
export interface EmbedderOptions {
  /** Expected vector length; anything else is an EmbeddingError */
  dimensions: number;

  /** Prepended to texts embedded in document mode */
  documentPrefix: string;

  /** Prepended to texts embedded in query mode */
  queryPrefix: string;

  /**
   * Texts per model call.
   * @default 32
   */
  batchSize?: number;

  /** Timeout and retry for each batch */
  retry: RetryPolicy;

  /** Service name used in ServiceUnavailableError (default: 'Embedding model') */
  serviceName?: string;

  /**
   * Progress callback, fired after each batch completes.
   * @param processed - Number of texts embedded so far
   * @param total - Total number of texts in the call
   */
  onProgress?: (processed: number, total: number) => void;

  logger?: Logger;
}
