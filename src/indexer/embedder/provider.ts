/**
 * Embedding Provider Factory
 *
 * Builds the Ollama embedding client and the Embedder around it from the
 * [embedding] config section.
 */

import { OllamaEmbeddings } from '@langchain/ollama';

import type { Config } from '../../config/index.js';
import { retryPolicyFrom } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { Embedder } from './embedder.js';

/**
 * Output sizes of common Ollama embedding models.
 */
const KNOWN_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'snowflake-arctic-embed': 1024,
  'bge-m3': 1024,
};

/**
 * Known dimensions for a model name (tag suffixes like ":latest" ignored).
 */
export function getModelDimensions(model: string): number | undefined {
  const base = model.split(':')[0] ?? model;
  return KNOWN_DIMENSIONS[base];
}

export function createEmbeddingModel(embedding: Config['embedding']): OllamaEmbeddings {
  return new OllamaEmbeddings({
    model: embedding.model,
    baseUrl: embedding.base_url,
  });
}

export interface CreateEmbedderOptions {
  logger?: Logger;
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Build the Embedder for the configured model. Warns when the configured
 * dimensions disagree with what the model is known to produce; the store
 * would reject every vector otherwise.
 */
export function createEmbedder(
  embedding: Config['embedding'],
  options: CreateEmbedderOptions = {}
): Embedder {
  const known = getModelDimensions(embedding.model);
  if (known !== undefined && known !== embedding.dimensions) {
    options.logger?.warn(
      `embedding.dimensions is ${embedding.dimensions} but ${embedding.model} produces ${known}-dimensional vectors`
    );
  }

  return new Embedder(createEmbeddingModel(embedding), {
    dimensions: embedding.dimensions,
    documentPrefix: embedding.document_prefix,
    queryPrefix: embedding.query_prefix,
    batchSize: embedding.batch_size,
    retry: retryPolicyFrom(embedding),
    serviceName: `Ollama embeddings (${embedding.base_url})`,
    logger: options.logger,
    onProgress: options.onProgress,
  });
}
