/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * const embedder = createEmbedder(config.embedding, { logger });
 * const vectors = await embedder.embed(chunks.map((c) => c.text), 'document');
 * const query = await embedder.embedQuery('How much was the March gas bill?');
 * ```
 */

export { Embedder } from './embedder.js';
export {
  createEmbedder,
  createEmbeddingModel,
  getModelDimensions,
  type CreateEmbedderOptions,
} from './provider.js';
export type { EmbeddingMode, EmbeddingModel, EmbedderOptions } from './types.js';
