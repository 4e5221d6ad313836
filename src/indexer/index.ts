/**
 * Indexer Module
 *
 * The write path: extract text from bill PDFs, chunk it, embed the chunks
 * and keep the index store in step with the content source.
 *
 * @example
 * ```ts
 * import { IngestionOrchestrator } from './indexer/index.js';
 *
 * const orchestrator = new IngestionOrchestrator({
 *   source,
 *   extractor: new PdfTextExtractor(),
 *   embedder,
 *   store,
 *   chunking: { chunkSize: 1000, chunkOverlap: 200 },
 *   concurrency: 4,
 * });
 *
 * const summary = await orchestrator.run();
 * console.log(`${summary.indexed} indexed, ${summary.skipped} unchanged`);
 * ```
 */

// Chunker module
export {
  chunkText,
  chunkDocument,
  countChunks,
  chunkId,
  validateChunkParams,
  CHUNK_ID_NAMESPACE,
  type TextWindow,
  type Chunk,
  type ChunkingParams,
} from './chunker/index.js';

// Extractor module
export {
  PdfTextExtractor,
  loadPdfPages,
  PAGE_SEPARATOR,
  type TextExtractor,
  type PdfPage,
  type PdfPageLoader,
} from './extractor/index.js';

// Embedder module
export {
  Embedder,
  createEmbedder,
  createEmbeddingModel,
  getModelDimensions,
  type CreateEmbedderOptions,
  type EmbeddingMode,
  type EmbeddingModel,
  type EmbedderOptions,
} from './embedder/index.js';

// Orchestration
export { IngestionOrchestrator, type IngestionOrchestratorOptions } from './pipeline.js';

export type {
  DocumentState,
  DocumentOutcome,
  IngestionFailure,
  IngestionSummary,
  IngestionCallbacks,
} from './types.js';
