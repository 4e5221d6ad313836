/**
 * billrag - Library Entry Point
 *
 * The CLI (`billrag`) is the main interface:
 * ```bash
 * billrag ingest                        # Index new and changed bills
 * billrag ask "What was due in March?"  # One question, answered with citations
 * billrag chat                          # Multi-turn chat
 * ```
 *
 * The same building blocks are exported for scripts that want to drive
 * ingestion or the agent directly.
 *
 * @example
 * ```typescript
 * import {
 *   loadConfig,
 *   createContentSource,
 *   createEmbedder,
 *   createIndexStore,
 *   IngestionOrchestrator,
 *   PdfTextExtractor,
 *   retryPolicyFrom,
 * } from 'billrag';
 *
 * const config = loadConfig();
 * const store = createIndexStore(config);
 * const summary = await new IngestionOrchestrator({
 *   source: createContentSource(config.storage, retryPolicyFrom(config.ingestion)),
 *   extractor: new PdfTextExtractor(),
 *   embedder: createEmbedder(config.embedding),
 *   store,
 *   chunking: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
 *   concurrency: config.ingestion.concurrency,
 * }).run();
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export { loadConfig, listConfig, resolveConfigPath, DEFAULT_CONFIG, type Config } from './config/index.js';

export {
  createContentSource,
  LocalContentSource,
  S3ContentSource,
  type ContentSource,
  type SourceDocument,
} from './source/index.js';

export {
  IngestionOrchestrator,
  PdfTextExtractor,
  Embedder,
  createEmbedder,
  chunkText,
  chunkDocument,
  chunkId,
  type IngestionOrchestratorOptions,
  type IngestionSummary,
  type IngestionCallbacks,
  type DocumentOutcome,
  type TextExtractor,
  type Chunk,
  type ChunkingParams,
} from './indexer/index.js';

export {
  createIndexStore,
  SqliteIndexStore,
  QdrantIndexStore,
  type IndexStore,
  type IndexRecord,
  type SearchHit,
  type IndexedDocument,
} from './search/index.js';

export {
  createChatModel,
  OllamaChatModel,
  type ChatModel,
  type ChatMessage,
  type ChatCompletion,
} from './providers/index.js';

export {
  ChatAgent,
  createSearchPdfsTool,
  checkGrounding,
  extractCitationTags,
  citationTag,
  type ChatAgentOptions,
  type AgentTurnResult,
  type AgentEvent,
  type SearchPdfsTool,
} from './agent/index.js';

export {
  ConfigError,
  ValidationError,
  ExtractionError,
  ContentChangedError,
  EmbeddingError,
  IndexWriteError,
  ServiceUnavailableError,
  IngestionFailedError,
  IngestionCancelledError,
  TurnCancelledError,
} from './errors/index.js';

export { retryPolicyFrom, consoleLogger, silentLogger, type Logger, type RetryPolicy } from './utils/index.js';
