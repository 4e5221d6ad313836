/**
 * Search Module
 *
 * The index store port, its Qdrant and SQLite adapters, and ranking.
 *
 * @example
 * ```typescript
 * import { createIndexStore } from './search/index.js';
 *
 * const store = createIndexStore(config);
 * await store.ensureReady();
 * const hits = await store.search(queryEmbedding, 5);
 * ```
 */

export type {
  IndexRecord,
  StoredChunk,
  ScoredRecord,
  SearchHit,
  IndexedDocument,
  IndexStore,
} from './types.js';

export { cosineSimilarity, compareHits, rankHits, compareIndexedDocuments } from './ranking.js';

export {
  formatScore,
  truncateSnippet,
  formatHit,
  formatHits,
  formatHitJSON,
  type FormatHitOptions,
  type SearchHitJSON,
} from './formatter.js';

export { SqliteIndexStore, type SqliteIndexStoreOptions } from './sqlite-store.js';
export { QdrantIndexStore, type QdrantApi, type QdrantIndexStoreOptions } from './qdrant-store.js';
export { createIndexStore } from './factory.js';
