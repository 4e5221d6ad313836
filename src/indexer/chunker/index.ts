/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { chunkDocument } from './chunker/index.js';
 *
 * const chunks = [...chunkDocument(doc, text, { chunkSize: 1000, chunkOverlap: 200 })];
 * ```
 */

export {
  chunkText,
  chunkDocument,
  countChunks,
  chunkId,
  validateChunkParams,
  CHUNK_ID_NAMESPACE,
} from './chunker.js';

export type { TextWindow, Chunk, ChunkingParams } from './types.js';
