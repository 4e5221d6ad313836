/**
 * Chunker Types
 */

/**
 * One sliding window over a text. Offsets and lengths are in UTF-16 code
 * units (JavaScript string indices).
 */
export interface TextWindow {
  /** 0-based position of the window in the text */
  index: number;
  startOffset: number;
  length: number;
  text: string;
}

/**
 * A window bound to the document version it came from.
 * Matches the payload stored for every index record.
 */
export interface Chunk {
  /** UUID v5 of (documentId, contentVersion, chunkIndex) */
  chunkId: string;
  documentId: string;
  contentVersion: string;
  chunkIndex: number;
  startOffset: number;
  length: number;
  text: string;
}

export interface ChunkingParams {
  chunkSize: number;
  chunkOverlap: number;
}
