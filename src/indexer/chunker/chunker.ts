/**
 * Chunker
 *
 * Fixed-size sliding windows over extracted text. Window i starts at
 * i * (chunkSize - chunkOverlap); windows are produced while the start is
 * inside the text, and the last one is truncated to what remains.
 *
 * Boundaries depend only on (chunkSize, chunkOverlap, text), and chunk ids
 * only on (documentId, contentVersion, chunkIndex). Re-chunking a document
 * therefore reproduces the same ids, which makes upserts idempotent.
 */

import { v5 as uuidv5 } from 'uuid';

import { ConfigError } from '../../errors/index.js';
import type { Chunk, ChunkingParams, TextWindow } from './types.js';

/** Namespace for chunk ids. Changing it orphans every stored record. */
export const CHUNK_ID_NAMESPACE = '5d0f7c52-8a3e-4b61-9f2d-c47e1a9b3d08';

/**
 * Reject parameters that cannot produce a finite, forward-moving window.
 *
 * @throws ConfigError
 */
export function validateChunkParams(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigError(`chunk_overlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(
      `chunk_overlap (${chunkOverlap}) must be smaller than chunk_size (${chunkSize})`
    );
  }
}

/**
 * Split text into overlapping windows.
 *
 * Parameters are checked immediately; the windows themselves are computed
 * on iteration. The returned iterable can be iterated any number of times
 * and yields the same sequence each time.
 *
 * @example
 * ```typescript
 * [...chunkText('a'.repeat(2500), 1000, 200)].map((w) => w.startOffset);
 * // [0, 800, 1600, 2400]
 * ```
 */
export function chunkText(text: string, chunkSize: number, chunkOverlap: number): Iterable<TextWindow> {
  validateChunkParams(chunkSize, chunkOverlap);
  const stride = chunkSize - chunkOverlap;

  return {
    *[Symbol.iterator](): Iterator<TextWindow> {
      for (let index = 0, start = 0; start < text.length; index++, start += stride) {
        const windowText = text.slice(start, start + chunkSize);
        yield { index, startOffset: start, length: windowText.length, text: windowText };
      }
    },
  };
}

/**
 * Number of windows chunkText yields for a text of the given length.
 */
export function countChunks(textLength: number, chunkSize: number, chunkOverlap: number): number {
  validateChunkParams(chunkSize, chunkOverlap);
  return Math.ceil(textLength / (chunkSize - chunkOverlap));
}

/**
 * Deterministic chunk id, usable as a Qdrant point id.
 */
export function chunkId(documentId: string, contentVersion: string, chunkIndex: number): string {
  return uuidv5(`${documentId}\u0000${contentVersion}\u0000${chunkIndex}`, CHUNK_ID_NAMESPACE);
}

/**
 * Chunk one document version.
 */
export function chunkDocument(
  document: { documentId: string; contentVersion: string },
  text: string,
  params: ChunkingParams
): Iterable<Chunk> {
  const windows = chunkText(text, params.chunkSize, params.chunkOverlap);
  const { documentId, contentVersion } = document;

  return {
    *[Symbol.iterator](): Iterator<Chunk> {
      for (const window of windows) {
        yield {
          chunkId: chunkId(documentId, contentVersion, window.index),
          documentId,
          contentVersion,
          chunkIndex: window.index,
          startOffset: window.startOffset,
          length: window.length,
          text: window.text,
        };
      }
    },
  };
}
