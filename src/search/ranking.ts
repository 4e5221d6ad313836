/**
 * Similarity and ordering shared by the store adapters.
 */

import type { IndexedDocument, ScoredRecord } from './types.js';

/**
 * Cosine similarity in [-1, 1]. A zero vector scores 0 against everything.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Score descending, then chunkId ascending (code-unit order, not locale).
 */
export function compareHits(
  a: Pick<ScoredRecord, 'score' | 'chunkId'>,
  b: Pick<ScoredRecord, 'score' | 'chunkId'>
): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunkId === b.chunkId) {
    return 0;
  }
  return a.chunkId < b.chunkId ? -1 : 1;
}

/**
 * Sort and cut to the top K.
 */
export function rankHits<T extends Pick<ScoredRecord, 'score' | 'chunkId'>>(
  hits: T[],
  topK: number
): T[] {
  return [...hits].sort(compareHits).slice(0, Math.max(0, topK));
}

/**
 * documentId ascending, then newest version first.
 */
export function compareIndexedDocuments(a: IndexedDocument, b: IndexedDocument): number {
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  // newest version first within a document
  if (a.lastIndexed !== b.lastIndexed) {
    return a.lastIndexed < b.lastIndexed ? 1 : -1;
  }
  return a.contentVersion < b.contentVersion ? -1 : a.contentVersion > b.contentVersion ? 1 : 0;
}
