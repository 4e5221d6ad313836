/**
 * In-process stand-ins for the embedding model, content source and index
 * store writes.
 */

import type { EmbeddingModel } from '../indexer/embedder/types.js';
import type { IndexRecord, IndexStore } from '../search/types.js';
import type { ContentSource, SourceDocument } from '../source/types.js';
import type { TextExtractor } from '../indexer/extractor/pdf-extractor.js';
import { ContentChangedError, ExtractionError, FileNotFoundError } from '../errors/index.js';
import { sha256Hex } from '../source/local-source.js';

/** Vector length used across the tests */
export const TEST_DIMENSIONS = 16;

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector: each lower-cased word adds 1 to a hashed slot.
 * Identical texts embed identically; texts sharing words score higher.
 */
export function hashEmbedding(text: string, dimensions = TEST_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word) {
      const slot = fnv1a(word) % dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
  }
  return vector;
}

export function hashEmbeddingModel(dimensions = TEST_DIMENSIONS): EmbeddingModel & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    async embedDocuments(texts: string[]) {
      calls.push(texts);
      return texts.map((t) => hashEmbedding(t, dimensions));
    },
  };
}

/**
 * Content source over a map of id -> text. The text is served as the
 * document's bytes and the version is its SHA-256.
 */
export class MemoryContentSource implements ContentSource {
  readonly description = 'memory://';
  readonly files = new Map<string, string>();
  /** documentId -> number of getContent calls */
  readonly fetches = new Map<string, number>();

  constructor(files: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(files)) {
      this.files.set(id, text);
    }
  }

  async listDocuments(): Promise<SourceDocument[]> {
    return [...this.files.entries()]
      .map(([documentId, text]) => ({
        documentId,
        contentVersion: sha256Hex(new TextEncoder().encode(text)),
        size: text.length,
      }))
      .sort((a, b) => (a.documentId < b.documentId ? -1 : 1));
  }

  async getContent({ documentId, contentVersion }: SourceDocument): Promise<Uint8Array> {
    this.fetches.set(documentId, (this.fetches.get(documentId) ?? 0) + 1);
    const text = this.files.get(documentId);
    if (text === undefined) {
      throw new FileNotFoundError(documentId);
    }
    const bytes = new TextEncoder().encode(text);
    if (sha256Hex(bytes) !== contentVersion) {
      throw new ContentChangedError(documentId, contentVersion);
    }
    return bytes;
  }
}

export type StoreWrite =
  | { op: 'upsert'; records: IndexRecord[] }
  | { op: 'deleteVersion'; documentId: string; contentVersion: string }
  | { op: 'deleteDocument'; documentId: string };

/**
 * Wrap a store and record every write that reaches it.
 */
export function recordWrites(store: IndexStore): { store: IndexStore; writes: StoreWrite[] } {
  const writes: StoreWrite[] = [];
  const wrapped: IndexStore = {
    description: store.description,
    dimensions: store.dimensions,
    ensureReady: () => store.ensureReady(),
    getVersion: (id) => store.getVersion(id),
    listVersions: (id) => store.listVersions(id),
    hasChunk: (id) => store.hasChunk(id),
    upsertBatch: async (records) => {
      writes.push({ op: 'upsert', records });
      await store.upsertBatch(records);
    },
    deleteVersion: async (documentId, contentVersion) => {
      writes.push({ op: 'deleteVersion', documentId, contentVersion });
      await store.deleteVersion(documentId, contentVersion);
    },
    deleteDocument: async (documentId) => {
      writes.push({ op: 'deleteDocument', documentId });
      await store.deleteDocument(documentId);
    },
    search: (embedding, topK, signal) => store.search(embedding, topK, signal),
    listDocuments: () => store.listDocuments(),
    close: () => store.close(),
  };
  return { store: wrapped, writes };
}

/**
 * Treats the bytes as UTF-8 text. Documents whose text is empty fail the
 * way an image-only PDF does.
 */
export const utf8Extractor: TextExtractor = {
  async extract(documentId, bytes) {
    const text = new TextDecoder().decode(bytes).trim();
    if (!text) {
      throw new ExtractionError(documentId, 'no extractable text (scanned or image-only PDF?)');
    }
    return text;
  },
};
