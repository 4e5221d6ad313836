/**
 * Index store types
 *
 * The index store is the only ledger of what has been ingested: the
 * versions it holds for a document are the ingestion state.
 */

/**
 * One chunk as stored, with its embedding.
 */
export interface IndexRecord {
  /** UUID v5 of document, version and chunk index; the upsert key */
  chunkId: string;
  documentId: string;
  contentVersion: string;
  chunkIndex: number;
  sourceText: string;
  embedding: number[];
}

/** A stored chunk without its vector. */
export type StoredChunk = Omit<IndexRecord, 'embedding'>;

export interface ScoredRecord extends StoredChunk {
  /** Cosine similarity, higher = more similar */
  score: number;
}

/**
 * A retrieved chunk with its citation tag, as the agent and the CLI see it.
 */
export interface SearchHit {
  chunkId: string;
  documentId: string;
  contentVersion: string;
  chunkIndex: number;
  score: number;
  text: string;
  /** `[documentId#chunkIndex]` */
  citationTag: string;
}

/**
 * One live version of a document, as reported by `listDocuments()`.
 */
export interface IndexedDocument {
  documentId: string;
  contentVersion: string;
  chunkCount: number;
  /** ISO timestamp of the most recent write for this version */
  lastIndexed: string;
}

/**
 * Port over the vector database.
 *
 * Writes are keyed by `chunkId`, so replaying a batch is harmless.
 * Failed writes raise IndexWriteError; an endpoint that stays down raises
 * ServiceUnavailableError.
 */
export interface IndexStore {
  /** Human-readable location, shown by `status` */
  readonly description: string;
  readonly dimensions: number;

  /** Create the collection or table and its indexes if missing. */
  ensureReady(): Promise<void>;

  /** Most recently indexed version, or undefined if the document is absent. */
  getVersion(documentId: string): Promise<string | undefined>;

  /** Every version currently stored for the document, newest first. */
  listVersions(documentId: string): Promise<string[]>;

  /** Whether a record with this id is stored. */
  hasChunk(chunkId: string): Promise<boolean>;

  /** All-or-nothing per call. */
  upsertBatch(records: IndexRecord[]): Promise<void>;

  deleteVersion(documentId: string, contentVersion: string): Promise<void>;

  deleteDocument(documentId: string): Promise<void>;

  /** Descending score, ties by chunkId ascending. Rejects once `signal` fires. */
  search(queryEmbedding: number[], topK: number, signal?: AbortSignal): Promise<ScoredRecord[]>;

  /** One entry per stored (document, version) pair, sorted by documentId. */
  listDocuments(): Promise<IndexedDocument[]>;

  close(): Promise<void>;
}
