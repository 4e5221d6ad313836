/**
 * Row types for the local SQLite index, plus the Float32 BLOB codec.
 */

/**
 * One stored chunk. Mirrors the `index_records` table.
 */
export interface IndexRecordRow {
  /** UUID v5 of document, version and chunk index */
  chunk_id: string;
  document_id: string;
  content_version: string;
  chunk_index: number;
  source_text: string;
  /** Float32 embedding as a BLOB */
  embedding: Buffer;
  /** ISO timestamp of the write */
  indexed_at: string;
}

/**
 * Convert a vector to a Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob([0.1, 0.2, 0.3]);
 * db.prepare('UPDATE index_records SET embedding = ? WHERE chunk_id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: ArrayLike<number>): Buffer {
  const floats = Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to a vector.
 *
 * The bytes are copied first: a Buffer's offset into its backing store is
 * not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = new Uint8Array(blob.byteLength);
  bytes.set(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4));
}
