/**
 * Content Source Types
 *
 * A content source lists the PDF documents available for ingestion and
 * returns their bytes. The content version is the only signal the
 * orchestrator uses to decide whether a document needs re-indexing, so it
 * must change if and only if the bytes change.
 */

/**
 * A document as listed by its source.
 */
export interface SourceDocument {
  /** Object key, or the path relative to the source root (always '/'-separated) */
  documentId: string;
  /** S3 ETag without quotes, or the SHA-256 hex digest of the bytes */
  contentVersion: string;
  /** Size in bytes, when the listing reports it */
  size?: number;
  lastModified?: Date;
}

export interface ContentSource {
  /** Human-readable location, e.g. s3://bills/2024/ */
  readonly description: string;

  /** Every PDF document currently in the source, sorted by documentId */
  listDocuments(signal?: AbortSignal): Promise<SourceDocument[]>;

  /**
   * Raw bytes of a listed document.
   *
   * @throws ContentChangedError when the bytes no longer match `document.contentVersion`
   */
  getContent(document: SourceDocument, signal?: AbortSignal): Promise<Uint8Array>;
}

/**
 * Keys and file names ingested as PDFs.
 */
export function isPdfKey(key: string): boolean {
  return key.toLowerCase().endsWith('.pdf') && !key.endsWith('/');
}

export function compareDocumentIds(a: SourceDocument, b: SourceDocument): number {
  return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
}
