/**
 * Ingestion Types
 *
 * What the orchestrator reports: one outcome per document and a summary
 * for the whole run.
 */

/**
 * What happened to one document.
 * - skipped: the current version was already fully indexed; nothing written
 * - repaired: the current version was indexed, stale versions were removed
 * - indexed: the current version was extracted, embedded and written
 * - failed: an error stopped this document; the run went on
 */
export type DocumentState = 'skipped' | 'repaired' | 'indexed' | 'failed';

export interface DocumentOutcome {
  documentId: string;
  contentVersion: string;
  state: DocumentState;
  /** Chunks written for this document (0 unless indexed) */
  chunksWritten: number;
  /** Versions deleted after the current one was in place */
  removedVersions: string[];
  durationMs: number;
  /** Set when state is 'failed' */
  error?: string;
  errorName?: string;
}

export interface IngestionFailure {
  documentId: string;
  /** 'ingest' for the document itself, 'prune' for removing a deleted one */
  phase: 'ingest' | 'prune';
  error: string;
  errorName: string;
}

export interface IngestionSummary {
  documentsSeen: number;
  indexed: number;
  skipped: number;
  repaired: number;
  failed: number;
  chunksWritten: number;
  /** Documents removed from the index because they left the source */
  pruned: string[];
  failures: IngestionFailure[];
  /** In completion order */
  outcomes: DocumentOutcome[];
  durationMs: number;
  /** True when the signal fired before every document started */
  cancelled: boolean;
}

/**
 * Progress hooks. The orchestrator fires them; the CLI decides how to show
 * them (spinner on a TTY, NDJSON with --json).
 */
export interface IngestionCallbacks {
  onListed?: (total: number) => void;
  onDocumentStart?: (documentId: string) => void;
  onDocumentComplete?: (outcome: DocumentOutcome, completed: number, total: number) => void;
  onPruned?: (documentId: string) => void;
}
