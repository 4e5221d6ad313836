/**
 * Ingestion Orchestrator
 *
 * Drives Source -> Extractor -> Chunker -> Embedder -> Index Store for every
 * listed document, on a bounded worker pool. The index store is the only
 * ledger: a document is up to date when the store holds its current
 * version, completely, and nothing else.
 *
 * Completeness: batches are written last-to-first, so the batch holding
 * chunk 0 lands last. A version whose chunk 0 is stored was written in full.
 *
 * Old versions are deleted only after the new one is in place, so a crash
 * leaves the document stale but searchable rather than missing.
 */

import { chunkDocument, chunkId, validateChunkParams, type Chunk, type ChunkingParams } from './chunker/index.js';
import type { Embedder } from './embedder/index.js';
import type { TextExtractor } from './extractor/index.js';
import type {
  DocumentOutcome,
  IngestionCallbacks,
  IngestionFailure,
  IngestionSummary,
} from './types.js';
import type { ContentSource, SourceDocument } from '../source/index.js';
import type { IndexRecord, IndexStore } from '../search/index.js';
import { describeError, errorName } from '../errors/index.js';
import { KeyedMutex, mapWithConcurrency } from '../utils/concurrency.js';
import { isAbortError, throwIfAborted } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface IngestionOrchestratorOptions extends IngestionCallbacks {
  source: ContentSource;
  extractor: TextExtractor;
  embedder: Embedder;
  store: IndexStore;
  chunking: ChunkingParams;

  /** Documents processed at once (default 4) */
  concurrency?: number;

  /** Records per upsert call (default 64) */
  upsertBatchSize?: number;

  /** Remove indexed documents that are no longer in the source */
  prune?: boolean;

  /**
   * Per-document locks. Pass the same instance to orchestrators that may
   * run against the same store at once.
   */
  locks?: KeyedMutex;

  logger?: Logger;
}

function split<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class IngestionOrchestrator {
  private readonly options: IngestionOrchestratorOptions;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly upsertBatchSize: number;

  constructor(options: IngestionOrchestratorOptions) {
    // Fail at construction, not halfway through the first document
    validateChunkParams(options.chunking.chunkSize, options.chunking.chunkOverlap);

    this.options = options;
    this.locks = options.locks ?? new KeyedMutex();
    this.logger = options.logger ?? silentLogger;
    this.concurrency = options.concurrency ?? 4;
    this.upsertBatchSize = Math.max(1, options.upsertBatchSize ?? 64);
  }

  /**
   * Ingest every document in the source.
   *
   * Per-document errors are recorded in the summary; only a failure to
   * prepare the store or list the source rejects.
   */
  async run(signal?: AbortSignal): Promise<IngestionSummary> {
    const startTime = performance.now();
    const { source, store } = this.options;

    await store.ensureReady();
    const documents = await source.listDocuments(signal);
    this.options.onListed?.(documents.length);
    this.logger.debug?.(`Found ${documents.length} document(s) in ${source.description}`);

    const outcomes: DocumentOutcome[] = [];
    const failures: IngestionFailure[] = [];

    await mapWithConcurrency(
      documents,
      this.concurrency,
      async (document) => {
        const outcome = await this.locks.runExclusive(document.documentId, () =>
          this.processDocument(document, signal)
        );
        if (!outcome) {
          return;
        }
        outcomes.push(outcome);
        if (outcome.state === 'failed') {
          failures.push({
            documentId: outcome.documentId,
            phase: 'ingest',
            error: outcome.error ?? 'unknown error',
            errorName: outcome.errorName ?? 'Error',
          });
        }
        this.options.onDocumentComplete?.(outcome, outcomes.length, documents.length);
      },
      signal
    );

    const cancelled = signal?.aborted ?? false;
    const pruned =
      this.options.prune && !cancelled ? await this.prune(documents, failures) : [];

    const count = (state: DocumentOutcome['state']): number =>
      outcomes.filter((o) => o.state === state).length;

    return {
      documentsSeen: documents.length,
      indexed: count('indexed'),
      skipped: count('skipped'),
      repaired: count('repaired'),
      failed: failures.length,
      chunksWritten: outcomes.reduce((sum, o) => sum + o.chunksWritten, 0),
      pruned,
      failures,
      outcomes,
      durationMs: Math.round(performance.now() - startTime),
      cancelled,
    };
  }

  /**
   * Bring one document up to date. Returns undefined when the run was
   * cancelled while this document was in flight.
   */
  private async processDocument(
    document: SourceDocument,
    signal?: AbortSignal
  ): Promise<DocumentOutcome | undefined> {
    const { store } = this.options;
    const { documentId, contentVersion } = document;
    const started = performance.now();
    const finish = (
      state: DocumentOutcome['state'],
      chunksWritten: number,
      removedVersions: string[]
    ): DocumentOutcome => ({
      documentId,
      contentVersion,
      state,
      chunksWritten,
      removedVersions,
      durationMs: Math.round(performance.now() - started),
    });

    this.options.onDocumentStart?.(documentId);

    try {
      throwIfAborted(signal);

      const versions = await store.listVersions(documentId);
      const stale = versions.filter((v) => v !== contentVersion);
      const current =
        versions.includes(contentVersion) &&
        (await store.hasChunk(chunkId(documentId, contentVersion, 0)));

      if (current && stale.length === 0) {
        this.logger.debug?.(`${documentId}: up to date (${contentVersion})`);
        return finish('skipped', 0, []);
      }

      if (current) {
        await this.removeVersions(documentId, stale);
        this.logger.info?.(`${documentId}: removed ${stale.length} stale version(s)`);
        return finish('repaired', 0, stale);
      }

      const written = await this.reindex(document, signal);
      await this.removeVersions(documentId, stale);
      this.logger.info?.(`${documentId}: indexed ${written} chunk(s)`);
      return finish('indexed', written, stale);
    } catch (error) {
      if (signal?.aborted && isAbortError(error)) {
        return undefined;
      }
      this.logger.warn(`${documentId}: ${describeError(error)}`);
      return {
        ...finish('failed', 0, []),
        error: describeError(error),
        errorName: errorName(error),
      };
    }
  }

  /**
   * Fetch, extract, chunk, embed and write the current version.
   *
   * @returns number of chunks written
   */
  private async reindex(document: SourceDocument, signal?: AbortSignal): Promise<number> {
    const { source, extractor, embedder, chunking } = this.options;
    const { documentId, contentVersion } = document;

    const bytes = await source.getContent(document, signal);
    const text = await extractor.extract(documentId, bytes);
    const chunks: Chunk[] = [...chunkDocument(document, text, chunking)];

    // Embedding is all-or-nothing, so nothing is written for a document
    // whose embedding fails
    const vectors = await embedder.embed(
      chunks.map((c) => c.text),
      'document',
      signal
    );

    const records: IndexRecord[] = chunks.map((chunk, i) => ({
      chunkId: chunk.chunkId,
      documentId,
      contentVersion,
      chunkIndex: chunk.chunkIndex,
      sourceText: chunk.text,
      embedding: vectors[i] ?? [],
    }));

    // Past this point the document is finished even if the signal fires:
    // stopping between batches would leave a half-written version behind
    try {
      for (const batch of split(records, this.upsertBatchSize).reverse()) {
        await this.options.store.upsertBatch(batch);
      }
    } catch (error) {
      await this.rollback(documentId, contentVersion);
      throw error;
    }

    return records.length;
  }

  /**
   * Remove what a failed write left behind, so search never mixes a
   * partial new version with the old one. The version is incomplete here
   * (chunk 0 goes last), so deleting it loses nothing.
   */
  private async rollback(documentId: string, contentVersion: string): Promise<void> {
    try {
      await this.options.store.deleteVersion(documentId, contentVersion);
    } catch (error) {
      // The next run overwrites the partial version
      this.logger.warn(
        `${documentId}: could not remove partial version ${contentVersion}: ${describeError(error)}`
      );
    }
  }

  private async removeVersions(documentId: string, versions: string[]): Promise<void> {
    for (const version of versions) {
      await this.options.store.deleteVersion(documentId, version);
    }
  }

  /**
   * Delete indexed documents that are no longer listed by the source.
   */
  private async prune(listed: SourceDocument[], failures: IngestionFailure[]): Promise<string[]> {
    const { store } = this.options;
    const present = new Set(listed.map((d) => d.documentId));
    const indexed = new Set((await store.listDocuments()).map((d) => d.documentId));
    const pruned: string[] = [];

    for (const documentId of indexed) {
      if (present.has(documentId)) {
        continue;
      }
      try {
        await this.locks.runExclusive(documentId, () => store.deleteDocument(documentId));
        pruned.push(documentId);
        this.options.onPruned?.(documentId);
        this.logger.info?.(`${documentId}: removed (no longer in source)`);
      } catch (error) {
        this.logger.warn(`${documentId}: prune failed: ${describeError(error)}`);
        failures.push({
          documentId,
          phase: 'prune',
          error: describeError(error),
          errorName: errorName(error),
        });
      }
    }

    return pruned;
  }
}
