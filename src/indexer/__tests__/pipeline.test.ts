/**
 * Ingestion Orchestrator Tests
 *
 * Runs the real chunker, embedder and SQLite store (in memory) against an
 * in-memory source whose "PDF bytes" are plain UTF-8 text.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { IngestionOrchestrator, type IngestionOrchestratorOptions } from '../pipeline.js';
import { chunkId, countChunks } from '../chunker/index.js';
import { Embedder } from '../embedder/index.js';
import { openDatabase, IN_MEMORY } from '../../database/index.js';
import { ConfigError, IndexWriteError } from '../../errors/index.js';
import { SqliteIndexStore, type IndexStore } from '../../search/index.js';
import {
  hashEmbedding,
  hashEmbeddingModel,
  MemoryContentSource,
  recordWrites,
  utf8Extractor,
  TEST_DIMENSIONS,
  type StoreWrite,
} from '../../test-utils/index.js';

const CHUNKING = { chunkSize: 40, chunkOverlap: 10 };

const MARCH = 'Electric bill for March. Amount due 42.10 dollars. Meter reading 1234 kWh.';
const APRIL = 'Water bill for April. Amount due 18.75 dollars. Usage 3100 gallons.';

function newEmbedder(): Embedder {
  return new Embedder(hashEmbeddingModel(), {
    dimensions: TEST_DIMENSIONS,
    documentPrefix: 'search_document: ',
    queryPrefix: 'search_query: ',
    retry: { maxRetries: 0, baseDelayMs: 0 },
  });
}

describe('IngestionOrchestrator', () => {
  let source: MemoryContentSource;
  let sqlite: SqliteIndexStore;
  let store: IndexStore;
  let writes: StoreWrite[];

  function orchestrator(overrides: Partial<IngestionOrchestratorOptions> = {}): IngestionOrchestrator {
    return new IngestionOrchestrator({
      source,
      extractor: utf8Extractor,
      embedder: newEmbedder(),
      store,
      chunking: CHUNKING,
      concurrency: 2,
      ...overrides,
    });
  }

  async function versionOf(documentId: string): Promise<string> {
    const doc = (await source.listDocuments()).find((d) => d.documentId === documentId);
    if (!doc) throw new Error(`${documentId} not in source`);
    return doc.contentVersion;
  }

  beforeEach(() => {
    source = new MemoryContentSource({ 'march.pdf': MARCH, 'april.pdf': APRIL });
    sqlite = new SqliteIndexStore({ db: openDatabase(IN_MEMORY), dimensions: TEST_DIMENSIONS });
    ({ store, writes } = recordWrites(sqlite));
  });

  it('indexes every document on the first run', async () => {
    const summary = await orchestrator().run();

    const expectedChunks = countChunks(MARCH.length, 40, 10) + countChunks(APRIL.length, 40, 10);
    expect(summary.documentsSeen).toBe(2);
    expect(summary.indexed).toBe(2);
    expect(summary.skipped).toBe(0);
    expect(summary.failed).toBe(0);
    expect(summary.chunksWritten).toBe(expectedChunks);
    expect(summary.cancelled).toBe(false);

    const docs = await store.listDocuments();
    expect(docs.map((d) => [d.documentId, d.contentVersion])).toEqual([
      ['april.pdf', await versionOf('april.pdf')],
      ['march.pdf', await versionOf('march.pdf')],
    ]);
  });

  it('makes zero store writes when nothing changed', async () => {
    await orchestrator().run();
    const before = writes.length;

    const summary = await orchestrator().run();

    expect(summary.skipped).toBe(2);
    expect(summary.indexed).toBe(0);
    expect(summary.chunksWritten).toBe(0);
    expect(writes.length).toBe(before);
    expect(source.fetches.get('march.pdf')).toBe(1);
  });

  it('replaces the old version when a document changes', async () => {
    await orchestrator().run();
    const oldVersion = await versionOf('march.pdf');

    source.files.set('march.pdf', 'Electric bill for March, corrected. Amount due 40.00 dollars.');
    const summary = await orchestrator().run();
    const newVersion = await versionOf('march.pdf');

    expect(summary.indexed).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(summary.outcomes.find((o) => o.documentId === 'march.pdf')?.removedVersions).toEqual([oldVersion]);
    expect(await store.listVersions('march.pdf')).toEqual([newVersion]);

    const hits = await store.search(hashEmbedding(MARCH), 50);
    expect(hits.filter((h) => h.contentVersion === oldVersion)).toEqual([]);
  });

  it('deletes the old version only after the new one is written', async () => {
    await orchestrator().run();
    source.files.set('march.pdf', 'Electric bill for March, corrected.');
    const before = writes.length;

    await orchestrator().run();

    const ops = writes.slice(before).map((w) => w.op);
    expect(ops[ops.length - 1]).toBe('deleteVersion');
    expect(ops.slice(0, -1).every((op) => op === 'upsert')).toBe(true);
  });

  it('writes batches last-to-first so chunk 0 lands last', async () => {
    source = new MemoryContentSource({ 'long.pdf': 'abcdefghij'.repeat(13) });

    await orchestrator({ upsertBatchSize: 2 }).run();

    const batches = writes
      .filter((w): w is Extract<StoreWrite, { op: 'upsert' }> => w.op === 'upsert')
      .map((w) => w.records.map((r) => r.chunkIndex));
    expect(batches).toEqual([[4], [2, 3], [0, 1]]);
  });

  it('keeps going when one document cannot be extracted', async () => {
    source.files.set('scan.pdf', '   ');

    const summary = await orchestrator().run();

    expect(summary.documentsSeen).toBe(3);
    expect(summary.indexed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      {
        documentId: 'scan.pdf',
        phase: 'ingest',
        error: 'Cannot extract text from scan.pdf: no extractable text (scanned or image-only PDF?)',
        errorName: 'ExtractionError',
      },
    ]);
    expect(await store.getVersion('scan.pdf')).toBeUndefined();
  });

  it('fails a document rewritten between listing and fetch', async () => {
    const listedVersion = await versionOf('march.pdf');
    const list = source.listDocuments.bind(source);
    vi.spyOn(source, 'listDocuments').mockImplementationOnce(async () => {
      const documents = await list();
      source.files.set('march.pdf', 'Electric bill for March, reissued. Amount due 40.00 dollars.');
      return documents;
    });

    const summary = await orchestrator().run();

    expect(summary.indexed).toBe(1);
    expect(summary.failures).toEqual([
      {
        documentId: 'march.pdf',
        phase: 'ingest',
        error: `march.pdf changed after it was listed (expected version ${listedVersion})`,
        errorName: 'ContentChangedError',
      },
    ]);
    expect(await store.getVersion('march.pdf')).toBeUndefined();
  });

  it('records an embedding failure and writes nothing for that document', async () => {
    const failing = new Embedder(
      {
        async embedDocuments(texts: string[]) {
          if (texts.some((t) => t.includes('Water'))) {
            throw new Error('model "nomic-embed-text" not found, try pulling it first');
          }
          return texts.map((t) => hashEmbedding(t));
        },
      },
      {
        dimensions: TEST_DIMENSIONS,
        documentPrefix: '',
        queryPrefix: '',
        retry: { maxRetries: 0, baseDelayMs: 0 },
      }
    );

    const summary = await orchestrator({ embedder: failing }).run();

    expect(summary.indexed).toBe(1);
    expect(summary.failures.map((f) => [f.documentId, f.errorName])).toEqual([['april.pdf', 'EmbeddingError']]);
    expect(await store.listVersions('april.pdf')).toEqual([]);
  });

  it('repairs a document left with a stale version', async () => {
    await orchestrator().run();
    await sqlite.upsertBatch([
      {
        chunkId: chunkId('march.pdf', 'stale-etag', 0),
        documentId: 'march.pdf',
        contentVersion: 'stale-etag',
        chunkIndex: 0,
        sourceText: 'left over from an interrupted run',
        embedding: hashEmbedding('left over'),
      },
    ]);
    const before = writes.length;

    const summary = await orchestrator().run();

    expect(summary.repaired).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(writes.slice(before)).toEqual([
      { op: 'deleteVersion', documentId: 'march.pdf', contentVersion: 'stale-etag' },
    ]);
    expect(await store.listVersions('march.pdf')).toEqual([await versionOf('march.pdf')]);
  });

  it('re-indexes a current version whose chunk 0 is missing', async () => {
    const version = await versionOf('march.pdf');
    await sqlite.ensureReady();
    await sqlite.upsertBatch([
      {
        chunkId: chunkId('march.pdf', version, 1),
        documentId: 'march.pdf',
        contentVersion: version,
        chunkIndex: 1,
        sourceText: 'partial',
        embedding: hashEmbedding('partial'),
      },
    ]);

    const summary = await orchestrator().run();

    expect(summary.outcomes.find((o) => o.documentId === 'march.pdf')?.state).toBe('indexed');
    expect(await store.hasChunk(chunkId('march.pdf', version, 0))).toBe(true);
    const docs = await store.listDocuments();
    expect(docs.find((d) => d.documentId === 'march.pdf')?.chunkCount).toBe(countChunks(MARCH.length, 40, 10));
  });

  it('rolls back a partly written version when an upsert fails', async () => {
    await orchestrator().run();
    const oldVersion = await versionOf('march.pdf');
    source.files.set('march.pdf', 'abcdefghij'.repeat(13));

    let upserts = 0;
    const flaky: IndexStore = {
      ...store,
      upsertBatch: async (records) => {
        upserts += 1;
        if (upserts === 2) {
          throw new IndexWriteError('disk full');
        }
        await store.upsertBatch(records);
      },
    };

    const summary = await orchestrator({ store: flaky, upsertBatchSize: 2 }).run();

    expect(summary.failures.map((f) => [f.documentId, f.error])).toEqual([['march.pdf', 'disk full']]);
    expect(await store.listVersions('march.pdf')).toEqual([oldVersion]);
  });

  it('prunes documents that left the source only when asked', async () => {
    await orchestrator().run();
    source.files.delete('april.pdf');

    const kept = await orchestrator().run();
    expect(kept.pruned).toEqual([]);
    expect(await store.getVersion('april.pdf')).toBeDefined();

    const pruned = await orchestrator({ prune: true }).run();
    expect(pruned.pruned).toEqual(['april.pdf']);
    expect((await store.listDocuments()).map((d) => d.documentId)).toEqual(['march.pdf']);
  });

  it('starts no document once cancelled and skips pruning', async () => {
    await orchestrator().run();
    source.files.delete('april.pdf');
    const controller = new AbortController();
    controller.abort();
    const before = writes.length;

    const summary = await orchestrator({ prune: true }).run(controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(summary.outcomes).toEqual([]);
    expect(summary.pruned).toEqual([]);
    expect(writes.length).toBe(before);
  });

  it('reports progress through the callbacks', async () => {
    const events: string[] = [];

    await orchestrator({
      concurrency: 1,
      onListed: (total) => events.push(`listed ${total}`),
      onDocumentStart: (id) => events.push(`start ${id}`),
      onDocumentComplete: (outcome, done, total) => events.push(`${outcome.state} ${outcome.documentId} ${done}/${total}`),
    }).run();

    expect(events).toEqual([
      'listed 2',
      'start april.pdf',
      'indexed april.pdf 1/2',
      'start march.pdf',
      'indexed march.pdf 2/2',
    ]);
  });

  it('rejects invalid chunking parameters up front', () => {
    expect(() => orchestrator({ chunking: { chunkSize: 100, chunkOverlap: 100 } })).toThrow(ConfigError);
  });

  it('finds the first chunk of a document when queried with its own text', async () => {
    await orchestrator().run();
    const embedder = newEmbedder();
    const firstChunk = MARCH.slice(0, 40);

    const hits = await store.search(await embedder.embedQuery(firstChunk), 1);

    expect(hits[0]?.chunkId).toBe(chunkId('march.pdf', await versionOf('march.pdf'), 0));
  });
});
