/**
 * Behaviour shared by every IndexStore adapter, run against SQLite
 * (in memory) and the Qdrant adapter over an in-process fake.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { openDatabase, IN_MEMORY } from '../../database/index.js';
import { IndexWriteError } from '../../errors/index.js';
import { chunkId } from '../../indexer/chunker/index.js';
import { hashEmbedding, InMemoryQdrant, TEST_DIMENSIONS } from '../../test-utils/index.js';
import { QdrantIndexStore } from '../qdrant-store.js';
import { SqliteIndexStore } from '../sqlite-store.js';
import type { IndexRecord, IndexStore } from '../types.js';

function record(documentId: string, contentVersion: string, chunkIndex: number, text: string): IndexRecord {
  return {
    chunkId: chunkId(documentId, contentVersion, chunkIndex),
    documentId,
    contentVersion,
    chunkIndex,
    sourceText: text,
    embedding: hashEmbedding(text),
  };
}

/** Each call is one second later than the previous */
function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

const adapters: Array<[string, () => IndexStore]> = [
  [
    'SqliteIndexStore',
    () =>
      new SqliteIndexStore({
        db: openDatabase(IN_MEMORY),
        dimensions: TEST_DIMENSIONS,
        now: steppingClock(),
      }),
  ],
  [
    'QdrantIndexStore',
    () =>
      new QdrantIndexStore({
        client: new InMemoryQdrant(),
        collection: 'bill_chunks',
        dimensions: TEST_DIMENSIONS,
        retry: { maxRetries: 0, baseDelayMs: 0 },
        now: steppingClock(),
      }),
  ],
];

describe.each(adapters)('%s', (_name, createStore) => {
  let store: IndexStore;

  beforeEach(async () => {
    store = createStore();
    await store.ensureReady();
  });

  afterEach(async () => {
    await store.close();
  });

  it('ensureReady can run twice', async () => {
    await expect(store.ensureReady()).resolves.toBeUndefined();
  });

  it('reports no version for an unknown document', async () => {
    expect(await store.getVersion('missing.pdf')).toBeUndefined();
    expect(await store.listVersions('missing.pdf')).toEqual([]);
  });

  it('returns the version after an upsert', async () => {
    await store.upsertBatch([record('a.pdf', 'v1', 0, 'electric bill march'), record('a.pdf', 'v1', 1, 'total due')]);

    expect(await store.getVersion('a.pdf')).toBe('v1');
    expect(await store.listVersions('a.pdf')).toEqual(['v1']);
  });

  it('hasChunk reports stored ids only', async () => {
    const stored = record('a.pdf', 'v1', 0, 'electric bill march');
    await store.upsertBatch([stored]);

    expect(await store.hasChunk(stored.chunkId)).toBe(true);
    expect(await store.hasChunk(chunkId('a.pdf', 'v1', 1))).toBe(false);
  });

  it('upserts by chunk id, so replaying a batch adds nothing', async () => {
    const batch = [record('a.pdf', 'v1', 0, 'electric bill march'), record('a.pdf', 'v1', 1, 'total due')];
    await store.upsertBatch(batch);
    await store.upsertBatch(batch);

    const docs = await store.listDocuments();
    expect(docs.map((d) => [d.documentId, d.contentVersion, d.chunkCount])).toEqual([['a.pdf', 'v1', 2]]);
  });

  it('lists versions newest first and getVersion picks the newest', async () => {
    await store.upsertBatch([record('a.pdf', 'v1', 0, 'old text')]);
    await store.upsertBatch([record('a.pdf', 'v2', 0, 'new text')]);

    expect(await store.listVersions('a.pdf')).toEqual(['v2', 'v1']);
    expect(await store.getVersion('a.pdf')).toBe('v2');
  });

  it('deleteVersion removes only the named version', async () => {
    await store.upsertBatch([record('a.pdf', 'v1', 0, 'old text'), record('b.pdf', 'v1', 0, 'water bill')]);
    await store.upsertBatch([record('a.pdf', 'v2', 0, 'new text')]);

    await store.deleteVersion('a.pdf', 'v1');

    expect(await store.listVersions('a.pdf')).toEqual(['v2']);
    expect(await store.listVersions('b.pdf')).toEqual(['v1']);
  });

  it('deleteDocument removes every version', async () => {
    await store.upsertBatch([record('a.pdf', 'v1', 0, 'old text')]);
    await store.upsertBatch([record('a.pdf', 'v2', 0, 'new text'), record('b.pdf', 'v1', 0, 'gas bill')]);

    await store.deleteDocument('a.pdf');

    const docs = await store.listDocuments();
    expect(docs.map((d) => d.documentId)).toEqual(['b.pdf']);
  });

  it('lists documents sorted by id with chunk counts', async () => {
    await store.upsertBatch([
      record('b.pdf', 'v1', 0, 'gas'),
      record('a.pdf', 'v1', 0, 'power'),
      record('a.pdf', 'v1', 1, 'meter'),
    ]);

    const docs = await store.listDocuments();
    expect(docs.map((d) => [d.documentId, d.chunkCount])).toEqual([
      ['a.pdf', 2],
      ['b.pdf', 1],
    ]);
    expect(docs[0]?.lastIndexed).toBe('2024-01-01T00:00:00.000Z');
  });

  it('returns the stored chunk first when queried with its own text', async () => {
    const texts = ['electricity usage kwh march', 'water meter reading gallons', 'gas supply therms winter'];
    await store.upsertBatch(texts.map((t, i) => record('bills.pdf', 'v1', i, t)));

    const hits = await store.search(hashEmbedding('water meter reading gallons'), 3);

    expect(hits[0]?.chunkIndex).toBe(1);
    expect(hits[0]?.sourceText).toBe('water meter reading gallons');
    expect(hits[0]?.score).toBeCloseTo(1, 5);
  });

  it('orders ties by chunk id ascending and honours topK', async () => {
    const records = [0, 1, 2, 3].map((i) => record(`doc-${i}.pdf`, 'v1', 0, 'identical text'));
    await store.upsertBatch(records);

    const hits = await store.search(hashEmbedding('identical text'), 3);
    const expected = records.map((r) => r.chunkId).sort().slice(0, 3);

    expect(hits.map((h) => h.chunkId)).toEqual(expected);
  });

  it('returns scores in non-increasing order', async () => {
    await store.upsertBatch([
      record('a.pdf', 'v1', 0, 'amount due forty dollars'),
      record('a.pdf', 'v1', 1, 'amount due'),
      record('a.pdf', 'v1', 2, 'unrelated words entirely'),
    ]);

    const hits = await store.search(hashEmbedding('amount due'), 10);
    const scores = hits.map((h) => h.score);

    expect(hits).toHaveLength(3);
    expect([...scores].sort((a, b) => b - a)).toEqual(scores);
  });

  it('returns nothing from an empty index', async () => {
    expect(await store.search(hashEmbedding('anything'), 5)).toEqual([]);
  });

  it('refuses to search once the signal has fired', async () => {
    await store.upsertBatch([record('a.pdf', 'v1', 0, 'gas meter')]);
    const controller = new AbortController();
    controller.abort();

    await expect(store.search(hashEmbedding('gas meter'), 5, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
  });

  it('rejects a query vector of the wrong length', async () => {
    await expect(store.search([1, 2, 3], 5)).rejects.toThrow(RangeError);
  });

  it('rejects records with the wrong dimensions as IndexWriteError', async () => {
    const bad = { ...record('a.pdf', 'v1', 0, 'text'), embedding: [1, 2] };

    await expect(store.upsertBatch([bad])).rejects.toBeInstanceOf(IndexWriteError);
    expect(await store.getVersion('a.pdf')).toBeUndefined();
  });
});
