/**
 * Tests for the ingest command, run against an in-memory store and source.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

import { createIngestCommand } from '../ingest.js';
import { IngestionFailedError, ValidationError } from '../../../errors/index.js';
import { MemoryContentSource } from '../../../test-utils/index.js';
import { recordingContext, testRuntime } from '../../__tests__/helpers.js';

const BILLS = {
  '2024/march.pdf': 'Electricity bill for March 2024. Amount due 84.10',
  '2024/april.pdf': 'Electricity bill for April 2024. Amount due 91.25',
};

describe('createIngestCommand', () => {
  let consoleLog: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function events(): Array<{ type: string; data: Record<string, unknown> }> {
    return consoleLog.mock.calls.map(([line]) => JSON.parse(String(line)));
  }

  async function ingest(args: string[], setup: ReturnType<typeof testRuntime>): Promise<void> {
    const ctx = recordingContext({ json: true });
    await createIngestCommand(() => ctx, { createRuntime: setup.factory }).parseAsync(args, { from: 'user' });
  }

  it('indexes every document and reports each one', async () => {
    const setup = testRuntime({ source: new MemoryContentSource(BILLS) });

    await ingest([], setup);

    expect(events().map((e) => e.type)).toEqual(['listed', 'document_complete', 'document_complete', 'complete']);
    expect(events().at(-1)?.data).toMatchObject({ documents_seen: 2, indexed: 2, failed: 0, cancelled: false });

    const indexed = await setup.runtime.store.listDocuments();
    expect(indexed.map((doc) => doc.documentId).sort()).toEqual(['2024/april.pdf', '2024/march.pdf']);
    expect(setup.runtime.closed).toBe(true);
  });

  it('skips unchanged documents on the next run', async () => {
    const setup = testRuntime({ source: new MemoryContentSource(BILLS) });

    await ingest([], setup);
    consoleLog.mockClear();
    await ingest([], setup);

    expect(events().at(-1)?.data).toMatchObject({ indexed: 0, skipped: 2, chunks_written: 0 });
  });

  it('fails with the documents that could not be ingested', async () => {
    const setup = testRuntime({ source: new MemoryContentSource({ ...BILLS, '2024/scan.pdf': '' }) });

    const run = ingest([], setup);

    await expect(run).rejects.toBeInstanceOf(IngestionFailedError);
    await expect(run).rejects.toMatchObject({ failedDocuments: ['2024/scan.pdf'], code: 1 });
    expect(events().at(-1)?.data).toMatchObject({ indexed: 2, failed: 1 });
  });

  it('removes documents deleted from the source with --prune', async () => {
    const source = new MemoryContentSource(BILLS);
    const setup = testRuntime({ source });

    await ingest([], setup);
    source.files.delete('2024/april.pdf');
    consoleLog.mockClear();
    await ingest(['--prune'], setup);

    expect(events().find((e) => e.type === 'pruned')?.data).toEqual({ document_id: '2024/april.pdf' });
    const indexed = await setup.runtime.store.listDocuments();
    expect(indexed.map((doc) => doc.documentId)).toEqual(['2024/march.pdf']);
  });

  it('keeps documents deleted from the source without --prune', async () => {
    const source = new MemoryContentSource(BILLS);
    const setup = testRuntime({ source });

    await ingest([], setup);
    source.files.delete('2024/april.pdf');
    await ingest([], setup);

    expect(await setup.runtime.store.listDocuments()).toHaveLength(2);
  });

  it('rejects an invalid --concurrency before building the runtime', async () => {
    const setup = testRuntime();
    const factory = vi.fn(setup.factory);
    const ctx = recordingContext({ json: true });

    const run = createIngestCommand(() => ctx, { createRuntime: factory }).parseAsync(['--concurrency', '0'], {
      from: 'user',
    });

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    await expect(run).rejects.toMatchObject({ issues: ['concurrency: --concurrency must be between 1 and 64'] });
    expect(factory).not.toHaveBeenCalled();
  });

  it('removes its SIGINT handler when done', async () => {
    const before = process.listenerCount('SIGINT');
    await ingest([], testRuntime({ source: new MemoryContentSource(BILLS) }));

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
