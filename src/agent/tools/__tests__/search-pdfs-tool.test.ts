/**
 * search_pdfs tool tests
 *
 * Argument validation against the zod schema, min_score filtering and the
 * snake_case result shape.
 */

import { describe, it, expect, vi } from 'vitest';
import { createSearchPdfsTool, toResultItems, SEARCH_PDFS_TOOL } from '../search-pdfs-tool.js';
import { ToolArgumentError } from '../../../errors/index.js';
import type { ScoredRecord } from '../../../search/types.js';

const RETRIEVAL = { top_k: 5, max_top_k: 10, min_score: 0.3 };

const RECORDS: ScoredRecord[] = [
  {
    chunkId: 'a',
    documentId: '2024/march.pdf',
    contentVersion: 'v1',
    chunkIndex: 0,
    sourceText: 'Amount due $84.10',
    score: 0.91,
  },
  {
    chunkId: 'b',
    documentId: '2024/april.pdf',
    contentVersion: 'v2',
    chunkIndex: 3,
    sourceText: 'Meter reading 10452',
    score: 0.3,
  },
  {
    chunkId: 'c',
    documentId: '2024/april.pdf',
    contentVersion: 'v2',
    chunkIndex: 4,
    sourceText: 'Thank you for your payment',
    score: 0.12,
  },
];

function setup(records: ScoredRecord[] = RECORDS) {
  const embedQuery = vi.fn(async (_text: string, _signal?: AbortSignal) => [1, 0, 0]);
  const search = vi.fn(async (_embedding: number[], _topK: number, _signal?: AbortSignal) => records);
  const tool = createSearchPdfsTool({ embedder: { embedQuery }, store: { search }, retrieval: RETRIEVAL });
  return { tool, embedQuery, search };
}

function parseError(run: () => unknown): ToolArgumentError {
  try {
    run();
  } catch (error) {
    if (error instanceof ToolArgumentError) return error;
    throw error;
  }
  throw new Error('expected ToolArgumentError');
}

describe('search_pdfs schema', () => {
  it('describes query and top_k with the configured bound', () => {
    const { tool } = setup();

    expect(tool.name).toBe(SEARCH_PDFS_TOOL);
    expect(tool.schema.name).toBe('search_pdfs');
    expect(tool.schema.parameters.required).toEqual(['query']);
    expect(tool.schema.parameters.additionalProperties).toBe(false);
    expect(tool.schema.parameters.properties.top_k).toMatchObject({ type: 'integer', minimum: 1, maximum: 10 });
  });
});

describe('search_pdfs parse', () => {
  it('defaults top_k to retrieval.top_k', () => {
    const { tool } = setup();
    expect(tool.parse({ query: 'march total' })).toEqual({ query: 'march total', top_k: 5 });
  });

  it('accepts arguments as a JSON string', () => {
    const { tool } = setup();
    expect(tool.parse('{"query":"gas usage","top_k":3}')).toEqual({ query: 'gas usage', top_k: 3 });
  });

  it('rejects an empty query', () => {
    const { tool } = setup();
    const error = parseError(() => tool.parse({ query: '   ' }));

    expect(error.message).toBe('Invalid arguments for search_pdfs');
    expect(error.issues).toEqual(['query: must be a non-empty string']);
  });

  it('rejects a missing query', () => {
    const { tool } = setup();
    expect(parseError(() => tool.parse({})).issues).toEqual(['query: Required']);
  });

  it('rejects top_k out of range or fractional', () => {
    const { tool } = setup();

    expect(parseError(() => tool.parse({ query: 'x', top_k: 0 })).issues).toEqual([
      'top_k: Number must be greater than or equal to 1',
    ]);
    expect(parseError(() => tool.parse({ query: 'x', top_k: 11 })).issues).toEqual([
      'top_k: Number must be less than or equal to 10',
    ]);
    expect(parseError(() => tool.parse({ query: 'x', top_k: 2.5 })).issues).toEqual([
      'top_k: Expected integer, received float',
    ]);
  });

  it('rejects unknown keys', () => {
    const { tool } = setup();
    expect(parseError(() => tool.parse({ query: 'x', limit: 3 })).issues).toEqual([
      "Unrecognized key(s) in object: 'limit'",
    ]);
  });

  it('rejects malformed JSON', () => {
    const { tool } = setup();
    const error = parseError(() => tool.parse('{"query": '));

    expect(error.message).toBe('Arguments are not valid JSON');
    expect(error.toolName).toBe('search_pdfs');
  });
});

describe('search_pdfs execute', () => {
  it('embeds the query, searches and drops hits below min_score', async () => {
    const { tool, embedQuery, search } = setup();

    const hits = await tool.execute({ query: 'march total', top_k: 3 });

    expect(embedQuery).toHaveBeenCalledWith('march total', undefined);
    expect(search).toHaveBeenCalledWith([1, 0, 0], 3, undefined);
    expect(hits.map((hit) => hit.citationTag)).toEqual(['[2024/march.pdf#0]', '[2024/april.pdf#3]']);
    expect(hits[0]).toEqual({
      chunkId: 'a',
      documentId: '2024/march.pdf',
      contentVersion: 'v1',
      chunkIndex: 0,
      score: 0.91,
      text: 'Amount due $84.10',
      citationTag: '[2024/march.pdf#0]',
    });
  });

  it('hands the abort signal to the embedder and the store', async () => {
    const { tool, embedQuery, search } = setup();
    const controller = new AbortController();

    await tool.execute({ query: 'march total', top_k: 3 }, controller.signal);

    expect(embedQuery).toHaveBeenCalledWith('march total', controller.signal);
    expect(search).toHaveBeenCalledWith([1, 0, 0], 3, controller.signal);
  });

  it('returns an empty array when nothing matches', async () => {
    const { tool } = setup([]);
    await expect(tool.execute({ query: 'sewer', top_k: 5 })).resolves.toEqual([]);
  });

  it('propagates retrieval failures', async () => {
    const { tool, search } = setup();
    search.mockRejectedValueOnce(new Error('collection missing'));

    await expect(tool.execute({ query: 'x', top_k: 1 })).rejects.toThrow('collection missing');
  });
});

describe('toResultItems', () => {
  it('maps hits to the wire shape', async () => {
    const { tool } = setup();
    const hits = await tool.execute({ query: 'x', top_k: 5 });

    expect(toResultItems(hits)[1]).toEqual({
      document_id: '2024/april.pdf',
      chunk_index: 3,
      score: 0.3,
      text: 'Meter reading 10452',
      citation_tag: '[2024/april.pdf#3]',
    });
  });
});
