/**
 * Chunker Module Tests
 *
 * Sliding-window boundaries, laziness, restartability and stable ids.
 */

import { describe, it, expect } from 'vitest';

import {
  chunkText,
  chunkDocument,
  countChunks,
  chunkId,
  validateChunkParams,
} from '../chunker/index.js';
import { ConfigError } from '../../errors/index.js';

/** Text whose characters encode their own position, so slices are easy to check */
function positional(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
}

describe('chunkText', () => {
  it('splits 2500 characters into four windows at 1000/200', () => {
    const windows = [...chunkText(positional(2500), 1000, 200)];

    expect(windows.map((w) => w.startOffset)).toEqual([0, 800, 1600, 2400]);
    expect(windows.map((w) => w.length)).toEqual([1000, 1000, 900, 100]);
    expect(windows.map((w) => w.index)).toEqual([0, 1, 2, 3]);
  });

  it('slices the text at the window offsets', () => {
    const text = positional(2500);
    const windows = [...chunkText(text, 1000, 200)];

    for (const window of windows) {
      expect(window.text).toBe(text.slice(window.startOffset, window.startOffset + 1000));
    }
    expect(windows[3]?.text).toBe(text.slice(2400));
  });

  it('shares the overlap between neighbouring windows', () => {
    const windows = [...chunkText(positional(1800), 1000, 200)];

    expect(windows[0]?.text.slice(800)).toBe(windows[1]?.text.slice(0, 200));
  });

  it('returns a single truncated window for short text', () => {
    const windows = [...chunkText('Total due: $84.12', 1000, 200)];

    expect(windows).toEqual([{ index: 0, startOffset: 0, length: 17, text: 'Total due: $84.12' }]);
  });

  it('returns nothing for empty text', () => {
    expect([...chunkText('', 1000, 200)]).toEqual([]);
  });

  it('is pure and restartable', () => {
    const text = positional(5000);
    const iterable = chunkText(text, 1000, 200);

    const first = [...iterable];
    const second = [...iterable];

    expect(second).toEqual(first);
    expect([...chunkText(text, 1000, 200)]).toEqual(first);
  });

  it('computes windows lazily', () => {
    const iterator = chunkText(positional(10_000), 100, 10)[Symbol.iterator]();

    expect(iterator.next().value).toMatchObject({ index: 0, startOffset: 0, length: 100 });
    expect(iterator.next().value).toMatchObject({ index: 1, startOffset: 90 });
  });

  it('works without overlap', () => {
    const windows = [...chunkText('abcdefg', 3, 0)];

    expect(windows.map((w) => w.text)).toEqual(['abc', 'def', 'g']);
  });
});

describe('countChunks', () => {
  it.each([
    [2500, 4],
    [1600, 2],
    [1000, 2],
    [800, 1],
    [1, 1],
    [0, 0],
  ])('length %i yields %i chunks at 1000/200', (length, expected) => {
    expect(countChunks(length, 1000, 200)).toBe(expected);
    expect([...chunkText(positional(length), 1000, 200)]).toHaveLength(expected);
  });
});

describe('validateChunkParams', () => {
  it('rejects overlap not smaller than chunk size', () => {
    expect(() => validateChunkParams(1000, 1000)).toThrow(ConfigError);
    expect(() => validateChunkParams(1000, 1200)).toThrow(
      'chunk_overlap (1200) must be smaller than chunk_size (1000)'
    );
  });

  it('rejects non-positive, negative and fractional values', () => {
    expect(() => validateChunkParams(0, 0)).toThrow(ConfigError);
    expect(() => validateChunkParams(100, -1)).toThrow(ConfigError);
    expect(() => validateChunkParams(100.5, 10)).toThrow(ConfigError);
  });

  it('fails before iteration starts', () => {
    expect(() => chunkText('abc', 10, 10)).toThrow(ConfigError);
  });
});

describe('chunkId', () => {
  it('is deterministic', () => {
    expect(chunkId('2024/march.pdf', 'etag-1', 0)).toBe(chunkId('2024/march.pdf', 'etag-1', 0));
  });

  it('differs by document, version and index', () => {
    const base = chunkId('2024/march.pdf', 'etag-1', 0);

    expect(chunkId('2024/april.pdf', 'etag-1', 0)).not.toBe(base);
    expect(chunkId('2024/march.pdf', 'etag-2', 0)).not.toBe(base);
    expect(chunkId('2024/march.pdf', 'etag-1', 1)).not.toBe(base);
  });

  it('is a version 5 UUID', () => {
    expect(chunkId('a.pdf', 'v', 3)).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });
});

describe('chunkDocument', () => {
  it('binds windows to the document version', () => {
    const chunks = [
      ...chunkDocument({ documentId: 'gas.pdf', contentVersion: 'v1' }, positional(900), {
        chunkSize: 500,
        chunkOverlap: 100,
      }),
    ];

    expect(chunks).toHaveLength(3);
    expect(chunks[2]).toEqual({
      chunkId: chunkId('gas.pdf', 'v1', 2),
      documentId: 'gas.pdf',
      contentVersion: 'v1',
      chunkIndex: 2,
      startOffset: 800,
      length: 100,
      text: positional(900).slice(800),
    });
  });
});
