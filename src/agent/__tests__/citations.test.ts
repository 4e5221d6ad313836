import { describe, it, expect } from 'vitest';
import { checkGrounding, citationTag, extractCitationTags, formatCitations } from '../citations.js';
import type { SearchHit } from '../types.js';

function hit(documentId: string, chunkIndex: number, score: number): SearchHit {
  return {
    chunkId: `${documentId}-${chunkIndex}`,
    documentId,
    contentVersion: 'v1',
    chunkIndex,
    score,
    text: '',
    citationTag: citationTag(documentId, chunkIndex),
  };
}

describe('citationTag', () => {
  it('renders [document_id#chunk_index]', () => {
    expect(citationTag('2024/march.pdf', 0)).toBe('[2024/march.pdf#0]');
  });
});

describe('extractCitationTags', () => {
  it('finds tags in order of first appearance without duplicates', () => {
    const text = 'Due $84.10 [b.pdf#2]. Usage 310 kWh [a.pdf#0] and again [b.pdf#2].';
    expect(extractCitationTags(text)).toEqual(['[b.pdf#2]', '[a.pdf#0]']);
  });

  it('keeps spaces and # inside the document id', () => {
    expect(extractCitationTags('see [bills/Power Co #7.pdf#3]')).toEqual(['[bills/Power Co #7.pdf#3]']);
  });

  it('normalizes leading zeros in the index', () => {
    expect(extractCitationTags('[a.pdf#007]')).toEqual(['[a.pdf#7]']);
  });

  it('ignores brackets that are not tags', () => {
    expect(extractCitationTags('[1] [note] [a.pdf#x] [#3]')).toEqual([]);
  });
});

describe('checkGrounding', () => {
  it('is grounded when every cited tag was retrieved', () => {
    expect(checkGrounding('X [a.pdf#0]', ['[a.pdf#0]', '[a.pdf#1]'])).toEqual({
      citedTags: ['[a.pdf#0]'],
      ungroundedTags: [],
      grounded: true,
    });
  });

  it('is not grounded when a cited tag was not retrieved', () => {
    expect(checkGrounding('X [a.pdf#0] Y [z.pdf#9]', ['[a.pdf#0]'])).toEqual({
      citedTags: ['[a.pdf#0]', '[z.pdf#9]'],
      ungroundedTags: ['[z.pdf#9]'],
      grounded: false,
    });
  });

  it('treats an answer without citations as grounded', () => {
    expect(checkGrounding('Hello!', []).grounded).toBe(true);
  });
});

describe('formatCitations', () => {
  it('prints the best score per tag and flags unretrieved tags', () => {
    const hits = [hit('a.pdf', 0, 0.5), hit('a.pdf', 0, 0.875), hit('b.pdf', 1, 0.61)];

    expect(formatCitations(['[a.pdf#0]', '[c.pdf#4]', '[b.pdf#1]'], hits)).toBe(
      '[a.pdf#0] (0.88)\n[c.pdf#4] (not retrieved)\n[b.pdf#1] (0.61)'
    );
  });

  it('is empty for no citations', () => {
    expect(formatCitations([], [])).toBe('');
  });
});
