/**
 * Citations
 *
 * Answers cite retrieved chunks as `[document_id#chunk_index]`. This module
 * builds those tags, finds them in answer text, and checks that every cited
 * tag was actually retrieved in the turn.
 *
 * @example
 * ```typescript
 * citationTag('2024/march.pdf', 0);  // "[2024/march.pdf#0]"
 *
 * checkGrounding('Due $84.10 [2024/march.pdf#0]', ['[2024/march.pdf#0]']);
 * // { citedTags: ['[2024/march.pdf#0]'], ungroundedTags: [], grounded: true }
 * ```
 */

import type { SearchHit } from './types.js';
import { formatScore } from '../search/formatter.js';

/**
 * `[` document id `#` decimal index `]`. The id may itself contain `#`; the
 * lazy match backtracks to the last `#` that is followed by digits.
 */
const CITATION_PATTERN = /\[([^\[\]\n]+?)#(\d+)\]/g;

export interface GroundingCheck {
  citedTags: string[];
  ungroundedTags: string[];
  grounded: boolean;
}

export function citationTag(documentId: string, chunkIndex: number): string {
  return `[${documentId}#${chunkIndex}]`;
}

/**
 * Tags cited in `text`, deduplicated, in order of first appearance.
 * Indices are normalized, so `[a.pdf#007]` is read as `[a.pdf#7]`.
 */
export function extractCitationTags(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(CITATION_PATTERN)) {
    const [, documentId, index] = match;
    if (documentId === undefined || index === undefined) continue;
    seen.add(citationTag(documentId, Number.parseInt(index, 10)));
  }
  return [...seen];
}

/**
 * An answer is grounded unless it cites a tag that was not retrieved.
 * An answer without citations is grounded.
 */
export function checkGrounding(text: string, retrievedTags: Iterable<string>): GroundingCheck {
  const retrieved = new Set(retrievedTags);
  const citedTags = extractCitationTags(text);
  const ungroundedTags = citedTags.filter((tag) => !retrieved.has(tag));
  return { citedTags, ungroundedTags, grounded: ungroundedTags.length === 0 };
}

/**
 * Source list printed under an answer: one line per cited tag, with the
 * score of the hit it came from, or a marker when it was not retrieved.
 *
 * ```
 * [2024/march.pdf#0] (0.87)
 * [2024/april.pdf#3] (not retrieved)
 * ```
 */
export function formatCitations(citedTags: readonly string[], hits: readonly SearchHit[]): string {
  const bestScore = new Map<string, number>();
  for (const hit of hits) {
    const current = bestScore.get(hit.citationTag);
    if (current === undefined || hit.score > current) {
      bestScore.set(hit.citationTag, hit.score);
    }
  }

  return citedTags
    .map((tag) => {
      const score = bestScore.get(tag);
      return score === undefined ? `${tag} (not retrieved)` : `${tag} (${formatScore(score)})`;
    })
    .join('\n');
}
