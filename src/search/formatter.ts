/**
 * Search Hit Formatter
 *
 * Formats retrieved chunks for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * formatHit(hit);
 * // [0.87] [2024/march.pdf#0]
 * //   ACME Power Co. Statement date 2024-03-31 Amount due $84.10...
 * ```
 */

import type { SearchHit } from './types.js';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

const SNIPPET_INDENT = '  ';

export interface FormatHitOptions {
  snippetLength?: number;
  showScore?: boolean;
}

/**
 * Wire form of a hit in `billrag search --json`.
 */
export interface SearchHitJSON {
  document_id: string;
  chunk_index: number;
  content_version: string;
  score: number;
  citation_tag: string;
  text: string;
}

/**
 * Format a similarity score as a 2-decimal string.
 *
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(0.1)     // "0.10"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength` characters, adding "...".
 *
 * ```typescript
 * truncateSnippet('Amount\n\ndue  $84.10', 10)  // "Amount due..."
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Header line with score and citation tag, then the indented snippet.
 */
export function formatHit(hit: SearchHit, options: FormatHitOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const header = showScore ? `[${formatScore(hit.score)}] ${hit.citationTag}` : hit.citationTag;
  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(hit.text, snippetLength)}`;
}

/**
 * Hits separated by blank lines; empty string for no hits.
 */
export function formatHits(hits: readonly SearchHit[], options: FormatHitOptions = {}): string {
  return hits.map((hit) => formatHit(hit, options)).join('\n\n');
}

export function formatHitJSON(hit: SearchHit): SearchHitJSON {
  return {
    document_id: hit.documentId,
    chunk_index: hit.chunkIndex,
    content_version: hit.contentVersion,
    score: hit.score,
    citation_tag: hit.citationTag,
    text: hit.text,
  };
}
