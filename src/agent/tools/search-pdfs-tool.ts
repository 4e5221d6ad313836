/**
 * search_pdfs Tool
 *
 * The one tool the agent can call. It embeds the query with the query
 * prefix, searches the index store, drops hits below `retrieval.min_score`
 * and returns the rest as citable results. No hits is an empty array, not
 * an error.
 *
 * Arguments are validated with zod before anything runs: `query` must be a
 * non-empty string, `top_k` an integer in 1..max_top_k, and unknown keys
 * are rejected. Invalid arguments raise ToolArgumentError, which the agent
 * hands back to the model as the tool result.
 */

import { z } from 'zod';

import type { Config } from '../../config/index.js';
import { ToolArgumentError } from '../../errors/index.js';
import type { Embedder } from '../../indexer/embedder/index.js';
import type { ToolSchema } from '../../providers/types.js';
import type { IndexStore } from '../../search/types.js';
import { normalizeToolArguments } from '../../utils/json.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { citationTag } from '../citations.js';
import type { SearchHit, SearchPdfsResultItem } from '../types.js';

export const SEARCH_PDFS_TOOL = 'search_pdfs';

const DESCRIPTION =
  'Search the indexed utility-bill PDFs for passages relevant to a question.\n\n' +
  'Use this tool for anything about the bills: amounts due, billing periods, ' +
  'meter readings, usage, tariffs, due dates, account details.\n' +
  'Each result carries a citation_tag such as [2024/march.pdf#0]; cite the ' +
  'tags of the passages your answer relies on.';

export interface SearchPdfsInput {
  query: string;
  top_k: number;
}

export interface SearchPdfsToolOptions {
  embedder: Pick<Embedder, 'embedQuery'>;
  store: Pick<IndexStore, 'search'>;
  retrieval: Config['retrieval'];
  logger?: Logger;
}

export interface SearchPdfsTool {
  readonly name: typeof SEARCH_PDFS_TOOL;
  /** JSON Schema sent to the model */
  readonly schema: ToolSchema;
  /**
   * Validate raw model arguments (object or JSON string).
   *
   * @throws ToolArgumentError
   */
  parse(raw: unknown): SearchPdfsInput;
  execute(input: SearchPdfsInput, signal?: AbortSignal): Promise<SearchHit[]>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Tool result as sent back to the model.
 */
export function toResultItems(hits: readonly SearchHit[]): SearchPdfsResultItem[] {
  return hits.map((hit) => ({
    document_id: hit.documentId,
    chunk_index: hit.chunkIndex,
    score: hit.score,
    text: hit.text,
    citation_tag: hit.citationTag,
  }));
}

export function createSearchPdfsTool(options: SearchPdfsToolOptions): SearchPdfsTool {
  const { embedder, store, retrieval } = options;
  const logger = options.logger ?? silentLogger;

  const inputSchema = z
    .object({
      query: z.string().trim().min(1, 'must be a non-empty string'),
      top_k: z.number().int().min(1).max(retrieval.max_top_k).optional(),
    })
    .strict();

  const schema: ToolSchema = {
    name: SEARCH_PDFS_TOOL,
    description: DESCRIPTION,
    parameters: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description:
            'What to look for, in the words a bill would use. ' +
            'Example: "amount due March 2024 electricity"',
        },
        top_k: {
          type: 'integer',
          minimum: 1,
          maximum: retrieval.max_top_k,
          description: `Number of passages to return (default ${retrieval.top_k})`,
        },
      },
      required: ['query'],
      additionalProperties: false,
    },
  };

  return {
    name: SEARCH_PDFS_TOOL,
    schema,

    parse(raw: unknown): SearchPdfsInput {
      const normalized = normalizeToolArguments(raw);
      if (!normalized.ok) {
        throw new ToolArgumentError(SEARCH_PDFS_TOOL, 'Arguments are not valid JSON', [normalized.error]);
      }
      const parsed = inputSchema.safeParse(normalized.value);
      if (!parsed.success) {
        throw new ToolArgumentError(
          SEARCH_PDFS_TOOL,
          `Invalid arguments for ${SEARCH_PDFS_TOOL}`,
          formatIssues(parsed.error)
        );
      }
      return { query: parsed.data.query, top_k: parsed.data.top_k ?? retrieval.top_k };
    },

    async execute(input: SearchPdfsInput, signal?: AbortSignal): Promise<SearchHit[]> {
      const embedding = await embedder.embedQuery(input.query, signal);
      const records = await store.search(embedding, input.top_k, signal);
      const hits = records
        .filter((record) => record.score >= retrieval.min_score)
        .map((record) => ({
          chunkId: record.chunkId,
          documentId: record.documentId,
          contentVersion: record.contentVersion,
          chunkIndex: record.chunkIndex,
          score: record.score,
          text: record.sourceText,
          citationTag: citationTag(record.documentId, record.chunkIndex),
        }));

      logger.debug?.(
        `search_pdfs "${input.query}" top_k=${input.top_k}: ${records.length} candidate(s), ${hits.length} above ${retrieval.min_score}`
      );
      return hits;
    },
  };
}
