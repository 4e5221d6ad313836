/**
 * Agent Types
 *
 * Shapes shared by the retrieval tool, the chat agent and the CLI that
 * renders their output.
 */

import type { SearchHit } from '../search/types.js';

export type { SearchHit };

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Wire form of a hit in the search_pdfs tool result.
 */
export interface SearchPdfsResultItem {
  document_id: string;
  chunk_index: number;
  score: number;
  text: string;
  citation_tag: string;
}

// ============================================================================
// Turn State Machine
// ============================================================================

export type TurnState =
  | 'awaiting_user_input'
  | 'model_thinking'
  | 'tool_requested'
  | 'tool_executing'
  | 'answered_final';

/**
 * How a turn ended.
 *
 * - answered: the model produced a final answer
 * - unable_to_answer: the tool-round limit was hit
 * - failed: retrieval or the model failed; the text is an apology
 */
export type TurnStatus = 'answered' | 'unable_to_answer' | 'failed';

export interface AgentTurnResult {
  text: string;
  status: TurnStatus;
  /** Tags of every hit returned by search_pdfs during the turn */
  retrievedTags: string[];
  /** Tags the answer text cites, in order of first appearance */
  citedTags: string[];
  /** Cited tags that were not retrieved in this turn */
  ungroundedTags: string[];
  /** False when the answer cites anything it did not retrieve */
  grounded: boolean;
  /** Hits retrieved during the turn, in retrieval order */
  hits: SearchHit[];
  /** Tool rounds used */
  toolRounds: number;
  /** Failure description when status is 'failed' */
  error?: string;
}

/**
 * Progress events emitted while a turn runs.
 */
export type AgentEvent =
  | { type: 'state'; state: TurnState; round: number }
  | { type: 'tool_start'; tool: string; callId: string; input: unknown; round: number }
  | {
      type: 'tool_result';
      tool: string;
      callId: string;
      hits: number;
      durationMs: number;
      round: number;
    }
  | { type: 'tool_error'; tool: string; callId: string; message: string; round: number };

export type AgentEventListener = (event: AgentEvent) => void;
