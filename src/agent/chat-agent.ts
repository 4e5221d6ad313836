/**
 * Chat Agent
 *
 * Tool-calling loop over a ChatModel, run as an explicit state machine:
 *
 * ```
 * awaiting_user_input
 *   └─ runTurn(input)
 *        model_thinking ──(final text)──────────────▶ answered_final
 *          │    ▲
 *   tool calls  └──── tool results appended ───┐
 *          ▼                                   │
 *        tool_requested ──▶ tool_executing ────┘
 * ```
 *
 * - Invalid tool calls (unknown tool, bad arguments) are answered with a
 *   ToolArgumentError tool result; the model can correct itself.
 * - Requesting tool round `maxToolRounds + 1` ends the turn with
 *   UNABLE_TO_ANSWER.
 * - Model or retrieval failures end the turn with TURN_FAILED_MESSAGE and
 *   leave the history as it was.
 * - Aborting the signal throws TurnCancelledError at the next suspension
 *   point; the history is left as it was.
 * - Only the user message and the final answer are committed to history.
 *   Tool traffic lives in the turn's working messages.
 */

import { CLIError, ToolArgumentError, TurnCancelledError } from '../errors/index.js';
import type { ChatMessage, ChatModel, ToolCall } from '../providers/types.js';
import { isAbortError } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { checkGrounding } from './citations.js';
import { SYSTEM_PROMPT, TURN_FAILED_MESSAGE, UNABLE_TO_ANSWER } from './prompts.js';
import { SEARCH_PDFS_TOOL, toResultItems, type SearchPdfsTool } from './tools/index.js';
import type {
  AgentEvent,
  AgentEventListener,
  AgentTurnResult,
  SearchHit,
  TurnState,
  TurnStatus,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ChatAgentOptions {
  model: ChatModel;
  tool: SearchPdfsTool;
  /** Tool rounds allowed per turn (agent.max_tool_rounds) */
  maxToolRounds: number;
  /** Messages kept in history (agent.max_history_messages) */
  maxHistoryMessages: number;
  systemPrompt?: string;
  logger?: Logger;
  /** Receives events for every turn */
  onEvent?: AgentEventListener;
}

export interface RunTurnOptions {
  /** Abort to cancel the turn (Ctrl+C) */
  signal?: AbortSignal;
  /** Receives events for this turn only */
  onEvent?: AgentEventListener;
}

/**
 * Per-turn bookkeeping, dropped when the turn ends.
 */
interface TurnContext {
  input: string;
  working: ChatMessage[];
  hits: SearchHit[];
  retrievedTags: string[];
  toolRounds: number;
  signal?: AbortSignal;
  emit: AgentEventListener;
}

// ============================================================================
// ChatAgent
// ============================================================================

export class ChatAgent {
  private readonly model: ChatModel;
  private readonly tool: SearchPdfsTool;
  private readonly maxToolRounds: number;
  private readonly maxHistoryMessages: number;
  private readonly systemPrompt: string;
  private readonly logger: Logger;
  private readonly onEvent?: AgentEventListener;

  private history: ChatMessage[] = [];
  private currentState: TurnState = 'awaiting_user_input';
  private running = false;

  constructor(options: ChatAgentOptions) {
    this.model = options.model;
    this.tool = options.tool;
    this.maxToolRounds = options.maxToolRounds;
    this.maxHistoryMessages = options.maxHistoryMessages;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.logger = options.logger ?? silentLogger;
    this.onEvent = options.onEvent;
  }

  get state(): TurnState {
    return this.currentState;
  }

  /** Committed conversation, oldest first. */
  getHistory(): readonly ChatMessage[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Run one user turn to its final answer.
   *
   * @throws TurnCancelledError when the signal aborts the turn
   */
  async runTurn(input: string, options: RunTurnOptions = {}): Promise<AgentTurnResult> {
    if (this.running) {
      throw new CLIError('A turn is already running in this conversation');
    }
    this.running = true;

    const turn: TurnContext = {
      input,
      working: [{ role: 'user', content: input }],
      hits: [],
      retrievedTags: [],
      toolRounds: 0,
      signal: options.signal,
      emit: (event: AgentEvent) => {
        this.onEvent?.(event);
        options.onEvent?.(event);
      },
    };

    try {
      return await this.loop(turn);
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error) || error instanceof TurnCancelledError) {
        this.logger.debug?.('Turn cancelled');
        throw new TurnCancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Turn failed: ${message}`);
      return this.result(turn, 'failed', TURN_FAILED_MESSAGE, message);
    } finally {
      this.running = false;
      this.currentState = 'awaiting_user_input';
    }
  }

  // ============================================================================
  // State machine
  // ============================================================================

  private async loop(turn: TurnContext): Promise<AgentTurnResult> {
    for (;;) {
      this.checkCancelled(turn);
      this.transition(turn, 'model_thinking');

      const completion = await this.model.complete(
        [{ role: 'system', content: this.systemPrompt }, ...this.history, ...turn.working],
        [this.tool.schema],
        turn.signal
      );
      this.checkCancelled(turn);

      if (completion.toolCalls.length === 0) {
        this.transition(turn, 'answered_final');
        this.commit(turn.input, completion.content);
        return this.result(turn, 'answered', completion.content);
      }

      if (turn.toolRounds >= this.maxToolRounds) {
        this.logger.debug?.(`Tool round limit (${this.maxToolRounds}) reached`);
        this.transition(turn, 'answered_final');
        this.commit(turn.input, UNABLE_TO_ANSWER);
        return this.result(turn, 'unable_to_answer', UNABLE_TO_ANSWER);
      }
      turn.toolRounds++;

      this.transition(turn, 'tool_requested');
      turn.working.push({
        role: 'assistant',
        content: completion.content,
        toolCalls: completion.toolCalls,
      });

      this.transition(turn, 'tool_executing');
      for (const call of completion.toolCalls) {
        const content = await this.executeToolCall(turn, call);
        turn.working.push({ role: 'tool', toolCallId: call.id, name: call.name, content });
      }
    }
  }

  /**
   * Run one tool call and return the tool message content. Argument errors
   * become the content; retrieval errors propagate and fail the turn.
   */
  private async executeToolCall(turn: TurnContext, call: ToolCall): Promise<string> {
    const round = turn.toolRounds;

    try {
      if (call.name !== SEARCH_PDFS_TOOL) {
        throw new ToolArgumentError(call.name, `Unknown tool: ${call.name}`, [
          `available tools: ${SEARCH_PDFS_TOOL}`,
        ]);
      }
      const input = this.tool.parse(call.arguments);

      turn.emit({ type: 'tool_start', tool: call.name, callId: call.id, input, round });
      const started = Date.now();
      const hits = await this.tool.execute(input, turn.signal);
      this.checkCancelled(turn);

      for (const hit of hits) {
        turn.hits.push(hit);
        if (!turn.retrievedTags.includes(hit.citationTag)) {
          turn.retrievedTags.push(hit.citationTag);
        }
      }
      turn.emit({
        type: 'tool_result',
        tool: call.name,
        callId: call.id,
        hits: hits.length,
        durationMs: Date.now() - started,
        round,
      });
      return JSON.stringify(toResultItems(hits));
    } catch (error) {
      if (!(error instanceof ToolArgumentError)) {
        throw error;
      }
      this.logger.debug?.(`Rejected ${call.name} call: ${error.message}`);
      turn.emit({ type: 'tool_error', tool: call.name, callId: call.id, message: error.message, round });
      return JSON.stringify({ error: error.message, issues: error.issues });
    }
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private transition(turn: TurnContext, state: TurnState): void {
    this.currentState = state;
    turn.emit({ type: 'state', state, round: turn.toolRounds });
  }

  private checkCancelled(turn: TurnContext): void {
    if (turn.signal?.aborted) {
      throw new TurnCancelledError();
    }
  }

  /**
   * Append the finished turn and trim to maxHistoryMessages, oldest first.
   * History always starts with a user message.
   */
  private commit(input: string, answer: string): void {
    this.history.push({ role: 'user', content: input }, { role: 'assistant', content: answer });

    const excess = this.history.length - this.maxHistoryMessages;
    if (excess > 0) {
      this.history.splice(0, excess);
    }
    while (this.history.length > 0 && this.history[0]?.role !== 'user') {
      this.history.shift();
    }
  }

  private result(turn: TurnContext, status: TurnStatus, text: string, error?: string): AgentTurnResult {
    const grounding = checkGrounding(text, turn.retrievedTags);
    return {
      text,
      status,
      retrievedTags: [...turn.retrievedTags],
      citedTags: grounding.citedTags,
      ungroundedTags: grounding.ungroundedTags,
      grounded: grounding.grounded,
      hits: [...turn.hits],
      toolRounds: turn.toolRounds,
      error,
    };
  }
}
