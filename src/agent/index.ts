/**
 * Agent Module
 *
 * The tool-calling chat agent that answers questions about the indexed
 * bills and cites its sources.
 *
 * @example
 * ```typescript
 * const tool = createSearchPdfsTool({ embedder, store, retrieval: config.retrieval });
 * const agent = new ChatAgent({
 *   model: createChatModel(config.llm),
 *   tool,
 *   maxToolRounds: config.agent.max_tool_rounds,
 *   maxHistoryMessages: config.agent.max_history_messages,
 * });
 *
 * const result = await agent.runTurn('How much was the March electricity bill?');
 * console.log(result.text, result.citedTags);
 * ```
 */

export { ChatAgent, type ChatAgentOptions, type RunTurnOptions } from './chat-agent.js';

export {
  citationTag,
  extractCitationTags,
  checkGrounding,
  formatCitations,
  type GroundingCheck,
} from './citations.js';

export { SYSTEM_PROMPT, UNABLE_TO_ANSWER, TURN_FAILED_MESSAGE } from './prompts.js';

export {
  createSearchPdfsTool,
  toResultItems,
  SEARCH_PDFS_TOOL,
  type SearchPdfsTool,
  type SearchPdfsInput,
  type SearchPdfsToolOptions,
} from './tools/index.js';

export type {
  SearchHit,
  SearchPdfsResultItem,
  TurnState,
  TurnStatus,
  AgentTurnResult,
  AgentEvent,
  AgentEventListener,
} from './types.js';
