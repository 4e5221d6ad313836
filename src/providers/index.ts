/**
 * Providers Module
 *
 * The chat model the agent talks to.
 *
 * ```typescript
 * import { createChatModel } from './providers/index.js';
 * const model = createChatModel(config.llm, { logger });
 * ```
 */

export type { ChatMessage, ChatModel, ChatCompletion, ToolCall, ToolSchema } from './types.js';

export {
  OllamaChatModel,
  createChatModel,
  toLangChainMessages,
  fromAIMessage,
  toToolDefinition,
  textOf,
  type ToolCallingClient,
  type ToolCallingRunnable,
  type OllamaChatModelOptions,
  type CreateChatModelOptions,
} from './ollama.js';
