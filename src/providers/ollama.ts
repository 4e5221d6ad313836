/**
 * Ollama Chat Provider
 *
 * Adapts LangChain's ChatOllama (with bound tools) to the ChatModel port.
 * Requests go through withRetry: transient failures (connection refused,
 * timeouts, 5xx) are retried with backoff and end in
 * ServiceUnavailableError; anything else fails the call once.
 *
 * @example
 * ```typescript
 * const model = createChatModel(config.llm, { logger });
 * const reply = await model.complete(messages, [SEARCH_PDFS_SCHEMA]);
 * ```
 */

import { ChatOllama } from '@langchain/ollama';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type AIMessageChunk,
  type BaseMessage,
} from '@langchain/core/messages';
import type { BindToolsInput } from '@langchain/core/language_models/chat_models';

import type { Config } from '../config/index.js';
import { CLIError, ServiceUnavailableError } from '../errors/index.js';
import { isAbortError, retryPolicyFrom, withRetry, type RetryPolicy } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { ChatCompletion, ChatMessage, ChatModel, ToolCall, ToolSchema } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * The slice of a LangChain chat model this adapter uses. ChatOllama
 * satisfies it; tests substitute a scripted client.
 */
export interface ToolCallingClient {
  bindTools(tools: BindToolsInput[]): ToolCallingRunnable;
}

export interface ToolCallingRunnable {
  invoke(
    input: BaseMessage[],
    options?: { signal?: AbortSignal }
  ): Promise<AIMessage | AIMessageChunk>;
}

export interface OllamaChatModelOptions {
  client: ToolCallingClient;
  /** Model name, for logs and error messages */
  model: string;
  retry: RetryPolicy;
  logger?: Logger;
}

// ============================================================================
// MESSAGE CONVERSION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert port messages to LangChain messages. Tool-call arguments that are
 * not an object (a raw string the model sent) are replayed as `{}`.
 */
export function toLangChainMessages(messages: readonly ChatMessage[]): BaseMessage[] {
  return messages.map((message): BaseMessage => {
    switch (message.role) {
      case 'system':
        return new SystemMessage(message.content);
      case 'user':
        return new HumanMessage(message.content);
      case 'assistant':
        return new AIMessage({
          content: message.content,
          tool_calls: (message.toolCalls ?? []).map((call) => ({
            id: call.id,
            name: call.name,
            args: isRecord(call.arguments) ? call.arguments : {},
            type: 'tool_call' as const,
          })),
        });
      case 'tool':
        return new ToolMessage({
          content: message.content,
          tool_call_id: message.toolCallId,
          name: message.name,
        });
    }
  });
}

/**
 * Flatten message content to text. Multi-part content keeps its text parts.
 */
export function textOf(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  return content
    .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * Read text and tool calls off a model reply. Calls without an id get a
 * positional one so tool results can still be matched to them.
 */
export function fromAIMessage(message: AIMessage | AIMessageChunk): ChatCompletion {
  const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call, index) => ({
    id: call.id ?? `call_${index}`,
    name: call.name,
    arguments: call.args,
  }));
  return { content: textOf(message.content), toolCalls };
}

/**
 * Port tool schema in the OpenAI function format that bindTools accepts.
 */
export function toToolDefinition(schema: ToolSchema): BindToolsInput {
  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: schema.parameters,
    },
  };
}

// ============================================================================
// ADAPTER
// ============================================================================

export class OllamaChatModel implements ChatModel {
  readonly name: string;

  private readonly client: ToolCallingClient;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(options: OllamaChatModelOptions) {
    this.client = options.client;
    this.name = options.model;
    this.retry = options.retry;
    this.logger = options.logger ?? silentLogger;
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    signal?: AbortSignal
  ): Promise<ChatCompletion> {
    const runnable = this.client.bindTools(tools.map(toToolDefinition));
    const input = toLangChainMessages(messages);

    try {
      const reply = await withRetry(() => runnable.invoke(input, { signal }), {
        label: `Chat model ${this.name}`,
        ...this.retry,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug?.(
            `Chat request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${
              error instanceof Error ? error.message : String(error)
            }`
          );
        },
      });
      return fromAIMessage(reply);
    } catch (error) {
      if (error instanceof ServiceUnavailableError || isAbortError(error) || signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CLIError(
        `Chat model ${this.name} failed: ${message}`,
        `Check that the model is pulled: ollama pull ${this.name}`
      );
    }
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface CreateChatModelOptions {
  logger?: Logger;
}

/**
 * Build the chat model from the [llm] config section. `api_key`, when set,
 * is sent as a bearer token (for Ollama behind an authenticating proxy).
 */
export function createChatModel(
  llm: Config['llm'],
  options: CreateChatModelOptions = {}
): ChatModel {
  const client = new ChatOllama({
    model: llm.model,
    baseUrl: llm.base_url,
    temperature: llm.temperature,
    ...(llm.api_key ? { headers: { Authorization: `Bearer ${llm.api_key}` } } : {}),
  });

  return new OllamaChatModel({
    client,
    model: llm.model,
    retry: retryPolicyFrom(llm),
    logger: options.logger,
  });
}
