/**
 * Chat model port
 *
 * The agent talks to the language model through this interface only. The
 * Ollama adapter implements it on top of LangChain; tests script it.
 */

/**
 * A tool call requested by the model. `arguments` is whatever the provider
 * sent: usually an object, sometimes a JSON string.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: unknown;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

/**
 * JSON Schema description of a callable tool, as sent to the model.
 */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required: string[];
    additionalProperties: boolean;
  };
}

/**
 * One model response: final text, tool calls, or both.
 */
export interface ChatCompletion {
  content: string;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  /** Model name for logs and status output */
  readonly name: string;

  /**
   * Send the conversation and the available tools; resolve with the next
   * assistant message.
   *
   * @throws ServiceUnavailableError when the endpoint stays unreachable
   */
  complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    signal?: AbortSignal
  ): Promise<ChatCompletion>;
}
