/**
 * Scripted chat model for agent tests.
 */

import type { ChatCompletion, ChatMessage, ChatModel, ToolCall, ToolSchema } from '../providers/types.js';

/**
 * A scripted reply: a completion, an error to throw, or a function of the
 * messages the model was sent.
 */
export type ScriptedReply =
  | ChatCompletion
  | Error
  | ((messages: readonly ChatMessage[]) => ChatCompletion);

export interface RecordedRequest {
  messages: ChatMessage[];
  tools: ToolSchema[];
}

export function answer(content: string): ChatCompletion {
  return { content, toolCalls: [] };
}

export function callTool(id: string, args: unknown, name = 'search_pdfs'): ChatCompletion {
  const call: ToolCall = { id, name, arguments: args };
  return { content: '', toolCalls: [call] };
}

/**
 * Replays replies in order and records every request. Running out of
 * replies fails the call.
 */
export class ScriptedChatModel implements ChatModel {
  readonly name = 'scripted';
  readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    signal?: AbortSignal
  ): Promise<ChatCompletion> {
    this.requests.push({ messages: [...messages], tools: [...tools] });
    signal?.throwIfAborted();

    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('ScriptedChatModel has no reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(messages) : next;
  }
}
