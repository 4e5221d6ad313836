/**
 * Command Runtime
 *
 * Everything a command needs, built from the loaded config. Commands take
 * a RuntimeFactory so tests can hand them in-process fakes instead.
 *
 * The store is opened eagerly; the source and chat model are built on first
 * use, so `status` never needs S3 credentials and `ingest` never needs the
 * chat model.
 */

import { ChatAgent, createSearchPdfsTool, type AgentEventListener, type SearchPdfsTool } from '../agent/index.js';
import { loadConfig, type Config } from '../config/index.js';
import { createEmbedder, PdfTextExtractor, type Embedder, type TextExtractor } from '../indexer/index.js';
import { createChatModel, type ChatModel } from '../providers/index.js';
import { createIndexStore, type IndexStore } from '../search/index.js';
import { createContentSource, type ContentSource } from '../source/index.js';
import { retryPolicyFrom } from '../utils/retry.js';
import type { CommandContext } from './types.js';

export interface Runtime {
  readonly config: Config;
  readonly store: IndexStore;
  readonly embedder: Embedder;
  readonly extractor: TextExtractor;
  source(): ContentSource;
  chatModel(): ChatModel;
  close(): Promise<void>;
}

export type RuntimeFactory = (ctx: CommandContext) => Runtime;

export const createRuntime: RuntimeFactory = (ctx) => {
  const config = loadConfig();
  const store = createIndexStore(config, ctx);
  const embedder = createEmbedder(config.embedding, { logger: ctx });

  let source: ContentSource | undefined;
  let chatModel: ChatModel | undefined;

  return {
    config,
    store,
    embedder,
    extractor: new PdfTextExtractor(),
    source() {
      source ??= createContentSource(config.storage, retryPolicyFrom(config.ingestion), ctx);
      return source;
    },
    chatModel() {
      chatModel ??= createChatModel(config.llm, { logger: ctx });
      return chatModel;
    },
    close: () => store.close(),
  };
};

/**
 * Build the runtime, run `fn`, and close the store whatever happens.
 */
export async function withRuntime<T>(
  factory: RuntimeFactory,
  ctx: CommandContext,
  fn: (runtime: Runtime) => Promise<T>
): Promise<T> {
  const runtime = factory(ctx);
  try {
    return await fn(runtime);
  } finally {
    await runtime.close();
  }
}

export function createToolFromRuntime(runtime: Runtime, ctx: CommandContext): SearchPdfsTool {
  return createSearchPdfsTool({
    embedder: runtime.embedder,
    store: runtime.store,
    retrieval: runtime.config.retrieval,
    logger: ctx,
  });
}

export function createAgentFromRuntime(
  runtime: Runtime,
  ctx: CommandContext,
  onEvent?: AgentEventListener
): ChatAgent {
  return new ChatAgent({
    model: runtime.chatModel(),
    tool: createToolFromRuntime(runtime, ctx),
    maxToolRounds: runtime.config.agent.max_tool_rounds,
    maxHistoryMessages: runtime.config.agent.max_history_messages,
    logger: ctx,
    onEvent,
  });
}
