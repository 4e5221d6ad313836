/**
 * Shared setup for command tests: a recording CommandContext and a Runtime
 * over in-process fakes (SQLite :memory:, hash embeddings, scripted model).
 */

import { vi } from 'vitest';

import { DEFAULT_CONFIG, type Config } from '../../config/index.js';
import { openDatabase, IN_MEMORY } from '../../database/index.js';
import { Embedder } from '../../indexer/index.js';
import type { ChatModel } from '../../providers/index.js';
import { SqliteIndexStore } from '../../search/index.js';
import type { ContentSource } from '../../source/index.js';
import {
  hashEmbeddingModel,
  MemoryContentSource,
  ScriptedChatModel,
  TEST_DIMENSIONS,
  utf8Extractor,
  type ScriptedReply,
} from '../../test-utils/index.js';
import type { Runtime, RuntimeFactory } from '../runtime.js';
import type { CommandContext, GlobalOptions } from '../types.js';

export interface RecordingContext extends CommandContext {
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function recordingContext(options: Partial<GlobalOptions> = {}): RecordingContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    options: { verbose: false, json: false, ...options },
    logs,
    warnings,
    errors,
    log: (message) => logs.push(message),
    info: (message) => logs.push(message),
    debug: vi.fn(),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
}

export function testConfig(overrides: Partial<Config['retrieval']> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    storage: { ...DEFAULT_CONFIG.storage, type: 'local' },
    vector_store: { ...DEFAULT_CONFIG.vector_store, provider: 'sqlite' },
    chunking: { chunk_size: 100, chunk_overlap: 20 },
    embedding: {
      ...DEFAULT_CONFIG.embedding,
      dimensions: TEST_DIMENSIONS,
      document_prefix: '',
      query_prefix: '',
    },
    retrieval: { ...DEFAULT_CONFIG.retrieval, min_score: 0, ...overrides },
    ingestion: { ...DEFAULT_CONFIG.ingestion, concurrency: 2 },
  };
}

export interface TestRuntime extends Runtime {
  readonly store: SqliteIndexStore;
  readonly closed: boolean;
}

export interface TestRuntimeOptions {
  config?: Config;
  source?: ContentSource;
  model?: ChatModel;
  replies?: ScriptedReply[];
}

/**
 * One runtime, reused by every factory call. close() is recorded but the
 * store stays open, so a test can inspect it after the command ran.
 */
export function testRuntime(options: TestRuntimeOptions = {}): { runtime: TestRuntime; factory: RuntimeFactory } {
  const config = options.config ?? testConfig();
  const store = new SqliteIndexStore({ db: openDatabase(IN_MEMORY), dimensions: TEST_DIMENSIONS });
  const embedder = new Embedder(hashEmbeddingModel(), {
    dimensions: TEST_DIMENSIONS,
    documentPrefix: '',
    queryPrefix: '',
    retry: { maxRetries: 0, baseDelayMs: 0 },
  });
  const source = options.source ?? new MemoryContentSource();
  const model = options.model ?? new ScriptedChatModel(options.replies ?? []);

  let closed = false;
  const runtime: TestRuntime = {
    config,
    store,
    embedder,
    extractor: utf8Extractor,
    source: () => source,
    chatModel: () => model,
    close: async () => {
      closed = true;
    },
    get closed() {
      return closed;
    },
  };
  return { runtime, factory: () => runtime };
}
