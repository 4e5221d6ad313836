/**
 * Configuration Schema
 *
 * Defines the shape of ~/.billrag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Where the bill PDFs live: an S3-compatible bucket or a local directory
 */
export const StorageConfigSchema = z.object({
  type: z.enum(['s3', 'local']).describe('Content source (s3 bucket or local directory)'),
  endpoint: z
    .string()
    .optional()
    .describe('S3 endpoint host or URL (omit for AWS S3)'),
  port: z.number().int().min(1).max(65535).optional(),
  use_ssl: z.boolean(),
  region: z.string().min(1),
  access_key: z.string().optional(),
  secret_key: z.string().optional(),
  bucket: z.string().min(1),
  prefix: z.string().describe('Only keys under this prefix are ingested'),
  force_path_style: z.boolean().describe('Required by MinIO and most S3-compatible servers'),
  local_dir: z.string().min(1).describe('Root directory when type = "local"'),
});

/**
 * Vector index backend
 */
export const VectorStoreConfigSchema = z.object({
  provider: z.enum(['qdrant', 'sqlite']),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  use_ssl: z.boolean(),
  collection: z.string().min(1),
  api_key: z.string().optional(),
  sqlite_path: z
    .string()
    .optional()
    .describe('Index database when provider = "sqlite" (default ~/.billrag/index.db)'),
});

/**
 * Sliding-window chunking, measured in characters (UTF-16 code units)
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(1),
  chunk_overlap: z.number().int().min(0),
});

/**
 * Embedding model served by Ollama
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model name'),
  base_url: z.string().url(),
  dimensions: z.number().int().min(1),
  document_prefix: z.string().describe('Prepended to every chunk before embedding'),
  query_prefix: z.string().describe('Prepended to every search query before embedding'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Number of texts to embed per call (1-256, default 32)'),
  timeout_ms: z.number().int().min(1000).max(600000),
  max_retries: z.number().int().min(0).max(10),
  retry_base_delay_ms: z.number().int().min(0),
});

/**
 * Chat model used by the agent
 */
export const LLMConfigSchema = z.object({
  model: z.string().min(1),
  base_url: z.string().url(),
  api_key: z.string().optional().describe('Sent as a bearer token when set'),
  temperature: z.number().min(0).max(2),
  timeout_ms: z.number().int().min(1000).max(600000),
  max_retries: z.number().int().min(0).max(10),
  retry_base_delay_ms: z.number().int().min(0),
});

/**
 * search_pdfs behaviour
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).describe('Hits returned when the model omits top_k'),
  max_top_k: z.number().int().min(1).max(100),
  min_score: z.number().min(-1).max(1).describe('Hits below this cosine similarity are dropped'),
});

export const AgentConfigSchema = z.object({
  max_tool_rounds: z.number().int().min(0).max(10),
  max_history_messages: z.number().int().min(0),
});

export const IngestionConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64),
  upsert_batch_size: z.number().int().min(1).max(1000),
  timeout_ms: z.number().int().min(1000).max(600000),
  max_retries: z.number().int().min(0).max(10),
  retry_base_delay_ms: z.number().int().min(0),
});

/**
 * Object shape of config.toml (before cross-field checks)
 */
export const ConfigObjectSchema = z.object({
  storage: StorageConfigSchema,
  vector_store: VectorStoreConfigSchema,
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  llm: LLMConfigSchema,
  retrieval: RetrievalConfigSchema,
  agent: AgentConfigSchema,
  ingestion: IngestionConfigSchema,
});

/**
 * Root configuration schema, including the rules that span fields
 */
export const ConfigSchema = ConfigObjectSchema.superRefine((config, ctx) => {
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_overlap'],
      message: `must be smaller than chunk_size (${config.chunking.chunk_size})`,
    });
  }
  if (config.retrieval.top_k > config.retrieval.max_top_k) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['retrieval', 'top_k'],
      message: `must not exceed max_top_k (${config.retrieval.max_top_k})`,
    });
  }
  if (config.storage.type === 's3' && (!config.storage.access_key) !== (!config.storage.secret_key)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['storage', 'secret_key'],
      message: 'access_key and secret_key must be set together',
    });
  }
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigObjectSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigObjectSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
