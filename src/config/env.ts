/**
 * Environment Variable Handler
 *
 * Reads the deployment settings (endpoints, credentials, bucket, tuning
 * knobs) from the environment. Supports .env files via dotenv.
 *
 * Credentials are never logged; `billrag config list` masks them.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

/**
 * Everything is optional: unset variables fall back to config.toml and then
 * to the defaults. Type conversion happens when the override is applied, so
 * the final schema check reports a bad value with its config key.
 */
export const EnvSchema = z.object({
  BILLRAG_CONFIG: optionalString,
  SOURCE_TYPE: optionalString,
  SOURCE_DIR: optionalString,
  S3_ENDPOINT: optionalString,
  S3_PORT: optionalString,
  S3_USE_SSL: optionalString,
  S3_REGION: optionalString,
  S3_ACCESS_KEY: optionalString,
  S3_SECRET_KEY: optionalString,
  S3_BUCKET: optionalString,
  S3_PREFIX: optionalString,
  VECTOR_STORE: optionalString,
  QDRANT_HOST: optionalString,
  QDRANT_PORT: optionalString,
  QDRANT_COLLECTION: optionalString,
  QDRANT_API_KEY: optionalString,
  SQLITE_PATH: optionalString,
  CHUNK_SIZE: optionalString,
  CHUNK_OVERLAP: optionalString,
  OLLAMA_HOST: optionalString,
  EMBEDDING_MODEL: optionalString,
  LLM_MODEL: optionalString,
  LLM_API_KEY: optionalString,
  TOP_K: optionalString,
  MIN_SCORE: optionalString,
  MAX_TOOL_ROUNDS: optionalString,
  INGEST_CONCURRENCY: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;
export type EnvName = keyof EnvVars;

/**
 * Config key each variable overrides, and how its text is read.
 * OLLAMA_HOST feeds both the embedding and the chat endpoint.
 */
export const ENV_OVERRIDES: ReadonlyArray<{
  env: EnvName;
  key: string;
  kind: 'string' | 'number' | 'boolean';
}> = [
  { env: 'SOURCE_TYPE', key: 'storage.type', kind: 'string' },
  { env: 'SOURCE_DIR', key: 'storage.local_dir', kind: 'string' },
  { env: 'S3_ENDPOINT', key: 'storage.endpoint', kind: 'string' },
  { env: 'S3_PORT', key: 'storage.port', kind: 'number' },
  { env: 'S3_USE_SSL', key: 'storage.use_ssl', kind: 'boolean' },
  { env: 'S3_REGION', key: 'storage.region', kind: 'string' },
  { env: 'S3_ACCESS_KEY', key: 'storage.access_key', kind: 'string' },
  { env: 'S3_SECRET_KEY', key: 'storage.secret_key', kind: 'string' },
  { env: 'S3_BUCKET', key: 'storage.bucket', kind: 'string' },
  { env: 'S3_PREFIX', key: 'storage.prefix', kind: 'string' },
  { env: 'VECTOR_STORE', key: 'vector_store.provider', kind: 'string' },
  { env: 'QDRANT_HOST', key: 'vector_store.host', kind: 'string' },
  { env: 'QDRANT_PORT', key: 'vector_store.port', kind: 'number' },
  { env: 'QDRANT_COLLECTION', key: 'vector_store.collection', kind: 'string' },
  { env: 'QDRANT_API_KEY', key: 'vector_store.api_key', kind: 'string' },
  { env: 'SQLITE_PATH', key: 'vector_store.sqlite_path', kind: 'string' },
  { env: 'CHUNK_SIZE', key: 'chunking.chunk_size', kind: 'number' },
  { env: 'CHUNK_OVERLAP', key: 'chunking.chunk_overlap', kind: 'number' },
  { env: 'OLLAMA_HOST', key: 'embedding.base_url', kind: 'string' },
  { env: 'OLLAMA_HOST', key: 'llm.base_url', kind: 'string' },
  { env: 'EMBEDDING_MODEL', key: 'embedding.model', kind: 'string' },
  { env: 'LLM_MODEL', key: 'llm.model', kind: 'string' },
  { env: 'LLM_API_KEY', key: 'llm.api_key', kind: 'string' },
  { env: 'TOP_K', key: 'retrieval.top_k', kind: 'number' },
  { env: 'MIN_SCORE', key: 'retrieval.min_score', kind: 'number' },
  { env: 'MAX_TOOL_ROUNDS', key: 'agent.max_tool_rounds', kind: 'number' },
  { env: 'INGEST_CONCURRENCY', key: 'ingestion.concurrency', kind: 'number' },
];

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Read the known variables from process.env (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw: Record<string, string | undefined> = {};
  for (const name of EnvSchema.keyof().options) {
    raw[name] = process.env[name];
  }

  // Every field accepts any string, so parse cannot fail
  _envCache = EnvSchema.parse(raw);
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends EnvName>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Convert an override's text to the type its config key expects. Values
 * that do not convert are passed through as text so the schema check names
 * the offending key.
 */
export function coerceEnvValue(value: string, kind: 'string' | 'number' | 'boolean'): unknown {
  switch (kind) {
    case 'string':
      return value;
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      return value;
    }
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
