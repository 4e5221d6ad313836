/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `billrag config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  ConfigObjectSchema,
  PartialConfigSchema,
  StorageConfigSchema,
  VectorStoreConfigSchema,
  ChunkingConfigSchema,
  EmbeddingConfigSchema,
  LLMConfigSchema,
  RetrievalConfigSchema,
  AgentConfigSchema,
  IngestionConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE, DEFAULT_OLLAMA_HOST } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  listConfig,
  resolveConfigPath,
  envOverrides,
  deepMerge,
  type LoadConfigOptions,
} from './loader.js';

// Paths
export { BILLRAG_DIR, DEFAULT_CONFIG_PATH, DEFAULT_SQLITE_PATH, expandHome } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  coerceEnvValue,
  EnvSchema,
  ENV_OVERRIDES,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, EnvName } from './env.js';
