/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults, then applies
 * environment variables on top of both.
 */

import type { Config } from './schema.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/**
 * Default configuration
 * Local MinIO + Qdrant + Ollama, as started by a typical docker compose file
 */
export const DEFAULT_CONFIG: Config = {
  storage: {
    type: 's3',
    endpoint: 'localhost',
    port: 9000,
    use_ssl: false,
    region: 'us-east-1',
    bucket: 'bills',
    prefix: '',
    force_path_style: true,
    local_dir: './bills',
  },

  vector_store: {
    provider: 'qdrant',
    host: 'localhost',
    port: 6333,
    use_ssl: false,
    collection: 'bill_chunks',
  },

  // 1000/200 characters keeps a bill's line items together in one window
  chunking: {
    chunk_size: 1000,
    chunk_overlap: 200,
  },

  // nomic-embed-text expects task prefixes on both sides
  embedding: {
    model: 'nomic-embed-text',
    base_url: DEFAULT_OLLAMA_HOST,
    dimensions: 768,
    document_prefix: 'search_document: ',
    query_prefix: 'search_query: ',
    batch_size: 32,
    timeout_ms: 120000, // 2 minutes - first call loads the model
    max_retries: 3,
    retry_base_delay_ms: 500,
  },

  llm: {
    model: 'llama3.1',
    base_url: DEFAULT_OLLAMA_HOST,
    temperature: 0,
    timeout_ms: 180000,
    max_retries: 2,
    retry_base_delay_ms: 1000,
  },

  retrieval: {
    top_k: 5,
    max_top_k: 20,
    min_score: 0.3,
  },

  agent: {
    max_tool_rounds: 3,
    max_history_messages: 20,
  },

  ingestion: {
    concurrency: 4,
    upsert_batch_size: 64,
    timeout_ms: 60000,
    max_retries: 3,
    retry_base_delay_ms: 500,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.billrag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# billrag configuration
# Location: ~/.billrag/config.toml (override with BILLRAG_CONFIG)
# Environment variables (see .env) take precedence over this file.

# Where the bill PDFs live
[storage]
type = "${DEFAULT_CONFIG.storage.type}"          # "s3" or "local"
endpoint = "${DEFAULT_CONFIG.storage.endpoint ?? ''}"
port = ${DEFAULT_CONFIG.storage.port ?? 9000}
use_ssl = ${DEFAULT_CONFIG.storage.use_ssl}
region = "${DEFAULT_CONFIG.storage.region}"
bucket = "${DEFAULT_CONFIG.storage.bucket}"
prefix = "${DEFAULT_CONFIG.storage.prefix}"
force_path_style = ${DEFAULT_CONFIG.storage.force_path_style}
local_dir = "${DEFAULT_CONFIG.storage.local_dir}"
# access_key = "..."   # or set S3_ACCESS_KEY
# secret_key = "..."   # or set S3_SECRET_KEY

[vector_store]
provider = "${DEFAULT_CONFIG.vector_store.provider}"     # "qdrant" or "sqlite"
host = "${DEFAULT_CONFIG.vector_store.host}"
port = ${DEFAULT_CONFIG.vector_store.port}
use_ssl = ${DEFAULT_CONFIG.vector_store.use_ssl}
collection = "${DEFAULT_CONFIG.vector_store.collection}"
# sqlite_path = "~/.billrag/index.db"

# Character windows; chunk_overlap must be smaller than chunk_size
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[embedding]
model = "${DEFAULT_CONFIG.embedding.model}"
base_url = "${DEFAULT_CONFIG.embedding.base_url}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

[llm]
model = "${DEFAULT_CONFIG.llm.model}"
base_url = "${DEFAULT_CONFIG.llm.base_url}"
temperature = ${DEFAULT_CONFIG.llm.temperature}

[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
max_top_k = ${DEFAULT_CONFIG.retrieval.max_top_k}
min_score = ${DEFAULT_CONFIG.retrieval.min_score}

[agent]
max_tool_rounds = ${DEFAULT_CONFIG.agent.max_tool_rounds}
max_history_messages = ${DEFAULT_CONFIG.agent.max_history_messages}

[ingestion]
concurrency = ${DEFAULT_CONFIG.ingestion.concurrency}
upsert_batch_size = ${DEFAULT_CONFIG.ingestion.upsert_batch_size}
`;
