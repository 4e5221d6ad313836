/**
 * Build the index store named by [vector_store] provider.
 */

import type { Config } from '../config/index.js';
import { DEFAULT_SQLITE_PATH, expandHome } from '../config/paths.js';
import { retryPolicyFrom } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import { QdrantIndexStore } from './qdrant-store.js';
import { SqliteIndexStore } from './sqlite-store.js';
import type { IndexStore } from './types.js';

export function createIndexStore(config: Config, logger?: Logger): IndexStore {
  const { vector_store: vectorStore, embedding, ingestion } = config;

  switch (vectorStore.provider) {
    case 'qdrant':
      return QdrantIndexStore.fromConfig(
        vectorStore,
        embedding.dimensions,
        retryPolicyFrom(ingestion),
        logger
      );
    case 'sqlite':
      return SqliteIndexStore.open(
        expandHome(vectorStore.sqlite_path ?? DEFAULT_SQLITE_PATH),
        embedding.dimensions,
        logger
      );
  }
}
