/**
 * Test Utilities Module
 *
 * In-process stand-ins shared by the test suites.
 *
 * @example
 * ```typescript
 * import { hashEmbeddingModel, MemoryContentSource } from '../../test-utils/index.js';
 * ```
 */

export {
  TEST_DIMENSIONS,
  hashEmbedding,
  hashEmbeddingModel,
  MemoryContentSource,
  recordWrites,
  utf8Extractor,
  type StoreWrite,
} from './fakes.js';
export { InMemoryQdrant } from './qdrant-fake.js';
export {
  ScriptedChatModel,
  answer,
  callTool,
  type ScriptedReply,
  type RecordedRequest,
} from './chat-fake.js';
