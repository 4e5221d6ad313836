/**
 * Content Source Module
 *
 * Where bill PDFs come from. Use createContentSource() to build the adapter
 * named by [storage] type.
 */

import type { Config } from '../config/index.js';
import type { Logger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import { expandHome } from '../config/paths.js';
import { LocalContentSource } from './local-source.js';
import { S3ContentSource } from './s3-source.js';
import type { ContentSource } from './types.js';

export type { ContentSource, SourceDocument } from './types.js';
export { isPdfKey, compareDocumentIds } from './types.js';
export {
  S3ContentSource,
  listAllObjects,
  normalizeEtag,
  buildS3Endpoint,
  type ListPage,
  type S3ContentSourceOptions,
} from './s3-source.js';
export { LocalContentSource, sha256Hex } from './local-source.js';

export function createContentSource(
  storage: Config['storage'],
  retry: RetryPolicy,
  logger?: Logger
): ContentSource {
  switch (storage.type) {
    case 's3':
      return S3ContentSource.fromConfig(storage, retry, logger);
    case 'local':
      return new LocalContentSource(expandHome(storage.local_dir));
  }
}
