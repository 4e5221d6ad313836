/**
 * Local directory content source.
 *
 * Walks the directory with fast-glob. The content version is the SHA-256
 * of the file bytes, so touching a file without changing it does not cause
 * a re-index.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';

import { ContentChangedError, FileNotFoundError } from '../errors/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { throwIfAborted } from '../utils/retry.js';
import { compareDocumentIds, type ContentSource, type SourceDocument } from './types.js';

/** Files hashed in parallel while listing */
const HASH_CONCURRENCY = 8;

export function sha256Hex(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class LocalContentSource implements ContentSource {
  readonly description: string;
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = resolve(rootDir);
    this.description = this.root;
  }

  async listDocuments(signal?: AbortSignal): Promise<SourceDocument[]> {
    throwIfAborted(signal);

    const rootStat = await stat(this.root).catch(() => undefined);
    if (!rootStat?.isDirectory()) {
      throw new FileNotFoundError(this.root);
    }

    const files = await fg('**/*.pdf', {
      cwd: this.root,
      onlyFiles: true,
      dot: false,
      caseSensitiveMatch: false,
      followSymbolicLinks: false,
    });

    const documents = await mapWithConcurrency(
      files,
      HASH_CONCURRENCY,
      async (file): Promise<SourceDocument> => {
        const absolute = resolve(this.root, file);
        const [bytes, info] = await Promise.all([readFile(absolute), stat(absolute)]);
        return {
          documentId: file,
          contentVersion: sha256Hex(bytes),
          size: info.size,
          lastModified: info.mtime,
        };
      },
      signal
    );
    throwIfAborted(signal);

    return documents
      .filter((doc): doc is SourceDocument => doc !== undefined)
      .sort(compareDocumentIds);
  }

  async getContent(document: SourceDocument, signal?: AbortSignal): Promise<Uint8Array> {
    const { documentId, contentVersion } = document;
    const absolute = resolve(this.root, documentId);
    const rel = relative(this.root, absolute);
    if (rel.startsWith('..') || isAbsolute(rel) || rel.split(sep).includes('..')) {
      throw new FileNotFoundError(documentId);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(absolute, { signal });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FileNotFoundError(absolute);
      }
      throw error;
    }

    // The file may have been rewritten since it was hashed for the listing
    if (sha256Hex(bytes) !== contentVersion) {
      throw new ContentChangedError(documentId, contentVersion);
    }
    return bytes;
  }
}
