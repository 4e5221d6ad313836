/**
 * Qdrant index store.
 *
 * Point id = chunk_id, payload in snake_case:
 *   chunk_id, document_id, content_version, chunk_index, source_text, indexed_at
 * with keyword indexes on document_id and content_version.
 *
 * Every request goes through withRetry. Transient failures that outlast the
 * retries become ServiceUnavailableError; other write failures become a
 * permanent IndexWriteError.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';

import type { Config } from '../config/index.js';
import { CLIError, IndexWriteError, ServiceUnavailableError } from '../errors/index.js';
import { isTransientError, withRetry, type RetryPolicy } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { compareIndexedDocuments, rankHits } from './ranking.js';
import type { IndexedDocument, IndexRecord, IndexStore, ScoredRecord } from './types.js';

/** Points per scroll page */
const SCROLL_PAGE_SIZE = 256;

/**
 * Qdrant orders equal scores arbitrarily, so fetch extra candidates and
 * apply the chunk_id tie-break locally.
 */
const TIE_BREAK_SLACK = 10;

type PointId = string | number;

interface MatchCondition {
  key: string;
  match: { value: string };
}

interface PointFilter {
  must: MatchCondition[];
}

type Payload = Record<string, unknown>;

/**
 * The slice of QdrantClient this store uses. Tests pass an in-memory fake.
 */
export interface QdrantApi {
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: 'Cosine' } }
  ): Promise<unknown>;
  createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: 'keyword'; wait?: boolean }
  ): Promise<unknown>;
  upsert(
    collectionName: string,
    args: { wait?: boolean; points: Array<{ id: PointId; vector: number[]; payload: Payload }> }
  ): Promise<unknown>;
  delete(collectionName: string, args: { wait?: boolean; filter: PointFilter }): Promise<unknown>;
  scroll(
    collectionName: string,
    args: {
      filter?: PointFilter;
      limit?: number;
      offset?: PointId;
      with_payload?: boolean | string[];
      with_vector?: boolean;
    }
  ): Promise<{
    points: Array<{ id: PointId; payload?: Payload | null }>;
    next_page_offset?: PointId | Payload | null;
  }>;
  retrieve(
    collectionName: string,
    args: { ids: PointId[]; with_payload?: boolean; with_vector?: boolean }
  ): Promise<Array<{ id: PointId }>>;
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; with_payload?: boolean }
  ): Promise<Array<{ id: PointId; score: number; payload?: Payload | null }>>;
}

const ChunkPayloadSchema = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  content_version: z.string(),
  chunk_index: z.number().int().nonnegative(),
  source_text: z.string(),
  indexed_at: z.string(),
});

const VersionPayloadSchema = ChunkPayloadSchema.pick({
  document_id: true,
  content_version: true,
  indexed_at: true,
});

export interface QdrantIndexStoreOptions {
  client: QdrantApi;
  collection: string;
  dimensions: number;
  retry: RetryPolicy;
  description?: string;
  logger?: Logger;
  now?: () => Date;
}

function byDocument(documentId: string): PointFilter {
  return { must: [{ key: 'document_id', match: { value: documentId } }] };
}

function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  payload: Payload | null | undefined,
  id: PointId
): z.output<T> {
  const result = schema.safeParse(payload ?? {});
  if (!result.success) {
    throw new CLIError(
      `Qdrant point ${String(id)} has an unexpected payload`,
      'The collection may have been written by another tool; use a fresh collection name'
    );
  }
  return result.data;
}

/**
 * Qdrant's pagination cursor is a point id; anything else means the end.
 */
function nextOffset(value: PointId | Payload | null | undefined): PointId | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

/**
 * Latest indexed_at per version, newest first.
 */
function summarizeVersions(
  payloads: Array<z.output<typeof VersionPayloadSchema>>
): IndexedDocument[] {
  const byKey = new Map<string, IndexedDocument>();
  for (const p of payloads) {
    const key = `${p.document_id}\u0000${p.content_version}`;
    const entry = byKey.get(key);
    if (entry) {
      entry.chunkCount += 1;
      if (p.indexed_at > entry.lastIndexed) {
        entry.lastIndexed = p.indexed_at;
      }
    } else {
      byKey.set(key, {
        documentId: p.document_id,
        contentVersion: p.content_version,
        chunkCount: 1,
        lastIndexed: p.indexed_at,
      });
    }
  }
  return [...byKey.values()].sort(compareIndexedDocuments);
}

export class QdrantIndexStore implements IndexStore {
  readonly description: string;
  readonly dimensions: number;

  private readonly client: QdrantApi;
  private readonly collection: string;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: QdrantIndexStoreOptions) {
    this.client = options.client;
    this.collection = options.collection;
    this.dimensions = options.dimensions;
    this.retry = options.retry;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.description = options.description ?? `qdrant:${this.collection}`;
  }

  /**
   * Build the client from the [vector_store] config section.
   */
  static fromConfig(
    vectorStore: Config['vector_store'],
    dimensions: number,
    retry: RetryPolicy,
    logger?: Logger
  ): QdrantIndexStore {
    const client = new QdrantClient({
      host: vectorStore.host,
      port: vectorStore.port,
      https: vectorStore.use_ssl,
      apiKey: vectorStore.api_key,
    });
    const scheme = vectorStore.use_ssl ? 'https' : 'http';

    return new QdrantIndexStore({
      client,
      collection: vectorStore.collection,
      dimensions,
      retry,
      logger,
      description: `qdrant:${scheme}://${vectorStore.host}:${vectorStore.port}/${vectorStore.collection}`,
    });
  }

  private call<T>(what: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(operation, {
      ...this.retry,
      label: 'Qdrant',
      signal,
      onRetry: (error, attempt, delayMs) =>
        this.logger.debug?.(`${what} attempt ${attempt} failed, retrying in ${delayMs}ms: ${String(error)}`),
    });
  }

  private async write(what: string, operation: () => Promise<unknown>): Promise<void> {
    try {
      await this.call(what, operation);
    } catch (error) {
      if (error instanceof ServiceUnavailableError || error instanceof IndexWriteError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new IndexWriteError(`Qdrant ${what} failed: ${cause.message}`, {
        transient: isTransientError(error),
        cause,
      });
    }
  }

  async ensureReady(): Promise<void> {
    const { exists } = await this.call('collection check', () =>
      this.client.collectionExists(this.collection)
    );
    if (exists) {
      return;
    }

    this.logger.info?.(`Creating Qdrant collection "${this.collection}" (${this.dimensions}d, Cosine)`);
    await this.write('create collection', () =>
      this.client.createCollection(this.collection, {
        vectors: { size: this.dimensions, distance: 'Cosine' },
      })
    );
    for (const field of ['document_id', 'content_version']) {
      await this.write(`payload index on ${field}`, () =>
        this.client.createPayloadIndex(this.collection, {
          field_name: field,
          field_schema: 'keyword',
          wait: true,
        })
      );
    }
  }

  /**
   * Page through every point matching the filter, payload only.
   */
  private async scrollAll(
    filter: PointFilter | undefined,
    fields: string[]
  ): Promise<Array<z.output<typeof VersionPayloadSchema>>> {
    const payloads: Array<z.output<typeof VersionPayloadSchema>> = [];
    let offset: PointId | undefined;

    do {
      const page = await this.call('scroll', () =>
        this.client.scroll(this.collection, {
          filter,
          limit: SCROLL_PAGE_SIZE,
          offset,
          with_payload: fields,
          with_vector: false,
        })
      );
      for (const point of page.points) {
        payloads.push(parsePayload(VersionPayloadSchema, point.payload, point.id));
      }
      offset = nextOffset(page.next_page_offset);
    } while (offset !== undefined);

    return payloads;
  }

  async getVersion(documentId: string): Promise<string | undefined> {
    const [newest] = await this.listVersions(documentId);
    return newest;
  }

  async listVersions(documentId: string): Promise<string[]> {
    const payloads = await this.scrollAll(byDocument(documentId), [
      'document_id',
      'content_version',
      'indexed_at',
    ]);
    return summarizeVersions(payloads).map((doc) => doc.contentVersion);
  }

  async hasChunk(chunkId: string): Promise<boolean> {
    const points = await this.call('retrieve', () =>
      this.client.retrieve(this.collection, { ids: [chunkId], with_payload: false, with_vector: false })
    );
    return points.length > 0;
  }

  async upsertBatch(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    for (const record of records) {
      if (record.embedding.length !== this.dimensions) {
        throw new IndexWriteError(
          `Embedding for ${record.chunkId} has ${record.embedding.length} dimensions, index expects ${this.dimensions}`
        );
      }
    }

    const indexedAt = this.now().toISOString();
    const points = records.map((r) => ({
      id: r.chunkId,
      vector: r.embedding,
      payload: {
        chunk_id: r.chunkId,
        document_id: r.documentId,
        content_version: r.contentVersion,
        chunk_index: r.chunkIndex,
        source_text: r.sourceText,
        indexed_at: indexedAt,
      },
    }));

    // wait: the batch counts as written only once Qdrant has applied it
    await this.write('upsert', () => this.client.upsert(this.collection, { wait: true, points }));
  }

  async deleteVersion(documentId: string, contentVersion: string): Promise<void> {
    await this.write('delete', () =>
      this.client.delete(this.collection, {
        wait: true,
        filter: {
          must: [
            { key: 'document_id', match: { value: documentId } },
            { key: 'content_version', match: { value: contentVersion } },
          ],
        },
      })
    );
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.write('delete', () =>
      this.client.delete(this.collection, { wait: true, filter: byDocument(documentId) })
    );
  }

  async search(queryEmbedding: number[], topK: number, signal?: AbortSignal): Promise<ScoredRecord[]> {
    if (queryEmbedding.length !== this.dimensions) {
      throw new RangeError(
        `Query embedding has ${queryEmbedding.length} dimensions, index expects ${this.dimensions}`
      );
    }
    if (topK <= 0) {
      return [];
    }

    const points = await this.call(
      'search',
      () =>
        this.client.search(this.collection, {
          vector: queryEmbedding,
          limit: topK + TIE_BREAK_SLACK,
          with_payload: true,
        }),
      signal
    );

    const hits = points.map((point) => {
      const payload = parsePayload(ChunkPayloadSchema, point.payload, point.id);
      return {
        chunkId: payload.chunk_id,
        documentId: payload.document_id,
        contentVersion: payload.content_version,
        chunkIndex: payload.chunk_index,
        sourceText: payload.source_text,
        score: point.score,
      };
    });

    return rankHits(hits, topK);
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    const payloads = await this.scrollAll(undefined, ['document_id', 'content_version', 'indexed_at']);
    return summarizeVersions(payloads);
  }

  async close(): Promise<void> {
    // REST client holds no connection
  }
}
