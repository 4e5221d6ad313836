/**
 * S3-compatible content source (AWS S3, MinIO, ...).
 *
 * The object ETag is the content version. Listing pages through
 * ListObjectsV2; every request goes through withRetry so a flapping
 * endpoint surfaces as ServiceUnavailableError.
 */

import {
  S3Client,
  GetObjectCommand,
  ListObjectsV2Command,
  type GetObjectCommandInput,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';

import type { Config } from '../config/index.js';
import { ContentChangedError, FileNotFoundError } from '../errors/index.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { compareDocumentIds, isPdfKey, type ContentSource, type SourceDocument } from './types.js';

export type ListPage = Pick<
  ListObjectsV2CommandOutput,
  'Contents' | 'IsTruncated' | 'NextContinuationToken'
>;

export interface S3ContentSourceOptions {
  client: S3Client;
  bucket: string;
  prefix?: string;
  retry: RetryPolicy;
  logger?: Logger;
}

/**
 * ETags come back wrapped in double quotes.
 */
export function normalizeEtag(etag: string): string {
  return etag.replace(/^W\//, '').replace(/^"+|"+$/g, '');
}

/**
 * Endpoint URL for the S3 client. A bare host gets a scheme and port;
 * a full URL is used as is; no endpoint means AWS itself.
 */
export function buildS3Endpoint(
  storage: Pick<Config['storage'], 'endpoint' | 'port' | 'use_ssl'>
): string | undefined {
  const endpoint = storage.endpoint?.trim();
  if (!endpoint) {
    return undefined;
  }
  if (endpoint.includes('://')) {
    return endpoint;
  }
  const scheme = storage.use_ssl ? 'https' : 'http';
  return storage.port !== undefined ? `${scheme}://${endpoint}:${storage.port}` : `${scheme}://${endpoint}`;
}

/**
 * GetObject request pinned to the listed ETag, so S3 answers 412 instead of
 * returning bytes of a newer version.
 */
export function getObjectInput(bucket: string, document: SourceDocument): GetObjectCommandInput {
  return {
    Bucket: bucket,
    Key: document.documentId,
    IfMatch: `"${document.contentVersion}"`,
  };
}

export function isPreconditionFailed(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'PreconditionFailed') {
    return true;
  }
  return (
    '$metadata' in error &&
    typeof error.$metadata === 'object' &&
    error.$metadata !== null &&
    'httpStatusCode' in error.$metadata &&
    error.$metadata.httpStatusCode === 412
  );
}

/**
 * Follow continuation tokens until the listing is complete.
 */
export async function listAllObjects(
  fetchPage: (continuationToken: string | undefined) => Promise<ListPage>
): Promise<SourceDocument[]> {
  const documents: SourceDocument[] = [];
  let token: string | undefined;

  do {
    const page = await fetchPage(token);
    for (const object of page.Contents ?? []) {
      if (!object.Key || !object.ETag || !isPdfKey(object.Key)) {
        continue;
      }
      documents.push({
        documentId: object.Key,
        contentVersion: normalizeEtag(object.ETag),
        size: object.Size,
        lastModified: object.LastModified,
      });
    }
    token = page.IsTruncated ? page.NextContinuationToken : undefined;
  } while (token);

  return documents.sort(compareDocumentIds);
}

export class S3ContentSource implements ContentSource {
  readonly description: string;

  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(options: S3ContentSourceOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.prefix = options.prefix ?? '';
    this.retry = options.retry;
    this.logger = options.logger ?? silentLogger;
    this.description = `s3://${this.bucket}/${this.prefix}`;
  }

  /**
   * Build the client from the [storage] config section.
   */
  static fromConfig(
    storage: Config['storage'],
    retry: RetryPolicy,
    logger?: Logger
  ): S3ContentSource {
    const credentials =
      storage.access_key && storage.secret_key
        ? { accessKeyId: storage.access_key, secretAccessKey: storage.secret_key }
        : undefined;

    const client = new S3Client({
      endpoint: buildS3Endpoint(storage),
      region: storage.region,
      credentials,
      forcePathStyle: storage.force_path_style,
    });

    return new S3ContentSource({
      client,
      bucket: storage.bucket,
      prefix: storage.prefix,
      retry,
      logger,
    });
  }

  async listDocuments(signal?: AbortSignal): Promise<SourceDocument[]> {
    const documents = await listAllObjects((token) =>
      withRetry(
        () =>
          this.client.send(
            new ListObjectsV2Command({
              Bucket: this.bucket,
              Prefix: this.prefix || undefined,
              ContinuationToken: token,
            }),
            { abortSignal: signal }
          ),
        {
          ...this.retry,
          label: 'S3 storage',
          signal,
          onRetry: (error, attempt) =>
            this.logger.debug?.(`ListObjectsV2 attempt ${attempt} failed: ${String(error)}`),
        }
      )
    );

    this.logger.debug?.(`Listed ${documents.length} PDF(s) in ${this.description}`);
    return documents;
  }

  async getContent(document: SourceDocument, signal?: AbortSignal): Promise<Uint8Array> {
    const { documentId } = document;
    try {
      return await withRetry(
        async () => {
          const response = await this.client.send(new GetObjectCommand(getObjectInput(this.bucket, document)), {
            abortSignal: signal,
          });
          if (!response.Body) {
            throw new FileNotFoundError(`s3://${this.bucket}/${documentId}`);
          }
          return response.Body.transformToByteArray();
        },
        { ...this.retry, label: 'S3 storage', signal }
      );
    } catch (error) {
      if (isPreconditionFailed(error)) {
        throw new ContentChangedError(documentId, document.contentVersion);
      }
      if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) {
        throw new FileNotFoundError(`s3://${this.bucket}/${documentId}`);
      }
      throw error;
    }
  }
}
