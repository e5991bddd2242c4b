import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import { StoreUnavailableError } from '@/server/blog/errors';
import type { ListOptions, ListPage, ObjectBody, ObjectStore } from '@/server/blog/object-store';

export type S3ObjectStoreOptions = {
  client: S3Client;
  bucket: string;
  /**
   * Prepended to every key, e.g. `blog/`. Keys handed back by `list` have it removed.
   */
  keyPrefix?: string;
};

function isMissingObject(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  const { name, Code, $metadata } = error as { name?: unknown; Code?: unknown; $metadata?: { httpStatusCode?: number } };
  const code = typeof name === 'string' ? name : typeof Code === 'string' ? Code : '';
  return code.toLowerCase() === 'nosuchkey' || code.toLowerCase() === 'notfound' || $metadata?.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
  readonly name: string;
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly keyPrefix: string;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.keyPrefix = options.keyPrefix ?? '';
    this.name = `s3:${options.bucket}`;
  }

  private toObjectKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private fromObjectKey(key: string): string | null {
    return key.startsWith(this.keyPrefix) ? key.slice(this.keyPrefix.length) : null;
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ListPage> {
    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.toObjectKey(prefix),
          Delimiter: options.delimiter,
          ContinuationToken: options.continuationToken,
        })
      );

      const keys = (response.Contents ?? [])
        .map((object) => (object.Key ? this.fromObjectKey(object.Key) : null))
        .filter((key): key is string => Boolean(key));
      const commonPrefixes = (response.CommonPrefixes ?? [])
        .map((entry) => (entry.Prefix ? this.fromObjectKey(entry.Prefix) : null))
        .filter((value): value is string => Boolean(value));

      return {
        keys,
        commonPrefixes,
        nextToken: response.IsTruncated ? response.NextContinuationToken : undefined,
      };
    } catch (error) {
      throw new StoreUnavailableError('list', prefix, error);
    }
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.toObjectKey(key),
        })
      );
      return response.Body ? await response.Body.transformToByteArray() : new Uint8Array();
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      throw new StoreUnavailableError('get', key, error);
    }
  }

  async put(key: string, body: ObjectBody): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.toObjectKey(key),
          Body: body,
          ContentType: typeof body === 'string' ? 'text/plain; charset=utf-8' : 'application/octet-stream',
        })
      );
    } catch (error) {
      throw new StoreUnavailableError('put', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.toObjectKey(key),
        })
      );
    } catch (error) {
      if (isMissingObject(error)) {
        return;
      }
      throw new StoreUnavailableError('delete', key, error);
    }
  }
}
