import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { Readable } from 'node:stream';
import { StorageError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { StorageBackend, StoredReference, WriteOptions } from './StorageBackend.js';

export interface S3StorageOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchKey');
}

export function createS3Client(options: S3StorageOptions): S3Client {
  const config: S3ClientConfig = { region: options.region };
  if (options.accessKeyId && options.secretAccessKey) {
    config.credentials = {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
    };
  }
  if (options.endpoint) {
    config.endpoint = options.endpoint;
    config.forcePathStyle = true;
  }
  return new S3Client(config);
}

/**
 * S3-compatible object storage backend. Result URLs are presigned GETs.
 */
export class S3StorageBackend implements StorageBackend {
  readonly kind = 's3' as const;
  private bucket: string;

  constructor(
    options: S3StorageOptions,
    private client: S3Client = createS3Client(options)
  ) {
    this.bucket = options.bucket;
  }

  async write(key: string, body: Readable | Buffer, options: WriteOptions = {}): Promise<StoredReference> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: options.contentType ?? 'application/octet-stream',
          ContentLength: Buffer.isBuffer(body) ? body.length : options.contentLength,
        }),
        { abortSignal: options.signal }
      );
    } catch (error) {
      throw new StorageError(`Failed to upload ${key}`, { bucket: this.bucket, error });
    }

    logger.debug('Stored object in bucket', { bucket: this.bucket, key });
    return key;
  }

  async read(reference: StoredReference): Promise<Readable> {
    let body: unknown;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: reference })
      );
      body = response.Body;
    } catch (error) {
      throw new StorageError(`Failed to read ${reference}`, { bucket: this.bucket, error });
    }

    if (!(body instanceof Readable)) {
      throw new StorageError(`Object ${reference} has no readable body`, { bucket: this.bucket });
    }
    return body;
  }

  async exists(reference: StoredReference): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: reference }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageError(`Failed to check ${reference}`, { bucket: this.bucket, error });
    }
  }

  async resolveUrl(reference: StoredReference, ttlSeconds: number): Promise<string> {
    try {
      return await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: this.bucket, Key: reference }),
        { expiresIn: ttlSeconds }
      );
    } catch (error) {
      throw new StorageError(`Failed to presign ${reference}`, { bucket: this.bucket, error });
    }
  }

  async delete(reference: StoredReference): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: reference }));
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw new StorageError(`Failed to delete ${reference}`, { bucket: this.bucket, error });
    }
  }
}
