import { createHmac, randomUUID, timingSafeEqual } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { StorageError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { StorageBackend, StoredReference, WriteOptions } from './StorageBackend.js';

export interface LocalStorageOptions {
  rootDir: string;
  signingSecret: string;
  downloadPathPrefix?: string;
  clock?: () => Date;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem backend. Keys map to paths under `rootDir`; download URLs point
 * at the API's download route and carry an HMAC over key and expiry.
 */
export class LocalStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;
  private rootDir: string;
  private downloadPathPrefix: string;
  private clock: () => Date;

  constructor(private options: LocalStorageOptions) {
    this.rootDir = resolve(options.rootDir);
    this.downloadPathPrefix = options.downloadPathPrefix ?? '/api/download';
    this.clock = options.clock ?? (() => new Date());
  }

  resolvePath(key: string): string {
    if (key.length === 0 || key.startsWith('/') || key.split('/').includes('..')) {
      throw new StorageError('Invalid storage key', { key });
    }
    const fullPath = resolve(this.rootDir, key);
    if (!fullPath.startsWith(this.rootDir + sep)) {
      throw new StorageError('Storage key escapes the storage root', { key });
    }
    return fullPath;
  }

  async write(key: string, body: Readable | Buffer, options: WriteOptions = {}): Promise<StoredReference> {
    const target = this.resolvePath(key);
    const partial = `${target}.${randomUUID()}.part`;

    try {
      options.signal?.throwIfAborted();
      await mkdir(dirname(target), { recursive: true });
      if (Buffer.isBuffer(body)) {
        await writeFile(partial, body, { signal: options.signal });
      } else {
        await pipeline(body, createWriteStream(partial), { signal: options.signal });
      }
      await rename(partial, target);
    } catch (error) {
      if (!Buffer.isBuffer(body)) body.destroy();
      await rm(partial, { force: true });
      throw new StorageError(`Failed to write ${key}`, { error });
    }

    logger.debug('Stored object on local disk', { key });
    return key;
  }

  async read(reference: StoredReference): Promise<Readable> {
    const fullPath = this.resolvePath(reference);
    if (!(await this.exists(reference))) {
      throw new StorageError(`Object ${reference} not found`, { reference });
    }
    return createReadStream(fullPath);
  }

  async exists(reference: StoredReference): Promise<boolean> {
    const fullPath = this.resolvePath(reference);
    try {
      const info = await stat(fullPath);
      return info.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw new StorageError(`Failed to stat ${reference}`, { error });
    }
  }

  async resolveUrl(reference: StoredReference, ttlSeconds: number): Promise<string> {
    this.resolvePath(reference);
    const expires = Math.floor(this.clock().getTime() / 1000) + ttlSeconds;
    const signature = this.sign(reference, expires);
    const encodedKey = reference.split('/').map(encodeURIComponent).join('/');
    return `${this.downloadPathPrefix}/${encodedKey}?expires=${expires}&signature=${signature}`;
  }

  /**
   * Checks a download link produced by resolveUrl
   */
  verifyDownload(reference: StoredReference, expires: number, signature: string): boolean {
    if (!Number.isFinite(expires) || expires < Math.floor(this.clock().getTime() / 1000)) {
      return false;
    }
    const expected = Buffer.from(this.sign(reference, expires), 'hex');
    const provided = Buffer.from(signature, 'hex');
    return expected.length === provided.length && timingSafeEqual(expected, provided);
  }

  async delete(reference: StoredReference): Promise<void> {
    const fullPath = this.resolvePath(reference);
    try {
      await rm(fullPath, { force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete ${reference}`, { error });
    }
  }

  private sign(reference: StoredReference, expires: number): string {
    return createHmac('sha256', this.options.signingSecret)
      .update(`${reference}:${expires}`)
      .digest('hex');
  }
}
