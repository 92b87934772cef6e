import type { Readable } from 'node:stream';

/**
 * Opaque key understood by the backend that produced it
 */
export type StoredReference = string;

export interface WriteOptions {
  contentType?: string;
  contentLength?: number;
  /** Aborting stops the transfer; nothing is left under the key */
  signal?: AbortSignal;
}

/**
 * Capability set shared by local disk and object storage.
 * Every operation fails with StorageError; none of them retries on its own.
 */
export interface StorageBackend {
  readonly kind: 'local' | 's3';

  write(key: string, body: Readable | Buffer, options?: WriteOptions): Promise<StoredReference>;

  read(reference: StoredReference): Promise<Readable>;

  exists(reference: StoredReference): Promise<boolean>;

  /**
   * Downloadable URL valid for roughly `ttlSeconds`
   */
  resolveUrl(reference: StoredReference, ttlSeconds: number): Promise<string>;

  /**
   * Idempotent: deleting a missing object succeeds
   */
  delete(reference: StoredReference): Promise<void>;
}

export const RESULTS_PREFIX = 'results';

export function resultKeyFor(jobId: string): string {
  return `${RESULTS_PREFIX}/${jobId}.mp4`;
}
