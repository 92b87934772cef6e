import type { Env } from '../env.js';
import { ConfigError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { LocalStorageBackend } from './LocalStorageBackend.js';
import { S3StorageBackend } from './S3StorageBackend.js';
import type { StorageBackend } from './StorageBackend.js';

/**
 * Selects the storage backend once, from configuration
 */
export function createStorageBackend(
  env: Pick<
    Env,
    | 'STORAGE_TYPE'
    | 'LOCAL_STORAGE_PATH'
    | 'DOWNLOAD_SIGNING_SECRET'
    | 'S3_BUCKET'
    | 'S3_REGION'
    | 'S3_ENDPOINT_URL'
    | 'S3_ACCESS_KEY_ID'
    | 'S3_SECRET_ACCESS_KEY'
  >
): StorageBackend {
  if (env.STORAGE_TYPE === 's3') {
    if (!env.S3_BUCKET) {
      throw new ConfigError('S3_BUCKET is required when STORAGE_TYPE is s3');
    }
    logger.info('Using S3 storage backend', {
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT_URL,
    });
    return new S3StorageBackend({
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT_URL,
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    });
  }

  logger.info('Using local storage backend', { root: env.LOCAL_STORAGE_PATH });
  return new LocalStorageBackend({
    rootDir: env.LOCAL_STORAGE_PATH,
    signingSecret: env.DOWNLOAD_SIGNING_SECRET,
  });
}
