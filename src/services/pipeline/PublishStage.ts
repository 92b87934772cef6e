import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { StorageError } from '../../domain/errors.js';
import { logger } from '../../infra/logger.js';
import { withRetry } from '../../infra/retry.js';
import type { StorageBackend } from '../../infra/storage/StorageBackend.js';
import { resultKeyFor } from '../../infra/storage/StorageBackend.js';
import type { PipelineStage, StageContext } from './PipelineStage.js';
import { ENCODED_FILE } from './PipelineStage.js';

export interface PublishStageOptions {
  retryAttempts: number;
  retryDelayMs: number;
}

/**
 * Writes the encoded video to the result namespace. Storage failures are
 * retried here before the job as a whole is considered failed.
 */
export class PublishStage implements PipelineStage {
  readonly name = 'publish' as const;
  readonly status = 'PUBLISHING' as const;
  readonly message = 'Publishing result';
  readonly band = [0.9, 1] as const;
  readonly errorKind = 'STORAGE' as const;

  constructor(
    private storage: StorageBackend,
    private options: PublishStageOptions
  ) {}

  async run(context: StageContext): Promise<void> {
    const jobId = context.job.id;
    const filePath = join(context.scratchDir, ENCODED_FILE);
    const { size } = await stat(filePath);
    const key = resultKeyFor(jobId);

    const reference = await withRetry(
      () =>
        this.storage.write(key, createReadStream(filePath), {
          contentType: 'video/mp4',
          contentLength: size,
          signal: context.signal,
        }),
      {
        maxAttempts: this.options.retryAttempts,
        initialDelayMs: this.options.retryDelayMs,
        maxDelayMs: this.options.retryDelayMs * 16,
        multiplier: 2,
      },
      {
        shouldRetry: (error) => error instanceof StorageError,
        onRetry: (log) =>
          logger.warn('Publish failed, retrying', { jobId, key, ...log }),
        signal: context.signal,
      }
    );

    if (context.signal.aborted) {
      // Timed out or cancelled while the write was in flight
      await this.storage.delete(reference);
      logger.warn('Publish finished after the stage was aborted, result removed', { jobId, key });
      throw context.signal.reason;
    }

    logger.info('Result published', { jobId, reference, bytes: size, backend: this.storage.kind });
    context.setResultLocation(reference);
    context.reportProgress(1);
  }
}
