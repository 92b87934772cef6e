import { logger } from '../infra/logger.js';
import type { ScratchSpace } from '../infra/media/ScratchSpace.js';
import type { StorageBackend } from '../infra/storage/StorageBackend.js';
import type { JobStore } from './JobStore.js';

export interface SweepResult {
  deleted: number;
  skipped: number;
  failed: number;
}

/**
 * JobRetentionService - removes jobs older than the retention window
 * A record is marked EXPIRED before its artifact is deleted, so a storage
 * failure leaves a tombstone that the next sweep picks up again.
 */
export class JobRetentionService {
  constructor(
    private store: JobStore,
    private storage: StorageBackend,
    private scratch: ScratchSpace,
    private retentionHours: number,
    private clock: () => Date = () => new Date()
  ) {}

  async sweep(now: Date = this.clock()): Promise<SweepResult> {
    const result: SweepResult = { deleted: 0, skipped: 0, failed: 0 };
    const jobIds = this.store.listExpired(now, this.retentionHours);

    if (jobIds.length === 0) {
      logger.debug('No expired jobs to clean up', { retentionHours: this.retentionHours });
      return result;
    }

    for (const jobId of jobIds) {
      if (this.store.isLeased(jobId)) {
        result.skipped++;
        continue;
      }

      try {
        const job = await this.store.update(jobId, (current) =>
          current.status === 'EXPIRED' ? null : { status: 'EXPIRED', message: 'Job expired' }
        );

        if (job.resultLocation) {
          await this.storage.delete(job.resultLocation);
        }
        await this.scratch.remove(jobId);

        if (await this.store.delete(jobId)) {
          result.deleted++;
        } else {
          result.skipped++;
        }
      } catch (error) {
        result.failed++;
        logger.error('Failed to clean up expired job', { jobId, error });
      }
    }

    logger.info('Expiry sweep finished', { ...result, candidates: jobIds.length });
    return result;
  }
}
