import { logger } from '../infra/logger.js';
import type { ScratchSpace } from '../infra/media/ScratchSpace.js';
import type { Dispatcher } from './Dispatcher.js';
import type { JobStore } from './JobStore.js';

export interface RecoverySummary {
  requeued: number;
  scheduled: number;
  cancelled: number;
}

/**
 * JobRecoveryService - startup pass over jobs a previous process left active
 * Every such job restarts from the first stage, so execution is at-least-once.
 */
export class JobRecoveryService {
  constructor(
    private store: JobStore,
    private dispatcher: Dispatcher,
    private scratch: ScratchSpace,
    private clock: () => Date = () => new Date()
  ) {}

  async recover(): Promise<RecoverySummary> {
    const summary: RecoverySummary = { requeued: 0, scheduled: 0, cancelled: 0 };
    const jobs = this.store.listActive();

    for (const job of jobs) {
      await this.scratch.remove(job.id);

      if (job.cancelRequested) {
        await this.store.update(job.id, () => ({
          status: 'FAILED',
          message: 'Job cancelled',
          error: { kind: 'CANCELLED', message: 'Job was cancelled before the service restarted' },
        }));
        summary.cancelled++;
        continue;
      }

      const restarted = await this.store.update(job.id, (current) =>
        current.status === 'QUEUED'
          ? null
          : { status: 'QUEUED', message: 'Re-queued after service restart' }
      );

      const now = this.clock();
      if (restarted.nextAttemptAt && restarted.nextAttemptAt > now) {
        this.dispatcher.scheduleRetry(job.id, restarted.nextAttemptAt);
        summary.scheduled++;
      } else {
        this.dispatcher.requeue(job.id);
        summary.requeued++;
      }
    }

    if (jobs.length > 0) {
      logger.info('Recovered unfinished jobs', { ...summary });
    }
    return summary;
  }
}
