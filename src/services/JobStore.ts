import { randomUUID } from 'node:crypto';
import type { Job, JobParameters, JobStatus } from '../domain/entities/Job.js';
import { canTransition, createJob, isActive, isTerminal } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { jobEventFor } from '../domain/entities/JobEvent.js';
import { InvalidTransitionError, NotFoundError } from '../domain/errors.js';
import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import { KeyedMutex } from '../infra/keyedMutex.js';
import { logger } from '../infra/logger.js';
import type { JobEventRepository } from '../infra/repositories/JobEventRepository.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { JobEventBus, JobEventPayload } from './JobEventBus.js';

export type JobPatch = Partial<
  Pick<
    Job,
    | 'status'
    | 'progress'
    | 'message'
    | 'resultLocation'
    | 'error'
    | 'attempt'
    | 'nextAttemptAt'
    | 'cancelRequested'
    | 'startedAt'
  >
>;

/**
 * Computes the change to apply from the current record. Returning null leaves
 * the record untouched.
 */
export type JobMutation = (job: Job) => JobPatch | null | Promise<JobPatch | null>;

/**
 * JobStore - canonical owner of job records
 * Every mutation is a read-modify-write under a per-job lock; jobs never
 * serialize on each other.
 */
export class JobStore {
  private locks = new KeyedMutex();
  private leases = new Set<string>();

  constructor(
    private db: DatabaseAdapter,
    private jobRepo: JobRepository,
    private eventRepo: JobEventRepository,
    private eventBus: JobEventBus,
    private clock: () => Date = () => new Date()
  ) {}

  create(parameters: JobParameters): Job {
    const job = createJob({ id: randomUUID(), parameters, now: this.clock() });

    this.db.transaction(() => {
      this.jobRepo.create(job);
      this.eventRepo.append(jobEventFor(job, randomUUID(), job.message));
    });

    logger.info('Job created', {
      jobId: job.id,
      transitionStyle: parameters.transitionStyle,
      encodingPreset: parameters.encodingPreset,
    });
    this.publish(job, 'created');
    return job;
  }

  get(jobId: string): Job | null {
    return this.jobRepo.getById(jobId);
  }

  require(jobId: string): Job {
    const job = this.jobRepo.getById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  listEvents(jobId: string): JobEvent[] {
    return this.eventRepo.listByJob(jobId);
  }

  listRecent(params: { status?: JobStatus; limit?: number } = {}): Job[] {
    return this.jobRepo.listRecent(params);
  }

  /**
   * Non-terminal records, oldest first
   */
  listActive(): Job[] {
    return this.jobRepo.listActive();
  }

  listExpired(now: Date, retentionHours: number): string[] {
    const cutoff = new Date(now.getTime() - retentionHours * 60 * 60 * 1000);
    return this.jobRepo.listIdsExpiredBefore(cutoff);
  }

  async update(jobId: string, mutation: JobMutation): Promise<Job> {
    return this.locks.runExclusive(jobId, async () => {
      const current = this.require(jobId);
      const patch = await mutation(current);
      if (!patch) {
        return current;
      }

      const next = this.applyPatch(current, patch);
      const statusChanged = next.status !== current.status;

      this.db.transaction(() => {
        this.jobRepo.save(next);
        if (statusChanged) {
          this.eventRepo.append(
            jobEventFor(
              next,
              randomUUID(),
              next.error ? `${next.error.kind}: ${next.error.message}` : next.message
            )
          );
        }
      });

      if (statusChanged) {
        logger.info('Job status changed', {
          jobId,
          from: current.status,
          to: next.status,
          attempt: next.attempt,
        });
      }
      this.publish(next, statusChanged ? 'status' : 'progress');
      return next;
    });
  }

  /**
   * Removes a terminal record. Active or leased jobs are left alone.
   */
  async delete(jobId: string): Promise<boolean> {
    return this.locks.runExclusive(jobId, () => {
      const job = this.jobRepo.getById(jobId);
      if (!job) {
        return false;
      }
      if (isActive(job.status) || this.leases.has(jobId)) {
        logger.warn('Refusing to delete active job', { jobId, status: job.status });
        return false;
      }

      this.db.transaction(() => {
        this.eventRepo.deleteByJobId(jobId);
        this.jobRepo.deleteById(jobId);
      });

      logger.info('Job deleted', { jobId, status: job.status });
      this.publish(job, 'deleted');
      return true;
    });
  }

  lease(jobId: string): boolean {
    if (this.leases.has(jobId)) {
      return false;
    }
    this.leases.add(jobId);
    return true;
  }

  release(jobId: string): void {
    this.leases.delete(jobId);
  }

  isLeased(jobId: string): boolean {
    return this.leases.has(jobId);
  }

  private applyPatch(current: Job, patch: JobPatch): Job {
    const now = this.clock();
    const status = patch.status ?? current.status;

    if (!canTransition(current.status, status)) {
      throw new InvalidTransitionError(
        `Invalid job status transition: ${current.status} -> ${status}`,
        { jobId: current.id }
      );
    }

    const next: Job = {
      ...current,
      ...patch,
      status,
      // Readers must never see progress go backwards, including across retries
      progress: Math.min(1, Math.max(current.progress, patch.progress ?? current.progress, 0)),
      updatedAt: now,
    };

    if (isTerminal(current.status)) {
      next.resultLocation = current.resultLocation;
      next.error = current.error;
      next.completedAt = current.completedAt;
    } else if (status === 'COMPLETED') {
      if (!next.resultLocation || next.error) {
        throw new InvalidTransitionError('COMPLETED requires a result location and no error', {
          jobId: current.id,
        });
      }
      next.progress = 1;
      next.completedAt = now;
      next.nextAttemptAt = null;
    } else if (status === 'FAILED') {
      if (!next.error || next.resultLocation) {
        throw new InvalidTransitionError('FAILED requires an error and no result location', {
          jobId: current.id,
        });
      }
      next.completedAt = now;
      next.nextAttemptAt = null;
    } else if (next.resultLocation || next.error) {
      throw new InvalidTransitionError('Result and error may only be set on a terminal transition', {
        jobId: current.id,
        status,
      });
    }

    return next;
  }

  private publish(job: Job, event: JobEventPayload['event']): void {
    try {
      this.eventBus.emitJob({ job, status: job.status, event, timestamp: job.updatedAt.toISOString() });
    } catch (error) {
      logger.error('Job event listener failed', { jobId: job.id, error });
    }
  }
}
