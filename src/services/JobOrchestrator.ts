import type { Job } from '../domain/entities/Job.js';
import { isTerminal } from '../domain/entities/Job.js';
import { parseJobParameters } from '../domain/jobParameters.js';
import { ExpiredError, JobNotReadyError, RejectedError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { StorageBackend } from '../infra/storage/StorageBackend.js';
import type { Dispatcher } from './Dispatcher.js';
import type { JobStore } from './JobStore.js';

export interface JobOrchestratorOptions {
  maxCustomerNameLength: number;
  resultUrlTtlSeconds: number;
  queueCapacity: number;
}

export interface ResolvedResult {
  url: string;
  expiresAt: Date;
}

export type RemoveOutcome = { action: 'cancelled'; job: Job } | { action: 'deleted' } | { action: 'kept'; job: Job };

/**
 * JobOrchestrator - entry point for callers
 * Validation happens before anything is persisted; a rejected submission
 * leaves no record behind.
 */
export class JobOrchestrator {
  constructor(
    private store: JobStore,
    private dispatcher: Dispatcher,
    private storage: StorageBackend,
    private options: JobOrchestratorOptions,
    private clock: () => Date = () => new Date()
  ) {}

  submit(input: unknown): Job {
    const parameters = parseJobParameters(input, {
      maxCustomerNameLength: this.options.maxCustomerNameLength,
    });

    if (!this.dispatcher.canAccept()) {
      logger.warn('Job submission rejected, queue full', { capacity: this.options.queueCapacity });
      throw new RejectedError(this.options.queueCapacity);
    }

    const job = this.store.create(parameters);
    this.dispatcher.submit(job.id);
    return job;
  }

  /**
   * Queued jobs fail immediately; running jobs stop at the next stage boundary.
   */
  async cancel(jobId: string): Promise<Job> {
    const job = this.store.require(jobId);
    if (isTerminal(job.status)) {
      return job;
    }

    const removed = this.dispatcher.cancelQueued(jobId);
    if (removed || (job.status === 'QUEUED' && !this.store.isLeased(jobId))) {
      const cancelled = await this.store.update(jobId, (current) =>
        isTerminal(current.status)
          ? null
          : {
              status: 'FAILED',
              message: 'Job cancelled',
              cancelRequested: true,
              error: { kind: 'CANCELLED', message: 'Job was cancelled before it started' },
            }
      );
      logger.info('Queued job cancelled', { jobId });
      return cancelled;
    }

    const flagged = await this.store.update(jobId, (current) =>
      isTerminal(current.status) || current.cancelRequested
        ? null
        : { cancelRequested: true, message: 'Cancellation requested' }
    );
    logger.info('Cancellation requested for running job', { jobId, status: flagged.status });
    return flagged;
  }

  /**
   * Cancels an active job, or removes a finished one with its published file
   */
  async remove(jobId: string): Promise<RemoveOutcome> {
    const job = this.store.require(jobId);
    if (!isTerminal(job.status)) {
      return { action: 'cancelled', job: await this.cancel(jobId) };
    }

    if (this.store.isLeased(jobId)) {
      logger.warn('Finished job is still leased, keeping it', { jobId });
      return { action: 'kept', job };
    }
    if (job.resultLocation) {
      await this.storage.delete(job.resultLocation);
    }
    if (await this.store.delete(jobId)) {
      return { action: 'deleted' };
    }
    return { action: 'kept', job };
  }

  async resolveResult(jobId: string): Promise<ResolvedResult> {
    const job = this.store.require(jobId);
    if (job.status === 'EXPIRED') {
      throw new ExpiredError(jobId);
    }
    if (job.status !== 'COMPLETED' || !job.resultLocation) {
      throw new JobNotReadyError(jobId, job.status);
    }

    const ttl = this.options.resultUrlTtlSeconds;
    const url = await this.storage.resolveUrl(job.resultLocation, ttl);
    return { url, expiresAt: new Date(this.clock().getTime() + ttl * 1000) };
  }
}
