import type { Job } from '../../domain/entities/Job.js';
import { isTerminal } from '../../domain/entities/Job.js';
import { CancelledError, PipelineError, StorageError, TimeoutError } from '../../domain/errors.js';
import { logger } from '../../infra/logger.js';
import { ToolchainError } from '../../infra/media/MediaToolchain.js';
import type { ScratchSpace } from '../../infra/media/ScratchSpace.js';
import { backoffDelay } from '../../infra/retry.js';
import type { JobStore } from '../JobStore.js';
import type { PipelineStage, StageContext, StageName } from './PipelineStage.js';

export type PipelineOutcome =
  | { outcome: 'completed'; job: Job }
  | { outcome: 'failed'; job: Job }
  | { outcome: 'retry'; job: Job; nextAttemptAt: Date }
  | { outcome: 'skipped'; reason: string };

export interface PipelineExecutorOptions {
  stageTimeoutsMs: Record<StageName, number>;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

const PROGRESS_STEP = 0.01;

/**
 * Maps anything a stage throws onto the pipeline error taxonomy
 */
export function classifyStageError(stage: PipelineStage, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  if (error instanceof ToolchainError) {
    return new PipelineError(stage.errorKind, `${stage.name} step failed: ${error.message}`, true, {
      exitCode: error.exitCode,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(stage.errorKind, `${stage.name} step failed: ${message}`, false);
}

/**
 * PipelineExecutor - runs the ordered stages for one job
 * Holds the job's lease for the whole run; every record change goes through
 * the JobStore.
 */
export class PipelineExecutor {
  constructor(
    private store: JobStore,
    private scratch: ScratchSpace,
    private stages: PipelineStage[],
    private options: PipelineExecutorOptions,
    private clock: () => Date = () => new Date()
  ) {}

  async execute(jobId: string): Promise<PipelineOutcome> {
    if (!this.store.lease(jobId)) {
      logger.warn('Job already leased, skipping', { jobId });
      return { outcome: 'skipped', reason: 'leased' };
    }

    try {
      const job = this.store.get(jobId);
      if (!job || job.status !== 'QUEUED') {
        logger.warn('Job is not runnable, skipping', { jobId, status: job?.status });
        return { outcome: 'skipped', reason: job ? `status ${job.status}` : 'missing' };
      }
      return await this.runPipeline(job);
    } finally {
      this.store.release(jobId);
    }
  }

  private async runPipeline(initial: Job): Promise<PipelineOutcome> {
    const jobId = initial.id;
    const outputs: { resultLocation: string | null } = { resultLocation: null };

    logger.info('Pipeline started', { jobId, attempt: initial.attempt });

    try {
      const scratchDir = await this.prepareScratch(jobId);
      for (const stage of this.stages) {
        const current = this.store.require(jobId);
        if (current.cancelRequested) {
          throw new CancelledError(jobId);
        }

        const job = await this.store.update(jobId, (record) => ({
          status: stage.status,
          message: stage.message,
          progress: stage.band[0],
          startedAt: record.startedAt ?? this.clock(),
        }));

        await this.runStage(stage, job, scratchDir, (reference) => {
          outputs.resultLocation = reference;
        });
      }

      const location = outputs.resultLocation;
      if (location === null) {
        throw new PipelineError('STORAGE', 'Pipeline finished without a published result', false);
      }
      const completed = await this.store.update(jobId, () => ({
        status: 'COMPLETED',
        message: 'Video processing completed',
        progress: 1,
        resultLocation: location,
      }));
      logger.info('Pipeline completed', { jobId, resultLocation: location });
      return { outcome: 'completed', job: completed };
    } catch (error) {
      return await this.handleFailure(jobId, error);
    } finally {
      await this.scratch.remove(jobId);
    }
  }

  /**
   * Marks a job FAILED after its run broke outside the normal failure path.
   * Terminal and missing records are left alone.
   */
  async abandon(jobId: string, error: unknown): Promise<void> {
    const current = this.store.get(jobId);
    if (!current || isTerminal(current.status)) return;

    const kind = error instanceof PipelineError ? error.kind : 'STORAGE';
    const message = error instanceof Error ? error.message : String(error);
    await this.store.update(jobId, () => ({
      status: 'FAILED',
      message: 'Video processing failed',
      error: { kind, message },
    }));
    logger.error('Job abandoned', { jobId, kind, message });
  }

  private async prepareScratch(jobId: string): Promise<string> {
    try {
      return await this.scratch.prepare(jobId);
    } catch (error) {
      throw new StorageError('Failed to prepare scratch space', { jobId, error });
    }
  }

  private async runStage(
    stage: PipelineStage,
    job: Job,
    scratchDir: string,
    setResultLocation: (reference: string) => void
  ): Promise<void> {
    const timeoutMs = this.options.stageTimeoutsMs[stage.name];
    const controller = new AbortController();
    const [bandStart, bandEnd] = stage.band;
    let reported = bandStart;
    let progressChain: Promise<unknown> = Promise.resolve();

    const context: StageContext = {
      job,
      scratchDir,
      signal: controller.signal,
      reportProgress: (fraction) => {
        if (controller.signal.aborted) return;
        const clamped = Math.min(1, Math.max(0, fraction));
        const overall = bandStart + (bandEnd - bandStart) * clamped;
        if (overall - reported < PROGRESS_STEP && clamped < 1) return;
        reported = overall;
        progressChain = progressChain
          .then(() => this.store.update(job.id, () => ({ progress: overall })))
          .catch((error: unknown) => {
            logger.warn('Progress update failed', { jobId: job.id, stage: stage.name, error });
          });
      },
      setResultLocation,
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(stage.name, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    const startedAt = Date.now();
    try {
      await Promise.race([stage.run(context), timeout]);
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof TimeoutError) {
        throw controller.signal.reason;
      }
      throw classifyStageError(stage, error);
    } finally {
      clearTimeout(timer);
      await progressChain;
    }

    logger.info('Stage completed', {
      jobId: job.id,
      stage: stage.name,
      durationMs: Date.now() - startedAt,
    });
  }

  private async handleFailure(jobId: string, error: unknown): Promise<PipelineOutcome> {
    const failure =
      error instanceof PipelineError
        ? error
        : new PipelineError('STORAGE', error instanceof Error ? error.message : String(error), false);
    const current = this.store.get(jobId);

    logger.error('Pipeline failed', {
      jobId,
      kind: failure.kind,
      message: failure.message,
      retryable: failure.retryable,
      attempt: current?.attempt,
      details: failure.details,
    });

    if (!current || isTerminal(current.status)) {
      return { outcome: 'skipped', reason: 'record no longer active' };
    }

    if (failure.retryable && current.attempt < this.options.maxAttempts && !current.cancelRequested) {
      const delay = backoffDelay(current.attempt, {
        initialDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        multiplier: 2,
      });
      const nextAttemptAt = new Date(this.clock().getTime() + delay);
      const job = await this.store.update(jobId, (record) => ({
        status: 'QUEUED',
        attempt: record.attempt + 1,
        nextAttemptAt,
        message: `Retrying after ${failure.kind} (attempt ${record.attempt + 1} of ${this.options.maxAttempts})`,
      }));
      return { outcome: 'retry', job, nextAttemptAt };
    }

    const job = await this.store.update(jobId, () => ({
      status: 'FAILED',
      message: 'Video processing failed',
      error: { kind: failure.kind, message: failure.message },
    }));
    return { outcome: 'failed', job };
  }
}
