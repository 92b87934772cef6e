import { RejectedError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import { JobQueue } from './JobQueue.js';
import type { PipelineOutcome } from './pipeline/PipelineExecutor.js';

export interface JobRunner {
  execute(jobId: string): Promise<PipelineOutcome>;
  /** Records a failure for a job whose run threw instead of returning an outcome */
  abandon?(jobId: string, error: unknown): Promise<void>;
}

export interface DispatcherOptions {
  concurrency: number;
  /** 0 = unbounded */
  queueCapacity: number;
}

export interface DispatcherStats {
  concurrency: number;
  active: number;
  activeJobIds: string[];
  queued: number;
  pendingRetries: number;
  queueCapacity: number | null;
  accepting: boolean;
}

/**
 * Dispatcher - fixed pool of worker slots draining a FIFO channel
 * Each slot runs one pipeline at a time and pulls the next id as soon as its
 * job ends. Retries wait on timers, never on a slot.
 */
export class Dispatcher {
  private queue = new JobQueue<string>();
  private active = new Set<string>();
  private retryTimers = new Map<string, NodeJS.Timeout>();
  private slots: Promise<void>[] = [];
  private running = false;

  constructor(
    private runner: JobRunner,
    private options: DispatcherOptions,
    private clock: () => Date = () => new Date()
  ) {
    if (options.concurrency < 1) {
      throw new Error('Dispatcher concurrency must be at least 1');
    }
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (let index = 0; index < this.options.concurrency; index++) {
      this.slots.push(this.runSlot(index));
    }
    logger.info('Dispatcher started', {
      concurrency: this.options.concurrency,
      queueCapacity: this.options.queueCapacity || 'unbounded',
    });
  }

  canAccept(): boolean {
    if (this.queue.isClosed) return false;
    return this.options.queueCapacity === 0 || this.queue.size < this.options.queueCapacity;
  }

  /**
   * Enqueues a new job id. Never blocks; a full bounded queue throws REJECTED.
   */
  submit(jobId: string): void {
    if (!this.canAccept()) {
      throw new RejectedError(this.options.queueCapacity);
    }
    this.enqueue(jobId);
  }

  /**
   * Enqueues an id that was already admitted (retry or recovery); capacity is
   * not checked again.
   */
  requeue(jobId: string): void {
    this.enqueue(jobId);
  }

  scheduleRetry(jobId: string, at: Date): void {
    if (this.queue.isClosed) {
      logger.info('Dispatcher stopped, retry not scheduled', { jobId });
      return;
    }
    const existing = this.retryTimers.get(jobId);
    if (existing) clearTimeout(existing);

    const delay = Math.max(0, at.getTime() - this.clock().getTime());
    const timer = setTimeout(() => {
      this.retryTimers.delete(jobId);
      if (!this.queue.isClosed) {
        this.enqueue(jobId);
      }
    }, delay);
    this.retryTimers.set(jobId, timer);

    logger.info('Job retry scheduled', { jobId, delayMs: delay, at: at.toISOString() });
  }

  /**
   * Removes a job that has not started yet. Returns false if it is running or unknown.
   */
  cancelQueued(jobId: string): boolean {
    const timer = this.retryTimers.get(jobId);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(jobId);
      return true;
    }
    return this.queue.remove(jobId);
  }

  isActive(jobId: string): boolean {
    return this.active.has(jobId);
  }

  stats(): DispatcherStats {
    return {
      concurrency: this.options.concurrency,
      active: this.active.size,
      activeJobIds: [...this.active],
      queued: this.queue.size,
      pendingRetries: this.retryTimers.size,
      queueCapacity: this.options.queueCapacity === 0 ? null : this.options.queueCapacity,
      accepting: this.canAccept(),
    };
  }

  /**
   * Closes the channel, drops pending retries and waits for running jobs
   */
  async stop(): Promise<void> {
    const dropped = this.queue.close();
    for (const timer of this.retryTimers.values()) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    logger.info('Dispatcher stopping', { running: this.active.size, dropped: dropped.length });
    await Promise.all(this.slots);
    this.slots = [];
    this.running = false;
  }

  private enqueue(jobId: string): void {
    if (this.queue.has(jobId) || this.active.has(jobId)) {
      logger.debug('Job already queued or running', { jobId });
      return;
    }
    this.queue.push(jobId);
    logger.debug('Job enqueued', { jobId, queued: this.queue.size });
  }

  private async runSlot(slot: number): Promise<void> {
    for (;;) {
      const jobId = await this.queue.take();
      if (jobId === null) return;

      this.active.add(jobId);
      try {
        const result = await this.runner.execute(jobId);
        if (result.outcome === 'retry') {
          this.scheduleRetry(jobId, result.nextAttemptAt);
        }
      } catch (error) {
        logger.error('Worker slot failed to run job', { slot, jobId, error });
        await this.abandon(jobId, error);
      } finally {
        this.active.delete(jobId);
      }
    }
  }

  private async abandon(jobId: string, error: unknown): Promise<void> {
    if (!this.runner.abandon) return;
    try {
      await this.runner.abandon(jobId, error);
    } catch (abandonError) {
      logger.error('Failed to record job failure', { jobId, error: abandonError });
    }
  }
}
