import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';

/**
 * MaintenanceScheduler - periodic expiry sweep using node-cron
 */
export class MaintenanceScheduler {
  private task: ScheduledTask | null = null;
  private sweeping = false;

  constructor(
    private retention: JobRetentionService,
    private intervalMinutes: number
  ) {}

  static cronExpressionFor(intervalMinutes: number): string {
    if (!Number.isInteger(intervalMinutes) || intervalMinutes < 1 || intervalMinutes > 59) {
      throw new Error(`Sweep interval must be 1-59 minutes, got ${intervalMinutes}`);
    }
    return `*/${intervalMinutes} * * * *`;
  }

  start(): void {
    if (this.task) return;
    const cronExpression = MaintenanceScheduler.cronExpressionFor(this.intervalMinutes);

    this.task = cron.schedule(cronExpression, async () => {
      await this.runSweep();
    });

    logger.info('MaintenanceScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('MaintenanceScheduler stopped');
    }
  }

  /**
   * Runs one sweep unless the previous one is still going
   */
  async runSweep(): Promise<void> {
    if (this.sweeping) {
      logger.info('Expiry sweep skipped - previous sweep still running');
      return;
    }

    this.sweeping = true;
    try {
      await this.retention.sweep();
    } catch (error) {
      logger.error('Expiry sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.sweeping = false;
    }
  }
}
