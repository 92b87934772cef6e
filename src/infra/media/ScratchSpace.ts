import { mkdir, rm, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { logger } from '../logger.js';

/**
 * Per-job working directories under TEMP_STORAGE_PATH. Scratch artifacts never
 * share a namespace with published results.
 */
export class ScratchSpace {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  dirFor(jobId: string): string {
    if (!/^[A-Za-z0-9-]+$/.test(jobId)) {
      throw new Error(`Invalid job id for scratch directory: ${jobId}`);
    }
    return join(this.rootDir, jobId);
  }

  pathFor(jobId: string, fileName: string): string {
    return join(this.dirFor(jobId), fileName);
  }

  async prepare(jobId: string): Promise<string> {
    const dir = this.dirFor(jobId);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async exists(jobId: string): Promise<boolean> {
    try {
      return (await stat(this.dirFor(jobId))).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Removes the job's directory. Failures are logged and swallowed so cleanup
   * never masks the job's own outcome.
   */
  async remove(jobId: string): Promise<void> {
    try {
      await rm(this.dirFor(jobId), { recursive: true, force: true });
    } catch (error) {
      logger.warn('Failed to remove scratch directory', { jobId, error });
    }
  }
}
