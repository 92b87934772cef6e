import { extname } from 'node:path';
import type { Job, JobStatus } from '../../domain/entities/Job.js';
import type { PipelineErrorKind } from '../../domain/errors.js';

export type StageName = 'acquire' | 'compose' | 'encode' | 'publish';

export interface StageContext {
  job: Job;
  scratchDir: string;
  signal: AbortSignal;
  /** Fraction of this stage completed, in [0, 1] */
  reportProgress(fraction: number): void;
  /** Set by the publish stage */
  setResultLocation(reference: string): void;
}

/**
 * One step of the editing pipeline. Stages communicate only through fixed
 * file names in the job's scratch directory, so any stage can be re-run and
 * overwrite its own outputs.
 */
export interface PipelineStage {
  readonly name: StageName;
  readonly status: JobStatus;
  readonly message: string;
  /** Slice of overall progress this stage covers */
  readonly band: readonly [number, number];
  /** Kind recorded when the stage fails with an unclassified error */
  readonly errorKind: PipelineErrorKind;
  run(context: StageContext): Promise<void>;
}

export const COMPOSED_FILE = 'composed.mp4';
export const ENCODED_FILE = 'output.mp4';
export const CONCAT_LIST_FILE = 'concat.txt';

/**
 * Extension of the source URL's path, lowercased and without the dot
 */
export function sourceExtension(videoUrl: string): string {
  const pathname = new URL(videoUrl).pathname;
  return extname(pathname).slice(1).toLowerCase();
}

export function sourceFileName(videoUrl: string): string {
  const extension = sourceExtension(videoUrl);
  return `source.${/^[a-z0-9]{1,5}$/.test(extension) ? extension : 'mp4'}`;
}
