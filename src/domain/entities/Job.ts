/**
 * Job entity - one video editing request and its lifecycle record
 * The record is owned by the JobStore; workers only hold a lease on the id.
 */
export const TRANSITION_STYLES = ['CUT', 'FADE', 'SLIDE'] as const;
export type TransitionStyle = (typeof TRANSITION_STYLES)[number];

export const ENCODING_PRESETS = ['STANDARD', 'HIGH', 'MOBILE', 'WEB'] as const;
export type EncodingPresetName = (typeof ENCODING_PRESETS)[number];

export const WATERMARK_POSITIONS = [
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
  'center',
] as const;
export type WatermarkPosition = (typeof WATERMARK_POSITIONS)[number];

export type JobStatus =
  | 'QUEUED'
  | 'DOWNLOADING'
  | 'COMPOSING'
  | 'ENCODING'
  | 'PUBLISHING'
  | 'COMPLETED'
  | 'FAILED'
  | 'EXPIRED';

export type JobErrorKind =
  | 'ACQUIRE_FAILED'
  | 'COMPOSE_FAILED'
  | 'ENCODE_FAILED'
  | 'STORAGE'
  | 'TIMEOUT'
  | 'CANCELLED';

export interface JobError {
  kind: JobErrorKind;
  message: string;
}

export interface OverlaySettings {
  customerText: boolean;
  watermark: string | null;
  watermarkPosition: WatermarkPosition;
}

export interface JobParameters {
  videoUrl: string;
  customerName: string;
  introClip: string | null;
  outroClip: string | null;
  transitionStyle: TransitionStyle;
  encodingPreset: EncodingPresetName;
  overlay: OverlaySettings;
}

export interface Job {
  id: string;
  parameters: JobParameters;
  status: JobStatus;
  progress: number;
  message: string;
  resultLocation: string | null;
  error: JobError | null;
  attempt: number;
  nextAttemptAt: Date | null;
  cancelRequested: boolean;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

/**
 * Forward edges of the lifecycle. FAILED is reachable from every non-terminal
 * status; QUEUED is re-entered only through a restart (recovery or retry).
 */
const jobTransitions: Record<JobStatus, JobStatus[]> = {
  QUEUED: ['DOWNLOADING', 'FAILED'],
  DOWNLOADING: ['COMPOSING', 'FAILED', 'QUEUED'],
  COMPOSING: ['ENCODING', 'FAILED', 'QUEUED'],
  ENCODING: ['PUBLISHING', 'FAILED', 'QUEUED'],
  PUBLISHING: ['COMPLETED', 'FAILED', 'QUEUED'],
  COMPLETED: ['EXPIRED'],
  FAILED: ['EXPIRED'],
  EXPIRED: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (from === to) return true;
  return jobTransitions[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED' || status === 'EXPIRED';
}

export function isActive(status: JobStatus): boolean {
  return !isTerminal(status);
}

/**
 * Factory function to create a new Job in QUEUED state
 */
export function createJob(params: { id: string; parameters: JobParameters; now?: Date }): Job {
  const now = params.now ?? new Date();
  return {
    id: params.id,
    parameters: params.parameters,
    status: 'QUEUED',
    progress: 0,
    message: 'Job queued for processing',
    resultLocation: null,
    error: null,
    attempt: 1,
    nextAttemptAt: null,
    cancelRequested: false,
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    completedAt: null,
  };
}
