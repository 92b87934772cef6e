import type { Job, JobStatus } from './Job.js';

/**
 * One entry of a job's history: the status it entered, under which attempt,
 * and how far along it was at that moment
 */
export interface JobEvent {
  id: string;
  jobId: string;
  status: JobStatus;
  attempt: number;
  progress: number;
  message: string | null;
  createdAt: Date;
}

export function jobEventFor(job: Job, id: string, message: string | null): JobEvent {
  return {
    id,
    jobId: job.id,
    status: job.status,
    attempt: job.attempt,
    progress: job.progress,
    message,
    createdAt: job.updatedAt,
  };
}
