import type { Job } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';

export function mapJobToResponse(job: Job) {
  return {
    id: job.id,
    status: job.status,
    progress: Math.round(job.progress * 1000) / 1000,
    message: job.message,
    parameters: job.parameters,
    resultLocation: job.resultLocation,
    error: job.error,
    attempt: job.attempt,
    nextAttemptAt: job.nextAttemptAt,
    cancelRequested: job.cancelRequested,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
  };
}

export function mapEventToResponse(event: JobEvent) {
  return {
    id: event.id,
    status: event.status,
    attempt: event.attempt,
    progress: Math.round(event.progress * 1000) / 1000,
    message: event.message,
    createdAt: event.createdAt,
  };
}
