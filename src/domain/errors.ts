/**
 * Application error types
 * Each error type maps to an HTTP status code and, for pipeline failures, to the
 * error kind recorded on the job.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Kinds a failed job can carry in its error field
 */
export type PipelineErrorKind =
  | 'ACQUIRE_FAILED'
  | 'COMPOSE_FAILED'
  | 'ENCODE_FAILED'
  | 'STORAGE'
  | 'TIMEOUT'
  | 'CANCELLED';

/**
 * Failure raised inside a pipeline stage (500 Internal Server Error)
 * `retryable` tells the dispatcher whether a fresh attempt of the whole job may succeed.
 */
export class PipelineError extends AppError {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly retryable: boolean,
    details?: unknown
  ) {
    super(message, kind, 500, details);
  }
}

/**
 * Storage backend unavailable or refused the operation
 */
export class StorageError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super('STORAGE', message, true, details);
  }
}

/**
 * Stage exceeded its configured budget
 */
export class TimeoutError extends PipelineError {
  constructor(stage: string, timeoutMs: number) {
    super('TIMEOUT', `Stage ${stage} timed out after ${Math.round(timeoutMs / 1000)}s`, true, {
      stage,
      timeoutMs,
    });
  }
}

/**
 * Job stopped at a stage boundary because cancellation was requested
 */
export class CancelledError extends PipelineError {
  constructor(jobId: string) {
    super('CANCELLED', 'Job was cancelled', false, { jobId });
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Validation errors from submitted parameters (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION', 400, details);
  }
}

/**
 * Bounded queue is full (503 Service Unavailable)
 */
export class RejectedError extends AppError {
  constructor(capacity: number) {
    super(`Job queue is full (capacity ${capacity})`, 'REJECTED', 503, { capacity });
  }
}

/**
 * Job aged out of retention (410 Gone)
 */
export class ExpiredError extends AppError {
  constructor(jobId: string) {
    super(`Job ${jobId} has expired`, 'EXPIRED', 410, { jobId });
  }
}

/**
 * Result requested before the job completed (409 Conflict)
 */
export class JobNotReadyError extends AppError {
  constructor(jobId: string, status: string) {
    super(`Job ${jobId} is not completed (status ${status})`, 'JOB_NOT_READY', 409, {
      jobId,
      status,
    });
  }
}

/**
 * Illegal lifecycle change attempted on a job record (409 Conflict)
 */
export class InvalidTransitionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_TRANSITION', 409, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
