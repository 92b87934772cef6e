import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  Job,
  JobErrorKind,
  JobParameters,
  JobStatus,
} from '../../domain/entities/Job.js';
import { DatabaseError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  parameters: string;
  status: JobStatus;
  progress: number;
  message: string;
  result_location: string | null;
  error_kind: JobErrorKind | null;
  error_message: string | null;
  attempt: number;
  next_attempt_at: string | null;
  cancel_requested: number;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
};

const ACTIVE_STATUSES: JobStatus[] = ['QUEUED', 'DOWNLOADING', 'COMPOSING', 'ENCODING', 'PUBLISHING'];

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export class JobRepository {
  constructor(private db: DatabaseAdapter) {}

  create(job: Job): void {
    const sql = `
      INSERT INTO jobs (
        id, parameters, status, progress, message, result_location, error_kind, error_message,
        attempt, next_attempt_at, cancel_requested, created_at, updated_at, started_at, completed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      JSON.stringify(job.parameters),
      job.status,
      job.progress,
      job.message,
      job.resultLocation,
      job.error ? job.error.kind : null,
      job.error ? job.error.message : null,
      job.attempt,
      toIso(job.nextAttemptAt),
      job.cancelRequested ? 1 : 0,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
      toIso(job.startedAt),
      toIso(job.completedAt),
    ]);

    logger.debug('Job row inserted', { jobId: job.id, status: job.status });
  }

  /**
   * Writes every mutable column of the record. Parameters and creation time never change.
   */
  save(job: Job): void {
    const sql = `
      UPDATE jobs
      SET status = ?, progress = ?, message = ?, result_location = ?, error_kind = ?,
          error_message = ?, attempt = ?, next_attempt_at = ?, cancel_requested = ?,
          updated_at = ?, started_at = ?, completed_at = ?
      WHERE id = ?
    `;

    const changes = this.db.execute(sql, [
      job.status,
      job.progress,
      job.message,
      job.resultLocation,
      job.error ? job.error.kind : null,
      job.error ? job.error.message : null,
      job.attempt,
      toIso(job.nextAttemptAt),
      job.cancelRequested ? 1 : 0,
      job.updatedAt.toISOString(),
      toIso(job.startedAt),
      toIso(job.completedAt),
      job.id,
    ]);

    if (changes === 0) {
      throw new DatabaseError('Job row vanished during update', { jobId: job.id });
    }
  }

  getById(jobId: string): Job | null {
    const sql = `
      SELECT * FROM jobs
      WHERE id = ?
    `;

    const row = this.db.queryOne<JobRow>(sql, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  listRecent(params: { status?: JobStatus; limit?: number }): Job[] {
    const limit = Math.min(params.limit ?? 20, 100);
    const rows = params.status
      ? this.db.query<JobRow>(
          `SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC LIMIT ?`,
          [params.status, limit]
        )
      : this.db.query<JobRow>(`SELECT * FROM jobs ORDER BY created_at DESC LIMIT ?`, [limit]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  listActive(): Job[] {
    const placeholders = ACTIVE_STATUSES.map(() => '?').join(', ');
    const sql = `
      SELECT * FROM jobs
      WHERE status IN (${placeholders})
      ORDER BY created_at ASC
    `;
    const rows = this.db.query<JobRow>(sql, ACTIVE_STATUSES);
    return rows.map((row) => this.mapRowToJob(row));
  }

  /**
   * Terminal jobs finished before the cutoff, plus EXPIRED tombstones left by an earlier sweep
   */
  listIdsExpiredBefore(cutoff: Date): string[] {
    const sql = `
      SELECT id FROM jobs
      WHERE (status IN ('COMPLETED', 'FAILED') AND completed_at IS NOT NULL AND completed_at < ?)
         OR status = 'EXPIRED'
      ORDER BY completed_at ASC
    `;
    const rows = this.db.query<{ id: string }>(sql, [cutoff.toISOString()]);
    return rows.map((row) => row.id);
  }

  deleteById(jobId: string): number {
    return this.db.execute(`DELETE FROM jobs WHERE id = ?`, [jobId]);
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      parameters: JSON.parse(row.parameters) as JobParameters,
      status: row.status,
      progress: row.progress,
      message: row.message,
      resultLocation: row.result_location,
      error:
        row.error_kind !== null
          ? { kind: row.error_kind, message: row.error_message ?? '' }
          : null,
      attempt: row.attempt,
      nextAttemptAt: row.next_attempt_at ? new Date(row.next_attempt_at) : null,
      cancelRequested: row.cancel_requested === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
    };
  }
}
