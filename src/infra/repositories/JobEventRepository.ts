import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { JobEvent } from '../../domain/entities/JobEvent.js';
import type { JobStatus } from '../../domain/entities/Job.js';
import { logger } from '../logger.js';

type JobEventRow = {
  id: string;
  job_id: string;
  status: JobStatus;
  attempt: number;
  progress: number;
  message: string | null;
  created_at: string;
};

/**
 * Append-only history of job status changes
 */
export class JobEventRepository {
  constructor(private db: DatabaseAdapter) {}

  append(event: JobEvent): void {
    this.db.execute(
      `INSERT INTO job_events (id, job_id, status, attempt, progress, message, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        event.id,
        event.jobId,
        event.status,
        event.attempt,
        event.progress,
        event.message,
        event.createdAt.toISOString(),
      ]
    );

    logger.debug('Job event recorded', { jobId: event.jobId, status: event.status, attempt: event.attempt });
  }

  /**
   * History in insertion order; rows written in the same millisecond keep their order
   */
  listByJob(jobId: string): JobEvent[] {
    const rows = this.db.query<JobEventRow>(
      `SELECT * FROM job_events WHERE job_id = ? ORDER BY created_at ASC, rowid ASC`,
      [jobId]
    );
    return rows.map((row) => ({
      id: row.id,
      jobId: row.job_id,
      status: row.status,
      attempt: row.attempt,
      progress: row.progress,
      message: row.message,
      createdAt: new Date(row.created_at),
    }));
  }

  deleteByJobId(jobId: string): number {
    return this.db.execute(`DELETE FROM job_events WHERE job_id = ?`, [jobId]);
  }
}
