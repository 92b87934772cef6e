import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { JobStatus } from '../domain/entities/Job.js';
import { ValidationError } from '../domain/errors.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { JobStore } from '../services/JobStore.js';
import { mapEventToResponse, mapJobToResponse } from './jobMapper.js';

const JOB_STATUSES: readonly JobStatus[] = [
  'QUEUED',
  'DOWNLOADING',
  'COMPOSING',
  'ENCODING',
  'PUBLISHING',
  'COMPLETED',
  'FAILED',
  'EXPIRED',
];

function parseStatus(value: unknown): JobStatus | undefined {
  if (value === undefined) return undefined;
  const status = JOB_STATUSES.find((candidate) => candidate === String(value).toUpperCase());
  if (!status) {
    throw new ValidationError(`Unknown job status: ${String(value)}`);
  }
  return status;
}

/**
 * Jobs route handler
 * Translates HTTP to orchestrator and store calls; validation lives in the core.
 */
export function createJobRouter(deps: {
  jobStore: JobStore;
  jobOrchestrator: JobOrchestrator;
  submitLimiter?: RequestHandler;
}): Router {
  const router = Router();
  const { jobStore, jobOrchestrator } = deps;
  const submitMiddleware: RequestHandler[] = deps.submitLimiter ? [deps.submitLimiter] : [];

  /**
   * POST /api/jobs
   */
  router.post('/', ...submitMiddleware, (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobOrchestrator.submit(req.body);
      res.status(201).json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs?status=...&limit=...
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status, limit } = req.query;
      const parsedLimit = typeof limit === 'string' ? Number(limit) : undefined;
      const jobs = jobStore.listRecent({
        status: parseStatus(status),
        limit: parsedLimit !== undefined && Number.isFinite(parsedLimit) ? parsedLimit : undefined,
      });
      res.json({ jobs: jobs.map(mapJobToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;
      const job = jobStore.require(jobId);
      const events = jobStore.listEvents(jobId);
      res.json({ job: mapJobToResponse(job), events: events.map(mapEventToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/result
   */
  router.get('/:jobId/result', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await jobOrchestrator.resolveResult(req.params.jobId);
      res.json({ downloadUrl: result.url, expiresAt: result.expiresAt });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/jobs/:jobId
   */
  router.delete('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await jobOrchestrator.remove(req.params.jobId);
      if (outcome.action === 'deleted') {
        res.status(204).end();
        return;
      }
      res.status(outcome.action === 'cancelled' ? 202 : 409).json({
        action: outcome.action,
        job: mapJobToResponse(outcome.job),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
