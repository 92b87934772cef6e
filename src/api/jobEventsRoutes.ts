import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { JobEventBus, JobEventPayload } from '../services/JobEventBus.js';
import type { JobStore } from '../services/JobStore.js';
import { mapJobToResponse } from './jobMapper.js';

const HEARTBEAT_MS = 30_000;

function writeEvent(res: Response, name: string, data: unknown): void {
  res.write(`event: ${name}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

/**
 * Server-sent events for a single job. The current record is sent first so a
 * client never misses the state it connected in.
 */
export function createJobEventsRouter(jobStore: JobStore, jobEventBus: JobEventBus): Router {
  const router = Router();

  router.get('/:jobId/events/stream', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;
      const job = jobStore.require(jobId);

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      writeEvent(res, 'job', {
        event: 'snapshot',
        status: job.status,
        timestamp: job.updatedAt.toISOString(),
        job: mapJobToResponse(job),
      });

      const heartbeat = setInterval(() => {
        res.write(': keep-alive\n\n');
      }, HEARTBEAT_MS);

      const cleanup = () => {
        clearInterval(heartbeat);
        jobEventBus.offJobId(jobId, onJob);
      };

      const onJob = (payload: JobEventPayload) => {
        writeEvent(res, 'job', {
          event: payload.event,
          status: payload.status,
          timestamp: payload.timestamp,
          job: mapJobToResponse(payload.job),
        });
        if (payload.event === 'deleted') {
          cleanup();
          res.end();
        }
      };

      jobEventBus.onJobId(jobId, onJob);
      req.on('close', cleanup);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
