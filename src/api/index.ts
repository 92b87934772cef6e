import { Router } from 'express';
import type { RequestHandler } from 'express';
import { createDownloadRouter } from './downloadRoutes.js';
import { createJobEventsRouter } from './jobEventsRoutes.js';
import { createJobRouter } from './jobRoutes.js';
import type { Dispatcher } from '../services/Dispatcher.js';
import type { JobEventBus } from '../services/JobEventBus.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { JobStore } from '../services/JobStore.js';
import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { StorageBackend } from '../infra/storage/StorageBackend.js';
import { LocalStorageBackend } from '../infra/storage/LocalStorageBackend.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from server.ts
 */
export function createApiRouter(deps: {
  db: DatabaseAdapter;
  jobStore: JobStore;
  jobOrchestrator: JobOrchestrator;
  jobEventBus: JobEventBus;
  dispatcher: Dispatcher;
  storage: StorageBackend;
  submitLimiter?: RequestHandler;
}): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const databaseUp = deps.db.ping();
    res.status(databaseUp ? 200 : 503).json({
      status: databaseUp ? 'ok' : 'degraded',
      database: databaseUp ? 'up' : 'down',
      storage: deps.storage.kind,
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/dispatcher/stats', (_req, res) => {
    res.json(deps.dispatcher.stats());
  });

  router.use('/jobs', createJobEventsRouter(deps.jobStore, deps.jobEventBus));
  router.use(
    '/jobs',
    createJobRouter({
      jobStore: deps.jobStore,
      jobOrchestrator: deps.jobOrchestrator,
      submitLimiter: deps.submitLimiter,
    })
  );

  if (deps.storage instanceof LocalStorageBackend) {
    router.use('/download', createDownloadRouter(deps.storage));
  }

  return router;
}
