import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import type { Request, Response, NextFunction } from 'express';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { FfmpegToolchain } from './infra/media/FfmpegToolchain.js';
import { PresetRegistry } from './infra/media/PresetRegistry.js';
import { ScratchSpace } from './infra/media/ScratchSpace.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { createStorageBackend } from './infra/storage/createStorageBackend.js';
import { createJobSystem } from './services/createJobSystem.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { MaintenanceScheduler } from './scheduler/MaintenanceScheduler.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Initialize infrastructure adapters
const db = new DatabaseAdapter(env);
const storage = createStorageBackend(env);
const presets = new PresetRegistry(env.PRESETS_FILE);
const scratch = new ScratchSpace(env.TEMP_STORAGE_PATH);
const toolchain = new FfmpegToolchain(env.FFMPEG_PATH, env.FFPROBE_PATH);

const { jobStore, jobEventBus, dispatcher, jobOrchestrator, recovery, retention } = createJobSystem(
  env,
  { db, storage, toolchain, presets, scratch }
);

// Restart jobs a previous process left unfinished, then start the slots
await recovery.recover();
dispatcher.start();

const scheduler = new MaintenanceScheduler(retention, env.EXPIRY_SWEEP_INTERVAL_MINUTES);

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: '1mb' }));

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

// Mount API routes
app.use(
  '/api',
  createApiRouter({
    db,
    jobStore,
    jobOrchestrator,
    jobEventBus,
    dispatcher,
    storage,
    submitLimiter: createRateLimiter({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
    }),
  })
);

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    storage: storage.kind,
    concurrency: env.MAX_CONCURRENT_JOBS,
  });
  scheduler.start();
});

process.on('SIGHUP', () => {
  loggerInstance.info('SIGHUP received, reloading encoding presets');
  presets.reload();
});

// Graceful shutdown: stop intake, let running pipelines finish, then exit
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  scheduler.stop();
  server.close();
  server.closeAllConnections();
  dispatcher
    .stop()
    .then(() => {
      db.close();
      loggerInstance.info('Server closed');
      process.exit(0);
    })
    .catch((error: unknown) => {
      loggerInstance.error('Shutdown failed', { error });
      process.exit(1);
    });
});

export { app };
