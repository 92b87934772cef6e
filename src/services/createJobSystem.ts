import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { Env } from '../infra/env.js';
import type { MediaToolchain } from '../infra/media/MediaToolchain.js';
import type { PresetRegistry } from '../infra/media/PresetRegistry.js';
import type { ScratchSpace } from '../infra/media/ScratchSpace.js';
import { JobEventRepository } from '../infra/repositories/JobEventRepository.js';
import { JobRepository } from '../infra/repositories/JobRepository.js';
import type { StorageBackend } from '../infra/storage/StorageBackend.js';
import { Dispatcher } from './Dispatcher.js';
import { JobEventBus } from './JobEventBus.js';
import { JobOrchestrator } from './JobOrchestrator.js';
import { JobRecoveryService } from './JobRecoveryService.js';
import { JobRetentionService } from './JobRetentionService.js';
import { JobStore } from './JobStore.js';
import { AcquireStage } from './pipeline/AcquireStage.js';
import { ComposeStage } from './pipeline/ComposeStage.js';
import { EncodeStage } from './pipeline/EncodeStage.js';
import { PipelineExecutor } from './pipeline/PipelineExecutor.js';
import type { StageName } from './pipeline/PipelineStage.js';
import { PublishStage } from './pipeline/PublishStage.js';

export type JobSystemEnv = Pick<
  Env,
  | 'MAX_CONCURRENT_JOBS'
  | 'QUEUE_CAPACITY'
  | 'MAX_JOB_ATTEMPTS'
  | 'RETRY_BASE_DELAY_MS'
  | 'RETRY_MAX_DELAY_MS'
  | 'PUBLISH_RETRY_ATTEMPTS'
  | 'PUBLISH_RETRY_DELAY_MS'
  | 'STAGE_TIMEOUT_SECONDS'
  | 'ACQUIRE_TIMEOUT_SECONDS'
  | 'COMPOSE_TIMEOUT_SECONDS'
  | 'ENCODE_TIMEOUT_SECONDS'
  | 'PUBLISH_TIMEOUT_SECONDS'
  | 'MAX_FILE_SIZE'
  | 'ALLOWED_FORMATS'
  | 'MAX_CUSTOMER_NAME_LENGTH'
  | 'TRANSITION_DURATION_SECONDS'
  | 'JOB_EXPIRY_HOURS'
  | 'RESULT_URL_TTL_SECONDS'
>;

export interface JobSystemDeps {
  db: DatabaseAdapter;
  storage: StorageBackend;
  toolchain: MediaToolchain;
  presets: PresetRegistry;
  scratch: ScratchSpace;
  clock?: () => Date;
}

export interface JobSystem {
  jobStore: JobStore;
  jobEventBus: JobEventBus;
  executor: PipelineExecutor;
  dispatcher: Dispatcher;
  jobOrchestrator: JobOrchestrator;
  recovery: JobRecoveryService;
  retention: JobRetentionService;
}

export function stageTimeoutsMs(env: JobSystemEnv): Record<StageName, number> {
  const seconds = (override: number | undefined) => (override ?? env.STAGE_TIMEOUT_SECONDS) * 1000;
  return {
    acquire: seconds(env.ACQUIRE_TIMEOUT_SECONDS),
    compose: seconds(env.COMPOSE_TIMEOUT_SECONDS),
    encode: seconds(env.ENCODE_TIMEOUT_SECONDS),
    publish: seconds(env.PUBLISH_TIMEOUT_SECONDS),
  };
}

/**
 * Wires the job store, pipeline, dispatcher and the services around them.
 * The dispatcher is returned stopped.
 */
export function createJobSystem(env: JobSystemEnv, deps: JobSystemDeps): JobSystem {
  const clock = deps.clock ?? (() => new Date());
  const jobEventBus = new JobEventBus();
  const jobStore = new JobStore(
    deps.db,
    new JobRepository(deps.db),
    new JobEventRepository(deps.db),
    jobEventBus,
    clock
  );

  const stages = [
    new AcquireStage(deps.toolchain, {
      maxFileSize: env.MAX_FILE_SIZE,
      allowedFormats: env.ALLOWED_FORMATS,
    }),
    new ComposeStage(deps.toolchain, deps.storage, {
      transitionDurationSeconds: env.TRANSITION_DURATION_SECONDS,
    }),
    new EncodeStage(deps.toolchain, deps.presets),
    new PublishStage(deps.storage, {
      retryAttempts: env.PUBLISH_RETRY_ATTEMPTS,
      retryDelayMs: env.PUBLISH_RETRY_DELAY_MS,
    }),
  ];

  const executor = new PipelineExecutor(
    jobStore,
    deps.scratch,
    stages,
    {
      stageTimeoutsMs: stageTimeoutsMs(env),
      maxAttempts: env.MAX_JOB_ATTEMPTS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
    clock
  );

  const dispatcher = new Dispatcher(
    executor,
    { concurrency: env.MAX_CONCURRENT_JOBS, queueCapacity: env.QUEUE_CAPACITY },
    clock
  );

  const jobOrchestrator = new JobOrchestrator(
    jobStore,
    dispatcher,
    deps.storage,
    {
      maxCustomerNameLength: env.MAX_CUSTOMER_NAME_LENGTH,
      resultUrlTtlSeconds: env.RESULT_URL_TTL_SECONDS,
      queueCapacity: env.QUEUE_CAPACITY,
    },
    clock
  );

  return {
    jobStore,
    jobEventBus,
    executor,
    dispatcher,
    jobOrchestrator,
    recovery: new JobRecoveryService(jobStore, dispatcher, deps.scratch, clock),
    retention: new JobRetentionService(jobStore, deps.storage, deps.scratch, env.JOB_EXPIRY_HOURS, clock),
  };
}
