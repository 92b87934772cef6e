import { z, ZodError } from 'zod';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

const positiveInt = (name: string, fallback: number) =>
  z.coerce
    .number()
    .int()
    .min(1, { message: `${name} must be at least 1` })
    .default(fallback);

// Largest delay setTimeout honours
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const delayMs = (name: string, fallback: number) =>
  z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_TIMER_MS, { message: `${name} must be at most ${MAX_TIMER_MS}` })
    .default(fallback);

const optionalSeconds = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().positive().max(MAX_TIMER_SECONDS).optional()
);

/**
 * Environment variable schema with strict validation
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().default(8000),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_FILE: optionalString,

    // Job store
    SQLITE_DB_PATH: z.string().default('./data/jobs.db'),
    JOB_EXPIRY_HOURS: positiveInt('JOB_EXPIRY_HOURS', 24),
    EXPIRY_SWEEP_INTERVAL_MINUTES: z.coerce
      .number()
      .int()
      .min(1, { message: 'EXPIRY_SWEEP_INTERVAL_MINUTES must be at least 1' })
      .max(59, { message: 'EXPIRY_SWEEP_INTERVAL_MINUTES must be at most 59' })
      .default(15),

    // Dispatcher
    MAX_CONCURRENT_JOBS: positiveInt('MAX_CONCURRENT_JOBS', 3),
    // 0 means unbounded; a bounded queue rejects submissions when full
    QUEUE_CAPACITY: z.coerce.number().int().min(0).default(0),
    MAX_JOB_ATTEMPTS: positiveInt('MAX_JOB_ATTEMPTS', 3),
    RETRY_BASE_DELAY_MS: delayMs('RETRY_BASE_DELAY_MS', 60_000),
    RETRY_MAX_DELAY_MS: delayMs('RETRY_MAX_DELAY_MS', 15 * 60_000),
    PUBLISH_RETRY_ATTEMPTS: positiveInt('PUBLISH_RETRY_ATTEMPTS', 5),
    PUBLISH_RETRY_DELAY_MS: delayMs('PUBLISH_RETRY_DELAY_MS', 500),

    // Stage budgets
    STAGE_TIMEOUT_SECONDS: z.coerce
      .number()
      .int()
      .min(1, { message: 'STAGE_TIMEOUT_SECONDS must be at least 1' })
      .max(MAX_TIMER_SECONDS, { message: `STAGE_TIMEOUT_SECONDS must be at most ${MAX_TIMER_SECONDS}` })
      .default(900),
    ACQUIRE_TIMEOUT_SECONDS: optionalSeconds,
    COMPOSE_TIMEOUT_SECONDS: optionalSeconds,
    ENCODE_TIMEOUT_SECONDS: optionalSeconds,
    PUBLISH_TIMEOUT_SECONDS: optionalSeconds,

    // Media processing
    MAX_FILE_SIZE: z.coerce.number().int().positive().default(500 * 1024 * 1024),
    ALLOWED_FORMATS: z
      .string()
      .default('mp4,avi,mov,mkv,webm')
      .transform((value) =>
        value
          .split(',')
          .map((format) => format.trim().toLowerCase())
          .filter((format) => format.length > 0)
      ),
    MAX_CUSTOMER_NAME_LENGTH: positiveInt('MAX_CUSTOMER_NAME_LENGTH', 100),
    TRANSITION_DURATION_SECONDS: z.coerce.number().positive().default(1),
    PRESETS_FILE: z.string().default('./config/presets.json'),
    FFMPEG_PATH: z.string().default('ffmpeg'),
    FFPROBE_PATH: z.string().default('ffprobe'),

    // Storage
    STORAGE_TYPE: z.enum(['local', 's3']).default('local'),
    LOCAL_STORAGE_PATH: z.string().default('./data/outputs'),
    TEMP_STORAGE_PATH: z.string().default('./data/temp'),
    DOWNLOAD_SIGNING_SECRET: z.string().min(16).default('change-me-download-secret'),
    RESULT_URL_TTL_SECONDS: positiveInt('RESULT_URL_TTL_SECONDS', 24 * 60 * 60),
    S3_BUCKET: optionalString,
    S3_REGION: z.string().default('us-east-1'),
    S3_ENDPOINT_URL: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string().url().optional()
    ),
    S3_ACCESS_KEY_ID: optionalString,
    S3_SECRET_ACCESS_KEY: optionalString,

    // Rate limiting (API)
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(30),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_TYPE === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'S3_BUCKET is required when STORAGE_TYPE is s3',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment source without touching the process
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
