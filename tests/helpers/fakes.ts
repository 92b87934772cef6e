import { createHash } from 'node:crypto';
import { mkdtempSync } from 'node:fs';
import { access, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, isAbsolute, join } from 'node:path';
import type { JobParameters } from '../../src/domain/entities/Job.js';
import { DatabaseAdapter } from '../../src/infra/DatabaseAdapter.js';
import { parseEnv, type Env } from '../../src/infra/env.js';
import type { MediaToolchain, ProbeResult, RunOptions } from '../../src/infra/media/MediaToolchain.js';
import { ToolchainError } from '../../src/infra/media/MediaToolchain.js';
import { PresetRegistry } from '../../src/infra/media/PresetRegistry.js';
import { ScratchSpace } from '../../src/infra/media/ScratchSpace.js';
import { sleep } from '../../src/infra/retry.js';
import { LocalStorageBackend } from '../../src/infra/storage/LocalStorageBackend.js';
import { createJobSystem, type JobSystem } from '../../src/services/createJobSystem.js';

export function createTestEnv(overrides: Record<string, string> = {}): Env {
  return parseEnv({
    NODE_ENV: 'test',
    SQLITE_DB_PATH: ':memory:',
    DOWNLOAD_SIGNING_SECRET: 'test-secret-0123456789',
    ...overrides,
  });
}

export function createTestDatabase(): DatabaseAdapter {
  return new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `clipforge-${prefix}-`));
}

export function buildParameters(overrides: Partial<JobParameters> = {}): JobParameters {
  return {
    videoUrl: 'https://media.example.test/uploads/source.mp4',
    customerName: 'Ada Lovelace',
    introClip: null,
    outroClip: null,
    transitionStyle: 'FADE',
    encodingPreset: 'STANDARD',
    overlay: { customerText: false, watermark: null, watermarkPosition: 'bottom-right' },
    ...overrides,
  };
}

export const DEFAULT_PROBE: ProbeResult = {
  durationSeconds: 10,
  formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
  width: 1920,
  height: 1080,
  hasVideo: true,
  hasAudio: true,
};

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function inputPaths(args: string[]): string[] {
  const paths: string[] = [];
  args.forEach((arg, index) => {
    if (arg === '-i' && index + 1 < args.length) paths.push(args[index + 1]);
  });
  return paths;
}

/**
 * Stands in for ffmpeg/ffprobe. Outputs are a hash of the arguments (paths
 * reduced to base names) and input bytes, so identical inputs give identical files.
 */
export class FakeToolchain implements MediaToolchain {
  readonly runs: string[][] = [];
  readonly probes: string[] = [];
  probeOverrides = new Map<string, Partial<ProbeResult>>();
  /** Delay for a run, looked up by the output file's base name */
  runDelays = new Map<string, number>();
  /** Output base names whose run fails once per entry */
  failures = new Map<string, number>();
  active = 0;
  maxActive = 0;

  async probe(path: string): Promise<ProbeResult> {
    this.probes.push(path);
    if (!(await fileExists(path))) {
      throw new ToolchainError('ffprobe could not read the file', 1, 'No such file');
    }
    return { ...DEFAULT_PROBE, ...this.probeOverrides.get(basename(path)) };
  }

  async run(args: string[], options: RunOptions = {}): Promise<void> {
    this.runs.push(args);
    const output = args[args.length - 1];
    const name = basename(output);

    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      const delay = this.runDelays.get(name) ?? 0;
      if (delay > 0) {
        try {
          await sleep(delay, options.signal);
        } catch {
          throw new ToolchainError('ffmpeg was killed', null, 'aborted');
        }
      }

      const remainingFailures = this.failures.get(name) ?? 0;
      if (remainingFailures > 0) {
        this.failures.set(name, remainingFailures - 1);
        throw new ToolchainError('ffmpeg exited with code 1', 1, 'Invalid data found');
      }

      const hash = createHash('sha256');
      for (const input of inputPaths(args)) {
        if (await fileExists(input)) {
          hash.update(await readFile(input));
        }
      }
      hash.update(args.map((arg) => (isAbsolute(arg) ? basename(arg) : arg)).join('\u0000'));
      options.onProgress?.(0.5);
      await writeFile(output, hash.digest());
      options.onProgress?.(1);
    } finally {
      this.active--;
    }
  }
}

export function videoResponse(bytes: Buffer, init: { status?: number } = {}): Response {
  return new Response(bytes, {
    status: init.status ?? 200,
    headers: { 'content-type': 'video/mp4', 'content-length': String(bytes.length) },
  });
}

export async function waitFor(
  predicate: () => boolean,
  { timeoutMs = 3000, intervalMs = 5 }: { timeoutMs?: number; intervalMs?: number } = {}
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await sleep(intervalMs);
  }
}

export interface TestSystem extends JobSystem {
  db: DatabaseAdapter;
  env: Env;
  storage: LocalStorageBackend;
  scratch: ScratchSpace;
  toolchain: FakeToolchain;
  presets: PresetRegistry;
}

/**
 * Full job system on an in-memory database, temp directories and the fake
 * toolchain. The dispatcher is not started.
 */
export function createTestSystem(
  overrides: Record<string, string> = {},
  clock?: () => Date
): TestSystem {
  const env = createTestEnv({
    RETRY_BASE_DELAY_MS: '10',
    RETRY_MAX_DELAY_MS: '20',
    PUBLISH_RETRY_DELAY_MS: '1',
    ...overrides,
  });
  const db = createTestDatabase();
  const storage = new LocalStorageBackend({
    rootDir: makeTempDir('storage'),
    signingSecret: env.DOWNLOAD_SIGNING_SECRET,
    clock,
  });
  const scratch = new ScratchSpace(makeTempDir('scratch'));
  const toolchain = new FakeToolchain();
  const presets = new PresetRegistry('config/presets.json');

  const system = createJobSystem(env, { db, storage, toolchain, presets, scratch, clock });
  return { ...system, db, env, storage, scratch, toolchain, presets };
}
