import { readFileSync } from 'node:fs';
import { describe, it, expect, afterEach, vi } from 'vitest';
import type { JobParameters } from '../../../../src/domain/entities/Job.js';
import { sleep } from '../../../../src/infra/retry.js';
import { buildParameters, createTestSystem, videoResponse, waitFor, type TestSystem } from '../../../helpers/fakes.js';

function stubSource(bytes: Buffer = Buffer.from('source-video-bytes')) {
  const fetchMock = vi.fn(async () => videoResponse(bytes));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function createJob(system: TestSystem, overrides: Partial<JobParameters> = {}) {
  return system.jobStore.create(buildParameters(overrides));
}

describe('PipelineExecutor', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should run every stage and publish the result', async () => {
    stubSource();
    const system = createTestSystem();
    const job = createJob(system);
    const progress: number[] = [];
    system.jobEventBus.onJobId(job.id, (payload) => progress.push(payload.job.progress));

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('completed');
    const completed = system.jobStore.require(job.id);
    expect(completed).toMatchObject({
      status: 'COMPLETED',
      progress: 1,
      message: 'Video processing completed',
      resultLocation: `results/${job.id}.mp4`,
      error: null,
    });
    expect(completed.startedAt).not.toBeNull();
    expect(system.jobStore.listEvents(job.id).map((event) => event.status)).toEqual([
      'QUEUED',
      'DOWNLOADING',
      'COMPOSING',
      'ENCODING',
      'PUBLISHING',
      'COMPLETED',
    ]);
    expect(progress).toEqual([...progress].sort((a, b) => a - b));
    expect(await system.storage.exists(`results/${job.id}.mp4`)).toBe(true);
    expect(await system.scratch.exists(job.id)).toBe(false);
    expect(system.jobStore.isLeased(job.id)).toBe(false);
  });

  it('should produce identical bytes for identical inputs', async () => {
    stubSource();
    const system = createTestSystem();
    const first = createJob(system);
    const second = createJob(system);

    await system.executor.execute(first.id);
    await system.executor.execute(second.id);

    const firstBytes = readFileSync(system.storage.resolvePath(`results/${first.id}.mp4`));
    const secondBytes = readFileSync(system.storage.resolvePath(`results/${second.id}.mp4`));
    expect(firstBytes.length).toBeGreaterThan(0);
    expect(firstBytes.equals(secondBytes)).toBe(true);
  });

  it('should fail with ACQUIRE_FAILED when the source is missing', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('not found'), { status: 404 })));
    const system = createTestSystem();
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id)).toMatchObject({
      status: 'FAILED',
      message: 'Video processing failed',
      resultLocation: null,
      error: { kind: 'ACQUIRE_FAILED', message: 'Source download failed with HTTP 404' },
      attempt: 1,
    });
    expect(system.toolchain.runs).toEqual([]);
    expect(await system.scratch.exists(job.id)).toBe(false);
  });

  it('should retry a transient failure and then complete', async () => {
    stubSource();
    const system = createTestSystem();
    system.toolchain.failures.set('output.mp4', 1);
    const job = createJob(system);

    const first = await system.executor.execute(job.id);

    expect(first.outcome).toBe('retry');
    const queued = system.jobStore.require(job.id);
    expect(queued).toMatchObject({
      status: 'QUEUED',
      attempt: 2,
      message: 'Retrying after ENCODE_FAILED (attempt 2 of 3)',
      progress: 0.6,
      error: null,
    });
    expect(queued.nextAttemptAt).not.toBeNull();

    const second = await system.executor.execute(job.id);

    expect(second.outcome).toBe('completed');
    expect(system.jobStore.require(job.id)).toMatchObject({ status: 'COMPLETED', attempt: 2 });
    expect(
      system.jobStore
        .listEvents(job.id)
        .filter((event) => event.status === 'QUEUED')
        .map((event) => [event.attempt, event.message])
    ).toEqual([
      [1, 'Job queued for processing'],
      [2, 'Retrying after ENCODE_FAILED (attempt 2 of 3)'],
    ]);
  });

  it('should fail once the attempts are used up', async () => {
    stubSource();
    const system = createTestSystem({ MAX_JOB_ATTEMPTS: '1' });
    system.toolchain.failures.set('composed.mp4', 1);
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id).error).toEqual({
      kind: 'COMPOSE_FAILED',
      message: 'compose step failed: ffmpeg exited with code 1',
    });
  });

  it('should fail with COMPOSE_FAILED when an asset is missing', async () => {
    stubSource();
    const system = createTestSystem();
    const job = createJob(system, { introClip: 'assets/intro.mp4' });

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id).error).toEqual({
      kind: 'COMPOSE_FAILED',
      message: 'Asset not found: assets/intro.mp4',
    });
  });

  it('should join a stored intro with the source', async () => {
    stubSource();
    const system = createTestSystem();
    await system.storage.write('assets/intro.mp4', Buffer.from('intro-bytes'));
    system.toolchain.probeOverrides.set('intro.mp4', { durationSeconds: 4 });
    const job = createJob(system, { introClip: 'assets/intro.mp4', transitionStyle: 'SLIDE' });

    await system.executor.execute(job.id);

    const [composeArgs] = system.toolchain.runs;
    expect(composeArgs.join(' ')).toContain('xfade=transition=slideright:duration=1:offset=3');
    expect(system.jobStore.require(job.id).status).toBe('COMPLETED');
  });

  it('should fail with TIMEOUT when a stage overruns its budget', async () => {
    stubSource();
    const system = createTestSystem({ ENCODE_TIMEOUT_SECONDS: '0.05', MAX_JOB_ATTEMPTS: '1' });
    system.toolchain.runDelays.set('output.mp4', 2000);
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    const failed = system.jobStore.require(job.id);
    expect(failed.error?.kind).toBe('TIMEOUT');
    expect(failed.error?.message).toContain('Stage encode timed out');
    expect(await system.scratch.exists(job.id)).toBe(false);
  });

  it('should remove a result whose publish outlived the stage timeout', async () => {
    stubSource();
    const system = createTestSystem({ PUBLISH_TIMEOUT_SECONDS: '0.05', MAX_JOB_ATTEMPTS: '1' });
    const write = system.storage.write.bind(system.storage);
    let settledWrites = 0;
    vi.spyOn(system.storage, 'write').mockImplementation(async (key, body, options) => {
      try {
        await sleep(200);
        return await write(key, body, options);
      } finally {
        settledWrites++;
      }
    });
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id)).toMatchObject({
      status: 'FAILED',
      resultLocation: null,
      error: { kind: 'TIMEOUT', message: 'Stage publish timed out after 0s' },
    });

    await waitFor(() => settledWrites === 1);
    expect(await system.storage.exists(`results/${job.id}.mp4`)).toBe(false);
  });

  it('should retry a job whose scratch space cannot be created', async () => {
    stubSource();
    const system = createTestSystem();
    vi.spyOn(system.scratch, 'prepare').mockRejectedValueOnce(new Error('ENOTDIR: not a directory'));
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('retry');
    expect(system.jobStore.require(job.id)).toMatchObject({
      status: 'QUEUED',
      attempt: 2,
      message: 'Retrying after STORAGE (attempt 2 of 3)',
    });
    expect(system.jobStore.isLeased(job.id)).toBe(false);
  });

  it('should fail with STORAGE once scratch space keeps failing', async () => {
    stubSource();
    const system = createTestSystem({ MAX_JOB_ATTEMPTS: '1' });
    vi.spyOn(system.scratch, 'prepare').mockRejectedValue(new Error('ENOTDIR: not a directory'));
    const job = createJob(system);

    const result = await system.executor.execute(job.id);

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id).error).toEqual({
      kind: 'STORAGE',
      message: 'Failed to prepare scratch space',
    });
  });

  it('should mark an abandoned job FAILED and leave finished ones alone', async () => {
    stubSource();
    const system = createTestSystem();
    const pending = createJob(system);
    const finished = createJob(system);
    await system.executor.execute(finished.id);

    await system.executor.abandon(pending.id, new Error('database is locked'));
    await system.executor.abandon(finished.id, new Error('database is locked'));

    expect(system.jobStore.require(pending.id)).toMatchObject({
      status: 'FAILED',
      error: { kind: 'STORAGE', message: 'database is locked' },
    });
    expect(system.jobStore.require(finished.id).status).toBe('COMPLETED');
  });

  it('should stop at the next stage boundary after cancellation', async () => {
    stubSource();
    const system = createTestSystem();
    system.toolchain.runDelays.set('composed.mp4', 100);
    const job = createJob(system);

    const running = system.executor.execute(job.id);
    await waitFor(() => system.jobStore.require(job.id).status === 'COMPOSING');
    const flagged = await system.jobOrchestrator.cancel(job.id);

    expect(flagged).toMatchObject({ status: 'COMPOSING', cancelRequested: true });

    const result = await running;

    expect(result.outcome).toBe('failed');
    expect(system.jobStore.require(job.id).error).toEqual({ kind: 'CANCELLED', message: 'Job was cancelled' });
    expect(system.toolchain.runs).toHaveLength(1);
  });

  it('should skip jobs that are leased or not queued', async () => {
    stubSource();
    const system = createTestSystem();
    const leased = createJob(system);
    system.jobStore.lease(leased.id);

    expect(await system.executor.execute(leased.id)).toEqual({ outcome: 'skipped', reason: 'leased' });
    expect(await system.executor.execute('missing-job')).toEqual({ outcome: 'skipped', reason: 'missing' });

    system.jobStore.release(leased.id);
    await system.executor.execute(leased.id);
    expect(await system.executor.execute(leased.id)).toEqual({
      outcome: 'skipped',
      reason: 'status COMPLETED',
    });
  });

  it('should keep the extra jobs of a burst QUEUED while every slot is busy', async () => {
    stubSource();
    const system = createTestSystem({ MAX_CONCURRENT_JOBS: '2' });
    system.toolchain.runDelays.set('composed.mp4', 150);
    system.dispatcher.start();

    const jobs = ['Ada', 'Grace', 'Edsger', 'Barbara'].map((customerName) =>
      system.jobOrchestrator.submit({ videoUrl: 'https://media.example.test/uploads/source.mp4', customerName })
    );
    await waitFor(() => system.toolchain.active === 2);

    const statuses = jobs.map((job) => system.jobStore.require(job.id).status);
    expect([...statuses].sort()).toEqual(['COMPOSING', 'COMPOSING', 'QUEUED', 'QUEUED']);
    expect(system.dispatcher.stats()).toMatchObject({ active: 2, queued: 2 });

    await waitFor(
      () =>
        jobs.every((job) => system.jobStore.require(job.id).status === 'COMPLETED') &&
        system.dispatcher.stats().active === 0
    );
    expect(system.toolchain.maxActive).toBe(2);

    await system.dispatcher.stop();
  });

  it('should keep a slot usable after a timed out job', async () => {
    stubSource();
    const system = createTestSystem({
      MAX_CONCURRENT_JOBS: '1',
      ENCODE_TIMEOUT_SECONDS: '0.05',
      MAX_JOB_ATTEMPTS: '1',
    });
    system.toolchain.runDelays.set('output.mp4', 2000);
    system.dispatcher.start();

    const slow = system.jobOrchestrator.submit({
      videoUrl: 'https://media.example.test/uploads/source.mp4',
      customerName: 'Ada Lovelace',
    });
    await waitFor(() => system.jobStore.require(slow.id).status === 'FAILED');

    system.toolchain.runDelays.clear();
    const next = system.jobOrchestrator.submit({
      videoUrl: 'https://media.example.test/uploads/source.mp4',
      customerName: 'Grace Hopper',
    });
    await waitFor(() => system.jobStore.require(next.id).status === 'COMPLETED');

    await system.dispatcher.stop();
  });
});
