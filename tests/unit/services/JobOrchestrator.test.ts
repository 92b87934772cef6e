import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  ExpiredError,
  JobNotReadyError,
  RejectedError,
  ValidationError,
} from '../../../src/domain/errors.js';
import { createTestSystem, videoResponse } from '../../helpers/fakes.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');
const fixedClock = () => NOW;

const VALID_INPUT = {
  videoUrl: 'https://media.example.test/uploads/source.mp4',
  customerName: 'Ada Lovelace',
  transitionStyle: 'fade',
};

describe('JobOrchestrator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('submit', () => {
    it('should persist a queued job and hand it to the dispatcher', () => {
      const system = createTestSystem();

      const job = system.jobOrchestrator.submit(VALID_INPUT);

      expect(job.status).toBe('QUEUED');
      expect(job.parameters.transitionStyle).toBe('FADE');
      expect(system.jobStore.get(job.id)).not.toBeNull();
      expect(system.dispatcher.stats().queued).toBe(1);
    });

    it('should leave no record behind for invalid parameters', () => {
      const system = createTestSystem();

      expect(() =>
        system.jobOrchestrator.submit({ ...VALID_INPUT, videoUrl: 'ftp://media.example.test/a.mp4' })
      ).toThrow(ValidationError);
      expect(system.jobStore.listRecent()).toEqual([]);
      expect(system.dispatcher.stats().queued).toBe(0);
    });

    it('should refuse an unknown transition style without creating a job', () => {
      const system = createTestSystem();

      expect(() => system.jobOrchestrator.submit({ ...VALID_INPUT, transitionStyle: 'bounce' })).toThrow(
        ValidationError
      );
      expect(system.jobStore.listRecent()).toEqual([]);
    });

    it('should reject when the bounded queue is full and persist nothing', () => {
      const system = createTestSystem({ QUEUE_CAPACITY: '1' });
      system.jobOrchestrator.submit(VALID_INPUT);

      expect(() => system.jobOrchestrator.submit(VALID_INPUT)).toThrow(RejectedError);
      expect(system.jobStore.listRecent()).toHaveLength(1);
    });
  });

  describe('cancel', () => {
    it('should fail a queued job immediately', async () => {
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);

      const cancelled = await system.jobOrchestrator.cancel(job.id);

      expect(cancelled).toMatchObject({
        status: 'FAILED',
        message: 'Job cancelled',
        cancelRequested: true,
        error: { kind: 'CANCELLED', message: 'Job was cancelled before it started' },
      });
      expect(system.dispatcher.stats().queued).toBe(0);
    });

    it('should leave a terminal job unchanged', async () => {
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      const cancelled = await system.jobOrchestrator.cancel(job.id);

      expect(await system.jobOrchestrator.cancel(job.id)).toEqual(cancelled);
    });
  });

  describe('remove', () => {
    it('should cancel an active job instead of deleting it', async () => {
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);

      const outcome = await system.jobOrchestrator.remove(job.id);

      expect(outcome.action).toBe('cancelled');
      expect(system.jobStore.require(job.id).status).toBe('FAILED');
    });

    it('should delete a finished job together with its result', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('source'))));
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      await system.executor.execute(job.id);

      const outcome = await system.jobOrchestrator.remove(job.id);

      expect(outcome).toEqual({ action: 'deleted' });
      expect(system.jobStore.get(job.id)).toBeNull();
      expect(await system.storage.exists(`results/${job.id}.mp4`)).toBe(false);
    });

    it('should keep a terminal job that is still leased', async () => {
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      await system.jobOrchestrator.cancel(job.id);
      system.jobStore.lease(job.id);

      const outcome = await system.jobOrchestrator.remove(job.id);

      expect(outcome.action).toBe('kept');
      expect(system.jobStore.get(job.id)).not.toBeNull();
    });

    it('should keep the published file of a leased completed job', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('source'))));
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      await system.executor.execute(job.id);
      system.jobStore.lease(job.id);

      const outcome = await system.jobOrchestrator.remove(job.id);

      expect(outcome.action).toBe('kept');
      expect(system.jobStore.require(job.id)).toMatchObject({
        status: 'COMPLETED',
        resultLocation: `results/${job.id}.mp4`,
      });
      expect(await system.storage.exists(`results/${job.id}.mp4`)).toBe(true);
    });
  });

  describe('resolveResult', () => {
    it('should refuse jobs that have not completed', async () => {
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);

      await expect(system.jobOrchestrator.resolveResult(job.id)).rejects.toBeInstanceOf(JobNotReadyError);
    });

    it('should return a signed link that expires after the configured ttl', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('source'))));
      const system = createTestSystem({ RESULT_URL_TTL_SECONDS: '600' }, fixedClock);
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      await system.executor.execute(job.id);

      const result = await system.jobOrchestrator.resolveResult(job.id);

      expect(result.expiresAt).toEqual(new Date('2026-01-01T00:10:00.000Z'));
      expect(result.url.startsWith(`/api/download/results/${job.id}.mp4?expires=1767226200&signature=`)).toBe(
        true
      );
    });

    it('should report expired jobs as gone', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('source'))));
      const system = createTestSystem();
      const job = system.jobOrchestrator.submit(VALID_INPUT);
      await system.executor.execute(job.id);
      await system.jobStore.update(job.id, () => ({ status: 'EXPIRED', message: 'Job expired' }));

      await expect(system.jobOrchestrator.resolveResult(job.id)).rejects.toBeInstanceOf(ExpiredError);
    });
  });
});
