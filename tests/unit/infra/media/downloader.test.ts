import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { downloadToFile, isRetryableStatus } from '../../../../src/infra/media/downloader.js';
import { PipelineError } from '../../../../src/domain/errors.js';
import { makeTempDir, videoResponse } from '../../../helpers/fakes.js';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the download to fail');
}

describe('downloadToFile', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should stream the body into the destination', async () => {
    const bytes = Buffer.from('source-video-bytes');
    vi.stubGlobal('fetch', vi.fn(async () => videoResponse(bytes)));
    const destination = join(makeTempDir('download'), 'source.mp4');
    const seen: number[] = [];

    const result = await downloadToFile('https://media.example.test/a.mp4', destination, {
      maxBytes: 1024,
      onBytes: (received) => seen.push(received),
    });

    expect(result).toEqual({ bytes: bytes.length, contentType: 'video/mp4' });
    expect(readFileSync(destination)).toEqual(bytes);
    expect(seen[seen.length - 1]).toBe(bytes.length);
  });

  it('should fail without retry on 404', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('missing'), { status: 404 })));

    const error = await captureError(
      downloadToFile('https://media.example.test/a.mp4', join(makeTempDir('download'), 'a.mp4'), {
        maxBytes: 1024,
      })
    );

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      kind: 'ACQUIRE_FAILED',
      retryable: false,
      message: 'Source download failed with HTTP 404',
    });
  });

  it('should mark 503 and unreachable hosts as retryable', async () => {
    const destination = join(makeTempDir('download'), 'a.mp4');
    vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.from('busy'), { status: 503 })));

    expect(
      await captureError(downloadToFile('https://media.example.test/a.mp4', destination, { maxBytes: 1024 }))
    ).toMatchObject({ retryable: true });

    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    expect(
      await captureError(downloadToFile('https://media.example.test/a.mp4', destination, { maxBytes: 1024 }))
    ).toMatchObject({ retryable: true, message: 'Could not reach the source video host' });
  });

  it('should refuse a declared length over the limit', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => videoResponse(Buffer.alloc(64))));

    const error = await captureError(
      downloadToFile('https://media.example.test/a.mp4', join(makeTempDir('download'), 'a.mp4'), {
        maxBytes: 32,
      })
    );

    expect(error).toMatchObject({
      kind: 'ACQUIRE_FAILED',
      retryable: false,
      message: 'Source video exceeds the maximum size of 32 bytes',
    });
  });

  it('should stop streaming once the limit is crossed', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(Buffer.alloc(64))));

    const error = await captureError(
      downloadToFile('https://media.example.test/a.mp4', join(makeTempDir('download'), 'a.mp4'), {
        maxBytes: 32,
      })
    );

    expect(error).toMatchObject({ retryable: false, message: 'Source video exceeds the maximum size of 32 bytes' });
  });
});

describe('isRetryableStatus', () => {
  it('should retry server errors, timeouts and throttling only', () => {
    expect([500, 502, 408, 429].map(isRetryableStatus)).toEqual([true, true, true, true]);
    expect([400, 403, 404, 410].map(isRetryableStatus)).toEqual([false, false, false, false]);
  });
});
