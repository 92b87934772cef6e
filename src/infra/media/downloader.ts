import { open } from 'node:fs/promises';
import { PipelineError } from '../../domain/errors.js';
import { logger } from '../logger.js';

export interface DownloadOptions {
  maxBytes: number;
  signal?: AbortSignal;
  onBytes?: (received: number, total: number | null) => void;
}

export interface DownloadResult {
  bytes: number;
  contentType: string | null;
}

const RETRYABLE_STATUSES = new Set([408, 429]);

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUSES.has(status);
}

function tooLarge(maxBytes: number): PipelineError {
  return new PipelineError(
    'ACQUIRE_FAILED',
    `Source video exceeds the maximum size of ${maxBytes} bytes`,
    false,
    { maxBytes }
  );
}

/**
 * Streams `url` into `destination`, truncating any previous file. Aborts as
 * soon as the byte limit is crossed.
 */
export async function downloadToFile(
  url: string,
  destination: string,
  options: DownloadOptions
): Promise<DownloadResult> {
  let response: Response;
  try {
    response = await fetch(url, { signal: options.signal, redirect: 'follow' });
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    logger.warn('Source download request failed', { url, error });
    throw new PipelineError('ACQUIRE_FAILED', 'Could not reach the source video host', true);
  }

  if (!response.ok) {
    throw new PipelineError(
      'ACQUIRE_FAILED',
      `Source download failed with HTTP ${response.status}`,
      isRetryableStatus(response.status),
      { status: response.status }
    );
  }

  const lengthHeader = response.headers.get('content-length');
  const total = lengthHeader !== null && /^\d+$/.test(lengthHeader) ? Number(lengthHeader) : null;
  if (total !== null && total > options.maxBytes) {
    await response.body?.cancel();
    throw tooLarge(options.maxBytes);
  }

  if (!response.body) {
    throw new PipelineError('ACQUIRE_FAILED', 'Source response had no body', true);
  }

  const reader = response.body.getReader();
  const file = await open(destination, 'w');
  let received = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > options.maxBytes) {
        await reader.cancel();
        throw tooLarge(options.maxBytes);
      }
      await file.write(value);
      options.onBytes?.(received, total);
    }
  } catch (error) {
    if (error instanceof PipelineError || options.signal?.aborted) {
      throw error;
    }
    logger.warn('Source download interrupted', { url, received, error });
    throw new PipelineError('ACQUIRE_FAILED', 'Source download was interrupted', true);
  } finally {
    await file.close();
  }

  logger.debug('Source video downloaded', { url, bytes: received });
  return { bytes: received, contentType: response.headers.get('content-type') };
}
