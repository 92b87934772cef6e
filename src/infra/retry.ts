/**
 * Exponential backoff helpers
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface RetryLog {
  attempt: number;
  error: string;
  nextRetryInMs?: number;
}

/**
 * Delay before attempt `attempt + 1`, given that `attempt` (1-based) just failed
 */
export function backoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(config.initialDelayMs * Math.pow(config.multiplier, exponent), config.maxDelayMs);
}

/**
 * Executes `fn` with exponential backoff. Errors rejected by `shouldRetry` and
 * the error of the final attempt are rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: {
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (log: RetryLog) => void;
    signal?: AbortSignal;
  } = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= config.maxAttempts || options.signal?.aborted) {
        throw error;
      }

      const delay = backoffDelay(attempt, config);
      options.onRetry?.({
        attempt,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: delay,
      });
      await sleep(delay, options.signal);
    }
  }
}

/**
 * Resolves after `ms`, or rejects early with the signal's reason
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
