import { getLogger } from './logger.js';
import { sleep } from './timing.js';

const log = getLogger('transport', { component: 'retry' });

export interface RetryOptions {
  /** Attempts including the first call. */
  maxAttempts: number;
  /** Delay before the first retry; doubles on each later one. */
  baseDelayMs: number;
  /**
   * Only failures whose `code` or message contains one of these are
   * retried. Empty or absent: every failure is retried.
   */
  retryableErrors?: readonly string[];
}

/** Fraction of the delay added or removed at random. */
const JITTER_FACTOR = 0.1;

function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code);
  }
  return '';
}

function isRetryable(error: unknown, patterns: readonly string[] = []): boolean {
  if (patterns.length === 0) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  return patterns.some((pattern) => message.includes(pattern) || code.includes(pattern));
}

export function retryDelay(attempt: number, baseDelayMs: number): number {
  const delay = baseDelayMs * 2 ** (attempt - 1);
  const jitter = delay * JITTER_FACTOR * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(delay + jitter));
}

/**
 * Runs a request and repeats it after a transient network failure.
 * Other failures, and the last one, are rethrown as they were raised.
 *
 * @example
 * ```ts
 * const response = await retry(
 *   () => client.get(url),
 *   { maxAttempts: 2, baseDelayMs: 2000, retryableErrors: ['ECONNRESET', 'ETIMEDOUT'] },
 * );
 * ```
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, retryableErrors } = options;
  if (maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error, retryableErrors)) {
        throw error;
      }

      const delayMs = retryDelay(attempt, baseDelayMs);
      log.warn(
        { attempt, maxAttempts, delayMs, code: errorCode(error) },
        `Request failed, retrying in ${delayMs}ms`,
      );
      await sleep(delayMs);
    }
  }
}
