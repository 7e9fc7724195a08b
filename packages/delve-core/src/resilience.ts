import { sleep } from './utils';
import { isFatal, ProviderKind, ProviderTimeoutError } from './errors';

/**
 * Resilience for provider calls: retry with backoff, per-call timeout
 */

export interface RetryOptions {
  /** Total attempts including the first call */
  readonly attempts?: number;
  readonly delayMs?: number;
  /** Multiplier applied to the delay after each failed attempt */
  readonly backoff?: number;
  readonly onRetry?: (error: unknown, attempt: number) => void;
  /** Errors for which this returns false are rethrown without another attempt */
  readonly retryIf?: (error: unknown) => boolean;
  readonly signal?: AbortSignal;
}

/**
 * Retry an async operation on failure
 *
 * Configuration and argument errors are rethrown immediately. An aborted
 * signal stops further attempts.
 */
export const retry = async <R>(fn: () => Promise<R>, options: RetryOptions = {}): Promise<R> => {
  const attempts = Math.max(1, options.attempts ?? 2);
  const backoff = options.backoff ?? 2;
  let delay = options.delayMs ?? 1000;
  let lastError: unknown = new Error('Retry failed');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const retryable = !isFatal(error) && (options.retryIf?.(error) ?? true);
      if (!retryable || attempt === attempts || options.signal?.aborted) {
        throw error;
      }

      options.onRetry?.(error, attempt);
      await sleep(delay);
      delay *= backoff;
    }
  }

  throw lastError;
};

/**
 * Reject with ProviderTimeoutError when the operation takes longer than `timeoutMs`
 */
export const withTimeout = async <R>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<R>,
  provider: ProviderKind = 'llm'
): Promise<R> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(operation, timeoutMs, provider)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export interface CallPolicy {
  readonly timeoutMs: number;
  /** Retries after the first attempt */
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly signal?: AbortSignal;
  readonly onRetry?: (operation: string, error: unknown, attempt: number) => void;
}

/**
 * One external call under the session's policy: each attempt is bounded by
 * `timeoutMs`, failures are retried `maxRetries` times with doubling delay.
 */
export const guardedCall = <R>(
  operation: string,
  provider: ProviderKind,
  fn: () => Promise<R>,
  policy: CallPolicy,
  retryIf?: (error: unknown) => boolean
): Promise<R> => {
  return retry(() => withTimeout(operation, policy.timeoutMs, fn, provider), {
    attempts: policy.maxRetries + 1,
    delayMs: policy.retryDelayMs,
    backoff: 2,
    signal: policy.signal,
    retryIf,
    onRetry: (error, attempt) => policy.onRetry?.(operation, error, attempt)
  });
};
