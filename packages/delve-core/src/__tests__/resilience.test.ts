import { ConfigurationError, ProviderTimeoutError, ProviderUnavailableError } from '../errors';
import { guardedCall, retry, withTimeout } from '../resilience';

const failingThen = <R>(failures: number, value: R, error: () => Error = () => new ProviderUnavailableError('unavailable')) => {
  let calls = 0;
  const fn = jest.fn(async () => {
    calls++;
    if (calls <= failures) throw error();
    return value;
  });
  return fn;
};

describe('resilience', () => {
  describe('retry', () => {
    it('should return the first success', async () => {
      const fn = failingThen(1, 'ok');
      const onRetry = jest.fn();

      await expect(retry(fn, { attempts: 3, delayMs: 0, onRetry })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(expect.any(ProviderUnavailableError), 1);
    });

    it('should rethrow the last error once attempts run out', async () => {
      const fn = failingThen(5, 'ok');

      await expect(retry(fn, { attempts: 2, delayMs: 0 })).rejects.toThrow('unavailable');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry configuration errors', async () => {
      const fn = failingThen(1, 'ok', () => new ConfigurationError('bad config'));

      await expect(retry(fn, { attempts: 3, delayMs: 0 })).rejects.toThrow(ConfigurationError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should not retry errors rejected by retryIf', async () => {
      const fn = failingThen(1, 'ok');

      await expect(retry(fn, { attempts: 3, delayMs: 0, retryIf: () => false })).rejects.toThrow('unavailable');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying once the signal is aborted', async () => {
      const abort = new AbortController();
      abort.abort();
      const fn = failingThen(1, 'ok');

      await expect(retry(fn, { attempts: 3, delayMs: 0, signal: abort.signal })).rejects.toThrow('unavailable');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('withTimeout', () => {
    it('should resolve with the value of a fast operation', async () => {
      await expect(withTimeout('Search', 100, async () => 42)).resolves.toBe(42);
    });

    it('should reject a slow operation with ProviderTimeoutError', async () => {
      const never = () => new Promise<number>(() => undefined);

      const result = withTimeout('Search', 10, never, 'search');

      await expect(result).rejects.toThrow(ProviderTimeoutError);
      await expect(result).rejects.toThrow('Search timed out after 10ms');
    });

    it('should pass through the operation error', async () => {
      await expect(withTimeout('Search', 100, async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');
    });
  });

  describe('guardedCall', () => {
    const policy = { timeoutMs: 100, maxRetries: 2, retryDelayMs: 0 };

    it('should make maxRetries + 1 attempts', async () => {
      const fn = failingThen(10, 'ok');

      await expect(guardedCall('Search', 'search', fn, policy)).rejects.toThrow('unavailable');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should report retries with the operation name', async () => {
      const onRetry = jest.fn();
      const fn = failingThen(1, 'ok');

      await expect(guardedCall('Summarization', 'llm', fn, { ...policy, onRetry })).resolves.toBe('ok');
      expect(onRetry).toHaveBeenCalledWith('Summarization', expect.any(ProviderUnavailableError), 1);
    });

    it('should retry a timed out attempt', async () => {
      let calls = 0;
      const fn = () => {
        calls++;
        return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve('late but fine');
      };

      await expect(guardedCall('Search', 'search', fn, { ...policy, timeoutMs: 10 })).resolves.toBe('late but fine');
      expect(calls).toBe(2);
    });
  });
});
