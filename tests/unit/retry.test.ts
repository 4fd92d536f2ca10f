import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateDelay, retry, retryOnError, withTimeout, QueryTimeoutError } from '../../src/shared/utils/index.js';

const fast = { baseDelayMs: 1, maxDelayMs: 2 };

describe('RetryLogic', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('calculateDelay', () => {
    it('should grow exponentially without jitter', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0);
      const options = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 10000, backoffMultiplier: 2 };

      expect([0, 1, 2].map((attempt) => calculateDelay(attempt, options))).toEqual([100, 200, 400]);
    });

    it('should add up to 30% jitter and respect the cap', () => {
      vi.spyOn(Math, 'random').mockReturnValue(1);
      const options = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 250, backoffMultiplier: 2 };

      expect(calculateDelay(0, options)).toBe(130);
      expect(calculateDelay(1, options)).toBe(250);
    });
  });

  describe('retry', () => {
    it('should return the first success', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('done');

      await expect(retry(fn, { ...fast, maxRetries: 2 })).resolves.toBe('done');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should make maxRetries + 1 attempts then rethrow the last error', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('down'));

      await expect(retry(fn, { ...fast, maxRetries: 2 })).rejects.toThrow('down');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('retryOnError', () => {
    it('should stop at the first error the predicate rejects', async () => {
      const fatal = new Error('fatal');
      const fn = vi.fn().mockRejectedValueOnce(new Error('transient')).mockRejectedValueOnce(fatal);

      await expect(
        retryOnError(fn, (error) => error instanceof Error && error.message === 'transient', { ...fast, maxRetries: 5 })
      ).rejects.toBe(fatal);
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the result and duration', async () => {
    const { result, durationMs } = await withTimeout(Promise.resolve(42), 1000, 'answer');

    expect(result).toBe(42);
    expect(durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should reject with QueryTimeoutError once the budget is spent', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 500, 'slow query');
    const assertion = expect(pending).rejects.toThrow("Operation 'slow query' timed out after 500ms");

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(QueryTimeoutError);
  });
});
