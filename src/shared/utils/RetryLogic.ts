import logger from '../../infra/logger/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with up to 30% jitter, capped at maxDelayMs
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt);
  const jitter = Math.random() * 0.3 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

/**
 * Retry only while `shouldRetry` accepts the error. The last error is rethrown as-is.
 */
export async function retryOnError<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: Partial<RetryOptions> = {},
  operationName = 'operation'
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);

      if (attempt >= opts.maxRetries) {
        logger.error(
          { operation: operationName, attempts: attempt + 1, error: message },
          `${operationName} failed after ${attempt + 1} attempts`
        );
        throw error;
      }

      const delay = calculateDelay(attempt, opts);
      logger.warn(
        { operation: operationName, attempt: attempt + 1, nextRetryIn: delay, error: message },
        `${operationName} failed, retrying`
      );
      await sleep(delay);
    }
  }
}

/**
 * Retry a function with exponential backoff. Makes `maxRetries + 1` attempts in total.
 */
export function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  operationName = 'operation'
): Promise<T> {
  return retryOnError(fn, () => true, options, operationName);
}
