import { TimeoutError } from '../errors/AppError.js';

/**
 * Raised when a wrapped operation outlives its budget. Maps to 504.
 */
export class QueryTimeoutError extends TimeoutError {
  constructor(operation: string, timeoutMs: number) {
    super(operation, timeoutMs);
  }
}

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

/**
 * Race a promise against a timer. The timer is always cleared, and the
 * elapsed time is reported with the result.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<TimedResult<T>> {
  let timeoutId: NodeJS.Timeout | undefined;
  const startTime = Date.now();

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new QueryTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    const result = await Promise.race([promise, timeoutPromise]);
    return { result, durationMs: Date.now() - startTime };
  } finally {
    clearTimeout(timeoutId);
  }
}
