export {
  CircuitBreaker,
  CircuitState,
  type CircuitBreakerOptions,
  type CircuitBreakerStats,
} from './CircuitBreaker.js';
export { retry, retryOnError, calculateDelay, sleep, type RetryOptions } from './RetryLogic.js';
export { withTimeout, QueryTimeoutError, type TimedResult } from './timeout.js';
