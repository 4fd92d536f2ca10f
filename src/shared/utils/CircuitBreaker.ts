/**
 * Circuit breaker shared by outbound calls (inventory gRPC client, event
 * publisher, availability lookups).
 *
 * CLOSED   - calls pass through, failures inside `failureWindow` are counted
 * OPEN     - calls fail fast with CircuitBreakerOpenError until `resetTimeout` elapses
 * HALF_OPEN - trial calls pass; `successThreshold` successes close, one failure reopens
 */
import logger from '../../infra/logger/logger.js';
import { CircuitBreakerOpenError } from '../errors/AppError.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerOptions {
  name: string;
  /** Failures inside the window that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms before an open circuit lets a trial call through (default: 30000) */
  resetTimeout?: number;
  /** Half-open successes needed to close (default: 3) */
  successThreshold?: number;
  /** Sliding window in ms for counting failures (default: 60000) */
  failureWindow?: number;
  /** Failures for which this returns false are rethrown without being counted */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
  remainingResetTime: number;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number[] = [];
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly options: Required<Omit<CircuitBreakerOptions, 'onStateChange'>> &
    Pick<CircuitBreakerOptions, 'onStateChange'>;

  constructor(options: CircuitBreakerOptions) {
    this.options = {
      failureThreshold: 5,
      resetTimeout: 30000,
      successThreshold: 3,
      failureWindow: 60000,
      isFailure: () => true,
      ...options,
    };
  }

  get name(): string {
    return this.options.name;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastFailureTime >= this.options.resetTimeout) {
        this.transitionTo(CircuitState.HALF_OPEN);
      } else {
        throw new CircuitBreakerOpenError(this.options.name, this.getRemainingResetTime());
      }
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (this.options.isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
    this.onSuccess();
    return result;
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    } else {
      this.pruneFailures();
    }
  }

  private onFailure(): void {
    const now = Date.now();
    this.lastFailureTime = now;
    this.failures.push(now);
    this.pruneFailures();

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (
      this.state === CircuitState.CLOSED &&
      this.failures.length >= this.options.failureThreshold
    ) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private pruneFailures(): void {
    const cutoff = Date.now() - this.options.failureWindow;
    this.failures = this.failures.filter((timestamp) => timestamp > cutoff);
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;

    if (next === CircuitState.CLOSED) {
      this.failures = [];
      this.successCount = 0;
    } else if (next === CircuitState.HALF_OPEN) {
      this.successCount = 0;
    }

    const log = next === CircuitState.OPEN ? logger.warn.bind(logger) : logger.info.bind(logger);
    log(
      { circuitBreaker: this.options.name, previousState: previous, newState: next },
      'Circuit breaker state changed'
    );

    this.options.onStateChange?.(previous, next);
  }

  private getRemainingResetTime(): number {
    return Math.max(0, this.options.resetTimeout - (Date.now() - this.lastFailureTime));
  }

  getState(): CircuitState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.options.name,
      state: this.state,
      failureCount: this.failures.length,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      remainingResetTime: this.state === CircuitState.OPEN ? this.getRemainingResetTime() : 0,
    };
  }

  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.failures = [];
    this.successCount = 0;
  }
}
