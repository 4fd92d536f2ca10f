import type { ClientMetrics } from './types.js';
import { createDefaultMetrics } from './types.js';

/**
 * Call counters and latency aggregates for one downstream client
 */
export class MetricsTracker {
  private metrics: ClientMetrics = createDefaultMetrics();
  private latencySum = 0;

  recordCallStart(): void {
    this.metrics.totalCalls++;
  }

  recordSuccess(latencyMs: number): void {
    this.metrics.successfulCalls++;
    this.latencySum += latencyMs;
    this.metrics.maxLatencyMs = Math.max(this.metrics.maxLatencyMs, latencyMs);
    this.metrics.minLatencyMs =
      this.metrics.minLatencyMs === null ? latencyMs : Math.min(this.metrics.minLatencyMs, latencyMs);
    this.metrics.avgLatencyMs = Math.round(this.latencySum / this.metrics.successfulCalls);
  }

  recordFailure(): void {
    this.metrics.failedCalls++;
  }

  recordRetry(): void {
    this.metrics.totalRetries++;
  }

  recordCircuitBreakerTrip(): void {
    this.metrics.circuitBreakerTrips++;
  }

  recordCacheHit(): void {
    this.metrics.cacheHits++;
  }

  recordCacheMiss(): void {
    this.metrics.cacheMisses++;
  }

  getMetrics(): ClientMetrics {
    return { ...this.metrics };
  }

  reset(): void {
    this.metrics = createDefaultMetrics();
    this.latencySum = 0;
  }

  /**
   * 0-100, 100 when nothing has been called yet
   */
  getSuccessRate(): number {
    if (this.metrics.totalCalls === 0) {
      return 100;
    }
    return Math.round((this.metrics.successfulCalls / this.metrics.totalCalls) * 100);
  }

  getCacheHitRate(): number {
    const lookups = this.metrics.cacheHits + this.metrics.cacheMisses;
    if (lookups === 0) {
      return 0;
    }
    return Math.round((this.metrics.cacheHits / lookups) * 100);
  }
}
