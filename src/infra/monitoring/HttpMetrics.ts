/**
 * In-process request metrics, exposed as JSON on /metrics
 */

export interface RouteMetrics {
  method: string;
  route: string;
  requests: number;
  errors: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
}

export interface HttpMetricsSnapshot {
  totalRequests: number;
  totalErrors: number;
  routes: RouteMetrics[];
  since: string;
}

interface RouteCounter {
  requests: number;
  errors: number;
  totalLatencyMs: number;
  maxLatencyMs: number;
}

export class HttpMetrics {
  private readonly counters = new Map<string, RouteCounter>();
  private since = new Date();

  /**
   * Record a finished request. `route` is the route pattern, not the raw URL,
   * so ids in paths do not explode the key space. 5xx responses count as errors.
   */
  record(method: string, route: string, statusCode: number, durationMs: number): void {
    const key = `${method} ${route}`;
    const counter = this.counters.get(key) ?? { requests: 0, errors: 0, totalLatencyMs: 0, maxLatencyMs: 0 };

    counter.requests++;
    if (statusCode >= 500) {
      counter.errors++;
    }
    counter.totalLatencyMs += durationMs;
    counter.maxLatencyMs = Math.max(counter.maxLatencyMs, durationMs);

    this.counters.set(key, counter);
  }

  snapshot(): HttpMetricsSnapshot {
    const routes: RouteMetrics[] = [];
    let totalRequests = 0;
    let totalErrors = 0;

    for (const [key, counter] of this.counters) {
      const [method = '', route = ''] = key.split(' ');
      routes.push({
        method,
        route,
        requests: counter.requests,
        errors: counter.errors,
        avgLatencyMs: Math.round((counter.totalLatencyMs / counter.requests) * 100) / 100,
        maxLatencyMs: Math.round(counter.maxLatencyMs * 100) / 100,
      });
      totalRequests += counter.requests;
      totalErrors += counter.errors;
    }

    routes.sort((a, b) => a.route.localeCompare(b.route) || a.method.localeCompare(b.method));
    return { totalRequests, totalErrors, routes, since: this.since.toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.since = new Date();
  }
}
