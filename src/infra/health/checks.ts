/**
 * Component checks registered with HealthService at startup
 */
import type { ComponentHealth, HealthCheck } from './HealthService.js';
import type { QueueHealthService } from '../queue/QueueHealthService.js';
import type { ClientHealth } from '../grpc-clients/types.js';

const SLOW_CHECK_MS = 1000;

interface PingResult {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Wrap a ping (database, redis). Slow responses are degraded.
 */
export function pingCheck(ping: () => Promise<PingResult>): HealthCheck {
  return async (): Promise<ComponentHealth> => {
    const result = await ping();

    if (!result.healthy) {
      return { status: 'unhealthy', message: result.error ?? 'Connection failed' };
    }

    const slow = (result.latencyMs ?? 0) > SLOW_CHECK_MS;
    return {
      status: slow ? 'degraded' : 'healthy',
      latencyMs: result.latencyMs,
      message: slow ? 'High latency detected' : 'Connection OK',
    };
  };
}

export function notConfiguredCheck(message?: string): HealthCheck {
  return () => ({ status: 'not_configured', message });
}

export function queueCheck(queueHealth: QueueHealthService): HealthCheck {
  return () => {
    const overall = queueHealth.getOverallStatus();
    if (overall === 'not_configured') {
      return { status: 'not_configured' };
    }

    return {
      status: overall === 'dead' ? 'unhealthy' : overall,
      details: { connections: queueHealth.getAllStatuses() },
    };
  };
}

/**
 * A downstream dependency never makes this service unhealthy: availability
 * falls back when the client is down, so the worst it reports is degraded.
 */
export function downstreamCheck(getHealth: () => ClientHealth): HealthCheck {
  return () => {
    const health = getHealth();
    const degraded = health.circuitState === 'OPEN' || (!health.healthy && health.lastError !== null);

    return {
      status: degraded ? 'degraded' : 'healthy',
      latencyMs: health.latencyMs,
      message: health.lastError ?? undefined,
      details: {
        state: health.state,
        address: health.address,
        circuitState: health.circuitState,
        reconnectAttempts: health.reconnectAttempts,
      },
    };
  };
}
