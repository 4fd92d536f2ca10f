import type { FastifyInstance, FastifyReply } from 'fastify';
import type { AwilixContainer } from 'awilix';
import { TOKENS, type Cradle } from '../../container.js';
import type { HealthCheckResult, ReadinessResult } from '../../infra/health/index.js';
import { getBackpressureMetrics } from '../middlewares/backpressure.js';
import { DOCS_PREFIX } from '../plugins/swagger.js';

export interface ReadinessResponse extends ReadinessResult {
  shuttingDown?: boolean;
}

/**
 * Handlers for the operational endpoints. They read from the container at
 * call time so tests can swap registrations.
 */
export function createMonitoringHandlers(fastify: FastifyInstance, container: AwilixContainer<Cradle>) {
  return {
    /** Liveness: 503 only when a component is unhealthy */
    async health(_request: unknown, reply: FastifyReply): Promise<HealthCheckResult> {
      const result = await container.resolve(TOKENS.HealthService).check();
      void reply.status(result.status === 'unhealthy' ? 503 : 200);
      return result;
    },

    /** Readiness: degraded still takes traffic; shutdown never does */
    async ready(_request: unknown, reply: FastifyReply): Promise<ReadinessResponse> {
      if (container.resolve(TOKENS.Shutdown).isInProgress()) {
        void reply.status(503);
        return { ready: false, checks: {}, shuttingDown: true };
      }

      const readiness = await container.resolve(TOKENS.HealthService).readiness();
      void reply.status(readiness.ready ? 200 : 503);
      return readiness;
    },

    async info() {
      const config = container.resolve(TOKENS.Config);
      return {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        environment: config.NODE_ENV,
        nodeVersion: process.version,
        docs: fastify.hasDecorator('swagger') ? DOCS_PREFIX : undefined,
      };
    },

    async metrics() {
      const memory = process.memoryUsage();
      const inventoryClient = container.resolve(TOKENS.InventoryClient);
      const inventoryHealth = inventoryClient?.getHealth();

      return {
        http: container.resolve(TOKENS.HttpMetrics).snapshot(),
        process: {
          uptimeSeconds: process.uptime(),
          heapUsedBytes: memory.heapUsed,
          heapTotalBytes: memory.heapTotal,
          rssBytes: memory.rss,
        },
        backpressure: getBackpressureMetrics(fastify),
        availabilityCircuit: container.resolve(TOKENS.AvailabilityCircuitBreaker).getStats(),
        inventoryClient: inventoryHealth
          ? {
              state: inventoryHealth.state,
              circuitState: inventoryHealth.circuitState,
              address: inventoryHealth.address,
              metrics: inventoryHealth.metrics,
            }
          : null,
      };
    },
  };
}
