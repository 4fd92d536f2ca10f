/**
 * gRPC Health Check Handler
 * Implements the standard gRPC health checking protocol for Kubernetes health checks.
 * See: https://github.com/grpc/grpc/blob/master/doc/health-checking.md
 */
import type * as grpc from '@grpc/grpc-js';
import type { HealthService } from '../../infra/health/index.js';
import type { Logger } from '../../infra/logger/logger.js';

export enum ServingStatus {
  UNKNOWN = 0,
  SERVING = 1,
  NOT_SERVING = 2,
  SERVICE_UNKNOWN = 3,
}

interface HealthCheckRequest {
  service: string;
}

interface HealthCheckResponse {
  status: ServingStatus;
}

export interface HealthHandlerOptions {
  healthService: HealthService;
  logger: Logger;
  /** Fully-qualified service names answered besides the empty (server) name */
  services: string[];
  /** Reports NOT_SERVING while true, e.g. during shutdown */
  isDraining?: () => boolean;
}

export function createHealthServiceHandlers(options: HealthHandlerOptions) {
  const { healthService, logger, services, isDraining = () => false } = options;
  const known = new Set(['', ...services]);

  async function resolveStatus(service: string): Promise<ServingStatus> {
    if (!known.has(service)) {
      return ServingStatus.SERVICE_UNKNOWN;
    }
    if (isDraining()) {
      return ServingStatus.NOT_SERVING;
    }
    try {
      const result = await healthService.check();
      return result.status === 'unhealthy' ? ServingStatus.NOT_SERVING : ServingStatus.SERVING;
    } catch (error) {
      logger.error({ err: error, service }, 'gRPC health check failed');
      return ServingStatus.NOT_SERVING;
    }
  }

  async function check(
    call: grpc.ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
    callback: grpc.sendUnaryData<HealthCheckResponse>
  ): Promise<void> {
    callback(null, { status: await resolveStatus(call.request.service) });
  }

  // Sends the current status and completes; clients re-watch to poll
  async function watch(
    call: grpc.ServerWritableStream<HealthCheckRequest, HealthCheckResponse>
  ): Promise<void> {
    call.write({ status: await resolveStatus(call.request.service) });
    call.end();
  }

  return { Check: check, Watch: watch, resolveStatus };
}
