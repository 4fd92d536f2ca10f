import type { FastifyInstance } from 'fastify';
import type { HttpMetrics } from '../../infra/monitoring/HttpMetrics.js';

/**
 * Feed every completed request into the metrics registry, keyed by route pattern
 */
export function registerRequestMetrics(fastify: FastifyInstance, metrics: HttpMetrics): void {
  fastify.addHook('onResponse', (request, reply, done) => {
    const route = request.routeOptions.url ?? 'unmatched';
    metrics.record(request.method, route, reply.statusCode, reply.elapsedTime);
    done();
  });
}
