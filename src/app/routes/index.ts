import type { FastifyInstance } from 'fastify';
import type { AwilixContainer } from 'awilix';
import type { Cradle } from '../../container.js';
import { createMonitoringHandlers } from './handlers.js';
import { productRoutes } from './productRoutes.js';

const componentMap = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    properties: {
      status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy', 'not_configured'] },
      latencyMs: { type: 'number' },
      message: { type: 'string' },
      details: { type: 'object', additionalProperties: true },
    },
  },
} as const;

const healthResponse = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
    service: { type: 'string' },
    version: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
    uptime: { type: 'number' },
    components: componentMap,
  },
} as const;

const readyResponse = {
  type: 'object',
  properties: {
    ready: { type: 'boolean' },
    shuttingDown: { type: 'boolean' },
    checks: { type: 'object', additionalProperties: { type: 'boolean' } },
  },
} as const;

/**
 * Register all routes
 */
export async function registerRoutes(
  fastify: FastifyInstance,
  container: AwilixContainer<Cradle>
): Promise<void> {
  const handlers = createMonitoringHandlers(fastify, container);

  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness check',
      description: 'Aggregated component health. 503 when any component is unhealthy.',
      response: { 200: healthResponse, 503: healthResponse },
    },
    handler: handlers.health,
  });

  fastify.get('/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness check',
      description: 'Whether the service should receive traffic',
      response: { 200: readyResponse, 503: readyResponse },
    },
    handler: handlers.ready,
  });

  fastify.get('/info', {
    schema: { tags: ['Health'], summary: 'Service information' },
    handler: handlers.info,
  });

  fastify.get('/metrics', {
    schema: { tags: ['Health'], summary: 'Request, process and client metrics' },
    handler: handlers.metrics,
  });

  // ============================================
  // API ROUTES
  // ============================================

  await fastify.register(productRoutes, { prefix: '/api/v1/products', container });
}
