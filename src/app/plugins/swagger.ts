import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { EnvConfig } from '../../config/env.js';
import logger from '../../infra/logger/logger.js';

export const DOCS_PREFIX = '/docs';

/**
 * OpenAPI document plus the UI at /docs. Skipped in production and tests.
 * Must be registered before the routes it documents.
 */
export async function registerSwagger(fastify: FastifyInstance, config: EnvConfig): Promise<boolean> {
  if (config.NODE_ENV === 'production' || config.NODE_ENV === 'test') {
    return false;
  }

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: config.SERVICE_NAME,
        description: 'Product catalog API',
        version: config.SERVICE_VERSION,
      },
      servers: [{ url: `http://localhost:${config.PORT}` }],
      tags: [
        { name: 'Health', description: 'Liveness, readiness and metrics' },
        { name: 'Products', description: 'Product catalog' },
      ],
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: DOCS_PREFIX,
    uiConfig: { docExpansion: 'list', deepLinking: true },
  });

  logger.info({ path: DOCS_PREFIX }, 'API documentation registered');
  return true;
}
