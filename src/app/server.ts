import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import type { AwilixContainer } from 'awilix';
import { TOKENS, type Cradle } from '../container.js';
import { buildLoggerOptions } from '../infra/logger/logger.js';
import { errorHandler, notFoundHandler } from '../shared/errors/errorHandler.js';
import { registerRoutes } from './routes/index.js';
import {
  registerCorrelationId,
  registerRateLimiter,
  registerJwtAuth,
  registerBackpressure,
  registerRequestMetrics,
} from './middlewares/index.js';
import { registerSwagger } from './plugins/index.js';

/**
 * Create and configure the Fastify server around a populated container
 */
export async function createServer(container: AwilixContainer<Cradle>): Promise<FastifyInstance> {
  const config = container.resolve(TOKENS.Config);
  const logger = container.resolve(TOKENS.Logger);
  const isDevelopment = config.NODE_ENV === 'development';

  const fastify = Fastify({
    logger: config.NODE_ENV === 'test' ? false : buildLoggerOptions(),
    bodyLimit: 1048576,
    // Behind a load balancer the client IP comes from X-Forwarded-For
    trustProxy: true,
  });

  // Route schemas feed the OpenAPI document; zod validates requests
  fastify.setValidatorCompiler(() => (data) => ({ value: data }));

  // ============================================
  // SECURITY PLUGINS
  // ============================================

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  const corsOrigins = config.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  await fastify.register(cors, {
    origin: isDevelopment ? true : corsOrigins.length > 0 ? corsOrigins : false,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', 'X-Correlation-ID'],
    exposedHeaders: ['X-Request-ID', 'X-Correlation-ID'],
  });

  // ============================================
  // CORE MIDDLEWARES (hook order matters)
  // ============================================

  registerCorrelationId(fastify);
  registerRequestMetrics(fastify, container.resolve(TOKENS.HttpMetrics));
  await registerJwtAuth(fastify, config);
  await registerRateLimiter(fastify, config);
  await registerBackpressure(fastify, config);

  // ============================================
  // DOCUMENTATION + ROUTES
  // ============================================

  const docsEnabled = await registerSwagger(fastify, config);
  await registerRoutes(fastify, container);

  // ============================================
  // ERROR HANDLING
  // ============================================

  fastify.setErrorHandler(errorHandler);
  fastify.setNotFoundHandler(notFoundHandler);

  logger.info(
    { service: config.SERVICE_NAME, version: config.SERVICE_VERSION, env: config.NODE_ENV, docs: docsEnabled },
    'Server configured'
  );

  return fastify;
}
