import type { FastifyInstance, FastifyRequest } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { EnvConfig } from '../../config/env.js';
import logger from '../../infra/logger/logger.js';
import { RateLimitError } from '../../shared/errors/index.js';

const EXEMPT_PATHS = new Set(['/health', '/ready', '/metrics']);

function isExempt(request: FastifyRequest): boolean {
  const path = request.url.split('?')[0] ?? request.url;
  return EXEMPT_PATHS.has(path);
}

/**
 * Register rate limiting, keyed by authenticated user and falling back to IP
 */
export async function registerRateLimiter(fastify: FastifyInstance, config: EnvConfig): Promise<void> {
  await fastify.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,

    keyGenerator: (request) => (request.userId ? `user:${request.userId}` : request.ip),

    // The returned error is thrown and rendered by the global error handler
    errorResponseBuilder: (request, context) => {
      logger.warn({ ip: request.ip, userId: request.userId, max: context.max }, 'Rate limit exceeded');
      return new RateLimitError(Math.ceil(context.ttl / 1000));
    },

    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },

    allowList: (request) => isExempt(request),
  });

  logger.info(
    { max: config.RATE_LIMIT_MAX, windowMs: config.RATE_LIMIT_WINDOW_MS },
    'Rate limiter registered'
  );
}
