import type { FastifyInstance } from 'fastify';
import underPressure, { type FastifyUnderPressureOptions } from '@fastify/under-pressure';
import type { EnvConfig } from '../../config/env.js';
import logger from '../../infra/logger/logger.js';

export interface BackpressureMetrics {
  eventLoopDelay: number;
  heapUsedBytes: number;
  rssBytes: number;
  eventLoopUtilized: number;
}

/**
 * Register backpressure protection. Over any threshold the server answers
 * 503 with Retry-After until load drops.
 */
export async function registerBackpressure(fastify: FastifyInstance, config: EnvConfig): Promise<void> {
  if (!config.BACKPRESSURE_ENABLED) {
    logger.info('Backpressure monitoring disabled');
    return;
  }

  const options: FastifyUnderPressureOptions = {
    maxEventLoopDelay: config.BACKPRESSURE_MAX_EVENT_LOOP_DELAY,
    retryAfter: config.BACKPRESSURE_RETRY_AFTER,
    message: 'Service temporarily unavailable due to high load',
    pressureHandler: (_request, reply, type, value) => {
      logger.warn({ type, value }, 'Backpressure detected - service under high load');
      void reply
        .status(503)
        .header('retry-after', String(config.BACKPRESSURE_RETRY_AFTER))
        .send({
          error: 'SERVICE_OVERLOADED',
          message: 'Service temporarily unavailable due to high load',
          statusCode: 503,
          timestamp: new Date().toISOString(),
        });
    },
  };

  // 0 disables a threshold
  if (config.BACKPRESSURE_MAX_HEAP_USED_BYTES > 0) {
    options.maxHeapUsedBytes = config.BACKPRESSURE_MAX_HEAP_USED_BYTES;
  }
  if (config.BACKPRESSURE_MAX_RSS_BYTES > 0) {
    options.maxRssBytes = config.BACKPRESSURE_MAX_RSS_BYTES;
  }

  await fastify.register(underPressure, options);

  logger.info(
    {
      maxEventLoopDelay: config.BACKPRESSURE_MAX_EVENT_LOOP_DELAY,
      maxHeapUsedBytes: config.BACKPRESSURE_MAX_HEAP_USED_BYTES || 'disabled',
      maxRssBytes: config.BACKPRESSURE_MAX_RSS_BYTES || 'disabled',
      retryAfter: config.BACKPRESSURE_RETRY_AFTER,
    },
    'Backpressure monitoring registered'
  );
}

/**
 * Current pressure readings, or null when the plugin is not registered
 */
export function getBackpressureMetrics(fastify: FastifyInstance): BackpressureMetrics | null {
  if (!fastify.hasDecorator('memoryUsage')) {
    return null;
  }
  const usage = fastify.memoryUsage();
  return {
    eventLoopDelay: usage.eventLoopDelay,
    heapUsedBytes: usage.heapUsed,
    rssBytes: usage.rssBytes,
    eventLoopUtilized: usage.eventLoopUtilized,
  };
}
