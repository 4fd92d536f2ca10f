/**
 * Shared ioredis client, used by the read-through cache and the health check
 */
import { Redis } from 'ioredis';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

let client: Redis | null = null;

export function createRedisClient(): Redis {
  return new Redis({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    password: config.REDIS_PASSWORD || undefined,
    db: 0,
    lazyConnect: true,
    connectTimeout: 10000,
    commandTimeout: 5000,
    maxRetriesPerRequest: 2,
    retryStrategy: (times) => Math.min(times * 200, 5000),
  });
}

/**
 * Connect the shared client. Returns null when Redis is disabled.
 */
export async function initializeRedis(): Promise<Redis | null> {
  if (!config.REDIS_ENABLED) {
    logger.info('Redis disabled (REDIS_ENABLED=false)');
    return null;
  }
  if (client) {
    return client;
  }

  const redis = createRedisClient();
  redis.on('error', (error: Error) => {
    logger.warn({ err: error }, 'Redis connection error');
  });
  await redis.connect();
  client = redis;
  logger.info({ host: config.REDIS_HOST, port: config.REDIS_PORT }, 'Redis connected');
  return client;
}

export async function checkRedisHealth(): Promise<{ healthy: boolean; latencyMs?: number; error?: string }> {
  if (!client) {
    return { healthy: false, error: 'Redis not connected' };
  }
  try {
    const start = Date.now();
    await client.ping();
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return { healthy: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const redis = client;
  client = null;
  await redis.quit();
  logger.info('Redis connection closed');
}
