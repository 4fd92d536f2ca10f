/**
 * Knex connection pool for the MySQL persistence driver
 */
import { knex } from 'knex';
import type { Knex } from 'knex';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

let db: Knex | null = null;

export function createKnexConfig(): Knex.Config {
  return {
    client: 'mysql2',
    connection: {
      host: config.DB_HOST,
      port: config.DB_PORT,
      user: config.DB_USERNAME,
      password: config.DB_PASSWORD,
      database: config.DB_NAME,
      connectTimeout: config.DB_CONNECT_TIMEOUT,
      timezone: 'Z',
    },
    pool: {
      min: config.DB_POOL_MIN,
      max: config.DB_POOL_MAX,
    },
    acquireConnectionTimeout: config.DB_CONNECT_TIMEOUT,
  };
}

/**
 * Create the pool and verify it with a round trip
 */
export async function initializeDatabase(): Promise<Knex> {
  if (db) {
    return db;
  }

  const instance = knex(createKnexConfig());
  await instance.raw('SELECT 1');
  db = instance;

  logger.info({ host: config.DB_HOST, database: config.DB_NAME }, 'Database connected');
  return db;
}

export async function checkDatabaseHealth(): Promise<{ healthy: boolean; latencyMs?: number; error?: string }> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }
  try {
    const start = Date.now();
    await db.raw('SELECT 1');
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return { healthy: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function closeDatabase(): Promise<void> {
  if (!db) return;
  const instance = db;
  db = null;
  await instance.destroy();
  logger.info('Database connection closed');
}
