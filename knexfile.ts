/**
 * Knex profiles for migrations and seeds, used by scripts/db.ts.
 * Connection settings come from the same env profile files as the service.
 */
import type { Knex } from 'knex';
import { loadEnvFiles } from './src/config/loadEnv.js';

loadEnvFiles();

function connection(ssl: boolean): Knex.MySql2ConnectionConfig {
  return {
    host: process.env.DB_HOST ?? 'localhost',
    port: Number(process.env.DB_PORT ?? 3306),
    user: process.env.DB_USERNAME ?? 'root',
    password: process.env.DB_PASSWORD ?? '',
    database: process.env.DB_NAME ?? 'catalog',
    timezone: 'Z',
    ...(ssl ? { ssl: { rejectUnauthorized: true } } : {}),
  };
}

function profile(pool: { min: number; max: number }, ssl = false): Knex.Config {
  return {
    client: 'mysql2',
    connection: connection(ssl),
    pool,
    migrations: {
      tableName: 'knex_migrations',
      directory: './src/infra/db/migrations',
      loadExtensions: ['.ts'],
    },
    seeds: {
      directory: './src/infra/db/seeds',
      loadExtensions: ['.ts'],
    },
  };
}

const config: Record<string, Knex.Config> = {
  development: profile({ min: 2, max: 10 }),
  test: profile({ min: 1, max: 5 }),
  staging: profile({ min: 2, max: 20 }),
  production: profile({ min: 5, max: 30 }, true),
};

export default config;
