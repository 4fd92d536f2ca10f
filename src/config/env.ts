import { loadEnvFiles } from './loadEnv.js';
import { envSchema } from './env.schema.js';
import type { EnvConfig } from './env.schema.js';

/**
 * Parse boolean from string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse integer from string
 */
function parseInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse float from string
 */
function parseFloat(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function optional(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Map raw environment strings onto the typed schema.
 * Throws a ZodError when the configuration is invalid.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  return envSchema.parse({
    // Application
    NODE_ENV: optional(source.NODE_ENV),
    HOST: optional(source.HOST),
    PORT: parseInt(source.PORT),
    GRPC_ENABLED: parseBoolean(source.GRPC_ENABLED, false),
    GRPC_PORT: parseInt(source.GRPC_PORT),
    LOG_LEVEL: optional(source.LOG_LEVEL),
    SERVICE_NAME: optional(source.SERVICE_NAME),
    SERVICE_VERSION: optional(source.SERVICE_VERSION),

    // Security
    CORS_ORIGINS: source.CORS_ORIGINS,
    JWT_SECRET: optional(source.JWT_SECRET),
    JWT_EXPIRES_IN: optional(source.JWT_EXPIRES_IN),
    JWT_ISSUER: optional(source.JWT_ISSUER),
    RATE_LIMIT_MAX: parseInt(source.RATE_LIMIT_MAX),
    RATE_LIMIT_WINDOW_MS: parseInt(source.RATE_LIMIT_WINDOW_MS),

    // Backpressure
    BACKPRESSURE_ENABLED: parseBoolean(source.BACKPRESSURE_ENABLED, true),
    BACKPRESSURE_MAX_EVENT_LOOP_DELAY: parseInt(source.BACKPRESSURE_MAX_EVENT_LOOP_DELAY),
    BACKPRESSURE_MAX_HEAP_USED_BYTES: parseInt(source.BACKPRESSURE_MAX_HEAP_USED_BYTES),
    BACKPRESSURE_MAX_RSS_BYTES: parseInt(source.BACKPRESSURE_MAX_RSS_BYTES),
    BACKPRESSURE_RETRY_AFTER: parseInt(source.BACKPRESSURE_RETRY_AFTER),

    // Persistence
    PERSISTENCE_DRIVER: optional(source.PERSISTENCE_DRIVER),
    DB_HOST: optional(source.DB_HOST),
    DB_PORT: parseInt(source.DB_PORT),
    DB_USERNAME: optional(source.DB_USERNAME),
    DB_PASSWORD: source.DB_PASSWORD,
    DB_NAME: optional(source.DB_NAME),
    DB_POOL_MIN: parseInt(source.DB_POOL_MIN),
    DB_POOL_MAX: parseInt(source.DB_POOL_MAX),
    DB_CONNECT_TIMEOUT: parseInt(source.DB_CONNECT_TIMEOUT),
    DB_QUERY_TIMEOUT: parseInt(source.DB_QUERY_TIMEOUT),

    // Cache
    REDIS_ENABLED: parseBoolean(source.REDIS_ENABLED, false),
    REDIS_HOST: optional(source.REDIS_HOST),
    REDIS_PORT: parseInt(source.REDIS_PORT),
    REDIS_PASSWORD: source.REDIS_PASSWORD,
    CACHE_TTL_SECONDS: parseInt(source.CACHE_TTL_SECONDS),

    // RabbitMQ
    RABBITMQ_URL: optional(source.RABBITMQ_URL),
    RABBITMQ_EXCHANGE: optional(source.RABBITMQ_EXCHANGE),
    RABBITMQ_PREFETCH: parseInt(source.RABBITMQ_PREFETCH),

    // Discovery & downstream
    SERVICE_REGISTRY: source.SERVICE_REGISTRY,
    SERVICE_REGISTRY_TTL_MS: parseInt(source.SERVICE_REGISTRY_TTL_MS),
    INVENTORY_TIMEOUT_MS: parseInt(source.INVENTORY_TIMEOUT_MS),
    INVENTORY_MAX_RETRIES: parseInt(source.INVENTORY_MAX_RETRIES),
    INVENTORY_CB_FAILURE_THRESHOLD: parseInt(source.INVENTORY_CB_FAILURE_THRESHOLD),
    INVENTORY_CB_RESET_TIMEOUT_MS: parseInt(source.INVENTORY_CB_RESET_TIMEOUT_MS),
    HEALTH_CACHE_MS: parseInt(source.HEALTH_CACHE_MS),

    // Observability
    OTEL_ENABLED: parseBoolean(source.OTEL_ENABLED, false),
    OTEL_EXPORTER_OTLP_ENDPOINT: optional(source.OTEL_EXPORTER_OTLP_ENDPOINT),
    OTEL_EXPORTER_OTLP_HEADERS: optional(source.OTEL_EXPORTER_OTLP_HEADERS),
    SENTRY_DSN: optional(source.SENTRY_DSN),
    SENTRY_ENVIRONMENT: optional(source.SENTRY_ENVIRONMENT),
    SENTRY_TRACES_SAMPLE_RATE: parseFloat(source.SENTRY_TRACES_SAMPLE_RATE),

    // Misc
    SHUTDOWN_TIMEOUT_MS: parseInt(source.SHUTDOWN_TIMEOUT_MS),
  });
}

loadEnvFiles();

let config: EnvConfig;

try {
  config = parseEnv(process.env);
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('❌ Environment validation failed:', error);
  process.exit(1);
}

export default config;
export type { EnvConfig };
export { loadEnvFiles };
