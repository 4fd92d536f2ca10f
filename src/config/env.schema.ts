import { z } from 'zod';

/**
 * Environment variable validation schema using Zod
 * All configuration is validated at startup - fail fast on misconfiguration
 */
export const envSchema = z
  .object({
    // ============================================
    // APPLICATION
    // ============================================
    NODE_ENV: z.enum(['development', 'production', 'staging', 'test']).default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.number().int().positive().default(3000),
    GRPC_ENABLED: z.boolean().default(false),
    GRPC_PORT: z.number().int().positive().default(50051),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    SERVICE_NAME: z.string().min(1).default('catalog-service'),
    SERVICE_VERSION: z.string().default('1.0.0'),

    // ============================================
    // SECURITY
    // ============================================
    CORS_ORIGINS: z.string().optional().default(''),

    JWT_SECRET: z.string().min(32).optional(),
    JWT_EXPIRES_IN: z.string().default('1h'),
    JWT_ISSUER: z.string().default('catalog-service'),

    RATE_LIMIT_MAX: z.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.number().int().positive().default(60000),

    // ============================================
    // BACKPRESSURE
    // ============================================
    BACKPRESSURE_ENABLED: z.boolean().default(true),
    BACKPRESSURE_MAX_EVENT_LOOP_DELAY: z.number().int().min(0).default(1000),
    BACKPRESSURE_MAX_HEAP_USED_BYTES: z.number().int().min(0).default(0),
    BACKPRESSURE_MAX_RSS_BYTES: z.number().int().min(0).default(0),
    BACKPRESSURE_RETRY_AFTER: z.number().int().positive().default(10),

    // ============================================
    // PERSISTENCE
    // ============================================
    PERSISTENCE_DRIVER: z.enum(['memory', 'mysql']).default('memory'),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.number().int().positive().default(3306),
    DB_USERNAME: z.string().min(1).default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_NAME: z.string().min(1).default('catalog'),
    DB_POOL_MIN: z.number().int().min(0).default(2),
    DB_POOL_MAX: z.number().int().positive().default(10),
    DB_CONNECT_TIMEOUT: z.number().int().positive().default(10000),
    DB_QUERY_TIMEOUT: z.number().int().positive().default(5000),

    // ============================================
    // CACHE
    // ============================================
    REDIS_ENABLED: z.boolean().default(false),
    REDIS_HOST: z.string().min(1).default('localhost'),
    REDIS_PORT: z.number().int().positive().default(6379),
    REDIS_PASSWORD: z.string().optional().default(''),
    CACHE_TTL_SECONDS: z.number().int().positive().default(300),

    // ============================================
    // RABBITMQ
    // ============================================
    RABBITMQ_URL: z.string().url().optional(),
    RABBITMQ_EXCHANGE: z.string().min(1).default('catalog.events'),
    RABBITMQ_PREFETCH: z.number().int().positive().default(10),

    // ============================================
    // DISCOVERY & DOWNSTREAM
    // ============================================
    // "inventory=host:port,host:port;pricing=host:port"
    SERVICE_REGISTRY: z.string().optional().default(''),
    SERVICE_REGISTRY_TTL_MS: z.number().int().positive().default(30000),

    INVENTORY_TIMEOUT_MS: z.number().int().positive().default(2000),
    INVENTORY_MAX_RETRIES: z.number().int().min(0).default(2),
    INVENTORY_CB_FAILURE_THRESHOLD: z.number().int().positive().default(5),
    INVENTORY_CB_RESET_TIMEOUT_MS: z.number().int().positive().default(30000),

    HEALTH_CACHE_MS: z.number().int().min(0).default(2000),

    // ============================================
    // OBSERVABILITY
    // ============================================
    OTEL_ENABLED: z.boolean().default(false),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_EXPORTER_OTLP_HEADERS: z.string().optional(),

    SENTRY_DSN: z.string().url().optional(),
    SENTRY_ENVIRONMENT: z.string().optional(),
    // Unset: chosen per environment
    SENTRY_TRACES_SAMPLE_RATE: z.number().min(0).max(1).optional(),

    // ============================================
    // MISC
    // ============================================
    SHUTDOWN_TIMEOUT_MS: z.number().int().positive().default(30000),
  })
  .refine((env) => env.NODE_ENV !== 'production' || env.CORS_ORIGINS.length > 0, {
    message: 'CORS_ORIGINS must be set in production',
    path: ['CORS_ORIGINS'],
  });

/**
 * Type definition for the validated environment configuration
 */
export type EnvConfig = z.infer<typeof envSchema>;
