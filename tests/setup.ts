import { afterAll, vi } from 'vitest';

// Set test environment variables BEFORE any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.SERVICE_NAME = 'test-service';
process.env.SERVICE_VERSION = '1.0.0';

// In-memory repository, no database
process.env.PERSISTENCE_DRIVER = 'memory';

// Redis (disabled for tests)
process.env.REDIS_ENABLED = 'false';

// Auth
process.env.JWT_SECRET = 'test-secret-with-at-least-32-characters!!';
process.env.JWT_ISSUER = 'catalog-service';

// No downstream services unless a test wires its own
process.env.SERVICE_REGISTRY = '';
delete process.env.RABBITMQ_URL;

// Disable observability for tests
process.env.OTEL_ENABLED = 'false';
delete process.env.SENTRY_DSN;

afterAll(() => {
  vi.restoreAllMocks();
});
