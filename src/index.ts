/**
 * Catalog Service
 * HTTP + gRPC product catalog
 *
 * Start with `--import ./dist/instrumentation.js` so tracing is in place
 * before the modules below load.
 */

// Environment files are loaded and validated on import
import config from './config/env.js';
import { shutdownTracing } from './infra/monitoring/tracing.js';

// Application imports
import { createServer } from './app/server.js';
import { registerDependencies, TOKENS, type Infrastructure } from './container.js';
import logger from './infra/logger/logger.js';
import { initializeSentry, flushSentry, closeSentry } from './infra/monitoring/sentry.js';
import { initializeDatabase, closeDatabase } from './infra/db/database.js';
import { initializeRedis, closeRedis } from './infra/redis/redis.js';
import { QueueConnection, QueueHealthService } from './infra/queue/index.js';
import { startGrpcServer, stopGrpcServer } from './grpc/index.js';

const REGISTRY_SWEEP_INTERVAL_MS = 10000;

async function main(): Promise<void> {
  try {
    // ============================================
    // INITIALIZATION ORDER MATTERS!
    // ============================================

    logger.info(
      {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        env: config.NODE_ENV,
        nodeVersion: process.version,
      },
      'Starting service...'
    );

    // 1. Error tracking
    initializeSentry();

    // 2. Backing services. Each one left unconfigured falls back in-process
    const queueHealth = new QueueHealthService();
    const infrastructure: Infrastructure = { queueHealth };

    if (config.PERSISTENCE_DRIVER === 'mysql') {
      infrastructure.db = await initializeDatabase();
    }

    infrastructure.redis = await initializeRedis();

    if (config.RABBITMQ_URL) {
      const queueConnection = new QueueConnection(
        { url: config.RABBITMQ_URL, connectionName: 'events', prefetch: config.RABBITMQ_PREFETCH },
        queueHealth,
        logger
      );
      await queueConnection.connect();
      infrastructure.queueConnection = queueConnection;
    }

    // 3. Dependency injection
    const container = registerDependencies({ config, infrastructure });
    const shutdown = container.resolve(TOKENS.Shutdown);

    // 4. Shutdown handlers run in reverse registration order
    shutdown.setupSignalHandlers();

    shutdown.register('opentelemetry', async () => {
      await shutdownTracing();
    });

    shutdown.register('sentry', async () => {
      await flushSentry();
      await closeSentry();
    });

    if (infrastructure.db) {
      shutdown.register('database', async () => {
        await closeDatabase();
      });
    }

    if (infrastructure.redis) {
      shutdown.register('redis', async () => {
        await closeRedis();
      });
    }

    const { queueConnection } = infrastructure;
    if (queueConnection) {
      shutdown.register('queue-connection', async () => {
        await queueConnection.close();
      });
    }

    const inventoryClient = container.resolve(TOKENS.InventoryClient);
    if (inventoryClient) {
      shutdown.register('inventory-client', async () => {
        inventoryClient.close();
      });
    }

    const serviceRegistry = container.resolve(TOKENS.ServiceRegistry);
    const sweep = setInterval(() => {
      serviceRegistry.evictExpired();
    }, REGISTRY_SWEEP_INTERVAL_MS);
    sweep.unref();
    shutdown.register('service-registry', async () => {
      clearInterval(sweep);
    });

    // 5. HTTP server
    const server = await createServer(container);
    shutdown.registerFastify(server);
    await server.listen({ port: config.PORT, host: config.HOST });

    logger.info(
      {
        port: config.PORT,
        docs: config.NODE_ENV !== 'production' ? `http://localhost:${config.PORT}/docs` : undefined,
      },
      'HTTP server started'
    );

    // 6. gRPC server (if enabled)
    if (config.GRPC_ENABLED) {
      await startGrpcServer(container, config.GRPC_PORT);
      shutdown.register('grpc', async () => {
        await stopGrpcServer();
      });
      logger.info({ port: config.GRPC_PORT }, 'gRPC server started');
    } else {
      logger.info('gRPC server disabled (GRPC_ENABLED=false)');
    }

    logger.info(
      {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        pid: process.pid,
      },
      'Service started successfully'
    );
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start service');
    await flushSentry();
    process.exit(1);
  }
}

void main();
