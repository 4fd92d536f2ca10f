import type { AwilixContainer, Resolver } from 'awilix';
import { createContainer, asValue, asFunction, InjectionMode } from 'awilix';
import type { Knex } from 'knex';
import type { Redis } from 'ioredis';
import type { Logger } from './infra/logger/logger.js';
import logger from './infra/logger/logger.js';
import defaultConfig, { type EnvConfig } from './config/env.js';
import type { IProductRepository } from './domain/repositories/index.js';
import type { IEventPublisher, IInventoryProvider } from './application/providers/index.js';
import { InMemoryProductRepository } from './infra/db/repositories/InMemoryProductRepository.js';
import { ProductRepository } from './infra/db/repositories/ProductRepository.js';
import { TransactionManager } from './infra/db/TransactionManager.js';
import { checkDatabaseHealth } from './infra/db/database.js';
import { checkRedisHealth } from './infra/redis/redis.js';
import { InMemoryCacheService, RedisCacheService, type ICacheService } from './infra/cache/index.js';
import {
  BasePublisher,
  InMemoryEventPublisher,
  QueueHealthService,
  RabbitEventPublisher,
  type QueueConnection,
} from './infra/queue/index.js';
import { ServiceRegistry } from './infra/discovery/index.js';
import { InventoryClient, UnconfiguredInventoryProvider } from './infra/grpc-clients/index.js';
import {
  HealthService,
  downstreamCheck,
  notConfiguredCheck,
  pingCheck,
  queueCheck,
} from './infra/health/index.js';
import { HttpMetrics } from './infra/monitoring/HttpMetrics.js';
import { GracefulShutdownManager } from './infra/shutdown/gracefulShutdown.js';
import { CircuitBreaker } from './shared/utils/CircuitBreaker.js';
import { createTokenVerifier, type TokenVerifier } from './grpc/interceptors/authInterceptor.js';
import {
  CreateProductUseCase,
  GetProductUseCase,
  ListProductsUseCase,
  UpdateProductUseCase,
  DeleteProductUseCase,
  GetProductAvailabilityUseCase,
} from './application/useCases/index.js';

const INVENTORY_SERVICE = 'inventory';

/**
 * Container Cradle Interface
 * Defines all available dependencies with their types
 */
export interface Cradle {
  // Infrastructure
  config: EnvConfig;
  logger: Logger;
  cache: ICacheService;
  queueHealth: QueueHealthService;
  eventPublisher: IEventPublisher;
  serviceRegistry: ServiceRegistry;
  inventoryClient: InventoryClient | null;
  inventoryProvider: IInventoryProvider;
  availabilityCircuitBreaker: CircuitBreaker;
  healthService: HealthService;
  httpMetrics: HttpMetrics;
  shutdown: GracefulShutdownManager;
  tokenVerifier: TokenVerifier | null;

  // Repositories
  productRepository: IProductRepository;

  // Use Cases
  createProductUseCase: CreateProductUseCase;
  getProductUseCase: GetProductUseCase;
  listProductsUseCase: ListProductsUseCase;
  updateProductUseCase: UpdateProductUseCase;
  deleteProductUseCase: DeleteProductUseCase;
  getProductAvailabilityUseCase: GetProductAvailabilityUseCase;
}

/**
 * Dependency Injection Tokens
 * Use these tokens for type-safe dependency resolution
 */
export const TOKENS = {
  // Infrastructure
  Config: 'config',
  Logger: 'logger',
  Cache: 'cache',
  QueueHealth: 'queueHealth',
  EventPublisher: 'eventPublisher',
  ServiceRegistry: 'serviceRegistry',
  InventoryClient: 'inventoryClient',
  InventoryProvider: 'inventoryProvider',
  AvailabilityCircuitBreaker: 'availabilityCircuitBreaker',
  HealthService: 'healthService',
  HttpMetrics: 'httpMetrics',
  Shutdown: 'shutdown',
  TokenVerifier: 'tokenVerifier',

  // Repositories
  ProductRepository: 'productRepository',

  // Use Cases
  CreateProductUseCase: 'createProductUseCase',
  GetProductUseCase: 'getProductUseCase',
  ListProductsUseCase: 'listProductsUseCase',
  UpdateProductUseCase: 'updateProductUseCase',
  DeleteProductUseCase: 'deleteProductUseCase',
  GetProductAvailabilityUseCase: 'getProductAvailabilityUseCase',
} as const satisfies Record<string, keyof Cradle>;

/**
 * Connected clients created during bootstrap. Absent entries fall back to
 * in-process implementations.
 */
export interface Infrastructure {
  db?: Knex | null;
  redis?: Redis | null;
  queueConnection?: QueueConnection | null;
  /** Status registry the queue connection reports into */
  queueHealth?: QueueHealthService;
}

export interface ContainerOptions {
  config?: EnvConfig;
  infrastructure?: Infrastructure;
  /** Replace individual registrations, e.g. fakes in tests */
  overrides?: { [K in keyof Cradle]?: Resolver<Cradle[K]> };
}

/**
 * Create the DI container and register every dependency.
 * Call this once at app startup; tests build one per case.
 */
export function registerDependencies(options: ContainerOptions = {}): AwilixContainer<Cradle> {
  const config = options.config ?? defaultConfig;
  const { db = null, redis = null, queueConnection = null } = options.infrastructure ?? {};
  const queueHealth = options.infrastructure?.queueHealth ?? new QueueHealthService();

  if (config.PERSISTENCE_DRIVER === 'mysql' && !db) {
    throw new Error('PERSISTENCE_DRIVER=mysql requires an initialized database connection');
  }

  const container = createContainer<Cradle>({
    injectionMode: InjectionMode.PROXY,
    strict: true,
  });

  container.register({
    // ============================================
    // INFRASTRUCTURE
    // ============================================
    config: asValue(config),
    logger: asValue(logger),

    cache: asFunction(({ logger }: Cradle): ICacheService =>
      redis
        ? new RedisCacheService(
            redis,
            { keyPrefix: config.SERVICE_NAME, defaultTtlSeconds: config.CACHE_TTL_SECONDS },
            logger
          )
        : new InMemoryCacheService(config.CACHE_TTL_SECONDS)
    ).singleton(),

    queueHealth: asValue(queueHealth),

    eventPublisher: asFunction(({ logger }: Cradle): IEventPublisher => {
      if (!queueConnection) {
        return new InMemoryEventPublisher(logger);
      }
      const publisher = new BasePublisher(queueConnection, logger, {
        exchangeName: config.RABBITMQ_EXCHANGE,
      });
      return new RabbitEventPublisher(publisher, config.SERVICE_NAME);
    }).singleton(),

    serviceRegistry: asFunction(({ logger }: Cradle) =>
      ServiceRegistry.fromConfig(config.SERVICE_REGISTRY, {
        ttlMs: config.SERVICE_REGISTRY_TTL_MS,
        logger,
      })
    ).singleton(),

    inventoryClient: asFunction(({ serviceRegistry, logger }: Cradle) => {
      if (!serviceRegistry.hasService(INVENTORY_SERVICE)) {
        logger.info('No inventory instances registered, availability will use the fallback');
        return null;
      }
      return new InventoryClient({
        resolveAddress: () => serviceRegistry.resolveAddress(INVENTORY_SERVICE),
        timeoutMs: config.INVENTORY_TIMEOUT_MS,
        retryCount: config.INVENTORY_MAX_RETRIES,
        failureThreshold: config.INVENTORY_CB_FAILURE_THRESHOLD,
        resetTimeoutMs: config.INVENTORY_CB_RESET_TIMEOUT_MS,
        // Rotate away from a failing address while another healthy one remains
        onConnectionFailure: (address) => {
          const healthy = serviceRegistry.getInstances(INVENTORY_SERVICE, { healthyOnly: true });
          const failing = healthy.find((candidate) => `${candidate.host}:${candidate.port}` === address);
          if (failing && healthy.length > 1) {
            serviceRegistry.markUnhealthy(failing.id);
          }
        },
      });
    }).singleton(),

    inventoryProvider: asFunction(
      ({ inventoryClient }: Cradle): IInventoryProvider =>
        inventoryClient ?? new UnconfiguredInventoryProvider()
    ).singleton(),

    availabilityCircuitBreaker: asFunction(
      () =>
        new CircuitBreaker({
          name: 'inventory-availability',
          failureThreshold: config.INVENTORY_CB_FAILURE_THRESHOLD,
          resetTimeout: config.INVENTORY_CB_RESET_TIMEOUT_MS,
        })
    ).singleton(),

    healthService: asFunction(({ logger, queueHealth, inventoryClient }: Cradle) => {
      const health = new HealthService(
        {
          serviceName: config.SERVICE_NAME,
          serviceVersion: config.SERVICE_VERSION,
          cacheMs: config.HEALTH_CACHE_MS,
        },
        logger
      );

      health.register('database', db ? pingCheck(checkDatabaseHealth) : notConfiguredCheck('In-memory store'));
      health.register('cache', redis ? pingCheck(checkRedisHealth) : notConfiguredCheck('In-memory cache'));
      health.register('queue', queueCheck(queueHealth));
      const client = inventoryClient;
      health.register(
        INVENTORY_SERVICE,
        client ? downstreamCheck(() => client.getHealth()) : notConfiguredCheck()
      );
      return health;
    }).singleton(),

    httpMetrics: asFunction(() => new HttpMetrics()).singleton(),

    shutdown: asFunction(
      ({ logger }: Cradle) => new GracefulShutdownManager({ timeoutMs: config.SHUTDOWN_TIMEOUT_MS, logger })
    ).singleton(),

    tokenVerifier: asFunction(() => createTokenVerifier(config)).singleton(),

    // ============================================
    // REPOSITORIES
    // ============================================
    productRepository: asFunction(({ cache, logger }: Cradle): IProductRepository => {
      if (!db) {
        return new InMemoryProductRepository();
      }
      return new ProductRepository(db, cache, logger, new TransactionManager(db, cache, logger), {
        queryTimeoutMs: config.DB_QUERY_TIMEOUT,
        cacheTtlSeconds: config.CACHE_TTL_SECONDS,
      });
    }).singleton(),

    // ============================================
    // USE CASES
    // ============================================
    createProductUseCase: asFunction(
      ({ productRepository, eventPublisher, logger }: Cradle) =>
        new CreateProductUseCase(productRepository, eventPublisher, logger)
    ).transient(),

    getProductUseCase: asFunction(
      ({ productRepository, logger }: Cradle) => new GetProductUseCase(productRepository, logger)
    ).transient(),

    listProductsUseCase: asFunction(
      ({ productRepository, logger }: Cradle) => new ListProductsUseCase(productRepository, logger)
    ).transient(),

    updateProductUseCase: asFunction(
      ({ productRepository, eventPublisher, logger }: Cradle) =>
        new UpdateProductUseCase(productRepository, eventPublisher, logger)
    ).transient(),

    deleteProductUseCase: asFunction(
      ({ productRepository, eventPublisher, logger }: Cradle) =>
        new DeleteProductUseCase(productRepository, eventPublisher, logger)
    ).transient(),

    getProductAvailabilityUseCase: asFunction(
      ({ productRepository, inventoryProvider, availabilityCircuitBreaker, logger }: Cradle) =>
        new GetProductAvailabilityUseCase(
          productRepository,
          inventoryProvider,
          availabilityCircuitBreaker,
          logger
        )
    ).transient(),
  });

  if (options.overrides) {
    container.register(options.overrides);
  }

  logger.info(
    { persistence: db ? 'mysql' : 'memory', cache: redis ? 'redis' : 'memory', queue: queueConnection ? 'rabbitmq' : 'memory' },
    'Dependency injection container initialized'
  );
  return container;
}
