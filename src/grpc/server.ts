/**
 * gRPC Server Setup
 * Serves catalog.v1.ProductService and grpc.health.v1.Health
 */
import * as grpc from '@grpc/grpc-js';
import type { AwilixContainer } from 'awilix';
import { TOKENS, type Cradle } from '../container.js';
import { loadServiceDefinition } from '../infra/grpc-clients/index.js';
import { protoPath } from './protos/index.js';
import { createProductServiceHandlers } from './handlers/productHandler.js';
import { createHealthServiceHandlers } from './handlers/healthHandler.js';
import { withRequestContext } from './interceptors/contextInterceptor.js';

export const PRODUCT_SERVICE_NAME = 'catalog.v1.ProductService';

let server: grpc.Server | null = null;

/**
 * Build a server with every service registered, without binding it
 */
export function buildGrpcServer(container: AwilixContainer<Cradle>): grpc.Server {
  const logger = container.resolve(TOKENS.Logger);
  const shutdown = container.resolve(TOKENS.Shutdown);

  const productDefinition = loadServiceDefinition(protoPath('catalog.proto'), 'catalog.v1', 'ProductService');
  const healthDefinition = loadServiceDefinition(protoPath('health.proto'), 'grpc.health.v1', 'Health');

  const products = createProductServiceHandlers(container);
  const health = createHealthServiceHandlers({
    healthService: container.resolve(TOKENS.HealthService),
    logger,
    services: [PRODUCT_SERVICE_NAME],
    isDraining: () => shutdown.isInProgress(),
  });

  const grpcServer = new grpc.Server();

  grpcServer.addService(productDefinition, {
    GetProduct: withRequestContext('GetProduct', logger, products.GetProduct),
    ListProducts: withRequestContext('ListProducts', logger, products.ListProducts),
    CreateProduct: withRequestContext('CreateProduct', logger, products.CreateProduct),
  });

  // Health checks are frequent; they skip the context wrapper
  grpcServer.addService(healthDefinition, {
    Check: health.Check,
    Watch: health.Watch,
  });

  return grpcServer;
}

/**
 * Start gRPC server on specified port
 */
export async function startGrpcServer(container: AwilixContainer<Cradle>, port: number): Promise<grpc.Server> {
  const logger = container.resolve(TOKENS.Logger);
  const grpcServer = buildGrpcServer(container);

  return new Promise((resolve, reject) => {
    grpcServer.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error) {
        logger.error({ err: error, port }, 'Failed to bind gRPC server');
        reject(error);
        return;
      }

      server = grpcServer;
      logger.info({ port: boundPort }, 'gRPC server bound successfully');
      resolve(grpcServer);
    });
  });
}

/**
 * Stop gRPC server gracefully, forcing it when in-flight calls refuse to finish
 */
export async function stopGrpcServer(): Promise<void> {
  const current = server;
  if (!current) {
    return;
  }

  await new Promise<void>((resolve) => {
    current.tryShutdown((error) => {
      if (error) {
        current.forceShutdown();
      }
      resolve();
    });
  });
  server = null;
}
