import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import fastJwt from 'fast-jwt';
import type { AwilixContainer } from 'awilix';
import { registerDependencies, TOKENS, type Cradle } from '../../src/container.js';
import { buildGrpcServer, PRODUCT_SERVICE_NAME } from '../../src/grpc/server.js';
import {
  createHealthServiceHandlers,
  createTokenVerifier,
  extractContext,
  requireGrpcRoles,
  ServingStatus,
} from '../../src/grpc/index.js';
import { protoPath } from '../../src/grpc/protos/index.js';
import { InventoryClient, loadServiceDefinition } from '../../src/infra/grpc-clients/index.js';
import { RequestContext } from '../../src/shared/context/RequestContext.js';
import logger from '../../src/infra/logger/logger.js';
import config from '../../src/config/env.js';
import { ROLES } from '../../src/app/middlewares/index.js';
import { AppError } from '../../src/shared/errors/index.js';

const signToken = fastJwt.createSigner({
  key: config.JWT_SECRET ?? 'test-secret-unset',
  algorithm: 'HS256',
  iss: config.JWT_ISSUER,
});

function bearer(token: string): grpc.Metadata {
  const metadata = new grpc.Metadata();
  metadata.set('authorization', `Bearer ${token}`);
  return metadata;
}

const writer = () => bearer(signToken({ sub: 'writer-1', roles: [ROLES.CATALOG_WRITE] }));

function bind(server: grpc.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync('127.0.0.1:0', grpc.ServerCredentials.createInsecure(), (error, port) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(port);
    });
  });
}

function shutdown(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => server.tryShutdown(() => resolve()));
}

/** Minimal untyped caller for one service definition */
function createCaller(address: string, definition: grpc.ServiceDefinition) {
  const client = new grpc.Client(address, grpc.credentials.createInsecure());

  const call = (method: string, request: object, metadata = new grpc.Metadata()): Promise<unknown> =>
    new Promise((resolve, reject) => {
      const rpc = definition[method];
      if (!rpc) {
        reject(new Error(`Unknown method ${method}`));
        return;
      }
      client.makeUnaryRequest(
        rpc.path,
        rpc.requestSerialize,
        rpc.responseDeserialize,
        request,
        metadata,
        { deadline: new Date(Date.now() + 5000) },
        (error, response) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(response);
        }
      );
    });

  return { call, close: () => client.close() };
}

describe('gRPC ProductService', () => {
  let container: AwilixContainer<Cradle>;
  let server: grpc.Server;
  let products: ReturnType<typeof createCaller>;
  let health: ReturnType<typeof createCaller>;

  beforeAll(async () => {
    container = registerDependencies();
    server = buildGrpcServer(container);
    const address = `127.0.0.1:${await bind(server)}`;

    products = createCaller(address, loadServiceDefinition(protoPath('catalog.proto'), 'catalog.v1', 'ProductService'));
    health = createCaller(address, loadServiceDefinition(protoPath('health.proto'), 'grpc.health.v1', 'Health'));
  });

  afterAll(async () => {
    products.close();
    health.close();
    await shutdown(server);
  });

  it('should create a product and report 201', async () => {
    const response = await products.call('CreateProduct', { name: '  Standing Desk ' }, writer());

    expect(response).toMatchObject({
      success: true,
      message: 'Product created',
      status_code: 201,
      product: { id: 1, name: 'Standing Desk' },
    });
  });

  it('should fetch a product by id', async () => {
    const response = await products.call('GetProduct', { id: 1 });

    expect(response).toMatchObject({
      success: true,
      message: 'OK',
      status_code: 200,
      product: { id: 1, name: 'Standing Desk', created_at: expect.any(String), updated_at: expect.any(String) },
    });
  });

  it('should answer a missing product in-band with 404', async () => {
    const response = await products.call('GetProduct', { id: 42 });

    expect(response).toMatchObject({
      success: false,
      message: "Product with ID '42' not found",
      error: "Product with ID '42' not found",
      status_code: 404,
    });
  });

  it('should reject duplicate and blank names in-band', async () => {
    expect(await products.call('CreateProduct', { name: 'standing desk' }, writer())).toMatchObject({
      success: false,
      status_code: 409,
      message: 'Product with name "standing desk" already exists',
    });
    expect(await products.call('CreateProduct', { name: '   ' }, writer())).toMatchObject({
      success: false,
      status_code: 400,
      message: 'Product name must not be blank',
    });
  });

  it('should list with defaults when paging fields are unset', async () => {
    await products.call('CreateProduct', { name: 'Monitor Arm' }, writer());

    const response = await products.call('ListProducts', {});

    expect(response).toMatchObject({
      success: true,
      status_code: 200,
      total: 2,
      limit: 20,
      offset: 0,
      items: [{ id: 1 }, { id: 2, name: 'Monitor Arm' }],
    });
  });

  it('should answer unauthenticated writes in-band with 401', async () => {
    expect(await products.call('CreateProduct', { name: 'Lamp' })).toMatchObject({
      success: false,
      message: 'Authentication required',
      error: 'Authentication required',
      status_code: 401,
    });
    expect(await products.call('CreateProduct', { name: 'Lamp' }, bearer('not-a-jwt'))).toMatchObject({
      success: false,
      message: 'Invalid or expired token',
      status_code: 401,
    });
  });

  it('should answer writes without a write role in-band with 403', async () => {
    const reader = bearer(signToken({ sub: 'reader-1', roles: [] }));

    expect(await products.call('CreateProduct', { name: 'Lamp' }, reader)).toMatchObject({
      success: false,
      message: 'Insufficient permissions',
      status_code: 403,
    });
  });

  it('should page through products', async () => {
    const response = await products.call('ListProducts', { limit: 1, offset: 1 });

    expect(response).toMatchObject({ total: 2, limit: 1, offset: 1, items: [{ id: 2 }] });
  });

  it('should serve health for the server and the product service', async () => {
    expect(await health.call('Check', { service: '' })).toEqual({ status: 'SERVING' });
    expect(await health.call('Check', { service: PRODUCT_SERVICE_NAME })).toEqual({ status: 'SERVING' });
    expect(await health.call('Check', { service: 'unknown.Service' })).toEqual({ status: 'SERVICE_UNKNOWN' });
  });

  it('should report NOT_SERVING once shutdown has begun', async () => {
    const draining = { value: false };
    const { resolveStatus } = createHealthServiceHandlers({
      healthService: container.resolve(TOKENS.HealthService),
      logger,
      services: [PRODUCT_SERVICE_NAME],
      isDraining: () => draining.value,
    });

    expect(await resolveStatus(PRODUCT_SERVICE_NAME)).toBe(ServingStatus.SERVING);
    draining.value = true;
    expect(await resolveStatus(PRODUCT_SERVICE_NAME)).toBe(ServingStatus.NOT_SERVING);
  });
});

describe('requireGrpcRoles', () => {
  const verifier = createTokenVerifier(config);

  it('should pass a caller holding one of the roles and return the payload', () => {
    const admin = bearer(signToken({ sub: 'admin-1', roles: [ROLES.ADMIN] }));

    expect(requireGrpcRoles(verifier, logger, ROLES.CATALOG_WRITE, ROLES.ADMIN)(admin)).toMatchObject({
      sub: 'admin-1',
      roles: ['admin'],
    });
  });

  it('should reject a token from another issuer', () => {
    const foreign = fastJwt.createSigner({ key: config.JWT_SECRET ?? 'test-secret-unset', iss: 'someone-else' });
    const metadata = bearer(foreign({ sub: 'admin-1', roles: [ROLES.ADMIN] }));

    expect(() => requireGrpcRoles(verifier, logger, ROLES.ADMIN)(metadata)).toThrow('Invalid or expired token');
  });

  it('should refuse every call with 503 when no secret is configured', () => {
    const check = requireGrpcRoles(createTokenVerifier({ JWT_SECRET: undefined, JWT_ISSUER: 'catalog-service' }), logger);

    let thrown: unknown;
    try {
      check(writer());
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AppError);
    expect(thrown).toMatchObject({ statusCode: 503, code: 'AUTH_NOT_CONFIGURED' });
  });
});

describe('extractContext', () => {
  it('should prefer the correlation id, then the trace id', () => {
    const metadata = new grpc.Metadata();
    metadata.set('x-trace-id', 'trace-1');
    expect(extractContext(metadata)).toEqual({ correlationId: 'trace-1', traceId: 'trace-1' });

    metadata.set('x-correlation-id', 'corr-1');
    expect(extractContext(metadata)).toEqual({ correlationId: 'corr-1', traceId: 'trace-1' });
  });

  it('should generate a correlation id when none was sent', () => {
    const context = extractContext(new grpc.Metadata());

    expect(context.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(context.traceId).toBeUndefined();
  });
});

interface StockRequest {
  product_id: number;
}

interface StockResponse {
  product_id: number;
  quantity: number;
}

describe('InventoryClient against a loopback inventory server', () => {
  let server: grpc.Server;
  let client: InventoryClient;
  const seenCorrelationIds: string[] = [];

  beforeAll(async () => {
    server = new grpc.Server();
    server.addService(loadServiceDefinition(protoPath('inventory.proto'), 'inventory.v1', 'InventoryService'), {
      GetStockLevel: (
        call: grpc.ServerUnaryCall<StockRequest, StockResponse>,
        callback: grpc.sendUnaryData<StockResponse>
      ) => {
        const correlationId = call.metadata.get('x-correlation-id')[0];
        if (typeof correlationId === 'string') {
          seenCorrelationIds.push(correlationId);
        }
        if (call.request.product_id === 404) {
          callback({ code: grpc.status.NOT_FOUND, details: 'unknown product' });
          return;
        }
        callback(null, { product_id: call.request.product_id, quantity: call.request.product_id * 2 });
      },
    });
    const port = await bind(server);

    client = new InventoryClient({
      resolveAddress: () => `127.0.0.1:${port}`,
      timeoutMs: 2000,
      retryCount: 0,
      failureThreshold: 5,
      resetTimeoutMs: 1000,
    });
  });

  afterAll(async () => {
    client.close();
    await shutdown(server);
  });

  it('should connect lazily and return the stock level', async () => {
    const stock = await RequestContext.runAsync({ correlationId: 'corr-inv' }, () => client.getStockLevel(6));

    expect(stock).toEqual({ productId: 6, quantity: 12 });
    expect(seenCorrelationIds).toContain('corr-inv');
    expect(client.getHealth()).toMatchObject({ state: 'CONNECTED', healthy: true, circuitState: 'CLOSED' });
  });

  it('should surface upstream status codes', async () => {
    await expect(client.getStockLevel(404)).rejects.toMatchObject({
      grpcCode: grpc.status.NOT_FOUND,
      message: 'inventory: unknown product',
    });
  });
});
