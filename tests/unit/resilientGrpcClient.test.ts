import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import { z } from 'zod';
import {
  FallbackCache,
  GrpcCallError,
  InventoryClient,
  MetricsTracker,
  ResilientGrpcClient,
  UnconfiguredInventoryProvider,
  isRetryableError,
  type CallOptions,
  type InventoryClientOptions,
} from '../../src/infra/grpc-clients/index.js';
import { protoPath } from '../../src/grpc/protos/index.js';
import { CircuitBreakerOpenError, ServiceUnavailableError } from '../../src/shared/errors/index.js';
import { RequestContext } from '../../src/shared/context/RequestContext.js';

type ExecuteCall = (methodName: string, request: object, options: CallOptions) => Promise<object>;

const stockSchema = z.object({ product_id: z.number(), quantity: z.number() });

/** Stays "connected" and answers from a mock instead of a channel */
class StubClient extends ResilientGrpcClient {
  readonly execute: Mock<ExecuteCall> = vi.fn<ExecuteCall>();

  constructor() {
    super({
      serviceName: 'stub',
      resolveAddress: () => 'localhost:1',
      protoPath: protoPath('inventory.proto'),
      packageName: 'inventory.v1',
      serviceClassName: 'InventoryService',
      retryCount: 2,
      retryDelayMs: 1,
      enableFallbackCache: true,
      circuitBreaker: { failureThreshold: 3, resetTimeout: 60000 },
    });
  }

  override async ensureConnected(): Promise<boolean> {
    return true;
  }

  protected override executeCall(methodName: string, request: object, options: CallOptions): Promise<object> {
    return this.execute(methodName, request, options);
  }

  stock(productId: number, options: CallOptions = {}) {
    return this.call('GetStockLevel', { product_id: productId }, stockSchema, options);
  }
}

const callError = (code: grpc.status) => new GrpcCallError('stub', code, `code ${code}`);

describe('ResilientGrpcClient', () => {
  let client: StubClient;

  beforeEach(() => {
    client = new StubClient();
  });

  it('should validate and return the response', async () => {
    client.execute.mockResolvedValue({ product_id: 1, quantity: 4 });

    await expect(client.stock(1)).resolves.toEqual({ product_id: 1, quantity: 4 });
    expect(client.getMetrics()).toMatchObject({ totalCalls: 1, successfulCalls: 1, failedCalls: 0 });
  });

  it('should retry retryable codes', async () => {
    client.execute
      .mockRejectedValueOnce(callError(grpc.status.DEADLINE_EXCEEDED))
      .mockResolvedValue({ product_id: 1, quantity: 4 });

    await expect(client.stock(1)).resolves.toEqual({ product_id: 1, quantity: 4 });
    expect(client.execute).toHaveBeenCalledTimes(2);
    expect(client.getMetrics().totalRetries).toBe(1);
  });

  it('should give up after retryCount retries', async () => {
    client.execute.mockRejectedValue(callError(grpc.status.RESOURCE_EXHAUSTED));

    await expect(client.stock(1, { skipCache: true })).rejects.toBeInstanceOf(GrpcCallError);
    expect(client.execute).toHaveBeenCalledTimes(3);
  });

  it('should not retry when skipRetry is set', async () => {
    client.execute.mockRejectedValue(callError(grpc.status.DEADLINE_EXCEEDED));

    await expect(client.stock(1, { skipRetry: true })).rejects.toThrow(GrpcCallError);
    expect(client.execute).toHaveBeenCalledTimes(1);
  });

  it('should not retry or trip the breaker on request errors', async () => {
    client.execute.mockRejectedValue(callError(grpc.status.INVALID_ARGUMENT));

    for (let i = 0; i < 5; i++) {
      await expect(client.stock(1)).rejects.toThrow(GrpcCallError);
    }
    expect(client.execute).toHaveBeenCalledTimes(5);
    expect(client.getHealth().circuitState).toBe('CLOSED');
  });

  it('should open the circuit on upstream failures and fail fast', async () => {
    const trips = vi.fn();
    client.on('circuitBreakerTrip', trips);
    client.execute.mockRejectedValue(callError(grpc.status.INTERNAL));

    for (let i = 0; i < 3; i++) {
      await expect(client.stock(1)).rejects.toThrow(GrpcCallError);
    }
    await expect(client.stock(1)).rejects.toBeInstanceOf(CircuitBreakerOpenError);

    expect(client.execute).toHaveBeenCalledTimes(3);
    expect(trips).toHaveBeenCalledWith('stub');
    expect(client.getHealth()).toMatchObject({ circuitState: 'OPEN', healthy: false, lastError: expect.any(String) });
    expect(client.getMetrics().circuitBreakerTrips).toBe(1);
  });

  it('should serve the last good response when the call fails', async () => {
    client.execute.mockResolvedValueOnce({ product_id: 1, quantity: 9 });
    await client.stock(1, { cacheKey: 'stock:1' });

    client.execute.mockRejectedValue(callError(grpc.status.INTERNAL));

    await expect(client.stock(1, { cacheKey: 'stock:1' })).resolves.toEqual({ product_id: 1, quantity: 9 });
    expect(client.getMetrics()).toMatchObject({ cacheHits: 1, failedCalls: 1 });
  });

  it('should count a miss when nothing is cached', async () => {
    client.execute.mockRejectedValue(callError(grpc.status.INTERNAL));

    await expect(client.stock(2, { cacheKey: 'stock:2' })).rejects.toThrow(GrpcCallError);
    expect(client.getMetrics().cacheMisses).toBe(1);
  });

  it('should reject a response that fails the schema', async () => {
    client.execute.mockResolvedValue({ product_id: 'one' });

    await expect(client.stock(1, { skipCache: true })).rejects.toThrow(z.ZodError);
  });

  it('should classify retryable errors by gRPC code', () => {
    expect(isRetryableError(callError(grpc.status.UNAVAILABLE))).toBe(true);
    expect(isRetryableError(callError(grpc.status.NOT_FOUND))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('InventoryClient', () => {
  class TestInventoryClient extends InventoryClient {
    readonly execute: Mock<ExecuteCall> = vi.fn<ExecuteCall>();

    override async ensureConnected(): Promise<boolean> {
      return true;
    }

    protected override executeCall(methodName: string, request: object, options: CallOptions): Promise<object> {
      return this.execute(methodName, request, options);
    }
  }

  const options: InventoryClientOptions = {
    resolveAddress: () => 'localhost:1',
    timeoutMs: 100,
    retryCount: 0,
    failureThreshold: 5,
    resetTimeoutMs: 1000,
  };

  it('should map the stock response and forward the correlation id', async () => {
    const client = new TestInventoryClient(options);
    client.execute.mockResolvedValue({ product_id: 7, quantity: 3 });

    const stock = await RequestContext.runAsync({ correlationId: 'corr-7' }, () => client.getStockLevel(7));

    expect(stock).toEqual({ productId: 7, quantity: 3 });
    expect(client.execute).toHaveBeenCalledWith(
      'GetStockLevel',
      { product_id: 7 },
      expect.objectContaining({ cacheKey: 'stock:7', metadata: { 'x-correlation-id': 'corr-7' } })
    );
  });

  it('should reject a negative quantity', async () => {
    const client = new TestInventoryClient(options);
    client.execute.mockResolvedValue({ product_id: 7, quantity: -1 });

    await expect(client.getStockLevel(7)).rejects.toThrow(z.ZodError);
  });
});

describe('UnconfiguredInventoryProvider', () => {
  it('should always be unavailable', async () => {
    await expect(new UnconfiguredInventoryProvider().getStockLevel(1)).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
  });
});

describe('FallbackCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should serve stale entries and drop them on cleanup', () => {
    const cache = new FallbackCache<number>('test', 10, 1000);
    cache.set('a', 1);

    vi.advanceTimersByTime(1001);

    expect(cache.isStale('a')).toBe(true);
    expect(cache.get('a')).toBe(1);
    expect(cache.cleanup()).toBe(1);
    expect(cache.get('a')).toBeNull();
  });

  it('should evict the oldest insertion when full', () => {
    const cache = new FallbackCache<number>('test', 2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 3);
    cache.set('c', 4);

    expect(cache.getStats()).toEqual({ size: 2, maxSize: 2, keys: ['a', 'c'] });
  });
});

describe('MetricsTracker', () => {
  it('should aggregate latency and rates', () => {
    const tracker = new MetricsTracker();
    tracker.recordCallStart();
    tracker.recordSuccess(10);
    tracker.recordCallStart();
    tracker.recordSuccess(30);
    tracker.recordCallStart();
    tracker.recordFailure();
    tracker.recordCacheHit();
    tracker.recordCacheMiss();
    tracker.recordCacheMiss();

    expect(tracker.getMetrics()).toMatchObject({
      totalCalls: 3,
      successfulCalls: 2,
      failedCalls: 1,
      avgLatencyMs: 20,
      minLatencyMs: 10,
      maxLatencyMs: 30,
    });
    expect(tracker.getSuccessRate()).toBe(67);
    expect(tracker.getCacheHitRate()).toBe(33);
  });

  it('should start from a clean slate', () => {
    const tracker = new MetricsTracker();

    expect(tracker.getSuccessRate()).toBe(100);
    expect(tracker.getCacheHitRate()).toBe(0);
    expect(tracker.getMetrics().minLatencyMs).toBeNull();
  });
});
