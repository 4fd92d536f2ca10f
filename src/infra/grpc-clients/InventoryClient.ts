import { z } from 'zod';
import { ResilientGrpcClient } from './ResilientGrpcClient.js';
import { protoPath } from '../../grpc/protos/index.js';
import type { IInventoryProvider, StockLevel } from '../../application/providers/index.js';
import { RequestContext } from '../../shared/context/RequestContext.js';

const stockLevelResponseSchema = z.object({
  product_id: z.number().int(),
  quantity: z.number().int().min(0),
});

export interface InventoryClientOptions {
  resolveAddress: () => string;
  timeoutMs: number;
  retryCount: number;
  failureThreshold: number;
  resetTimeoutMs: number;
  onConnectionFailure?: (address: string, error: Error) => void;
}

/**
 * gRPC adapter for `inventory.v1.InventoryService`
 */
export class InventoryClient extends ResilientGrpcClient implements IInventoryProvider {
  constructor(options: InventoryClientOptions) {
    super({
      serviceName: 'inventory',
      resolveAddress: options.resolveAddress,
      protoPath: protoPath('inventory.proto'),
      packageName: 'inventory.v1',
      serviceClassName: 'InventoryService',
      timeoutMs: options.timeoutMs,
      retryCount: options.retryCount,
      enableFallbackCache: true,
      fallbackCacheTtlMs: 30000,
      maxCacheSize: 500,
      circuitBreaker: {
        failureThreshold: options.failureThreshold,
        resetTimeout: options.resetTimeoutMs,
        successThreshold: 1,
      },
      onConnectionFailure: options.onConnectionFailure,
    });
  }

  async getStockLevel(productId: number): Promise<StockLevel> {
    const correlationId = RequestContext.getCorrelationId();
    const response = await this.call(
      'GetStockLevel',
      { product_id: productId },
      stockLevelResponseSchema,
      {
        cacheKey: `stock:${productId}`,
        metadata: correlationId ? { 'x-correlation-id': correlationId } : undefined,
      }
    );
    return { productId: response.product_id, quantity: response.quantity };
  }
}
