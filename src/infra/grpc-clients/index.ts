export {
  ConnectionState,
  DEFAULT_CONFIG,
  createDefaultMetrics,
  type ClientMetrics,
  type ClientHealth,
  type ResilientClientConfig,
  type CallOptions,
  type CacheEntry,
} from './types.js';

export { FallbackCache } from './FallbackCache.js';
export { MetricsTracker } from './MetricsTracker.js';
export {
  ResilientGrpcClient,
  GrpcCallError,
  isRetryableError,
  loadServiceDefinition,
} from './ResilientGrpcClient.js';
export { InventoryClient, type InventoryClientOptions } from './InventoryClient.js';
export { UnconfiguredInventoryProvider } from './UnconfiguredInventoryProvider.js';
