/**
 * Types for the resilient gRPC client layer
 */

export enum ConnectionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  RECONNECTING = 'RECONNECTING',
}

export interface ClientMetrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  totalRetries: number;
  circuitBreakerTrips: number;
  cacheHits: number;
  cacheMisses: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
  /** null until the first successful call */
  minLatencyMs: number | null;
  lastResetAt: Date;
}

export interface ClientHealth {
  state: ConnectionState;
  healthy: boolean;
  address: string | null;
  circuitState: string;
  lastConnectedAt: Date | null;
  lastErrorAt: Date | null;
  lastError: string | null;
  reconnectAttempts: number;
  latencyMs: number;
  metrics: ClientMetrics;
}

export interface ResilientClientConfig {
  /** Logical service name, also the registry key */
  serviceName: string;
  /**
   * Picks the address (host:port) for each connection attempt, so
   * reconnects follow the service registry
   */
  resolveAddress: () => string;
  /** Absolute path to the .proto file */
  protoPath: string;
  /** Package name in the proto file, e.g. `inventory.v1` */
  packageName: string;
  serviceClassName: string;
  /** Per-call deadline in ms (default: 5000) */
  timeoutMs?: number;
  /** Retries after the first attempt (default: 3) */
  retryCount?: number;
  retryDelayMs?: number;
  maxReconnectAttempts?: number;
  maxReconnectDelayMs?: number;
  initialReconnectDelayMs?: number;
  useTls?: boolean;
  keepaliveTimeMs?: number;
  keepaliveTimeoutMs?: number;
  /** Serve the last good response when the service is down (default: false) */
  enableFallbackCache?: boolean;
  fallbackCacheTtlMs?: number;
  maxCacheSize?: number;
  circuitBreaker?: {
    failureThreshold?: number;
    resetTimeout?: number;
    successThreshold?: number;
  };
  /** Told about addresses that refused a connection */
  onConnectionFailure?: (address: string, error: Error) => void;
}

export interface CallOptions {
  timeoutMs?: number;
  skipRetry?: boolean;
  /** Fallback cache key; defaults to method name plus serialized request */
  cacheKey?: string;
  skipCache?: boolean;
  /** Extra metadata, e.g. correlation ids */
  metadata?: Record<string, string>;
}

export interface CacheEntry<T = unknown> {
  data: T;
  timestamp: number;
  ttl: number;
}

export const DEFAULT_CONFIG = {
  timeoutMs: 5000,
  retryCount: 3,
  retryDelayMs: 200,
  maxReconnectAttempts: Infinity,
  maxReconnectDelayMs: 30000,
  initialReconnectDelayMs: 1000,
  useTls: false,
  keepaliveTimeMs: 30000,
  keepaliveTimeoutMs: 10000,
  enableFallbackCache: false,
  fallbackCacheTtlMs: 60000,
  maxCacheSize: 100,
} as const;

export function createDefaultMetrics(): ClientMetrics {
  return {
    totalCalls: 0,
    successfulCalls: 0,
    failedCalls: 0,
    totalRetries: 0,
    circuitBreakerTrips: 0,
    cacheHits: 0,
    cacheMisses: 0,
    avgLatencyMs: 0,
    maxLatencyMs: 0,
    minLatencyMs: null,
    lastResetAt: new Date(),
  };
}
