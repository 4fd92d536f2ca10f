/**
 * Base class for downstream gRPC clients.
 *
 * - lazy connection on first call, background reconnect with backoff and jitter
 * - the address is re-resolved on every connection attempt
 * - per-call deadline, retries on transient status codes
 * - a circuit breaker around each logical call
 * - optional last-known-good fallback cache
 *
 * Responses are validated with a zod schema, so subclasses get typed
 * results without trusting the wire.
 */
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { EventEmitter } from 'node:events';
import type { ZodType, ZodTypeDef } from 'zod';
import logger from '../logger/logger.js';
import { CircuitBreaker, CircuitState } from '../../shared/utils/CircuitBreaker.js';
import { ExternalServiceError, ServiceUnavailableError } from '../../shared/errors/index.js';
import {
  ConnectionState,
  DEFAULT_CONFIG,
  type ResilientClientConfig,
  type CallOptions,
  type ClientHealth,
  type ClientMetrics,
} from './types.js';
import { FallbackCache } from './FallbackCache.js';
import { MetricsTracker } from './MetricsTracker.js';

const PROTO_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const RETRYABLE_CODES = new Set<grpc.status>([
  grpc.status.UNAVAILABLE,
  grpc.status.DEADLINE_EXCEEDED,
  grpc.status.RESOURCE_EXHAUSTED,
  grpc.status.ABORTED,
]);

/** Codes that say something about the upstream's health, not the request */
const BREAKER_CODES = new Set<grpc.status>([
  ...RETRYABLE_CODES,
  grpc.status.INTERNAL,
  grpc.status.UNKNOWN,
]);

/**
 * A failed RPC, carrying the gRPC status code
 */
export class GrpcCallError extends ExternalServiceError {
  constructor(
    service: string,
    public readonly grpcCode: grpc.status,
    message: string
  ) {
    super(service, message, { grpcCode });
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof GrpcCallError && RETRYABLE_CODES.has(error.grpcCode);
}

function countsAgainstBreaker(error: unknown): boolean {
  return !(error instanceof GrpcCallError) || BREAKER_CODES.has(error.grpcCode);
}

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

function isGrpcObject(node: GrpcNode): node is grpc.GrpcObject {
  return typeof node === 'object' && !('fileDescriptorProtos' in node);
}

/**
 * Load one service definition out of a .proto file
 */
export function loadServiceDefinition(
  protoPath: string,
  packageName: string,
  serviceClassName: string
): grpc.ServiceDefinition {
  const root = grpc.loadPackageDefinition(protoLoader.loadSync(protoPath, PROTO_OPTIONS));

  let node: grpc.GrpcObject = root;
  for (const part of packageName.split('.')) {
    const next: GrpcNode | undefined = node[part];
    if (next === undefined || !isGrpcObject(next)) {
      throw new Error(`Package '${packageName}' not found in ${protoPath}`);
    }
    node = next;
  }

  const service: GrpcNode | undefined = node[serviceClassName];
  if (typeof service !== 'function') {
    throw new Error(`Service '${serviceClassName}' not found in package '${packageName}'`);
  }
  return service.service;
}

type ResolvedConfig = Required<Omit<ResilientClientConfig, 'circuitBreaker' | 'onConnectionFailure'>> &
  Pick<ResilientClientConfig, 'circuitBreaker' | 'onConnectionFailure'>;

export abstract class ResilientGrpcClient extends EventEmitter {
  protected client: grpc.Client | null = null;
  protected service: grpc.ServiceDefinition | null = null;
  protected readonly config: ResolvedConfig;
  protected state: ConnectionState = ConnectionState.DISCONNECTED;
  protected address: string | null = null;
  protected reconnectAttempts = 0;
  protected reconnectTimer: NodeJS.Timeout | null = null;
  protected monitorTimer: NodeJS.Timeout | null = null;
  protected lastConnectedAt: Date | null = null;
  protected lastErrorAt: Date | null = null;
  protected lastError: string | null = null;
  protected lastLatencyMs = 0;
  protected connectPromise: Promise<void> | null = null;
  protected isShuttingDown = false;

  protected readonly metricsTracker = new MetricsTracker();
  protected readonly fallbackCache: FallbackCache;
  protected readonly circuitBreaker: CircuitBreaker;

  constructor(config: ResilientClientConfig) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fallbackCache = new FallbackCache(
      config.serviceName,
      this.config.maxCacheSize,
      this.config.fallbackCacheTtlMs
    );
    this.circuitBreaker = new CircuitBreaker({
      name: `grpc:${config.serviceName}`,
      ...config.circuitBreaker,
      isFailure: countsAgainstBreaker,
      onStateChange: (_from, to) => {
        if (to === CircuitState.OPEN) {
          this.metricsTracker.recordCircuitBreakerTrip();
          this.emit('circuitBreakerTrip', this.config.serviceName);
        }
      },
    });
  }

  // ============================================
  // PUBLIC API
  // ============================================

  /**
   * Connect if needed. Concurrent callers share one attempt.
   */
  async ensureConnected(): Promise<boolean> {
    if (this.state === ConnectionState.CONNECTED && this.client) {
      return true;
    }

    if (!this.connectPromise) {
      this.connectPromise = this.connect().finally(() => {
        this.connectPromise = null;
      });
    }

    try {
      await this.connectPromise;
    } catch (error) {
      logger.debug({ service: this.config.serviceName, err: error }, 'Connection attempt failed');
    }
    return this.state === ConnectionState.CONNECTED;
  }

  getHealth(): ClientHealth {
    return {
      state: this.state,
      healthy: this.state === ConnectionState.CONNECTED && !this.circuitBreaker.isOpen(),
      address: this.address,
      circuitState: this.circuitBreaker.getState(),
      lastConnectedAt: this.lastConnectedAt,
      lastErrorAt: this.lastErrorAt,
      lastError: this.lastError,
      reconnectAttempts: this.reconnectAttempts,
      latencyMs: this.lastLatencyMs,
      metrics: this.metricsTracker.getMetrics(),
    };
  }

  getMetrics(): ClientMetrics {
    return this.metricsTracker.getMetrics();
  }

  resetMetrics(): void {
    this.metricsTracker.reset();
  }

  clearCache(): void {
    this.fallbackCache.clear();
  }

  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED && this.client !== null;
  }

  /**
   * Close the channel and stop reconnecting
   */
  close(): void {
    this.isShuttingDown = true;
    this.stopTimers();

    if (this.client) {
      this.client.close();
      this.client = null;
    }

    this.state = ConnectionState.DISCONNECTED;
    this.emit('disconnected');
    logger.info({ service: this.config.serviceName }, 'gRPC client closed');
  }

  // ============================================
  // CALLS
  // ============================================

  /**
   * One logical call: breaker, retries, schema validation, fallback.
   */
  protected async call<TResponse>(
    methodName: string,
    request: object,
    schema: ZodType<TResponse, ZodTypeDef, unknown>,
    options: CallOptions = {}
  ): Promise<TResponse> {
    const cacheKey = options.cacheKey ?? `${methodName}:${JSON.stringify(request)}`;
    const useCache = this.config.enableFallbackCache && !options.skipCache;

    this.metricsTracker.recordCallStart();

    try {
      const raw = await this.circuitBreaker.execute(() =>
        this.callWithRetry(methodName, request, options)
      );
      const response = schema.parse(raw);
      if (useCache) {
        this.fallbackCache.set(cacheKey, response);
      }
      return response;
    } catch (error) {
      this.metricsTracker.recordFailure();
      this.lastErrorAt = new Date();
      this.lastError = error instanceof Error ? error.message : String(error);

      if (useCache) {
        const cached = schema.safeParse(this.fallbackCache.get(cacheKey));
        if (cached.success) {
          this.metricsTracker.recordCacheHit();
          logger.warn(
            { service: this.config.serviceName, method: methodName, error: this.lastError },
            'Call failed, returning cached response'
          );
          return cached.data;
        }
        this.metricsTracker.recordCacheMiss();
      }

      throw error;
    }
  }

  private async callWithRetry(
    methodName: string,
    request: object,
    options: CallOptions
  ): Promise<object> {
    const maxAttempts = options.skipRetry ? 1 : this.config.retryCount + 1;

    for (let attempt = 0; ; attempt++) {
      try {
        const connected = await this.ensureConnected();
        if (!connected) {
          throw new ServiceUnavailableError(this.config.serviceName);
        }

        const startTime = Date.now();
        const response = await this.executeCall(methodName, request, options);
        this.lastLatencyMs = Date.now() - startTime;
        this.metricsTracker.recordSuccess(this.lastLatencyMs);
        return response;
      } catch (error) {
        if (attempt + 1 >= maxAttempts || !isRetryableError(error)) {
          throw error;
        }

        this.metricsTracker.recordRetry();
        if (error instanceof GrpcCallError && error.grpcCode === grpc.status.UNAVAILABLE) {
          this.handleConnectionLost();
        }

        const delay = this.config.retryDelayMs * Math.pow(2, attempt);
        logger.warn(
          {
            service: this.config.serviceName,
            method: methodName,
            attempt: attempt + 1,
            maxAttempts,
            delay,
            err: error,
          },
          'gRPC call failed, retrying'
        );
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  /**
   * A single unary RPC on the current channel
   */
  protected executeCall(methodName: string, request: object, options: CallOptions): Promise<object> {
    return new Promise((resolve, reject) => {
      const client = this.client;
      const method = this.service?.[methodName];
      if (!client || !method) {
        reject(new ServiceUnavailableError(this.config.serviceName, `${this.config.serviceName}.${methodName} is not available`));
        return;
      }

      const metadata = new grpc.Metadata();
      for (const [key, value] of Object.entries(options.metadata ?? {})) {
        metadata.set(key, value);
      }

      const deadline = new Date(Date.now() + (options.timeoutMs ?? this.config.timeoutMs));

      client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        metadata,
        { deadline },
        (error, response) => {
          if (error) {
            reject(new GrpcCallError(this.config.serviceName, error.code, error.details || error.message));
          } else if (response === undefined) {
            reject(new GrpcCallError(this.config.serviceName, grpc.status.INTERNAL, 'Empty response'));
          } else {
            resolve(response);
          }
        }
      );
    });
  }

  // ============================================
  // CONNECTION MANAGEMENT
  // ============================================

  private async connect(): Promise<void> {
    if (this.isShuttingDown) {
      throw new Error('Client is shutting down');
    }

    this.state =
      this.reconnectAttempts > 0 ? ConnectionState.RECONNECTING : ConnectionState.CONNECTING;
    this.emit('connecting');

    let address: string | null = null;
    let client: grpc.Client | null = null;

    try {
      this.service ??= loadServiceDefinition(
        this.config.protoPath,
        this.config.packageName,
        this.config.serviceClassName
      );

      address = this.config.resolveAddress();
      const credentials = this.config.useTls
        ? grpc.credentials.createSsl()
        : grpc.credentials.createInsecure();

      client = new grpc.Client(address, credentials, {
        'grpc.keepalive_time_ms': this.config.keepaliveTimeMs,
        'grpc.keepalive_timeout_ms': this.config.keepaliveTimeoutMs,
        'grpc.keepalive_permit_without_calls': 1,
      });

      await this.waitForReady(client);

      this.client = client;
      this.address = address;
      this.state = ConnectionState.CONNECTED;
      this.lastConnectedAt = new Date();
      this.reconnectAttempts = 0;
      this.lastError = null;
      this.emit('connected', address);

      logger.info({ service: this.config.serviceName, address }, 'gRPC client connected');
      this.monitorConnection();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      client?.close();
      this.lastErrorAt = new Date();
      this.lastError = failure.message;
      this.state = ConnectionState.DISCONNECTED;

      if (address) {
        this.config.onConnectionFailure?.(address, failure);
      }
      this.emit('connectionFailed', failure);

      logger.warn(
        {
          service: this.config.serviceName,
          address,
          error: failure.message,
          reconnectAttempts: this.reconnectAttempts,
        },
        'gRPC client connection failed, will retry in background'
      );

      this.scheduleReconnect();
      throw failure;
    }
  }

  private waitForReady(client: grpc.Client): Promise<void> {
    return new Promise((resolve, reject) => {
      const deadline = new Date(Date.now() + this.config.timeoutMs);
      client.waitForReady(deadline, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private monitorConnection(): void {
    const client = this.client;
    if (!client) return;

    const channel = client.getChannel();
    const check = (): void => {
      this.monitorTimer = null;
      if (this.isShuttingDown || this.client !== client) return;

      const connectivity = channel.getConnectivityState(false);
      if (
        connectivity === grpc.connectivityState.TRANSIENT_FAILURE ||
        connectivity === grpc.connectivityState.SHUTDOWN
      ) {
        this.handleConnectionLost();
        return;
      }
      this.schedule(check, connectivity === grpc.connectivityState.READY ? 5000 : 1000);
    };

    this.schedule(check, 5000);
  }

  private schedule(fn: () => void, delayMs: number): void {
    this.monitorTimer = setTimeout(fn, delayMs);
    this.monitorTimer.unref();
  }

  private handleConnectionLost(): void {
    if (this.state !== ConnectionState.CONNECTED) {
      return;
    }

    this.state = ConnectionState.DISCONNECTED;
    this.emit('disconnected');
    logger.warn({ service: this.config.serviceName, address: this.address }, 'gRPC connection lost, reconnecting');

    this.client?.close();
    this.client = null;
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer) {
      return;
    }

    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      logger.error(
        { service: this.config.serviceName, attempts: this.reconnectAttempts },
        'Max reconnect attempts reached, giving up'
      );
      return;
    }

    const baseDelay = this.config.initialReconnectDelayMs * Math.pow(2, this.reconnectAttempts);
    const delay = Math.min(baseDelay + Math.random() * 1000, this.config.maxReconnectDelayMs);
    this.reconnectAttempts++;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      // connect() schedules the next attempt itself when it fails
      this.ensureConnected().catch((error: unknown) => {
        logger.debug({ service: this.config.serviceName, err: error }, 'Reconnect failed');
      });
    }, delay);
    this.reconnectTimer.unref();
  }

  private stopTimers(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.monitorTimer) {
      clearTimeout(this.monitorTimer);
      this.monitorTimer = null;
    }
  }
}
