/**
 * Base Publisher for RabbitMQ
 *
 * Publishes persistent JSON messages on a durable exchange through a confirm
 * channel. Failed publishes are retried with backoff; repeated failures open
 * a circuit breaker so callers fail fast while the broker is down.
 */
import type { Options } from 'amqplib';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../../logger/logger.js';
import { CircuitBreaker, type CircuitState } from '../../../shared/utils/CircuitBreaker.js';
import { retryOnError } from '../../../shared/utils/RetryLogic.js';
import { CircuitBreakerOpenError } from '../../../shared/errors/index.js';

/** The slice of an amqplib ConfirmChannel a publisher needs */
export interface ConfirmPublishChannel {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: Options.Publish,
    callback: (err: unknown) => void
  ): boolean;
}

export interface ConfirmChannelProvider {
  getConfirmChannel(): Promise<ConfirmPublishChannel>;
}

export interface PublisherOptions {
  exchangeName: string;
  exchangeType?: 'direct' | 'topic' | 'fanout' | 'headers';
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  initialRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  circuitBreakerThreshold?: number;
  circuitBreakerResetMs?: number;
}

export interface PublishOptions {
  correlationId?: string;
  messageId?: string;
  headers?: Record<string, unknown>;
  persistent?: boolean;
  expiration?: string;
}

export interface PublishResult {
  messageId: string;
  correlationId: string;
}

export interface PublisherStats {
  exchangeName: string;
  isInitialized: boolean;
  circuitBreakerState: CircuitState;
}

export class BasePublisher {
  private channel: ConfirmPublishChannel | null = null;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly options: Required<PublisherOptions>;

  constructor(
    protected readonly channels: ConfirmChannelProvider,
    protected readonly logger: Logger,
    options: PublisherOptions
  ) {
    this.options = {
      exchangeType: 'topic',
      maxRetries: 3,
      initialRetryDelayMs: 100,
      maxRetryDelayMs: 5000,
      circuitBreakerThreshold: 5,
      circuitBreakerResetMs: 30000,
      ...options,
    };

    this.circuitBreaker = new CircuitBreaker({
      name: `publisher-${this.options.exchangeName}`,
      failureThreshold: this.options.circuitBreakerThreshold,
      resetTimeout: this.options.circuitBreakerResetMs,
      successThreshold: 1,
    });
  }

  /**
   * Assert the exchange on a fresh confirm channel
   */
  async initialize(): Promise<ConfirmPublishChannel> {
    if (this.channel) {
      return this.channel;
    }

    const channel = await this.channels.getConfirmChannel();
    await channel.assertExchange(this.options.exchangeName, this.options.exchangeType, {
      durable: true,
    });

    this.channel = channel;
    this.logger.info(
      { exchange: this.options.exchangeName, type: this.options.exchangeType },
      'Publisher exchange initialized'
    );
    return channel;
  }

  /**
   * Publish and wait for the broker to confirm. Rejects once retries are
   * exhausted or while the circuit is open.
   */
  async publish(
    routingKey: string,
    message: object,
    options: PublishOptions = {}
  ): Promise<PublishResult> {
    const messageId = options.messageId ?? randomUUID();
    const correlationId = options.correlationId ?? randomUUID();
    const exchange = this.options.exchangeName;

    try {
      await retryOnError(
        () =>
          this.circuitBreaker.execute(() =>
            this.doPublish(routingKey, message, { ...options, messageId, correlationId })
          ),
        (error) => !(error instanceof CircuitBreakerOpenError),
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.initialRetryDelayMs,
          maxDelayMs: this.options.maxRetryDelayMs,
        },
        `publish ${routingKey}`
      );
    } catch (error) {
      this.logger.error({ err: error, exchange, routingKey, messageId }, 'Failed to publish message');
      throw error;
    }

    return { messageId, correlationId };
  }

  private async doPublish(
    routingKey: string,
    message: object,
    options: PublishOptions & PublishResult
  ): Promise<void> {
    const channel = await this.initialize().catch((error: unknown) => {
      this.channel = null;
      throw error;
    });

    const content = Buffer.from(JSON.stringify(message));
    const publishOptions: Options.Publish = {
      messageId: options.messageId,
      correlationId: options.correlationId,
      persistent: options.persistent ?? true,
      contentType: 'application/json',
      timestamp: Date.now(),
      expiration: options.expiration,
      headers: {
        ...options.headers,
        'x-published-at': new Date().toISOString(),
      },
    };

    await new Promise<void>((resolve, reject) => {
      channel.publish(this.options.exchangeName, routingKey, content, publishOptions, (err) => {
        if (err) {
          // A nacked or closed channel is re-created on the next attempt
          this.channel = null;
          reject(err instanceof Error ? err : new Error(String(err)));
        } else {
          resolve();
        }
      });
    });

    this.logger.debug(
      {
        exchange: this.options.exchangeName,
        routingKey,
        messageId: options.messageId,
        correlationId: options.correlationId,
      },
      'Message published'
    );
  }

  getStats(): PublisherStats {
    return {
      exchangeName: this.options.exchangeName,
      isInitialized: this.channel !== null,
      circuitBreakerState: this.circuitBreaker.getState(),
    };
  }

  resetCircuitBreaker(): void {
    this.circuitBreaker.reset();
  }
}
