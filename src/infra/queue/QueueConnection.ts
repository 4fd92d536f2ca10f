/**
 * RabbitMQ Connection Manager
 * Handles connection lifecycle with automatic reconnection
 */
import amqplib from 'amqplib';
import type { Channel, ConfirmChannel } from 'amqplib';
import type { Logger } from '../logger/logger.js';
import { ServiceUnavailableError } from '../../shared/errors/index.js';
import { QueueConnectionStatus, type QueueHealthService } from './QueueHealthService.js';

const RECONNECT_DELAY_MS = 5000;
const MAX_RECONNECT_ATTEMPTS = 10;

export interface QueueConnectionOptions {
  url: string;
  connectionName?: string;
  prefetch?: number;
}

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

export class QueueConnection {
  private connection: AmqpConnection | null = null;
  private channel: Channel | null = null;
  private confirmChannel: ConfirmChannel | null = null;
  private connecting: Promise<void> | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private isShuttingDown = false;
  private readonly options: Required<QueueConnectionOptions>;

  constructor(
    options: QueueConnectionOptions,
    private readonly health: QueueHealthService,
    private readonly logger: Logger
  ) {
    this.options = {
      connectionName: 'default',
      prefetch: 10,
      ...options,
    };
  }

  get name(): string {
    return this.options.connectionName;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }
    if (!this.connecting) {
      this.connecting = this.doConnect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async doConnect(): Promise<void> {
    const connectionName = this.options.connectionName;
    this.health.registerStatus(connectionName, QueueConnectionStatus.CONNECTING);

    try {
      this.logger.info({ connectionName }, 'Connecting to RabbitMQ...');

      const connection = await amqplib.connect(this.options.url);
      this.reconnectAttempts = 0;

      connection.on('error', (err: Error) => {
        this.logger.error({ err, connectionName }, 'RabbitMQ connection error');
      });

      connection.on('close', () => {
        this.connection = null;
        this.channel = null;
        this.confirmChannel = null;
        if (!this.isShuttingDown) {
          this.logger.warn({ connectionName }, 'RabbitMQ connection closed, reconnecting...');
          this.health.registerStatus(connectionName, QueueConnectionStatus.RECONNECTING);
          this.scheduleReconnect();
        }
      });

      const channel = await connection.createChannel();
      await channel.prefetch(this.options.prefetch);

      channel.on('error', (err: Error) => {
        this.logger.error({ err, connectionName }, 'RabbitMQ channel error');
      });

      channel.on('close', () => {
        this.channel = null;
      });

      this.connection = connection;
      this.channel = channel;
      this.health.registerStatus(connectionName, QueueConnectionStatus.CONNECTED);
      this.logger.info({ connectionName }, 'RabbitMQ connected');
    } catch (error) {
      this.logger.error({ err: error, connectionName }, 'Failed to connect to RabbitMQ');
      this.health.registerStatus(connectionName, QueueConnectionStatus.DISCONNECTED);
      this.scheduleReconnect();
      throw error;
    }
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer) return;

    this.reconnectAttempts++;
    const connectionName = this.options.connectionName;

    if (this.reconnectAttempts > MAX_RECONNECT_ATTEMPTS) {
      this.logger.error(
        { connectionName, attempts: this.reconnectAttempts },
        'Max reconnection attempts reached, marking as dead'
      );
      this.health.registerStatus(connectionName, QueueConnectionStatus.DEAD);
      return;
    }

    const delay = RECONNECT_DELAY_MS * this.reconnectAttempts;
    this.logger.info(
      { connectionName, attempt: this.reconnectAttempts, delayMs: delay },
      'Scheduling reconnection...'
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        this.logger.debug({ err, connectionName }, 'Reconnection attempt failed');
      });
    }, delay);
    this.reconnectTimer.unref();
  }

  async getChannel(): Promise<Channel> {
    if (!this.channel) {
      await this.connect();
    }
    if (!this.channel) {
      throw new ServiceUnavailableError('rabbitmq', 'RabbitMQ channel is not available');
    }
    return this.channel;
  }

  /**
   * Channel with publisher confirms enabled
   */
  async getConfirmChannel(): Promise<ConfirmChannel> {
    if (!this.confirmChannel) {
      if (!this.connection) {
        await this.connect();
      }
      if (!this.connection) {
        throw new ServiceUnavailableError('rabbitmq', 'RabbitMQ connection is not available');
      }
      const confirmChannel = await this.connection.createConfirmChannel();
      confirmChannel.on('close', () => {
        this.confirmChannel = null;
      });
      this.confirmChannel = confirmChannel;
    }
    return this.confirmChannel;
  }

  async close(): Promise<void> {
    this.isShuttingDown = true;
    const connectionName = this.options.connectionName;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    try {
      if (this.channel) {
        await this.channel.close();
        this.channel = null;
      }

      if (this.confirmChannel) {
        await this.confirmChannel.close();
        this.confirmChannel = null;
      }

      if (this.connection) {
        await this.connection.close();
        this.connection = null;
      }

      this.logger.info({ connectionName }, 'RabbitMQ connection closed gracefully');
    } catch (error) {
      this.logger.error({ err: error, connectionName }, 'Error closing RabbitMQ connection');
    } finally {
      this.health.unregisterConnection(connectionName);
    }
  }

  isConnected(): boolean {
    return this.connection !== null && this.channel !== null;
  }
}
