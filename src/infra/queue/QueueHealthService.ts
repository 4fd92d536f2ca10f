export enum QueueConnectionStatus {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  RECONNECTING = 'reconnecting',
  DEAD = 'dead',
}

export type QueueOverallStatus = 'healthy' | 'degraded' | 'dead' | 'not_configured';

/**
 * Tracks the status of every named queue connection.
 */
export class QueueHealthService {
  private readonly connectionStatuses = new Map<string, QueueConnectionStatus>();

  registerStatus(connectionName: string, status: QueueConnectionStatus): void {
    this.connectionStatuses.set(connectionName, status);
  }

  getStatus(connectionName: string): QueueConnectionStatus | undefined {
    return this.connectionStatuses.get(connectionName);
  }

  getAllStatuses(): Record<string, QueueConnectionStatus> {
    return Object.fromEntries(this.connectionStatuses);
  }

  hasDeadConnections(): boolean {
    return [...this.connectionStatuses.values()].includes(QueueConnectionStatus.DEAD);
  }

  /**
   * Dead beats degraded. Anything not yet connected counts as degraded.
   */
  getOverallStatus(): QueueOverallStatus {
    if (this.connectionStatuses.size === 0) {
      return 'not_configured';
    }

    if (this.hasDeadConnections()) {
      return 'dead';
    }

    for (const status of this.connectionStatuses.values()) {
      if (status !== QueueConnectionStatus.CONNECTED) {
        return 'degraded';
      }
    }

    return 'healthy';
  }

  unregisterConnection(connectionName: string): void {
    this.connectionStatuses.delete(connectionName);
  }

  clear(): void {
    this.connectionStatuses.clear();
  }
}
