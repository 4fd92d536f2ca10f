import type { IEventPublisher, ProductEvent } from '../../../application/providers/index.js';
import type { BasePublisher, PublisherStats } from './BasePublisher.js';

/**
 * Publishes product events on the topic exchange, routed by event type
 * (`product.created`, `product.updated`, `product.deleted`).
 */
export class RabbitEventPublisher implements IEventPublisher {
  constructor(
    private readonly publisher: BasePublisher,
    private readonly serviceName: string
  ) {}

  async publish(event: ProductEvent): Promise<void> {
    await this.publisher.publish(event.type, event, {
      correlationId: event.correlationId,
      headers: { 'x-source-service': this.serviceName },
    });
  }

  getStats(): PublisherStats {
    return this.publisher.getStats();
  }
}
