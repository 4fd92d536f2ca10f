import type { IEventPublisher, ProductEvent, ProductEventType } from '../../../application/providers/index.js';
import type { Logger } from '../../logger/logger.js';

/**
 * Keeps published events in memory. Bound when no broker is configured.
 */
export class InMemoryEventPublisher implements IEventPublisher {
  private readonly events: ProductEvent[] = [];

  constructor(private readonly logger?: Logger) {}

  async publish(event: ProductEvent): Promise<void> {
    this.events.push(event);
    this.logger?.debug({ eventType: event.type, productId: event.productId }, 'Event recorded');
  }

  getEvents(type?: ProductEventType): ProductEvent[] {
    return type ? this.events.filter((event) => event.type === type) : [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}
