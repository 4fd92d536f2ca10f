export type ProductEventType = 'product.created' | 'product.updated' | 'product.deleted';

export interface ProductEvent {
  type: ProductEventType;
  productId: number;
  name?: string;
  occurredAt: string;
  correlationId?: string;
}

/**
 * Outbound domain events. Implementations may be asynchronous and lossy;
 * callers never wait on delivery to complete a write.
 */
export interface IEventPublisher {
  publish(event: ProductEvent): Promise<void>;
}
