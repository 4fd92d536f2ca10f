import type { Logger } from '../../infra/logger/logger.js';
import type { IEventPublisher, ProductEvent, ProductEventType } from '../providers/index.js';
import { RequestContext } from '../../shared/context/RequestContext.js';

export interface IUseCase<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}

export abstract class BaseUseCase<TInput, TOutput> implements IUseCase<TInput, TOutput> {
  constructor(protected readonly logger: Logger) {}

  abstract execute(input: TInput): Promise<TOutput>;

  protected logStart(useCaseName: string, input?: unknown): void {
    this.logger.debug({ useCase: useCaseName, input }, `Starting ${useCaseName}`);
  }

  protected logSuccess(useCaseName: string, result?: unknown): void {
    this.logger.info({ useCase: useCaseName, result }, `${useCaseName} completed`);
  }

  /**
   * Fire-and-forget publish. Delivery failures are logged, never rethrown.
   */
  protected emit(
    publisher: IEventPublisher,
    type: ProductEventType,
    productId: number,
    name?: string
  ): void {
    const event: ProductEvent = {
      type,
      productId,
      name,
      occurredAt: new Date().toISOString(),
      correlationId: RequestContext.getCorrelationId(),
    };

    void publisher.publish(event).catch((error: unknown) => {
      this.logger.warn({ err: error, event: type, productId }, 'Failed to publish product event');
    });
  }
}
