import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import type { IEventPublisher } from '../../providers/index.js';
import { NotFoundError } from '../../../shared/errors/index.js';

export interface DeleteProductInput {
  id: number;
}

export class DeleteProductUseCase extends BaseUseCase<DeleteProductInput, void> {
  constructor(
    private readonly productRepository: IProductRepository,
    private readonly eventPublisher: IEventPublisher,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: DeleteProductInput): Promise<void> {
    this.logStart('DeleteProductUseCase', { id: input.id });

    const deleted = await this.productRepository.delete(input.id);
    if (!deleted) {
      throw new NotFoundError('Product', input.id);
    }

    this.emit(this.eventPublisher, 'product.deleted', input.id);
    this.logSuccess('DeleteProductUseCase', { id: input.id });
  }
}
