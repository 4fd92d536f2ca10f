import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import { Product } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import type { IEventPublisher } from '../../providers/index.js';
import { ConflictError } from '../../../shared/errors/index.js';

export interface CreateProductInput {
  name: string;
}

export class CreateProductUseCase extends BaseUseCase<CreateProductInput, Product> {
  constructor(
    private readonly productRepository: IProductRepository,
    private readonly eventPublisher: IEventPublisher,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: CreateProductInput): Promise<Product> {
    this.logStart('CreateProductUseCase', { name: input.name });

    const product = Product.create({ name: input.name });

    const existing = await this.productRepository.findByName(product.name);
    if (existing) {
      throw new ConflictError(`Product with name "${product.name}" already exists`, {
        field: 'name',
        value: product.name,
      });
    }

    const created = await this.productRepository.create(product);

    this.emit(this.eventPublisher, 'product.created', created.id, created.name);
    this.logSuccess('CreateProductUseCase', { id: created.id });
    return created;
  }
}
