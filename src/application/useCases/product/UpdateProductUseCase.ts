import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import { Product } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import type { IEventPublisher } from '../../providers/index.js';
import { ConflictError, NotFoundError } from '../../../shared/errors/index.js';

export interface UpdateProductInput {
  id: number;
  name?: string;
}

export class UpdateProductUseCase extends BaseUseCase<UpdateProductInput, Product> {
  constructor(
    private readonly productRepository: IProductRepository,
    private readonly eventPublisher: IEventPublisher,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: UpdateProductInput): Promise<Product> {
    this.logStart('UpdateProductUseCase', { id: input.id });

    const product = await this.productRepository.findById(input.id);
    if (!product) {
      throw new NotFoundError('Product', input.id);
    }

    if (input.name === undefined) {
      return product;
    }

    const name = Product.normalizeName(input.name);

    // Case-only renames of the same product are allowed
    if (!product.hasSameName(name)) {
      const duplicate = await this.productRepository.findByName(name);
      if (duplicate && duplicate.id !== product.id) {
        throw new ConflictError(`Product with name "${name}" already exists`, {
          field: 'name',
          value: name,
        });
      }
    }

    if (!product.rename(name)) {
      return product;
    }

    const updated = await this.productRepository.update(product);
    if (!updated) {
      // Deleted between the read and the write
      throw new NotFoundError('Product', input.id);
    }

    this.emit(this.eventPublisher, 'product.updated', product.id, product.name);
    this.logSuccess('UpdateProductUseCase', { id: product.id });
    return product;
  }
}
