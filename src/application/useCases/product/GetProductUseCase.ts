import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import type { Product } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import { NotFoundError } from '../../../shared/errors/index.js';

export interface GetProductInput {
  id: number;
}

export class GetProductUseCase extends BaseUseCase<GetProductInput, Product> {
  constructor(
    private readonly productRepository: IProductRepository,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: GetProductInput): Promise<Product> {
    const product = await this.productRepository.findById(input.id);
    if (!product) {
      throw new NotFoundError('Product', input.id);
    }
    return product;
  }
}
