import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import type { Product } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface ListProductsInput {
  limit?: number;
  offset?: number;
}

export interface ListProductsOutput {
  items: Product[];
  /** Total number of products, independent of the page */
  total: number;
  limit: number;
  offset: number;
}

export class ListProductsUseCase extends BaseUseCase<ListProductsInput, ListProductsOutput> {
  constructor(
    private readonly productRepository: IProductRepository,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: ListProductsInput = {}): Promise<ListProductsOutput> {
    const limit = Math.min(Math.max(input.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
    const offset = Math.max(input.offset ?? 0, 0);

    const [items, total] = await Promise.all([
      this.productRepository.findAll(limit, offset),
      this.productRepository.count(),
    ]);

    return { items, total, limit, offset };
  }
}
