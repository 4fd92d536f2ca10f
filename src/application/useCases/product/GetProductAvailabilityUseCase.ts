import { BaseUseCase } from '../BaseUseCase.js';
import type { Logger } from '../../../infra/logger/logger.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import type { IInventoryProvider } from '../../providers/index.js';
import type { CircuitBreaker } from '../../../shared/utils/CircuitBreaker.js';
import { NotFoundError } from '../../../shared/errors/index.js';

export type AvailabilityStatus = 'in_stock' | 'out_of_stock' | 'unknown';

export interface ProductAvailability {
  productId: number;
  status: AvailabilityStatus;
  quantity: number | null;
  /** `fallback` when the inventory service could not answer */
  source: 'live' | 'fallback';
}

export interface GetProductAvailabilityInput {
  id: number;
}

/**
 * Stock lookup guarded by a circuit breaker. Inventory outages degrade the
 * answer to `unknown` instead of failing the request.
 */
export class GetProductAvailabilityUseCase extends BaseUseCase<
  GetProductAvailabilityInput,
  ProductAvailability
> {
  constructor(
    private readonly productRepository: IProductRepository,
    private readonly inventoryProvider: IInventoryProvider,
    private readonly circuitBreaker: CircuitBreaker,
    logger: Logger
  ) {
    super(logger);
  }

  async execute(input: GetProductAvailabilityInput): Promise<ProductAvailability> {
    const product = await this.productRepository.findById(input.id);
    if (!product) {
      throw new NotFoundError('Product', input.id);
    }

    try {
      const stock = await this.circuitBreaker.execute(() =>
        this.inventoryProvider.getStockLevel(product.id)
      );
      return {
        productId: product.id,
        status: stock.quantity > 0 ? 'in_stock' : 'out_of_stock',
        quantity: stock.quantity,
        source: 'live',
      };
    } catch (error) {
      this.logger.warn(
        { err: error, productId: product.id, circuit: this.circuitBreaker.getState() },
        'Inventory lookup failed, using fallback availability'
      );
      return { productId: product.id, status: 'unknown', quantity: null, source: 'fallback' };
    }
  }
}
