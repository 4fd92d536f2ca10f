import type { IInventoryProvider, StockLevel } from '../../application/providers/index.js';
import { ServiceUnavailableError } from '../../shared/errors/index.js';

/**
 * Bound when no inventory instance is registered; every lookup fails so
 * availability answers come from the fallback.
 */
export class UnconfiguredInventoryProvider implements IInventoryProvider {
  getStockLevel(_productId: number): Promise<StockLevel> {
    return Promise.reject(
      new ServiceUnavailableError('inventory', 'No inventory service instance is registered')
    );
  }
}
