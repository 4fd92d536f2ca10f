/**
 * Stock lookups against the downstream inventory service.
 */
export interface StockLevel {
  productId: number;
  quantity: number;
}

export interface IInventoryProvider {
  getStockLevel(productId: number): Promise<StockLevel>;
}
