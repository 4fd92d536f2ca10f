import type { IRepository } from './IRepository.js';
import type { Product } from '../models/Product.js';

export interface IProductRepository extends IRepository<Product> {
  /**
   * Case-insensitive lookup, used to keep product names unique
   */
  findByName(name: string): Promise<Product | null>;

  /**
   * @throws ConflictError when another product already has the name
   */
  create(entity: Product): Promise<Product>;

  /**
   * @throws ConflictError when another product already has the name
   */
  update(entity: Product): Promise<boolean>;
}
