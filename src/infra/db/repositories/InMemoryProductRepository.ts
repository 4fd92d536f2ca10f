import { Product } from '../../../domain/models/Product.js';
import type { ProductRow } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import { ConflictError } from '../../../shared/errors/index.js';

/**
 * Map-backed repository for the `memory` persistence driver and tests.
 * Stores rows, not entities, so callers never share mutable state with it.
 * Writes check name uniqueness synchronously, playing the part of the
 * unique index on `products.name`.
 */
export class InMemoryProductRepository implements IProductRepository {
  private rows = new Map<number, ProductRow>();
  private nextId = 1;

  findById(id: number): Promise<Product | null> {
    const row = this.rows.get(id);
    return Promise.resolve(row ? Product.fromPersistence(row) : null);
  }

  findAll(limit: number, offset: number): Promise<Product[]> {
    const page = [...this.rows.values()]
      .sort((a, b) => a.id - b.id)
      .slice(offset, offset + limit)
      .map((row) => Product.fromPersistence(row));
    return Promise.resolve(page);
  }

  count(): Promise<number> {
    return Promise.resolve(this.rows.size);
  }

  private findRowByName(name: string): ProductRow | undefined {
    const wanted = name.trim().toLowerCase();
    for (const row of this.rows.values()) {
      if (row.name.toLowerCase() === wanted) {
        return row;
      }
    }
    return undefined;
  }

  findByName(name: string): Promise<Product | null> {
    const row = this.findRowByName(name);
    return Promise.resolve(row ? Product.fromPersistence(row) : null);
  }

  create(product: Product): Promise<Product> {
    if (this.findRowByName(product.name)) {
      return Promise.reject(duplicateName(product.name));
    }
    const created = product.withId(this.nextId++);
    this.rows.set(created.id, created.toPersistence());
    return Promise.resolve(created);
  }

  update(product: Product): Promise<boolean> {
    if (!this.rows.has(product.id)) {
      return Promise.resolve(false);
    }
    const clash = this.findRowByName(product.name);
    if (clash && clash.id !== product.id) {
      return Promise.reject(duplicateName(product.name));
    }
    this.rows.set(product.id, product.toPersistence());
    return Promise.resolve(true);
  }

  delete(id: number): Promise<boolean> {
    return Promise.resolve(this.rows.delete(id));
  }

  clear(): void {
    this.rows.clear();
    this.nextId = 1;
  }
}

function duplicateName(name: string): ConflictError {
  return new ConflictError(`Product with name "${name}" already exists`, { field: 'name', value: name });
}
