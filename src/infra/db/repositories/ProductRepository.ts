import type { Knex } from 'knex';
import { z } from 'zod';
import type { Logger } from '../../logger/logger.js';
import type { ICacheService } from '../../cache/CacheService.js';
import { BaseRepository } from './BaseRepository.js';
import type { TransactionManager } from '../TransactionManager.js';
import { Product } from '../../../domain/models/Product.js';
import type { ProductRow } from '../../../domain/models/Product.js';
import type { IProductRepository } from '../../../domain/repositories/index.js';
import { ConflictError, DatabaseError } from '../../../shared/errors/index.js';

const productRowSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  created_at: z.union([z.string(), z.date()]),
  updated_at: z.union([z.string(), z.date()]),
});

const ER_DUP_ENTRY = 1062;

/**
 * mysql2 reports unique index violations with code ER_DUP_ENTRY / errno 1062
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  return (
    ('code' in error && error.code === 'ER_DUP_ENTRY') || ('errno' in error && error.errno === ER_DUP_ENTRY)
  );
}

export interface ProductRepositoryOptions {
  queryTimeoutMs: number;
  cacheTtlSeconds: number;
}

/**
 * MySQL product repository (knex + mysql2)
 */
export class ProductRepository extends BaseRepository implements IProductRepository {
  constructor(
    db: Knex,
    cache: ICacheService,
    logger: Logger,
    private readonly transactions: TransactionManager,
    options: ProductRepositoryOptions
  ) {
    super(db, cache, logger, {
      tableName: 'products',
      cachePrefix: 'product',
      ...options,
    });
  }

  private table(): Knex.QueryBuilder<ProductRow, ProductRow[]> {
    return this.db<ProductRow>(this.tableName);
  }

  async findById(id: number): Promise<Product | null> {
    const row = await this.cached(this.idKey(id), productRowSchema, () =>
      this.run('findById', async () => {
        const found = await this.table().where('id', id).first();
        return found ?? null;
      })
    );
    return row ? Product.fromPersistence(row) : null;
  }

  async findByName(name: string): Promise<Product | null> {
    const row = await this.run('findByName', async () => {
      const found = await this.table()
        .whereRaw('LOWER(name) = ?', [name.trim().toLowerCase()])
        .first();
      return found ?? null;
    });
    return row ? Product.fromPersistence(row) : null;
  }

  async findAll(limit: number, offset: number): Promise<Product[]> {
    const rows = await this.run('findAll', async () => {
      const found: ProductRow[] = await this.table().orderBy('id', 'asc').limit(limit).offset(offset);
      return found;
    });
    return rows.map((row) => Product.fromPersistence(row));
  }

  async count(): Promise<number> {
    return this.run('count', async () => {
      const rows: Record<string, unknown>[] = await this.db(this.tableName).count({ total: '*' });
      return Number(rows[0]?.total ?? 0);
    });
  }

  /**
   * The unique index on `name` settles races between concurrent writers
   */
  private async guardUniqueName<R>(name: string, work: () => Promise<R>): Promise<R> {
    try {
      return await this.write(work);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(`Product with name "${name}" already exists`, { field: 'name', value: name });
      }
      throw error;
    }
  }

  async create(product: Product): Promise<Product> {
    const row = product.toPersistence();
    const [id] = await this.guardUniqueName(row.name, () =>
      this.transactions.runInTransaction(
        (trx) =>
          this.run('create', async () => {
            const ids: number[] = await trx<ProductRow>(this.tableName).insert({
              name: row.name,
              created_at: row.created_at,
              updated_at: row.updated_at,
            });
            return ids;
          }),
        { invalidateCachePatterns: this.cachePattern() }
      )
    );
    if (id === undefined) {
      throw new DatabaseError('Insert did not return an id', { table: this.tableName });
    }

    return product.withId(id);
  }

  async update(product: Product): Promise<boolean> {
    const row = product.toPersistence();
    const affected = await this.guardUniqueName(row.name, () =>
      this.transactions.runInTransaction(
        (trx) =>
          this.run('update', async () => {
            const count: number = await trx<ProductRow>(this.tableName)
              .where('id', product.id)
              .update({ name: row.name, updated_at: row.updated_at });
            return count;
          }),
        { invalidateCachePatterns: this.cachePattern() }
      )
    );

    return affected > 0;
  }

  async delete(id: number): Promise<boolean> {
    const affected = await this.write(() =>
      this.transactions.runInTransaction(
        (trx) =>
          this.run('delete', async () => {
            const count: number = await trx<ProductRow>(this.tableName).where('id', id).delete();
            return count;
          }),
        { invalidateCachePatterns: this.cachePattern() }
      )
    );

    return affected > 0;
  }
}
