import type { Knex } from 'knex';
import type { Logger } from '../logger/logger.js';
import type { ICacheService } from '../cache/CacheService.js';

export interface TransactionOptions {
  /**
   * Cache patterns cleared once the transaction has committed,
   * e.g. `['product:*']`
   */
  invalidateCachePatterns?: string | string[];
}

/**
 * Runs work inside a knex transaction. Knex commits when the callback
 * resolves and rolls back when it throws.
 *
 * ```typescript
 * await transactionManager.runInTransaction(
 *   async (trx) => {
 *     await trx('products').insert({ name: 'Desk lamp' });
 *   },
 *   { invalidateCachePatterns: 'product:*' }
 * );
 * ```
 */
export class TransactionManager {
  constructor(
    private readonly db: Knex,
    private readonly cache: ICacheService,
    private readonly logger: Logger
  ) {}

  async runInTransaction<T>(
    callback: (trx: Knex.Transaction) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    let result: T;
    try {
      result = await this.db.transaction(callback);
    } catch (error) {
      this.logger.error({ err: error }, 'Transaction rolled back');
      throw error;
    }

    if (options.invalidateCachePatterns) {
      await this.invalidateCachePatterns(options.invalidateCachePatterns);
    }
    return result;
  }

  async invalidateCachePatterns(patterns: string | string[]): Promise<void> {
    const list = Array.isArray(patterns) ? patterns : [patterns];
    await Promise.all(list.map((pattern) => this.cache.invalidate(pattern)));
  }
}
