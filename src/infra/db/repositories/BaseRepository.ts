import type { Knex } from 'knex';
import type { ZodType } from 'zod';
import type { Logger } from '../../logger/logger.js';
import type { ICacheService } from '../../cache/CacheService.js';
import { CacheKeyGenerator } from '../../cache/cacheKeyGenerator.js';
import { withTimeout, QueryTimeoutError } from '../../../shared/utils/timeout.js';

/**
 * Warn when a query takes more than this share of its timeout
 */
const SLOW_QUERY_THRESHOLD_RATIO = 0.8;

export interface RepositoryOptions {
  tableName: string;
  cachePrefix: string;
  queryTimeoutMs: number;
  cacheTtlSeconds: number;
}

/**
 * Knex repository base with per-query timeouts, slow-query warnings and
 * read-through caching. Writes clear the repository's cache prefix.
 */
export abstract class BaseRepository {
  private writeEpoch = 0;
  private writesInFlight = 0;

  constructor(
    protected readonly db: Knex,
    protected readonly cache: ICacheService,
    protected readonly logger: Logger,
    protected readonly options: RepositoryOptions
  ) {}

  protected get tableName(): string {
    return this.options.tableName;
  }

  /**
   * Run a query under the configured timeout
   */
  protected async run<R>(operation: string, query: () => Promise<R>): Promise<R> {
    const timeout = this.options.queryTimeoutMs;
    const label = `${this.tableName}.${operation}`;

    try {
      const { result, durationMs } = await withTimeout(query(), timeout, label);

      const slowThreshold = timeout * SLOW_QUERY_THRESHOLD_RATIO;
      if (durationMs > slowThreshold) {
        this.logger.warn(
          { table: this.tableName, operation, durationMs, thresholdMs: slowThreshold, timeoutMs: timeout },
          `Slow query detected in ${this.tableName}`
        );
      }
      return result;
    } catch (error) {
      if (error instanceof QueryTimeoutError) {
        this.logger.error({ table: this.tableName, operation, timeoutMs: timeout }, `Query timeout in ${this.tableName}`);
      } else {
        this.logger.error({ err: error, table: this.tableName, operation }, `Query failed in ${this.tableName}`);
      }
      throw error;
    }
  }

  /**
   * Read-through cache lookup. Cached values are re-validated against `schema`
   * so a stale or foreign entry is treated as a miss.
   */
  protected async cached<R>(
    key: string,
    schema: ZodType<R>,
    loader: () => Promise<R | null>
  ): Promise<R | null> {
    const hit = await this.cache.get(key);
    if (hit !== undefined) {
      const parsed = schema.safeParse(hit);
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.warn({ key }, 'Discarding malformed cache entry');
    }

    const epoch = this.writeEpoch;
    const value = await loader();

    // A load that overlapped a write may hold the pre-commit row
    const overlappedWrite = epoch !== this.writeEpoch || this.writesInFlight > 0;
    if (value !== null && !overlappedWrite) {
      await this.cache.set(key, value, this.options.cacheTtlSeconds);
    }
    return value;
  }

  /**
   * Wrap every write so concurrent read-through loads skip the cache fill
   */
  protected async write<R>(work: () => Promise<R>): Promise<R> {
    this.writesInFlight++;
    this.writeEpoch++;
    try {
      return await work();
    } finally {
      this.writesInFlight--;
      this.writeEpoch++;
    }
  }

  protected idKey(id: number): string {
    return CacheKeyGenerator.forId(this.options.cachePrefix, id);
  }

  protected cachePattern(): string {
    return CacheKeyGenerator.invalidationPattern(this.options.cachePrefix);
  }
}
