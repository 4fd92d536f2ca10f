import type { Redis } from 'ioredis';
import type { Logger } from '../logger/logger.js';
import type { ICacheService, CacheStats } from './CacheService.js';
import { CacheStatsTracker } from './CacheService.js';

export interface RedisCacheOptions {
  /** Namespace for every key, usually the service name */
  keyPrefix: string;
  defaultTtlSeconds: number;
}

/**
 * Redis-backed cache. Redis failures degrade to cache misses so the
 * database stays the source of truth.
 */
export class RedisCacheService implements ICacheService {
  readonly driver = 'redis' as const;
  private readonly stats = new CacheStatsTracker();

  constructor(
    private readonly client: Redis,
    private readonly options: RedisCacheOptions,
    private readonly logger: Logger
  ) {}

  private key(key: string): string {
    return `${this.options.keyPrefix}:${key}`;
  }

  async get(key: string): Promise<unknown> {
    try {
      const raw = await this.client.get(this.key(key));
      if (raw === null) {
        this.stats.miss();
        return undefined;
      }
      const value: unknown = JSON.parse(raw);
      this.stats.hit();
      return value;
    } catch (error) {
      this.stats.miss();
      this.logger.warn({ err: error, key }, 'Cache read failed');
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds = this.options.defaultTtlSeconds): Promise<void> {
    try {
      await this.client.set(this.key(key), JSON.stringify(value), 'EX', ttlSeconds);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache write failed');
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.del(this.key(key));
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache delete failed');
    }
  }

  /**
   * SCAN-based so large keyspaces do not block Redis the way KEYS would
   */
  async invalidate(pattern: string): Promise<number> {
    let removed = 0;
    try {
      const stream = this.client.scanStream({ match: this.key(pattern), count: 100 });
      for await (const batch of stream) {
        const keys: string[] = Array.isArray(batch) ? batch.map(String) : [];
        if (keys.length > 0) {
          removed += await this.client.del(...keys);
        }
      }
    } catch (error) {
      this.logger.warn({ err: error, pattern }, 'Cache invalidation failed');
    }
    return removed;
  }

  getStats(): CacheStats {
    return this.stats.snapshot();
  }
}
