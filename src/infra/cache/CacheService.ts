export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
}

/**
 * Key/value cache used for read-through repository lookups.
 * Values are JSON-serialisable; `undefined` from `get` means a miss.
 */
export interface ICacheService {
  readonly driver: 'redis' | 'memory';
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Remove every key matching a glob with a trailing `*`
   * @returns number of keys removed
   */
  invalidate(pattern: string): Promise<number>;
  getStats(): CacheStats;
}

export class CacheStatsTracker {
  private hits = 0;
  private misses = 0;

  hit(): void {
    this.hits++;
  }

  miss(): void {
    this.misses++;
  }

  snapshot(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
