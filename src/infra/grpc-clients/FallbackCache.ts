/**
 * Last-known-good responses for graceful degradation. Expired entries are
 * still served: stale data beats no data while the upstream is down.
 */
import type { CacheEntry } from './types.js';
import logger from '../logger/logger.js';

export class FallbackCache<T = unknown> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly serviceName: string,
    private readonly maxSize = 100,
    private readonly defaultTtlMs = 60000
  ) {}

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry)) {
      logger.debug({ service: this.serviceName, key }, 'Serving stale fallback entry');
    }
    return entry.data;
  }

  isStale(key: string): boolean {
    const entry = this.entries.get(key);
    return entry ? this.isExpired(entry) : false;
  }

  /**
   * Evicts the oldest insertion once full. Re-setting a key moves it to the back.
   */
  set(key: string, data: T, ttlMs = this.defaultTtlMs): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { data, timestamp: Date.now(), ttl: ttlMs });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): { size: number; maxSize: number; keys: string[] } {
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      keys: [...this.entries.keys()],
    };
  }

  /**
   * Drop expired entries
   * @returns number removed
   */
  cleanup(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return Date.now() - entry.timestamp > entry.ttl;
  }
}
