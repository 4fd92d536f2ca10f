import type { ICacheService, CacheStats } from './CacheService.js';
import { CacheStatsTracker } from './CacheService.js';

interface Entry {
  value: unknown;
  expiresAt: number;
}

/**
 * Process-local cache used when Redis is disabled and in tests
 */
export class InMemoryCacheService implements ICacheService {
  readonly driver = 'memory' as const;
  private readonly entries = new Map<string, Entry>();
  private readonly stats = new CacheStatsTracker();

  constructor(private readonly defaultTtlSeconds = 300) {}

  get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= Date.now()) {
      if (entry) this.entries.delete(key);
      this.stats.miss();
      return Promise.resolve(undefined);
    }
    this.stats.hit();
    return Promise.resolve(entry.value);
  }

  set(key: string, value: unknown, ttlSeconds = this.defaultTtlSeconds): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  invalidate(pattern: string): Promise<number> {
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : null;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      const matches = prefix !== null ? key.startsWith(prefix) : key === pattern;
      if (matches) {
        this.entries.delete(key);
        removed++;
      }
    }
    return Promise.resolve(removed);
  }

  getStats(): CacheStats {
    return this.stats.snapshot();
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
