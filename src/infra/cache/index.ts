export type { ICacheService, CacheStats } from './CacheService.js';
export { InMemoryCacheService } from './InMemoryCacheService.js';
export { RedisCacheService, type RedisCacheOptions } from './RedisCacheService.js';
export { CacheKeyGenerator } from './cacheKeyGenerator.js';
