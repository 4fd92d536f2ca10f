/**
 * Cache key conventions. Keys are `<prefix>:<kind>:<args>` so one prefix
 * pattern clears everything a repository wrote.
 */
export class CacheKeyGenerator {
  static forId(prefix: string, id: number | string): string {
    return `${prefix}:id:${id}`;
  }

  static invalidationPattern(prefix: string): string {
    return `${prefix}:*`;
  }
}
