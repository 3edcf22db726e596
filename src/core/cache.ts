/**
 * LRU cache with TTL expiry
 */

import { LRUCache } from 'lru-cache';

/**
 * Small cache used for hostname resolution results.
 * Expiry is left entirely to lru-cache.
 */
export class CacheManager<T extends {}> {
  private cache: LRUCache<string, T>;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   */
  constructor(maxSize = 500, ttl = 300000) {
    this.cache = new LRUCache<string, T>({
      max: maxSize,
      ttl,
      updateAgeOnGet: false,
    });
  }

  get(key: string): T | undefined {
    return this.cache.get(key);
  }

  /**
   * @param ttl Overrides the default time-to-live for this entry
   */
  set(key: string, value: T, ttl?: number): void {
    this.cache.set(key, value, ttl === undefined ? undefined : { ttl });
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Return the cached value, or compute and store it.
   * Rejections from `factory` are not cached.
   */
  async getOrSet(key: string, factory: () => Promise<T>, ttl?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    this.set(key, value, ttl);
    return value;
  }
}
