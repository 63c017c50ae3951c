/**
 * In-memory cache with per-entry TTL and explicit invalidation
 */

import { getLogger } from '../utils/structured-logger.js';

const logger = getLogger('Cache');

export interface CacheEntry<T> {
  value: T;
  timestamp: number;
  ttl: number;
}

export interface CacheStats {
  size: number;
  hitRate?: number;
  totalHits: number;
  totalMisses: number;
}

export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private cleanupInterval?: NodeJS.Timeout;
  private hitCount = 0;
  private missCount = 0;

  constructor(
    private readonly defaultTTL: number,
    private readonly now: () => number = Date.now
  ) {
    if (defaultTTL > 0) {
      this.cleanupInterval = setInterval(() => this.cleanup(), Math.max(defaultTTL, 60000));
      this.cleanupInterval.unref();
    }
  }

  /**
   * A TTL of 0 disables caching
   */
  get enabled(): boolean {
    return this.defaultTTL > 0;
  }

  set(key: string, value: T, ttl: number = this.defaultTTL): void {
    if (ttl <= 0) {
      return;
    }
    this.cache.set(key, { value, timestamp: this.now(), ttl });
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.missCount++;
      return undefined;
    }
    if (this.now() - entry.timestamp >= entry.ttl) {
      this.cache.delete(key);
      this.missCount++;
      return undefined;
    }
    this.hitCount++;
    return entry.value;
  }

  invalidate(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  private cleanup(): void {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (now - entry.timestamp >= entry.ttl) {
        this.cache.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('Cache cleanup removed expired entries', { removed });
    }
  }

  getStats(): CacheStats {
    const totalRequests = this.hitCount + this.missCount;
    return {
      size: this.cache.size,
      hitRate: totalRequests > 0 ? this.hitCount / totalRequests : undefined,
      totalHits: this.hitCount,
      totalMisses: this.missCount,
    };
  }

  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.clear();
  }
}
