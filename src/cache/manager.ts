import type { SecretValue } from '../types/index.js';
import { CacheEntry } from './entry.js';

export interface CacheConfig {
  ttl: number;         // Default: 300000 (5 min)
  maxEntries: number;  // Default: 1000
}

export type EvictionReason = 'expired' | 'capacity' | 'invalidated';

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate?: number;
}

const DEFAULT_CONFIG: CacheConfig = {
  ttl: 300000,           // 5 minutes
  maxEntries: 1000,
};

/**
 * Secret cache with lazy expiry and least-recently-used eviction.
 *
 * Map insertion order doubles as the LRU order: a hit re-inserts the key at
 * the end, so the first key is always the least recently used one.
 */
export class CacheManager {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly config: CacheConfig;
  private readonly onEvict?: (key: string, reason: EvictionReason) => void;
  private hits = 0;
  private misses = 0;

  constructor(
    config?: Partial<CacheConfig>,
    onEvict?: (key: string, reason: EvictionReason) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.onEvict = onEvict;
  }

  /**
   * Get a cached value
   * @returns The cached value if found and fresh, undefined otherwise
   */
  get(key: string, now: number = Date.now()): SecretValue | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.isExpired(now)) {
      this.remove(key, 'expired');
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.value;
  }

  /**
   * Peek at an entry without touching LRU order or statistics
   */
  peek(key: string, now: number = Date.now()): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.isExpired(now)) {
      this.remove(key, 'expired');
      return undefined;
    }
    return entry;
  }

  /**
   * Store a value, replacing any previous entry for the key.
   *
   * @returns The stored entry, or undefined when the value is already past
   * its freshness deadline and was not cached
   */
  set(key: string, value: SecretValue, now: number = Date.now(), ttl?: number): CacheEntry | undefined {
    const entry = new CacheEntry(value, ttl ?? this.config.ttl, now);
    if (entry.isExpired(now)) {
      this.invalidate(key);
      return undefined;
    }

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.config.maxEntries) {
      this.evictOldest();
    }

    this.entries.set(key, entry);
    return entry;
  }

  /**
   * Check if a key exists in cache and is fresh
   */
  has(key: string, now: number = Date.now()): boolean {
    return this.peek(key, now) !== undefined;
  }

  /**
   * Invalidate a specific cache entry
   * @returns true if an entry was removed
   */
  invalidate(key: string): boolean {
    if (!this.entries.has(key)) {
      return false;
    }
    this.remove(key, 'invalidated');
    return true;
  }

  /**
   * Invalidate every entry whose key matches
   * @returns number of removed entries
   */
  invalidateWhere(predicate: (key: string, entry: CacheEntry) => boolean): number {
    const keysToInvalidate: string[] = [];
    for (const [key, entry] of this.entries) {
      if (predicate(key, entry)) {
        keysToInvalidate.push(key);
      }
    }

    for (const key of keysToInvalidate) {
      this.remove(key, 'invalidated');
    }
    return keysToInvalidate.length;
  }

  /**
   * Evict every entry past its freshness deadline
   * @returns number of evicted entries
   */
  prune(now: number = Date.now()): number {
    const expired: string[] = [];
    for (const [key, entry] of this.entries) {
      if (entry.isExpired(now)) {
        expired.push(key);
      }
    }

    for (const key of expired) {
      this.remove(key, 'expired');
    }
    return expired.length;
  }

  /**
   * Clear all cache entries
   */
  clear(): void {
    for (const key of [...this.entries.keys()]) {
      this.remove(key, 'invalidated');
    }
  }

  get size(): number {
    return this.entries.size;
  }

  getConfig(): Readonly<CacheConfig> {
    return { ...this.config };
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.config.maxEntries,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : undefined,
    };
  }

  private evictOldest(): void {
    const oldestKey = this.entries.keys().next().value;
    if (oldestKey !== undefined) {
      this.remove(oldestKey, 'capacity');
    }
  }

  private remove(key: string, reason: EvictionReason): void {
    this.entries.delete(key);
    this.onEvict?.(key, reason);
  }
}
