/**
 * Tests for the secret cache
 */

import { describe, it, expect, vi } from 'vitest';
import { CacheEntry } from '../entry.js';
import { CacheManager } from '../manager.js';
import { SecretString, type SecretValue } from '../../types/index.js';

function secret(name: string, version: string = 'v1', expiresAt?: Date): SecretValue {
  return {
    id: `https://vault.example.test/secrets/${name}/${version}`,
    name,
    value: new SecretString(`${name}-value`),
    version,
    expiresAt,
    enabled: true,
    tags: {},
  };
}

describe('CacheEntry', () => {
  it('should be fresh until the TTL passes', () => {
    const entry = new CacheEntry(secret('a'), 5000, 1000);

    expect(entry.freshUntil).toBe(6000);
    expect(entry.isExpired(5999)).toBe(false);
    expect(entry.isExpired(6000)).toBe(true);
    expect(entry.remainingMs(2000)).toBe(4000);
  });

  it('should end freshness at the secret expiry when sooner', () => {
    const entry = new CacheEntry(secret('a', 'v1', new Date(3000)), 5000, 1000);

    expect(entry.freshUntil).toBe(3000);
  });

  it('should ignore a secret expiry after the TTL', () => {
    const entry = new CacheEntry(secret('a', 'v1', new Date(60000)), 5000, 1000);

    expect(entry.freshUntil).toBe(6000);
  });
});

describe('CacheManager', () => {
  it('should return fresh values and count hits and misses', () => {
    const cache = new CacheManager({ ttl: 5000 });
    const value = secret('a');

    cache.set('a:latest', value, 0);

    expect(cache.get('a:latest', 4000)).toBe(value);
    expect(cache.get('b:latest', 4000)).toBeUndefined();
    expect(cache.getStats()).toEqual({ size: 1, maxSize: 1000, hits: 1, misses: 1, hitRate: 0.5 });
  });

  it('should evict expired entries lazily on access', () => {
    const onEvict = vi.fn();
    const cache = new CacheManager({ ttl: 5000 }, onEvict);
    cache.set('a:latest', secret('a'), 0);

    expect(cache.size).toBe(1);
    expect(cache.get('a:latest', 6000)).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(onEvict).toHaveBeenCalledWith('a:latest', 'expired');
  });

  it('should not store values already past their expiry', () => {
    const cache = new CacheManager({ ttl: 5000 });

    const entry = cache.set('a:latest', secret('a', 'v1', new Date(500)), 1000);

    expect(entry).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should replace an entry on refresh', () => {
    const cache = new CacheManager({ ttl: 5000 });
    cache.set('a:latest', secret('a', 'v1'), 0);
    cache.set('a:latest', secret('a', 'v2'), 1000);

    expect(cache.get('a:latest', 5500)?.version).toBe('v2');
    expect(cache.size).toBe(1);
  });

  it('should evict the least recently used entry at capacity', () => {
    const onEvict = vi.fn();
    const cache = new CacheManager({ ttl: 60000, maxEntries: 2 }, onEvict);
    cache.set('a:latest', secret('a'), 0);
    cache.set('b:latest', secret('b'), 0);

    // Touch "a" so "b" becomes the oldest
    cache.get('a:latest', 10);
    cache.set('c:latest', secret('c'), 20);

    expect(cache.has('a:latest', 30)).toBe(true);
    expect(cache.has('b:latest', 30)).toBe(false);
    expect(cache.has('c:latest', 30)).toBe(true);
    expect(onEvict).toHaveBeenCalledWith('b:latest', 'capacity');
  });

  it('should invalidate single keys and report absence', () => {
    const cache = new CacheManager();
    cache.set('a:latest', secret('a'));

    expect(cache.invalidate('a:latest')).toBe(true);
    expect(cache.invalidate('a:latest')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should invalidate by predicate', () => {
    const cache = new CacheManager();
    cache.set('db:latest', secret('db'));
    cache.set('db:v1', secret('db', 'v1'));
    cache.set('api:latest', secret('api'));

    const removed = cache.invalidateWhere((key) => key.startsWith('db:'));

    expect(removed).toBe(2);
    expect(cache.has('api:latest')).toBe(true);
  });

  it('should prune only expired entries', () => {
    const cache = new CacheManager({ ttl: 5000 });
    cache.set('old:latest', secret('old'), 0);
    cache.set('new:latest', secret('new'), 4000);

    expect(cache.prune(6000)).toBe(1);
    expect(cache.has('new:latest', 6000)).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('should clear everything', () => {
    const onEvict = vi.fn();
    const cache = new CacheManager({}, onEvict);
    cache.set('a:latest', secret('a'));
    cache.set('b:latest', secret('b'));

    cache.clear();

    expect(cache.size).toBe(0);
    expect(onEvict).toHaveBeenCalledTimes(2);
  });

  it('should leave LRU order and stats alone on peek', () => {
    const cache = new CacheManager({ ttl: 5000 });
    cache.set('a:latest', secret('a'), 0);

    expect(cache.peek('a:latest', 100)?.fetchedAt).toBe(0);
    expect(cache.getStats().hits).toBe(0);
  });
});
