import type { SecretValue } from '../types/index.js';

/**
 * A cached secret and its freshness deadline.
 *
 * The deadline is the sooner of `fetchedAt + ttl` and the secret's own
 * expiry. Entries are replaced on refresh, never updated in place.
 */
export class CacheEntry {
  readonly value: SecretValue;
  readonly fetchedAt: number;
  readonly freshUntil: number;

  constructor(value: SecretValue, ttlMs: number, fetchedAt: number = Date.now()) {
    this.value = value;
    this.fetchedAt = fetchedAt;

    const ttlDeadline = fetchedAt + ttlMs;
    const expiry = value.expiresAt?.getTime();
    this.freshUntil = expiry !== undefined ? Math.min(ttlDeadline, expiry) : ttlDeadline;
  }

  /**
   * Check if the freshness deadline has passed
   */
  isExpired(now: number = Date.now()): boolean {
    return now >= this.freshUntil;
  }

  /**
   * Milliseconds of freshness left (0 once expired)
   */
  remainingMs(now: number = Date.now()): number {
    return Math.max(0, this.freshUntil - now);
  }
}
