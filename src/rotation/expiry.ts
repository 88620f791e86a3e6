/**
 * Expiry classification shared by the resolver and the expiry monitor
 */

import type { Logger } from '../observability/logging.js';
import type { SecretMetadata } from '../types/index.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Window before expiry in which fetched secrets are reported (7 days) */
export const DEFAULT_EXPIRY_WARNING_MS = 7 * DAY_MS;

export type ExpiryStatus =
  | { state: 'none' }
  | { state: 'valid'; daysUntilExpiry: number }
  | { state: 'expiring'; daysUntilExpiry: number }
  | { state: 'expired'; daysSinceExpiry: number };

/**
 * Whole days until `expiresAt`, negative once it has passed
 */
export function daysUntilExpiry(expiresAt: Date, now: number = Date.now()): number {
  return Math.floor((expiresAt.getTime() - now) / DAY_MS);
}

export function expiryStatus(
  expiresAt: Date | undefined,
  now: number = Date.now(),
  warningWindowMs: number = DEFAULT_EXPIRY_WARNING_MS
): ExpiryStatus {
  if (!expiresAt) {
    return { state: 'none' };
  }

  const remaining = expiresAt.getTime() - now;
  if (remaining <= 0) {
    return { state: 'expired', daysSinceExpiry: Math.floor(-remaining / DAY_MS) };
  }

  const days = Math.floor(remaining / DAY_MS);
  return remaining < warningWindowMs
    ? { state: 'expiring', daysUntilExpiry: days }
    : { state: 'valid', daysUntilExpiry: days };
}

/**
 * Log a warning for an expired or soon-to-expire secret
 */
export function warnOnExpiry(
  secret: Pick<SecretMetadata, 'name' | 'version' | 'expiresAt'>,
  logger: Logger,
  now: number = Date.now()
): ExpiryStatus {
  const status = expiryStatus(secret.expiresAt, now);
  const expiresAt = secret.expiresAt?.toISOString();

  if (status.state === 'expired') {
    logger.warn(`Secret '${secret.name}' has already expired`, {
      secret_name: secret.name,
      version: secret.version,
      expired_at: expiresAt,
      expired_days_ago: status.daysSinceExpiry,
    });
  } else if (status.state === 'expiring') {
    logger.warn(`Secret '${secret.name}' will expire soon`, {
      secret_name: secret.name,
      version: secret.version,
      expires_at: expiresAt,
      days_until_expiry: status.daysUntilExpiry,
    });
  }

  return status;
}
