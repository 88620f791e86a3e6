/**
 * Common Types
 *
 * Timestamp and identifier helpers shared across the resolver.
 */

/**
 * Timestamp handling utilities
 *
 * The provider API expresses timestamps as Unix seconds.
 */
export class TimestampUtils {
  /**
   * Convert Unix timestamp (seconds) to Date
   */
  static fromUnixSeconds(timestamp?: number): Date | undefined {
    return timestamp ? new Date(timestamp * 1000) : undefined;
  }

  /**
   * Convert Date to Unix timestamp (seconds)
   */
  static toUnixSeconds(date?: Date): number | undefined {
    return date ? Math.floor(date.getTime() / 1000) : undefined;
  }

  /**
   * Check if timestamp is expired
   */
  static isExpired(expiresOn?: Date, now: number = Date.now()): boolean {
    return expiresOn ? expiresOn.getTime() <= now : false;
  }
}

/**
 * Split a secret identifier URL into name and version.
 *
 * Identifiers look like `{endpoint}/secrets/{name}/{version}`; the version
 * segment is absent on list items.
 */
export function parseSecretId(id: string): { name?: string; version?: string } {
  let path: string;
  try {
    path = new URL(id).pathname;
  } catch {
    path = id;
  }

  const segments = path.split('/').filter((segment) => segment.length > 0);
  const index = segments.lastIndexOf('secrets');
  if (index === -1) {
    return {};
  }

  return {
    name: segments[index + 1],
    version: segments[index + 2],
  };
}
