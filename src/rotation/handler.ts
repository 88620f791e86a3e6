/**
 * Rotation Handler
 *
 * Receives rotation-related notifications: secrets nearing expiry (from the
 * expiry monitor) and new versions observed by the resolver.
 */

import type { SecretMetadata, SecretValue } from '../types/index.js';

export interface RotationHandler {
  /**
   * Called when a secret is near expiry.
   *
   * @param daysUntilExpiry - Whole days left, negative once expired
   */
  onNearExpiry(secret: SecretMetadata, daysUntilExpiry: number): Promise<void>;

  /**
   * Called when an unversioned reference starts resolving to a new version.
   */
  onSecretRotated(secret: SecretValue, previousVersion: string): Promise<void>;
}

/**
 * Handler that ignores every notification
 */
export class NoOpRotationHandler implements RotationHandler {
  async onNearExpiry(_secret: SecretMetadata, _daysUntilExpiry: number): Promise<void> {
    // No-op
  }

  async onSecretRotated(_secret: SecretValue, _previousVersion: string): Promise<void> {
    // No-op
  }
}
