/**
 * Secret references
 */

import { validateSecretName } from '../validation.js';

/** Version marker meaning "whatever the provider currently serves" */
export const LATEST_VERSION = 'latest';

/**
 * Identifies a secret in the store. Immutable once created.
 */
export interface SecretReference {
  readonly name: string;
  readonly version: string;
}

/**
 * Create a validated, frozen reference.
 *
 * @example
 * ```typescript
 * const current = secretReference('db-password');
 * const pinned = secretReference('db-password', '3f1c9a');
 * ```
 */
export function secretReference(name: string, version?: string): SecretReference {
  validateSecretName(name);
  return Object.freeze({
    name,
    version: version && version.length > 0 ? version : LATEST_VERSION,
  });
}

/**
 * True when the reference follows the provider's current version.
 */
export function isLatest(ref: SecretReference): boolean {
  return ref.version === LATEST_VERSION;
}

/**
 * Cache and in-flight registry key for a reference.
 * Format: {name}:{version|"latest"}
 */
export function referenceKey(ref: SecretReference): string {
  return `${ref.name}:${ref.version}`;
}
