/**
 * Secret Name and Value Validation
 *
 * Naming and size constraints shared by references and writes.
 */

import { InvalidSecretNameError, SecretTooLargeError } from './error.js';

/**
 * Maximum secret value size in bytes (25 KB)
 */
export const SECRET_VALUE_MAX_SIZE = 25 * 1024;

/**
 * Maximum secret name length
 */
export const SECRET_NAME_MAX_LENGTH = 127;

/**
 * Only alphanumeric characters and hyphens, no leading or trailing hyphen
 */
const NAME_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;

/**
 * Validate a secret name
 *
 * @throws {InvalidSecretNameError} If name is invalid
 *
 * @example
 * ```typescript
 * validateSecretName('db-password');  // OK
 * validateSecretName('-invalid');     // Throws InvalidSecretNameError
 * validateSecretName('invalid_name'); // Throws InvalidSecretNameError
 * ```
 */
export function validateSecretName(name: string): void {
  if (!name) {
    throw new InvalidSecretNameError({
      message: 'Secret name cannot be empty',
    });
  }

  if (name.length > SECRET_NAME_MAX_LENGTH) {
    throw new InvalidSecretNameError({
      message: `Secret name cannot exceed ${SECRET_NAME_MAX_LENGTH} characters (got ${name.length})`,
      secretName: name,
    });
  }

  if (!NAME_PATTERN.test(name)) {
    throw new InvalidSecretNameError({
      message: `Secret name '${name}' is invalid. Must contain only alphanumeric characters and hyphens, and cannot start or end with a hyphen`,
      secretName: name,
    });
  }
}

/**
 * Validate the encoded size of a secret value
 *
 * @throws {SecretTooLargeError} If value exceeds size limit
 */
export function validateSecretValueSize(value: string, secretName?: string): void {
  const byteSize = new TextEncoder().encode(value).length;

  if (byteSize > SECRET_VALUE_MAX_SIZE) {
    throw new SecretTooLargeError({
      message: `Secret value size (${byteSize} bytes) exceeds maximum allowed size (${SECRET_VALUE_MAX_SIZE} bytes)`,
      secretName,
      size: byteSize,
      maxSize: SECRET_VALUE_MAX_SIZE,
    });
  }
}
