/**
 * Secret Resolver Types
 *
 * Central export point for shared type definitions.
 */

export { TimestampUtils, parseSecretId } from './common.js';

export {
  LATEST_VERSION,
  secretReference,
  isLatest,
  referenceKey,
  type SecretReference,
} from './reference.js';

export {
  BINARY_CONTENT_TYPE,
  SecretString,
  encodeSecretPayload,
  secretBytes,
  type SecretValue,
  type SecretMetadata,
  type PutSecretOptions,
  type ListSecretsOptions,
} from './secret.js';
