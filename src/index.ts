/**
 * Secret Resolver
 *
 * Client-side secret resolution: a credential chain for bearer tokens, a
 * store client for the provider's REST API and a caching resolver with
 * single-flight fetches, retries and rotation-aware invalidation.
 *
 * @example
 * ```typescript
 * import { SecretResolutionClient, secretReference } from 'secret-resolver';
 *
 * const client = SecretResolutionClient.fromEnv();
 * const secret = await client.resolver().get(secretReference('db-password'));
 *
 * // SecretString prevents accidental logging
 * const dbPassword = secret.value.expose();
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { SecretResolutionClient, type SecretResolutionClientOptions } from './client.js';

// Configuration
export {
  DEFAULT_CONFIG,
  DEFAULT_TOKEN_SCOPE,
  normalizeConfig,
  configFromEnv,
  type ResolverConfig,
  type NormalizedResolverConfig,
} from './config.js';

// Credentials
export * from './credentials/index.js';

// Transport
export * from './transport/index.js';

// Store client
export * from './services/secrets/index.js';

// Resolver
export * from './resolver/index.js';

// Cache
export {
  CacheEntry,
  CacheManager,
  type CacheConfig,
  type CacheStats,
  type EvictionReason,
} from './cache/index.js';

// Rotation
export * from './rotation/index.js';

// Simulation
export * from './simulation/index.js';

// Types
export * from './types/index.js';

// Errors
export {
  SecretResolverError,
  NotFoundError,
  UnauthorizedError,
  UnavailableError,
  TimeoutError,
  CancelledError,
  InvalidResponseError,
  ProviderUnavailableError,
  NoCredentialAvailableError,
  RetriesExhaustedError,
  ConfigurationError,
  InvalidSecretNameError,
  SecretTooLargeError,
  isTransientError,
  isRetryableStatus,
  createErrorFromResponse,
  type ProviderFailure,
  type SecretResolverErrorOptions,
} from './error.js';

// Validation
export {
  SECRET_NAME_MAX_LENGTH,
  SECRET_VALUE_MAX_SIZE,
  validateSecretName,
  validateSecretValueSize,
} from './validation.js';

// Observability
export * from './observability/index.js';
