/**
 * Secret Store Service
 *
 * Raw remote operations against the secret provider.
 */

export { HttpSecretStoreClient, type HttpSecretStoreClientOptions } from './service.js';
export {
  secretAttributesSchema,
  secretBundleSchema,
  secretItemSchema,
  secretListResultSchema,
  type CallOptions,
  type SecretAttributes,
  type SecretBundle,
  type SecretItem,
  type SecretListResult,
  type SecretStoreClient,
} from './types.js';
