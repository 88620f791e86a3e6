export type { CredentialToken, TokenCredential, FetchLike } from './types.js';

export {
  DEFAULT_AUTHORITY_HOST,
  scopeToResource,
  StaticTokenCredential,
  ClientSecretCredential,
  EnvironmentCredential,
  ManagedIdentityCredential,
  AzureCliCredential,
  type ClientSecretCredentialOptions,
  type ManagedIdentityCredentialOptions,
  type AzureCliCredentialOptions,
  type CommandRunner,
} from './providers.js';

export {
  TOKEN_REFRESH_MARGIN_MS,
  CredentialChain,
  createDefaultCredentialChain,
  type CredentialChainOptions,
} from './chain.js';
