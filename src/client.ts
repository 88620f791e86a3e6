/**
 * Secret Resolution Client
 *
 * Main facade wiring configuration, the credential chain, the HTTP transport,
 * the store client and the caching resolver.
 *
 * @example
 * ```typescript
 * // Create client with explicit configuration
 * const client = new SecretResolutionClient({
 *   providerEndpoint: 'https://my-vault.vault.azure.net',
 *   defaultTtlMs: 60_000,
 * });
 *
 * // Or create from environment variables
 * const client = SecretResolutionClient.fromEnv();
 *
 * const secret = await client.resolver().get(secretReference('db-password'));
 * ```
 */

import {
  type NormalizedResolverConfig,
  type ResolverConfig,
  configFromEnv,
  normalizeConfig,
} from './config.js';
import {
  CredentialChain,
  createDefaultCredentialChain,
  type FetchLike,
  type TokenCredential,
} from './credentials/index.js';
import { HttpTransport } from './transport/index.js';
import { HttpSecretStoreClient, type SecretStoreClient } from './services/secrets/index.js';
import { CachingResolver, type RandomFn, type SleepFn } from './resolver/index.js';
import {
  ExpiryMonitor,
  NoOpRotationHandler,
  type ExpiryMonitorConfig,
  type RotationHandler,
} from './rotation/index.js';
import {
  type Logger,
  type MetricsCollector,
  NoOpLogger,
  NoOpMetricsCollector,
  withContext,
} from './observability/index.js';

/**
 * Options for creating a SecretResolutionClient
 */
export interface SecretResolutionClientOptions extends ResolverConfig {
  /** Credential chain, or the providers to build one from (default chain otherwise) */
  credential?: CredentialChain | TokenCredential[];
  /** Store implementation replacing the HTTP client (e.g. MockSecretStore) */
  store?: SecretStoreClient;
  /** fetch implementation used for store requests */
  fetch?: FetchLike;
  metrics?: MetricsCollector;
  logger?: Logger;
  rotationHandler?: RotationHandler;
  /** Expiry monitor settings */
  expiry?: Partial<ExpiryMonitorConfig>;
  /** Backoff sleep override */
  sleep?: SleepFn;
  /** Jitter source override */
  random?: RandomFn;
}

export class SecretResolutionClient {
  private readonly config: NormalizedResolverConfig;
  private readonly chain: CredentialChain;
  private readonly secretStore: SecretStoreClient;
  private readonly cachingResolver: CachingResolver;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly rotationHandler: RotationHandler;
  private readonly expiryConfig?: Partial<ExpiryMonitorConfig>;

  private _expiryMonitor?: ExpiryMonitor;

  /**
   * @throws {ConfigurationError} If configuration is invalid
   */
  constructor(options: SecretResolutionClientOptions) {
    const {
      credential,
      store,
      fetch: fetchImpl,
      metrics,
      logger,
      rotationHandler,
      expiry,
      sleep,
      random,
      ...resolverConfig
    } = options;

    this.config = normalizeConfig(resolverConfig);
    this.metrics = metrics ?? new NoOpMetricsCollector();
    this.logger = withContext(logger ?? new NoOpLogger(), {
      provider_host: this.config.providerHost,
    });
    this.rotationHandler = rotationHandler ?? new NoOpRotationHandler();
    this.expiryConfig = expiry;

    const chainOptions = { scope: this.config.tokenScope, logger: this.logger, metrics: this.metrics };
    if (credential instanceof CredentialChain) {
      this.chain = credential;
    } else if (credential) {
      this.chain = new CredentialChain(credential, chainOptions);
    } else {
      this.chain = createDefaultCredentialChain(chainOptions);
    }

    this.secretStore =
      store ??
      new HttpSecretStoreClient(
        new HttpTransport({
          baseUrl: this.config.providerEndpoint,
          apiVersion: this.config.apiVersion,
          timeout: this.config.perCallTimeoutMs,
          credentials: this.chain,
          fetch: fetchImpl,
        }),
        { logger: this.logger, metrics: this.metrics }
      );

    this.cachingResolver = new CachingResolver(this.secretStore, this.config, {
      logger: this.logger,
      metrics: this.metrics,
      rotationHandler: this.rotationHandler,
      sleep,
      random,
    });

    this.logger.debug('Secret resolution client created', {
      ttl_ms: this.config.defaultTtlMs,
      max_retries: this.config.maxRetries,
    });
  }

  /**
   * Create a client from SECRET_RESOLVER_* environment variables
   *
   * @throws {ConfigurationError} If required env vars are missing
   */
  static fromEnv(
    overrides?: Partial<SecretResolutionClientOptions>,
    env: NodeJS.ProcessEnv = process.env
  ): SecretResolutionClient {
    const envConfig = configFromEnv(env);
    return new SecretResolutionClient({
      ...envConfig,
      ...overrides,
    });
  }

  resolver(): CachingResolver {
    return this.cachingResolver;
  }

  store(): SecretStoreClient {
    return this.secretStore;
  }

  credentials(): CredentialChain {
    return this.chain;
  }

  /**
   * Expiry monitor over the store, notifying the client's rotation handler.
   * Created on first use; call `start()` on it to begin periodic checks.
   */
  expiryMonitor(): ExpiryMonitor {
    if (!this._expiryMonitor) {
      this._expiryMonitor = new ExpiryMonitor(this.secretStore, this.expiryConfig, {
        logger: this.logger,
        metrics: this.metrics,
      });
      this._expiryMonitor.addHandler(this.rotationHandler);
    }
    return this._expiryMonitor;
  }

  getConfig(): Readonly<NormalizedResolverConfig> {
    return { ...this.config };
  }

  /**
   * Stop background work (the expiry monitor, when started)
   */
  close(): void {
    this._expiryMonitor?.stop();
  }
}
