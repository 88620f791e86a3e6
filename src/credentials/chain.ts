/**
 * Credential Chain
 *
 * Tries token providers in a fixed priority order and caches the first token
 * obtained until it gets close to expiry.
 */

import { DEFAULT_TOKEN_SCOPE } from '../config.js';
import {
  ConfigurationError,
  NoCredentialAvailableError,
  toError,
  type ProviderFailure,
} from '../error.js';
import { type Logger, NoOpLogger } from '../observability/logging.js';
import { type MetricsCollector, NoOpMetricsCollector, METRICS } from '../observability/metrics.js';
import {
  AzureCliCredential,
  EnvironmentCredential,
  ManagedIdentityCredential,
} from './providers.js';
import type { CredentialToken, TokenCredential } from './types.js';

/** Tokens are re-acquired once they are this close to expiry */
export const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000; // 5 minutes

export interface CredentialChainOptions {
  /** Scope requested from every provider */
  scope?: string;
  /** Safety margin before expiry (default: 5 minutes) */
  refreshMarginMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Ordered set of token providers behind a single `resolve()`.
 *
 * @example
 * ```typescript
 * const chain = new CredentialChain([
 *   new EnvironmentCredential(),
 *   new AzureCliCredential(),
 * ]);
 * const { token } = await chain.resolve();
 * ```
 */
export class CredentialChain {
  private readonly providers: readonly TokenCredential[];
  private readonly scope: string;
  private readonly refreshMarginMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  private cachedToken?: CredentialToken;
  private activeProvider?: string;
  private pending?: Promise<CredentialToken>;

  constructor(providers: TokenCredential[], options: CredentialChainOptions = {}) {
    if (providers.length === 0) {
      throw new ConfigurationError({ message: 'At least one credential provider is required' });
    }
    this.providers = [...providers];
    this.scope = options.scope ?? DEFAULT_TOKEN_SCOPE;
    this.refreshMarginMs = options.refreshMarginMs ?? TOKEN_REFRESH_MARGIN_MS;
    this.logger = options.logger ?? new NoOpLogger();
    this.metrics = options.metrics ?? new NoOpMetricsCollector();
  }

  /**
   * Return a token that stays valid for at least the refresh margin.
   *
   * @throws {NoCredentialAvailableError} If every provider fails
   */
  async resolve(): Promise<CredentialToken> {
    if (this.cachedToken && this.isFresh(this.cachedToken)) {
      return this.cachedToken;
    }

    // Concurrent callers share one acquisition
    if (!this.pending) {
      this.pending = this.acquire().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /**
   * Drop the cached token so the next `resolve()` re-acquires.
   */
  invalidate(): void {
    this.cachedToken = undefined;
    this.activeProvider = undefined;
  }

  /**
   * Name of the provider that produced the cached token, if any
   */
  getActiveProvider(): string | undefined {
    return this.activeProvider;
  }

  getScope(): string {
    return this.scope;
  }

  private isFresh(token: CredentialToken): boolean {
    return token.expiresOn.getTime() - Date.now() > this.refreshMarginMs;
  }

  private async acquire(): Promise<CredentialToken> {
    const failures: ProviderFailure[] = [];

    for (const provider of this.providers) {
      try {
        const token = await provider.getToken(this.scope);
        this.cachedToken = token;
        this.activeProvider = provider.name;
        this.metrics.increment(METRICS.CREDENTIAL_ACQUISITIONS, 1, { provider: provider.name });
        this.logger.debug('Acquired access token', {
          provider: provider.name,
          expires_on: token.expiresOn.toISOString(),
          skipped_providers: failures.length,
        });
        return token;
      } catch (error) {
        const reason = toError(error).message;
        failures.push({ provider: provider.name, reason });
        this.logger.debug('Credential provider unavailable', { provider: provider.name, reason });
      }
    }

    this.metrics.increment(METRICS.CREDENTIAL_FAILURES);
    const error = new NoCredentialAvailableError(failures);
    this.logger.error('No credential provider succeeded', error, {
      providers: failures.map((f) => f.provider),
    });
    throw error;
  }
}

/**
 * Create the default chain.
 *
 * Tries providers in this order:
 * 1. Environment-configured client secret
 * 2. Platform-injected managed identity
 * 3. Local developer login (Azure CLI)
 */
export function createDefaultCredentialChain(options: CredentialChainOptions = {}): CredentialChain {
  return new CredentialChain(
    [new EnvironmentCredential(), new ManagedIdentityCredential(), new AzureCliCredential()],
    options
  );
}
