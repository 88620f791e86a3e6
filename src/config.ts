/**
 * Secret Resolver Configuration
 *
 * Configuration types, defaults and validation for the resolver and the
 * store client it drives. All durations are in milliseconds.
 */

import { z } from 'zod';
import { ConfigurationError } from './error.js';

/** Token scope requested from identity providers by default */
export const DEFAULT_TOKEN_SCOPE = 'https://vault.azure.net/.default';

/**
 * Resolver configuration as supplied by the application
 */
export interface ResolverConfig {
  /** Base URL of the secret provider (e.g., https://myvault.vault.azure.net) */
  providerEndpoint: string;
  /** Cache time-to-live (default: 300000 = 5 minutes) */
  defaultTtlMs?: number;
  /** Retries after the first attempt for transient failures (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry (default: 200) */
  baseBackoffMs?: number;
  /** Upper bound for any single retry delay (default: 10000) */
  maxBackoffMs?: number;
  /** Jitter applied to each delay as a fraction of it (default: 0.1) */
  jitter?: number;
  /** Timeout for each network call (default: 10000) */
  perCallTimeoutMs?: number;
  /** Overall budget for the retry loop of one fetch (default: 60000) */
  retryDeadlineMs?: number;
  /** Maximum number of cache entries (default: 1000) */
  maxEntries?: number;
  /** Optional api-version query parameter sent with every request */
  apiVersion?: string;
  /** Scope requested from the credential chain */
  tokenScope?: string;
}

/**
 * Normalized configuration with all defaults applied
 */
export interface NormalizedResolverConfig {
  /** Provider endpoint, no trailing slash */
  providerEndpoint: string;
  /** Provider hostname (extracted from URL) */
  providerHost: string;
  defaultTtlMs: number;
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  jitter: number;
  perCallTimeoutMs: number;
  retryDeadlineMs: number;
  maxEntries: number;
  apiVersion?: string;
  tokenScope: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  defaultTtlMs: 300000, // 5 minutes
  maxRetries: 3,
  baseBackoffMs: 200,
  maxBackoffMs: 10000,
  jitter: 0.1,
  perCallTimeoutMs: 10000,
  retryDeadlineMs: 60000,
  maxEntries: 1000,
  tokenScope: DEFAULT_TOKEN_SCOPE,
} as const;

const endpointSchema = z
  .string()
  .trim()
  .url({ message: 'Provider endpoint must be a valid URL' })
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'Provider endpoint must use http or https',
  });

const configSchema = z
  .object({
    providerEndpoint: endpointSchema,
    defaultTtlMs: z.number().int().min(1).default(DEFAULT_CONFIG.defaultTtlMs),
    maxRetries: z.number().int().min(0).max(10).default(DEFAULT_CONFIG.maxRetries),
    baseBackoffMs: z.number().int().min(0).default(DEFAULT_CONFIG.baseBackoffMs),
    maxBackoffMs: z.number().int().min(0).default(DEFAULT_CONFIG.maxBackoffMs),
    jitter: z.number().min(0).max(1).default(DEFAULT_CONFIG.jitter),
    perCallTimeoutMs: z.number().int().min(1).default(DEFAULT_CONFIG.perCallTimeoutMs),
    retryDeadlineMs: z.number().int().min(1).default(DEFAULT_CONFIG.retryDeadlineMs),
    maxEntries: z.number().int().min(1).default(DEFAULT_CONFIG.maxEntries),
    apiVersion: z.string().min(1).optional(),
    tokenScope: z.string().min(1).default(DEFAULT_CONFIG.tokenScope),
  })
  // Misspelled keys would otherwise fall back to defaults unnoticed
  .strict()
  .refine((config) => config.maxBackoffMs >= config.baseBackoffMs, {
    message: 'maxBackoffMs must not be lower than baseBackoffMs',
    path: ['maxBackoffMs'],
  });

/**
 * Normalize and validate configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function normalizeConfig(config: ResolverConfig): NormalizedResolverConfig {
  const result = configSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError({ message: `Invalid resolver configuration: ${issues}` });
  }

  const parsed = result.data;
  const providerEndpoint = parsed.providerEndpoint.replace(/\/+$/, '');

  return {
    ...parsed,
    providerEndpoint,
    providerHost: new URL(providerEndpoint).hostname,
  };
}

/**
 * Create configuration from environment variables
 *
 * Environment variables:
 * - SECRET_RESOLVER_ENDPOINT: Provider URL (required)
 * - SECRET_RESOLVER_TTL_MS: Cache TTL
 * - SECRET_RESOLVER_MAX_RETRIES: Retries for transient failures
 * - SECRET_RESOLVER_BASE_BACKOFF_MS / SECRET_RESOLVER_MAX_BACKOFF_MS: Backoff bounds
 * - SECRET_RESOLVER_TIMEOUT_MS: Per-call timeout
 * - SECRET_RESOLVER_RETRY_DEADLINE_MS: Overall retry budget
 * - SECRET_RESOLVER_CACHE_MAX_ENTRIES: Cache capacity
 * - SECRET_RESOLVER_API_VERSION: api-version query parameter
 * - SECRET_RESOLVER_TOKEN_SCOPE: Token scope
 *
 * @throws {ConfigurationError} If the endpoint is missing or a number is malformed
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const providerEndpoint = env['SECRET_RESOLVER_ENDPOINT'];
  if (!providerEndpoint) {
    throw new ConfigurationError({
      message: 'SECRET_RESOLVER_ENDPOINT environment variable is required',
    });
  }

  const config: ResolverConfig = { providerEndpoint };

  const numeric: Array<[string, 'defaultTtlMs' | 'maxRetries' | 'baseBackoffMs' | 'maxBackoffMs' | 'perCallTimeoutMs' | 'retryDeadlineMs' | 'maxEntries']> = [
    ['SECRET_RESOLVER_TTL_MS', 'defaultTtlMs'],
    ['SECRET_RESOLVER_MAX_RETRIES', 'maxRetries'],
    ['SECRET_RESOLVER_BASE_BACKOFF_MS', 'baseBackoffMs'],
    ['SECRET_RESOLVER_MAX_BACKOFF_MS', 'maxBackoffMs'],
    ['SECRET_RESOLVER_TIMEOUT_MS', 'perCallTimeoutMs'],
    ['SECRET_RESOLVER_RETRY_DEADLINE_MS', 'retryDeadlineMs'],
    ['SECRET_RESOLVER_CACHE_MAX_ENTRIES', 'maxEntries'],
  ];

  for (const [variable, key] of numeric) {
    const raw = env[variable];
    if (raw) {
      config[key] = parseInteger(variable, raw);
    }
  }

  const apiVersion = env['SECRET_RESOLVER_API_VERSION'];
  if (apiVersion) {
    config.apiVersion = apiVersion;
  }

  const tokenScope = env['SECRET_RESOLVER_TOKEN_SCOPE'];
  if (tokenScope) {
    config.tokenScope = tokenScope;
  }

  return config;
}

function parseInteger(variable: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError({
      message: `${variable} must be a non-negative integer, got "${raw}"`,
    });
  }
  return parseInt(raw, 10);
}
