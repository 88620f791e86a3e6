/**
 * Caching Resolver
 *
 * Application-facing entry point: serves cached secrets, collapses concurrent
 * misses into one store fetch per reference and retries transient failures.
 */

import { CacheManager, type CacheStats, type EvictionReason } from '../cache/index.js';
import { DEFAULT_CONFIG, type NormalizedResolverConfig } from '../config.js';
import { CancelledError, SecretResolverError, toError } from '../error.js';
import { type Logger, NoOpLogger } from '../observability/logging.js';
import {
  type MetricsCollector,
  NoOpMetricsCollector,
  METRICS,
  createErrorLabels,
  createOperationLabels,
} from '../observability/metrics.js';
import { warnOnExpiry } from '../rotation/expiry.js';
import { NoOpRotationHandler, type RotationHandler } from '../rotation/handler.js';
import type { CallOptions, SecretStoreClient } from '../services/secrets/index.js';
import {
  isLatest,
  referenceKey,
  type PutSecretOptions,
  type SecretReference,
  type SecretValue,
} from '../types/index.js';
import { validateSecretName } from '../validation.js';
import { RetryPolicy, type RandomFn, type SleepFn } from './retry.js';

export type CachingResolverOptions = Partial<
  Pick<
    NormalizedResolverConfig,
    'defaultTtlMs' | 'maxRetries' | 'baseBackoffMs' | 'maxBackoffMs' | 'jitter' | 'retryDeadlineMs' | 'maxEntries'
  >
>;

export interface CachingResolverDeps {
  logger?: Logger;
  metrics?: MetricsCollector;
  rotationHandler?: RotationHandler;
  /** Backoff sleep (default: timer-based, abortable) */
  sleep?: SleepFn;
  /** Jitter source (default: Math.random) */
  random?: RandomFn;
}

export interface GetOptions {
  /** Aborts this caller's wait only */
  signal?: AbortSignal;
}

/** Observable state of one reference */
export type ReferenceState = 'empty' | 'fetching' | 'cached';

/** Rotation notification; without a name every cached secret is dropped */
export interface RotationEvent {
  name?: string;
}

export interface ResolverStats extends CacheStats {
  /** Store fetch calls issued, retries included */
  fetches: number;
  inFlight: number;
}

interface FlightState {
  controller: AbortController;
  waiters: number;
  /** Invalidated while running: the outcome is returned but not cached */
  stale: boolean;
  settled: boolean;
}

interface Flight extends FlightState {
  promise: Promise<SecretValue>;
}

/**
 * Secret resolver with a TTL cache, single-flight fetches and retries.
 *
 * @example
 * ```typescript
 * const resolver = new CachingResolver(store, { defaultTtlMs: 60_000 });
 * const secret = await resolver.get(secretReference('db-password'));
 * connect(secret.value.expose());
 * ```
 */
export class CachingResolver {
  private readonly store: SecretStoreClient;
  private readonly cache: CacheManager;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly rotationHandler: RotationHandler;

  private readonly inFlight = new Map<string, Flight>();
  /** Last concrete version served for each unversioned reference */
  private readonly lastSeenVersions = new Map<string, string>();
  private fetchCount = 0;

  constructor(store: SecretStoreClient, options: CachingResolverOptions = {}, deps: CachingResolverDeps = {}) {
    this.store = store;
    this.logger = deps.logger ?? new NoOpLogger();
    this.metrics = deps.metrics ?? new NoOpMetricsCollector();
    this.rotationHandler = deps.rotationHandler ?? new NoOpRotationHandler();

    this.cache = new CacheManager(
      {
        ttl: options.defaultTtlMs ?? DEFAULT_CONFIG.defaultTtlMs,
        maxEntries: options.maxEntries ?? DEFAULT_CONFIG.maxEntries,
      },
      (key, reason) => this.onEvict(key, reason)
    );

    this.retry = new RetryPolicy(
      {
        maxRetries: options.maxRetries ?? DEFAULT_CONFIG.maxRetries,
        baseBackoffMs: options.baseBackoffMs ?? DEFAULT_CONFIG.baseBackoffMs,
        maxBackoffMs: options.maxBackoffMs ?? DEFAULT_CONFIG.maxBackoffMs,
        jitter: options.jitter ?? DEFAULT_CONFIG.jitter,
        retryDeadlineMs: options.retryDeadlineMs ?? DEFAULT_CONFIG.retryDeadlineMs,
      },
      { sleep: deps.sleep, random: deps.random }
    );
  }

  /**
   * Resolve a secret.
   *
   * Fresh cache entries are returned without touching the store. Otherwise
   * the caller joins the reference's in-flight fetch, or starts one.
   *
   * @throws {NotFoundError | UnauthorizedError} Immediately, never retried
   * @throws {RetriesExhaustedError} When transient failures outlast the retry budget
   * @throws {CancelledError} When `options.signal` aborts this caller's wait
   */
  async get(ref: SecretReference, options: GetOptions = {}): Promise<SecretValue> {
    validateSecretName(ref.name);
    const key = referenceKey(ref);

    const cached = this.cache.get(key);
    if (cached) {
      this.metrics.increment(METRICS.CACHE_HITS, 1, createOperationLabels('get'));
      return cached;
    }
    this.metrics.increment(METRICS.CACHE_MISSES, 1, createOperationLabels('get'));

    if (options.signal?.aborted) {
      throw this.cancelled(ref);
    }

    let flight = this.inFlight.get(key);
    if (flight) {
      this.metrics.increment(METRICS.SINGLE_FLIGHT_JOINS);
      this.logger.debug('Joining in-flight fetch', { secret_name: ref.name, version: ref.version });
    } else {
      flight = this.startFlight(ref, key);
    }
    flight.waiters++;

    return this.waitFor(flight, ref, key, options.signal);
  }

  /**
   * Remove the cached entry for `ref`. No error if absent.
   */
  invalidate(ref: SecretReference): void {
    const key = referenceKey(ref);
    this.cache.invalidate(key);
    this.detachFlight(key);
  }

  /**
   * Remove every cached version of a secret
   */
  invalidateSecret(name: string): void {
    const prefix = `${name}:`;
    const removed = this.cache.invalidateWhere((key) => key.startsWith(prefix));
    for (const key of [...this.inFlight.keys()]) {
      if (key.startsWith(prefix)) {
        this.detachFlight(key);
      }
    }
    this.logger.debug('Invalidated secret', { secret_name: name, entries: removed });
  }

  /**
   * Clear the whole cache
   */
  invalidateAll(): void {
    this.cache.clear();
    for (const key of [...this.inFlight.keys()]) {
      this.detachFlight(key);
    }
    this.logger.debug('Invalidated all cached secrets');
  }

  /**
   * Apply a rotation notification
   */
  handleRotationEvent(event: RotationEvent = {}): void {
    this.logger.info('Rotation event received', { secret_name: event.name ?? '*' });
    if (event.name) {
      this.invalidateSecret(event.name);
    } else {
      this.invalidateAll();
    }
  }

  /**
   * Write a new version through the store, then drop cached versions of the
   * name so the next unversioned `get` observes the write.
   */
  async put(
    name: string,
    value: string | Uint8Array,
    options: PutSecretOptions & CallOptions = {}
  ): Promise<SecretValue> {
    const secret = await this.store.put(name, value, options);
    this.invalidateSecret(name);
    return secret;
  }

  state(ref: SecretReference): ReferenceState {
    const key = referenceKey(ref);
    if (this.inFlight.has(key)) {
      return 'fetching';
    }
    return this.cache.has(key) ? 'cached' : 'empty';
  }

  /**
   * Evict entries past their freshness deadline
   * @returns number of evicted entries
   */
  prune(): number {
    return this.cache.prune();
  }

  stats(): ResolverStats {
    return {
      ...this.cache.getStats(),
      fetches: this.fetchCount,
      inFlight: this.inFlight.size,
    };
  }

  private startFlight(ref: SecretReference, key: string): Flight {
    const state: FlightState = {
      controller: new AbortController(),
      waiters: 0,
      stale: false,
      settled: false,
    };
    const flight = Object.assign(state, { promise: this.runFlight(ref, key, state) });
    this.inFlight.set(key, flight);
    return flight;
  }

  private async runFlight(ref: SecretReference, key: string, state: FlightState): Promise<SecretValue> {
    const startTime = Date.now();
    const { signal } = state.controller;

    try {
      const secret = await this.retry.execute(
        (attempt) => {
          this.fetchCount++;
          this.metrics.increment(METRICS.FETCH_ATTEMPTS, 1, createOperationLabels('fetch'));
          this.logger.debug('Fetching secret', { secret_name: ref.name, version: ref.version, attempt });
          return this.store.fetch(ref, { signal });
        },
        {
          signal,
          onRetry: (attempt, error, delayMs) => {
            this.metrics.increment(METRICS.RETRY_ATTEMPTS, 1, createErrorLabels('fetch', error.code));
            this.logger.warn('Transient fetch failure, retrying', {
              secret_name: ref.name,
              attempt,
              delay_ms: delayMs,
              error_code: error.code,
            });
          },
        }
      );

      this.metrics.histogram(METRICS.FETCH_DURATION_MS, Date.now() - startTime, createOperationLabels('get'));
      warnOnExpiry(secret, this.logger);

      if (!state.stale) {
        const entry = this.cache.set(key, secret);
        if (!entry) {
          this.logger.warn('Fetched secret is past its expiry and was not cached', {
            secret_name: secret.name,
            version: secret.version,
          });
        }
        this.metrics.gauge(METRICS.CACHE_SIZE, this.cache.size);
      }

      if (isLatest(ref)) {
        this.trackVersion(key, secret);
      }

      return secret;
    } catch (error) {
      const err = toError(error);
      if (err instanceof CancelledError) {
        this.logger.debug('Fetch abandoned by all waiters', { secret_name: ref.name });
      } else {
        const code = err instanceof SecretResolverError ? err.code : 'Unknown';
        this.metrics.increment(METRICS.FETCH_ERRORS, 1, createErrorLabels('get', code));
        this.logger.error('Failed to resolve secret', err, { secret_name: ref.name, version: ref.version });
      }
      throw error;
    } finally {
      state.settled = true;
      if (this.inFlight.get(key) === state) {
        this.inFlight.delete(key);
      }
    }
  }

  /**
   * Wait for a flight on behalf of one caller. Aborting `signal` rejects
   * only this wait; the last waiter to leave aborts the fetch itself.
   */
  private waitFor(
    flight: Flight,
    ref: SecretReference,
    key: string,
    signal?: AbortSignal
  ): Promise<SecretValue> {
    if (!signal) {
      return flight.promise;
    }

    return new Promise<SecretValue>((resolve, reject) => {
      const onAbort = (): void => {
        this.leave(flight, ref, key);
        reject(this.cancelled(ref));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private leave(flight: Flight, ref: SecretReference, key: string): void {
    flight.waiters--;
    if (flight.waiters > 0 || flight.settled) {
      return;
    }

    this.logger.debug('All waiters cancelled, aborting fetch', { secret_name: ref.name });
    if (this.inFlight.get(key) === flight) {
      this.inFlight.delete(key);
    }
    flight.controller.abort(this.cancelled(ref));
  }

  /**
   * Unregister a running fetch so the next `get` starts a new one
   */
  private detachFlight(key: string): void {
    const flight = this.inFlight.get(key);
    if (flight) {
      flight.stale = true;
      this.inFlight.delete(key);
    }
  }

  private trackVersion(key: string, secret: SecretValue): void {
    const previousVersion = this.lastSeenVersions.get(key);
    this.lastSeenVersions.set(key, secret.version);

    if (previousVersion === undefined || previousVersion === secret.version) {
      return;
    }

    this.metrics.increment(METRICS.SECRET_ROTATIONS, 1, { secret_name: secret.name });
    this.logger.info('Secret rotated', {
      secret_name: secret.name,
      previous_version: previousVersion,
      version: secret.version,
    });

    // Handlers may also throw synchronously; neither form reaches the caller
    Promise.resolve()
      .then(() => this.rotationHandler.onSecretRotated(secret, previousVersion))
      .catch((error: unknown) => {
        this.logger.error('Rotation handler failed', toError(error), { secret_name: secret.name });
      });
  }

  private onEvict(key: string, reason: EvictionReason): void {
    this.metrics.increment(METRICS.CACHE_EVICTIONS, 1, { reason });
    this.logger.debug('Cache entry evicted', { key, reason });
  }

  private cancelled(ref: SecretReference): CancelledError {
    return new CancelledError({ message: `Wait for secret '${ref.name}' was cancelled`, secretName: ref.name });
  }
}
