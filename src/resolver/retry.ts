/**
 * Retry policy with exponential backoff and jitter
 */

import { RetriesExhaustedError, isTransientError, type SecretResolverError } from '../error.js';
import { abortableSleep } from '../transport/abort.js';

export interface RetryPolicyConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  /** Fraction of each delay applied as random jitter, in both directions */
  jitter: number;
  /** Budget for the whole loop, measured from the first attempt */
  retryDeadlineMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Returns a number in [0, 1), like Math.random */
export type RandomFn = () => number;

export interface RetryPolicyDeps {
  sleep?: SleepFn;
  random?: RandomFn;
}

/**
 * Called before each retry with the 1-indexed attempt that just failed
 */
export type RetryListener = (attempt: number, error: SecretResolverError, delayMs: number) => void;

export interface ExecuteOptions {
  signal?: AbortSignal;
  onRetry?: RetryListener;
}

/**
 * Retries transient failures (`UnavailableError`, `TimeoutError`); anything
 * else is rethrown as is. When retries run out the last error is wrapped in
 * a `RetriesExhaustedError` carrying the attempt count and elapsed time.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private readonly sleep: SleepFn;
  private readonly random: RandomFn;

  constructor(config: RetryPolicyConfig, deps: RetryPolicyDeps = {}) {
    this.config = { ...config };
    this.sleep = deps.sleep ?? abortableSleep;
    this.random = deps.random ?? Math.random;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }

        const elapsedMs = Date.now() - startTime;
        if (attempt > this.config.maxRetries) {
          throw new RetriesExhaustedError(error, attempt, elapsedMs);
        }

        const delay = this.calculateDelay(attempt, error.retryAfterMs);
        if (elapsedMs + delay > this.config.retryDeadlineMs) {
          throw new RetriesExhaustedError(error, attempt, elapsedMs);
        }

        options.onRetry?.(attempt, error, delay);
        await this.sleep(delay, options.signal);
      }
    }
  }

  /**
   * Delay before retry number `retry` (1-indexed) without jitter:
   * baseBackoff * 2^(retry-1), capped at maxBackoff.
   */
  baseDelay(retry: number): number {
    const exponentialDelay = this.config.baseBackoffMs * Math.pow(2, retry - 1);
    return Math.min(exponentialDelay, this.config.maxBackoffMs);
  }

  /**
   * Delay before retry number `retry`, jittered and raised to the server's
   * Retry-After hint when one was given (never above maxBackoff).
   */
  calculateDelay(retry: number, retryAfterMs?: number): number {
    const cappedDelay = this.baseDelay(retry);

    // Random value between -jitter% and +jitter%
    const jitter = cappedDelay * this.config.jitter * (this.random() * 2 - 1);
    let delay = Math.max(0, Math.floor(cappedDelay + jitter));

    if (retryAfterMs !== undefined) {
      delay = Math.max(delay, Math.min(retryAfterMs, this.config.maxBackoffMs));
    }

    return delay;
  }

  getConfig(): Readonly<RetryPolicyConfig> {
    return { ...this.config };
  }
}
