/**
 * Secret Resolver Error Types
 *
 * Every failure surfaced by the credential chain, the store client and the
 * caching resolver is a `SecretResolverError`. The `retryable` flag is the
 * transient/permanent classification the resolver's retry loop relies on.
 */

/** Base error options */
export interface SecretResolverErrorOptions {
  message: string;
  statusCode?: number;
  code?: string;
  secretName?: string;
  requestId?: string;
  retryable?: boolean;
  retryAfterMs?: number;
  cause?: Error;
}

type SubclassOptions = Omit<SecretResolverErrorOptions, 'retryable' | 'code'>;

/**
 * Base class for all secret resolver errors
 */
export class SecretResolverError extends Error {
  public readonly statusCode?: number;
  public readonly code: string;
  public readonly secretName?: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;
  public override readonly cause?: Error;

  constructor(options: SecretResolverErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code ?? 'Unknown';
    this.secretName = options.secretName;
    this.requestId = options.requestId;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Check if error is retryable */
  isRetryable(): boolean {
    return this.retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      secretName: this.secretName,
      requestId: this.requestId,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * Secret or secret version does not exist (404) - not retryable
 */
export class NotFoundError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'NotFound' });
  }
}

/**
 * Token rejected or lacks permission (401/403) - not retryable
 */
export class UnauthorizedError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'Unauthorized' });
  }
}

/**
 * Transport failure or service-side error (429, 5xx) - retryable
 */
export class UnavailableError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: true, code: 'Unavailable' });
  }
}

/**
 * Per-call timeout elapsed - retryable
 */
export class TimeoutError extends SecretResolverError {
  public readonly timeoutMs: number;

  constructor(options: SubclassOptions & { timeoutMs: number }) {
    super({ ...options, retryable: true, code: 'Timeout' });
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * The caller aborted its own wait - not retryable
 */
export class CancelledError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'Cancelled' });
  }
}

/**
 * Response body did not have the expected shape - not retryable
 */
export class InvalidResponseError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'InvalidResponse' });
  }
}

/**
 * A single credential provider could not produce a token
 */
export class ProviderUnavailableError extends SecretResolverError {
  public readonly provider: string;

  constructor(options: SubclassOptions & { provider: string }) {
    super({ ...options, retryable: false, code: 'ProviderUnavailable' });
    this.provider = options.provider;
  }
}

/** One provider's failure, as aggregated by the credential chain */
export interface ProviderFailure {
  provider: string;
  reason: string;
}

/**
 * Every provider in the credential chain failed
 */
export class NoCredentialAvailableError extends SecretResolverError {
  public readonly failures: readonly ProviderFailure[];

  constructor(failures: ProviderFailure[]) {
    const details = failures.map((f) => `  - ${f.provider}: ${f.reason}`).join('\n');
    super({
      message: `No credential provider succeeded:\n${details}`,
      retryable: false,
      code: 'NoCredentialAvailable',
    });
    this.failures = Object.freeze([...failures]);
  }
}

/**
 * A transient failure persisted through every retry
 */
export class RetriesExhaustedError extends SecretResolverError {
  public readonly attempts: number;
  public readonly elapsedMs: number;
  public readonly lastError: SecretResolverError;

  constructor(lastError: SecretResolverError, attempts: number, elapsedMs: number) {
    super({
      message: `${lastError.message} (after ${attempts} attempts in ${elapsedMs}ms)`,
      statusCode: lastError.statusCode,
      secretName: lastError.secretName,
      requestId: lastError.requestId,
      retryable: false,
      code: 'RetriesExhausted',
      cause: lastError,
    });
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.lastError = lastError;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
      elapsedMs: this.elapsedMs,
      lastErrorCode: this.lastError.code,
    };
  }
}

/**
 * Configuration error - not retryable
 */
export class ConfigurationError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'ConfigurationError' });
  }
}

/**
 * Invalid secret name error - not retryable
 */
export class InvalidSecretNameError extends SecretResolverError {
  constructor(options: SubclassOptions) {
    super({ ...options, retryable: false, code: 'InvalidSecretName' });
  }
}

/**
 * Secret too large error - not retryable
 */
export class SecretTooLargeError extends SecretResolverError {
  public readonly size: number;
  public readonly maxSize: number;

  constructor(options: SubclassOptions & { size: number; maxSize: number }) {
    super({ ...options, retryable: false, code: 'SecretTooLarge' });
    this.size = options.size;
    this.maxSize = options.maxSize;
  }
}

/**
 * Transient errors are the ones worth another attempt.
 */
export function isTransientError(error: unknown): error is UnavailableError | TimeoutError {
  return error instanceof UnavailableError || error instanceof TimeoutError;
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create error from HTTP response
 */
export function createErrorFromResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>,
  secretName?: string
): SecretResolverError {
  const requestId = headers?.['x-ms-request-id'] ?? headers?.['x-request-id'];
  const retryAfter = headers?.['retry-after'];
  const retryAfterSeconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
  const retryAfterMs = Number.isNaN(retryAfterSeconds) ? undefined : retryAfterSeconds * 1000;

  const { code, message } = extractErrorDetails(body, statusCode);
  const baseOptions = { message, statusCode, requestId, secretName, retryAfterMs };

  switch (statusCode) {
    case 401:
    case 403:
      return new UnauthorizedError(baseOptions);
    case 404:
      return new NotFoundError(baseOptions);
    default:
      if (isRetryableStatus(statusCode)) {
        return new UnavailableError(baseOptions);
      }
      return new SecretResolverError({
        ...baseOptions,
        code: code ?? `Http${statusCode}`,
        retryable: false,
      });
  }
}

function extractErrorDetails(
  body: unknown,
  statusCode: number
): { code?: string; message: string } {
  let parsed = body;

  if (typeof body === 'string') {
    try {
      parsed = JSON.parse(body);
    } catch {
      return { message: body || `Request failed with status ${statusCode}` };
    }
  }

  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    const inner = parsed.error;
    if (typeof inner === 'object' && inner !== null) {
      const code = 'code' in inner && typeof inner.code === 'string' ? inner.code : undefined;
      const message =
        'message' in inner && typeof inner.message === 'string'
          ? inner.message
          : `Request failed with status ${statusCode}`;
      return { code, message };
    }
  }

  return { message: `Request failed with status ${statusCode}` };
}

/**
 * Check if status code is retryable
 */
export function isRetryableStatus(statusCode: number): boolean {
  return (
    statusCode === 408 || // Request Timeout
    statusCode === 429 || // Too Many Requests
    (statusCode >= 500 && statusCode < 600) // Server errors
  );
}
