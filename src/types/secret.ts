/**
 * Secret Types
 *
 * Values, metadata and write options exchanged with the secret store.
 */

/** Content type marking a base64-encoded binary payload */
export const BINARY_CONTENT_TYPE = 'application/octet-stream';

/**
 * SecretString - Wraps secret value to prevent accidental exposure
 *
 * This class prevents accidental logging of secret values by overriding toString().
 * Use expose() method to explicitly access the secret value.
 *
 * @example
 * ```typescript
 * const secret = new SecretString('my-secret-value');
 * console.log(secret.toString()); // "[SecretString]"
 * console.log(secret.expose());   // "my-secret-value"
 * ```
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Explicitly expose the secret value
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[SecretString]';
  }

  toJSON(): string {
    return '[SecretString]';
  }

  valueOf(): string {
    return '[SecretString]';
  }

  get length(): number {
    return this.value.length;
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }
}

/**
 * A resolved secret. Immutable: a new version yields a new SecretValue.
 */
export interface SecretValue {
  /** Secret identifier (URL) */
  readonly id: string;
  /** Secret name */
  readonly name: string;
  /** Secret payload */
  readonly value: SecretString;
  /** Concrete version returned by the provider */
  readonly version: string;
  readonly contentType?: string;
  readonly expiresAt?: Date;
  readonly notBefore?: Date;
  readonly createdAt?: Date;
  readonly updatedAt?: Date;
  readonly enabled: boolean;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Secret metadata as returned by list operations (never carries a value)
 */
export interface SecretMetadata {
  readonly id: string;
  readonly name: string;
  readonly version?: string;
  readonly enabled: boolean;
  readonly contentType?: string;
  readonly expiresAt?: Date;
  readonly createdAt?: Date;
  readonly updatedAt?: Date;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Options for writing a new secret version
 */
export interface PutSecretOptions {
  /** Content type (defaults to application/octet-stream for byte payloads) */
  contentType?: string;
  /** Custom tags */
  tags?: Record<string, string>;
  /** Expiration date */
  expiresAt?: Date;
  /** Not valid before date */
  notBefore?: Date;
  /** Enable or disable the new version */
  enabled?: boolean;
}

/**
 * List secrets options
 */
export interface ListSecretsOptions {
  /** Maximum number of results per page */
  maxPageSize?: number;
}

/**
 * Encode a payload for the wire. Bytes travel base64-encoded.
 */
export function encodeSecretPayload(
  value: string | Uint8Array,
  contentType?: string
): { value: string; contentType?: string } {
  if (typeof value === 'string') {
    return { value, contentType };
  }
  return {
    value: Buffer.from(value).toString('base64'),
    contentType: contentType ?? BINARY_CONTENT_TYPE,
  };
}

/**
 * Decode a secret's payload to bytes, reversing `encodeSecretPayload`.
 */
export function secretBytes(secret: Pick<SecretValue, 'value' | 'contentType'>): Uint8Array {
  const raw = secret.value.expose();
  if (secret.contentType === BINARY_CONTENT_TYPE) {
    return new Uint8Array(Buffer.from(raw, 'base64'));
  }
  return new TextEncoder().encode(raw);
}
