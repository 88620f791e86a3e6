/**
 * Mock Secret Store
 *
 * In-memory `SecretStoreClient` for tests and local development. Keeps every
 * version of every secret, and can deny access, disable versions, add latency
 * and script failures.
 */

import { randomUUID } from 'node:crypto';
import {
  CancelledError,
  NotFoundError,
  UnauthorizedError,
  toError,
} from '../error.js';
import type { CallOptions, SecretStoreClient } from '../services/secrets/index.js';
import { abortableSleep } from '../transport/abort.js';
import {
  encodeSecretPayload,
  isLatest,
  SecretString,
  type ListSecretsOptions,
  type PutSecretOptions,
  type SecretMetadata,
  type SecretReference,
  type SecretValue,
} from '../types/index.js';
import { validateSecretName, validateSecretValueSize } from '../validation.js';
import type { AccessLogEntry, AccessResult, StoreOperation } from './types.js';

interface ScriptedFailure {
  error: Error;
  remaining: number;
}

/**
 * @example
 * ```typescript
 * const store = new MockSecretStore();
 * store.registerSecret('db-password', 'test-secret', 'v1');
 * store.failNext('db-password', new UnavailableError({ message: 'busy' }), 2);
 *
 * const resolver = new CachingResolver(store);
 * const secret = await resolver.get(secretReference('db-password'));
 * ```
 */
export class MockSecretStore implements SecretStoreClient {
  private readonly storeUrl: string;
  private readonly secretsStorage = new Map<string, SecretValue[]>();
  private readonly deniedNames = new Set<string>();
  private readonly failures = new Map<string, ScriptedFailure[]>();
  private accessLog: AccessLogEntry[] = [];
  private latencyMs = 0;

  constructor(storeUrl: string = 'https://mock-store.vault.example.test') {
    this.storeUrl = storeUrl.replace(/\/+$/, '');
  }

  /**
   * Add a version of a secret. Later registrations become the current version.
   *
   * @param version - Version identifier (auto-generated if not provided)
   */
  registerSecret(
    name: string,
    value: string | Uint8Array,
    version?: string,
    options: PutSecretOptions = {}
  ): SecretValue {
    validateSecretName(name);
    const ver = version ?? randomUUID().replace(/-/g, '');
    const payload = encodeSecretPayload(value, options.contentType);
    const now = new Date();

    const secret: SecretValue = Object.freeze({
      id: `${this.storeUrl}/secrets/${name}/${ver}`,
      name,
      value: new SecretString(payload.value),
      version: ver,
      contentType: payload.contentType,
      expiresAt: options.expiresAt,
      notBefore: options.notBefore,
      createdAt: now,
      updatedAt: now,
      enabled: options.enabled ?? true,
      tags: Object.freeze({ ...(options.tags ?? {}) }),
    });

    const versions = this.secretsStorage.get(name) ?? [];
    versions.push(secret);
    this.secretsStorage.set(name, versions);
    return secret;
  }

  denyAccess(name: string): void {
    this.deniedNames.add(name);
  }

  allowAccess(name: string): void {
    this.deniedNames.delete(name);
  }

  /**
   * Make the next `times` fetches of `name` fail with `error`
   */
  failNext(name: string, error: Error, times: number = 1): void {
    const queue = this.failures.get(name) ?? [];
    queue.push({ error, remaining: times });
    this.failures.set(name, queue);
  }

  /**
   * Delay every fetch by `ms` (abortable through the call's signal)
   */
  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  async fetch(ref: SecretReference, options: CallOptions = {}): Promise<SecretValue> {
    const requested = isLatest(ref) ? undefined : ref.version;

    try {
      validateSecretName(ref.name);
      if (this.latencyMs > 0) {
        await abortableSleep(this.latencyMs, options.signal).catch((error: unknown) => {
          throw new CancelledError({
            message: 'Request cancelled by caller',
            secretName: ref.name,
            cause: toError(error),
          });
        });
      }
      this.throwIfCancelled(ref.name, options.signal);
      this.throwScriptedFailure(ref.name);
      this.throwIfDenied(ref.name);

      const versions = this.secretsStorage.get(ref.name) ?? [];
      const secret = requested === undefined
        ? versions[versions.length - 1]
        : versions.find((v) => v.version === requested);

      if (!secret) {
        throw new NotFoundError({
          message: requested
            ? `Secret version not found: ${ref.name}/${requested}`
            : `Secret not found: ${ref.name}`,
          statusCode: 404,
          secretName: ref.name,
        });
      }

      if (!secret.enabled) {
        throw new UnauthorizedError({
          message: `Secret version is disabled: ${ref.name}/${secret.version}`,
          statusCode: 403,
          secretName: ref.name,
        });
      }

      this.logAccess('fetch', ref.name, secret.version, 'success');
      return secret;
    } catch (error) {
      this.logFailure('fetch', ref.name, requested, error);
      throw error;
    }
  }

  async *list(options: ListSecretsOptions & CallOptions = {}): AsyncIterableIterator<SecretMetadata> {
    this.throwIfCancelled(undefined, options.signal);
    this.logAccess('list', undefined, undefined, 'success');

    for (const versions of [...this.secretsStorage.values()]) {
      const latest = versions[versions.length - 1];
      if (latest) {
        yield toMetadata(latest, false);
      }
    }
  }

  async *listVersions(
    name: string,
    options: ListSecretsOptions & CallOptions = {}
  ): AsyncIterableIterator<SecretMetadata> {
    try {
      validateSecretName(name);
      this.throwIfCancelled(name, options.signal);
      this.throwIfDenied(name);
    } catch (error) {
      this.logFailure('listVersions', name, undefined, error);
      throw error;
    }
    this.logAccess('listVersions', name, undefined, 'success');

    for (const secret of [...(this.secretsStorage.get(name) ?? [])]) {
      yield toMetadata(secret, true);
    }
  }

  async put(
    name: string,
    value: string | Uint8Array,
    options: PutSecretOptions & CallOptions = {}
  ): Promise<SecretValue> {
    try {
      validateSecretName(name);
      validateSecretValueSize(encodeSecretPayload(value, options.contentType).value, name);
      this.throwIfCancelled(name, options.signal);
      this.throwIfDenied(name);
    } catch (error) {
      this.logFailure('put', name, undefined, error);
      throw error;
    }

    const secret = this.registerSecret(name, value, undefined, options);
    this.logAccess('put', name, secret.version, 'success');
    return secret;
  }

  getAccessLog(): AccessLogEntry[] {
    return [...this.accessLog];
  }

  clearAccessLog(): void {
    this.accessLog = [];
  }

  /**
   * Number of fetch calls received, optionally for one name
   */
  fetchCount(name?: string): number {
    return this.accessLog.filter(
      (entry) => entry.operation === 'fetch' && (name === undefined || entry.name === name)
    ).length;
  }

  private throwIfDenied(name: string): void {
    if (this.deniedNames.has(name)) {
      throw new UnauthorizedError({
        message: `Access denied to secret: ${name}`,
        statusCode: 403,
        secretName: name,
      });
    }
  }

  private throwIfCancelled(name: string | undefined, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError({ message: 'Request cancelled by caller', secretName: name });
    }
  }

  private throwScriptedFailure(name: string): void {
    const queue = this.failures.get(name);
    const next = queue?.[0];
    if (!queue || !next) {
      return;
    }

    next.remaining--;
    if (next.remaining <= 0) {
      queue.shift();
    }
    throw next.error;
  }

  private logFailure(
    operation: StoreOperation,
    name: string | undefined,
    version: string | undefined,
    error: unknown
  ): void {
    this.logAccess(operation, name, version, classify(error), toError(error).message);
  }

  private logAccess(
    operation: StoreOperation,
    name: string | undefined,
    version: string | undefined,
    result: AccessResult,
    error?: string
  ): void {
    this.accessLog.push({
      timestamp: new Date(),
      operation,
      name,
      version,
      result,
      error,
    });
  }
}

function classify(error: unknown): AccessResult {
  if (error instanceof NotFoundError) {
    return 'not_found';
  }
  if (error instanceof UnauthorizedError) {
    return 'access_denied';
  }
  if (error instanceof CancelledError) {
    return 'cancelled';
  }
  return 'error';
}

function toMetadata(secret: SecretValue, withVersion: boolean): SecretMetadata {
  return Object.freeze({
    id: withVersion ? secret.id : secret.id.slice(0, secret.id.lastIndexOf('/')),
    name: secret.name,
    version: withVersion ? secret.version : undefined,
    enabled: secret.enabled,
    contentType: secret.contentType,
    expiresAt: secret.expiresAt,
    createdAt: secret.createdAt,
    updatedAt: secret.updatedAt,
    tags: secret.tags,
  });
}
