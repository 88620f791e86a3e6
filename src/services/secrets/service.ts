/**
 * Secret Store Service
 *
 * HTTP implementation of the raw store operations: fetch by reference, paged
 * listing and writing new versions.
 */

import type { HttpTransport, HttpResponse } from '../../transport/index.js';
import {
  createErrorFromResponse,
  InvalidResponseError,
} from '../../error.js';
import {
  TimestampUtils,
  encodeSecretPayload,
  isLatest,
  parseSecretId,
  SecretString,
  type ListSecretsOptions,
  type PutSecretOptions,
  type SecretMetadata,
  type SecretReference,
  type SecretValue,
} from '../../types/index.js';
import { validateSecretName, validateSecretValueSize } from '../../validation.js';
import { type Logger, NoOpLogger } from '../../observability/logging.js';
import {
  type MetricsCollector,
  NoOpMetricsCollector,
  METRICS,
  createErrorLabels,
  createOperationLabels,
} from '../../observability/metrics.js';
import {
  secretBundleSchema,
  secretListResultSchema,
  type CallOptions,
  type SecretBundle,
  type SecretItem,
  type SecretStoreClient,
} from './types.js';

export interface HttpSecretStoreClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Secret store client speaking the provider's REST API
 */
export class HttpSecretStoreClient implements SecretStoreClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(transport: HttpTransport, options: HttpSecretStoreClientOptions = {}) {
    this.transport = transport;
    this.logger = options.logger ?? new NoOpLogger();
    this.metrics = options.metrics ?? new NoOpMetricsCollector();
  }

  async fetch(ref: SecretReference, options: CallOptions = {}): Promise<SecretValue> {
    validateSecretName(ref.name);
    const startTime = Date.now();

    const path = isLatest(ref)
      ? `/secrets/${encodeURIComponent(ref.name)}`
      : `/secrets/${encodeURIComponent(ref.name)}/${encodeURIComponent(ref.version)}`;

    this.logger.debug(`Fetching secret from provider: ${ref.name}`, {
      secret_name: ref.name,
      version: ref.version,
    });

    const response = await this.transport.get(path, {
      signal: options.signal,
      secretName: ref.name,
    });
    this.ensureOk(response, 'fetch', ref.name);

    const secret = this.parseSecretBundle(response.body, ref);

    this.metrics.histogram(
      METRICS.FETCH_DURATION_MS,
      Date.now() - startTime,
      createOperationLabels('fetch')
    );

    return secret;
  }

  list(options: ListSecretsOptions & CallOptions = {}): AsyncIterableIterator<SecretMetadata> {
    return this.paginate('/secrets', options);
  }

  listVersions(
    name: string,
    options: ListSecretsOptions & CallOptions = {}
  ): AsyncIterableIterator<SecretMetadata> {
    validateSecretName(name);
    return this.paginate(`/secrets/${encodeURIComponent(name)}/versions`, options, name);
  }

  async put(
    name: string,
    value: string | Uint8Array,
    options: PutSecretOptions & CallOptions = {}
  ): Promise<SecretValue> {
    validateSecretName(name);
    const payload = encodeSecretPayload(value, options.contentType);
    validateSecretValueSize(payload.value, name);

    const body: Record<string, unknown> = {
      value: payload.value,
    };

    if (payload.contentType) {
      body.contentType = payload.contentType;
    }

    if (options.tags) {
      body.tags = options.tags;
    }

    const attributes: Record<string, unknown> = {};

    if (options.enabled !== undefined) {
      attributes.enabled = options.enabled;
    }

    if (options.expiresAt) {
      attributes.exp = TimestampUtils.toUnixSeconds(options.expiresAt);
    }

    if (options.notBefore) {
      attributes.nbf = TimestampUtils.toUnixSeconds(options.notBefore);
    }

    if (Object.keys(attributes).length > 0) {
      body.attributes = attributes;
    }

    this.logger.debug(`Setting secret: ${name}`, { secret_name: name });

    const response = await this.transport.put(`/secrets/${encodeURIComponent(name)}`, body, {
      signal: options.signal,
      secretName: name,
    });
    this.ensureOk(response, 'put', name);

    const secret = this.parseSecretBundle(response.body);
    this.logger.info(`Created new version of secret: ${name}`, {
      secret_name: name,
      version: secret.version,
    });

    return secret;
  }

  private async *paginate(
    firstPath: string,
    options: ListSecretsOptions & CallOptions,
    secretName?: string
  ): AsyncIterableIterator<SecretMetadata> {
    const query: Record<string, string> = {};
    if (options.maxPageSize) {
      query.maxresults = options.maxPageSize.toString();
    }

    let nextLink: string | undefined = firstPath;
    let first = true;

    while (nextLink) {
      const response = await this.transport.get(nextLink, {
        query: first ? query : undefined,
        signal: options.signal,
        secretName,
      });
      this.ensureOk(response, 'list', secretName);
      first = false;

      const page = secretListResultSchema.safeParse(response.body);
      if (!page.success) {
        throw new InvalidResponseError({
          message: `Unexpected list page shape: ${page.error.issues[0]?.message ?? 'unknown issue'}`,
          statusCode: response.status,
          secretName,
        });
      }

      for (const item of page.data.value ?? []) {
        yield this.parseSecretItem(item);
      }

      nextLink = page.data.nextLink ?? undefined;
    }
  }

  private ensureOk(response: HttpResponse, operation: string, secretName?: string): void {
    if (response.status >= 200 && response.status < 300) {
      return;
    }

    const error = createErrorFromResponse(
      response.status,
      response.body,
      response.headers,
      secretName
    );
    this.metrics.increment(METRICS.FETCH_ERRORS, 1, createErrorLabels(operation, error.code));
    throw error;
  }

  /**
   * Parse a provider SecretBundle into an immutable SecretValue
   */
  private parseSecretBundle(raw: unknown, ref?: SecretReference): SecretValue {
    const parsed = secretBundleSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidResponseError({
        message: `Unexpected secret bundle shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        secretName: ref?.name,
      });
    }

    const bundle: SecretBundle = parsed.data;
    const fromId = parseSecretId(bundle.id);
    const name = fromId.name ?? ref?.name;
    const version = fromId.version ?? (ref && !isLatest(ref) ? ref.version : undefined);

    if (!name || !version) {
      throw new InvalidResponseError({
        message: `Secret identifier '${bundle.id}' does not carry a name and version`,
        secretName: ref?.name,
      });
    }

    const attributes = bundle.attributes ?? {};

    return Object.freeze({
      id: bundle.id,
      name,
      value: new SecretString(bundle.value),
      version,
      contentType: bundle.contentType,
      expiresAt: TimestampUtils.fromUnixSeconds(attributes.exp),
      notBefore: TimestampUtils.fromUnixSeconds(attributes.nbf),
      createdAt: TimestampUtils.fromUnixSeconds(attributes.created),
      updatedAt: TimestampUtils.fromUnixSeconds(attributes.updated),
      enabled: attributes.enabled ?? true,
      tags: Object.freeze({ ...(bundle.tags ?? {}) }),
    });
  }

  /**
   * Parse a provider SecretItem into metadata
   */
  private parseSecretItem(item: SecretItem): SecretMetadata {
    const { name, version } = parseSecretId(item.id);
    const attributes = item.attributes ?? {};

    return Object.freeze({
      id: item.id,
      name: name ?? '',
      version,
      enabled: attributes.enabled ?? true,
      contentType: item.contentType,
      expiresAt: TimestampUtils.fromUnixSeconds(attributes.exp),
      createdAt: TimestampUtils.fromUnixSeconds(attributes.created),
      updatedAt: TimestampUtils.fromUnixSeconds(attributes.updated),
      tags: Object.freeze({ ...(item.tags ?? {}) }),
    });
  }
}
