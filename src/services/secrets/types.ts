/**
 * Secret Store Service - Types
 *
 * Provider API response shapes, validated with zod before mapping.
 */

import { z } from 'zod';
import type {
  ListSecretsOptions,
  PutSecretOptions,
  SecretMetadata,
  SecretReference,
  SecretValue,
} from '../../types/index.js';

/**
 * Secret attributes. Timestamps are Unix seconds.
 */
export const secretAttributesSchema = z.object({
  enabled: z.boolean().optional(),
  nbf: z.number().optional(),
  exp: z.number().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
});

/**
 * Provider Secret Bundle response (GET/PUT of a single secret)
 */
export const secretBundleSchema = z.object({
  value: z.string(),
  id: z.string().min(1),
  contentType: z.string().optional(),
  attributes: secretAttributesSchema.optional(),
  tags: z.record(z.string()).optional(),
});

/**
 * Provider Secret Item response (list operations carry metadata only)
 */
export const secretItemSchema = z.object({
  id: z.string().min(1),
  contentType: z.string().optional(),
  attributes: secretAttributesSchema.optional(),
  tags: z.record(z.string()).optional(),
});

/**
 * Provider Secret List response
 */
export const secretListResultSchema = z.object({
  value: z.array(secretItemSchema).optional(),
  nextLink: z.string().nullish(),
});

export type SecretAttributes = z.infer<typeof secretAttributesSchema>;
export type SecretBundle = z.infer<typeof secretBundleSchema>;
export type SecretItem = z.infer<typeof secretItemSchema>;
export type SecretListResult = z.infer<typeof secretListResultSchema>;

/**
 * Per-call options
 */
export interface CallOptions {
  /** Abort the call */
  signal?: AbortSignal;
}

/**
 * Raw remote operations against a secret provider.
 */
export interface SecretStoreClient {
  /** Fetch a secret; an unversioned reference yields the current version */
  fetch(ref: SecretReference, options?: CallOptions): Promise<SecretValue>;

  /** Lazily page through all secrets (metadata only, single pass) */
  list(options?: ListSecretsOptions & CallOptions): AsyncIterableIterator<SecretMetadata>;

  /** Lazily page through every version of one secret */
  listVersions(name: string, options?: ListSecretsOptions & CallOptions): AsyncIterableIterator<SecretMetadata>;

  /** Write a new version; never overwrites an existing one */
  put(
    name: string,
    value: string | Uint8Array,
    options?: PutSecretOptions & CallOptions
  ): Promise<SecretValue>;
}

export type { ListSecretsOptions, PutSecretOptions, SecretMetadata, SecretReference, SecretValue };
