/**
 * Credential Providers
 *
 * Each provider models one way of obtaining a bearer token. Whatever goes
 * wrong inside a provider surfaces as `ProviderUnavailableError` so the chain
 * can move on to the next one.
 */

import { execFile } from 'node:child_process';
import { z } from 'zod';
import { ProviderUnavailableError, toError } from '../error.js';
import type { CredentialToken, FetchLike, TokenCredential } from './types.js';

/** Default Azure AD authority */
export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';

/** api-version understood by platform-injected identity endpoints */
const IDENTITY_API_VERSION = '2019-08-01';

const DEFAULT_PROVIDER_TIMEOUT_MS = 5000;

/**
 * Convert an OAuth scope to the resource form used by identity endpoints.
 * `https://vault.azure.net/.default` becomes `https://vault.azure.net`.
 */
export function scopeToResource(scope: string): string {
  return scope.replace(/\/\.default$/, '');
}

/**
 * Credential that returns a fixed token (tests, pre-issued tokens)
 */
export class StaticTokenCredential implements TokenCredential {
  readonly name = 'StaticTokenCredential';
  private readonly token: string;
  private readonly expiresOn: Date;

  constructor(token: string, expiresOn?: Date) {
    this.token = token;
    // Default to 1 hour from now if not provided
    this.expiresOn = expiresOn ?? new Date(Date.now() + 3600 * 1000);
  }

  async getToken(_scope: string): Promise<CredentialToken> {
    return { token: this.token, expiresOn: this.expiresOn };
  }
}

const oauthTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().optional(),
});

export interface ClientSecretCredentialOptions {
  authorityHost?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Client-credentials exchange with an explicit tenant, client and secret
 */
export class ClientSecretCredential implements TokenCredential {
  readonly name: string = 'ClientSecretCredential';
  private readonly authorityHost: string;
  private readonly timeoutMs: number;
  private readonly httpFetch: FetchLike;

  constructor(
    private readonly tenantId: string,
    private readonly clientId: string,
    private readonly clientSecret: string,
    options: ClientSecretCredentialOptions = {}
  ) {
    this.authorityHost = (options.authorityHost ?? DEFAULT_AUTHORITY_HOST).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.httpFetch = options.fetch ?? fetch;
  }

  async getToken(scope: string): Promise<CredentialToken> {
    const tokenEndpoint = `${this.authorityHost}/${this.tenantId}/oauth2/v2.0/token`;

    const body = new URLSearchParams({
      client_id: this.clientId,
      client_secret: this.clientSecret,
      scope,
      grant_type: 'client_credentials',
    });

    const response = await fetchWithTimeout(this.httpFetch, this.name, this.timeoutMs, tokenEndpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw this.unavailable(`token endpoint returned ${response.status}: ${errorText}`);
    }

    const parsed = oauthTokenSchema.safeParse(await readJson(response, this.name));
    if (!parsed.success) {
      throw this.unavailable('token endpoint returned an unexpected body');
    }

    // Default to 1 hour if not provided
    const expiresIn = parsed.data.expires_in ?? 3600;
    return {
      token: parsed.data.access_token,
      expiresOn: new Date(Date.now() + expiresIn * 1000),
    };
  }

  protected unavailable(reason: string): ProviderUnavailableError {
    return new ProviderUnavailableError({ message: reason, provider: this.name });
  }
}

/**
 * Client-credentials exchange configured through environment variables:
 * AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET (and optionally
 * AZURE_AUTHORITY_HOST). Variables are read on each acquisition.
 */
export class EnvironmentCredential implements TokenCredential {
  readonly name = 'EnvironmentCredential';

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly options: Omit<ClientSecretCredentialOptions, 'authorityHost'> = {}
  ) {}

  async getToken(scope: string): Promise<CredentialToken> {
    const tenantId = this.env['AZURE_TENANT_ID'];
    const clientId = this.env['AZURE_CLIENT_ID'];
    const clientSecret = this.env['AZURE_CLIENT_SECRET'];

    if (!tenantId || !clientId || !clientSecret) {
      throw new ProviderUnavailableError({
        message: 'Missing environment variables: AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET',
        provider: this.name,
      });
    }

    const delegate = new ClientSecretCredential(tenantId, clientId, clientSecret, {
      ...this.options,
      authorityHost: this.env['AZURE_AUTHORITY_HOST'],
    });

    try {
      return await delegate.getToken(scope);
    } catch (error) {
      throw new ProviderUnavailableError({
        message: toError(error).message,
        provider: this.name,
        cause: toError(error),
      });
    }
  }
}

const identityTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_on: z.coerce.number(),
});

export interface ManagedIdentityCredentialOptions {
  /** Client ID of a user-assigned identity */
  clientId?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
}

/**
 * Platform-injected managed identity.
 *
 * Hosting platforms (container apps, app services) inject IDENTITY_ENDPOINT
 * and IDENTITY_HEADER into the workload; outside such a platform the provider
 * is unavailable.
 */
export class ManagedIdentityCredential implements TokenCredential {
  readonly name = 'ManagedIdentityCredential';
  private readonly timeoutMs: number;
  private readonly httpFetch: FetchLike;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: ManagedIdentityCredentialOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.httpFetch = options.fetch ?? fetch;
    this.env = options.env ?? process.env;
  }

  async getToken(scope: string): Promise<CredentialToken> {
    const endpoint = this.env['IDENTITY_ENDPOINT'];
    const header = this.env['IDENTITY_HEADER'];

    if (!endpoint || !header) {
      throw new ProviderUnavailableError({
        message: 'No managed identity endpoint injected (IDENTITY_ENDPOINT, IDENTITY_HEADER)',
        provider: this.name,
      });
    }

    const url = new URL(endpoint);
    url.searchParams.set('api-version', IDENTITY_API_VERSION);
    url.searchParams.set('resource', scopeToResource(scope));

    // User-assigned identity
    const clientId = this.options.clientId ?? this.env['AZURE_CLIENT_ID'];
    if (clientId) {
      url.searchParams.set('client_id', clientId);
    }

    const response = await fetchWithTimeout(this.httpFetch, this.name, this.timeoutMs, url.toString(), {
      method: 'GET',
      headers: { 'X-IDENTITY-HEADER': header },
    });

    if (!response.ok) {
      throw new ProviderUnavailableError({
        message: `Identity endpoint returned status ${response.status}`,
        provider: this.name,
      });
    }

    const parsed = identityTokenSchema.safeParse(await readJson(response, this.name));
    if (!parsed.success) {
      throw new ProviderUnavailableError({
        message: 'Identity endpoint returned an unexpected body',
        provider: this.name,
      });
    }

    return {
      token: parsed.data.access_token,
      expiresOn: new Date(parsed.data.expires_on * 1000),
    };
  }
}

/**
 * Runs an external command and returns its standard output.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number
) => Promise<string>;

const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { timeout: timeoutMs, windowsHide: true }, (error, stdout, stderr) => {
      if (error) {
        const detail = String(stderr).trim();
        reject(new Error(detail ? `${error.message}: ${detail}` : error.message));
        return;
      }
      resolve(String(stdout));
    });
  });

const cliTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresOn: z.string().optional(),
  expires_on: z.coerce.number().optional(),
});

export interface AzureCliCredentialOptions {
  /** Executable name (default: "az") */
  command?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * Local developer login through the Azure CLI (`az account get-access-token`)
 */
export class AzureCliCredential implements TokenCredential {
  readonly name = 'AzureCliCredential';
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: AzureCliCredentialOptions = {}) {
    this.command = options.command ?? 'az';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.runner = options.runner ?? runCommand;
  }

  async getToken(scope: string): Promise<CredentialToken> {
    let stdout: string;
    try {
      stdout = await this.runner(
        this.command,
        ['account', 'get-access-token', '--output', 'json', '--resource', scopeToResource(scope)],
        this.timeoutMs
      );
    } catch (error) {
      throw new ProviderUnavailableError({
        message: `Developer login unavailable: ${toError(error).message}`,
        provider: this.name,
        cause: toError(error),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new ProviderUnavailableError({
        message: 'CLI returned output that is not JSON',
        provider: this.name,
      });
    }

    const parsed = cliTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderUnavailableError({
        message: 'CLI returned an unexpected token payload',
        provider: this.name,
      });
    }

    const expiresOn = parsed.data.expires_on !== undefined
      ? new Date(parsed.data.expires_on * 1000)
      : new Date(parsed.data.expiresOn ?? '');

    if (Number.isNaN(expiresOn.getTime())) {
      throw new ProviderUnavailableError({
        message: 'CLI token has no usable expiry',
        provider: this.name,
      });
    }

    return { token: parsed.data.accessToken, expiresOn };
  }
}

async function fetchWithTimeout(
  httpFetch: FetchLike,
  provider: string,
  timeoutMs: number,
  url: string,
  init: RequestInit
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await httpFetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `request timed out after ${timeoutMs}ms`
      : `request failed: ${toError(error).message}`;
    throw new ProviderUnavailableError({ message: reason, provider, cause: toError(error) });
  } finally {
    clearTimeout(timeoutId);
  }
}

async function readJson(response: Response, provider: string): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new ProviderUnavailableError({
      message: 'response body is not JSON',
      provider,
      cause: toError(error),
    });
  }
}
