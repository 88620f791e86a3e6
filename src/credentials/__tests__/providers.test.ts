/**
 * Tests for credential providers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AzureCliCredential,
  ClientSecretCredential,
  EnvironmentCredential,
  ManagedIdentityCredential,
  StaticTokenCredential,
  scopeToResource,
} from '../providers.js';
import { ProviderUnavailableError } from '../../error.js';

const SCOPE = 'https://vault.azure.net/.default';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('scopeToResource', () => {
  it('should strip the .default suffix', () => {
    expect(scopeToResource(SCOPE)).toBe('https://vault.azure.net');
    expect(scopeToResource('api://custom')).toBe('api://custom');
  });
});

describe('StaticTokenCredential', () => {
  it('should return the fixed token', async () => {
    const expiresOn = new Date('2030-01-01T00:00:00Z');
    const credential = new StaticTokenCredential('test-token', expiresOn);

    await expect(credential.getToken(SCOPE)).resolves.toEqual({ token: 'test-token', expiresOn });
  });
});

describe('ClientSecretCredential', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should exchange client credentials for a token', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) =>
      jsonResponse({ access_token: 'sp-token', expires_in: 600 })
    );
    const credential = new ClientSecretCredential('tenant-1', 'client-1', 'test-secret', {
      authorityHost: 'https://login.example.test/',
      fetch,
    });

    const token = await credential.getToken(SCOPE);

    expect(token).toEqual({ token: 'sp-token', expiresOn: new Date('2026-01-01T00:10:00Z') });
    expect(fetch).toHaveBeenCalledWith(
      'https://login.example.test/tenant-1/oauth2/v2.0/token',
      expect.objectContaining({
        method: 'POST',
        body:
          'client_id=client-1&client_secret=test-secret' +
          '&scope=https%3A%2F%2Fvault.azure.net%2F.default&grant_type=client_credentials',
      })
    );
  });

  it('should default the lifetime to one hour', async () => {
    const fetch = vi.fn(async () => jsonResponse({ access_token: 'sp-token' }));
    const credential = new ClientSecretCredential('tenant-1', 'client-1', 'test-secret', { fetch });

    const token = await credential.getToken(SCOPE);

    expect(token.expiresOn).toEqual(new Date('2026-01-01T01:00:00Z'));
  });

  it('should report rejected exchanges as unavailable', async () => {
    const fetch = vi.fn(async () => new Response('{"error":"invalid_client"}', { status: 400 }));
    const credential = new ClientSecretCredential('tenant-1', 'client-1', 'test-secret', { fetch });

    const attempt = credential.getToken(SCOPE);

    await expect(attempt).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(attempt).rejects.toThrow('token endpoint returned 400: {"error":"invalid_client"}');
  });
});

describe('EnvironmentCredential', () => {
  it('should be unavailable without its variables', async () => {
    const credential = new EnvironmentCredential({ AZURE_TENANT_ID: 'tenant-1' });

    await expect(credential.getToken(SCOPE)).rejects.toThrow(
      'Missing environment variables: AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET'
    );
  });

  it('should delegate to a client-secret exchange', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) =>
      jsonResponse({ access_token: 'env-token', expires_in: 3600 })
    );
    const credential = new EnvironmentCredential(
      {
        AZURE_TENANT_ID: 'tenant-1',
        AZURE_CLIENT_ID: 'client-1',
        AZURE_CLIENT_SECRET: 'test-secret',
        AZURE_AUTHORITY_HOST: 'https://login.example.test',
      },
      { fetch }
    );

    const token = await credential.getToken(SCOPE);

    expect(token.token).toBe('env-token');
    expect(fetch).toHaveBeenCalledWith(
      'https://login.example.test/tenant-1/oauth2/v2.0/token',
      expect.objectContaining({ method: 'POST' })
    );
  });

  it('should attribute delegate failures to itself', async () => {
    const fetch = vi.fn(async () => new Response('nope', { status: 401 }));
    const credential = new EnvironmentCredential(
      { AZURE_TENANT_ID: 'tenant-1', AZURE_CLIENT_ID: 'client-1', AZURE_CLIENT_SECRET: 'test-secret' },
      { fetch }
    );

    await expect(credential.getToken(SCOPE)).rejects.toMatchObject({
      provider: 'EnvironmentCredential',
      message: 'token endpoint returned 401: nope',
    });
  });
});

describe('ManagedIdentityCredential', () => {
  const env = {
    IDENTITY_ENDPOINT: 'http://localhost:42356/msi/token',
    IDENTITY_HEADER: 'test-header',
  };

  it('should be unavailable outside a hosting platform', async () => {
    const credential = new ManagedIdentityCredential({ env: {} });

    await expect(credential.getToken(SCOPE)).rejects.toThrow(
      'No managed identity endpoint injected (IDENTITY_ENDPOINT, IDENTITY_HEADER)'
    );
  });

  it('should call the injected identity endpoint', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) =>
      jsonResponse({ access_token: 'mi-token', expires_on: '1767225600' })
    );
    const credential = new ManagedIdentityCredential({ env, fetch });

    const token = await credential.getToken(SCOPE);

    expect(token).toEqual({ token: 'mi-token', expiresOn: new Date(1767225600 * 1000) });
    expect(fetch).toHaveBeenCalledWith(
      'http://localhost:42356/msi/token?api-version=2019-08-01&resource=https%3A%2F%2Fvault.azure.net',
      expect.objectContaining({ method: 'GET', headers: { 'X-IDENTITY-HEADER': 'test-header' } })
    );
  });

  it('should select a user-assigned identity', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) =>
      jsonResponse({ access_token: 'mi-token', expires_on: 1767225600 })
    );
    const credential = new ManagedIdentityCredential({ env, fetch, clientId: 'identity-1' });

    await credential.getToken(SCOPE);

    expect(fetch).toHaveBeenCalledWith(
      'http://localhost:42356/msi/token?api-version=2019-08-01' +
        '&resource=https%3A%2F%2Fvault.azure.net&client_id=identity-1',
      expect.anything()
    );
  });

  it('should time out unresponsive endpoints', async () => {
    const fetch = vi.fn(
      (_input: string | URL, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const credential = new ManagedIdentityCredential({ env, fetch, timeoutMs: 10 });

    await expect(credential.getToken(SCOPE)).rejects.toThrow('request timed out after 10ms');
  });
});

describe('AzureCliCredential', () => {
  it('should run the CLI for the scope resource', async () => {
    const runner = vi.fn(async (_command: string, _args: readonly string[], _timeoutMs: number) =>
      JSON.stringify({ accessToken: 'cli-token', expires_on: 1767225600 })
    );
    const credential = new AzureCliCredential({ runner });

    const token = await credential.getToken(SCOPE);

    expect(token).toEqual({ token: 'cli-token', expiresOn: new Date(1767225600 * 1000) });
    expect(runner).toHaveBeenCalledWith(
      'az',
      ['account', 'get-access-token', '--output', 'json', '--resource', 'https://vault.azure.net'],
      10000
    );
  });

  it('should fall back to the textual expiry', async () => {
    const runner = vi.fn(async () =>
      JSON.stringify({ accessToken: 'cli-token', expiresOn: '2026-01-01T00:00:00Z' })
    );
    const credential = new AzureCliCredential({ runner });

    const token = await credential.getToken(SCOPE);

    expect(token.expiresOn).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('should be unavailable when the CLI fails', async () => {
    const runner = vi.fn(async () => {
      throw new Error('Please run az login');
    });
    const credential = new AzureCliCredential({ runner });

    await expect(credential.getToken(SCOPE)).rejects.toThrow('Developer login unavailable: Please run az login');
  });

  it('should reject output that is not JSON', async () => {
    const credential = new AzureCliCredential({ runner: vi.fn(async () => 'ERROR: not logged in') });

    await expect(credential.getToken(SCOPE)).rejects.toThrow('CLI returned output that is not JSON');
  });

  it('should reject tokens without a usable expiry', async () => {
    const credential = new AzureCliCredential({
      runner: vi.fn(async () => JSON.stringify({ accessToken: 'cli-token' })),
    });

    await expect(credential.getToken(SCOPE)).rejects.toThrow('CLI token has no usable expiry');
  });
});
