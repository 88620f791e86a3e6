/**
 * Tests for the authenticated HTTP transport
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpTransport } from '../http.js';
import { CredentialChain } from '../../credentials/chain.js';
import { StaticTokenCredential } from '../../credentials/providers.js';
import type { FetchLike } from '../../credentials/types.js';
import type { CredentialToken } from '../../credentials/types.js';
import {
  CancelledError,
  InvalidResponseError,
  NoCredentialAvailableError,
  ProviderUnavailableError,
  TimeoutError,
  UnavailableError,
} from '../../error.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function createTransport(fetch: FetchLike, timeout: number = 1000): HttpTransport {
  return new HttpTransport({
    baseUrl: 'https://vault.example.test/',
    apiVersion: '7.4',
    timeout,
    credentials: new CredentialChain([new StaticTokenCredential('test-token')]),
    fetch,
  });
}

/** fetch that only settles when its signal aborts */
function hangingFetch(): FetchLike {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      if (init?.signal?.aborted) {
        reject(new Error('aborted'));
        return;
      }
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
}

describe('HttpTransport', () => {
  it('should send authenticated requests with the api version', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ value: 'v' }));
    const transport = createTransport(fetch);

    const response = await transport.get('/secrets/db-password');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ value: 'v' });
    expect(response.headers['content-type']).toBe('application/json');
    expect(fetch).toHaveBeenCalledWith(
      'https://vault.example.test/secrets/db-password?api-version=7.4',
      expect.objectContaining({
        method: 'GET',
        headers: { Authorization: 'Bearer test-token', Accept: 'application/json' },
      })
    );
  });

  it('should append query parameters', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ value: [] }));
    const transport = createTransport(fetch);

    await transport.get('/secrets', { query: { maxresults: '5' } });

    expect(fetch).toHaveBeenCalledWith(
      'https://vault.example.test/secrets?api-version=7.4&maxresults=5',
      expect.anything()
    );
  });

  it('should follow absolute links untouched', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ value: [] }));
    const transport = createTransport(fetch);
    const nextLink = 'https://vault.example.test/secrets?$skiptoken=abc&api-version=7.4';

    await transport.get(nextLink);

    expect(fetch).toHaveBeenCalledWith(nextLink, expect.anything());
  });

  it('should send JSON bodies on PUT', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({}));
    const transport = createTransport(fetch);

    await transport.put('/secrets/api-key', { value: 'test-secret' });

    expect(fetch).toHaveBeenCalledWith(
      'https://vault.example.test/secrets/api-key?api-version=7.4',
      expect.objectContaining({
        method: 'PUT',
        body: '{"value":"test-secret"}',
        headers: {
          Authorization: 'Bearer test-token',
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      })
    );
  });

  it('should refresh the token and replay once on 401', async () => {
    let issued = 0;
    const getToken = vi.fn(async () => {
      issued++;
      return { token: `token-${issued}`, expiresOn: new Date(Date.now() + 3600 * 1000) };
    });
    const fetch = vi
      .fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ value: 'v' }))
      .mockResolvedValueOnce(new Response(null, { status: 401 }));
    const transport = new HttpTransport({
      baseUrl: 'https://vault.example.test',
      timeout: 1000,
      credentials: new CredentialChain([{ name: 'counting', getToken }]),
      fetch,
    });

    const response = await transport.get('/secrets/db-password');

    expect(response.status).toBe(200);
    expect(getToken).toHaveBeenCalledTimes(2);
    expect(fetch).toHaveBeenNthCalledWith(
      2,
      'https://vault.example.test/secrets/db-password',
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: 'Bearer token-2' }),
      })
    );
  });

  it('should return a persistent 401 to the caller', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => new Response(null, { status: 401 }));
    const transport = createTransport(fetch);

    const response = await transport.get('/secrets/db-password');

    expect(response.status).toBe(401);
    expect(response.body).toBeNull();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should raise TimeoutError after the per-call timeout', async () => {
    const transport = createTransport(hangingFetch(), 20);

    const request = transport.get('/secrets/slow', { secretName: 'slow' });

    await expect(request).rejects.toBeInstanceOf(TimeoutError);
    await expect(request).rejects.toMatchObject({
      message: 'Request timeout after 20ms',
      timeoutMs: 20,
      secretName: 'slow',
    });
  });

  it('should bound token acquisition by the per-call timeout', async () => {
    const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ value: 'v' }));
    const slowCredential = {
      name: 'slow',
      getToken: () =>
        new Promise<CredentialToken>((resolve) => {
          setTimeout(() => resolve({ token: 'test-token', expiresOn: new Date(Date.now() + 3600 * 1000) }), 300);
        }),
    };
    const transport = new HttpTransport({
      baseUrl: 'https://vault.example.test',
      timeout: 20,
      credentials: new CredentialChain([slowCredential]),
      fetch,
    });
    const startedAt = Date.now();

    await expect(transport.get('/secrets/db-password')).rejects.toMatchObject({
      name: 'TimeoutError',
      message: 'Request timeout after 20ms',
    });
    expect(Date.now() - startedAt).toBeLessThan(250);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should let the caller abort token acquisition', async () => {
    const pendingCredential = {
      name: 'pending',
      getToken: () => new Promise<CredentialToken>(() => undefined),
    };
    const transport = new HttpTransport({
      baseUrl: 'https://vault.example.test',
      timeout: 5000,
      credentials: new CredentialChain([pendingCredential]),
      fetch: hangingFetch(),
    });
    const controller = new AbortController();

    const request = transport.get('/secrets/db-password', { signal: controller.signal });
    controller.abort();

    await expect(request).rejects.toBeInstanceOf(CancelledError);
  });

  it('should surface credential chain failures unchanged', async () => {
    const failingCredential = {
      name: 'failing',
      getToken: async (): Promise<CredentialToken> => {
        throw new ProviderUnavailableError({ message: 'not configured', provider: 'failing' });
      },
    };
    const transport = new HttpTransport({
      baseUrl: 'https://vault.example.test',
      timeout: 1000,
      credentials: new CredentialChain([failingCredential]),
      fetch: hangingFetch(),
    });

    await expect(transport.get('/secrets/db-password')).rejects.toBeInstanceOf(NoCredentialAvailableError);
  });

  it('should keep classified errors that arrive after the timeout', async () => {
    const lateFetch: FetchLike = () =>
      new Promise<Response>((resolve) => {
        setTimeout(
          () => resolve(new Response('{not json', { status: 200, headers: { 'content-type': 'application/json' } })),
          60
        );
      });
    const transport = createTransport(lateFetch, 20);

    await expect(transport.get('/secrets/db-password')).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('should raise CancelledError when the caller aborts', async () => {
    const transport = createTransport(hangingFetch(), 5000);
    const controller = new AbortController();

    const request = transport.get('/secrets/slow', { signal: controller.signal });
    controller.abort();

    await expect(request).rejects.toBeInstanceOf(CancelledError);
    await expect(request).rejects.toThrow('Request cancelled by caller');
  });

  it('should map network failures to UnavailableError', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const transport = createTransport(fetch);

    const request = transport.get('/secrets/db-password');

    await expect(request).rejects.toBeInstanceOf(UnavailableError);
    await expect(request).rejects.toThrow('Request to vault.example.test failed: fetch failed');
  });

  it('should reject malformed JSON bodies', async () => {
    const fetch = vi.fn(
      async () => new Response('{', { status: 200, headers: { 'content-type': 'application/json' } })
    );
    const transport = createTransport(fetch);

    await expect(transport.get('/secrets/db-password')).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('should keep non-JSON bodies as text', async () => {
    const fetch = vi.fn(async () => new Response('service busy', { status: 503 }));
    const transport = createTransport(fetch);

    const response = await transport.get('/secrets/db-password');

    expect(response).toMatchObject({ status: 503, body: 'service busy' });
  });
});
