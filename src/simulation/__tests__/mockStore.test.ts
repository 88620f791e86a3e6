/**
 * Tests for the in-memory secret store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockSecretStore } from '../mockStore.js';
import {
  CancelledError,
  InvalidSecretNameError,
  NotFoundError,
  UnauthorizedError,
  UnavailableError,
} from '../../error.js';
import { LATEST_VERSION, secretBytes, secretReference, type SecretMetadata } from '../../types/index.js';

async function collect(iterator: AsyncIterable<SecretMetadata>): Promise<SecretMetadata[]> {
  const items: SecretMetadata[] = [];
  for await (const item of iterator) {
    items.push(item);
  }
  return items;
}

describe('MockSecretStore', () => {
  let store: MockSecretStore;

  beforeEach(() => {
    store = new MockSecretStore('https://vault.example.test/');
  });

  describe('fetch', () => {
    it('should return the latest version by default', async () => {
      store.registerSecret('db-password', 'old', 'v1');
      store.registerSecret('db-password', 'new', 'v2');

      const secret = await store.fetch(secretReference('db-password'));

      expect(secret.version).toBe('v2');
      expect(secret.value.expose()).toBe('new');
      expect(secret.id).toBe('https://vault.example.test/secrets/db-password/v2');
    });

    it('should return a pinned version', async () => {
      store.registerSecret('db-password', 'old', 'v1');
      store.registerSecret('db-password', 'new', 'v2');

      const secret = await store.fetch(secretReference('db-password', 'v1'));

      expect(secret.value.expose()).toBe('old');
    });

    it('should generate versions when none is given', () => {
      const secret = store.registerSecret('db-password', 'value');

      expect(secret.version).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should report missing secrets and versions', async () => {
      store.registerSecret('db-password', 'value', 'v1');

      await expect(store.fetch(secretReference('missing'))).rejects.toThrow('Secret not found: missing');
      await expect(store.fetch(secretReference('db-password', 'v9'))).rejects.toThrow(
        'Secret version not found: db-password/v9'
      );
      await expect(store.fetch(secretReference('missing'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should deny and allow access', async () => {
      store.registerSecret('restricted', 'value');
      store.denyAccess('restricted');

      await expect(store.fetch(secretReference('restricted'))).rejects.toThrow('Access denied to secret: restricted');

      store.allowAccess('restricted');
      await expect(store.fetch(secretReference('restricted'))).resolves.toMatchObject({ name: 'restricted' });
    });

    it('should refuse disabled versions', async () => {
      store.registerSecret('db-password', 'value', 'v1', { enabled: false });

      const request = store.fetch(secretReference('db-password'));

      await expect(request).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(request).rejects.toThrow('Secret version is disabled: db-password/v1');
    });

    it('should fail scripted fetches the requested number of times', async () => {
      store.registerSecret('db-password', 'value');
      const failure = new UnavailableError({ message: 'Service unavailable' });
      store.failNext('db-password', failure, 2);

      await expect(store.fetch(secretReference('db-password'))).rejects.toBe(failure);
      await expect(store.fetch(secretReference('db-password'))).rejects.toBe(failure);
      await expect(store.fetch(secretReference('db-password'))).resolves.toMatchObject({ name: 'db-password' });
    });

    it('should reject invalid names', async () => {
      await expect(store.fetch({ name: 'bad_name', version: LATEST_VERSION })).rejects.toBeInstanceOf(
        InvalidSecretNameError
      );
    });

    it('should honour cancellation during latency', async () => {
      store.registerSecret('db-password', 'value');
      store.setLatency(10000);
      const controller = new AbortController();

      const request = store.fetch(secretReference('db-password'), { signal: controller.signal });
      controller.abort();

      await expect(request).rejects.toBeInstanceOf(CancelledError);
      expect(store.getAccessLog().map((e) => e.result)).toEqual(['cancelled']);
    });

    it('should round-trip binary values', async () => {
      store.registerSecret('tls-key', new Uint8Array([1, 2, 255]));

      const secret = await store.fetch(secretReference('tls-key'));

      expect(secret.contentType).toBe('application/octet-stream');
      expect(secret.value.expose()).toBe('AQL/');
      expect([...secretBytes(secret)]).toEqual([1, 2, 255]);
    });
  });

  describe('listing', () => {
    it('should list the latest version of each secret without its version', async () => {
      store.registerSecret('a', 'value', 'v1');
      store.registerSecret('a', 'value', 'v2');
      store.registerSecret('b', 'value', 'v1', { tags: { team: 'payments' } });

      const items = await collect(store.list());

      expect(items.map((i) => [i.name, i.id, i.version])).toEqual([
        ['a', 'https://vault.example.test/secrets/a', undefined],
        ['b', 'https://vault.example.test/secrets/b', undefined],
      ]);
      expect(items[1]?.tags).toEqual({ team: 'payments' });
    });

    it('should list every version of a secret', async () => {
      store.registerSecret('a', 'value', 'v1');
      store.registerSecret('a', 'value', 'v2');

      const items = await collect(store.listVersions('a'));

      expect(items.map((i) => i.version)).toEqual(['v1', 'v2']);
    });

    it('should deny listing versions of a restricted secret', async () => {
      store.registerSecret('restricted', 'value');
      store.denyAccess('restricted');

      await expect(collect(store.listVersions('restricted'))).rejects.toBeInstanceOf(UnauthorizedError);
    });
  });

  describe('put', () => {
    it('should create a new current version', async () => {
      store.registerSecret('db-password', 'old', 'v1');

      const written = await store.put('db-password', 'new', { tags: { rotated: 'true' } });
      const current = await store.fetch(secretReference('db-password'));

      expect(current).toBe(written);
      expect(written.version).not.toBe('v1');
      expect(written.tags).toEqual({ rotated: 'true' });
    });

    it('should reject oversized values', async () => {
      await expect(store.put('big', 'x'.repeat(25 * 1024 + 1))).rejects.toThrow(/exceeds/);
    });
  });

  describe('access log', () => {
    it('should record every operation with its outcome', async () => {
      store.registerSecret('db-password', 'value', 'v1');

      await store.fetch(secretReference('db-password'));
      await expect(store.fetch(secretReference('missing'))).rejects.toBeInstanceOf(NotFoundError);
      await store.put('db-password', 'next');

      const log = store.getAccessLog();
      expect(log.map((e) => [e.operation, e.name, e.result])).toEqual([
        ['fetch', 'db-password', 'success'],
        ['fetch', 'missing', 'not_found'],
        ['put', 'db-password', 'success'],
      ]);
      expect(log[1]?.error).toBe('Secret not found: missing');
      expect(store.fetchCount()).toBe(2);
      expect(store.fetchCount('db-password')).toBe(1);

      store.clearAccessLog();
      expect(store.getAccessLog()).toEqual([]);
    });
  });
});
