/**
 * Tests for capability discovery
 */

import { describe, it, expect } from 'vitest';
import { Account } from '../../entities/index.js';
import { MalformedResponseError, UnexpectedStatusCodeError } from '../../errors/index.js';
import { StubTransport, createTestAccount } from '../../testing/index.js';
import { infoUrl } from '../index.js';

describe('infoUrl', () => {
  it('should point at the root of the proxy', () => {
    expect(infoUrl('https://swift.example.com/v1/AUTH_test')).toBe('https://swift.example.com/info');
    expect(infoUrl('https://swift.example.com:8443/v1/AUTH_test/')).toBe('https://swift.example.com:8443/info');
  });

  it('should keep a path prefix in front of the API version', () => {
    expect(infoUrl('https://cloud.example.com/object-store/v1/AUTH_test')).toBe(
      'https://cloud.example.com/object-store/info'
    );
  });

  it('should use the origin when there is no API version', () => {
    expect(infoUrl('http://localhost:8080/AUTH_test')).toBe('http://localhost:8080/info');
  });
});

describe('Account.capabilities', () => {
  it('should read the /info document once', async () => {
    const { account, simulator } = createTestAccount();

    const first = await account.capabilities();
    const second = await account.capabilities();

    expect(first.bulk_delete?.max_deletes_per_request).toBe(10000);
    expect(first.swift?.version).toBe('2.31.0');
    expect(second).toBe(first);
    expect(simulator.requests.map((request) => request.url)).toEqual(['http://swift.test/info']);
  });

  it('should keep sections it does not know', async () => {
    const { account } = createTestAccount({ capabilities: { symlink: { symloop_max: 2 } } });

    const capabilities = await account.capabilities();

    expect(capabilities['symlink']).toEqual({ symloop_max: 2 });
    expect(capabilities.bulk_delete).toBeUndefined();
  });

  function stubbedAccount(body: string, status = 200): Account {
    const transport = new StubTransport([{ status, headers: { 'Content-Type': 'application/json' }, body }]);
    return new Account({ storageUrl: 'http://swift.test/v1/AUTH_test', transport });
  }

  it('should reject documents that are not JSON', async () => {
    await expect(stubbedAccount('<html>proxy error</html>').capabilities()).rejects.toThrow(MalformedResponseError);
  });

  it('should reject documents of the wrong shape', async () => {
    await expect(
      stubbedAccount(JSON.stringify({ bulk_delete: { max_deletes_per_request: 'many' } })).capabilities()
    ).rejects.toThrow('Malformed capabilities: Expected number, received string');
  });

  it('should surface a missing endpoint as an unexpected status', async () => {
    const error = await stubbedAccount('not found', 404)
      .capabilities()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
  });
});
