/**
 * Tests for bulk delete and archive upload
 */

import { gzipSync } from 'node:zlib';
import { describe, it, expect } from 'vitest';
import {
  BulkError,
  NotSupportedError,
  UnexpectedStatusCodeError,
  ValidationError,
} from '../../errors/index.js';
import { createTestAccount, writeTar } from '../../testing/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe('bulkDelete', () => {
  it('should return zeros without sending anything for empty input', async () => {
    const { account, simulator } = createTestAccount();

    await expect(account.bulkDelete([])).resolves.toEqual({ numberDeleted: 0, numberNotFound: 0 });
    expect(simulator.requests).toHaveLength(0);
  });

  it('should delete objects and then their container', async () => {
    const { account, simulator } = createTestAccount();
    simulator.putObject('logs', 'a.log', 'a');
    simulator.putObject('logs', 'b.log', 'b');
    const logs = account.container('logs');

    const result = await account.bulkDelete([logs.object('a.log'), logs.object('b.log')], [logs]);

    expect(result).toEqual({ numberDeleted: 3, numberNotFound: 0 });
    expect(simulator.getContainer('logs')).toBeUndefined();
    const posts = simulator.requestsFor('POST');
    expect(posts).toHaveLength(1);
    expect(new URL(posts[0]?.url ?? '').search).toBe('?bulk-delete=true');
    expect(decoder.decode(posts[0]?.body)).toBe('/logs/a.log\n/logs/b.log\n/logs');
  });

  it('should quote names in the request body', async () => {
    const { account, simulator } = createTestAccount();
    simulator.putObject('my files', 'dir/x y.txt', 'x');

    const result = await account.bulkDelete([account.container('my files').object('dir/x y.txt')]);

    expect(result.numberDeleted).toBe(1);
    expect(decoder.decode(simulator.requestsFor('POST')[0]?.body)).toBe('/my%20files/dir/x%20y.txt');
    expect(simulator.getObject('my files', 'dir/x y.txt')).toBeUndefined();
  });

  it('should split the paths by max_deletes_per_request', async () => {
    const { account, simulator } = createTestAccount({
      capabilities: { bulk_delete: { max_deletes_per_request: 2 } },
    });
    for (const name of ['a', 'b', 'c']) {
      simulator.putObject('files', name, name);
    }
    const files = account.container('files');

    const result = await account.bulkDelete(
      ['a', 'b', 'c'].map((name) => files.object(name)),
      [files]
    );

    expect(result).toEqual({ numberDeleted: 4, numberNotFound: 0 });
    expect(simulator.requestsFor('POST').map((request) => decoder.decode(request.body))).toEqual([
      '/files/a\n/files/b',
      '/files/c\n/files',
    ]);
  });

  it('should count missing items as not found', async () => {
    const { account, simulator } = createTestAccount();
    simulator.putObject('files', 'present', 'x');
    const files = account.container('files');

    const result = await account.bulkDelete([files.object('present'), files.object('absent')], [
      account.container('nothing-here'),
    ]);

    expect(result).toEqual({ numberDeleted: 1, numberNotFound: 2 });
  });

  it('should raise a BulkError for a container that is not empty', async () => {
    const { account, simulator } = createTestAccount();
    simulator.putObject('full', 'keep.txt', 'x');

    const error = await account.bulkDelete([], [account.container('full')]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BulkError);
    if (!(error instanceof BulkError)) return;
    expect(error.message).toBe('400 Bad Request (+1 object errors)');
    expect(error.objectErrors).toHaveLength(1);
    expect(error.objectErrors[0]?.containerName).toBe('full');
    expect(error.objectErrors[0]?.objectName).toBe('');
    expect(error.objectErrors[0]?.status).toBe(409);
    expect(simulator.getContainer('full')).toBeDefined();
  });

  it('should validate every name before sending', async () => {
    const { account, simulator } = createTestAccount();
    const files = account.container('files');

    await expect(account.bulkDelete([files.object('fine'), files.object('')])).rejects.toThrow(ValidationError);
    await expect(account.bulkDelete([], [account.container('a/b')])).rejects.toThrow(
      'container name may not contain slashes'
    );
    expect(simulator.requests).toHaveLength(0);
  });

  it('should surface unexpected statuses of the bulk request', async () => {
    const { account, simulator } = createTestAccount();
    simulator.putObject('files', 'a', 'a');
    simulator.injectFault({ method: 'POST' }, { status: 502, body: 'upstream gone' });

    const error = await account.bulkDelete([account.container('files').object('a')]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
    if (!(error instanceof UnexpectedStatusCodeError)) return;
    expect(error.status).toBe(502);
    expect(simulator.getObject('files', 'a')).toBeDefined();
  });

  describe('without the bulk middleware', () => {
    it('should delete items one by one', async () => {
      const { account, simulator } = createTestAccount({ capabilities: { swift: { version: '2.31.0' } } });
      simulator.putObject('files', 'present', 'x');
      const files = account.container('files');

      const result = await account.bulkDelete([files.object('present'), files.object('absent')], [files]);

      expect(result).toEqual({ numberDeleted: 2, numberNotFound: 1 });
      expect(simulator.requestsFor('POST')).toHaveLength(0);
      expect(simulator.requestsFor('DELETE')).toHaveLength(3);
      expect(simulator.getContainer('files')).toBeUndefined();
    });

    it('should propagate errors other than 404', async () => {
      const { account, simulator } = createTestAccount({ capabilities: {} });
      simulator.putObject('full', 'keep.txt', 'x');

      const error = await account.bulkDelete([], [account.container('full')]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
      if (!(error instanceof UnexpectedStatusCodeError)) return;
      expect(error.status).toBe(409);
    });
  });
});

describe('bulkUpload', () => {
  const archive = writeTar([
    { name: 'photos/cat.jpg', data: encoder.encode('meow') },
    { name: 'docs/readme.txt', data: encoder.encode('read me') },
  ]);

  it('should create containers from the top-level directories', async () => {
    const { account, simulator } = createTestAccount();

    const created = await account.bulkUpload('', 'tar', archive);

    expect(created).toBe(2);
    expect(decoder.decode(simulator.getObject('photos', 'cat.jpg')?.data)).toBe('meow');
    expect(decoder.decode(simulator.getObject('docs', 'readme.txt')?.data)).toBe('read me');
    const put = simulator.requestsFor('PUT')[0];
    expect(new URL(put?.url ?? '').pathname).toBe('/v1/AUTH_test');
    expect(new URL(put?.url ?? '').searchParams.get('extract-archive')).toBe('tar');
  });

  it('should extract below a container and prefix', async () => {
    const { account, simulator } = createTestAccount();
    simulator.createContainer('backup');

    const created = await account.bulkUpload('backup/2024', 'tar', archive);

    expect(created).toBe(2);
    expect(simulator.getObject('backup', '2024/photos/cat.jpg')).toBeDefined();
    expect(simulator.getObject('backup', '2024/docs/readme.txt')).toBeDefined();
    expect(new URL(simulator.requestsFor('PUT')[0]?.url ?? '').pathname).toBe('/v1/AUTH_test/backup/2024');
  });

  it('should extract into a container', async () => {
    const { account, simulator } = createTestAccount();
    simulator.createContainer('backup');

    await account.bulkUpload('/backup/', 'tar', archive);

    expect(simulator.getObject('backup', 'photos/cat.jpg')).toBeDefined();
    expect(new URL(simulator.requestsFor('PUT')[0]?.url ?? '').pathname).toBe('/v1/AUTH_test/backup');
  });

  it('should accept gzipped archives', async () => {
    const { account, simulator } = createTestAccount();

    const created = await account.bulkUpload('', 'tar.gz', new Uint8Array(gzipSync(archive)));

    expect(created).toBe(2);
    expect(simulator.getObject('photos', 'cat.jpg')?.data).toEqual(encoder.encode('meow'));
  });

  it('should report archive errors', async () => {
    const { account } = createTestAccount();

    await expect(account.bulkUpload('', 'tar.bz2', archive)).rejects.toThrow(
      '400 Bad Request: Unsupported archive format: tar.bz2'
    );
  });

  it('should report entries that could not be extracted', async () => {
    const { account, simulator } = createTestAccount();
    const loose = writeTar([
      { name: 'loose.txt', data: encoder.encode('no container') },
      { name: 'photos/dog.jpg', data: encoder.encode('woof') },
    ]);

    const error = await account.bulkUpload('', 'tar', loose).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BulkError);
    if (!(error instanceof BulkError)) return;
    expect(error.statusCode).toBe(400);
    expect(error.objectErrors.map((e) => [e.containerName, e.objectName, e.status])).toEqual([
      ['loose.txt', '', 400],
    ]);
    expect(simulator.getObject('photos', 'dog.jpg')).toBeDefined();
  });

  it('should refuse when the cluster does not offer bulk upload', async () => {
    const { account, simulator } = createTestAccount({ capabilities: { swift: {} } });

    await expect(account.bulkUpload('', 'tar', archive)).rejects.toThrow(NotSupportedError);
    expect(simulator.requestsFor('PUT')).toHaveLength(0);
  });
});
