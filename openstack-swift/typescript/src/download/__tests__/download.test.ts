/**
 * Tests for lazily issued downloads
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UsageError, isStatusCode } from '../../errors/index.js';
import type { Account } from '../../entities/index.js';
import { createTestAccount, createTestData, type SwiftSimulator } from '../../testing/index.js';
import { readStream } from '../../transport/index.js';

describe('DownloadedObject', () => {
  let account: Account;
  let simulator: SwiftSimulator;

  beforeEach(() => {
    ({ account, simulator } = createTestAccount());
    simulator.putObject('files', 'hello.txt', 'hello world', { 'Content-Type': 'text/plain' });
  });

  it('should not send a request until the content is read', async () => {
    const download = account.container('files').object('hello.txt').download();
    expect(simulator.requests).toHaveLength(0);
    expect(await download.asString()).toBe('hello world');
    expect(simulator.requestsFor('GET')).toHaveLength(1);
  });

  it('should return bytes', async () => {
    const bytes = await account.container('files').object('hello.txt').download().asBytes();
    expect(bytes).toEqual(new TextEncoder().encode('hello world'));
  });

  it('should return the response stream', async () => {
    const data = createTestData(150000);
    simulator.putObject('files', 'big.bin', data);
    const stream = await account.container('files').object('big.bin').download().asStream();
    expect(await readStream(stream)).toEqual(data);
  });

  it('should allow a partial read of the stream followed by cancel', async () => {
    const data = createTestData(150000);
    simulator.putObject('files', 'big.bin', data);
    const stream = await account.container('files').object('big.bin').download().asStream();

    const reader = stream.getReader();
    const first = await reader.read();
    await reader.cancel();

    expect(first.done).toBe(false);
    expect(first.value).toEqual(data.subarray(0, 65536));
  });

  it('should return an empty stream for empty objects', async () => {
    simulator.putObject('files', 'empty', '');
    const stream = await account.container('files').object('empty').download().asStream();
    expect(await readStream(stream)).toEqual(new Uint8Array(0));
  });

  it.each([
    ['string then bytes', 'asString', 'asBytes'],
    ['bytes then string', 'asBytes', 'asString'],
    ['stream then string', 'asStream', 'asString'],
    ['string then stream', 'asString', 'asStream'],
  ] as const)('should refuse a second projection (%s)', async (_label, first, second) => {
    const download = account.container('files').object('hello.txt').download();
    await download[first]();

    const error = await download[second]().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UsageError);
    if (error instanceof UsageError) {
      expect(error.code).toBe('DOWNLOAD_ALREADY_CONSUMED');
      expect(error.message).toBe('download of files/hello.txt was already consumed');
    }
    expect(simulator.requestsFor('GET')).toHaveLength(1);
  });

  it('should refuse a second projection even after a failed request', async () => {
    const download = account.container('files').object('missing.txt').download();
    const error = await download.asString().catch((e: unknown) => e);
    expect(isStatusCode(error, 404)).toBe(true);
    await expect(download.asBytes()).rejects.toBeInstanceOf(UsageError);
  });

  it('should refresh the cached headers from a full download', async () => {
    const object = account.container('files').object('hello.txt');
    await object.download().asString();

    const headers = await object.headers();
    expect(simulator.requestsFor('HEAD')).toHaveLength(0);
    expect(headers.contentType.get()).toBe('text/plain');
    expect(headers.sizeBytes.get()).toBe(11);
  });

  it('should download ranges without touching the cache', async () => {
    const object = account.container('files').object('hello.txt');
    const text = await object.download({ headers: { Range: 'bytes=6-10' } }).asString();
    expect(text).toBe('world');

    await object.headers();
    expect(simulator.requestsFor('HEAD')).toHaveLength(1);
  });

  it('should fail for unsatisfiable ranges', async () => {
    const object = account.container('files').object('hello.txt');
    const error = await object
      .download({ headers: { range: 'bytes=100-' } })
      .asBytes()
      .catch((e: unknown) => e);
    expect(isStatusCode(error, 416)).toBe(true);
  });
});
