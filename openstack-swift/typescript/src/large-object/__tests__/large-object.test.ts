/**
 * Tests for static and dynamic large objects
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Account } from '../../entities/index.js';
import { MalformedHeaderError, UnexpectedStatusCodeError, UsageError, ValidationError } from '../../errors/index.js';
import { ObjectHeaders } from '../../headers/index.js';
import { StubTransport, createTestAccount, createTestData, type SwiftSimulator } from '../../testing/index.js';
import { DEFAULT_SEGMENT_SIZE_BYTES, LargeObject } from '../index.js';

describe('LargeObject', () => {
  let account: Account;
  let simulator: SwiftSimulator;

  beforeEach(() => {
    ({ account, simulator } = createTestAccount());
    simulator.createContainer('media');
    simulator.createContainer('segments');
  });

  describe('create', () => {
    it('should default to a static object with segments beside it', () => {
      const large = account.container('media').object('big.bin').asNewLargeObject();

      expect(large.strategy).toBe('static');
      expect(large.segmentContainer.name).toBe('media');
      expect(large.segmentPrefix).toBe('big.bin/segments/');
      expect(large.segmentSizeBytes).toBe(DEFAULT_SEGMENT_SIZE_BYTES);
      expect(large.segments).toEqual([]);
      expect(large.nextSegmentObject().name).toBe('big.bin/segments/00000001');
    });

    it('should reject bad options', () => {
      const object = account.container('media').object('big.bin');

      expect(() => LargeObject.create(object, { segmentPrefix: '' })).toThrow('segmentPrefix: may not be empty');
      expect(() => LargeObject.create(object, { segmentSizeBytes: 0 })).toThrow(ValidationError);
      expect(() => LargeObject.create(object, { segmentSizeBytes: 1.5 })).toThrow(
        'segmentSizeBytes: must be a positive integer'
      );
    });
  });

  describe('static large objects', () => {
    const data = createTestData(2500);

    it('should upload segments and read them back as one object', async () => {
      const object = account.container('media').object('big.bin');
      const large = object.asNewLargeObject({ segmentSizeBytes: 1000 });

      await large.append(data);
      const headers = new ObjectHeaders();
      headers.contentType.set('video/mp4');
      await large.writeManifest(headers);

      expect(large.segments.map((segment) => [segment.object.name, segment.sizeBytes])).toEqual([
        ['big.bin/segments/00000001', 1000],
        ['big.bin/segments/00000002', 1000],
        ['big.bin/segments/00000003', 500],
      ]);
      expect(large.sizeBytes).toBe(2500);
      expect(simulator.getObject('media', 'big.bin/segments/00000003')?.data).toEqual(data.slice(2000));
      expect(simulator.getObject('media', 'big.bin')?.headers.get('content-type')).toBe('video/mp4');

      const manifestPut = simulator.requestsFor('PUT').at(-1);
      expect(new URL(manifestPut?.url ?? '').searchParams.get('multipart-manifest')).toBe('put');

      await expect(object.download().asBytes()).resolves.toEqual(data);
      const read = await object.headers();
      expect(read.isLargeObject()).toBe(true);
      expect(read.sizeBytes.get()).toBe(2500);
    });

    it('should split by the per-append segment size', async () => {
      const large = account.container('media').object('big.bin').asNewLargeObject({ segmentSizeBytes: 1000 });

      await large.append(data, { segmentSizeBytes: 2048 });

      expect(large.segments.map((segment) => segment.sizeBytes)).toEqual([2048, 452]);
    });

    it('should load the segments of an existing manifest', async () => {
      const object = account.container('media').object('big.bin');
      const written = object.asNewLargeObject({ segmentSizeBytes: 1000 });
      await written.append(data);
      await written.writeManifest();

      const loaded = await account.container('media').object('big.bin').asLargeObject();

      expect(loaded.strategy).toBe('static');
      expect(loaded.segmentContainer.name).toBe('media');
      expect(loaded.segmentPrefix).toBe('big.bin/segments/');
      expect(loaded.segments.map((segment) => segment.etag)).toEqual(written.segments.map((segment) => segment.etag));
      expect(loaded.sizeBytes).toBe(2500);
      expect(loaded.nextSegmentObject().name).toBe('big.bin/segments/00000004');
    });

    it('should append to a loaded object', async () => {
      const object = account.container('media').object('big.bin');
      const first = object.asNewLargeObject({ segmentSizeBytes: 1000 });
      await first.append(data);
      await first.writeManifest();

      const loaded = await object.asLargeObject();
      const more = createTestData(300, 7);
      await loaded.append(more);
      await loaded.writeManifest();

      const content = await object.download().asBytes();
      expect(content.length).toBe(2800);
      expect(content.slice(2500)).toEqual(more);
    });

    it('should let the server reject a manifest with a wrong segment ETag', async () => {
      simulator.putObject('media', 'part-1', 'abc');
      const large = account.container('media').object('big.bin').asNewLargeObject();
      large.addSegment({ object: account.container('media').object('part-1'), sizeBytes: 3, etag: 'not-the-md5' });

      const error = await large.writeManifest().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
      if (!(error instanceof UnexpectedStatusCodeError)) return;
      expect(error.status).toBe(400);
      expect(simulator.getObject('media', 'big.bin')).toBeUndefined();
    });

    it('should continue numbering after registered segments', () => {
      const large = account.container('media').object('big.bin').asNewLargeObject();
      large.addSegment({
        object: account.container('elsewhere').object('big.bin/segments/00000007'),
        sizeBytes: 1,
        etag: 'x',
      });

      expect(large.nextSegmentObject().name).toBe('big.bin/segments/00000008');
    });

    it('should delete the segments and keep the manifest on truncate', async () => {
      const large = account.container('media').object('big.bin').asNewLargeObject({ segmentSizeBytes: 1000 });
      await large.append(data);
      await large.writeManifest();

      await large.truncate();

      expect(large.segments).toEqual([]);
      expect(large.nextSegmentObject().name).toBe('big.bin/segments/00000001');
      expect(simulator.getObject('media', 'big.bin/segments/00000001')).toBeUndefined();
      expect(simulator.getObject('media', 'big.bin')).toBeDefined();
    });

    it('should delete the manifest together with its segments', async () => {
      const object = account.container('media').object('big.bin');
      const large = object.asNewLargeObject({ segmentSizeBytes: 1000 });
      await large.append(data);
      await large.writeManifest();

      await object.delete({ deleteSegments: true });

      expect(simulator.getContainer('media')?.objects.size).toBe(0);
      const deleteRequest = simulator.requestsFor('DELETE')[0];
      expect(new URL(deleteRequest?.url ?? '').searchParams.get('multipart-manifest')).toBe('delete');
    });
  });

  describe('dynamic large objects', () => {
    const data = createTestData(2500, 3);

    async function writeDynamic(): Promise<LargeObject> {
      const large = account.container('media').object('movie.mp4').asNewLargeObject({
        strategy: 'dynamic',
        segmentContainer: account.container('segments'),
        segmentPrefix: 'movie/',
        segmentSizeBytes: 1024,
      });
      await large.append(data);
      await large.writeManifest();
      return large;
    }

    it('should point the manifest at the segment container and prefix', async () => {
      const large = await writeDynamic();

      expect(large.segments.map((segment) => segment.object.fullName)).toEqual([
        'segments/movie/00000001',
        'segments/movie/00000002',
        'segments/movie/00000003',
      ]);
      expect(simulator.getObject('media', 'movie.mp4')?.headers.get('x-object-manifest')).toBe('segments/movie/');
      await expect(account.container('media').object('movie.mp4').download().asBytes()).resolves.toEqual(data);
    });

    it('should load segments by listing the prefix', async () => {
      await writeDynamic();

      const loaded = await account.container('media').object('movie.mp4').asLargeObject();

      expect(loaded.strategy).toBe('dynamic');
      expect(loaded.segmentContainer.name).toBe('segments');
      expect(loaded.segmentPrefix).toBe('movie/');
      expect(loaded.segments.map((segment) => segment.sizeBytes)).toEqual([1024, 1024, 452]);
      expect(loaded.nextSegmentObject().fullName).toBe('segments/movie/00000004');
    });

    it('should only accept segments it can find again', () => {
      const large = account.container('media').object('movie.mp4').asNewLargeObject({
        strategy: 'dynamic',
        segmentContainer: account.container('segments'),
        segmentPrefix: 'movie/',
      });

      expect(() =>
        large.addSegment({ object: account.container('media').object('movie/00000001'), sizeBytes: 1, etag: 'x' })
      ).toThrow('invalid segment media/movie/00000001: must be in container segments');
      expect(() =>
        large.addSegment({ object: account.container('segments').object('other/00000001'), sizeBytes: 1, etag: 'x' })
      ).toThrow(UsageError);
      expect(large.segments).toEqual([]);
    });

    it('should delete the segments and then the manifest', async () => {
      await writeDynamic();

      await account.container('media').object('movie.mp4').delete({ deleteSegments: true });

      expect(simulator.getContainer('segments')?.objects.size).toBe(0);
      expect(simulator.getObject('media', 'movie.mp4')).toBeUndefined();
    });
  });

  it('should refuse to load a plain object', async () => {
    simulator.putObject('media', 'plain.txt', 'just text');

    await expect(account.container('media').object('plain.txt').asLargeObject()).rejects.toThrow(
      'media/plain.txt is not a large object'
    );
  });

  it('should reject a manifest header that is not valid percent-encoding', async () => {
    const transport = new StubTransport([{ status: 200, headers: { 'X-Object-Manifest': 'segments/%zz' } }]);
    const object = new Account({ storageUrl: 'http://swift.test/v1/AUTH_test', transport })
      .container('media')
      .object('broken.bin');

    const error = await object.asLargeObject().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MalformedHeaderError);
    expect(error).toMatchObject({ key: 'X-Object-Manifest' });
    expect(transport.requests).toHaveLength(1);
  });

  it('should delete a plain object when asked to delete segments', async () => {
    simulator.putObject('media', 'plain.txt', 'just text');

    await account.container('media').object('plain.txt').delete({ deleteSegments: true });

    expect(simulator.getObject('media', 'plain.txt')).toBeUndefined();
  });
});
