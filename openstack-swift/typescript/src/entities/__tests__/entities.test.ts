/**
 * Tests for account, container and object handles
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MalformedHeaderError, UnexpectedStatusCodeError, ValidationError, isStatusCode } from '../../errors/index.js';
import { AccountHeaders, ContainerHeaders, ObjectHeaders } from '../../headers/index.js';
import { StubTransport, createTestAccount, type SwiftSimulator } from '../../testing/index.js';
import { Account } from '../index.js';

describe('entity handles', () => {
  let account: Account;
  let simulator: SwiftSimulator;

  beforeEach(() => {
    ({ account, simulator } = createTestAccount());
  });

  describe('name validation', () => {
    it('should fail every operation on a malformed container name without sending anything', async () => {
      const container = account.container('a/b');
      const object = container.object('x');
      const target = account.container('ok').object('y');

      const operations: Array<() => Promise<unknown>> = [
        () => container.headers(),
        () => container.exists(),
        () => container.create(),
        () => container.update(new ContainerHeaders()),
        () => container.delete(),
        () => container.objects().collect(),
        () => object.headers(),
        () => object.exists(),
        () => object.update(new ObjectHeaders()),
        () => object.upload('data'),
        () => object.uploadWithWriter(async (writer) => writer.write('data')),
        () => object.download().asBytes(),
        () => object.delete(),
        () => object.copyTo(target),
        () => target.copyTo(object),
        () => account.bulkDelete([object]),
      ];

      for (const operation of operations) {
        await expect(operation()).rejects.toBeInstanceOf(ValidationError);
      }
      expect(simulator.requests).toHaveLength(0);
    });

    it('should reject empty object names locally', async () => {
      await expect(account.container('c').object('').headers()).rejects.toThrow('object name may not be empty');
      expect(simulator.requests).toHaveLength(0);
    });
  });

  describe('exists', () => {
    it('should be false for a missing container', async () => {
      expect(await account.container('missing').exists()).toBe(false);
    });

    it('should be true once the container was created', async () => {
      const container = account.container('photos');
      await container.create();
      expect(await container.exists()).toBe(true);
    });

    it('should propagate statuses other than 404 unchanged', async () => {
      simulator.injectFault({ method: 'HEAD', containerName: 'photos' }, { status: 503, body: 'busy' });
      const error = await account
        .container('photos')
        .exists()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
      expect(isStatusCode(error, 503)).toBe(true);
    });

    it('should be false for a missing object', async () => {
      await account.container('photos').create();
      expect(await account.container('photos').object('nope.jpg').exists()).toBe(false);
    });
  });

  describe('header cache', () => {
    it('should fetch once until invalidated', async () => {
      simulator.createContainer('photos');
      const container = account.container('photos');

      await container.headers();
      await container.headers();
      expect(simulator.requestsFor('HEAD')).toHaveLength(1);

      container.invalidate();
      container.invalidate();
      await container.headers();
      expect(simulator.requestsFor('HEAD')).toHaveLength(2);
    });

    it('should not notice server changes before invalidation', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow');
      const object = account.container('photos').object('cat.jpg');
      expect((await object.headers()).sizeBytes.get()).toBe(4);

      simulator.putObject('photos', 'cat.jpg', 'meow meow');
      expect((await object.headers()).sizeBytes.get()).toBe(4);

      object.invalidate();
      expect((await object.headers()).sizeBytes.get()).toBe(9);
    });

    it('should give separate handles separate snapshots', async () => {
      simulator.createContainer('photos');
      await account.container('photos').headers();
      await account.container('photos').headers();
      expect(simulator.requestsFor('HEAD')).toHaveLength(2);
    });

    it('should hand out copies that leave the snapshot untouched', async () => {
      simulator.createContainer('photos');
      const container = account.container('photos');

      const edited = await container.headers();
      edited.metadata.set('Owner', 'test-user');

      expect((await container.headers()).metadata.exists('owner')).toBe(false);
      expect(simulator.requestsFor('HEAD')).toHaveLength(1);
    });

    it('should reject a malformed header on a successful HEAD and not cache it', async () => {
      const transport = new StubTransport([
        { status: 204, headers: { 'X-Container-Object-Count': 'abc' } },
        { status: 204, headers: { 'X-Container-Object-Count': '2' } },
      ]);
      const container = new Account({ storageUrl: 'http://swift.test/v1/AUTH_test', transport }).container('photos');

      const error = await container.headers().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(MalformedHeaderError);
      expect(error).toMatchObject({ key: 'X-Container-Object-Count' });

      expect((await container.headers()).objectCount.get()).toBe(2);
      expect(transport.requests.map((request) => request.method)).toEqual(['HEAD', 'HEAD']);
    });

    it('should decode account counters', async () => {
      simulator.putObject('a', 'one', '12345');
      simulator.putObject('b', 'two', '123');
      const headers = await account.headers();
      expect(headers.containerCount.get()).toBe(2);
      expect(headers.objectCount.get()).toBe(2);
      expect(headers.bytesUsed.get()).toBe(8);
    });
  });

  describe('metadata', () => {
    it('should round-trip container metadata and remove cleared keys', async () => {
      const container = account.container('photos');
      await container.create();

      const update = new ContainerHeaders();
      update.metadata.set('k', 'v');
      await container.update(update);
      container.invalidate();
      expect((await container.headers()).metadata.get('k')).toBe('v');

      const clear = new ContainerHeaders();
      clear.metadata.set('k', '');
      await container.update(clear);
      container.invalidate();
      expect((await container.headers()).metadata.exists('k')).toBe(false);
    });

    it('should invalidate the snapshot after an update', async () => {
      const container = account.container('photos');
      await container.create();
      await container.headers();

      const update = new ContainerHeaders();
      update.metadata.set('owner', 'test-user');
      await container.update(update);

      expect((await container.headers()).metadata.get('owner')).toBe('test-user');
    });

    it('should round-trip account metadata', async () => {
      const update = new AccountHeaders();
      update.metadata.set('k', 'v');
      await account.update(update);
      expect((await account.headers()).metadata.get('k')).toBe('v');

      const clear = new AccountHeaders();
      clear.metadata.clear('k');
      await account.update(clear);
      expect((await account.headers()).metadata.exists('k')).toBe(false);
    });

    it('should replace object metadata on update', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow', { 'X-Object-Meta-Color': 'grey', 'X-Object-Meta-Age': '3' });
      const object = account.container('photos').object('cat.jpg');

      const update = new ObjectHeaders();
      update.metadata.set('color', 'black');
      await object.update(update);

      const headers = await object.headers();
      expect(headers.metadata.get('color')).toBe('black');
      expect(headers.metadata.exists('age')).toBe(false);
    });

    it('should post only the changed object metadata fields when editing a snapshot', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow', { 'X-Object-Meta-Color': 'grey', 'X-Object-Meta-Age': '3' });
      const object = account.container('photos').object('cat.jpg');

      const headers = await object.headers();
      headers.metadata.set('Color', 'black');
      await object.update(headers);

      const [post] = simulator.requestsFor('POST');
      expect(post?.headers.get('X-Object-Meta-Color')).toBe('black');
      expect(post?.headers.get('X-Object-Meta-Age')).toBe('3');
      expect(post?.headers.has('Content-Length')).toBe(false);
      expect(post?.headers.has('Etag')).toBe(false);
      expect(post?.headers.has('X-Timestamp')).toBe(false);
      expect(post?.headers.has('Last-Modified')).toBe(false);

      const updated = await object.headers();
      expect(updated.metadata.toRecord()).toEqual({ color: 'black', age: '3' });
    });

    it('should post only the changed container headers when editing a snapshot', async () => {
      const created = new ContainerHeaders();
      created.metadata.set('Owner', 'alice');
      const container = account.container('photos');
      await container.create(created);

      const headers = await container.headers();
      headers.writeAcl.set('test-user');
      await container.update(headers);

      const [post] = simulator.requestsFor('POST');
      expect(post?.headers.get('X-Container-Write')).toBe('test-user');
      expect(post?.headers.has('X-Container-Meta-Owner')).toBe(false);
      expect(post?.headers.has('X-Container-Object-Count')).toBe(false);

      const updated = await container.headers();
      expect(updated.writeAcl.get()).toBe('test-user');
      expect(updated.metadata.get('owner')).toBe('alice');
    });

    it('should create containers with ACLs', async () => {
      const headers = new ContainerHeaders();
      headers.readAcl.set('.r:*');
      await account.container('public').create(headers);
      expect((await account.container('public').headers()).readAcl.get()).toBe('.r:*');
    });
  });

  describe('container lifecycle', () => {
    it('should accept creating an existing container', async () => {
      await account.container('photos').create();
      await expect(account.container('photos').create()).resolves.toBeUndefined();
    });

    it('should refuse to delete a container that still holds objects', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow');
      const error = await account
        .container('photos')
        .delete()
        .catch((e: unknown) => e);
      expect(isStatusCode(error, 409)).toBe(true);
    });

    it('should delete empty containers', async () => {
      simulator.createContainer('photos');
      await account.container('photos').delete();
      expect(simulator.getContainer('photos')).toBeUndefined();
    });
  });

  describe('objects', () => {
    it('should copy objects and invalidate only the target', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow', { 'Content-Type': 'image/jpeg' });
      simulator.createContainer('backup');
      const source = account.container('photos').object('cat.jpg');
      const target = account.container('backup').object('cat copy.jpg');

      await source.headers();
      expect(await target.exists()).toBe(false);
      await source.copyTo(target);

      expect(simulator.getObject('backup', 'cat copy.jpg')?.data).toEqual(new TextEncoder().encode('meow'));
      expect(simulator.requestsFor('COPY')[0]?.headers.get('destination')).toBe('/backup/cat%20copy.jpg');
      expect(await target.exists()).toBe(true);
      expect(simulator.requestsFor('HEAD')).toHaveLength(3);
    });

    it('should delete objects and report 404 for missing ones', async () => {
      simulator.putObject('photos', 'cat.jpg', 'meow');
      const object = account.container('photos').object('cat.jpg');
      await object.delete();
      expect(simulator.getObject('photos', 'cat.jpg')).toBeUndefined();

      const error = await object.delete().catch((e: unknown) => e);
      expect(isStatusCode(error, 404)).toBe(true);
    });

    it('should build URLs with encoded names', () => {
      const object = account.container('my photos').object('2024/cat #1.jpg');
      expect(object.url()).toBe('http://swift.test/v1/AUTH_test/my%20photos/2024/cat%20%231.jpg');
      expect(object.fullName).toBe('my photos/2024/cat #1.jpg');
    });
  });

  it('should name the account after the last path segment', () => {
    expect(account.name).toBe('AUTH_test');
  });
});
