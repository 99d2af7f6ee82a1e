/**
 * Tests for container and object listings
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Account } from '../../entities/index.js';
import { MalformedResponseError } from '../../errors/index.js';
import { StubTransport, createTestAccount, type SwiftSimulator } from '../../testing/index.js';
import { parseListingDate, type ObjectListEntry } from '../index.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

function names(entries: readonly ObjectListEntry[]): string[] {
  return entries.map((entry) => (entry.kind === 'subdir' ? `dir:${entry.name}` : entry.object.name));
}

describe('listings', () => {
  let account: Account;
  let simulator: SwiftSimulator;

  beforeEach(() => {
    ({ account, simulator } = createTestAccount({ now: () => NOW }));
  });

  describe('objects', () => {
    beforeEach(() => {
      for (const name of ['e', 'c', 'a', 'd', 'b']) {
        simulator.putObject('files', name, name.repeat(3), { 'Content-Type': 'text/plain' });
      }
    });

    it('should page through the listing with markers', async () => {
      const objects = await account.container('files').objects({ limit: 2 }).collect();

      expect(objects.map((object) => object.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
      const markers = simulator.requestsFor('GET').map((request) => new URL(request.url).searchParams.get('marker'));
      expect(markers).toEqual([null, 'b', 'd']);
    });

    it('should stop on an empty page when no limit is set', async () => {
      const objects = await account.container('files').objects().collect();
      expect(objects).toHaveLength(5);
      expect(simulator.requestsFor('GET')).toHaveLength(2);
      expect(new URL(simulator.requestsFor('GET')[0]?.url ?? '').searchParams.get('format')).toBe('json');
    });

    it('should honour marker and end marker', async () => {
      const objects = await account.container('files').objects({ marker: 'a', endMarker: 'd' }).collect();
      expect(objects.map((object) => object.name)).toEqual(['b', 'c']);
    });

    it('should describe each object', async () => {
      const [first] = await account.container('files').objects({ limit: 1 }).nextPage();
      expect(first?.kind).toBe('object');
      if (first?.kind === 'object') {
        expect(first.object.name).toBe('a');
        expect(first.object.container.name).toBe('files');
        expect(first.sizeBytes).toBe(3);
        expect(first.etag).toBe('47bce5c74f589f4867dbd57e9ca9f808');
        expect(first.contentType).toBe('text/plain');
        expect(first.lastModified?.toISOString()).toBe('2024-03-01T12:00:00.000Z');
      }
    });

    it('should iterate asynchronously', async () => {
      const seen: string[] = [];
      for await (const entry of account.container('files').objects({ limit: 3 })) {
        if (entry.kind === 'object') {
          seen.push(entry.object.name);
        }
      }
      expect(seen).toEqual(['a', 'b', 'c', 'd', 'e']);
    });

    it('should return nothing once exhausted', async () => {
      const iterator = account.container('files').objects({ limit: 10 });
      expect(await iterator.nextPage()).toHaveLength(5);
      expect(await iterator.nextPage()).toEqual([]);
      expect(simulator.requestsFor('GET')).toHaveLength(1);
    });

    it('should treat an empty container as an empty listing', async () => {
      simulator.createContainer('empty');
      expect(await account.container('empty').objects().collect()).toEqual([]);
    });
  });

  describe('pseudo-directories', () => {
    beforeEach(() => {
      for (const name of ['photos/2023/a.jpg', 'photos/2024/b.jpg', 'photos/2024/c.jpg', 'photos/top.jpg', 'readme']) {
        simulator.putObject('files', name, 'x');
      }
    });

    it('should roll names up at the delimiter', async () => {
      const entries = await account.container('files').objects({ prefix: 'photos/', delimiter: '/' }).collectDetailed();
      expect(names(entries)).toEqual(['dir:photos/2023/', 'dir:photos/2024/', 'photos/top.jpg']);
    });

    it('should leave pseudo-directories out of collect', async () => {
      const objects = await account.container('files').objects({ delimiter: '/' }).collect();
      expect(objects.map((object) => object.name)).toEqual(['readme']);
    });

    it('should continue after a pseudo-directory marker', async () => {
      const entries = await account.container('files').objects({ prefix: 'photos/', delimiter: '/', limit: 1 }).collectDetailed();
      expect(names(entries)).toEqual(['dir:photos/2023/', 'dir:photos/2024/', 'photos/top.jpg']);
    });
  });

  describe('containers', () => {
    it('should list containers with their counters', async () => {
      simulator.putObject('alpha', 'one', '1234');
      simulator.putObject('alpha', 'two', '12');
      simulator.createContainer('beta');
      simulator.createContainer('gamma');

      const entries = await account.containers({ limit: 2 }).collectDetailed();

      expect(entries.map((entry) => entry.container.name)).toEqual(['alpha', 'beta', 'gamma']);
      expect(entries[0]?.objectCount).toBe(2);
      expect(entries[0]?.bytesUsed).toBe(6);
      expect(entries[0]?.lastModified?.getTime()).toBe(NOW.getTime());
    });

    it('should filter by prefix', async () => {
      simulator.createContainer('logs-2023');
      simulator.createContainer('logs-2024');
      simulator.createContainer('photos');

      const containers = await account.containers({ prefix: 'logs-' }).collect();
      expect(containers.map((container) => container.name)).toEqual(['logs-2023', 'logs-2024']);
    });

    it('should return no containers for an empty account', async () => {
      expect(await account.containers().collect()).toEqual([]);
    });
  });
});

describe('malformed listings', () => {
  function accountWith(transport: StubTransport): Account {
    return new Account({ storageUrl: 'http://swift.test/v1/AUTH_test', transport });
  }

  it('should reject bodies that are not JSON', async () => {
    const transport = new StubTransport([{ status: 200, body: '<html>oops</html>' }]);
    await expect(accountWith(transport).container('c').objects().collect()).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('should reject entries of the wrong shape', async () => {
    const transport = new StubTransport([{ status: 200, body: JSON.stringify([{ name: 'x', count: 'many' }]) }]);
    await expect(accountWith(transport).containers().collect()).rejects.toThrow('Malformed listing: 0.count:');
  });

  it('should treat a 204 as the end of the listing', async () => {
    const transport = new StubTransport([{ status: 204 }]);
    expect(await accountWith(transport).containers().collect()).toEqual([]);
    expect(transport.requests[0]?.headers.get('accept')).toBe('application/json');
  });
});

describe('parseListingDate', () => {
  it('should read timestamps without a zone as UTC', () => {
    expect(parseListingDate('2024-03-01T12:00:00.123456')?.toISOString()).toBe('2024-03-01T12:00:00.123Z');
  });

  it('should keep an explicit zone', () => {
    expect(parseListingDate('2024-03-01T12:00:00+02:00')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should return undefined for missing or invalid values', () => {
    expect(parseListingDate(undefined)).toBeUndefined();
    expect(parseListingDate('')).toBeUndefined();
    expect(parseListingDate('last tuesday')).toBeUndefined();
  });
});
