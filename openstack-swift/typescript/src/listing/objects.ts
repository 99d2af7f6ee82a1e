/**
 * Object listings
 */

import type { Container, SwiftObject } from '../entities/index.js';
import { EXPECTED_STATUS } from '../request/index.js';
import { ListingIterator, fetchListing, type ListOptions } from './paginator.js';
import { ObjectListingSchema, parseListingDate } from './schemas.js';

export interface ObjectListOptions extends ListOptions {
  /**
   * Roll up names containing this character after the prefix into
   * pseudo-directory entries
   */
  delimiter?: string;
}

/**
 * One listed object
 */
export interface ObjectInfo {
  kind: 'object';
  object: SwiftObject;
  sizeBytes: number;
  etag: string;
  contentType: string;
  lastModified: Date | undefined;
  symlinkPath?: string;
}

/**
 * A pseudo-directory produced by a delimiter listing
 */
export interface SubdirInfo {
  kind: 'subdir';
  /** Name prefix, including the trailing delimiter */
  name: string;
}

export type ObjectListEntry = ObjectInfo | SubdirInfo;

/**
 * Iterates the objects of a container
 */
export class ObjectIterator extends ListingIterator<ObjectListEntry> {
  private readonly delimiter: string | undefined;

  constructor(
    private readonly container: Container,
    options: ObjectListOptions
  ) {
    super(options);
    this.delimiter = options.delimiter;
  }

  /**
   * Fetches all remaining pages and returns the object handles, leaving out
   * pseudo-directories
   */
  async collect(): Promise<SwiftObject[]> {
    const entries = await this.collectDetailed();
    const objects: SwiftObject[] = [];
    for (const entry of entries) {
      if (entry.kind === 'object') {
        objects.push(entry.object);
      }
    }
    return objects;
  }

  protected async fetchPage(query: Record<string, string | undefined>): Promise<ObjectListEntry[]> {
    const entries = await fetchListing(
      this.container.account,
      this.container.name,
      { ...query, delimiter: this.delimiter },
      EXPECTED_STATUS.container.list,
      ObjectListingSchema,
      this.options.request
    );

    return entries.map((entry): ObjectListEntry => {
      if ('subdir' in entry) {
        return { kind: 'subdir', name: entry.subdir };
      }
      return {
        kind: 'object',
        object: this.container.object(entry.name),
        sizeBytes: entry.bytes,
        etag: entry.hash,
        contentType: entry.content_type,
        lastModified: parseListingDate(entry.last_modified),
        symlinkPath: entry.symlink_path,
      };
    });
  }

  protected markerOf(entry: ObjectListEntry): string {
    return entry.kind === 'subdir' ? entry.name : entry.object.name;
  }
}
