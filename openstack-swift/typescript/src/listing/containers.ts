/**
 * Container listings
 */

import type { Account, Container } from '../entities/index.js';
import { EXPECTED_STATUS } from '../request/index.js';
import { ListingIterator, fetchListing, type ListOptions } from './paginator.js';
import { ContainerListingSchema, parseListingDate } from './schemas.js';

export type ContainerListOptions = ListOptions;

export interface ContainerInfo {
  container: Container;
  objectCount: number;
  bytesUsed: number;
  lastModified: Date | undefined;
}

/**
 * Iterates the containers of an account
 */
export class ContainerIterator extends ListingIterator<ContainerInfo> {
  constructor(
    private readonly account: Account,
    options: ContainerListOptions
  ) {
    super(options);
  }

  /**
   * Fetches all remaining pages and returns the container handles
   */
  async collect(): Promise<Container[]> {
    const entries = await this.collectDetailed();
    return entries.map((entry) => entry.container);
  }

  protected async fetchPage(query: Record<string, string | undefined>): Promise<ContainerInfo[]> {
    const entries = await fetchListing(
      this.account,
      undefined,
      query,
      EXPECTED_STATUS.account.list,
      ContainerListingSchema,
      this.options.request
    );

    return entries.map((entry) => ({
      container: this.account.container(entry.name),
      objectCount: entry.count,
      bytesUsed: entry.bytes,
      lastModified: parseListingDate(entry.last_modified),
    }));
  }

  protected markerOf(entry: ContainerInfo): string {
    return entry.container.name;
  }
}
