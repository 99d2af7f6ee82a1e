/**
 * Swift container handle
 * @module openstack-swift-client/entities/container
 */

import { ContainerHeaders } from '../headers/index.js';
import { ObjectIterator, type ObjectListOptions } from '../listing/index.js';
import {
  EXPECTED_STATUS,
  buildUrl,
  executeForHeaders,
  withOptions,
  type RequestOptions,
} from '../request/index.js';
import type { Account } from './account.js';
import { HeaderCache } from './header-cache.js';
import { SwiftObject } from './object.js';

/**
 * Handle to a container within an account.
 *
 * Handles are cheap and hold no server state beyond a header snapshot;
 * obtain one with {@link Account.container}.
 */
export class Container {
  private readonly cache: HeaderCache<ContainerHeaders>;

  constructor(
    readonly account: Account,
    readonly name: string
  ) {
    this.cache = new HeaderCache(async (opts) => {
      const headers = await executeForHeaders(
        this.account,
        withOptions(
          { method: 'HEAD', containerName: this.name, expectStatus: EXPECTED_STATUS.container.headers },
          opts
        )
      );
      return new ContainerHeaders(headers);
    }, (headers) => headers.clone());
  }

  /**
   * Returns a new handle to the named object in this container
   */
  object(name: string): SwiftObject {
    return new SwiftObject(this, name);
  }

  url(): string {
    return buildUrl(this.account.storageUrl, this.name);
  }

  async headers(opts?: RequestOptions): Promise<ContainerHeaders> {
    return this.cache.get(opts);
  }

  async exists(opts?: RequestOptions): Promise<boolean> {
    return this.cache.exists(opts);
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  /**
   * Creates the container, or updates its headers if it exists already
   */
  async create(headers?: ContainerHeaders, opts?: RequestOptions): Promise<void> {
    await executeForHeaders(
      this.account,
      withOptions(
        {
          method: 'PUT',
          containerName: this.name,
          headers: headers?.toRequestHeaders(),
          expectStatus: EXPECTED_STATUS.container.create,
        },
        opts
      )
    );
    this.cache.invalidate();
  }

  /**
   * Sends the headers that differ from the cached snapshot, or all of them
   * when nothing is cached
   */
  async update(headers: ContainerHeaders, opts?: RequestOptions): Promise<void> {
    await executeForHeaders(
      this.account,
      withOptions(
        {
          method: 'POST',
          containerName: this.name,
          headers: headers.toRequestHeaders(this.cache.peek()),
          expectStatus: EXPECTED_STATUS.container.update,
        },
        opts
      )
    );
    this.cache.invalidate();
  }

  /**
   * Deletes the container. Swift refuses (409) while it still holds objects.
   */
  async delete(opts?: RequestOptions): Promise<void> {
    await executeForHeaders(
      this.account,
      withOptions(
        { method: 'DELETE', containerName: this.name, expectStatus: EXPECTED_STATUS.container.delete },
        opts
      )
    );
    this.cache.invalidate();
  }

  /**
   * Lists the objects of this container, page by page
   */
  objects(options: ObjectListOptions = {}): ObjectIterator {
    return new ObjectIterator(this, options);
  }
}
