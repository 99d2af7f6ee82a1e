/**
 * Swift account handle
 * @module openstack-swift-client/entities/account
 */

import { bulkDelete, bulkUpload, type ArchiveFormat, type BulkDeleteResult } from '../bulk/index.js';
import { fetchCapabilities, type Capabilities } from '../capabilities/index.js';
import { AccountHeaders } from '../headers/index.js';
import { ContainerIterator, type ContainerListOptions } from '../listing/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  EXPECTED_STATUS,
  executeForHeaders,
  withOptions,
  type RequestContext,
  type RequestOptions,
} from '../request/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { UploadSource } from '../upload/index.js';
import { Container } from './container.js';
import { HeaderCache } from './header-cache.js';
import type { SwiftObject } from './object.js';

export interface AccountOptions {
  /** Storage URL of the account, as returned by the identity service */
  storageUrl: string;
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * Handle to a Swift account.
 *
 * The account owns the transport; containers and objects reach the server
 * through it. Headers are fetched lazily and cached until invalidated.
 */
export class Account implements RequestContext {
  readonly storageUrl: string;
  readonly transport: HttpTransport;
  readonly logger: Logger;

  private readonly cache: HeaderCache<AccountHeaders>;
  private cachedCapabilities: Capabilities | undefined;

  constructor(options: AccountOptions) {
    this.storageUrl = options.storageUrl.replace(/\/+$/, '');
    this.transport = options.transport;
    this.logger = options.logger ?? new NoopLogger();
    this.cache = new HeaderCache(async (opts) => {
      const headers = await executeForHeaders(
        this,
        withOptions({ method: 'HEAD', expectStatus: EXPECTED_STATUS.account.headers }, opts)
      );
      return new AccountHeaders(headers);
    }, (headers) => headers.clone());
  }

  /**
   * Last path segment of the storage URL, e.g. "AUTH_test"
   */
  get name(): string {
    const segments = new URL(this.storageUrl).pathname.split('/');
    return decodeURIComponent(segments[segments.length - 1] ?? '');
  }

  /**
   * Returns a new handle to the named container. No request is sent, and
   * the name is only checked when the handle is first used.
   */
  container(name: string): Container {
    return new Container(this, name);
  }

  /**
   * Returns the account headers, fetching them on first use
   */
  async headers(opts?: RequestOptions): Promise<AccountHeaders> {
    return this.cache.get(opts);
  }

  async exists(opts?: RequestOptions): Promise<boolean> {
    return this.cache.exists(opts);
  }

  /**
   * Drops the cached headers and capabilities
   */
  invalidate(): void {
    this.cache.invalidate();
    this.cachedCapabilities = undefined;
  }

  /**
   * Writes account metadata. Keys set to '' are removed on the server.
   * Headers unchanged from the cached snapshot are not sent.
   */
  async update(headers: AccountHeaders, opts?: RequestOptions): Promise<void> {
    await executeForHeaders(
      this,
      withOptions(
        {
          method: 'POST',
          headers: headers.toRequestHeaders(this.cache.peek()),
          expectStatus: EXPECTED_STATUS.account.update,
        },
        opts
      )
    );
    this.cache.invalidate();
  }

  /**
   * Lists the containers of this account, page by page
   */
  containers(options: ContainerListOptions = {}): ContainerIterator {
    return new ContainerIterator(this, options);
  }

  /**
   * Returns the cluster capabilities from the /info endpoint, fetching
   * them on first use
   */
  async capabilities(opts?: RequestOptions): Promise<Capabilities> {
    if (this.cachedCapabilities === undefined) {
      this.cachedCapabilities = await fetchCapabilities(this, opts);
    }
    return this.cachedCapabilities;
  }

  /**
   * Deletes many objects (and then containers) with as few requests as
   * the cluster allows
   *
   * @throws {BulkError} If any item could not be deleted
   */
  async bulkDelete(
    objects: readonly SwiftObject[],
    containers: readonly Container[] = [],
    opts?: RequestOptions
  ): Promise<BulkDeleteResult> {
    return bulkDelete(this, objects, containers, opts);
  }

  /**
   * Uploads an archive whose entries become objects below `uploadPath`
   * ("" for the account, "container" or "container/prefix")
   *
   * @returns The number of files created
   * @throws {NotSupportedError} If the cluster does not offer bulk upload
   * @throws {BulkError} If any entry could not be extracted
   */
  async bulkUpload(
    uploadPath: string,
    format: ArchiveFormat,
    source: UploadSource,
    opts?: RequestOptions
  ): Promise<number> {
    return bulkUpload(this, uploadPath, format, source, opts);
  }
}
