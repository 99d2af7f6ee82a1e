/**
 * Swift object handle
 * @module openstack-swift-client/entities/object
 */

import { DownloadedObject } from '../download/index.js';
import { ObjectHeaders } from '../headers/index.js';
import {
  LargeObject,
  deleteWithSegments,
  loadLargeObject,
  type NewLargeObjectOptions,
} from '../large-object/index.js';
import {
  EXPECTED_STATUS,
  buildUrl,
  encodeObjectName,
  executeForHeaders,
  validateTarget,
  withOptions,
  type RequestOptions,
} from '../request/index.js';
import { buildTempUrl, type TempUrlMethod } from '../tempurl/index.js';
import {
  uploadObject,
  uploadWithWriter,
  type UploadSource,
  type WriterCallback,
} from '../upload/index.js';
import type { Account } from './account.js';
import type { Container } from './container.js';
import { HeaderCache } from './header-cache.js';

export interface DeleteOptions extends RequestOptions {
  /**
   * For large objects, delete the segments as well as the manifest
   */
  deleteSegments?: boolean;
}

/**
 * Handle to an object within a container
 */
export class SwiftObject {
  private readonly cache: HeaderCache<ObjectHeaders>;

  constructor(
    readonly container: Container,
    readonly name: string
  ) {
    this.cache = new HeaderCache(async (opts) => {
      const headers = await executeForHeaders(
        this.account,
        withOptions(
          {
            method: 'HEAD',
            containerName: this.container.name,
            objectName: this.name,
            expectStatus: EXPECTED_STATUS.object.headers,
          },
          opts
        )
      );
      return new ObjectHeaders(headers);
    }, (headers) => headers.clone());
  }

  get account(): Account {
    return this.container.account;
  }

  /**
   * "container/object"
   */
  get fullName(): string {
    return `${this.container.name}/${this.name}`;
  }

  url(): string {
    return buildUrl(this.account.storageUrl, this.container.name, this.name);
  }

  async headers(opts?: RequestOptions): Promise<ObjectHeaders> {
    return this.cache.get(opts);
  }

  async exists(opts?: RequestOptions): Promise<boolean> {
    return this.cache.exists(opts);
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  /**
   * Replaces the cached snapshot with headers taken from a full download
   *
   * @internal
   */
  storeHeaders(headers: ObjectHeaders): void {
    this.cache.store(headers);
  }

  /**
   * Replaces the object's metadata. Swift drops any metadata not sent.
   *
   * Other headers are sent only where they differ from the cached snapshot,
   * if there is one.
   */
  async update(headers: ObjectHeaders, opts?: RequestOptions): Promise<void> {
    await executeForHeaders(
      this.account,
      withOptions(
        {
          method: 'POST',
          containerName: this.container.name,
          objectName: this.name,
          headers: headers.toRequestHeaders(this.cache.peek()),
          expectStatus: EXPECTED_STATUS.object.update,
        },
        opts
      )
    );
    this.cache.invalidate();
  }

  /**
   * Creates or replaces the object with the given content.
   *
   * The MD5 digest of the bytes sent is compared with the ETag the server
   * answers with.
   *
   * @throws {ChecksumMismatchError} If the digests differ
   */
  async upload(source?: UploadSource, headers?: ObjectHeaders, opts?: RequestOptions): Promise<void> {
    await uploadObject(this, source, headers, opts);
  }

  /**
   * Creates or replaces the object with content produced by `callback`,
   * which runs while the request is being sent
   */
  async uploadWithWriter(callback: WriterCallback, headers?: ObjectHeaders, opts?: RequestOptions): Promise<void> {
    await uploadWithWriter(this, callback, headers, opts);
  }

  /**
   * Prepares a download. No request is sent until the content is read from
   * the returned handle.
   */
  download(opts?: RequestOptions): DownloadedObject {
    return new DownloadedObject(this, opts);
  }

  async delete(opts: DeleteOptions = {}): Promise<void> {
    const { deleteSegments, ...requestOptions } = opts;
    if (deleteSegments === true) {
      await deleteWithSegments(this, requestOptions);
      return;
    }
    await executeForHeaders(
      this.account,
      withOptions(
        {
          method: 'DELETE',
          containerName: this.container.name,
          objectName: this.name,
          expectStatus: EXPECTED_STATUS.object.delete,
        },
        requestOptions
      )
    );
    this.cache.invalidate();
  }

  /**
   * Copies this object to `target` on the server. The source snapshot is
   * left alone; the target's is invalidated.
   */
  async copyTo(target: SwiftObject, opts?: RequestOptions): Promise<void> {
    validateTarget(target.container.name, target.name);
    await executeForHeaders(
      this.account,
      withOptions(
        {
          method: 'COPY',
          containerName: this.container.name,
          objectName: this.name,
          headers: {
            Destination: `/${encodeURIComponent(target.container.name)}/${encodeObjectName(target.name)}`,
          },
          expectStatus: EXPECTED_STATUS.object.copy,
        },
        opts
      )
    );
    target.invalidate();
  }

  /**
   * Builds a temporary URL granting `method` on this object until
   * `expiresAt`, signed with the account or container temp URL key
   */
  tempUrl(key: string, method: TempUrlMethod, expiresAt: Date): string {
    return buildTempUrl(this.url(), key, method, expiresAt);
  }

  /**
   * Loads this object's manifest and segments
   *
   * @throws {UsageError} If the object is not a large object
   */
  async asLargeObject(opts?: RequestOptions): Promise<LargeObject> {
    return loadLargeObject(this, opts);
  }

  /**
   * Starts a new large object at this name. Nothing is written until
   * segments are appended and the manifest is written.
   */
  asNewLargeObject(options: NewLargeObjectOptions = {}): LargeObject {
    return LargeObject.create(this, options);
  }
}
