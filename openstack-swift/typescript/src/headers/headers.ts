/**
 * Typed header sets for accounts, containers and objects
 * @module openstack-swift-client/headers/headers
 */

import { HeaderMap } from './header-map.js';
import {
  BoolField,
  EtagField,
  type Field,
  HttpTimestampField,
  MetadataField,
  StringField,
  UintField,
  UnixTimestampField,
} from './fields.js';

/**
 * Anything a header set can be built from
 */
export type SwiftHeadersInit = HeaderMap | Record<string, string> | Iterable<readonly [string, string]>;

/**
 * Common base of {@link AccountHeaders}, {@link ContainerHeaders} and
 * {@link ObjectHeaders}.
 *
 * Typed fields are views over {@link SwiftHeaders.raw}; headers that are not
 * modelled can be read and written there directly.
 */
export abstract class SwiftHeaders {
  readonly raw: HeaderMap;

  constructor(init?: SwiftHeadersInit) {
    this.raw = init instanceof HeaderMap ? init : new HeaderMap(init);
  }

  /**
   * The typed fields this header set knows how to decode
   */
  protected abstract fields(): ReadonlyArray<Field<unknown>>;

  /**
   * Decodes every typed field once
   *
   * @throws {MalformedHeaderError} For the first field that does not decode
   */
  validate(): void {
    for (const field of this.fields()) {
      field.validate();
    }
  }

  /**
   * Returns the raw headers to send in a request. Empty values are kept:
   * they instruct the server to remove the header.
   *
   * With a `prior` snapshot only the headers whose value differs from it are
   * returned, so that fields read back from the server are not sent again.
   * Without one the full set is returned.
   */
  toRequestHeaders(prior?: SwiftHeaders): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, value] of this.raw) {
      if (prior === undefined || this.mustSend(name) || prior.raw.get(name) !== value) {
        record[name] = value;
      }
    }
    return record;
  }

  /**
   * Headers sent even when unchanged from the prior snapshot
   */
  protected mustSend(_name: string): boolean {
    return false;
  }
}

/**
 * Headers of a Swift account
 */
export class AccountHeaders extends SwiftHeaders {
  readonly bytesUsed = new UintField(this.raw, 'X-Account-Bytes-Used');
  readonly containerCount = new UintField(this.raw, 'X-Account-Container-Count');
  readonly objectCount = new UintField(this.raw, 'X-Account-Object-Count');
  readonly bytesUsedQuota = new UintField(this.raw, 'X-Account-Meta-Quota-Bytes');
  readonly metadata = new MetadataField(this.raw, 'X-Account-Meta-');
  readonly tempUrlKey = new StringField(this.raw, 'X-Account-Meta-Temp-URL-Key');
  readonly tempUrlKey2 = new StringField(this.raw, 'X-Account-Meta-Temp-URL-Key-2');
  readonly createdAt = new UnixTimestampField(this.raw, 'X-Timestamp');

  protected fields(): ReadonlyArray<Field<unknown>> {
    return [
      this.bytesUsed,
      this.containerCount,
      this.objectCount,
      this.bytesUsedQuota,
      this.tempUrlKey,
      this.tempUrlKey2,
      this.createdAt,
    ];
  }

  clone(): AccountHeaders {
    return new AccountHeaders(this.raw.clone());
  }
}

/**
 * Headers of a Swift container
 */
export class ContainerHeaders extends SwiftHeaders {
  readonly bytesUsed = new UintField(this.raw, 'X-Container-Bytes-Used');
  readonly objectCount = new UintField(this.raw, 'X-Container-Object-Count');
  readonly bytesUsedQuota = new UintField(this.raw, 'X-Container-Meta-Quota-Bytes');
  readonly objectCountQuota = new UintField(this.raw, 'X-Container-Meta-Quota-Count');
  readonly metadata = new MetadataField(this.raw, 'X-Container-Meta-');
  readonly readAcl = new StringField(this.raw, 'X-Container-Read');
  readonly writeAcl = new StringField(this.raw, 'X-Container-Write');
  readonly syncTo = new StringField(this.raw, 'X-Container-Sync-To');
  readonly syncKey = new StringField(this.raw, 'X-Container-Sync-Key');
  readonly tempUrlKey = new StringField(this.raw, 'X-Container-Meta-Temp-URL-Key');
  readonly tempUrlKey2 = new StringField(this.raw, 'X-Container-Meta-Temp-URL-Key-2');
  readonly historyLocation = new StringField(this.raw, 'X-History-Location');
  readonly versionsLocation = new StringField(this.raw, 'X-Versions-Location');
  readonly storagePolicy = new StringField(this.raw, 'X-Storage-Policy');
  readonly createdAt = new UnixTimestampField(this.raw, 'X-Timestamp');

  protected fields(): ReadonlyArray<Field<unknown>> {
    return [
      this.bytesUsed,
      this.objectCount,
      this.bytesUsedQuota,
      this.objectCountQuota,
      this.readAcl,
      this.writeAcl,
      this.syncTo,
      this.syncKey,
      this.tempUrlKey,
      this.tempUrlKey2,
      this.historyLocation,
      this.versionsLocation,
      this.storagePolicy,
      this.createdAt,
    ];
  }

  clone(): ContainerHeaders {
    return new ContainerHeaders(this.raw.clone());
  }
}

/**
 * Headers of a Swift object
 */
export class ObjectHeaders extends SwiftHeaders {
  readonly contentType = new StringField(this.raw, 'Content-Type');
  readonly contentDisposition = new StringField(this.raw, 'Content-Disposition');
  readonly contentEncoding = new StringField(this.raw, 'Content-Encoding');
  readonly sizeBytes = new UintField(this.raw, 'Content-Length');
  readonly etag = new EtagField(this.raw, 'Etag');
  readonly expiresAt = new UnixTimestampField(this.raw, 'X-Delete-At');
  readonly createdAt = new UnixTimestampField(this.raw, 'X-Timestamp');
  readonly updatedAt = new HttpTimestampField(this.raw, 'Last-Modified');
  readonly metadata = new MetadataField(this.raw, 'X-Object-Meta-');
  readonly objectManifest = new StringField(this.raw, 'X-Object-Manifest');
  readonly staticLargeObject = new BoolField(this.raw, 'X-Static-Large-Object');
  readonly symlinkTarget = new StringField(this.raw, 'X-Symlink-Target');

  protected fields(): ReadonlyArray<Field<unknown>> {
    return [
      this.contentType,
      this.contentDisposition,
      this.contentEncoding,
      this.sizeBytes,
      this.etag,
      this.expiresAt,
      this.createdAt,
      this.updatedAt,
      this.objectManifest,
      this.staticLargeObject,
      this.symlinkTarget,
    ];
  }

  clone(): ObjectHeaders {
    return new ObjectHeaders(this.raw.clone());
  }

  // A POST replaces all object metadata, so unchanged keys go out as well.
  protected override mustSend(name: string): boolean {
    return name.toLowerCase().startsWith('x-object-meta-');
  }

  /**
   * Whether these headers describe a static or dynamic large object
   */
  isLargeObject(): boolean {
    return this.staticLargeObject.get() || this.objectManifest.get() !== '';
  }
}
