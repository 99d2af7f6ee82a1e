/**
 * OpenStack Swift client
 *
 * Typed handles for Swift accounts, containers and objects over a pluggable
 * HTTP transport.
 *
 * @example
 * ```typescript
 * import { createClient, ObjectHeaders } from 'openstack-swift-client';
 *
 * const client = createClient({
 *   storageUrl: 'https://swift.example.com/v1/AUTH_test',
 *   authToken: process.env.SWIFT_AUTH_TOKEN,
 * });
 *
 * const photos = client.account.container('photos');
 * await photos.create();
 *
 * const headers = new ObjectHeaders();
 * headers.contentType.set('image/jpeg');
 * await photos.object('cat.jpg').upload(bytes, headers);
 *
 * const content = await photos.object('cat.jpg').download().asBytes();
 * await client.close();
 * ```
 *
 * @module openstack-swift-client
 */

// Client
export { SwiftClient, createClient, createClientFromEnv, type ClientDependencies } from './client/index.js';

// Configuration
export {
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  SwiftConfig,
  SwiftConfigBuilder,
  createConfigFromEnv,
  normalizeConfig,
  type NormalizedSwiftConfig,
} from './config/index.js';

// Entities
export { Account, Container, HeaderCache, SwiftObject, type AccountOptions, type DeleteOptions } from './entities/index.js';

// Headers
export {
  AccountHeaders,
  BoolField,
  ContainerHeaders,
  EtagField,
  Field,
  HeaderMap,
  HttpTimestampField,
  MetadataField,
  ObjectHeaders,
  StringField,
  SwiftHeaders,
  UintField,
  UnixTimestampField,
  type SwiftHeadersInit,
} from './headers/index.js';

// Errors
export {
  BulkError,
  BulkObjectError,
  ChecksumMismatchError,
  ConfigError,
  MalformedHeaderError,
  MalformedResponseError,
  NetworkError,
  NotSupportedError,
  SwiftError,
  UnexpectedStatusCodeError,
  UsageError,
  ValidationError,
  isStatusCode,
  isSwiftError,
  statusText,
  type SwiftErrorParams,
  type UnexpectedStatusCodeErrorParams,
} from './errors/index.js';

// Requests
export {
  EXPECTED_STATUS,
  buildUrl,
  encodeObjectName,
  executeRequest,
  type HttpMethod,
  type RequestContext,
  type RequestOptions,
  type SwiftRequest,
  type SwiftResponse,
} from './request/index.js';

// Transfers
export { DownloadedObject } from './download/index.js';
export { md5Hex, type UploadSource, type UploadWriter, type WriterCallback } from './upload/index.js';

// Listings
export {
  ContainerIterator,
  ObjectIterator,
  type ContainerInfo,
  type ContainerListOptions,
  type ListOptions,
  type ObjectInfo,
  type ObjectListEntry,
  type ObjectListOptions,
  type SubdirInfo,
} from './listing/index.js';

// Bulk operations
export {
  bulkErrorOf,
  parseBulkResponse,
  type ArchiveFormat,
  type BulkDeleteResult,
  type BulkReport,
} from './bulk/index.js';

// Large objects
export {
  DEFAULT_SEGMENT_SIZE_BYTES,
  LargeObject,
  type AppendOptions,
  type NewLargeObjectOptions,
  type SegmentInfo,
  type SegmentingStrategy,
} from './large-object/index.js';

// Capabilities and temp URLs
export { DEFAULT_MAX_DELETES_PER_REQUEST, type Capabilities } from './capabilities/index.js';
export { buildTempUrl, type TempUrlMethod } from './tempurl/index.js';

// Transport and logging
export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './transport/index.js';
export { ConsoleLogger, NoopLogger, type LogLevel, type Logger } from './observability/index.js';
