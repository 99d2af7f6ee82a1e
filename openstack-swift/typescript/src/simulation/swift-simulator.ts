/**
 * In-process Swift server for tests
 * @module openstack-swift-client/simulation/swift-simulator
 */

import { gunzipSync } from 'node:zlib';
import { infoUrl } from '../capabilities/index.js';
import { HeaderMap } from '../headers/index.js';
import { bytesToStream, concatBytes, readStream } from '../transport/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';
import { md5Hex } from '../upload/index.js';
import { readTar } from './tar.js';
import type {
  CannedResponse,
  FaultMatcher,
  RecordedRequest,
  SloSegment,
  StoredContainer,
  StoredObject,
  SwiftSimulatorOptions,
} from './types.js';

export const DEFAULT_STORAGE_URL = 'http://swift.test/v1/AUTH_test';

export const NOT_FOUND_BODY = '<html><h1>Not Found</h1><p>The resource could not be found.</p></html>';

const CONFLICT_BODY = '<html><h1>Conflict</h1><p>There was a conflict when trying to complete your request.</p></html>';

const DEFAULT_CAPABILITIES: Record<string, unknown> = {
  swift: { version: '2.31.0', max_file_size: 5368709122, container_listing_limit: 10000 },
  bulk_delete: { max_deletes_per_request: 10000, max_failed_deletes: 1000 },
  bulk_upload: { max_containers_per_extraction: 10000, max_failed_extractions: 1000 },
  slo: { max_manifest_segments: 1000, max_manifest_size: 8388608, min_segment_size: 1 },
  tempurl: { methods: ['GET', 'HEAD', 'PUT', 'POST', 'DELETE'] },
};

const DEFAULT_LISTING_LIMIT = 10000;

const CONTAINER_HEADERS = new Set([
  'x-container-read',
  'x-container-write',
  'x-container-sync-to',
  'x-container-sync-key',
  'x-versions-location',
  'x-history-location',
  'x-storage-policy',
]);

const OBJECT_HEADERS = new Set([
  'content-type',
  'content-disposition',
  'content-encoding',
  'x-delete-at',
  'x-object-manifest',
]);

const encoder = new TextEncoder();
const decoder = new TextDecoder();

interface Target {
  containerName?: string;
  objectName?: string;
}

/**
 * A single Swift account held in memory, reachable through the
 * {@link HttpTransport} interface.
 *
 * Implements enough of the object storage API for the client to be exercised
 * end to end: metadata, listings, large object manifests, COPY, bulk delete,
 * archive extraction and the /info document. Every request is recorded, and
 * one-shot faults can replace the next matching response.
 */
export class SwiftSimulator implements HttpTransport {
  readonly storageUrl: string;
  readonly requests: RecordedRequest[] = [];

  private readonly basePath: string;
  private readonly infoEndpoint: string;
  private readonly now: () => Date;
  private capabilities: Record<string, unknown>;
  private readonly accountHeaders = new HeaderMap();
  private readonly containers = new Map<string, StoredContainer>();
  private readonly faults: Array<{ matcher: FaultMatcher; response: CannedResponse }> = [];
  private etagOverride: string | undefined;
  private closed = false;

  constructor(options: SwiftSimulatorOptions = {}) {
    this.storageUrl = (options.storageUrl ?? DEFAULT_STORAGE_URL).replace(/\/+$/, '');
    this.basePath = new URL(this.storageUrl).pathname;
    this.infoEndpoint = infoUrl(this.storageUrl);
    this.capabilities = options.capabilities ?? DEFAULT_CAPABILITIES;
    this.now = options.now ?? (() => new Date());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const body =
      request.body === undefined
        ? new Uint8Array(0)
        : request.body instanceof Uint8Array
          ? request.body
          : await readStream(request.body);
    const headers = new HeaderMap(request.headers);
    const url = new URL(request.url);
    this.requests.push({ method: request.method, url: request.url, headers, body });

    const target = this.parseTarget(url);
    const fault = target === undefined ? undefined : this.takeFault(request.method, target);
    const response =
      fault ??
      (target === undefined
        ? this.handleInfo(request.method, url)
        : this.route(request.method, target, url.searchParams, headers, body));
    return this.toHttpResponse(request.method, response);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Makes the next request matching `matcher` answer with `response`
   */
  injectFault(matcher: FaultMatcher, response: CannedResponse): void {
    this.faults.push({ matcher, response });
  }

  /**
   * Makes the next plain object PUT answer with this ETag instead of the MD5
   * of the received body
   */
  overrideNextEtag(etag: string): void {
    this.etagOverride = etag;
  }

  setCapabilities(capabilities: Record<string, unknown>): void {
    this.capabilities = capabilities;
  }

  /**
   * Creates a container without going through the API
   */
  createContainer(name: string, metadata: Record<string, string> = {}): void {
    const headers = new HeaderMap();
    for (const [key, value] of Object.entries(metadata)) {
      headers.set(`X-Container-Meta-${key}`, value);
    }
    this.containers.set(name, { headers, objects: new Map(), createdAt: this.now() });
  }

  /**
   * Stores an object without going through the API. The container is
   * created if needed.
   */
  putObject(containerName: string, objectName: string, data: Uint8Array | string, headers: Record<string, string> = {}): void {
    if (!this.containers.has(containerName)) {
      this.createContainer(containerName);
    }
    const bytes = typeof data === 'string' ? encoder.encode(data) : data;
    const stored = this.newObject(bytes, md5Hex(bytes), new HeaderMap(headers));
    this.containers.get(containerName)?.objects.set(objectName, stored);
  }

  getObject(containerName: string, objectName: string): StoredObject | undefined {
    return this.containers.get(containerName)?.objects.get(objectName);
  }

  getContainer(containerName: string): StoredContainer | undefined {
    return this.containers.get(containerName);
  }

  getAccountHeaders(): HeaderMap {
    return this.accountHeaders.clone();
  }

  /**
   * Requests recorded so far that used `method`
   */
  requestsFor(method: string): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method);
  }

  // ---------------------------------------------------------------------------
  // Routing
  // ---------------------------------------------------------------------------

  /**
   * Returns undefined for the /info endpoint
   */
  private parseTarget(url: URL): Target | undefined {
    if (`${url.origin}${url.pathname}` === this.infoEndpoint) {
      return undefined;
    }
    if (!url.pathname.startsWith(this.basePath)) {
      return { containerName: '', objectName: '' };
    }
    const rest = url.pathname.slice(this.basePath.length).replace(/^\//, '');
    if (rest === '') {
      return {};
    }
    const slash = rest.indexOf('/');
    if (slash < 0 || slash === rest.length - 1) {
      return { containerName: decodeURIComponent(slash < 0 ? rest : rest.slice(0, slash)) };
    }
    return {
      containerName: decodeURIComponent(rest.slice(0, slash)),
      objectName: decodeURIComponent(rest.slice(slash + 1)),
    };
  }

  private takeFault(method: string, target: Target): CannedResponse | undefined {
    const index = this.faults.findIndex(
      ({ matcher }) =>
        (matcher.method === undefined || matcher.method === method) &&
        (matcher.containerName === undefined || matcher.containerName === target.containerName) &&
        (matcher.objectName === undefined || matcher.objectName === target.objectName)
    );
    if (index < 0) {
      return undefined;
    }
    const [fault] = this.faults.splice(index, 1);
    return fault?.response;
  }

  private route(
    method: string,
    target: Target,
    query: URLSearchParams,
    headers: HeaderMap,
    body: Uint8Array
  ): CannedResponse {
    if (target.containerName === undefined) {
      return this.handleAccount(method, query, headers, body);
    }
    if (target.containerName === '') {
      return notFound();
    }
    if (target.objectName === undefined) {
      return this.handleContainer(method, target.containerName, query, headers, body);
    }
    return this.handleObject(method, target.containerName, target.objectName, query, headers, body);
  }

  private toHttpResponse(method: string, response: CannedResponse): HttpResponse {
    const body = typeof response.body === 'string' ? encoder.encode(response.body) : response.body;
    const headers: Record<string, string> = { ...response.headers };
    if (headers['Content-Length'] === undefined) {
      headers['Content-Length'] = String(body?.length ?? 0);
    }
    return {
      status: response.status,
      headers,
      body: method === 'HEAD' || body === undefined || body.length === 0 ? null : bytesToStream(body),
    };
  }

  // ---------------------------------------------------------------------------
  // Info
  // ---------------------------------------------------------------------------

  private handleInfo(method: string, url: URL): CannedResponse {
    if (url.pathname.endsWith('/info') && method === 'GET') {
      return json(200, this.capabilities);
    }
    return method === 'GET' || method === 'HEAD' ? notFound() : methodNotAllowed();
  }

  // ---------------------------------------------------------------------------
  // Account
  // ---------------------------------------------------------------------------

  private handleAccount(method: string, query: URLSearchParams, headers: HeaderMap, body: Uint8Array): CannedResponse {
    switch (method) {
      case 'HEAD':
        return { status: 204, headers: this.accountResponseHeaders() };
      case 'GET':
        return this.listContainers(query);
      case 'POST':
        if (query.has('bulk-delete')) {
          return this.bulkDelete(body);
        }
        applyMetadata(this.accountHeaders, headers, (name) => name.startsWith('x-account-meta-'));
        return { status: 204 };
      case 'PUT':
        if (query.has('extract-archive')) {
          return this.extractArchive(query.get('extract-archive') ?? '', undefined, '', body);
        }
        return methodNotAllowed();
      default:
        return methodNotAllowed();
    }
  }

  private accountResponseHeaders(): Record<string, string> {
    let objectCount = 0;
    let bytesUsed = 0;
    for (const container of this.containers.values()) {
      const stats = containerStats(container);
      objectCount += stats.objectCount;
      bytesUsed += stats.bytesUsed;
    }
    return {
      ...this.accountHeaders.toRecord(),
      'X-Account-Container-Count': String(this.containers.size),
      'X-Account-Object-Count': String(objectCount),
      'X-Account-Bytes-Used': String(bytesUsed),
      'X-Timestamp': unixTimestamp(new Date(0)),
    };
  }

  private listContainers(query: URLSearchParams): CannedResponse {
    const prefix = query.get('prefix') ?? '';
    const entries = [...this.containers.entries()]
      .filter(([name]) => name.startsWith(prefix))
      .map(([name, container]) => {
        const stats = containerStats(container);
        return {
          key: name,
          entry: {
            name,
            count: stats.objectCount,
            bytes: stats.bytesUsed,
            last_modified: listingTimestamp(container.createdAt),
          },
        };
      });
    const page = paginate(entries, query);
    if (page.length === 0) {
      return { status: 204, headers: this.accountResponseHeaders() };
    }
    return json(
      200,
      page.map((item) => item.entry),
      this.accountResponseHeaders()
    );
  }

  private bulkDelete(body: Uint8Array): CannedResponse {
    const paths = decoder
      .decode(body)
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== '');

    const limit = bulkDeleteLimit(this.capabilities);
    if (paths.length > limit) {
      return { status: 413, body: `<html><h1>Request Entity Too Large</h1><p>Max delete paths exceeded</p></html>` };
    }

    let deleted = 0;
    let notFound = 0;
    const errors: Array<[string, string]> = [];

    for (const path of paths) {
      const trimmed = path.replace(/^\//, '');
      const slash = trimmed.indexOf('/');
      const containerName = decodeURIComponent(slash < 0 ? trimmed : trimmed.slice(0, slash));
      const container = this.containers.get(containerName);

      if (slash < 0) {
        if (container === undefined) {
          notFound++;
        } else if (container.objects.size > 0) {
          errors.push([path, '409 Conflict']);
        } else {
          this.containers.delete(containerName);
          deleted++;
        }
        continue;
      }

      const objectName = decodeURIComponent(trimmed.slice(slash + 1));
      if (container?.objects.delete(objectName) === true) {
        deleted++;
      } else {
        notFound++;
      }
    }

    return json(200, {
      'Number Deleted': deleted,
      'Number Not Found': notFound,
      'Response Status': errors.length > 0 ? '400 Bad Request' : '200 OK',
      'Response Body': '',
      Errors: errors,
    });
  }

  private extractArchive(
    format: string,
    containerName: string | undefined,
    prefix: string,
    body: Uint8Array
  ): CannedResponse {
    let entries;
    try {
      if (format === 'tar') {
        entries = readTar(body);
      } else if (format === 'tar.gz') {
        entries = readTar(new Uint8Array(gunzipSync(body)));
      } else {
        return bulkReport('400 Bad Request', `Unsupported archive format: ${format}`, [], 0);
      }
    } catch (error) {
      return bulkReport('400 Bad Request', `Invalid Tar File: ${error instanceof Error ? error.message : String(error)}`, [], 0);
    }

    let created = 0;
    const errors: Array<[string, string]> = [];
    for (const entry of entries) {
      const path = entry.name.replace(/^\.?\//, '');
      let targetContainer = containerName;
      let objectName = `${prefix}${path}`;
      if (targetContainer === undefined) {
        const slash = path.indexOf('/');
        if (slash <= 0 || slash === path.length - 1) {
          errors.push([`/${encodeURIComponent(path)}`, '400 Bad Request']);
          continue;
        }
        targetContainer = path.slice(0, slash);
        objectName = path.slice(slash + 1);
      }
      if (!this.containers.has(targetContainer)) {
        this.createContainer(targetContainer);
      }
      this.containers
        .get(targetContainer)
        ?.objects.set(objectName, this.newObject(entry.data, md5Hex(entry.data), new HeaderMap()));
      created++;
    }

    return bulkReport(errors.length > 0 ? '400 Bad Request' : '201 Created', '', errors, created);
  }

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  private handleContainer(
    method: string,
    containerName: string,
    query: URLSearchParams,
    headers: HeaderMap,
    body: Uint8Array
  ): CannedResponse {
    const container = this.containers.get(containerName);

    switch (method) {
      case 'PUT': {
        if (query.has('extract-archive')) {
          return this.extractArchive(query.get('extract-archive') ?? '', containerName, '', body);
        }
        if (container !== undefined) {
          applyMetadata(container.headers, headers, isContainerHeader);
          return { status: 202 };
        }
        const created: StoredContainer = { headers: new HeaderMap(), objects: new Map(), createdAt: this.now() };
        applyMetadata(created.headers, headers, isContainerHeader);
        this.containers.set(containerName, created);
        return { status: 201 };
      }
      case 'HEAD':
      case 'GET':
        if (container === undefined) {
          return notFound();
        }
        return method === 'HEAD'
          ? { status: 204, headers: containerResponseHeaders(container) }
          : this.listObjects(container, query);
      case 'POST':
        if (container === undefined) {
          return notFound();
        }
        applyMetadata(container.headers, headers, isContainerHeader);
        return { status: 204 };
      case 'DELETE':
        if (container === undefined) {
          return notFound();
        }
        if (container.objects.size > 0) {
          return { status: 409, headers: { 'Content-Type': 'text/html; charset=UTF-8' }, body: CONFLICT_BODY };
        }
        this.containers.delete(containerName);
        return { status: 204 };
      default:
        return methodNotAllowed();
    }
  }

  private listObjects(container: StoredContainer, query: URLSearchParams): CannedResponse {
    const prefix = query.get('prefix') ?? '';
    const delimiter = query.get('delimiter') ?? '';
    const seen = new Set<string>();
    const entries: Array<{ key: string; entry: Record<string, unknown> }> = [];

    for (const [name, object] of container.objects) {
      if (!name.startsWith(prefix)) {
        continue;
      }
      if (delimiter !== '') {
        const index = name.indexOf(delimiter, prefix.length);
        if (index >= 0) {
          const subdir = name.slice(0, index + delimiter.length);
          if (!seen.has(subdir)) {
            seen.add(subdir);
            entries.push({ key: subdir, entry: { subdir } });
          }
          continue;
        }
      }
      entries.push({
        key: name,
        entry: {
          name,
          hash: object.etag,
          bytes: this.contentOf(object).length,
          content_type: object.headers.get('content-type') ?? 'application/octet-stream',
          last_modified: listingTimestamp(object.lastModified),
        },
      });
    }

    const page = paginate(entries, query);
    if (page.length === 0) {
      return { status: 204, headers: containerResponseHeaders(container) };
    }
    return json(
      200,
      page.map((item) => item.entry),
      containerResponseHeaders(container)
    );
  }

  // ---------------------------------------------------------------------------
  // Objects
  // ---------------------------------------------------------------------------

  private handleObject(
    method: string,
    containerName: string,
    objectName: string,
    query: URLSearchParams,
    headers: HeaderMap,
    body: Uint8Array
  ): CannedResponse {
    const container = this.containers.get(containerName);
    if (container === undefined) {
      return notFound();
    }
    const object = container.objects.get(objectName);

    switch (method) {
      case 'PUT':
        if (query.has('extract-archive')) {
          return this.extractArchive(query.get('extract-archive') ?? '', containerName, `${objectName}/`, body);
        }
        return this.putObjectRequest(container, objectName, query, headers, body);
      case 'HEAD':
        return object === undefined ? notFound() : { status: 200, headers: this.objectResponseHeaders(object) };
      case 'GET':
        return object === undefined ? notFound() : this.getObjectRequest(object, query, headers);
      case 'POST': {
        if (object === undefined) {
          return notFound();
        }
        for (const name of object.headers.keys()) {
          if (name.toLowerCase().startsWith('x-object-meta-')) {
            object.headers.delete(name);
          }
        }
        applyMetadata(object.headers, headers, isObjectHeader);
        object.lastModified = this.now();
        return { status: 202 };
      }
      case 'DELETE':
        if (object === undefined) {
          return notFound();
        }
        if (query.get('multipart-manifest') === 'delete' && object.manifest !== undefined) {
          return this.deleteStaticLargeObject(container, objectName, object.manifest);
        }
        container.objects.delete(objectName);
        return { status: 204 };
      case 'COPY':
        return object === undefined ? notFound() : this.copyObject(object, headers);
      default:
        return methodNotAllowed();
    }
  }

  private putObjectRequest(
    container: StoredContainer,
    objectName: string,
    query: URLSearchParams,
    headers: HeaderMap,
    body: Uint8Array
  ): CannedResponse {
    const objectHeaders = new HeaderMap();
    applyMetadata(objectHeaders, headers, isObjectHeader);
    if (!objectHeaders.has('content-type')) {
      objectHeaders.set('Content-Type', 'application/octet-stream');
    }

    if (query.get('multipart-manifest') === 'put') {
      let manifest: SloSegment[];
      try {
        manifest = this.resolveManifest(decoder.decode(body));
      } catch (error) {
        return { status: 400, body: error instanceof Error ? error.message : String(error) };
      }
      objectHeaders.set('X-Static-Large-Object', 'True');
      const etag = md5Hex(encoder.encode(manifest.map((segment) => segment.etag).join('')));
      const stored = this.newObject(new Uint8Array(0), etag, objectHeaders);
      stored.manifest = manifest;
      container.objects.set(objectName, stored);
      return { status: 201, headers: { Etag: `"${etag}"` } };
    }

    const digest = md5Hex(body);
    const expected = headers.get('etag');
    if (expected !== undefined && expected.replace(/"/g, '').toLowerCase() !== digest) {
      return { status: 422, body: '<html><h1>Unprocessable Entity</h1><p>Unable to process the contained instructions</p></html>' };
    }

    const etag = this.etagOverride ?? digest;
    this.etagOverride = undefined;
    container.objects.set(objectName, this.newObject(body, digest, objectHeaders));
    return { status: 201, headers: { Etag: etag, 'Last-Modified': this.now().toUTCString() } };
  }

  private getObjectRequest(object: StoredObject, query: URLSearchParams, headers: HeaderMap): CannedResponse {
    if (query.get('multipart-manifest') === 'get' && object.manifest !== undefined) {
      const manifest =
        query.get('format') === 'raw'
          ? object.manifest
          : object.manifest.map((segment) => ({ name: segment.path, hash: segment.etag, bytes: segment.size_bytes }));
      return json(200, manifest, { 'X-Static-Large-Object': 'True' });
    }

    const content = this.contentOf(object);
    const responseHeaders = this.objectResponseHeaders(object);
    const range = headers.get('range');
    if (range === undefined) {
      return { status: 200, headers: responseHeaders, body: content };
    }

    const bounds = parseRange(range, content.length);
    if (bounds === undefined) {
      return { status: 416, headers: { 'Content-Range': `bytes */${content.length}` } };
    }
    const [start, end] = bounds;
    return {
      status: 206,
      headers: {
        ...responseHeaders,
        'Content-Length': String(end - start + 1),
        'Content-Range': `bytes ${start}-${end}/${content.length}`,
      },
      body: content.slice(start, end + 1),
    };
  }

  private copyObject(object: StoredObject, headers: HeaderMap): CannedResponse {
    const destination = headers.get('destination') ?? '';
    const trimmed = destination.replace(/^\//, '');
    const slash = trimmed.indexOf('/');
    if (slash <= 0) {
      return { status: 412, body: 'Destination header must be of the form <container name>/<object name>' };
    }
    const target = this.containers.get(decodeURIComponent(trimmed.slice(0, slash)));
    if (target === undefined) {
      return notFound();
    }
    const copy = this.newObject(this.contentOf(object).slice(), object.etag, object.headers.clone());
    copy.headers.delete('x-object-manifest');
    copy.headers.delete('x-static-large-object');
    target.objects.set(decodeURIComponent(trimmed.slice(slash + 1)), copy);
    return { status: 201, headers: { Etag: copy.etag } };
  }

  private deleteStaticLargeObject(container: StoredContainer, objectName: string, manifest: SloSegment[]): CannedResponse {
    let deleted = 0;
    let notFound = 0;
    for (const segment of manifest) {
      const [segmentContainer, segmentObject] = splitPath(segment.path);
      if (this.containers.get(segmentContainer)?.objects.delete(segmentObject) === true) {
        deleted++;
      } else {
        notFound++;
      }
    }
    container.objects.delete(objectName);
    deleted++;
    return json(200, {
      'Number Deleted': deleted,
      'Number Not Found': notFound,
      'Response Status': '200 OK',
      'Response Body': '',
      Errors: [],
    });
  }

  /**
   * Checks an SLO manifest against the stored segments
   *
   * @throws {Error} Describing the first invalid segment
   */
  private resolveManifest(text: string): SloSegment[] {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error('Manifest must be a list');
    }
    const segments: SloSegment[] = [];
    for (const item of parsed) {
      if (typeof item !== 'object' || item === null) {
        throw new Error('Manifest entries must be objects');
      }
      const path: unknown = Reflect.get(item, 'path');
      const etag: unknown = Reflect.get(item, 'etag');
      const sizeBytes: unknown = Reflect.get(item, 'size_bytes');
      if (typeof path !== 'string') {
        throw new Error('Manifest entry is missing a path');
      }
      const [containerName, objectName] = splitPath(path);
      const segment = this.containers.get(containerName)?.objects.get(objectName);
      if (segment === undefined) {
        throw new Error(`Errors:\n${path}, 404 Not Found`);
      }
      if (typeof etag === 'string' && etag !== segment.etag) {
        throw new Error(`Errors:\n${path}, Etag Mismatch`);
      }
      if (typeof sizeBytes === 'number' && sizeBytes !== segment.data.length) {
        throw new Error(`Errors:\n${path}, Size Mismatch`);
      }
      segments.push({ path, etag: segment.etag, size_bytes: segment.data.length });
    }
    return segments;
  }

  private objectResponseHeaders(object: StoredObject): Record<string, string> {
    const isLarge = object.manifest !== undefined || object.headers.has('x-object-manifest');
    const content = this.contentOf(object);
    const etag = isLarge ? `"${this.largeObjectEtag(object)}"` : object.etag;
    return {
      ...object.headers.toRecord(),
      'Content-Length': String(content.length),
      Etag: etag,
      'Last-Modified': object.lastModified.toUTCString(),
      'X-Timestamp': unixTimestamp(object.createdAt),
    };
  }

  private largeObjectEtag(object: StoredObject): string {
    if (object.manifest !== undefined) {
      return object.etag;
    }
    return md5Hex(encoder.encode(this.dynamicSegments(object).map((segment) => segment.etag).join('')));
  }

  /**
   * The bytes a GET returns: segments joined for large objects
   */
  private contentOf(object: StoredObject): Uint8Array {
    if (object.manifest !== undefined) {
      return concatBytes(
        object.manifest.map((segment) => {
          const [containerName, objectName] = splitPath(segment.path);
          return this.containers.get(containerName)?.objects.get(objectName)?.data ?? new Uint8Array(0);
        })
      );
    }
    if (object.headers.has('x-object-manifest')) {
      return concatBytes(this.dynamicSegments(object).map((segment) => segment.data));
    }
    return object.data;
  }

  private dynamicSegments(object: StoredObject): StoredObject[] {
    const manifest = object.headers.get('x-object-manifest') ?? '';
    const slash = manifest.indexOf('/');
    const containerName = decodeURIComponent(slash < 0 ? manifest : manifest.slice(0, slash));
    const prefix = slash < 0 ? '' : decodeURIComponent(manifest.slice(slash + 1));
    const container = this.containers.get(containerName);
    if (container === undefined) {
      return [];
    }
    return [...container.objects.entries()]
      .filter(([name, segment]) => name.startsWith(prefix) && segment !== object)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, segment]) => segment);
  }

  private newObject(data: Uint8Array, etag: string, headers: HeaderMap): StoredObject {
    const now = this.now();
    return { data, etag, headers, createdAt: now, lastModified: now };
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function notFound(): CannedResponse {
  return { status: 404, headers: { 'Content-Type': 'text/html; charset=UTF-8' }, body: NOT_FOUND_BODY };
}

function methodNotAllowed(): CannedResponse {
  return {
    status: 405,
    headers: { 'Content-Type': 'text/html; charset=UTF-8' },
    body: '<html><h1>Method Not Allowed</h1><p>The method is not allowed for this resource.</p></html>',
  };
}

function json(status: number, value: unknown, headers: Record<string, string> = {}): CannedResponse {
  return {
    status,
    headers: { ...headers, 'Content-Type': 'application/json; charset=utf-8' },
    body: JSON.stringify(value),
  };
}

function bulkReport(status: string, responseBody: string, errors: Array<[string, string]>, created: number): CannedResponse {
  return json(200, {
    'Number Files Created': created,
    'Response Status': status,
    'Response Body': responseBody,
    Errors: errors,
  });
}

function isContainerHeader(name: string): boolean {
  return name.startsWith('x-container-meta-') || CONTAINER_HEADERS.has(name);
}

function isObjectHeader(name: string): boolean {
  return name.startsWith('x-object-meta-') || OBJECT_HEADERS.has(name);
}

/**
 * Copies accepted headers into `target`. An empty value removes the header.
 */
function applyMetadata(target: HeaderMap, incoming: HeaderMap, accept: (lowerName: string) => boolean): void {
  for (const [name, value] of incoming) {
    if (!accept(name.toLowerCase())) {
      continue;
    }
    if (value === '') {
      target.delete(name);
    } else {
      target.set(name, value);
    }
  }
}

function containerStats(container: StoredContainer): { objectCount: number; bytesUsed: number } {
  let bytesUsed = 0;
  for (const object of container.objects.values()) {
    bytesUsed += object.data.length;
  }
  return { objectCount: container.objects.size, bytesUsed };
}

function containerResponseHeaders(container: StoredContainer): Record<string, string> {
  const stats = containerStats(container);
  return {
    ...container.headers.toRecord(),
    'X-Container-Object-Count': String(stats.objectCount),
    'X-Container-Bytes-Used': String(stats.bytesUsed),
    'X-Timestamp': unixTimestamp(container.createdAt),
  };
}

function bulkDeleteLimit(capabilities: Record<string, unknown>): number {
  const section: unknown = capabilities['bulk_delete'];
  if (typeof section === 'object' && section !== null) {
    const limit: unknown = Reflect.get(section, 'max_deletes_per_request');
    if (typeof limit === 'number') {
      return limit;
    }
  }
  return Number.POSITIVE_INFINITY;
}

/**
 * Sorts by key and applies marker, end_marker and limit
 */
function paginate<T extends { key: string }>(entries: T[], query: URLSearchParams): T[] {
  const marker = query.get('marker');
  const endMarker = query.get('end_marker');
  const limit = Number.parseInt(query.get('limit') ?? '', 10);
  return entries
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .filter((item) => (marker === null || item.key > marker) && (endMarker === null || item.key < endMarker))
    .slice(0, Number.isNaN(limit) ? DEFAULT_LISTING_LIMIT : limit);
}

/**
 * Parses a single "bytes=" range into inclusive bounds
 */
function parseRange(header: string, length: number): [number, number] | undefined {
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (match === null) {
    return undefined;
  }
  const [, first = '', last = ''] = match;
  if (first === '' && last === '') {
    return undefined;
  }
  if (first === '') {
    const suffix = Number.parseInt(last, 10);
    return suffix === 0 || length === 0 ? undefined : [Math.max(0, length - suffix), length - 1];
  }
  const start = Number.parseInt(first, 10);
  const end = last === '' ? length - 1 : Math.min(Number.parseInt(last, 10), length - 1);
  return start >= length || end < start ? undefined : [start, end];
}

function splitPath(path: string): [string, string] {
  const trimmed = path.replace(/^\//, '');
  const slash = trimmed.indexOf('/');
  return slash < 0 ? [trimmed, ''] : [trimmed.slice(0, slash), trimmed.slice(slash + 1)];
}

function unixTimestamp(date: Date): string {
  return (date.getTime() / 1000).toFixed(5);
}

function listingTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, -1)}000`;
}

