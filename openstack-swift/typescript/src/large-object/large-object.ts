/**
 * Static and dynamic large objects
 * @module openstack-swift-client/large-object
 */

import { z } from 'zod';
import { bulkErrorOf, parseBulkResponse } from '../bulk/index.js';
import type { Container, SwiftObject } from '../entities/index.js';
import { MalformedHeaderError, MalformedResponseError, UsageError, ValidationError } from '../errors/index.js';
import { ObjectHeaders } from '../headers/index.js';
import {
  EXPECTED_STATUS,
  encodeObjectName,
  executeForBody,
  withOptions,
  type RequestOptions,
} from '../request/index.js';
import { concatBytes } from '../transport/index.js';
import { md5Hex, sourceChunks, type UploadSource } from '../upload/index.js';

/**
 * `static`: the manifest lists every segment with its ETag and size (SLO).
 * `dynamic`: the manifest names a container and prefix, and the segments are
 * whatever objects match at read time (DLO).
 */
export type SegmentingStrategy = 'static' | 'dynamic';

export interface SegmentInfo {
  object: SwiftObject;
  sizeBytes: number;
  /** Hex MD5 of the segment content */
  etag: string;
}

export interface NewLargeObjectOptions {
  /** Defaults to `static` */
  strategy?: SegmentingStrategy;
  /** Container for the segments; defaults to the object's container */
  segmentContainer?: Container;
  /** Name prefix for the segments; defaults to "<object name>/segments/" */
  segmentPrefix?: string;
  /** Largest segment written by `append()`; defaults to 1 GiB */
  segmentSizeBytes?: number;
}

export interface AppendOptions extends RequestOptions {
  /** Overrides the segment size of this large object for one append */
  segmentSizeBytes?: number;
}

export const DEFAULT_SEGMENT_SIZE_BYTES = 1024 * 1024 * 1024;

const SEGMENT_INDEX_DIGITS = 8;

const SloManifestSchema = z.array(
  z.object({
    path: z.string(),
    etag: z.string(),
    size_bytes: z.number().int().nonnegative(),
  })
);

const decoder = new TextDecoder();

/**
 * A large object and its segments.
 *
 * Segments are uploaded with `append()` (or registered with `addSegment()`)
 * and become visible under the object's name once `writeManifest()` ran.
 */
export class LargeObject {
  private readonly segmentList: SegmentInfo[];
  private nextIndex: number;

  private constructor(
    readonly object: SwiftObject,
    readonly strategy: SegmentingStrategy,
    readonly segmentContainer: Container,
    readonly segmentPrefix: string,
    readonly segmentSizeBytes: number,
    segments: SegmentInfo[]
  ) {
    this.segmentList = segments;
    this.nextIndex = nextSegmentIndex(segmentPrefix, segments);
  }

  /**
   * Starts a large object without any segments
   */
  static create(object: SwiftObject, options: NewLargeObjectOptions = {}): LargeObject {
    const segmentPrefix = options.segmentPrefix ?? `${object.name}/segments/`;
    if (segmentPrefix === '') {
      throw ValidationError.invalidArgument('segmentPrefix', 'may not be empty');
    }
    const segmentSizeBytes = options.segmentSizeBytes ?? DEFAULT_SEGMENT_SIZE_BYTES;
    assertSegmentSize(segmentSizeBytes);

    return new LargeObject(
      object,
      options.strategy ?? 'static',
      options.segmentContainer ?? object.container,
      segmentPrefix,
      segmentSizeBytes,
      []
    );
  }

  /**
   * @internal
   */
  static restore(
    object: SwiftObject,
    strategy: SegmentingStrategy,
    segmentContainer: Container,
    segmentPrefix: string,
    segments: SegmentInfo[]
  ): LargeObject {
    return new LargeObject(object, strategy, segmentContainer, segmentPrefix, DEFAULT_SEGMENT_SIZE_BYTES, segments);
  }

  get segments(): readonly SegmentInfo[] {
    return this.segmentList;
  }

  /**
   * Total size of all segments
   */
  get sizeBytes(): number {
    return this.segmentList.reduce((total, segment) => total + segment.sizeBytes, 0);
  }

  /**
   * Handle for the segment `append()` would write next
   */
  nextSegmentObject(): SwiftObject {
    const index = String(this.nextIndex).padStart(SEGMENT_INDEX_DIGITS, '0');
    return this.segmentContainer.object(`${this.segmentPrefix}${index}`);
  }

  /**
   * Registers a segment that was uploaded separately
   *
   * @throws {UsageError} If a dynamic large object could not find the
   *   segment through its container and prefix
   */
  addSegment(segment: SegmentInfo): void {
    if (this.strategy === 'dynamic') {
      if (segment.object.container.name !== this.segmentContainer.name) {
        throw UsageError.segmentInvalid(
          segment.object.fullName,
          `must be in container ${this.segmentContainer.name}`
        );
      }
      if (!segment.object.name.startsWith(this.segmentPrefix)) {
        throw UsageError.segmentInvalid(segment.object.fullName, `name must start with ${this.segmentPrefix}`);
      }
    }
    this.segmentList.push(segment);
    this.nextIndex = Math.max(this.nextIndex, (segmentIndexOf(this.segmentPrefix, segment.object) ?? 0) + 1);
  }

  /**
   * Splits `source` into segments of at most `segmentSizeBytes` and uploads
   * them one after the other. Each segment is checked against its MD5.
   */
  async append(source: UploadSource, opts: AppendOptions = {}): Promise<void> {
    const { segmentSizeBytes = this.segmentSizeBytes, ...requestOptions } = opts;
    assertSegmentSize(segmentSizeBytes);

    let buffer: Uint8Array[] = [];
    let buffered = 0;

    const flush = async (): Promise<void> => {
      const data = concatBytes(buffer);
      buffer = [];
      buffered = 0;
      const object = this.nextSegmentObject();
      await object.upload(data, undefined, requestOptions);
      this.addSegment({ object, sizeBytes: data.length, etag: md5Hex(data) });
    };

    for await (const chunk of sourceChunks(source)) {
      let offset = 0;
      while (offset < chunk.length) {
        const take = Math.min(segmentSizeBytes - buffered, chunk.length - offset);
        buffer.push(chunk.subarray(offset, offset + take));
        buffered += take;
        offset += take;
        if (buffered === segmentSizeBytes) {
          await flush();
        }
      }
    }
    if (buffered > 0) {
      await flush();
    }
  }

  /**
   * Writes the manifest, making the segments readable as one object.
   * `headers` are stored on the manifest object (content type, metadata).
   */
  async writeManifest(headers?: ObjectHeaders, opts?: RequestOptions): Promise<void> {
    if (this.strategy === 'static') {
      const manifest = this.segmentList.map((segment) => ({
        path: `/${segment.object.container.name}/${segment.object.name}`,
        etag: segment.etag,
        size_bytes: segment.sizeBytes,
      }));
      await this.object.upload(JSON.stringify(manifest), headers, {
        ...opts,
        query: { ...opts?.query, 'multipart-manifest': 'put' },
      });
      return;
    }

    const manifestHeaders = new ObjectHeaders(headers?.raw.clone());
    manifestHeaders.objectManifest.set(
      `${encodeURIComponent(this.segmentContainer.name)}/${encodeObjectName(this.segmentPrefix)}`
    );
    await this.object.upload(undefined, manifestHeaders, opts);
  }

  /**
   * Deletes all segments. The manifest stays in place.
   */
  async truncate(opts?: RequestOptions): Promise<void> {
    await this.object.account.bulkDelete(
      this.segmentList.map((segment) => segment.object),
      [],
      opts
    );
    this.segmentList.length = 0;
    this.nextIndex = 1;
  }
}

/**
 * Reads the manifest of an existing large object
 *
 * @throws {UsageError} If the object is neither a static nor a dynamic
 *   large object
 */
export async function loadLargeObject(object: SwiftObject, opts?: RequestOptions): Promise<LargeObject> {
  const headers = await object.headers(opts);

  if (headers.staticLargeObject.get()) {
    const response = await executeForBody(
      object.account,
      withOptions(
        {
          method: 'GET',
          containerName: object.container.name,
          objectName: object.name,
          query: { 'multipart-manifest': 'get', format: 'raw' },
          expectStatus: EXPECTED_STATUS.object.manifestGet,
        },
        opts
      )
    );
    const entries = parseManifest(response.body);
    const segments = entries.map((entry): SegmentInfo => {
      const [containerName, objectName] = splitSegmentPath(entry.path);
      return {
        object: object.account.container(containerName).object(objectName),
        sizeBytes: entry.size_bytes,
        etag: entry.etag,
      };
    });
    const first = segments[0];
    const segmentContainer = first === undefined ? object.container : first.object.container;
    const segmentPrefix =
      first === undefined
        ? `${object.name}/segments/`
        : commonPrefix(segments.map((segment) => segment.object.name)).replace(/\d+$/, '');
    return LargeObject.restore(object, 'static', segmentContainer, segmentPrefix, segments);
  }

  const manifest = headers.objectManifest.get();
  if (manifest !== '') {
    const slash = manifest.indexOf('/');
    const containerName = decodeManifestPart(slash < 0 ? manifest : manifest.slice(0, slash));
    const segmentPrefix = slash < 0 ? '' : decodeManifestPart(manifest.slice(slash + 1));
    const segmentContainer = object.account.container(containerName);
    const entries = await segmentContainer
      .objects({ prefix: segmentPrefix, request: opts })
      .collectDetailed();

    const segments: SegmentInfo[] = [];
    for (const entry of entries) {
      if (entry.kind === 'object') {
        segments.push({ object: entry.object, sizeBytes: entry.sizeBytes, etag: entry.etag });
      }
    }
    return LargeObject.restore(object, 'dynamic', segmentContainer, segmentPrefix, segments);
  }

  throw UsageError.notLargeObject(object.fullName);
}

/**
 * Deletes a large object together with its segments. Plain objects are
 * deleted as usual.
 *
 * @throws {BulkError} If some segments of a static large object could not
 *   be deleted
 */
export async function deleteWithSegments(object: SwiftObject, opts?: RequestOptions): Promise<void> {
  const headers = await object.headers(opts);

  if (headers.staticLargeObject.get()) {
    const response = await executeForBody(
      object.account,
      withOptions(
        {
          method: 'DELETE',
          containerName: object.container.name,
          objectName: object.name,
          query: { 'multipart-manifest': 'delete' },
          headers: { Accept: 'application/json' },
          expectStatus: EXPECTED_STATUS.object.manifestDelete,
        },
        opts
      )
    );
    object.invalidate();
    const error = bulkErrorOf(parseBulkResponse(response.body, response.headers.get('content-type') ?? ''));
    if (error !== undefined) {
      throw error;
    }
    return;
  }

  if (headers.objectManifest.get() !== '') {
    const largeObject = await loadLargeObject(object, opts);
    await largeObject.truncate(opts);
  }
  await object.delete(opts);
}

function parseManifest(body: Uint8Array): z.infer<typeof SloManifestSchema> {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(body));
  } catch (error) {
    throw new MalformedResponseError('manifest', error instanceof Error ? error.message : String(error));
  }
  const result = SloManifestSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError('manifest', result.error.issues.map((issue) => issue.message).join(', '));
  }
  return result.data;
}

/**
 * "/container/some/object" -> ["container", "some/object"]
 */
function splitSegmentPath(path: string): [string, string] {
  const trimmed = path.startsWith('/') ? path.slice(1) : path;
  const slash = trimmed.indexOf('/');
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new MalformedResponseError('manifest', `bad segment path "${path}"`);
  }
  return [trimmed.slice(0, slash), trimmed.slice(slash + 1)];
}

function decodeManifestPart(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch (error) {
    throw new MalformedHeaderError('X-Object-Manifest', error instanceof Error ? error.message : String(error));
  }
}

function commonPrefix(names: readonly string[]): string {
  let prefix = names[0] ?? '';
  for (const name of names) {
    while (!name.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
    }
  }
  return prefix;
}

function segmentIndexOf(prefix: string, object: SwiftObject): number | undefined {
  if (!object.name.startsWith(prefix)) {
    return undefined;
  }
  const suffix = object.name.slice(prefix.length);
  return /^\d+$/.test(suffix) ? Number.parseInt(suffix, 10) : undefined;
}

function nextSegmentIndex(prefix: string, segments: readonly SegmentInfo[]): number {
  let highest = 0;
  for (const segment of segments) {
    highest = Math.max(highest, segmentIndexOf(prefix, segment.object) ?? 0);
  }
  return Math.max(highest, segments.length) + 1;
}

function assertSegmentSize(segmentSizeBytes: number): void {
  if (!Number.isSafeInteger(segmentSizeBytes) || segmentSizeBytes <= 0) {
    throw ValidationError.invalidArgument('segmentSizeBytes', 'must be a positive integer');
  }
}
