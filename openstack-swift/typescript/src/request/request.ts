/**
 * Request executor for the OpenStack Swift client
 */

import { ValidationError } from '../errors/index.js';
import { HeaderMap } from '../headers/index.js';
import type { Logger } from '../observability/index.js';
import { discardBody, readStream, type HttpTransport } from '../transport/index.js';
import { checkStatus } from './classify.js';
import { DEFAULT_STATUS_BY_METHOD, type HttpMethod } from './status-codes.js';

/**
 * What the executor needs from an account: where to send requests and how
 */
export interface RequestContext {
  /** Storage URL of the account, e.g. https://swift.example.com/v1/AUTH_abc */
  readonly storageUrl: string;
  readonly transport: HttpTransport;
  readonly logger: Logger;
}

/**
 * Options accepted by every entity operation
 */
export interface RequestOptions {
  /** Extra headers, sent after (and overriding) the operation's own */
  headers?: Record<string, string>;
  /** Extra query parameters */
  query?: Record<string, string>;
  /** Status codes to accept instead of the operation's defaults */
  expectStatus?: readonly number[];
  /** Aborts the request */
  signal?: AbortSignal;
}

export interface SwiftRequest {
  method: HttpMethod;
  /** Replaces the account storage URL as the base of the request URL */
  baseUrl?: string;
  containerName?: string;
  objectName?: string;
  headers?: Record<string, string>;
  query?: Record<string, string | undefined>;
  body?: Uint8Array | ReadableStream<Uint8Array>;
  /** Defaults to {@link DEFAULT_STATUS_BY_METHOD} */
  expectStatus?: readonly number[];
  signal?: AbortSignal;
}

export interface SwiftResponse {
  status: number;
  headers: HeaderMap;
  /** Open response body; the caller must read or discard it */
  body: ReadableStream<Uint8Array> | null;
}

/**
 * Checks container and object names without any I/O
 *
 * @throws {ValidationError}
 */
export function validateTarget(containerName?: string, objectName?: string): void {
  if (objectName !== undefined && (containerName === undefined || containerName === '')) {
    throw ValidationError.noContainerName();
  }
  if (containerName !== undefined) {
    if (containerName === '') {
      throw ValidationError.noContainerName();
    }
    if (containerName.includes('/')) {
      throw ValidationError.malformedContainerName(containerName);
    }
  }
  if (objectName === '') {
    throw ValidationError.emptyObjectName(containerName ?? '');
  }
}

/**
 * Percent-encodes an object name, keeping the slashes that act as
 * pseudo-directory delimiters
 */
export function encodeObjectName(objectName: string): string {
  return objectName
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Builds query string from parameters, with leading '?' or empty
 */
export function buildQueryString(params: Record<string, string | undefined>): string {
  const parts: string[] = [];

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
    }
  }

  return parts.length > 0 ? `?${parts.join('&')}` : '';
}

/**
 * Builds the URL of an account, container or object, without query string
 */
export function buildUrl(storageUrl: string, containerName?: string, objectName?: string): string {
  let url = storageUrl.endsWith('/') ? storageUrl.slice(0, -1) : storageUrl;
  if (containerName !== undefined) {
    url += `/${encodeURIComponent(containerName)}`;
    if (objectName !== undefined) {
      url += `/${encodeObjectName(objectName)}`;
    }
  }
  return url;
}

/**
 * Sends a request and classifies the response.
 *
 * Names are validated before anything is sent. The response body is handed
 * back open on success. There are no retries.
 *
 * @throws {ValidationError} For missing or malformed names
 * @throws {UnexpectedStatusCodeError} If the status is not expected
 */
export async function executeRequest(ctx: RequestContext, request: SwiftRequest): Promise<SwiftResponse> {
  validateTarget(request.containerName, request.objectName);

  const url =
    buildUrl(request.baseUrl ?? ctx.storageUrl, request.containerName, request.objectName) +
    buildQueryString(request.query ?? {});
  const headers: Record<string, string> = { ...request.headers };
  if (request.body instanceof Uint8Array) {
    headers['Content-Length'] = String(request.body.length);
  }

  const startedAt = Date.now();
  const response = await ctx.transport.send({
    method: request.method,
    url,
    headers,
    body: request.body,
    signal: request.signal,
  });

  ctx.logger.debug('swift request', {
    method: request.method,
    container: request.containerName,
    object: request.objectName,
    status: response.status,
    durationMs: Date.now() - startedAt,
  });

  const result: SwiftResponse = {
    status: response.status,
    headers: new HeaderMap(response.headers),
    body: response.body,
  };
  await checkStatus(result, request.expectStatus ?? DEFAULT_STATUS_BY_METHOD[request.method]);
  return result;
}

/**
 * Like {@link executeRequest}, but discards the response body
 */
export async function executeForHeaders(ctx: RequestContext, request: SwiftRequest): Promise<HeaderMap> {
  const response = await executeRequest(ctx, request);
  await discardBody(response.body);
  return response.headers;
}

/**
 * Like {@link executeRequest}, but reads the whole response body
 */
export async function executeForBody(
  ctx: RequestContext,
  request: SwiftRequest
): Promise<{ status: number; headers: HeaderMap; body: Uint8Array }> {
  const response = await executeRequest(ctx, request);
  const body = response.body === null ? new Uint8Array(0) : await readStream(response.body);
  return { status: response.status, headers: response.headers, body };
}

/**
 * Merges the caller's options into a request
 */
export function withOptions(request: SwiftRequest, opts: RequestOptions | undefined): SwiftRequest {
  if (opts === undefined) {
    return request;
  }
  return {
    ...request,
    headers: { ...request.headers, ...opts.headers },
    query: { ...request.query, ...opts.query },
    expectStatus: opts.expectStatus ?? request.expectStatus,
    signal: opts.signal ?? request.signal,
  };
}
