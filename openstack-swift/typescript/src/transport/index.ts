/**
 * HTTP transport layer for the OpenStack Swift client
 *
 * The core only depends on the {@link HttpTransport} interface; the fetch
 * transport is the default implementation used by `createClient`.
 */

// Type exports
export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

// Body helpers
export { bytesToStream, concatBytes, discardBody, iterableToStream, readStream } from './body.js';

// Fetch transport exports
export type { FetchTransportOptions } from './fetch-transport.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';
