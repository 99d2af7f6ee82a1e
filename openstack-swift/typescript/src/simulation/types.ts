/**
 * Types for the in-process Swift simulator
 * @module openstack-swift-client/simulation/types
 */

import type { HeaderMap } from '../headers/index.js';

/**
 * A request as received by a simulated transport, with its body read
 */
export interface RecordedRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body: Uint8Array;
}

/**
 * A response to hand back instead of the simulated one
 */
export interface CannedResponse {
  status: number;
  headers?: Record<string, string>;
  body?: Uint8Array | string;
}

/**
 * Which requests a fault applies to. Unset fields match anything.
 */
export interface FaultMatcher {
  method?: string;
  containerName?: string;
  objectName?: string;
}

export interface SloSegment {
  path: string;
  etag: string;
  size_bytes: number;
}

export interface StoredObject {
  data: Uint8Array;
  etag: string;
  /** Content-Type, Content-Disposition, metadata, manifest headers */
  headers: HeaderMap;
  createdAt: Date;
  lastModified: Date;
  /** Set for static large object manifests */
  manifest?: SloSegment[];
}

export interface StoredContainer {
  headers: HeaderMap;
  objects: Map<string, StoredObject>;
  createdAt: Date;
}

export interface SwiftSimulatorOptions {
  /** Defaults to http://swift.test/v1/AUTH_test */
  storageUrl?: string;
  /** Replaces the default /info document */
  capabilities?: Record<string, unknown>;
  /** Clock used for timestamps */
  now?: () => Date;
}
