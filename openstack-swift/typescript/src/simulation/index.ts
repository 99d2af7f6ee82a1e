/**
 * In-process stand-ins for a Swift cluster
 * @module openstack-swift-client/simulation
 *
 * Simulator:
 * ```typescript
 * import { SwiftSimulator } from 'openstack-swift-client/simulation';
 *
 * const simulator = new SwiftSimulator();
 * simulator.putObject('photos', 'cat.jpg', bytes);
 * const client = createClient({ storageUrl: simulator.storageUrl }, { transport: simulator });
 * ```
 *
 * Canned responses:
 * ```typescript
 * import { StubTransport } from 'openstack-swift-client/simulation';
 *
 * const transport = new StubTransport([{ status: 204, headers: { 'X-Account-Object-Count': '3' } }]);
 * ```
 */

export type {
  CannedResponse,
  FaultMatcher,
  RecordedRequest,
  SloSegment,
  StoredContainer,
  StoredObject,
  SwiftSimulatorOptions,
} from './types.js';

export { DEFAULT_STORAGE_URL, NOT_FOUND_BODY, SwiftSimulator } from './swift-simulator.js';
export { StubTransport } from './stub-transport.js';
export { readTar, writeTar, type TarEntry } from './tar.js';
