/**
 * Cluster capability discovery
 * @module openstack-swift-client/capabilities
 */

export {
  CapabilitiesSchema,
  DEFAULT_MAX_DELETES_PER_REQUEST,
  fetchCapabilities,
  infoUrl,
  type Capabilities,
} from './capabilities.js';
