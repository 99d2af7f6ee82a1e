/**
 * Default configuration values
 * @module openstack-swift-client/config/defaults
 */

/**
 * Default request timeout in milliseconds (headers only; bodies stream
 * without a deadline)
 */
export const DEFAULT_TIMEOUT = 60000;

export const DEFAULT_USER_AGENT = 'openstack-swift-client/0.1.0';
