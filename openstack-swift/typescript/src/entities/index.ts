/**
 * Account, container and object handles
 * @module openstack-swift-client/entities
 */

export { Account, type AccountOptions } from './account.js';
export { Container } from './container.js';
export { HeaderCache } from './header-cache.js';
export { SwiftObject, type DeleteOptions } from './object.js';
