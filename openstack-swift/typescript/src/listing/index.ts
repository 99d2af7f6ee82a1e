/**
 * Container and object listings
 * @module openstack-swift-client/listing
 */

export { ContainerIterator, type ContainerInfo, type ContainerListOptions } from './containers.js';
export {
  ObjectIterator,
  type ObjectInfo,
  type ObjectListEntry,
  type ObjectListOptions,
  type SubdirInfo,
} from './objects.js';
export { ListingIterator, fetchListing, type ListOptions } from './paginator.js';
export {
  ContainerListingSchema,
  ObjectListingSchema,
  parseListingDate,
  type ContainerEntry,
  type ObjectEntry,
  type SubdirEntry,
} from './schemas.js';
