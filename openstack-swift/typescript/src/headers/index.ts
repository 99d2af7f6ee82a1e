/**
 * Header codec for the OpenStack Swift client
 * @module openstack-swift-client/headers
 */

export { HeaderMap } from './header-map.js';
export {
  BoolField,
  EtagField,
  Field,
  HttpTimestampField,
  MetadataField,
  StringField,
  UintField,
  UnixTimestampField,
} from './fields.js';
export {
  AccountHeaders,
  ContainerHeaders,
  ObjectHeaders,
  SwiftHeaders,
  type SwiftHeadersInit,
} from './headers.js';
