/**
 * Error system for the OpenStack Swift client
 * @module openstack-swift-client/errors
 */

// Base error class
export { SwiftError, type SwiftErrorParams } from './error.js';

// Error categories
export {
  BulkError,
  BulkObjectError,
  ChecksumMismatchError,
  ConfigError,
  MalformedHeaderError,
  MalformedResponseError,
  NetworkError,
  NotSupportedError,
  UnexpectedStatusCodeError,
  UsageError,
  ValidationError,
  statusText,
  type UnexpectedStatusCodeErrorParams,
} from './categories.js';

// Error matching utilities
export { isStatusCode, isSwiftError, wrapError } from './mapping.js';
