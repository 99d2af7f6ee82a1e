/**
 * Observability for the OpenStack Swift client
 * @module openstack-swift-client/observability
 */

export {
  ConsoleLogger,
  NoopLogger,
  sanitizeContext,
  type LogLevel,
  type Logger,
} from './logging.js';
