/**
 * Configuration types for the OpenStack Swift client
 * @module openstack-swift-client/config/types
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Client configuration as given by the caller
 */
export interface SwiftConfig {
  /**
   * Storage URL of the account, e.g. https://swift.example.com/v1/AUTH_test
   */
  storageUrl: string;

  /**
   * Token sent as X-Auth-Token. May be omitted for public containers or
   * when requests are signed with temp URLs.
   */
  authToken?: string;

  /**
   * Time allowed until response headers arrive, in milliseconds
   * @default 60000
   */
  timeout?: number;

  /**
   * User-Agent header
   * @default 'openstack-swift-client/0.1.0'
   */
  userAgent?: string;

  /**
   * Level of the console logger created when no logger is passed in.
   * Logging is off when unset.
   */
  logLevel?: LogLevel;
}

/**
 * Configuration with every default applied
 */
export interface NormalizedSwiftConfig {
  storageUrl: string;
  authToken: string | undefined;
  timeout: number;
  userAgent: string;
  logLevel: LogLevel | undefined;
}
