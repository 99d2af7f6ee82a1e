/**
 * Fluent configuration builder
 * @module openstack-swift-client/config/builder
 */

import type { LogLevel } from '../observability/index.js';
import type { NormalizedSwiftConfig, SwiftConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing a Swift client configuration
 */
export class SwiftConfigBuilder {
  private config: Partial<SwiftConfig> = {};

  storageUrl(url: string): this {
    this.config.storageUrl = url;
    return this;
  }

  authToken(token: string): this {
    this.config.authToken = token;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  userAgent(value: string): this {
    this.config.userAgent = value;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration
   *
   * @throws {ConfigError} If the configuration is invalid
   */
  build(): NormalizedSwiftConfig {
    return normalizeConfig({ ...this.config, storageUrl: this.config.storageUrl ?? '' });
  }
}
