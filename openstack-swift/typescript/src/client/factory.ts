/**
 * Factory functions for creating Swift clients
 * @module openstack-swift-client/client/factory
 */

import { createConfigFromEnv, normalizeConfig, type SwiftConfig } from '../config/index.js';
import { ConsoleLogger, NoopLogger, type Logger } from '../observability/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { SwiftClient } from './client.js';

/**
 * Dependencies that replace the defaults built from the configuration
 */
export interface ClientDependencies {
  /** Replaces the fetch transport, e.g. with a simulator in tests */
  transport?: HttpTransport;
  /** Replaces the logger selected by `logLevel` */
  logger?: Logger;
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   storageUrl: 'https://swift.example.com/v1/AUTH_test',
 *   authToken: process.env.SWIFT_AUTH_TOKEN,
 * });
 *
 * try {
 *   const object = client.account.container('photos').object('cat.jpg');
 *   await object.upload(bytes);
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: SwiftConfig, dependencies: ClientDependencies = {}): SwiftClient {
  const normalized = normalizeConfig(config);

  const transport =
    dependencies.transport ??
    createFetchTransport({
      authToken: normalized.authToken,
      timeout: normalized.timeout,
      userAgent: normalized.userAgent,
    });
  const logger =
    dependencies.logger ??
    (normalized.logLevel === undefined ? new NoopLogger() : new ConsoleLogger(normalized.logLevel));

  return new SwiftClient(normalized, transport, logger.child({ account: normalized.storageUrl }));
}

/**
 * Creates a client from the SWIFT_* environment variables
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createClientFromEnv(dependencies: ClientDependencies = {}): SwiftClient {
  return createClient(createConfigFromEnv(), dependencies);
}
