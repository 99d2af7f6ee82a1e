/**
 * Configuration for the OpenStack Swift client
 * @module openstack-swift-client/config
 */

import { SwiftConfigBuilder } from './builder.js';
import { createConfigFromEnv } from './env.js';

import type { SwiftConfig as SwiftConfigOptions } from './types.js';

export type { NormalizedSwiftConfig } from './types.js';
export type SwiftConfig = SwiftConfigOptions;
export { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './defaults.js';
export { normalizeConfig } from './validation.js';
export { createConfigFromEnv } from './env.js';
export { SwiftConfigBuilder } from './builder.js';

/**
 * Factory methods for configurations
 */
export const SwiftConfig = {
  builder(): SwiftConfigBuilder {
    return new SwiftConfigBuilder();
  },

  fromEnv(env?: NodeJS.ProcessEnv): ReturnType<typeof createConfigFromEnv> {
    return createConfigFromEnv(env);
  },
};
