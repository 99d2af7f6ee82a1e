/**
 * Configuration validation
 * @module openstack-swift-client/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './defaults.js';
import type { NormalizedSwiftConfig, SwiftConfig } from './types.js';

const configSchema = z.object({
  storageUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), { message: 'must be an http or https URL' }),
  authToken: z.string().min(1).optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']).optional(),
});

/**
 * Validates a configuration and applies defaults
 *
 * @throws {ConfigError} Listing every problem found
 */
export function normalizeConfig(config: SwiftConfig): NormalizedSwiftConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw ConfigError.invalidConfig(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  return {
    storageUrl: result.data.storageUrl.replace(/\/+$/, ''),
    authToken: result.data.authToken,
    timeout: result.data.timeout,
    userAgent: result.data.userAgent,
    logLevel: result.data.logLevel,
  };
}
