/**
 * Environment variable configuration loading
 * @module openstack-swift-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { LogLevel } from '../observability/index.js';
import type { NormalizedSwiftConfig } from './types.js';
import { normalizeConfig } from './validation.js';

const ENV_VARS = {
  STORAGE_URL: 'SWIFT_STORAGE_URL',
  AUTH_TOKEN: 'SWIFT_AUTH_TOKEN',
  TIMEOUT_MS: 'SWIFT_TIMEOUT_MS',
  USER_AGENT: 'SWIFT_USER_AGENT',
  LOG_LEVEL: 'SWIFT_LOG_LEVEL',
} as const;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw ConfigError.invalidInteger(name, value);
  }
  return Number.parseInt(value, 10);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (level === undefined) {
    throw ConfigError.invalidConfig([`${ENV_VARS.LOG_LEVEL}: unknown log level "${value}"`]);
  }
  return level;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Creates a configuration from environment variables.
 *
 * - SWIFT_STORAGE_URL (required): storage URL of the account
 * - SWIFT_AUTH_TOKEN (optional): token sent as X-Auth-Token
 * - SWIFT_TIMEOUT_MS (optional): request timeout in milliseconds
 * - SWIFT_USER_AGENT (optional): User-Agent header
 * - SWIFT_LOG_LEVEL (optional): error, warn, info, debug or trace
 *
 * @throws {ConfigError} If a variable is missing or invalid
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizedSwiftConfig {
  const storageUrl = nonEmpty(env[ENV_VARS.STORAGE_URL]);
  if (storageUrl === undefined) {
    throw ConfigError.invalidConfig([`${ENV_VARS.STORAGE_URL} is required`]);
  }

  return normalizeConfig({
    storageUrl,
    authToken: nonEmpty(env[ENV_VARS.AUTH_TOKEN]),
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    userAgent: nonEmpty(env[ENV_VARS.USER_AGENT]),
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL]),
  });
}
