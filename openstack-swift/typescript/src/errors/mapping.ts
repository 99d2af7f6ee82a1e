/**
 * Error matching utilities for the OpenStack Swift client
 * @module openstack-swift-client/errors/mapping
 */

import { SwiftError } from './error.js';
import { NetworkError, UnexpectedStatusCodeError } from './categories.js';

/**
 * Checks whether `error` is an {@link UnexpectedStatusCodeError} for exactly
 * the given status code.
 *
 * Only a single code is matched, never a range, so callers can treat 404 as
 * "absent" while every other 4xx stays fatal:
 *
 * @example
 * ```typescript
 * try {
 *   await container.delete();
 * } catch (error) {
 *   if (!isStatusCode(error, 404)) {
 *     throw error;
 *   }
 *   // container does not exist, which is what we wanted
 * }
 * ```
 */
export function isStatusCode(error: unknown, code: number): boolean {
  return error instanceof UnexpectedStatusCodeError && error.status === code;
}

/**
 * Type guard for errors raised by this library
 */
export function isSwiftError(error: unknown): error is SwiftError {
  return error instanceof SwiftError;
}

/**
 * Wraps an unknown transport failure in a SwiftError
 *
 * SwiftErrors are passed through unchanged.
 */
export function wrapError(error: unknown): SwiftError {
  if (isSwiftError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'CONNECTION_FAILED';
    return new NetworkError({
      message: error.message,
      code,
      details: { name: error.name },
    });
  }

  return NetworkError.connectionFailed(String(error));
}
