/**
 * Base error class for the OpenStack Swift client
 * @module openstack-swift-client/errors/error
 */

/**
 * Parameters for creating a SwiftError
 */
export interface SwiftErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the same request could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;
}

/**
 * Base error class for all Swift operations
 *
 * Every error raised by this library is a SwiftError, so callers can branch
 * on `type` or `code` (or on the subclass) instead of comparing messages.
 * The library never retries; `isRetryable` is informational.
 */
export class SwiftError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: SwiftErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, SwiftError.prototype);

    this.name = 'SwiftError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SwiftError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
