/**
 * Specific error categories for the OpenStack Swift client
 * @module openstack-swift-client/errors/categories
 */

import { STATUS_CODES } from 'node:http';
import type { HeaderMap } from '../headers/header-map.js';
import { SwiftError, type SwiftErrorParams } from './error.js';

/**
 * Returns the reason phrase for an HTTP status code, or '' if unknown.
 */
export function statusText(status: number): string {
  return STATUS_CODES[status] ?? '';
}

/**
 * Configuration errors
 */
export class ConfigError extends SwiftError {
  constructor(params: Omit<SwiftErrorParams, 'type' | 'isRetryable'>) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static invalidConfig(issues: string[]): ConfigError {
    return new ConfigError({
      message: `Invalid configuration: ${issues.join(', ')}`,
      code: 'INVALID_CONFIG',
      details: { issues },
    });
  }

  static invalidInteger(name: string, value: string): ConfigError {
    return new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { name, value },
    });
  }
}

/**
 * Local validation errors. These are raised before any request is sent.
 */
export class ValidationError extends SwiftError {
  constructor(params: Omit<SwiftErrorParams, 'type' | 'isRetryable'>) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  /**
   * An object name was given without a container name
   */
  static noContainerName(): ValidationError {
    return new ValidationError({
      message: 'missing container name',
      code: 'NO_CONTAINER_NAME',
    });
  }

  /**
   * The container name contains a slash
   */
  static malformedContainerName(containerName: string): ValidationError {
    return new ValidationError({
      message: 'container name may not contain slashes',
      code: 'MALFORMED_CONTAINER_NAME',
      details: { containerName },
    });
  }

  static emptyObjectName(containerName: string): ValidationError {
    return new ValidationError({
      message: 'object name may not be empty',
      code: 'EMPTY_OBJECT_NAME',
      details: { containerName },
    });
  }

  static invalidArgument(name: string, message: string): ValidationError {
    return new ValidationError({
      message: `${name}: ${message}`,
      code: 'INVALID_ARGUMENT',
      details: { argument: name },
    });
  }
}

/**
 * Parameters for an UnexpectedStatusCodeError
 */
export interface UnexpectedStatusCodeErrorParams {
  readonly expectedStatusCodes: readonly number[];
  readonly status: number;
  readonly headers: HeaderMap;
  readonly responseBody?: Uint8Array;
}

/**
 * Raised when a response does not carry one of the expected status codes.
 *
 * Use {@link isStatusCode} to test for a specific status.
 */
export class UnexpectedStatusCodeError extends SwiftError {
  readonly expectedStatusCodes: readonly number[];
  readonly headers: HeaderMap;
  readonly responseBody?: Uint8Array;
  declare readonly status: number;

  constructor(params: UnexpectedStatusCodeErrorParams) {
    super({
      type: 'unexpected_status',
      message: UnexpectedStatusCodeError.formatMessage(params),
      status: params.status,
      code: 'UNEXPECTED_STATUS',
      isRetryable: params.status >= 500 || params.status === 429,
    });
    this.name = 'UnexpectedStatusCodeError';
    Object.setPrototypeOf(this, UnexpectedStatusCodeError.prototype);
    this.expectedStatusCodes = params.expectedStatusCodes;
    this.headers = params.headers;
    this.responseBody = params.responseBody;
  }

  /**
   * The captured response body decoded as UTF-8 ('' when none was captured)
   */
  get responseText(): string {
    return this.responseBody ? new TextDecoder().decode(this.responseBody) : '';
  }

  private static formatMessage(params: UnexpectedStatusCodeErrorParams): string {
    let message = `expected ${params.expectedStatusCodes.join('/')} response, got ${params.status} instead`;
    if (params.responseBody && params.responseBody.length > 0) {
      message += `: ${new TextDecoder().decode(params.responseBody)}`;
    }
    return message;
  }
}

/**
 * Raised when a successful response contains a header that cannot be decoded.
 */
export class MalformedHeaderError extends SwiftError {
  readonly key: string;
  readonly parseError: string;

  constructor(key: string, parseError: string) {
    super({
      type: 'malformed_header',
      message: `Bad header ${key}: ${parseError}`,
      code: 'MALFORMED_HEADER',
      isRetryable: false,
      details: { key },
    });
    this.name = 'MalformedHeaderError';
    Object.setPrototypeOf(this, MalformedHeaderError.prototype);
    this.key = key;
    this.parseError = parseError;
  }
}

/**
 * Raised when a successful response body (a listing, a bulk report, a
 * manifest, the capabilities document) cannot be decoded.
 */
export class MalformedResponseError extends SwiftError {
  constructor(what: string, reason: string) {
    super({
      type: 'malformed_response',
      message: `Malformed ${what}: ${reason}`,
      code: 'MALFORMED_RESPONSE',
      isRetryable: false,
      details: { what },
    });
    this.name = 'MalformedResponseError';
    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

/**
 * Raised by uploads when the ETag returned by the server does not match the
 * MD5 digest of the bytes that were sent.
 */
export class ChecksumMismatchError extends SwiftError {
  readonly expectedEtag: string;
  readonly actualEtag: string;

  constructor(expectedEtag: string, actualEtag: string) {
    super({
      type: 'integrity_error',
      message: 'Etag on uploaded object does not match MD5 checksum of uploaded data',
      code: 'CHECKSUM_MISMATCH',
      isRetryable: true,
      details: { expectedEtag, actualEtag },
    });
    this.name = 'ChecksumMismatchError';
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
    this.expectedEtag = expectedEtag;
    this.actualEtag = actualEtag;
  }
}

/**
 * Failure of a single object inside a bulk operation. Never thrown on its
 * own, only carried by {@link BulkError}.
 */
export class BulkObjectError extends SwiftError {
  readonly containerName: string;
  readonly objectName: string;
  declare readonly status: number;

  constructor(containerName: string, objectName: string, status: number) {
    super({
      type: 'bulk_object_error',
      message: `${containerName}/${objectName}: ${status} ${statusText(status)}`,
      status,
      isRetryable: false,
    });
    this.name = 'BulkObjectError';
    Object.setPrototypeOf(this, BulkObjectError.prototype);
    this.containerName = containerName;
    this.objectName = objectName;
  }
}

/**
 * Raised by bulk operations when some (or all) items failed, or when the
 * request as a whole was rejected after being accepted by the server.
 *
 * The message stays on one line and only counts the per-object errors;
 * inspect {@link BulkError.objectErrors} for the detail.
 */
export class BulkError extends SwiftError {
  /**
   * Overall status code reported in the response body
   */
  readonly statusCode: number;

  /**
   * Error that concerns the request as a whole, e.g. an unreadable archive.
   * Empty when there was none.
   */
  readonly archiveError: string;

  readonly objectErrors: readonly BulkObjectError[];

  constructor(statusCode: number, archiveError: string, objectErrors: readonly BulkObjectError[]) {
    let message = `${statusCode} ${statusText(statusCode)}`;
    if (archiveError !== '') {
      message += `: ${archiveError}`;
    }
    if (objectErrors.length > 0) {
      message += ` (+${objectErrors.length} object errors)`;
    }

    super({
      type: 'bulk_error',
      message,
      status: statusCode,
      code: 'BULK_OPERATION_FAILED',
      isRetryable: false,
      details: { archiveError, objectErrorCount: objectErrors.length },
    });
    this.name = 'BulkError';
    Object.setPrototypeOf(this, BulkError.prototype);
    this.statusCode = statusCode;
    this.archiveError = archiveError;
    this.objectErrors = objectErrors;
  }
}

/**
 * Raised when the server does not offer the requested feature.
 */
export class NotSupportedError extends SwiftError {
  constructor(feature: string) {
    super({
      type: 'not_supported',
      message: `operation not supported by this Swift server: ${feature}`,
      code: 'NOT_SUPPORTED',
      isRetryable: false,
      details: { feature },
    });
    this.name = 'NotSupportedError';
    Object.setPrototypeOf(this, NotSupportedError.prototype);
  }
}

/**
 * Raised when the library is used in a way its contract does not allow.
 */
export class UsageError extends SwiftError {
  constructor(params: Omit<SwiftErrorParams, 'type' | 'isRetryable'>) {
    super({
      ...params,
      type: 'usage_error',
      isRetryable: false,
    });
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }

  /**
   * A second projection was requested from the same download
   */
  static downloadAlreadyConsumed(objectName: string): UsageError {
    return new UsageError({
      message: `download of ${objectName} was already consumed`,
      code: 'DOWNLOAD_ALREADY_CONSUMED',
      details: { objectName },
    });
  }

  static notLargeObject(objectName: string): UsageError {
    return new UsageError({
      message: `${objectName} is not a large object`,
      code: 'NOT_LARGE_OBJECT',
      details: { objectName },
    });
  }

  static segmentInvalid(objectName: string, reason: string): UsageError {
    return new UsageError({
      message: `invalid segment ${objectName}: ${reason}`,
      code: 'SEGMENT_INVALID',
      details: { objectName },
    });
  }

  static writerFinishedLate(objectName: string): UsageError {
    return new UsageError({
      message: `request for ${objectName} completed before the writer callback finished`,
      code: 'WRITER_NOT_FINISHED',
      details: { objectName },
    });
  }
}

/**
 * Transport-level failures: connection errors, timeouts, aborted requests
 */
export class NetworkError extends SwiftError {
  constructor(params: Omit<SwiftErrorParams, 'type' | 'isRetryable'> & { isRetryable?: boolean }) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static connectionFailed(message?: string): NetworkError {
    return new NetworkError({
      message: message ?? 'Failed to establish connection to Swift',
      code: 'CONNECTION_FAILED',
    });
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'REQUEST_TIMEOUT',
      details: { timeoutMs },
    });
  }

  static aborted(): NetworkError {
    return new NetworkError({
      message: 'Request was aborted',
      code: 'REQUEST_ABORTED',
      isRetryable: false,
    });
  }
}
