/**
 * Request execution and status classification
 */

export { MAX_ERROR_BODY_BYTES, checkStatus, type ClassifiableResponse } from './classify.js';
export {
  buildQueryString,
  buildUrl,
  encodeObjectName,
  executeForBody,
  executeForHeaders,
  executeRequest,
  validateTarget,
  withOptions,
  type RequestContext,
  type RequestOptions,
  type SwiftRequest,
  type SwiftResponse,
} from './request.js';
export { DEFAULT_STATUS_BY_METHOD, EXPECTED_STATUS, type HttpMethod } from './status-codes.js';
