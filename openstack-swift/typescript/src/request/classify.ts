/**
 * Response status classification
 */

import { UnexpectedStatusCodeError } from '../errors/index.js';
import type { HeaderMap } from '../headers/index.js';
import { readStream } from '../transport/index.js';

/**
 * Largest response body kept on an {@link UnexpectedStatusCodeError}
 */
export const MAX_ERROR_BODY_BYTES = 64 * 1024;

export interface ClassifiableResponse {
  status: number;
  headers: HeaderMap;
  body: ReadableStream<Uint8Array> | null;
}

/**
 * Resolves when `response.status` is one of `expected`.
 *
 * Otherwise the response body (if any, up to {@link MAX_ERROR_BODY_BYTES}) is
 * read and attached to the thrown error for diagnostics.
 *
 * @throws {UnexpectedStatusCodeError}
 */
export async function checkStatus(
  response: ClassifiableResponse,
  expected: readonly number[]
): Promise<void> {
  if (expected.includes(response.status)) {
    return;
  }

  let responseBody: Uint8Array | undefined;
  if (response.body !== null && !response.body.locked) {
    const captured = await readStream(response.body, MAX_ERROR_BODY_BYTES);
    responseBody = captured.length > 0 ? captured : undefined;
  }

  throw new UnexpectedStatusCodeError({
    expectedStatusCodes: expected,
    status: response.status,
    headers: response.headers,
    responseBody,
  });
}
