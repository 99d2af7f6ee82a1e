/**
 * Object upload with MD5 verification
 */

import type { SwiftObject } from '../entities/index.js';
import { ChecksumMismatchError } from '../errors/index.js';
import { ObjectHeaders } from '../headers/index.js';
import { EXPECTED_STATUS, executeForHeaders, withOptions, type RequestOptions } from '../request/index.js';
import { prepareBody, type UploadSource } from './source.js';

/**
 * PUTs `source` to the object and checks the returned ETag against the
 * MD5 of what was sent.
 *
 * Manifest uploads are not checked: their ETag is derived from the
 * segments, not from the request body.
 *
 * @throws {ChecksumMismatchError}
 */
export async function uploadObject(
  object: SwiftObject,
  source: UploadSource | undefined,
  headers: ObjectHeaders | undefined,
  opts: RequestOptions | undefined
): Promise<void> {
  const prepared = prepareBody(source);
  const requestHeaders = headers?.toRequestHeaders() ?? {};

  const responseHeaders = await executeForHeaders(
    object.account,
    withOptions(
      {
        method: 'PUT',
        containerName: object.container.name,
        objectName: object.name,
        headers: requestHeaders,
        body: prepared.body,
        expectStatus: EXPECTED_STATUS.object.upload,
      },
      opts
    )
  );
  object.invalidate();

  if (isManifestUpload(requestHeaders, opts)) {
    return;
  }

  const etag = new ObjectHeaders(responseHeaders).etag.get();
  const expected = prepared.digest();
  if (etag !== '' && etag.toLowerCase() !== expected) {
    throw new ChecksumMismatchError(expected, etag);
  }
}

function isManifestUpload(requestHeaders: Record<string, string>, opts: RequestOptions | undefined): boolean {
  const headers = { ...requestHeaders, ...opts?.headers };
  const hasDynamicManifest = Object.entries(headers).some(
    ([name, value]) => name.toLowerCase() === 'x-object-manifest' && value !== ''
  );
  return hasDynamicManifest || opts?.query?.['multipart-manifest'] === 'put';
}
