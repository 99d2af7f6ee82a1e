/**
 * Archive extraction on upload
 */

import type { Account } from '../entities/index.js';
import { NotSupportedError } from '../errors/index.js';
import { EXPECTED_STATUS, executeForBody, withOptions, type RequestOptions } from '../request/index.js';
import { prepareBody, type UploadSource } from '../upload/index.js';
import { bulkErrorOf, parseBulkResponse } from './parse.js';

export type ArchiveFormat = 'tar' | 'tar.gz' | 'tar.bz2';

/**
 * Uploads an archive that the server unpacks into objects.
 *
 * With an empty `uploadPath` every top-level directory of the archive
 * becomes a container; "container" or "container/prefix" put all entries
 * into that container, below the prefix.
 *
 * @returns The number of files created
 * @throws {NotSupportedError} If the cluster does not offer bulk upload
 * @throws {BulkError} If the server reports failed entries
 */
export async function bulkUpload(
  account: Account,
  uploadPath: string,
  format: ArchiveFormat,
  source: UploadSource,
  opts?: RequestOptions
): Promise<number> {
  const capabilities = await account.capabilities({ signal: opts?.signal });
  if (capabilities.bulk_upload === undefined) {
    throw new NotSupportedError('bulk_upload');
  }

  const trimmed = uploadPath.replace(/^\/+/, '');
  const slash = trimmed.indexOf('/');
  const containerName = trimmed === '' ? undefined : slash < 0 ? trimmed : trimmed.slice(0, slash);
  const objectName = slash < 0 || slash === trimmed.length - 1 ? undefined : trimmed.slice(slash + 1);

  const response = await executeForBody(
    account,
    withOptions(
      {
        method: 'PUT',
        containerName,
        objectName,
        query: { 'extract-archive': format },
        headers: { Accept: 'application/json' },
        body: prepareBody(source).body,
        expectStatus: EXPECTED_STATUS.account.bulkUpload,
      },
      opts
    )
  );

  const report = parseBulkResponse(response.body, response.headers.get('content-type') ?? '');
  const error = bulkErrorOf(report);
  if (error !== undefined) {
    throw error;
  }
  return report.numberFilesCreated;
}
