/**
 * Bulk deletion of objects and containers
 */

import { DEFAULT_MAX_DELETES_PER_REQUEST } from '../capabilities/index.js';
import type { Account, Container, SwiftObject } from '../entities/index.js';
import { isStatusCode } from '../errors/index.js';
import {
  EXPECTED_STATUS,
  encodeObjectName,
  executeForBody,
  validateTarget,
  withOptions,
  type RequestOptions,
} from '../request/index.js';
import { bulkErrorOf, parseBulkResponse } from './parse.js';

export interface BulkDeleteResult {
  numberDeleted: number;
  numberNotFound: number;
}

const encoder = new TextEncoder();

/**
 * Deletes `objects`, then `containers`.
 *
 * Uses the bulk middleware when the cluster offers it, in as many requests
 * as `max_deletes_per_request` demands. Otherwise every item is deleted on
 * its own; items that are already gone count as not found.
 *
 * @throws {ValidationError} Before anything is sent, for a malformed name
 * @throws {BulkError} If the server reports failed items
 */
export async function bulkDelete(
  account: Account,
  objects: readonly SwiftObject[],
  containers: readonly Container[],
  opts?: RequestOptions
): Promise<BulkDeleteResult> {
  if (objects.length === 0 && containers.length === 0) {
    return { numberDeleted: 0, numberNotFound: 0 };
  }
  for (const object of objects) {
    validateTarget(object.container.name, object.name);
  }
  for (const container of containers) {
    validateTarget(container.name);
  }

  const capabilities = await account.capabilities({ signal: opts?.signal });
  const result =
    capabilities.bulk_delete === undefined
      ? await deleteOneByOne(objects, containers, opts)
      : await deleteInChunks(
          account,
          [...objects.map(objectPath), ...containers.map(containerPath)],
          capabilities.bulk_delete.max_deletes_per_request ?? DEFAULT_MAX_DELETES_PER_REQUEST,
          opts
        );

  for (const object of objects) {
    object.invalidate();
  }
  for (const container of containers) {
    container.invalidate();
  }
  return result;
}

async function deleteInChunks(
  account: Account,
  paths: readonly string[],
  chunkSize: number,
  opts: RequestOptions | undefined
): Promise<BulkDeleteResult> {
  const result: BulkDeleteResult = { numberDeleted: 0, numberNotFound: 0 };

  for (let start = 0; start < paths.length; start += chunkSize) {
    const chunk = paths.slice(start, start + chunkSize);
    const response = await executeForBody(
      account,
      withOptions(
        {
          method: 'POST',
          query: { 'bulk-delete': 'true' },
          headers: { 'Content-Type': 'text/plain', Accept: 'application/json' },
          body: encoder.encode(chunk.join('\n')),
          expectStatus: EXPECTED_STATUS.account.bulkDelete,
        },
        opts
      )
    );

    const report = parseBulkResponse(response.body, response.headers.get('content-type') ?? '');
    const error = bulkErrorOf(report);
    if (error !== undefined) {
      throw error;
    }
    result.numberDeleted += report.numberDeleted;
    result.numberNotFound += report.numberNotFound;
  }

  return result;
}

async function deleteOneByOne(
  objects: readonly SwiftObject[],
  containers: readonly Container[],
  opts: RequestOptions | undefined
): Promise<BulkDeleteResult> {
  const result: BulkDeleteResult = { numberDeleted: 0, numberNotFound: 0 };

  const count = async (remove: () => Promise<void>): Promise<void> => {
    try {
      await remove();
      result.numberDeleted++;
    } catch (error) {
      if (!isStatusCode(error, 404)) {
        throw error;
      }
      result.numberNotFound++;
    }
  };

  for (const object of objects) {
    await count(() => object.delete(opts));
  }
  for (const container of containers) {
    await count(() => container.delete(opts));
  }
  return result;
}

function objectPath(object: SwiftObject): string {
  return `/${encodeURIComponent(object.container.name)}/${encodeObjectName(object.name)}`;
}

function containerPath(container: Container): string {
  return `/${encodeURIComponent(container.name)}`;
}
