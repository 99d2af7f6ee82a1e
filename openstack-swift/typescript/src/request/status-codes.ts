/**
 * Expected status codes per operation
 *
 * Swift is not consistent about which 2xx code an operation answers with, so
 * every operation looks its accepted codes up here instead of hard-coding
 * them at the call site.
 */

export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE' | 'COPY';

/**
 * Fallback when neither the caller nor the operation names any codes
 */
export const DEFAULT_STATUS_BY_METHOD: Readonly<Record<HttpMethod, readonly number[]>> = {
  GET: [200],
  HEAD: [200, 204],
  PUT: [201, 202],
  POST: [202, 204],
  DELETE: [204],
  COPY: [201],
};

export const EXPECTED_STATUS = {
  account: {
    headers: [200, 204],
    update: [204],
    list: [200, 204],
    capabilities: [200],
    bulkDelete: [200],
    bulkUpload: [200, 201],
  },
  container: {
    headers: [200, 204],
    create: [201, 202],
    update: [204],
    delete: [204],
    list: [200, 204],
  },
  object: {
    headers: [200],
    download: [200],
    rangedDownload: [200, 206],
    upload: [201],
    update: [202],
    delete: [204],
    copy: [201],
    manifestGet: [200],
    manifestDelete: [200],
  },
} as const satisfies Record<string, Record<string, readonly number[]>>;
