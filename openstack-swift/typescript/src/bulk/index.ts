/**
 * Bulk delete and bulk upload
 * @module openstack-swift-client/bulk
 */

export { bulkDelete, type BulkDeleteResult } from './bulk-delete.js';
export { bulkUpload, type ArchiveFormat } from './bulk-upload.js';
export { bulkErrorOf, parseBulkResponse, type BulkReport } from './parse.js';
