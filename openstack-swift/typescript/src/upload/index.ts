/**
 * Upload pipeline
 * @module openstack-swift-client/upload
 */

export { Md5Tap, md5Hex } from './checksum.js';
export { prepareBody, sourceChunks, type PreparedBody, type UploadSource } from './source.js';
export { uploadObject } from './upload.js';
export { UploadPipe, uploadWithWriter, type UploadWriter, type WriterCallback } from './writer.js';
