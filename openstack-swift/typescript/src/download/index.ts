/**
 * Download pipeline
 * @module openstack-swift-client/download
 */

export { DownloadedObject } from './downloaded-object.js';
