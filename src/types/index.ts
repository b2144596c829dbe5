/**
 * Blob Storage Types
 *
 * Re-exports all type definitions.
 */

export type { BlobProperties, BlobItem, ByteRange } from './blob.js';
export type { HttpFetch, ListBlobsRequest, ListBlobsPage, DownloadOptions } from './request.js';
