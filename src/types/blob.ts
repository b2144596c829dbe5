/**
 * Blob Storage Core Types
 */

/** Blob properties captured by a metadata probe */
export interface BlobProperties {
  /** Size in bytes */
  contentLength: number;
  /** Last modified timestamp */
  lastModified: Date;
  /** ETag for concurrency control */
  etag: string;
  /** MIME content type */
  contentType: string;
}

/** Blob item returned by a listing */
export interface BlobItem {
  /** Blob name (path within the container) */
  name: string;
  /** Size in bytes */
  contentLength: number;
  /** Last modified timestamp, when the listing reported one */
  lastModified?: Date;
  etag?: string;
}

/** Byte range `[offset, offset + count)` */
export interface ByteRange {
  offset: number;
  count: number;
}
