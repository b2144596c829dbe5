/**
 * Blob Storage Request and Response Types
 */

import type { RequestInit, Response } from 'undici';
import type { BlobItem } from './blob.js';

/**
 * Fetch function used for every HTTP call. Defaults to undici's `fetch`; tests
 * inject an in-process stand-in.
 */
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

/** List blobs request */
export interface ListBlobsRequest {
  /** Prefix filter */
  prefix?: string;
  /** Continuation token for pagination */
  continuationToken?: string;
  /** Maximum results per page */
  maxResults?: number;
}

/** One page of a blob listing */
export interface ListBlobsPage {
  blobs: BlobItem[];
  /** Marker for the next page; absent on the last page */
  continuationToken?: string;
}

/** Ranged download options */
export interface DownloadOptions {
  /** Maximum requests in flight */
  concurrency: number;
  /** Size of each request */
  chunkSize: number;
}
