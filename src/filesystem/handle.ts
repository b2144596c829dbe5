/**
 * Blob file handle.
 */

import type { BlobClient } from '../client/client.js';
import type { ReadOptions } from '../client/config.js';
import type { FileHandle, OpenFlags } from './types.js';

/** Values captured by the metadata probe at open */
export interface BlobFileHandleInit {
  path: string;
  flags: OpenFlags;
  length: number;
  lastModified: Date;
  blobClient: BlobClient;
  readOptions: ReadOptions;
}

/**
 * Handle to one open blob. `length` and `lastModified` are fixed at open; the
 * buffer window `[bufferStart, bufferEnd)` covers the bytes held in
 * `readBuffer`, of which `bufferAvailable` remain past `bufferIdx`.
 */
export class BlobFileHandle implements FileHandle {
  readonly path: string;
  readonly flags: OpenFlags;
  readonly length: number;
  readonly lastModified: Date;
  readonly blobClient: BlobClient;
  readonly readOptions: ReadOptions;
  /** Allocated only for handles opened for reading */
  readonly readBuffer?: Uint8Array;

  fileOffset = 0;
  bufferStart = 0;
  bufferEnd = 0;
  bufferIdx = 0;
  bufferAvailable = 0;

  constructor(init: BlobFileHandleInit) {
    this.path = init.path;
    this.flags = init.flags;
    this.length = init.length;
    this.lastModified = init.lastModified;
    this.blobClient = init.blobClient;
    this.readOptions = init.readOptions;
    if (init.flags.read) {
      this.readBuffer = new Uint8Array(init.readOptions.bufferSize);
    }
  }

  /** Drop buffered bytes; the window becomes empty */
  resetBuffer(): void {
    this.bufferStart = 0;
    this.bufferEnd = 0;
    this.bufferIdx = 0;
    this.bufferAvailable = 0;
  }

  close(): void {}
}
