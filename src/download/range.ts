/**
 * Ranged Download
 *
 * Downloads `[offset, offset + count)` of a blob into a caller-owned buffer,
 * split into chunk-size requests with bounded concurrency.
 */

import type { ByteRange, DownloadOptions } from '../types/index.js';
import type { RequestPipeline } from '../client/request.js';
import { TransportError } from '../errors/index.js';

/** Inclusive byte range of one request */
export interface ChunkRange {
  start: number;
  end: number;
}

/**
 * Split a range into chunk-size pieces
 */
export function calculateRanges(range: ByteRange, chunkSize: number): ChunkRange[] {
  const ranges: ChunkRange[] = [];
  const end = range.offset + range.count;

  for (let start = range.offset; start < end; start += chunkSize) {
    ranges.push({ start, end: Math.min(start + chunkSize, end) - 1 });
  }

  return ranges;
}

/**
 * Range downloader
 */
export class RangeDownloader {
  constructor(private readonly pipeline: RequestPipeline) {}

  /**
   * Download a range into `target` starting at `targetOffset`.
   *
   * Once a chunk fails no further chunk is started or written, and the call
   * settles only after every request in flight has finished.
   */
  async downloadTo(
    container: string,
    blobName: string,
    target: Uint8Array,
    targetOffset: number,
    range: ByteRange,
    options: DownloadOptions
  ): Promise<void> {
    const ranges = calculateRanges(range, Math.max(1, options.chunkSize));
    if (ranges.length === 0) {
      return;
    }

    let next = 0;
    const failures: unknown[] = [];
    const worker = async (): Promise<void> => {
      while (failures.length === 0 && next < ranges.length) {
        const chunk = ranges[next++];
        if (!chunk) {
          return;
        }
        let data: Uint8Array;
        try {
          data = await this.downloadChunk(container, blobName, chunk);
        } catch (error) {
          failures.push(error);
          return;
        }
        if (failures.length > 0) {
          return;
        }
        target.set(data, targetOffset + (chunk.start - range.offset));
      }
    };

    const workers = Math.min(Math.max(1, options.concurrency), ranges.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private async downloadChunk(container: string, blobName: string, chunk: ChunkRange): Promise<Uint8Array> {
    const response = await this.pipeline.send({
      method: 'GET',
      url: this.pipeline.blobUrl(container, blobName),
      headers: { 'x-ms-range': `bytes=${chunk.start}-${chunk.end}` },
      errorContext: { container, blobName },
    });

    const expected = chunk.end - chunk.start + 1;
    if (response.body.byteLength !== expected) {
      throw new TransportError({
        message: `Ranged download returned ${response.body.byteLength} bytes, expected ${expected}`,
        statusCode: response.status,
        container,
        blobName,
      });
    }
    return response.body;
  }
}
