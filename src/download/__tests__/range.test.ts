import { describe, it, expect } from 'vitest';
import { calculateRanges } from '../range.js';
import { StorageAccountClient } from '../../client/client.js';
import { AnonymousAuthProvider } from '../../auth/index.js';
import { InMemoryBlobService } from '../../simulation/index.js';
import type { HttpFetch } from '../../types/index.js';
import { TransportError } from '../../errors/index.js';

function bytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i % 251);
}

function createBlobClient(httpFetch: HttpFetch, service: InMemoryBlobService) {
  return new StorageAccountClient({
    accountUrl: service.accountUrl,
    authProvider: new AnonymousAuthProvider(),
    httpFetch,
  })
    .getContainerClient('data')
    .getBlobClient('blob.bin');
}

describe('calculateRanges', () => {
  it('should split a range into inclusive chunks', () => {
    expect(calculateRanges({ offset: 10, count: 25 }, 10)).toEqual([
      { start: 10, end: 19 },
      { start: 20, end: 29 },
      { start: 30, end: 34 },
    ]);
  });

  it('should return no chunks for an empty range', () => {
    expect(calculateRanges({ offset: 10, count: 0 }, 10)).toEqual([]);
  });
});

describe('BlobClient.downloadTo', () => {
  it('should assemble chunks at the target offset', async () => {
    const data = bytes(100);
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', data);
    const blob = createBlobClient(service.fetch, service);
    const target = new Uint8Array(40);

    await blob.downloadTo(target, 5, { offset: 20, count: 35 }, { concurrency: 3, chunkSize: 8 });

    expect(Array.from(target.subarray(5))).toEqual(Array.from(data.subarray(20, 55)));
    expect(Array.from(target.subarray(0, 5))).toEqual([0, 0, 0, 0, 0]);
    expect(service.requestCount('GET')).toBe(5);
    expect(service.requests.map((r) => r.headers['x-ms-range']).sort()).toEqual([
      'bytes=20-27',
      'bytes=28-35',
      'bytes=36-43',
      'bytes=44-51',
      'bytes=52-54',
    ]);
  });

  it('should keep at most concurrency requests in flight', async () => {
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', bytes(64));
    let inFlight = 0;
    let peak = 0;
    const slowFetch: HttpFetch = async (url, init) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      try {
        return await service.fetch(url, init);
      } finally {
        inFlight--;
      }
    };
    const blob = createBlobClient(slowFetch, service);

    await blob.downloadTo(new Uint8Array(64), 0, { offset: 0, count: 64 }, { concurrency: 2, chunkSize: 8 });

    expect(peak).toBe(2);
    expect(service.requestCount('GET')).toBe(8);
  });

  it('should not send anything for an empty range', async () => {
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', bytes(10));

    await createBlobClient(service.fetch, service).downloadTo(new Uint8Array(0), 0, { offset: 3, count: 0 }, {
      concurrency: 5,
      chunkSize: 4,
    });

    expect(service.requestCount()).toBe(0);
  });

  it('should fail when the service returns fewer bytes than asked', async () => {
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', bytes(10));

    const error = await createBlobClient(service.fetch, service)
      .downloadTo(new Uint8Array(20), 0, { offset: 5, count: 10 }, { concurrency: 1, chunkSize: 20 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Ranged download returned 5 bytes, expected 10');
    }
  });
});

describe('BlobClient.getProperties', () => {
  it('should read size, modification time, etag and content type', async () => {
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', bytes(12), {
      lastModified: new Date(Date.UTC(2023, 5, 1, 8, 0, 0)),
      contentType: 'application/x-parquet',
    });

    const properties = await createBlobClient(service.fetch, service).getProperties();

    expect(properties.contentLength).toBe(12);
    expect(properties.lastModified).toEqual(new Date(Date.UTC(2023, 5, 1, 8, 0, 0)));
    expect(properties.contentType).toBe('application/x-parquet');
    expect(properties.etag).toBe('"0x8DC000000000001"');
    expect(service.requests[0]?.method).toBe('HEAD');
    expect(service.requests[0]?.headers['x-ms-version']).toBe('2023-11-03');
  });
});
