/**
 * In-process Blob service simulation.
 *
 * Answers the REST calls this package makes (Get Blob Properties, ranged Get
 * Blob, List Blobs) from blobs held in memory, through the same `HttpFetch`
 * seam the real transport uses. Every request is kept for inspection.
 */

import { Headers, Response } from 'undici';
import type { RequestInit } from 'undici';
import type { HttpFetch } from '../types/index.js';

/** Request seen by the simulation */
export interface SimulatedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
}

/** Forced service failure */
export interface SimulatedFailure {
  status: number;
  statusText: string;
  code: string;
  message: string;
}

/** Simulation options */
export interface InMemoryBlobServiceOptions {
  /** Origin answered by the simulation; any other host fails like a DNS error */
  accountUrl?: string;
  /** Maximum blobs per listing page */
  pageSize?: number;
}

interface StoredBlob {
  data: Uint8Array;
  lastModified: Date;
  etag: string;
  contentType: string;
}

const encoder = new TextEncoder();

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * In-memory Blob service
 *
 * @example
 * ```typescript
 * const service = new InMemoryBlobService({ accountUrl: 'https://myaccount.blob.core.windows.net' });
 * service.putBlob('data', 'a.csv', 'id,name\n1,x\n');
 *
 * const client = new StorageAccountClient({
 *   accountUrl: service.accountUrl,
 *   authProvider: new AnonymousAuthProvider(),
 *   httpFetch: service.fetch,
 * });
 * ```
 */
export class InMemoryBlobService {
  readonly accountUrl: string;
  readonly requests: SimulatedRequest[] = [];

  private readonly origin: string;
  private readonly pageSize: number;
  private readonly containers = new Map<string, Map<string, StoredBlob>>();
  private failure?: SimulatedFailure;
  private etagCounter = 0;

  constructor(options: InMemoryBlobServiceOptions = {}) {
    this.accountUrl = (options.accountUrl ?? 'https://myaccount.blob.core.windows.net').replace(/\/+$/, '');
    this.origin = new URL(this.accountUrl).origin;
    this.pageSize = options.pageSize ?? 5000;
  }

  /**
   * Create an empty container
   */
  createContainer(container: string): this {
    if (!this.containers.has(container)) {
      this.containers.set(container, new Map());
    }
    return this;
  }

  /**
   * Store a blob, creating its container when needed
   */
  putBlob(
    container: string,
    name: string,
    data: Uint8Array | string,
    options: { lastModified?: Date; contentType?: string } = {}
  ): this {
    this.createContainer(container);
    this.containers.get(container)?.set(name, {
      data: typeof data === 'string' ? encoder.encode(data) : data,
      lastModified: options.lastModified ?? new Date(Date.UTC(2024, 0, 15, 10, 30, 0)),
      etag: `"0x8DC${(++this.etagCounter).toString(16).padStart(12, '0').toUpperCase()}"`,
      contentType: options.contentType ?? 'application/octet-stream',
    });
    return this;
  }

  /**
   * Answer every following request with an error until cleared
   */
  failWith(failure: SimulatedFailure): this {
    this.failure = failure;
    return this;
  }

  /**
   * Reject every following request as unauthorized
   */
  denyAccess(): this {
    return this.failWith({
      status: 403,
      statusText: 'Server failed to authenticate the request.',
      code: 'AuthenticationFailed',
      message: 'Server failed to authenticate the request. Make sure the value of Authorization header is formed correctly including the signature.',
    });
  }

  clearFailure(): this {
    this.failure = undefined;
    return this;
  }

  /**
   * Number of requests seen, optionally for one method only
   */
  requestCount(method?: string): number {
    return method ? this.requests.filter((r) => r.method === method).length : this.requests.length;
  }

  /**
   * `HttpFetch` answering from the in-memory blobs
   */
  readonly fetch: HttpFetch = async (url: string, init?: RequestInit): Promise<Response> => {
    const method = (init?.method ?? 'GET').toUpperCase();
    const headers = new Headers(init?.headers);
    this.requests.push({ method, url, headers: Object.fromEntries(headers.entries()) });

    const target = new URL(url);
    if (target.origin !== this.origin) {
      throw new TypeError('fetch failed');
    }

    if (this.failure) {
      return this.errorResponse(method, this.failure.status, this.failure.statusText, this.failure.code, this.failure.message);
    }

    const [rawContainer = '', ...rest] = target.pathname.replace(/^\//, '').split('/');
    const containerName = decodeURIComponent(rawContainer);
    const container = this.containers.get(containerName);

    if (target.searchParams.get('restype') === 'container' && target.searchParams.get('comp') === 'list') {
      if (!container) {
        return this.containerNotFound(method);
      }
      return this.listBlobs(containerName, container, target.searchParams);
    }

    if (!container) {
      return this.containerNotFound(method);
    }
    const blobName = rest.map(decodeURIComponent).join('/');
    const blob = container.get(blobName);
    if (!blob) {
      return this.errorResponse(method, 404, 'The specified blob does not exist.', 'BlobNotFound', 'The specified blob does not exist.');
    }

    switch (method) {
      case 'HEAD':
        return new Response(null, { status: 200, statusText: 'OK', headers: this.blobHeaders(blob) });
      case 'GET':
        return this.getBlob(method, blob, headers.get('x-ms-range') ?? headers.get('range'));
      default:
        return this.errorResponse(method, 405, 'Method Not Allowed', 'UnsupportedHttpVerb', `The resource doesn't support ${method}.`);
    }
  };

  private blobHeaders(blob: StoredBlob): Record<string, string> {
    return {
      'Content-Length': String(blob.data.byteLength),
      'Last-Modified': blob.lastModified.toUTCString(),
      ETag: blob.etag,
      'Content-Type': blob.contentType,
      'x-ms-blob-type': 'BlockBlob',
    };
  }

  private getBlob(method: string, blob: StoredBlob, range: string | null): Response {
    if (!range) {
      return new Response(blob.data, { status: 200, statusText: 'OK', headers: this.blobHeaders(blob) });
    }

    const match = /^bytes=(\d+)-(\d*)$/.exec(range);
    const start = Number(match?.[1] ?? NaN);
    const length = blob.data.byteLength;
    if (!match || Number.isNaN(start) || start >= length) {
      return this.errorResponse(
        method,
        416,
        'The range specified is invalid for the current size of the resource.',
        'InvalidRange',
        'The range specified is invalid for the current size of the resource.'
      );
    }
    const end = match[2] ? Math.min(Number(match[2]), length - 1) : length - 1;
    const body = blob.data.slice(start, end + 1);

    return new Response(body, {
      status: 206,
      statusText: 'Partial Content',
      headers: {
        ...this.blobHeaders(blob),
        'Content-Length': String(body.byteLength),
        'Content-Range': `bytes ${start}-${end}/${length}`,
      },
    });
  }

  private listBlobs(containerName: string, container: Map<string, StoredBlob>, params: URLSearchParams): Response {
    const prefix = params.get('prefix') ?? '';
    const marker = params.get('marker') ?? '';
    const maxResults = Number(params.get('maxresults') ?? this.pageSize);
    const limit = Math.max(1, Math.min(maxResults, this.pageSize));

    const names = [...container.keys()].filter((name) => name.startsWith(prefix) && name >= marker).sort();
    const page = names.slice(0, limit);
    const nextMarker = names[limit] ?? '';

    const blobsXml = page
      .map((name) => {
        const blob = container.get(name);
        if (!blob) {
          return '';
        }
        return (
          `<Blob><Name>${escapeXml(name)}</Name><Properties>` +
          `<Last-Modified>${blob.lastModified.toUTCString()}</Last-Modified>` +
          `<Etag>${blob.etag}</Etag>` +
          `<Content-Length>${blob.data.byteLength}</Content-Length>` +
          `<Content-Type>${escapeXml(blob.contentType)}</Content-Type>` +
          `<BlobType>BlockBlob</BlobType></Properties></Blob>`
        );
      })
      .join('');

    const xml =
      '<?xml version="1.0" encoding="utf-8"?>' +
      `<EnumerationResults ServiceEndpoint="${escapeXml(this.accountUrl)}/" ContainerName="${escapeXml(containerName)}">` +
      `<Prefix>${escapeXml(prefix)}</Prefix>` +
      (marker ? `<Marker>${escapeXml(marker)}</Marker>` : '') +
      `<MaxResults>${limit}</MaxResults>` +
      `<Blobs>${blobsXml}</Blobs>` +
      `<NextMarker>${escapeXml(nextMarker)}</NextMarker>` +
      '</EnumerationResults>';

    return new Response(xml, {
      status: 200,
      statusText: 'OK',
      headers: { 'Content-Type': 'application/xml' },
    });
  }

  private containerNotFound(method: string): Response {
    return this.errorResponse(method, 404, 'The specified container does not exist.', 'ContainerNotFound', 'The specified container does not exist.');
  }

  private errorResponse(method: string, status: number, statusText: string, code: string, message: string): Response {
    const headers = { 'x-ms-error-code': code, 'Content-Type': 'application/xml' };
    if (method === 'HEAD') {
      return new Response(null, { status, statusText, headers });
    }
    const body =
      '<?xml version="1.0" encoding="utf-8"?>' +
      `<Error><Code>${escapeXml(code)}</Code><Message>${escapeXml(message)}\nRequestId:00000000-0000-0000-0000-000000000000</Message></Error>`;
    return new Response(body, { status, statusText, headers });
  }
}
