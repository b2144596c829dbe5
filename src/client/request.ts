/**
 * Blob Storage Request Pipeline
 *
 * Shared by every operation: versioning and request-id headers,
 * authentication, statistics and error mapping.
 */

import type { Headers } from 'undici';
import { v4 as uuidv4 } from 'uuid';
import type { AuthProvider } from '../auth/index.js';
import type { ResponseErrorContext } from '../errors/index.js';
import { TransportError, createErrorFromResponse } from '../errors/index.js';
import type { HttpStatsSink, Logger } from '../observability/index.js';
import type { HttpFetch } from '../types/index.js';

/** Storage service REST API version */
export const API_VERSION = '2023-11-03';

/** Outgoing storage request */
export interface StorageRequest {
  method: 'GET' | 'HEAD';
  url: string;
  headers?: Record<string, string>;
  /** Attached to errors raised for this request */
  errorContext?: ResponseErrorContext;
}

/** Storage response with its body read */
export interface StorageResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
}

/** Pipeline settings */
export interface RequestPipelineOptions {
  accountUrl: string;
  authProvider: AuthProvider;
  httpFetch: HttpFetch;
  httpStats?: HttpStatsSink;
  logger: Logger;
}

/**
 * Encode a blob name for a URL path, keeping `/` separators.
 */
export function encodeBlobName(blobName: string): string {
  return blobName.split('/').map(encodeURIComponent).join('/');
}

/**
 * Request pipeline bound to one storage account
 */
export class RequestPipeline {
  readonly accountUrl: string;
  private readonly authProvider: AuthProvider;
  private readonly httpFetch: HttpFetch;
  private readonly httpStats?: HttpStatsSink;
  private readonly logger: Logger;

  constructor(options: RequestPipelineOptions) {
    this.accountUrl = options.accountUrl.replace(/\/+$/, '');
    this.authProvider = options.authProvider;
    this.httpFetch = options.httpFetch;
    this.httpStats = options.httpStats;
    this.logger = options.logger;
  }

  /** URL of a container */
  containerUrl(container: string): string {
    return `${this.accountUrl}/${encodeURIComponent(container)}`;
  }

  /** URL of a blob */
  blobUrl(container: string, blobName: string): string {
    return `${this.containerUrl(container)}/${encodeBlobName(blobName)}`;
  }

  /** Authentication method in use */
  getAuthMethod(): string {
    return this.authProvider.getMethod();
  }

  /**
   * Send a request and read its body.
   *
   * @throws {StorageError} For non-2xx responses and network failures
   */
  async send(request: StorageRequest): Promise<StorageResponse> {
    const headers: Record<string, string> = {
      'x-ms-version': API_VERSION,
      'x-ms-client-request-id': uuidv4(),
      ...request.headers,
    };

    const authorized = await this.authProvider.authorize({
      method: request.method,
      url: request.url,
      headers,
    });

    this.logger.trace('Sending storage request', {
      method: request.method,
      url: request.url,
      clientRequestId: headers['x-ms-client-request-id'],
    });

    let status: number;
    let statusText: string;
    let responseHeaders: Headers;
    let body: Uint8Array;
    try {
      const response = await this.httpFetch(authorized.url, {
        method: request.method,
        headers: authorized.headers,
      });
      status = response.status;
      statusText = response.statusText;
      responseHeaders = response.headers;
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new TransportError({
        message: error instanceof Error ? error.message : String(error),
        cause: error instanceof Error ? error : undefined,
        retryable: true,
        ...request.errorContext,
      });
    }

    this.httpStats?.recordRequest(request.method, body.byteLength, 0);

    if (status < 200 || status >= 300) {
      throw createErrorFromResponse(
        status,
        statusText,
        new TextDecoder().decode(body),
        Object.fromEntries(responseHeaders.entries()),
        request.errorContext
      );
    }

    return { status, headers: responseHeaders, body };
  }
}
