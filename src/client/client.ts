/**
 * Blob Storage Client
 *
 * Account, container and blob clients over a shared request pipeline. This is
 * a thin adapter layer; the operations live in the management and download
 * executors.
 */

import { fetch } from 'undici';
import type { AuthProvider } from '../auth/index.js';
import type { HttpStatsSink, Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type {
  BlobProperties,
  ByteRange,
  DownloadOptions,
  HttpFetch,
  ListBlobsPage,
  ListBlobsRequest,
} from '../types/index.js';
import { BlobLister } from '../management/list.js';
import { PropertiesManager } from '../management/properties.js';
import { RangeDownloader } from '../download/range.js';
import { RequestPipeline } from './request.js';

/** Storage account client options */
export interface StorageAccountClientOptions {
  /** `https://<account>.<endpoint>` or a connection string's blob endpoint */
  accountUrl: string;
  authProvider: AuthProvider;
  httpFetch?: HttpFetch;
  /** Request statistics sink, when collection is enabled */
  httpStats?: HttpStatsSink;
  logger?: Logger;
}

/**
 * Authenticated client for one storage account
 *
 * @example
 * ```typescript
 * const client = new StorageAccountClient({
 *   accountUrl: 'https://myaccount.blob.core.windows.net',
 *   authProvider: new AnonymousAuthProvider(),
 * });
 *
 * const blob = client.getContainerClient('data').getBlobClient('2024/events.parquet');
 * const { contentLength } = await blob.getProperties();
 * ```
 */
export class StorageAccountClient {
  private readonly pipeline: RequestPipeline;

  constructor(options: StorageAccountClientOptions) {
    this.pipeline = new RequestPipeline({
      accountUrl: options.accountUrl,
      authProvider: options.authProvider,
      httpFetch: options.httpFetch ?? fetch,
      httpStats: options.httpStats,
      logger: options.logger ?? new NoopLogger(),
    });
  }

  /** Account URL without a trailing slash */
  get accountUrl(): string {
    return this.pipeline.accountUrl;
  }

  /** Authentication method in use */
  getAuthMethod(): string {
    return this.pipeline.getAuthMethod();
  }

  getContainerClient(container: string): ContainerClient {
    return new ContainerClient(this.pipeline, container);
  }
}

/**
 * Client for one container
 */
export class ContainerClient {
  private readonly lister: BlobLister;

  constructor(
    private readonly pipeline: RequestPipeline,
    readonly containerName: string
  ) {
    this.lister = new BlobLister(pipeline);
  }

  /**
   * List one page of blobs
   */
  async listBlobs(request: ListBlobsRequest = {}): Promise<ListBlobsPage> {
    return this.lister.list(this.containerName, request);
  }

  getBlobClient(blobName: string): BlobClient {
    return new BlobClient(this.pipeline, this.containerName, blobName);
  }
}

/**
 * Client for one blob
 */
export class BlobClient {
  private readonly properties: PropertiesManager;
  private readonly downloader: RangeDownloader;

  constructor(
    pipeline: RequestPipeline,
    readonly containerName: string,
    readonly blobName: string
  ) {
    this.properties = new PropertiesManager(pipeline);
    this.downloader = new RangeDownloader(pipeline);
  }

  /**
   * Get size, modification time, ETag and content type
   */
  async getProperties(): Promise<BlobProperties> {
    return this.properties.getProperties(this.containerName, this.blobName);
  }

  /**
   * Download exactly `range` into `target` at `targetOffset`
   */
  async downloadTo(
    target: Uint8Array,
    targetOffset: number,
    range: ByteRange,
    options: DownloadOptions
  ): Promise<void> {
    await this.downloader.downloadTo(this.containerName, this.blobName, target, targetOffset, range, options);
  }
}
