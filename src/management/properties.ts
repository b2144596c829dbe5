/**
 * Blob Properties Operation
 */

import type { Headers } from 'undici';
import type { BlobProperties } from '../types/index.js';
import type { RequestPipeline } from '../client/request.js';
import { TransportError, ValidationError } from '../errors/index.js';

/** Parse blob properties from response headers */
export function parseProperties(headers: Headers): BlobProperties {
  const lastModified = headers.get('Last-Modified');
  return {
    contentLength: parseInt(headers.get('Content-Length') ?? '0', 10),
    lastModified: lastModified ? new Date(lastModified) : new Date(0),
    etag: headers.get('ETag') ?? '',
    contentType: headers.get('Content-Type') ?? 'application/octet-stream',
  };
}

/**
 * Properties manager
 */
export class PropertiesManager {
  constructor(private readonly pipeline: RequestPipeline) {}

  /**
   * Get blob properties (HEAD)
   */
  async getProperties(container: string, blobName: string): Promise<BlobProperties> {
    if (!blobName) {
      throw new ValidationError({
        message: 'Blob name is required',
        field: 'blobName',
      });
    }

    const response = await this.pipeline.send({
      method: 'HEAD',
      url: this.pipeline.blobUrl(container, blobName),
      errorContext: { container, blobName },
    });

    const properties = parseProperties(response.headers);
    if (Number.isNaN(properties.contentLength)) {
      throw new TransportError({
        message: 'Response is missing a valid Content-Length',
        statusCode: response.status,
        container,
        blobName,
      });
    }
    return properties;
  }
}
