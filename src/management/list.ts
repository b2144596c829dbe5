/**
 * List Blobs Operation
 *
 * List blobs with pagination and prefix filtering.
 */

import type { BlobItem, ListBlobsPage, ListBlobsRequest } from '../types/index.js';
import type { RequestPipeline } from '../client/request.js';
import { ValidationError } from '../errors/index.js';

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/** Decode XML character and entity references */
export function decodeXmlText(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return XML_ENTITIES[entity] ?? match;
  });
}

/** Extract value from XML element */
function extractXmlValue(xml: string, tagName: string): string | undefined {
  const regex = new RegExp(`<${tagName}>([^<]*)</${tagName}>`);
  const match = xml.match(regex);
  return match?.[1] ? decodeXmlText(match[1]) : undefined;
}

/** Parse a single blob from XML */
function parseBlobXml(xml: string): BlobItem | undefined {
  const nameMatch = xml.match(/<Name(?:\s+Encoded="(true|false)")?>([^<]*)<\/Name>/);
  const rawName = nameMatch?.[2];
  if (!rawName) return undefined;

  const decoded = decodeXmlText(rawName);
  const name = nameMatch?.[1] === 'true' ? decodeURIComponent(decoded) : decoded;

  const propsXml = xml.match(/<Properties>([\s\S]*?)<\/Properties>/)?.[1] ?? '';
  const lastModified = extractXmlValue(propsXml, 'Last-Modified');

  return {
    name,
    contentLength: parseInt(extractXmlValue(propsXml, 'Content-Length') ?? '0', 10),
    lastModified: lastModified ? new Date(lastModified) : undefined,
    etag: extractXmlValue(propsXml, 'Etag'),
  };
}

/**
 * Parse a List Blobs response body. An empty `NextMarker` ends the listing.
 */
export function parseListBlobsXml(xml: string): ListBlobsPage {
  const blobs: BlobItem[] = [];

  const blobRegex = /<Blob>([\s\S]*?)<\/Blob>/g;
  let blobMatch: RegExpExecArray | null;
  while ((blobMatch = blobRegex.exec(xml)) !== null) {
    const blob = parseBlobXml(blobMatch[1] ?? '');
    if (blob) {
      blobs.push(blob);
    }
  }

  return { blobs, continuationToken: extractXmlValue(xml, 'NextMarker') };
}

/**
 * List blobs executor
 */
export class BlobLister {
  constructor(private readonly pipeline: RequestPipeline) {}

  /**
   * List one page of blobs in a container
   */
  async list(container: string, request: ListBlobsRequest = {}): Promise<ListBlobsPage> {
    if (!container) {
      throw new ValidationError({
        message: 'Container name is required',
        field: 'container',
      });
    }

    // Build query parameters
    const params = new URLSearchParams();
    params.set('restype', 'container');
    params.set('comp', 'list');

    if (request.prefix) {
      params.set('prefix', request.prefix);
    }
    if (request.continuationToken) {
      params.set('marker', request.continuationToken);
    }
    if (request.maxResults) {
      params.set('maxresults', String(request.maxResults));
    }

    const response = await this.pipeline.send({
      method: 'GET',
      url: `${this.pipeline.containerUrl(container)}?${params.toString()}`,
      errorContext: { container },
    });

    return parseListBlobsXml(new TextDecoder().decode(response.body));
  }
}
