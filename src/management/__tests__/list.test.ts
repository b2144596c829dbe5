import { describe, it, expect } from 'vitest';
import { decodeXmlText, parseListBlobsXml } from '../list.js';
import { StorageAccountClient } from '../../client/client.js';
import { AnonymousAuthProvider } from '../../auth/index.js';
import { InMemoryBlobService } from '../../simulation/index.js';
import { ObjectNotFoundError, ValidationError } from '../../errors/index.js';

describe('parseListBlobsXml', () => {
  it('should parse blobs and the next marker', () => {
    const xml =
      '<?xml version="1.0" encoding="utf-8"?><EnumerationResults ContainerName="data">' +
      '<Blobs>' +
      '<Blob><Name>logs/a&amp;b.csv</Name><Properties><Last-Modified>Mon, 15 Jan 2024 10:30:00 GMT</Last-Modified>' +
      '<Etag>0x1</Etag><Content-Length>42</Content-Length></Properties></Blob>' +
      '<Blob><Name Encoded="true">logs%2Fa%20b.csv</Name><Properties><Content-Length>7</Content-Length></Properties></Blob>' +
      '</Blobs><NextMarker>2!72!token</NextMarker></EnumerationResults>';

    const page = parseListBlobsXml(xml);

    expect(page.blobs).toEqual([
      {
        name: 'logs/a&b.csv',
        contentLength: 42,
        lastModified: new Date(Date.UTC(2024, 0, 15, 10, 30, 0)),
        etag: '0x1',
      },
      { name: 'logs/a b.csv', contentLength: 7, lastModified: undefined, etag: undefined },
    ]);
    expect(page.continuationToken).toBe('2!72!token');
  });

  it('should end the listing on an empty marker', () => {
    const page = parseListBlobsXml('<EnumerationResults><Blobs /><NextMarker /></EnumerationResults>');

    expect(page).toEqual({ blobs: [], continuationToken: undefined });
  });
});

describe('decodeXmlText', () => {
  it('should decode entities and character references', () => {
    expect(decodeXmlText('a&lt;b&gt;&#65;&#x42;&quot;&apos;&unknown;')).toBe('a<b>AB"\'&unknown;');
  });
});

describe('ContainerClient.listBlobs', () => {
  function createClient(service: InMemoryBlobService): StorageAccountClient {
    return new StorageAccountClient({
      accountUrl: service.accountUrl,
      authProvider: new AnonymousAuthProvider(),
      httpFetch: service.fetch,
    });
  }

  it('should send prefix, marker and page size', async () => {
    const service = new InMemoryBlobService();
    service.putBlob('data', 'logs/a.csv', 'a').putBlob('data', 'logs/b.csv', 'b').putBlob('data', 'other.csv', 'c');
    const container = createClient(service).getContainerClient('data');

    const first = await container.listBlobs({ prefix: 'logs/', maxResults: 1 });
    const second = await container.listBlobs({ prefix: 'logs/', maxResults: 1, continuationToken: first.continuationToken });

    expect(first.blobs.map((b) => b.name)).toEqual(['logs/a.csv']);
    expect(first.continuationToken).toBe('logs/b.csv');
    expect(second.blobs.map((b) => b.name)).toEqual(['logs/b.csv']);
    expect(second.continuationToken).toBeUndefined();

    const url = new URL(service.requests[1]?.url ?? '');
    expect(url.pathname).toBe('/data');
    expect(url.searchParams.get('restype')).toBe('container');
    expect(url.searchParams.get('comp')).toBe('list');
    expect(url.searchParams.get('prefix')).toBe('logs/');
    expect(url.searchParams.get('marker')).toBe('logs/b.csv');
    expect(url.searchParams.get('maxresults')).toBe('1');
  });

  it('should fail for a missing container', async () => {
    const container = createClient(new InMemoryBlobService()).getContainerClient('missing');

    const error = await container.listBlobs().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ObjectNotFoundError);
    if (error instanceof ObjectNotFoundError) {
      expect(error.code).toBe('ContainerNotFound');
      expect(error.container).toBe('missing');
    }
  });

  it('should require a container name', async () => {
    await expect(createClient(new InMemoryBlobService()).getContainerClient('').listBlobs()).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
