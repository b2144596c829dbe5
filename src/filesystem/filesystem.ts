/**
 * Azure Blob File System
 *
 * Read-only file system over Azure Blob Storage. Paths use the `azure://` or
 * `az://` scheme; every open handle keeps its own read buffer and talks to
 * the service through the account context of its session.
 */

import type { BlobProperties, ByteRange } from '../types/index.js';
import { readOptionsFromSettings, isContextCachingEnabled } from '../client/config.js';
import { CredentialResolver } from '../client/resolver.js';
import type { SessionRegistry } from '../context/index.js';
import { AccountContext, AccountContextCache } from '../context/index.js';
import { UnsupportedOperationError, ValidationError } from '../errors/index.js';
import { hasWildcard } from '../glob/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { SECRET_TYPE } from '../secrets/index.js';
import type { ParsedUrl } from '../url/index.js';
import { canHandleStorageUrl, parseStorageUrl } from '../url/index.js';
import { openFailure, readFailure } from './failures.js';
import { GlobExpander } from './glob-expander.js';
import { BlobFileHandle } from './handle.js';
import type { FileOpener, FileSystem, OpenFlags } from './types.js';

/** File system name reported to the host */
export const FILE_SYSTEM_NAME = 'AzureStorageFileSystem';

/** Blob file system options */
export interface BlobFileSystemOptions {
  resolver?: CredentialResolver;
  logger?: Logger;
}

/**
 * Blob file system
 *
 * @example
 * ```typescript
 * const fs = new BlobFileSystem({ logger: createConsoleLogger('debug') });
 * const opener = { settings: new MapSettingsProvider().set('azure_account_name', 'myaccount') };
 *
 * const handle = await fs.openFile('az://data/2024/events.parquet', { read: true }, opener);
 * const footer = new Uint8Array(8);
 * await fs.readAt(handle, footer, 8, fs.getFileSize(handle) - 8);
 * ```
 */
export class BlobFileSystem implements FileSystem<BlobFileHandle> {
  readonly name = FILE_SYSTEM_NAME;

  private readonly resolver: CredentialResolver;
  private readonly logger: Logger;
  private readonly caches = new WeakMap<SessionRegistry, AccountContextCache>();

  constructor(options: BlobFileSystemOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.resolver = options.resolver ?? new CredentialResolver({ logger: this.logger });
  }

  /**
   * Open a blob for reading. The size and modification time are fetched
   * before any data.
   *
   * @throws {UnsupportedOperationError} If the write flag is set
   * @throws {MalformedUrlError} If the path is not a storage URL
   * @throws {AuthResolutionError} If no credential could be built
   * @throws {ObjectNotFoundError} If the blob or container does not exist
   * @throws {AccessDeniedError} If the credential is rejected
   * @throws {TransportError} For any other failure
   */
  async openFile(path: string, flags: OpenFlags, opener: FileOpener): Promise<BlobFileHandle> {
    if (flags.write) {
      throw new UnsupportedOperationError({
        message: 'Write to Azure containers is currently not supported',
        operation: 'write',
        path,
      });
    }

    const parsed = parseStorageUrl(path);
    const context = await this.getContext(path, parsed, opener);
    const blobClient = context.client.getContainerClient(parsed.container).getBlobClient(parsed.path);

    let properties: BlobProperties;
    try {
      properties = await blobClient.getProperties();
    } catch (error) {
      throw openFailure(path, error);
    }

    this.logger.debug('Opened blob', { path, length: properties.contentLength });

    return new BlobFileHandle({
      path,
      flags: { read: true, ...flags },
      length: properties.contentLength,
      lastModified: properties.lastModified,
      blobClient,
      readOptions: context.readOptions,
    });
  }

  /**
   * Read `nrBytes` at `location` into `buffer`.
   *
   * Reads inside the current buffer window are served locally. Otherwise the
   * window is dropped and refilled one buffer at a time; when the bytes still
   * outstanding exceed one refill they are fetched straight into `buffer`.
   *
   * @throws {ValidationError} If the range ends past the end of the blob
   * @throws {TransportError} If a fetch fails
   */
  async readAt(handle: BlobFileHandle, buffer: Uint8Array, nrBytes: number, location: number): Promise<void> {
    if (nrBytes < 0 || location < 0 || location + nrBytes > handle.length) {
      throw new ValidationError({
        message: `Read of ${nrBytes} bytes at ${location} is out of range for '${handle.path}' of length ${handle.length}`,
        path: handle.path,
        field: 'location',
      });
    }
    if (buffer.length < nrBytes) {
      throw new ValidationError({
        message: `Buffer of ${buffer.length} bytes cannot hold ${nrBytes} bytes`,
        path: handle.path,
        field: 'buffer',
      });
    }

    if (handle.flags.directIO) {
      await this.fetchRange(handle, buffer, 0, { offset: location, count: nrBytes });
      handle.resetBuffer();
      handle.fileOffset = location + nrBytes;
      return;
    }

    const readBuffer = handle.readBuffer;
    if (!readBuffer) {
      throw new ValidationError({
        message: `'${handle.path}' was not opened for reading`,
        path: handle.path,
        field: 'flags',
      });
    }

    if (location >= handle.bufferStart && location < handle.bufferEnd) {
      handle.fileOffset = location;
      handle.bufferIdx = location - handle.bufferStart;
      handle.bufferAvailable = handle.bufferEnd - location;
    } else {
      handle.fileOffset = location;
      handle.bufferStart = location;
      handle.bufferEnd = location;
      handle.bufferIdx = 0;
      handle.bufferAvailable = 0;
    }

    let toRead = nrBytes;
    let bufferOffset = 0;
    while (toRead > 0) {
      if (handle.bufferAvailable > 0) {
        const n = Math.min(toRead, handle.bufferAvailable);
        buffer.set(readBuffer.subarray(handle.bufferIdx, handle.bufferIdx + n), bufferOffset);
        bufferOffset += n;
        toRead -= n;
        handle.bufferIdx += n;
        handle.bufferAvailable -= n;
        handle.fileOffset += n;
        continue;
      }

      const refill = Math.min(handle.readOptions.bufferSize, handle.length - handle.fileOffset);
      if (toRead > refill) {
        await this.fetchRange(handle, buffer, bufferOffset, { offset: handle.fileOffset, count: toRead });
        handle.resetBuffer();
        handle.fileOffset += toRead;
        return;
      }

      await this.fetchRange(handle, readBuffer, 0, { offset: handle.fileOffset, count: refill });
      handle.bufferStart = handle.fileOffset;
      handle.bufferEnd = handle.fileOffset + refill;
      handle.bufferIdx = 0;
      handle.bufferAvailable = refill;
    }
  }

  /**
   * Read up to `nrBytes` at the current offset.
   *
   * @returns Number of bytes read, 0 at the end of the blob
   */
  async read(handle: BlobFileHandle, buffer: Uint8Array, nrBytes: number): Promise<number> {
    const n = Math.max(0, Math.min(nrBytes, handle.length - handle.fileOffset));
    if (n === 0) {
      return 0;
    }
    await this.readAt(handle, buffer, n, handle.fileOffset);
    return n;
  }

  async write(handle: BlobFileHandle, _buffer: Uint8Array, _nrBytes: number, _location: number): Promise<void> {
    throw new UnsupportedOperationError({
      message: 'Write to Azure containers is currently not supported',
      operation: 'write',
      path: handle.path,
    });
  }

  async sync(handle: BlobFileHandle): Promise<void> {
    throw new UnsupportedOperationError({
      message: "Can't sync a file on Azure containers, writing is not supported",
      operation: 'sync',
      path: handle.path,
    });
  }

  /**
   * Move the logical offset. The buffer window is kept.
   */
  seek(handle: BlobFileHandle, location: number): void {
    if (location < 0) {
      throw new ValidationError({
        message: `Cannot seek to negative offset ${location}`,
        path: handle.path,
        field: 'location',
      });
    }
    handle.fileOffset = location;
  }

  getFileSize(handle: BlobFileHandle): number {
    return handle.length;
  }

  getLastModifiedTime(handle: BlobFileHandle): Date {
    return handle.lastModified;
  }

  /**
   * Check if a blob exists. Any failure and an empty blob both count as absent.
   */
  async exists(path: string, opener: FileOpener): Promise<boolean> {
    try {
      const handle = await this.openFile(path, { read: true }, opener);
      const length = handle.length;
      handle.close();
      return length !== 0;
    } catch (error) {
      this.logger.debug('Treating blob as absent', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Expand a path with wildcards into the matching blob paths. A path without
   * wildcards is returned as is, without contacting the service.
   *
   * @throws {MalformedUrlError} If the path is not a storage URL
   * @throws {TransportError} If a listing page fails
   */
  async glob(path: string, opener: FileOpener): Promise<string[]> {
    const parsed = parseStorageUrl(path);
    if (!hasWildcard(parsed.path)) {
      return [path];
    }

    const context = await this.getContext(path, parsed, opener);
    const expander = new GlobExpander(context.client.getContainerClient(parsed.container), this.logger);
    return expander.expand(path, parsed);
  }

  canHandleFile(path: string): boolean {
    return canHandleStorageUrl(path);
  }

  canSeek(): boolean {
    return true;
  }

  onDiskFile(_handle: BlobFileHandle): boolean {
    return false;
  }

  isPipe(_path: string): boolean {
    return false;
  }

  private async getContext(path: string, parsed: ParsedUrl, opener: FileOpener): Promise<AccountContext> {
    const { settings } = opener;
    const cache = this.cacheFor(opener.session);

    return cache.getOrCreate(
      parsed.accountName,
      async () => {
        const client = await this.resolver.resolve({
          secret: opener.secrets?.lookupSecret(path, SECRET_TYPE),
          settings,
          accountName: parsed.accountName,
          endpoint: parsed.endpoint,
          httpStats: opener.httpStats,
        });
        return new AccountContext(client, readOptionsFromSettings(settings));
      },
      { enabled: isContextCachingEnabled(settings) }
    );
  }

  private cacheFor(session: SessionRegistry | undefined): AccountContextCache {
    if (!session) {
      return new AccountContextCache();
    }
    let cache = this.caches.get(session);
    if (!cache) {
      cache = new AccountContextCache(session);
      this.caches.set(session, cache);
    }
    return cache;
  }

  private async fetchRange(
    handle: BlobFileHandle,
    target: Uint8Array,
    targetOffset: number,
    range: ByteRange
  ): Promise<void> {
    try {
      await handle.blobClient.downloadTo(target, targetOffset, range, {
        concurrency: handle.readOptions.transferConcurrency,
        chunkSize: handle.readOptions.transferChunkSize,
      });
    } catch (error) {
      throw readFailure(handle.path, error);
    }
  }
}
