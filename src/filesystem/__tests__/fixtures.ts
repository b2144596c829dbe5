import { BlobFileSystem } from '../filesystem.js';
import type { FileOpener } from '../types.js';
import { CredentialResolver } from '../../client/resolver.js';
import { MapSettingsProvider } from '../../client/config.js';
import type { SettingValue } from '../../client/config.js';
import { InMemorySessionRegistry } from '../../context/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { InMemoryBlobService } from '../../simulation/index.js';
import type { HttpFetch } from '../../types/index.js';

export interface TestFileSystem {
  service: InMemoryBlobService;
  fs: BlobFileSystem;
  opener: FileOpener;
  session: InMemorySessionRegistry;
  logger: InMemoryLogger;
  /** Number of clients resolved so far */
  resolutions: () => number;
}

export interface TestFileSystemOptions {
  settings?: Record<string, SettingValue>;
  pageSize?: number;
  /** Wraps the simulation's fetch */
  wrapFetch?: (fetch: HttpFetch) => HttpFetch;
}

/**
 * File system over an in-memory Blob service for `myaccount`
 */
export function createTestFileSystem(options: TestFileSystemOptions = {}): TestFileSystem {
  const service = new InMemoryBlobService({ pageSize: options.pageSize });
  const logger = new InMemoryLogger();
  let resolutions = 0;
  const resolver = new CredentialResolver({
    env: {},
    logger,
    transportFactory: async () => {
      resolutions++;
      return options.wrapFetch ? options.wrapFetch(service.fetch) : service.fetch;
    },
  });
  const session = new InMemorySessionRegistry();
  const opener: FileOpener = {
    settings: new MapSettingsProvider({ azure_account_name: 'myaccount', ...options.settings }),
    session,
  };

  return {
    service,
    fs: new BlobFileSystem({ resolver, logger }),
    opener,
    session,
    logger,
    resolutions: () => resolutions,
  };
}

/**
 * Deterministic test bytes
 */
export function testBytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 7 + 3) % 256);
}
