/**
 * Azure Blob File System
 *
 * Read-only file system over Azure Blob Storage for a host that reads remote
 * files by path.
 *
 * This module provides:
 * - `azure://` and `az://` URL parsing, with or without `<account>.<endpoint>`
 * - Credential resolution from secrets (connection string, credential chain,
 *   service principal) or plain settings
 * - Session-scoped account contexts with invalidation
 * - Buffered ranged reads with concurrent chunked downloads
 * - Glob expansion over paginated container listings
 * - Typed errors carrying the service code, reason phrase and path
 * - An in-process Blob service for tests
 *
 * @example Basic usage
 * ```typescript
 * import { BlobFileSystem, MapSettingsProvider, InMemorySecretStore } from 'azure-blob-filesystem';
 *
 * const secrets = new InMemorySecretStore();
 * secrets.register('az://', {
 *   type: 'azure',
 *   provider: 'credential_chain',
 *   values: { account_name: 'myaccount', chain: 'cli;managed_identity' },
 * });
 *
 * const fs = new BlobFileSystem();
 * const opener = { settings: new MapSettingsProvider(), secrets };
 *
 * const handle = await fs.openFile('az://data/2024/events.csv', { read: true }, opener);
 * const head = new Uint8Array(1024);
 * const n = await fs.read(handle, head, head.length);
 * ```
 *
 * @example Glob expansion
 * ```typescript
 * const paths = await fs.glob('az://myaccount.blob.core.windows.net/data/2024/*.parquet', opener);
 * ```
 *
 * @example Error handling
 * ```typescript
 * import { ObjectNotFoundError, isStorageError } from 'azure-blob-filesystem';
 *
 * try {
 *   await fs.openFile('az://data/missing.csv', { read: true }, opener);
 * } catch (error) {
 *   if (error instanceof ObjectNotFoundError) {
 *     console.log('Blob does not exist');
 *   } else if (isStorageError(error)) {
 *     console.log(error.code, error.reasonPhrase);
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// File system
export * from './filesystem/index.js';

// URLs and globs
export * from './url/index.js';
export * from './glob/index.js';

// Clients, settings, transport and credential resolution
export * from './client/index.js';

// Account contexts
export * from './context/index.js';

// Authentication
export * from './auth/index.js';

// Secrets
export * from './secrets/index.js';

// Operations
export * from './management/index.js';
export * from './download/index.js';

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Simulation
export * from './simulation/index.js';
