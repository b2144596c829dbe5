/**
 * File system capability set exposed to the host.
 */

import type { SettingsProvider } from '../client/config.js';
import type { SessionRegistry } from '../context/index.js';
import type { HttpStatsSink } from '../observability/index.js';
import type { SecretLookup } from '../secrets/index.js';

/** Open flags */
export interface OpenFlags {
  read?: boolean;
  write?: boolean;
  /** Skip the read buffer: every read is one ranged fetch */
  directIO?: boolean;
}

/**
 * Host collaborators available to an operation: settings, the secret store,
 * the per-session registry and the statistics sink.
 */
export interface FileOpener {
  settings: SettingsProvider;
  secrets?: SecretLookup;
  session?: SessionRegistry;
  httpStats?: HttpStatsSink;
}

/** Open file handle */
export interface FileHandle {
  readonly path: string;
  readonly flags: OpenFlags;
  close(): void;
}

/**
 * Operations the host calls on a file system backend
 */
export interface FileSystem<THandle extends FileHandle = FileHandle> {
  openFile(path: string, flags: OpenFlags, opener: FileOpener): Promise<THandle>;
  read(handle: THandle, buffer: Uint8Array, nrBytes: number): Promise<number>;
  readAt(handle: THandle, buffer: Uint8Array, nrBytes: number, location: number): Promise<void>;
  write(handle: THandle, buffer: Uint8Array, nrBytes: number, location: number): Promise<void>;
  sync(handle: THandle): Promise<void>;
  seek(handle: THandle, location: number): void;
  getFileSize(handle: THandle): number;
  getLastModifiedTime(handle: THandle): Date;
  exists(path: string, opener: FileOpener): Promise<boolean>;
  glob(path: string, opener: FileOpener): Promise<string[]>;
  canHandleFile(path: string): boolean;
  canSeek(): boolean;
  onDiskFile(handle: THandle): boolean;
  isPipe(path: string): boolean;
  readonly name: string;
}
