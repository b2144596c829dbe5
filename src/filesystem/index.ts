export type { OpenFlags, FileOpener, FileHandle, FileSystem } from './types.js';
export type { BlobFileHandleInit } from './handle.js';
export { BlobFileHandle } from './handle.js';
export { GlobExpander } from './glob-expander.js';
export { openFailure, readFailure } from './failures.js';
export type { BlobFileSystemOptions } from './filesystem.js';
export { BlobFileSystem, FILE_SYSTEM_NAME } from './filesystem.js';
