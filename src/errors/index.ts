/**
 * Azure Blob File System Errors
 *
 * Re-exports all error types.
 */

export {
  StorageError,
  MalformedUrlError,
  AuthResolutionError,
  CredentialUnavailableError,
  ObjectNotFoundError,
  AccessDeniedError,
  TransportError,
  UnsupportedOperationError,
  ConfigurationError,
  ValidationError,
  createErrorFromResponse,
  isRetryableStatus,
  isStorageError,
} from './error.js';

export type { StorageErrorKind, StorageErrorOptions, ResponseErrorContext } from './error.js';
