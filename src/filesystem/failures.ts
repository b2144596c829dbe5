/**
 * Error wrapping for file system operations. Upstream diagnostics (status,
 * service code, reason phrase, request id) are carried over and the path is
 * attached.
 */

import type { StorageError } from '../errors/index.js';
import { AccessDeniedError, ObjectNotFoundError, TransportError, isStorageError } from '../errors/index.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap a failed ranged fetch or listing page
 */
export function readFailure(path: string, error: unknown): TransportError {
  if (!isStorageError(error)) {
    const cause = toError(error);
    return new TransportError({
      message: `AzureStorageFileSystem Read to ${path} failed: ${cause.message}`,
      path,
      cause,
    });
  }

  return new TransportError({
    message: `AzureStorageFileSystem Read to ${path} failed with ${error.code ?? 'unknown'} Reason Phrase: ${error.reasonPhrase ?? ''}, Message: ${error.message}`,
    statusCode: error.statusCode,
    code: error.code,
    reasonPhrase: error.reasonPhrase,
    requestId: error.requestId,
    path,
    container: error.container,
    blobName: error.blobName,
    retryable: error.retryable,
    cause: error,
  });
}

/**
 * Wrap a failed metadata probe at open. A service answer keeps its
 * not-found or access-denied kind; anything without a status becomes a
 * transport error that points at the credentials.
 */
export function openFailure(path: string, error: unknown): StorageError {
  if (isStorageError(error) && error.statusCode !== undefined) {
    const options = {
      message: `AzureStorageFileSystem open file '${path}' failed with code '${error.code ?? ''}', Reason Phrase: '${error.reasonPhrase ?? ''}', Message: '${error.message}'`,
      statusCode: error.statusCode,
      code: error.code,
      reasonPhrase: error.reasonPhrase,
      requestId: error.requestId,
      path,
      container: error.container,
      blobName: error.blobName,
      cause: error,
    };
    switch (error.kind) {
      case 'object_not_found':
        return new ObjectNotFoundError(options);
      case 'access_denied':
        return new AccessDeniedError(options);
      default:
        return new TransportError({ ...options, retryable: error.retryable });
    }
  }

  const cause = toError(error);
  return new TransportError({
    message: `AzureStorageFileSystem could not open file: '${path}', unknown error occurred, this could mean the credentials used were wrong. Original error message: '${cause.message}'`,
    path,
    retryable: isStorageError(error) ? error.retryable : false,
    cause,
  });
}
