import { describe, it, expect } from 'vitest';
import {
  AccessDeniedError,
  AuthResolutionError,
  CredentialUnavailableError,
  ObjectNotFoundError,
  StorageError,
  TransportError,
  UnsupportedOperationError,
  ConfigurationError,
  createErrorFromResponse,
  isRetryableStatus,
  isStorageError,
} from '../index.js';

describe('createErrorFromResponse', () => {
  it('should map 404 to ObjectNotFoundError with the header code', () => {
    const error = createErrorFromResponse(
      404,
      'The specified blob does not exist.',
      '',
      { 'x-ms-error-code': 'BlobNotFound', 'x-ms-request-id': 'req-1' },
      { container: 'data', blobName: 'a.csv' }
    );

    expect(error).toBeInstanceOf(ObjectNotFoundError);
    expect(error.kind).toBe('object_not_found');
    expect(error.code).toBe('BlobNotFound');
    expect(error.statusCode).toBe(404);
    expect(error.requestId).toBe('req-1');
    expect(error.container).toBe('data');
    expect(error.blobName).toBe('a.csv');
    expect(error.message).toBe('The specified blob does not exist.');
  });

  it('should map 401 and 403 to AccessDeniedError', () => {
    expect(createErrorFromResponse(401, 'Unauthorized', '', {})).toBeInstanceOf(AccessDeniedError);
    expect(createErrorFromResponse(403, 'Forbidden', '', {})).toBeInstanceOf(AccessDeniedError);
  });

  it('should read the code and first message line from an XML body', () => {
    const body =
      '<?xml version="1.0" encoding="utf-8"?><Error><Code>ServerBusy</Code>' +
      '<Message>The server is busy.\nRequestId:abc</Message></Error>';

    const error = createErrorFromResponse(503, 'Service Unavailable', body, {});

    expect(error).toBeInstanceOf(TransportError);
    expect(error.code).toBe('ServerBusy');
    expect(error.message).toBe('The server is busy.');
    expect(error.reasonPhrase).toBe('Service Unavailable');
    expect(error.isRetryable()).toBe(true);
  });

  it('should fall back to the status when there is no reason phrase', () => {
    const error = createErrorFromResponse(418, '', '', {});

    expect(error.message).toBe('HTTP 418');
    expect(error.isRetryable()).toBe(false);
  });
});

describe('StorageError', () => {
  it('should serialize structured fields', () => {
    const error = new TransportError({
      message: 'boom',
      statusCode: 500,
      code: 'InternalError',
      reasonPhrase: 'Internal Server Error',
      path: 'az://c/a',
    });

    expect(error.toJSON()).toEqual({
      name: 'TransportError',
      kind: 'transport',
      message: 'boom',
      statusCode: 500,
      code: 'InternalError',
      reasonPhrase: 'Internal Server Error',
      path: 'az://c/a',
      container: undefined,
      blobName: undefined,
      requestId: undefined,
      retryable: false,
    });
  });

  it('should keep CredentialUnavailableError an auth resolution error', () => {
    const error = new CredentialUnavailableError({ message: 'no cli' });

    expect(error).toBeInstanceOf(AuthResolutionError);
    expect(error.kind).toBe('auth_resolution');
    expect(error.name).toBe('CredentialUnavailableError');
  });

  it('should record the operation and setting', () => {
    const unsupported = new UnsupportedOperationError({ message: 'no', operation: 'sync' });
    const config = new ConfigurationError({ message: 'bad', setting: 'azure_read_buffer_size' });

    expect(unsupported.operation).toBe('sync');
    expect(unsupported.code).toBe('UnsupportedOperation');
    expect(config.setting).toBe('azure_read_buffer_size');
  });

  it('should detect storage errors', () => {
    expect(isStorageError(new ObjectNotFoundError({ message: 'x' }))).toBe(true);
    expect(isStorageError(new Error('x'))).toBe(false);
    expect(new ObjectNotFoundError({ message: 'x' })).toBeInstanceOf(StorageError);
  });
});

describe('isRetryableStatus', () => {
  it('should retry throttling and server errors only', () => {
    expect([408, 429, 500, 502, 503, 504].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 403, 404, 409, 416].some(isRetryableStatus)).toBe(false);
  });
});
