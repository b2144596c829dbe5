/**
 * Azure Blob File System Error Types
 *
 * Every failure surfaced by this package is a {@link StorageError}. The `kind`
 * discriminant lets callers branch without `instanceof` chains, and upstream
 * diagnostics (service error code, reason phrase, request id) are kept as
 * structured fields next to the human-readable message.
 */

/** Error kinds */
export type StorageErrorKind =
  | 'malformed_url'
  | 'auth_resolution'
  | 'object_not_found'
  | 'access_denied'
  | 'transport'
  | 'unsupported_operation'
  | 'configuration'
  | 'validation';

/** Base error options */
export interface StorageErrorOptions {
  message: string;
  statusCode?: number;
  /** Service error code (x-ms-error-code or the XML <Code>) */
  code?: string;
  /** HTTP reason phrase */
  reasonPhrase?: string;
  /** Storage URL the operation was working on */
  path?: string;
  container?: string;
  blobName?: string;
  requestId?: string;
  retryable?: boolean;
  cause?: Error;
}

/**
 * Base class for all storage errors
 */
export abstract class StorageError extends Error {
  public abstract readonly kind: StorageErrorKind;
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly reasonPhrase?: string;
  public readonly path?: string;
  public readonly container?: string;
  public readonly blobName?: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(options: StorageErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.reasonPhrase = options.reasonPhrase;
    this.path = options.path;
    this.container = options.container;
    this.blobName = options.blobName;
    this.requestId = options.requestId;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Check if error is retryable */
  isRetryable(): boolean {
    return this.retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      reasonPhrase: this.reasonPhrase,
      path: this.path,
      container: this.container,
      blobName: this.blobName,
      requestId: this.requestId,
      retryable: this.retryable,
    };
  }
}

/**
 * The path does not match either accepted URL form
 */
export class MalformedUrlError extends StorageError {
  public override readonly kind = 'malformed_url' as const;

  constructor(options: Omit<StorageErrorOptions, 'retryable'>) {
    super({ ...options, retryable: false });
  }
}

/**
 * No usable credential could be built, or a credential could not produce a token
 */
export class AuthResolutionError extends StorageError {
  public override readonly kind = 'auth_resolution' as const;

  constructor(options: Omit<StorageErrorOptions, 'retryable'>) {
    super({ ...options, retryable: false });
  }
}

/**
 * A token source that cannot be used in this environment (no CLI, no IMDS,
 * missing environment variables). Credential chains skip it.
 */
export class CredentialUnavailableError extends AuthResolutionError {}

/**
 * Blob or container not found (404)
 */
export class ObjectNotFoundError extends StorageError {
  public override readonly kind = 'object_not_found' as const;

  constructor(options: Omit<StorageErrorOptions, 'retryable'>) {
    super({ ...options, code: options.code ?? 'BlobNotFound', retryable: false });
  }
}

/**
 * Authentication or authorization failure (401, 403)
 */
export class AccessDeniedError extends StorageError {
  public override readonly kind = 'access_denied' as const;

  constructor(options: Omit<StorageErrorOptions, 'retryable'>) {
    super({ ...options, code: options.code ?? 'AuthorizationFailure', retryable: false });
  }
}

/**
 * Any other service or network failure
 */
export class TransportError extends StorageError {
  public override readonly kind = 'transport' as const;

  constructor(options: StorageErrorOptions) {
    super(options);
  }
}

/**
 * Operation the read-only file system does not implement (write, sync)
 */
export class UnsupportedOperationError extends StorageError {
  public override readonly kind = 'unsupported_operation' as const;
  public readonly operation: string;

  constructor(options: Omit<StorageErrorOptions, 'retryable' | 'code'> & { operation: string }) {
    super({ ...options, retryable: false, code: 'UnsupportedOperation' });
    this.operation = options.operation;
  }
}

/**
 * Invalid settings or secret contents
 */
export class ConfigurationError extends StorageError {
  public override readonly kind = 'configuration' as const;
  public readonly setting?: string;

  constructor(options: Omit<StorageErrorOptions, 'retryable' | 'code'> & { setting?: string }) {
    super({ ...options, retryable: false, code: 'ConfigurationError' });
    this.setting = options.setting;
  }
}

/**
 * Invalid request arguments
 */
export class ValidationError extends StorageError {
  public override readonly kind = 'validation' as const;
  public readonly field?: string;

  constructor(options: Omit<StorageErrorOptions, 'retryable' | 'code'> & { field?: string }) {
    super({ ...options, retryable: false, code: 'ValidationError' });
    this.field = options.field;
  }
}

/** Context attached to errors built from HTTP responses */
export interface ResponseErrorContext {
  path?: string;
  container?: string;
  blobName?: string;
}

/**
 * Create error from HTTP response.
 *
 * The service error code comes from the `x-ms-error-code` header (always
 * present, and the only source for HEAD responses) or the XML `<Code>` element.
 */
export function createErrorFromResponse(
  statusCode: number,
  reasonPhrase: string,
  body: string,
  headers: Record<string, string>,
  context: ResponseErrorContext = {}
): StorageError {
  const requestId = headers['x-ms-request-id'];
  const code = headers['x-ms-error-code'] ?? body.match(/<Code>([^<]+)<\/Code>/)?.[1];
  const serviceMessage = body.match(/<Message>([^<]+)<\/Message>/)?.[1]?.split('\n')[0];
  const message = serviceMessage ?? (reasonPhrase || `HTTP ${statusCode}`);

  const baseOptions = { message, statusCode, code, reasonPhrase, requestId, ...context };

  switch (statusCode) {
    case 401:
    case 403:
      return new AccessDeniedError(baseOptions);
    case 404:
      return new ObjectNotFoundError(baseOptions);
    default:
      return new TransportError({
        ...baseOptions,
        retryable: isRetryableStatus(statusCode),
      });
  }
}

/**
 * Check if status code is retryable
 */
export function isRetryableStatus(statusCode: number): boolean {
  return (
    statusCode === 408 || // Request Timeout
    statusCode === 429 || // Too Many Requests
    statusCode === 500 || // Internal Server Error
    statusCode === 502 || // Bad Gateway
    statusCode === 503 || // Service Unavailable
    statusCode === 504 // Gateway Timeout
  );
}

/**
 * Type guard for storage errors
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}
