/**
 * Storage connection strings.
 *
 * `AccountName=...;AccountKey=...;EndpointSuffix=core.windows.net` and friends.
 */

import { AuthResolutionError } from '../errors/index.js';
import type { AuthProvider } from './auth-provider.js';
import { SasTokenAuthProvider, SharedKeyAuthProvider } from './auth-provider.js';

/** Recognized connection string fields */
export interface ConnectionStringParts {
  accountName?: string;
  accountKey?: string;
  sharedAccessSignature?: string;
  blobEndpoint?: string;
  defaultEndpointsProtocol?: string;
  endpointSuffix?: string;
}

/** Default suffix when a connection string names none */
const DEFAULT_ENDPOINT_SUFFIX = 'core.windows.net';

/**
 * Parse a connection string into its fields. Unknown keys are ignored.
 */
export function parseConnectionString(connectionString: string): ConnectionStringParts {
  const parts: Record<string, string> = {};

  for (const part of connectionString.split(';')) {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim()] = valueParts.join('=').trim();
    }
  }

  return {
    accountName: parts['AccountName'],
    accountKey: parts['AccountKey'],
    sharedAccessSignature: parts['SharedAccessSignature'],
    blobEndpoint: parts['BlobEndpoint'],
    defaultEndpointsProtocol: parts['DefaultEndpointsProtocol'],
    endpointSuffix: parts['EndpointSuffix'],
  };
}

/**
 * Check that a connection string belongs to the account named in the URL.
 *
 * @throws {AuthResolutionError} If it names another account or none
 */
export function assertConnectionStringAccount(parts: ConnectionStringParts, accountName: string): void {
  if (!accountName) {
    return;
  }
  if (!parts.accountName) {
    throw new AuthResolutionError({
      message: `The provided connection string does not name an account, expected ${accountName}`,
    });
  }
  if (parts.accountName !== accountName) {
    throw new AuthResolutionError({
      message: `The provided connection string does not match the storage account named ${accountName}`,
    });
  }
}

/**
 * Account URL for a connection string: `BlobEndpoint` when given, otherwise
 * `<protocol>://<account>.blob.<suffix>`.
 */
export function accountUrlFromConnectionString(parts: ConnectionStringParts): string {
  if (parts.blobEndpoint) {
    return parts.blobEndpoint.replace(/\/+$/, '');
  }
  if (!parts.accountName) {
    throw new AuthResolutionError({
      message: 'Connection string must contain AccountName or BlobEndpoint',
    });
  }
  const protocol = parts.defaultEndpointsProtocol ?? 'https';
  const suffix = parts.endpointSuffix ?? DEFAULT_ENDPOINT_SUFFIX;
  return `${protocol}://${parts.accountName}.blob.${suffix}`;
}

/**
 * Auth provider for a connection string: SAS when present, otherwise Shared Key.
 */
export function authProviderFromConnectionString(parts: ConnectionStringParts): AuthProvider {
  if (parts.sharedAccessSignature) {
    return new SasTokenAuthProvider(parts.sharedAccessSignature);
  }
  if (parts.accountKey) {
    if (!parts.accountName) {
      throw new AuthResolutionError({
        message: 'Connection string with AccountKey must contain AccountName',
      });
    }
    return new SharedKeyAuthProvider(parts.accountName, parts.accountKey);
  }
  throw new AuthResolutionError({
    message: 'Connection string must contain AccountKey or SharedAccessSignature',
  });
}
