/**
 * Blob Storage Authentication
 *
 * Re-exports all authentication types and providers.
 */

export type { AuthMethod, AuthProvider, AuthorizableRequest } from './auth-provider.js';
export {
  SharedKeyAuthProvider,
  SasTokenAuthProvider,
  BearerTokenAuthProvider,
  AnonymousAuthProvider,
  buildSharedKeyStringToSign,
} from './auth-provider.js';

export type { ConnectionStringParts } from './connection-string.js';
export {
  parseConnectionString,
  assertConnectionStringAccount,
  accountUrlFromConnectionString,
  authProviderFromConnectionString,
} from './connection-string.js';

export * from './credentials/index.js';
