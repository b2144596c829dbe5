/**
 * Token credential types.
 */

import type { HttpFetch } from '../../types/index.js';

/** Resource identifier for Azure Storage */
export const STORAGE_RESOURCE = 'https://storage.azure.com';

/** OAuth2 scope for Azure Storage */
export const STORAGE_SCOPE = `${STORAGE_RESOURCE}/.default`;

/** Default Entra ID authority */
export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';

/**
 * Access token with its expiry.
 */
export interface AccessToken {
  token: string;
  /** Expiry, milliseconds since the epoch */
  expiresOnTimestamp: number;
}

/**
 * Source of access tokens.
 */
export interface TokenCredential {
  getToken(scope: string): Promise<AccessToken>;
}

/** Environment variables as read by credentials */
export type Environment = Record<string, string | undefined>;

/** Options shared by credentials that make HTTP calls */
export interface CredentialOptions {
  httpFetch?: HttpFetch;
  env?: Environment;
}
