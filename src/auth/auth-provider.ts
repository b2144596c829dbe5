/**
 * Blob Storage Authentication Providers
 *
 * Each provider decorates an outgoing request:
 * - Shared Key (HMAC-SHA256 signature in the Authorization header)
 * - SAS token (query string)
 * - Bearer token from an Entra ID credential
 * - Anonymous (public containers)
 */

import { createHmac } from 'crypto';
import type { TokenCredential, AccessToken } from './credentials/types.js';
import { STORAGE_SCOPE } from './credentials/types.js';

/** Authentication method types */
export type AuthMethod = 'shared-key' | 'sas-token' | 'bearer-token' | 'anonymous';

/** Request as seen by an auth provider */
export interface AuthorizableRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  /** Body length in bytes, 0 when there is no body */
  contentLength?: number;
}

/** Authentication provider interface */
export interface AuthProvider {
  /** Return the request with credentials applied */
  authorize(request: AuthorizableRequest): Promise<AuthorizableRequest>;
  /** Get the authentication method type */
  getMethod(): AuthMethod;
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build the Shared Key string to sign for a Blob service request.
 */
export function buildSharedKeyStringToSign(accountName: string, request: AuthorizableRequest): string {
  const lowered: Record<string, string> = {};
  for (const [key, value] of Object.entries(request.headers)) {
    lowered[key.toLowerCase()] = value;
  }
  const getHeader = (name: string): string => lowered[name] ?? '';

  const canonicalizedHeaders = Object.entries(lowered)
    .filter(([key]) => key.startsWith('x-ms-'))
    .map(([key, value]) => [key, value.replace(/\s+/g, ' ').trim()] as const)
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([key, value]) => `${key}:${value}`)
    .join('\n');

  const url = new URL(request.url);
  let canonicalizedResource = `/${accountName}${url.pathname}`;
  const params = new Map<string, string[]>();
  for (const [key, value] of url.searchParams.entries()) {
    const name = key.toLowerCase();
    params.set(name, [...(params.get(name) ?? []), value]);
  }
  for (const name of [...params.keys()].sort(compareCodePoints)) {
    const values = (params.get(name) ?? []).sort(compareCodePoints);
    canonicalizedResource += `\n${name}:${values.join(',')}`;
  }

  const contentLength = request.contentLength ?? 0;

  return [
    request.method.toUpperCase(),
    getHeader('content-encoding'),
    getHeader('content-language'),
    contentLength > 0 ? contentLength.toString() : '',
    getHeader('content-md5'),
    getHeader('content-type'),
    '', // Date: x-ms-date is used instead
    getHeader('if-modified-since'),
    getHeader('if-match'),
    getHeader('if-none-match'),
    getHeader('if-unmodified-since'),
    getHeader('range'),
    canonicalizedHeaders,
    canonicalizedResource,
  ].join('\n');
}

/**
 * Storage account key (Shared Key) authentication provider
 */
export class SharedKeyAuthProvider implements AuthProvider {
  private readonly accountName: string;
  private readonly accountKey: Buffer;
  private readonly now: () => Date;

  constructor(accountName: string, accountKey: string, now: () => Date = () => new Date()) {
    if (!accountName) {
      throw new Error('Account name is required');
    }
    if (!accountKey) {
      throw new Error('Account key is required');
    }
    this.accountName = accountName;
    this.accountKey = Buffer.from(accountKey, 'base64');
    this.now = now;
  }

  async authorize(request: AuthorizableRequest): Promise<AuthorizableRequest> {
    const headers: Record<string, string> = {
      ...request.headers,
      'x-ms-date': this.now().toUTCString(),
    };
    const signed = { ...request, headers };

    const hmac = createHmac('sha256', this.accountKey);
    hmac.update(buildSharedKeyStringToSign(this.accountName, signed), 'utf8');
    headers['Authorization'] = `SharedKey ${this.accountName}:${hmac.digest('base64')}`;

    return signed;
  }

  getMethod(): AuthMethod {
    return 'shared-key';
  }
}

/**
 * SAS Token authentication provider
 */
export class SasTokenAuthProvider implements AuthProvider {
  private readonly sasToken: string;

  constructor(sasToken: string) {
    if (!sasToken) {
      throw new Error('SAS token is required');
    }
    // Remove leading ? if present
    this.sasToken = sasToken.startsWith('?') ? sasToken.slice(1) : sasToken;
  }

  async authorize(request: AuthorizableRequest): Promise<AuthorizableRequest> {
    const separator = request.url.includes('?') ? '&' : '?';
    return { ...request, url: `${request.url}${separator}${this.sasToken}` };
  }

  getMethod(): AuthMethod {
    return 'sas-token';
  }
}

/**
 * Entra ID bearer token provider. Tokens are cached and refreshed five minutes
 * before they expire.
 */
export class BearerTokenAuthProvider implements AuthProvider {
  private readonly credential: TokenCredential;
  private readonly scope: string;
  private readonly now: () => number;
  private readonly tokenBufferMs = 5 * 60 * 1000; // 5 minute buffer
  private cachedToken?: AccessToken;
  private pendingToken?: Promise<AccessToken>;

  constructor(credential: TokenCredential, scope: string = STORAGE_SCOPE, now: () => number = Date.now) {
    this.credential = credential;
    this.scope = scope;
    this.now = now;
  }

  async authorize(request: AuthorizableRequest): Promise<AuthorizableRequest> {
    const token = await this.getValidToken();
    return {
      ...request,
      headers: { ...request.headers, Authorization: `Bearer ${token}` },
    };
  }

  getMethod(): AuthMethod {
    return 'bearer-token';
  }

  /** Drop the cached token */
  clearCache(): void {
    this.cachedToken = undefined;
  }

  private async getValidToken(): Promise<string> {
    if (this.cachedToken && this.now() < this.cachedToken.expiresOnTimestamp - this.tokenBufferMs) {
      return this.cachedToken.token;
    }

    // Concurrent callers share one token request
    if (!this.pendingToken) {
      this.pendingToken = this.credential.getToken(this.scope).finally(() => {
        this.pendingToken = undefined;
      });
    }
    const token = await this.pendingToken;
    this.cachedToken = token;
    return token.token;
  }
}

/**
 * Anonymous access for public containers
 */
export class AnonymousAuthProvider implements AuthProvider {
  async authorize(request: AuthorizableRequest): Promise<AuthorizableRequest> {
    return request;
  }

  getMethod(): AuthMethod {
    return 'anonymous';
  }
}
