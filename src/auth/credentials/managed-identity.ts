/**
 * Managed Identity credential.
 *
 * Zero-secret authentication for Azure workloads, via the App Service identity
 * endpoint when the host exposes one, otherwise via IMDS.
 */

import { fetch } from 'undici';
import type { Response } from 'undici';
import { z } from 'zod';
import { CredentialUnavailableError } from '../../errors/index.js';
import type { HttpFetch } from '../../types/index.js';
import type { AccessToken, CredentialOptions, Environment, TokenCredential } from './types.js';

const IMDS_ENDPOINT = 'http://169.254.169.254/metadata/identity/oauth2/token';
const IMDS_API_VERSION = '2018-02-01';
const APP_SERVICE_API_VERSION = '2019-08-01';
const DEFAULT_TIMEOUT_MS = 2000;

/**
 * Token response. `expires_on` is seconds since the epoch, sent as a string by
 * IMDS and as a number by some hosts.
 */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_on: z.coerce.number().positive(),
});

/** Managed identity options */
export interface ManagedIdentityCredentialOptions extends CredentialOptions {
  /** Client ID of a user-assigned identity */
  clientId?: string;
  /** Give up on the identity endpoint after this long */
  timeoutMs?: number;
}

/**
 * Strip the `/.default` suffix: identity endpoints take a resource, not a scope.
 */
export function scopeToResource(scope: string): string {
  return scope.endsWith('/.default') ? scope.slice(0, -'/.default'.length) : scope;
}

/**
 * Managed identity credential
 */
export class ManagedIdentityCredential implements TokenCredential {
  private readonly clientId?: string;
  private readonly env: Environment;
  private readonly httpFetch: HttpFetch;
  private readonly timeoutMs: number;

  constructor(options: ManagedIdentityCredentialOptions = {}) {
    this.clientId = options.clientId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.env = options.env ?? process.env;
    this.httpFetch = options.httpFetch ?? fetch;
  }

  async getToken(scope: string): Promise<AccessToken> {
    const resource = scopeToResource(scope);
    const identityEndpoint = this.env['IDENTITY_ENDPOINT'];
    const identityHeader = this.env['IDENTITY_HEADER'];

    let url: URL;
    let headers: Record<string, string>;
    if (identityEndpoint && identityHeader) {
      url = new URL(identityEndpoint);
      url.searchParams.set('api-version', APP_SERVICE_API_VERSION);
      headers = { 'X-IDENTITY-HEADER': identityHeader };
    } else {
      url = new URL(IMDS_ENDPOINT);
      url.searchParams.set('api-version', IMDS_API_VERSION);
      headers = { Metadata: 'true' };
    }
    url.searchParams.set('resource', resource);

    // Add client_id for user-assigned identity
    if (this.clientId) {
      url.searchParams.set('client_id', this.clientId);
    }

    let response: Response;
    try {
      response = await this.httpFetch(url.toString(), {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new CredentialUnavailableError({
        message: `Managed identity endpoint not available: ${error instanceof Error ? error.message : String(error)}`,
      });
    }

    if (!response.ok) {
      throw new CredentialUnavailableError({
        message: `Managed identity endpoint returned status ${response.status}`,
        statusCode: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      body = undefined;
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CredentialUnavailableError({
        message: 'Managed identity endpoint returned an unexpected response',
      });
    }

    return {
      token: parsed.data.access_token,
      expiresOnTimestamp: parsed.data.expires_on * 1000,
    };
  }
}
