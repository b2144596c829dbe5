/**
 * Client credentials flow against the Entra ID token endpoint.
 *
 * Service-to-service authentication using a client secret or a certificate.
 */

import { readFile } from 'fs/promises';
import { fetch } from 'undici';
import { z } from 'zod';
import { AuthResolutionError } from '../../errors/index.js';
import type { HttpFetch } from '../../types/index.js';
import { createClientAssertion, parsePemCertificate } from './jwt.js';
import type { AccessToken, CredentialOptions, TokenCredential } from './types.js';
import { DEFAULT_AUTHORITY_HOST } from './types.js';

const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/** Options for the client credentials flow */
export interface ClientCredentialOptions extends CredentialOptions {
  authorityHost?: string;
  now?: () => number;
}

/**
 * Token endpoint for a tenant.
 */
export function tokenEndpoint(tenantId: string, authorityHost: string = DEFAULT_AUTHORITY_HOST): string {
  return `${authorityHost.replace(/\/+$/, '')}/${tenantId}/oauth2/v2.0/token`;
}

/**
 * Execute the client credentials flow.
 */
export async function requestClientCredentialsToken(
  endpoint: string,
  params: URLSearchParams,
  httpFetch: HttpFetch,
  now: () => number
): Promise<AccessToken> {
  let body: string;
  let status: number;
  try {
    const response = await httpFetch(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: params.toString(),
    });
    status = response.status;
    body = await response.text();
  } catch (error) {
    throw new AuthResolutionError({
      message: `Token request to ${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new AuthResolutionError({
      message: `Token endpoint returned a non-JSON response (HTTP ${status})`,
      statusCode: status,
    });
  }

  const failure = errorResponseSchema.safeParse(json);
  if (failure.success) {
    throw new AuthResolutionError({
      message: `Token request failed: ${failure.data.error_description ?? failure.data.error}`,
      statusCode: status,
      code: failure.data.error,
    });
  }

  const parsed = tokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new AuthResolutionError({
      message: `Token endpoint returned an unexpected response (HTTP ${status})`,
      statusCode: status,
    });
  }

  return {
    token: parsed.data.access_token,
    expiresOnTimestamp: now() + parsed.data.expires_in * 1000,
  };
}

/**
 * Service principal authenticated with a client secret
 */
export class ClientSecretCredential implements TokenCredential {
  private readonly endpoint: string;
  private readonly httpFetch: HttpFetch;
  private readonly now: () => number;

  constructor(
    private readonly tenantId: string,
    private readonly clientId: string,
    private readonly clientSecret: string,
    options: ClientCredentialOptions = {}
  ) {
    this.endpoint = tokenEndpoint(tenantId, options.authorityHost);
    this.httpFetch = options.httpFetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getToken(scope: string): Promise<AccessToken> {
    const params = new URLSearchParams();
    params.set('grant_type', 'client_credentials');
    params.set('client_id', this.clientId);
    params.set('client_secret', this.clientSecret);
    params.set('scope', scope);

    return requestClientCredentialsToken(this.endpoint, params, this.httpFetch, this.now);
  }

  /** Tenant this credential authenticates against */
  getTenantId(): string {
    return this.tenantId;
  }
}

/** Options for certificate credentials */
export interface ClientCertificateCredentialOptions extends ClientCredentialOptions {
  /** Reads the PEM file; defaults to fs */
  readPem?: (path: string) => Promise<string>;
}

/**
 * Service principal authenticated with a certificate. The PEM file holds the
 * private key and the certificate.
 */
export class ClientCertificateCredential implements TokenCredential {
  private readonly endpoint: string;
  private readonly httpFetch: HttpFetch;
  private readonly now: () => number;
  private readonly readPem: (path: string) => Promise<string>;

  constructor(
    private readonly tenantId: string,
    private readonly clientId: string,
    private readonly certificatePath: string,
    options: ClientCertificateCredentialOptions = {}
  ) {
    this.endpoint = tokenEndpoint(tenantId, options.authorityHost);
    this.httpFetch = options.httpFetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.readPem = options.readPem ?? ((path) => readFile(path, 'utf8'));
  }

  async getToken(scope: string): Promise<AccessToken> {
    let pem: string;
    try {
      pem = await this.readPem(this.certificatePath);
    } catch (error) {
      throw new AuthResolutionError({
        message: `Could not read client certificate ${this.certificatePath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const certificate = parsePemCertificate(pem);
    const assertion = createClientAssertion(this.endpoint, this.clientId, certificate, this.now);

    const params = new URLSearchParams();
    params.set('grant_type', 'client_credentials');
    params.set('client_id', this.clientId);
    params.set('client_assertion_type', CLIENT_ASSERTION_TYPE);
    params.set('client_assertion', assertion);
    params.set('scope', scope);

    return requestClientCredentialsToken(this.endpoint, params, this.httpFetch, this.now);
  }

  /** Tenant this credential authenticates against */
  getTenantId(): string {
    return this.tenantId;
  }
}
