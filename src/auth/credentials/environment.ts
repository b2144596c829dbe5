/**
 * Environment credential: a service principal described by `AZURE_*`
 * environment variables.
 */

import { CredentialUnavailableError } from '../../errors/index.js';
import { ClientCertificateCredential, ClientSecretCredential } from './client-credentials.js';
import type { ClientCertificateCredentialOptions } from './client-credentials.js';
import type { AccessToken, TokenCredential } from './types.js';

/**
 * Reads `AZURE_TENANT_ID`, `AZURE_CLIENT_ID` and either `AZURE_CLIENT_SECRET`
 * or `AZURE_CLIENT_CERTIFICATE_PATH`.
 */
export class EnvironmentCredential implements TokenCredential {
  private readonly inner?: TokenCredential;

  constructor(options: ClientCertificateCredentialOptions = {}) {
    const env = options.env ?? process.env;
    const tenantId = env['AZURE_TENANT_ID'];
    const clientId = env['AZURE_CLIENT_ID'];
    const clientSecret = env['AZURE_CLIENT_SECRET'];
    const certificatePath = env['AZURE_CLIENT_CERTIFICATE_PATH'];
    const authorityHost = options.authorityHost ?? env['AZURE_AUTHORITY_HOST'];

    if (tenantId && clientId) {
      if (clientSecret) {
        this.inner = new ClientSecretCredential(tenantId, clientId, clientSecret, { ...options, authorityHost });
      } else if (certificatePath) {
        this.inner = new ClientCertificateCredential(tenantId, clientId, certificatePath, {
          ...options,
          authorityHost,
        });
      }
    }
  }

  async getToken(scope: string): Promise<AccessToken> {
    if (!this.inner) {
      throw new CredentialUnavailableError({
        message:
          'Environment variables are not fully configured: set AZURE_TENANT_ID, AZURE_CLIENT_ID and ' +
          'AZURE_CLIENT_SECRET or AZURE_CLIENT_CERTIFICATE_PATH',
      });
    }
    return this.inner.getToken(scope);
  }
}
