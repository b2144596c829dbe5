/**
 * Default credential chain: environment, managed identity, Azure CLI.
 */

import { AzureCliCredential } from './azure-cli.js';
import type { CommandRunner } from './azure-cli.js';
import { ChainedTokenCredential } from './chained.js';
import type { ClientCertificateCredentialOptions } from './client-credentials.js';
import { EnvironmentCredential } from './environment.js';
import { ManagedIdentityCredential } from './managed-identity.js';

/** Options for the default chain */
export interface DefaultAzureCredentialOptions extends ClientCertificateCredentialOptions {
  runner?: CommandRunner;
  managedIdentityClientId?: string;
}

/**
 * Default credential chain
 */
export class DefaultAzureCredential extends ChainedTokenCredential {
  constructor(options: DefaultAzureCredentialOptions = {}) {
    super(
      new EnvironmentCredential(options),
      new ManagedIdentityCredential({
        clientId: options.managedIdentityClientId,
        env: options.env,
        httpFetch: options.httpFetch,
      }),
      new AzureCliCredential({ runner: options.runner })
    );
  }
}
