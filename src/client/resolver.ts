/**
 * Credential resolution.
 *
 * Turns a matched secret, or the plain settings when no secret matched, into
 * an authenticated {@link StorageAccountClient}.
 */

import type { AuthProvider, Environment, TokenCredential, CommandRunner } from '../auth/index.js';
import {
  AnonymousAuthProvider,
  AzureCliCredential,
  BearerTokenAuthProvider,
  ChainedTokenCredential,
  ClientCertificateCredential,
  ClientSecretCredential,
  DefaultAzureCredential,
  EnvironmentCredential,
  ManagedIdentityCredential,
  accountUrlFromConnectionString,
  assertConnectionStringAccount,
  authProviderFromConnectionString,
  parseConnectionString,
} from '../auth/index.js';
import { AuthResolutionError } from '../errors/index.js';
import type { HttpStatsSink, Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { SecretRecord } from '../secrets/index.js';
import type { HttpFetch } from '../types/index.js';
import { StorageAccountClient } from './client.js';
import type { SettingsProvider } from './config.js';
import { DEFAULT_ENDPOINT, SETTINGS, isHttpStatsEnabled, readStringSetting, readTransportOption } from './config.js';
import type { ProxyOptions, TransportFactory } from './transport.js';
import { createHttpTransport } from './transport.js';

/** Names accepted in a credential chain */
export const CREDENTIAL_CHAIN_SOURCES = ['cli', 'managed_identity', 'env', 'default'] as const;

/** Inputs for one resolution */
export interface ResolveInputs {
  /** Secret matched for the path, if any */
  secret?: SecretRecord;
  settings: SettingsProvider;
  /** Account from the URL, '' when the URL has none */
  accountName: string;
  /** Endpoint from the URL, '' when the URL has none */
  endpoint: string;
  /** Host statistics sink, used when `azure_http_stats` is on */
  httpStats?: HttpStatsSink;
}

/** Resolver options */
export interface CredentialResolverOptions {
  transportFactory?: TransportFactory;
  logger?: Logger;
  env?: Environment;
  /** CA bundle override for the `curl` transport */
  caBundlePath?: string;
  /** Runs the Azure CLI; defaults to spawning `az` */
  commandRunner?: CommandRunner;
}

/** What the client is built from */
interface ClientTarget {
  accountUrl: string;
  authProvider: AuthProvider;
}

/**
 * Credential resolver
 */
export class CredentialResolver {
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private readonly env: Environment;
  private readonly caBundlePath?: string;
  private readonly commandRunner?: CommandRunner;

  constructor(options: CredentialResolverOptions = {}) {
    this.transportFactory = options.transportFactory ?? createHttpTransport;
    this.logger = options.logger ?? new NoopLogger();
    this.env = options.env ?? process.env;
    this.caBundlePath = options.caBundlePath;
    this.commandRunner = options.commandRunner;
  }

  /**
   * Build an authenticated client.
   *
   * @throws {AuthResolutionError} When no usable credential path exists
   * @throws {ConfigurationError} For invalid transport settings
   */
  async resolve(inputs: ResolveInputs): Promise<StorageAccountClient> {
    const { secret, settings } = inputs;
    const httpStats = isHttpStatsEnabled(settings) ? inputs.httpStats : undefined;

    const httpFetch = await this.transportFactory({
      type: readTransportOption(settings),
      proxy: secret ? this.proxyFromSecret(secret) : this.proxyFromSettings(settings),
      caBundlePath: this.caBundlePath,
      env: this.env,
      logger: this.logger,
    });

    const target = secret
      ? this.fromSecret(secret, inputs.accountName, inputs.endpoint, httpFetch)
      : this.fromSettings(settings, inputs.accountName, inputs.endpoint, httpFetch);

    this.logger.debug('Resolved storage account client', {
      accountUrl: target.accountUrl,
      authMethod: target.authProvider.getMethod(),
      provider: secret?.provider ?? 'settings',
    });

    return new StorageAccountClient({
      accountUrl: target.accountUrl,
      authProvider: target.authProvider,
      httpFetch,
      httpStats,
      logger: this.logger,
    });
  }

  /**
   * Build a credential chain from a `;`-separated list of source names.
   *
   * @throws {AuthResolutionError} For an empty chain or an unknown name
   */
  createChainedCredential(chain: string, httpFetch: HttpFetch): TokenCredential {
    const names = chain
      .split(';')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    if (names.length === 0) {
      throw new AuthResolutionError({ message: 'No valid Azure credentials found: empty credential chain' });
    }

    const sources = names.map((name): TokenCredential => {
      switch (name) {
        case 'cli':
          return new AzureCliCredential({ runner: this.commandRunner });
        case 'managed_identity':
          return new ManagedIdentityCredential({ env: this.env, httpFetch });
        case 'env':
          return new EnvironmentCredential({ env: this.env, httpFetch });
        case 'default':
          return new DefaultAzureCredential({ env: this.env, httpFetch, runner: this.commandRunner });
        default:
          throw new AuthResolutionError({
            message: `Unknown credential provider found: ${name}, expected one of ${CREDENTIAL_CHAIN_SOURCES.join(', ')}`,
          });
      }
    });

    return new ChainedTokenCredential(...sources);
  }

  private proxyFromSecret(secret: SecretRecord): ProxyOptions | undefined {
    const url = secret.values.http_proxy ?? this.env['HTTP_PROXY'];
    if (!url) {
      return undefined;
    }
    return { url, userName: secret.values.proxy_user_name, password: secret.values.proxy_password };
  }

  private proxyFromSettings(settings: SettingsProvider): ProxyOptions | undefined {
    const url = readStringSetting(settings, SETTINGS.httpProxy);
    if (!url) {
      return undefined;
    }
    return {
      url,
      userName: readStringSetting(settings, SETTINGS.proxyUserName),
      password: readStringSetting(settings, SETTINGS.proxyPassword),
    };
  }

  private fromConnectionString(connectionString: string, accountName: string): ClientTarget {
    const parts = parseConnectionString(connectionString);
    assertConnectionStringAccount(parts, accountName);
    return {
      accountUrl: accountUrlFromConnectionString(parts),
      authProvider: authProviderFromConnectionString(parts),
    };
  }

  private fromSecret(secret: SecretRecord, accountHint: string, endpointHint: string, httpFetch: HttpFetch): ClientTarget {
    const accountUrl = (): string => {
      const account = accountHint || secret.values.account_name;
      if (!account) {
        throw new AuthResolutionError({
          message: `The azure secret of provider ${secret.provider} needs an account_name when the URL names none`,
        });
      }
      return `https://${account}.${endpointHint || secret.values.endpoint || DEFAULT_ENDPOINT}`;
    };

    switch (secret.provider) {
      case 'config': {
        if (secret.values.connection_string) {
          return this.fromConnectionString(secret.values.connection_string, accountHint);
        }
        return { accountUrl: accountUrl(), authProvider: new AnonymousAuthProvider() };
      }
      case 'credential_chain': {
        const credential = this.createChainedCredential(secret.values.chain ?? 'default', httpFetch);
        return { accountUrl: accountUrl(), authProvider: new BearerTokenAuthProvider(credential) };
      }
      case 'service_principal': {
        const { tenant_id, client_id, client_secret, client_certificate_path } = secret.values;
        if (!tenant_id || !client_id) {
          throw new AuthResolutionError({
            message: 'The service_principal secret needs both tenant_id and client_id',
          });
        }

        let credential: TokenCredential;
        if (client_secret) {
          credential = new ClientSecretCredential(tenant_id, client_id, client_secret, { httpFetch });
        } else if (client_certificate_path) {
          credential = new ClientCertificateCredential(tenant_id, client_id, client_certificate_path, { httpFetch });
        } else {
          throw new AuthResolutionError({
            message: 'Failed to fetch key client_secret or client_certificate_path from the service_principal secret',
          });
        }
        return { accountUrl: accountUrl(), authProvider: new BearerTokenAuthProvider(credential) };
      }
    }
  }

  private fromSettings(
    settings: SettingsProvider,
    accountHint: string,
    endpointHint: string,
    httpFetch: HttpFetch
  ): ClientTarget {
    const connectionString = readStringSetting(settings, SETTINGS.connectionString);
    if (connectionString) {
      return this.fromConnectionString(connectionString, accountHint);
    }

    const account = accountHint || readStringSetting(settings, SETTINGS.accountName);
    if (!account) {
      throw new AuthResolutionError({ message: 'No valid Azure credentials found!' });
    }
    const endpoint = endpointHint || readStringSetting(settings, SETTINGS.endpoint) || DEFAULT_ENDPOINT;
    const accountUrl = `https://${account}.${endpoint}`;

    const chain = readStringSetting(settings, SETTINGS.credentialChain);
    if (chain) {
      return { accountUrl, authProvider: new BearerTokenAuthProvider(this.createChainedCredential(chain, httpFetch)) };
    }

    return { accountUrl, authProvider: new AnonymousAuthProvider() };
  }
}
