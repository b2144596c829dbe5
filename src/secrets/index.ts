/**
 * Secret records consumed from the host secret store.
 * @module secrets
 */

import { z } from 'zod';
import { AuthResolutionError, ConfigurationError } from '../errors/index.js';

/** Secret type handled by this file system */
export const SECRET_TYPE = 'azure';

/** Secret provider discriminator */
export type SecretProvider = 'config' | 'credential_chain' | 'service_principal';

const SECRET_PROVIDERS: readonly string[] = ['config', 'credential_chain', 'service_principal'];

const providerSchema = z.object({ provider: z.string() });

const optionalString = z.string().min(1).optional();

const proxyFields = {
  http_proxy: optionalString,
  proxy_user_name: optionalString,
  proxy_password: optionalString,
};

const accountFields = {
  account_name: optionalString,
  endpoint: optionalString,
};

const secretSchema = z.discriminatedUnion('provider', [
  z.object({
    type: z.literal(SECRET_TYPE),
    provider: z.literal('config'),
    values: z
      .object({
        connection_string: optionalString,
        ...accountFields,
        ...proxyFields,
      })
      .strict(),
  }),
  z.object({
    type: z.literal(SECRET_TYPE),
    provider: z.literal('credential_chain'),
    values: z
      .object({
        chain: optionalString,
        ...accountFields,
        ...proxyFields,
      })
      .strict(),
  }),
  z.object({
    type: z.literal(SECRET_TYPE),
    provider: z.literal('service_principal'),
    values: z
      .object({
        tenant_id: optionalString,
        client_id: optionalString,
        client_secret: optionalString,
        client_certificate_path: optionalString,
        ...accountFields,
        ...proxyFields,
      })
      .strict(),
  }),
]);

/**
 * Validated secret record
 */
export type SecretRecord = z.infer<typeof secretSchema>;

/** Config-provider secret */
export type ConfigSecret = Extract<SecretRecord, { provider: 'config' }>;
/** Credential-chain secret */
export type CredentialChainSecret = Extract<SecretRecord, { provider: 'credential_chain' }>;
/** Service-principal secret */
export type ServicePrincipalSecret = Extract<SecretRecord, { provider: 'service_principal' }>;

/**
 * Host secret store lookup. Returns the best-matching secret of the given type
 * for a path, if any.
 */
export interface SecretLookup {
  lookupSecret(path: string, type: string): SecretRecord | undefined;
}

/**
 * Validate a raw secret record.
 *
 * @throws {AuthResolutionError} For a provider other than config, credential_chain or service_principal
 * @throws {ConfigurationError} If the record does not match its provider's shape
 */
export function parseSecretRecord(raw: unknown): SecretRecord {
  const provider = providerSchema.safeParse(raw);
  if (provider.success && !SECRET_PROVIDERS.includes(provider.data.provider)) {
    throw new AuthResolutionError({
      message: `Unsupported provider type ${provider.data.provider} for azure`,
    });
  }

  const result = secretSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError({
      message: `Invalid azure secret: ${issues.join(', ')}`,
    });
  }
  return result.data;
}

interface ScopedSecret {
  scope: string;
  secret: SecretRecord;
}

/**
 * In-memory secret store. A secret applies to every path starting with its
 * scope; the longest matching scope wins.
 */
export class InMemorySecretStore implements SecretLookup {
  private readonly secrets: ScopedSecret[] = [];

  /**
   * Register a secret. The record is validated before it is stored.
   */
  register(scope: string, raw: unknown): SecretRecord {
    const secret = parseSecretRecord(raw);
    this.secrets.push({ scope, secret });
    return secret;
  }

  lookupSecret(path: string, type: string): SecretRecord | undefined {
    let best: ScopedSecret | undefined;
    for (const entry of this.secrets) {
      if (entry.secret.type !== type || !path.startsWith(entry.scope)) {
        continue;
      }
      if (!best || entry.scope.length > best.scope.length) {
        best = entry;
      }
    }
    return best?.secret;
  }
}
