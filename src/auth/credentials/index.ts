export type { AccessToken, TokenCredential, Environment, CredentialOptions } from './types.js';
export { STORAGE_RESOURCE, STORAGE_SCOPE, DEFAULT_AUTHORITY_HOST } from './types.js';
export { ChainedTokenCredential } from './chained.js';
export type { ClientCredentialOptions, ClientCertificateCredentialOptions } from './client-credentials.js';
export {
  ClientSecretCredential,
  ClientCertificateCredential,
  requestClientCredentialsToken,
  tokenEndpoint,
} from './client-credentials.js';
export type { PemCertificate } from './jwt.js';
export { parsePemCertificate, certificateThumbprint, createClientAssertion, base64UrlEncode, base64UrlDecode } from './jwt.js';
export type { ManagedIdentityCredentialOptions } from './managed-identity.js';
export { ManagedIdentityCredential, scopeToResource } from './managed-identity.js';
export type { CommandRunner, AzureCliCredentialOptions } from './azure-cli.js';
export { AzureCliCredential } from './azure-cli.js';
export { EnvironmentCredential } from './environment.js';
export type { DefaultAzureCredentialOptions } from './default.js';
export { DefaultAzureCredential } from './default.js';
