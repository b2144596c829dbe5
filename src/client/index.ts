/**
 * Blob Storage Client
 */

export type { StorageAccountClientOptions } from './client.js';
export { StorageAccountClient, ContainerClient, BlobClient } from './client.js';

export type { SettingValue, SettingsProvider, ReadOptions, TransportOptionType } from './config.js';
export {
  DEFAULT_ENDPOINT,
  DEFAULT_TRANSFER_CONCURRENCY,
  DEFAULT_TRANSFER_CHUNK_SIZE,
  DEFAULT_BUFFER_SIZE,
  SETTINGS,
  MapSettingsProvider,
  readStringSetting,
  readBooleanSetting,
  readPositiveIntSetting,
  readTransportOption,
  readOptionsFromSettings,
  isContextCachingEnabled,
  isHttpStatsEnabled,
} from './config.js';

export type { StorageRequest, StorageResponse, RequestPipelineOptions } from './request.js';
export { API_VERSION, RequestPipeline, encodeBlobName } from './request.js';

export type { ProxyOptions, TransportOptions, TransportFactory } from './transport.js';
export {
  CA_BUNDLE_PATHS,
  HttpTransportPool,
  createHttpTransport,
  defaultTransportPool,
  resolveCaBundlePath,
  loadCaCertificates,
  proxyAuthorizationToken,
} from './transport.js';

export type { ResolveInputs, CredentialResolverOptions } from './resolver.js';
export { CredentialResolver, CREDENTIAL_CHAIN_SOURCES } from './resolver.js';
