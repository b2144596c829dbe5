/**
 * Settings surface for the blob file system.
 *
 * The host owns its settings store and hands over a {@link SettingsProvider};
 * values may arrive as strings, numbers or booleans and are coerced here.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Default storage endpoint suffix.
 */
export const DEFAULT_ENDPOINT = 'blob.core.windows.net';

/**
 * Default number of concurrent requests per ranged download.
 */
export const DEFAULT_TRANSFER_CONCURRENCY = 5;

/**
 * Default size of each ranged download request (1 MiB).
 */
export const DEFAULT_TRANSFER_CHUNK_SIZE = 1024 * 1024;

/**
 * Default read buffer size per handle (1 MiB).
 */
export const DEFAULT_BUFFER_SIZE = 1024 * 1024;

/**
 * Setting names read from the host.
 */
export const SETTINGS = {
  transferConcurrency: 'azure_read_transfer_concurrency',
  transferChunkSize: 'azure_read_transfer_chunk_size',
  bufferSize: 'azure_read_buffer_size',
  contextCaching: 'azure_context_caching',
  httpStats: 'azure_http_stats',
  transportOptionType: 'azure_transport_option_type',
  httpProxy: 'azure_http_proxy',
  proxyUserName: 'azure_proxy_user_name',
  proxyPassword: 'azure_proxy_password',
  credentialChain: 'azure_credential_chain',
  connectionString: 'azure_storage_connection_string',
  accountName: 'azure_account_name',
  endpoint: 'azure_endpoint',
} as const;

/** Raw setting value as handed over by the host */
export type SettingValue = string | number | boolean;

/**
 * Key-value settings lookup supplied by the host.
 */
export interface SettingsProvider {
  getSetting(name: string): SettingValue | undefined;
}

/**
 * Settings provider backed by a plain map.
 */
export class MapSettingsProvider implements SettingsProvider {
  private readonly values: Map<string, SettingValue>;

  constructor(values: Record<string, SettingValue> = {}) {
    this.values = new Map(Object.entries(values));
  }

  getSetting(name: string): SettingValue | undefined {
    return this.values.get(name);
  }

  set(name: string, value: SettingValue): this {
    this.values.set(name, value);
    return this;
  }

  delete(name: string): this {
    this.values.delete(name);
    return this;
  }
}

/**
 * Per-context read configuration. Frozen once created.
 */
export interface ReadOptions {
  /** Maximum requests in flight for one ranged download */
  readonly transferConcurrency: number;
  /** Size of each request of a ranged download */
  readonly transferChunkSize: number;
  /** Read buffer size per handle */
  readonly bufferSize: number;
}

/** HTTP transport implementation */
export type TransportOptionType = 'default' | 'curl';

const positiveIntSchema = z.coerce.number().int().min(1);

const booleanSchema = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true'),
]);

const transportSchema = z.enum(['default', 'curl']);

function parseSetting<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name: string, value: SettingValue): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => i.message);
    throw new ConfigurationError({
      message: `Invalid value '${String(value)}' for setting ${name}: ${issues.join(', ')}`,
      setting: name,
    });
  }
  return result.data;
}

/**
 * Read a string setting. Empty strings count as unset.
 */
export function readStringSetting(settings: SettingsProvider, name: string): string | undefined {
  const value = settings.getSetting(name);
  if (value === undefined) {
    return undefined;
  }
  const text = String(value);
  return text.length > 0 ? text : undefined;
}

/**
 * Read a boolean setting.
 *
 * @throws {ConfigurationError} If the value is not a boolean or 'true'/'false'
 */
export function readBooleanSetting(settings: SettingsProvider, name: string, defaultValue: boolean): boolean {
  const value = settings.getSetting(name);
  return value === undefined ? defaultValue : parseSetting(booleanSchema, name, value);
}

/**
 * Read a positive integer setting.
 *
 * @throws {ConfigurationError} If the value is not an integer of at least 1
 */
export function readPositiveIntSetting(settings: SettingsProvider, name: string, defaultValue: number): number {
  const value = settings.getSetting(name);
  return value === undefined ? defaultValue : parseSetting(positiveIntSchema, name, value);
}

/**
 * Read the HTTP transport selector.
 *
 * @throws {ConfigurationError} For anything other than 'default' or 'curl'
 */
export function readTransportOption(settings: SettingsProvider): TransportOptionType {
  const value = readStringSetting(settings, SETTINGS.transportOptionType);
  return value === undefined ? 'default' : parseSetting(transportSchema, SETTINGS.transportOptionType, value);
}

/**
 * Build frozen read options from settings, applying defaults.
 */
export function readOptionsFromSettings(settings: SettingsProvider): ReadOptions {
  return Object.freeze({
    transferConcurrency: readPositiveIntSetting(settings, SETTINGS.transferConcurrency, DEFAULT_TRANSFER_CONCURRENCY),
    transferChunkSize: readPositiveIntSetting(settings, SETTINGS.transferChunkSize, DEFAULT_TRANSFER_CHUNK_SIZE),
    bufferSize: readPositiveIntSetting(settings, SETTINGS.bufferSize, DEFAULT_BUFFER_SIZE),
  });
}

/**
 * Whether account contexts are cached across opens.
 */
export function isContextCachingEnabled(settings: SettingsProvider): boolean {
  return readBooleanSetting(settings, SETTINGS.contextCaching, true);
}

/**
 * Whether request statistics are collected.
 */
export function isHttpStatsEnabled(settings: SettingsProvider): boolean {
  return readBooleanSetting(settings, SETTINGS.httpStats, false);
}
