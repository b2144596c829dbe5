/**
 * HTTP transport.
 *
 * Every request goes through undici. The `default` transport uses undici's
 * global dispatcher (or a proxy agent); the `curl` transport pins an explicit
 * CA bundle discovered from the environment and well-known locations.
 */

import { constants } from 'fs';
import { access, readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { Agent, ProxyAgent, fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { HttpFetch } from '../types/index.js';
import type { TransportOptionType } from './config.js';

/**
 * Well-known CA bundle locations, probed in order.
 */
export const CA_BUNDLE_PATHS = [
  '/etc/ssl/certs/ca-certificates.crt', // Debian/Ubuntu/Gentoo etc.
  '/etc/pki/tls/certs/ca-bundle.crt', // Fedora/RHEL 6
  '/etc/ssl/ca-bundle.pem', // OpenSUSE
  '/etc/pki/tls/cacert.pem', // OpenELEC
  '/etc/pki/ca-trust/extracted/pem/tls-ca-bundle.pem', // CentOS/RHEL 7
  '/etc/ssl/cert.pem', // Alpine Linux
] as const;

/** Proxy settings */
export interface ProxyOptions {
  url: string;
  userName?: string;
  password?: string;
}

/** Transport options */
export interface TransportOptions {
  type: TransportOptionType;
  proxy?: ProxyOptions;
  /** Explicit CA bundle, takes precedence over discovery */
  caBundlePath?: string;
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

/** Builds the fetch function for a resolved client */
export type TransportFactory = (options: TransportOptions) => Promise<HttpFetch>;

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the CA bundle: explicit override, then `CURL_CA_INFO`, then (except on
 * Windows and macOS, where the system store is used) the well-known paths.
 */
export async function resolveCaBundlePath(options: {
  caBundlePath?: string;
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
}): Promise<string | undefined> {
  if (options.caBundlePath) {
    return options.caBundlePath;
  }

  const env = options.env ?? process.env;
  const fromEnv = env['CURL_CA_INFO'];
  if (fromEnv) {
    return fromEnv;
  }

  const platform = options.platform ?? process.platform;
  if (platform === 'win32' || platform === 'darwin') {
    return undefined;
  }

  for (const candidate of CA_BUNDLE_PATHS) {
    if (await isReadable(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Load CA certificates for the `curl` transport: the bundle file plus every
 * certificate file in `CURL_CA_PATH`.
 */
export async function loadCaCertificates(options: {
  caBundlePath?: string;
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
}): Promise<string[]> {
  const certificates: string[] = [];
  const bundlePath = await resolveCaBundlePath(options);

  if (bundlePath) {
    try {
      certificates.push(await readFile(bundlePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError({
        message: `Could not read CA bundle ${bundlePath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  const env = options.env ?? process.env;
  const caDirectory = env['CURL_CA_PATH'];
  if (caDirectory) {
    let entries: string[];
    try {
      entries = await readdir(caDirectory);
    } catch (error) {
      throw new ConfigurationError({
        message: `Could not read CA directory ${caDirectory}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
    for (const entry of entries.sort()) {
      const contents = await readFile(join(caDirectory, entry), 'utf8');
      if (contents.includes('-----BEGIN CERTIFICATE-----')) {
        certificates.push(contents);
      }
    }
  }

  return certificates;
}

/**
 * Proxy authorization token for `user:password` basic auth.
 */
export function proxyAuthorizationToken(proxy: ProxyOptions): string | undefined {
  if (!proxy.userName) {
    return undefined;
  }
  const credentials = `${proxy.userName}:${proxy.password ?? ''}`;
  return `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
}

async function createDispatcher(options: TransportOptions): Promise<Dispatcher | undefined> {
  const logger = options.logger ?? new NoopLogger();

  if (options.type === 'default') {
    if (!options.proxy) {
      return undefined;
    }
    logger.debug('Using proxy transport', { proxy: options.proxy.url });
    return new ProxyAgent({ uri: options.proxy.url, token: proxyAuthorizationToken(options.proxy) });
  }

  const certificates = await loadCaCertificates(options);
  const ca = certificates.length > 0 ? certificates : undefined;
  logger.debug('Using CA bundle transport', { certificateFiles: certificates.length });

  if (options.proxy) {
    return new ProxyAgent({
      uri: options.proxy.url,
      token: proxyAuthorizationToken(options.proxy),
      requestTls: { ca },
    });
  }
  return new Agent({ connect: { ca } });
}

function dispatcherKey(options: TransportOptions): string {
  const env = options.env ?? process.env;
  return JSON.stringify([
    options.type,
    options.proxy?.url ?? '',
    options.proxy?.userName ?? '',
    options.proxy?.password ?? '',
    options.type === 'curl' ? options.caBundlePath ?? '' : '',
    options.type === 'curl' ? env['CURL_CA_INFO'] ?? '' : '',
    options.type === 'curl' ? env['CURL_CA_PATH'] ?? '' : '',
    options.type === 'curl' ? options.platform ?? process.platform : '',
  ]);
}

/**
 * Dispatchers shared by every client built with the same transport selection.
 * A dispatcher (and the CA bundle behind it) is created once per selection and
 * lives until {@link HttpTransportPool.close}.
 */
export class HttpTransportPool {
  private readonly dispatchers = new Map<string, Promise<Dispatcher | undefined>>();

  /** Number of transport selections seen so far */
  get size(): number {
    return this.dispatchers.size;
  }

  /**
   * Build the fetch function for a transport selection.
   *
   * @throws {ConfigurationError} For an unknown transport type or an unreadable CA bundle
   */
  readonly createTransport: TransportFactory = async (options) => {
    if (options.type !== 'default' && options.type !== 'curl') {
      throw new ConfigurationError({
        message: `Unsupported transport option type: ${String(options.type)}, expected default or curl`,
        setting: 'azure_transport_option_type',
      });
    }

    const dispatcher = await this.dispatcherFor(options);
    if (!dispatcher) {
      return (url, init) => fetch(url, init);
    }
    return (url, init) => fetch(url, { ...init, dispatcher });
  };

  /**
   * Close every dispatcher and forget them.
   */
  async close(): Promise<void> {
    const pending = [...this.dispatchers.values()];
    this.dispatchers.clear();
    const settled = await Promise.allSettled(pending);
    await Promise.all(
      settled.map((result) =>
        result.status === 'fulfilled' && result.value ? result.value.close() : Promise.resolve()
      )
    );
  }

  private async dispatcherFor(options: TransportOptions): Promise<Dispatcher | undefined> {
    const key = dispatcherKey(options);
    const cached = this.dispatchers.get(key);
    if (cached) {
      return cached;
    }

    const pending = createDispatcher(options);
    this.dispatchers.set(key, pending);
    try {
      return await pending;
    } catch (error) {
      this.dispatchers.delete(key);
      throw error;
    }
  }
}

/** Pool behind {@link createHttpTransport} */
export const defaultTransportPool = new HttpTransportPool();

/**
 * Build the fetch function for a transport selection from the default pool.
 *
 * @throws {ConfigurationError} For an unknown transport type
 */
export const createHttpTransport: TransportFactory = (options) => defaultTransportPool.createTransport(options);
