import { mkdtemp, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  HttpTransportPool,
  createHttpTransport,
  loadCaCertificates,
  proxyAuthorizationToken,
  resolveCaBundlePath,
} from '../transport.js';
import { MapSettingsProvider } from '../config.js';
import { CredentialResolver } from '../resolver.js';
import { InMemorySessionRegistry } from '../../context/index.js';
import { ConfigurationError } from '../../errors/index.js';
import { BlobFileSystem } from '../../filesystem/index.js';
import { InMemoryBlobService } from '../../simulation/index.js';

const CERTIFICATE = '-----BEGIN CERTIFICATE-----\nMIIBtest\n-----END CERTIFICATE-----\n';

describe('resolveCaBundlePath', () => {
  it('should prefer the explicit override', async () => {
    const path = await resolveCaBundlePath({
      caBundlePath: '/opt/certs/bundle.pem',
      env: { CURL_CA_INFO: '/etc/env-bundle.pem' },
    });

    expect(path).toBe('/opt/certs/bundle.pem');
  });

  it('should read CURL_CA_INFO next', async () => {
    expect(await resolveCaBundlePath({ env: { CURL_CA_INFO: '/etc/env-bundle.pem' }, platform: 'linux' })).toBe(
      '/etc/env-bundle.pem'
    );
  });

  it('should not probe well-known paths on macOS and Windows', async () => {
    expect(await resolveCaBundlePath({ env: {}, platform: 'darwin' })).toBeUndefined();
    expect(await resolveCaBundlePath({ env: {}, platform: 'win32' })).toBeUndefined();
  });
});

describe('loadCaCertificates', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ca-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load the bundle and certificate files from CURL_CA_PATH', async () => {
    const bundle = join(dir, 'bundle.pem');
    const caDir = join(dir, 'certs');
    await writeFile(bundle, CERTIFICATE);
    await mkdir(caDir);
    await writeFile(join(caDir, 'a.pem'), CERTIFICATE.replace('test', 'aaaa'));
    await writeFile(join(caDir, 'README'), 'not a certificate');

    const certificates = await loadCaCertificates({
      caBundlePath: bundle,
      env: { CURL_CA_PATH: caDir },
      platform: 'darwin',
    });

    expect(certificates).toEqual([CERTIFICATE, CERTIFICATE.replace('test', 'aaaa')]);
  });

  it('should fail on an unreadable bundle', async () => {
    await expect(
      loadCaCertificates({ caBundlePath: join(dir, 'missing.pem'), env: {}, platform: 'darwin' })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should return nothing when no bundle is found', async () => {
    expect(await loadCaCertificates({ env: {}, platform: 'darwin' })).toEqual([]);
  });
});

describe('proxyAuthorizationToken', () => {
  it('should build basic credentials', () => {
    expect(proxyAuthorizationToken({ url: 'http://proxy:3128', userName: 'user', password: 'test-password' })).toBe(
      `Basic ${Buffer.from('user:test-password').toString('base64')}`
    );
    expect(proxyAuthorizationToken({ url: 'http://proxy:3128' })).toBeUndefined();
  });
});

describe('createHttpTransport', () => {
  it('should build fetch functions for both transports', async () => {
    const plain = await createHttpTransport({ type: 'default', env: {} });
    const proxied = await createHttpTransport({ type: 'default', proxy: { url: 'http://proxy.test:3128' } });
    const pinned = await createHttpTransport({ type: 'curl', env: {}, platform: 'darwin' });

    expect(typeof plain).toBe('function');
    expect(typeof proxied).toBe('function');
    expect(typeof pinned).toBe('function');
  });
});

describe('HttpTransportPool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pool-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create one dispatcher per transport selection', async () => {
    const pool = new HttpTransportPool();
    const bundle = join(dir, 'bundle.pem');
    await writeFile(bundle, CERTIFICATE);
    const curl = { type: 'curl' as const, caBundlePath: bundle, env: {}, platform: 'linux' as const };

    await pool.createTransport(curl);
    await rm(bundle);
    await pool.createTransport(curl);
    await pool.createTransport(curl);
    expect(pool.size).toBe(1);

    await pool.createTransport({ type: 'default', proxy: { url: 'http://proxy.test:3128' }, env: {} });
    await pool.createTransport({ type: 'default', proxy: { url: 'http://proxy.test:3128' }, env: {} });
    expect(pool.size).toBe(2);

    await pool.close();
    expect(pool.size).toBe(0);
  });

  it('should retry a selection whose dispatcher could not be created', async () => {
    const pool = new HttpTransportPool();
    const options = { type: 'curl' as const, caBundlePath: join(dir, 'missing.pem'), env: {}, platform: 'linux' as const };

    await expect(pool.createTransport(options)).rejects.toBeInstanceOf(ConfigurationError);
    expect(pool.size).toBe(0);
  });
});

describe('BlobFileSystem transports', () => {
  it('should reuse the dispatcher across opens without context caching', async () => {
    const pool = new HttpTransportPool();
    const service = new InMemoryBlobService();
    service.putBlob('data', 'blob.bin', 'abc');
    let transports = 0;
    const resolver = new CredentialResolver({
      env: {},
      transportFactory: async (options) => {
        transports++;
        await pool.createTransport(options);
        return service.fetch;
      },
    });
    const fs = new BlobFileSystem({ resolver });
    const opener = {
      settings: new MapSettingsProvider({
        azure_account_name: 'myaccount',
        azure_context_caching: false,
        azure_http_proxy: 'http://proxy.test:3128',
      }),
      session: new InMemorySessionRegistry(),
    };

    for (let i = 0; i < 3; i++) {
      await fs.openFile('az://data/blob.bin', { read: true }, opener);
    }

    expect(transports).toBe(3);
    expect(pool.size).toBe(1);
    await pool.close();
  });
});
