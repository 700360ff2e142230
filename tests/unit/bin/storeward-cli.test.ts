import { describe, it, expect } from 'vitest';
import { MemoryAdapter, FileAdapter, SQLiteAdapter } from '@hamicek/noex';
import { Store } from '@hamicek/noex-store';
import {
  mergeConfig,
  validateConfig,
  parseFileConfig,
  toStorewardConfig,
  createAdapter,
  SUPER_ADMIN_KEY_ENV,
  type CliValues,
  type FileConfig,
} from '../../../src/bin/storeward.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EMPTY_CLI: CliValues = {
  port: undefined,
  host: undefined,
  name: undefined,
  upstream: undefined,
  backend: undefined,
  backendEndpoint: undefined,
  persistence: undefined,
  dataDir: undefined,
  db: undefined,
  superAdminKey: undefined,
  authType: undefined,
  authTypeSalt: undefined,
  tokenLife: undefined,
  maxTokenLife: undefined,
  cacheTtl: undefined,
  resellerPrefix: undefined,
  authPrefix: undefined,
  defaultCluster: undefined,
  backendTimeout: undefined,
  noProvision: undefined,
  audit: undefined,
  logLevel: undefined,
};

const EMPTY_FILE: FileConfig = {};

function cli(overrides: Partial<CliValues>): CliValues {
  return { ...EMPTY_CLI, ...overrides };
}

// ---------------------------------------------------------------------------
// mergeConfig
// ---------------------------------------------------------------------------

describe('mergeConfig', () => {
  it('returns defaults when both CLI and file are empty', () => {
    const result = mergeConfig(EMPTY_CLI, EMPTY_FILE);

    expect(result).toMatchObject({
      port: 8081,
      host: '0.0.0.0',
      name: 'storeward',
      upstream: undefined,
      backend: 'http',
      persistence: 'memory',
      dataDir: './data',
      db: './storeward.db',
      superAdminKey: undefined,
      authType: 'plaintext',
      provisionAccounts: true,
      audit: false,
      logLevel: 'info',
    });
  });

  it('takes values from the file', () => {
    const result = mergeConfig(EMPTY_CLI, {
      port: 9000,
      upstream: 'http://storage.test',
      authType: 'sha1',
      provisionAccounts: false,
      rateLimit: { maxRequests: 10, windowMs: 1000 },
    });

    expect(result.port).toBe(9000);
    expect(result.upstream).toBe('http://storage.test');
    expect(result.authType).toBe('sha1');
    expect(result.provisionAccounts).toBe(false);
    expect(result.rateLimit).toEqual({ maxRequests: 10, windowMs: 1000 });
  });

  it('lets CLI flags override the file', () => {
    const result = mergeConfig(cli({ port: 7000, upstream: 'http://cli.test' }), {
      port: 9000,
      upstream: 'http://file.test',
    });

    expect(result.port).toBe(7000);
    expect(result.upstream).toBe('http://cli.test');
  });

  it('--no-provision wins over the file', () => {
    const result = mergeConfig(cli({ noProvision: true }), { provisionAccounts: true });
    expect(result.provisionAccounts).toBe(false);
  });

  it('reads the super admin key from the environment', () => {
    const env = { [SUPER_ADMIN_KEY_ENV]: 'env-secret' };

    expect(mergeConfig(EMPTY_CLI, { superAdminKey: 'file-secret' }, env).superAdminKey).toBe('env-secret');
    expect(mergeConfig(cli({ superAdminKey: 'cli-secret' }), EMPTY_FILE, env).superAdminKey).toBe(
      'cli-secret',
    );
    expect(mergeConfig(EMPTY_CLI, { superAdminKey: 'file-secret' }).superAdminKey).toBe('file-secret');
  });
});

// ---------------------------------------------------------------------------
// validateConfig
// ---------------------------------------------------------------------------

describe('validateConfig', () => {
  const valid = () => mergeConfig(cli({ upstream: 'http://storage.test' }), EMPTY_FILE);

  it('accepts a minimal config', () => {
    expect(validateConfig(valid())).toEqual([]);
  });

  it('requires an upstream', () => {
    expect(validateConfig(mergeConfig(EMPTY_CLI, EMPTY_FILE))).toEqual(['--upstream is required']);
  });

  it('rejects a relative upstream', () => {
    expect(validateConfig({ ...valid(), upstream: 'storage' })).toEqual([
      'Invalid upstream: storage (must be an absolute URL)',
    ]);
  });

  it('rejects a bad port', () => {
    expect(validateConfig({ ...valid(), port: 70000 })).toEqual([
      'Invalid port: 70000 (must be integer 0-65535)',
    ]);
    expect(validateConfig({ ...valid(), port: Number.NaN })).toHaveLength(1);
  });

  it('rejects unknown enum values', () => {
    const errors = validateConfig({
      ...valid(),
      backend: 'ftp',
      persistence: 'tape',
      authType: 'md5',
      logLevel: 'loud',
    });

    expect(errors).toEqual([
      'Unknown backend: ftp (must be http or embedded)',
      'Unknown persistence type: tape (must be memory, file, or sqlite)',
      'Unknown auth type: md5 (must be plaintext, sha1, sha512, or scrypt)',
      'Unknown log level: loud (must be debug, info, warn, or error)',
    ]);
  });

  it('rejects non-positive durations', () => {
    expect(validateConfig({ ...valid(), tokenLife: 0, cacheTtl: -5 })).toEqual([
      'Invalid --token-life: 0 (must be a positive number of seconds)',
      'Invalid --cache-ttl: -5 (must be a positive number of seconds)',
    ]);
  });

  it('rejects an empty super admin key', () => {
    expect(validateConfig({ ...valid(), superAdminKey: '' })).toEqual([
      '--super-admin-key must not be empty',
    ]);
  });
});

// ---------------------------------------------------------------------------
// parseFileConfig
// ---------------------------------------------------------------------------

describe('parseFileConfig', () => {
  it('accepts known fields', () => {
    const config = parseFileConfig({
      upstream: 'http://storage.test',
      port: 9000,
      audit: true,
      backendHeaders: { 'x-forwarded-proto': 'https' },
      loginRateLimit: { maxAttempts: 3 },
    });

    expect(config).toEqual({
      upstream: 'http://storage.test',
      port: 9000,
      audit: true,
      backendHeaders: { 'x-forwarded-proto': 'https' },
      loginRateLimit: { maxAttempts: 3 },
    });
  });

  it('ignores unknown fields', () => {
    expect(parseFileConfig({ comment: 'dev setup' })).toEqual({});
  });

  it('rejects a non-object', () => {
    expect(() => parseFileConfig([1, 2])).toThrow('Config file must contain a JSON object');
    expect(() => parseFileConfig('text')).toThrow('Config file must contain a JSON object');
  });

  it('lists every mistyped field', () => {
    expect(() =>
      parseFileConfig({ port: '8081', audit: 'yes', rateLimit: { maxRequests: 5 } }),
    ).toThrow('Invalid config field(s): port, audit, rateLimit');
  });
});

// ---------------------------------------------------------------------------
// toStorewardConfig
// ---------------------------------------------------------------------------

describe('toStorewardConfig', () => {
  it('builds an http backend config', () => {
    const resolved = mergeConfig(
      cli({ upstream: 'http://storage.test', tokenLife: 60, audit: true }),
      { backendEndpoint: 'http://internal.test/v1', backendHeaders: { 'x-a': '1' } },
    );

    expect(toStorewardConfig(resolved, null)).toEqual({
      upstream: 'http://storage.test',
      backend: { kind: 'http', endpoint: 'http://internal.test/v1', headers: { 'x-a': '1' } },
      port: 8081,
      host: '0.0.0.0',
      name: 'storeward',
      authType: 'plaintext',
      provisionAccounts: true,
      tokenLife: 60,
      audit: {},
    });
  });

  it('passes the store to the embedded backend', async () => {
    const store = await Store.start({ name: 'cli-test-store' });
    try {
      const resolved = mergeConfig(cli({ upstream: 'http://storage.test', backend: 'embedded' }), EMPTY_FILE);
      expect(toStorewardConfig(resolved, store).backend).toEqual({ kind: 'embedded', store });
    } finally {
      await store.stop();
    }
  });

  it('refuses the embedded backend without a store', () => {
    const resolved = mergeConfig(cli({ upstream: 'http://storage.test', backend: 'embedded' }), EMPTY_FILE);
    expect(() => toStorewardConfig(resolved, null)).toThrow('The embedded backend needs a store');
  });

  it('requires an upstream', () => {
    expect(() => toStorewardConfig(mergeConfig(EMPTY_CLI, EMPTY_FILE), null)).toThrow(
      '--upstream is required',
    );
  });
});

// ---------------------------------------------------------------------------
// createAdapter
// ---------------------------------------------------------------------------

describe('createAdapter', () => {
  const paths = { dataDir: './data', db: './storeward.db' };

  it('creates each persistence adapter', () => {
    expect(createAdapter('memory', paths)).toBeInstanceOf(MemoryAdapter);
    expect(createAdapter('file', paths)).toBeInstanceOf(FileAdapter);
    expect(createAdapter('sqlite', paths)).toBeInstanceOf(SQLiteAdapter);
  });

  it('throws for an unknown type', () => {
    expect(() => createAdapter('tape', paths)).toThrow('Unknown persistence type: tape');
  });
});
