import { describe, it, expect } from 'vitest';
import {
  resolveConfig,
  normalizeAuthPrefix,
  normalizeResellerPrefix,
  parseCluster,
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_NAME,
  DEFAULT_MAX_BODY_BYTES,
} from '../../src/config.js';
import { ConfigurationError } from '../../src/errors.js';

// ---------------------------------------------------------------------------
// Default constants
// ---------------------------------------------------------------------------

describe('config defaults', () => {
  it('has correct default port', () => {
    expect(DEFAULT_PORT).toBe(8081);
  });

  it('has correct default host', () => {
    expect(DEFAULT_HOST).toBe('0.0.0.0');
  });

  it('has correct default name', () => {
    expect(DEFAULT_NAME).toBe('storeward');
  });

  it('buffers at most 64 MiB of an auth request body', () => {
    expect(DEFAULT_MAX_BODY_BYTES).toBe(67_108_864);
  });
});

// ---------------------------------------------------------------------------
// resolveConfig
// ---------------------------------------------------------------------------

describe('resolveConfig', () => {
  it('applies all defaults', () => {
    const resolved = resolveConfig({ upstream: 'http://127.0.0.1:8080/' });

    expect(resolved).toMatchObject({
      upstream: 'http://127.0.0.1:8080',
      backend: { kind: 'http' },
      storageEndpoint: 'http://127.0.0.1:8080/v1',
      port: 8081,
      host: '0.0.0.0',
      name: 'storeward',
      superAdminKey: null,
      authType: 'plaintext',
      tokenLifeMs: 86_400_000,
      maxTokenLifeMs: 86_400_000,
      cacheTtlMs: 300_000,
      resellerPrefix: 'AUTH_',
      reservedAccountName: 'AUTH_.auth',
      authPrefix: '/auth/',
      tokenHeader: 'x-auth-token',
      cluster: {
        name: 'local',
        publicUrl: 'http://127.0.0.1:8080/v1',
        internalUrl: 'http://127.0.0.1:8080/v1',
      },
      backendTimeoutMs: 10_000,
      backendMaxConcurrent: 32,
      tokenObjectSalt: 'AUTH_.auth',
      provisionAccounts: true,
      rateLimit: null,
      loginRateLimit: {},
      audit: null,
      maxBodyBytes: 67_108_864,
    });
  });

  it('converts seconds to milliseconds', () => {
    const resolved = resolveConfig({
      upstream: 'http://s.test',
      tokenLife: 60,
      maxTokenLife: 600,
      cacheTtl: 5,
      backendTimeout: 2,
    });
    expect(resolved.tokenLifeMs).toBe(60_000);
    expect(resolved.maxTokenLifeMs).toBe(600_000);
    expect(resolved.cacheTtlMs).toBe(5_000);
    expect(resolved.backendTimeoutMs).toBe(2_000);
  });

  it('derives the reserved account from the reseller prefix', () => {
    const resolved = resolveConfig({ upstream: 'http://s.test', resellerPrefix: 'KEY' });
    expect(resolved.resellerPrefix).toBe('KEY_');
    expect(resolved.reservedAccountName).toBe('KEY_.auth');
    expect(resolved.tokenObjectSalt).toBe('KEY_.auth');
  });

  it('uses an explicit backend endpoint', () => {
    const resolved = resolveConfig({
      upstream: 'http://proxy.test',
      backend: { kind: 'http', endpoint: 'http://internal.test:8080/v1/' },
    });
    expect(resolved.storageEndpoint).toBe('http://internal.test:8080/v1');
  });

  it('reaches the cluster on its internal URL', () => {
    const resolved = resolveConfig({
      upstream: 'http://proxy.test',
      defaultCluster: 'dc#https://pub.test/v1#http://10.0.0.5:8080/v1',
    });
    expect(resolved.storageEndpoint).toBe('http://10.0.0.5:8080/v1');
    expect(resolved.cluster.publicUrl).toBe('https://pub.test/v1');
  });

  it('prefers an explicit backend endpoint over the cluster', () => {
    const resolved = resolveConfig({
      upstream: 'http://proxy.test',
      defaultCluster: 'dc#https://pub.test/v1#http://10.0.0.5:8080/v1',
      backend: { kind: 'http', endpoint: 'http://internal.test:8080/v1' },
    });
    expect(resolved.storageEndpoint).toBe('http://internal.test:8080/v1');
  });

  it('lowercases the token header', () => {
    expect(resolveConfig({ upstream: 'http://s.test', tokenHeader: 'X-Custom-Token' }).tokenHeader).toBe(
      'x-custom-token',
    );
  });

  it('rejects a relative upstream', () => {
    expect(() => resolveConfig({ upstream: '/storage' })).toThrow('upstream must be an absolute URL');
  });

  it('rejects non-positive durations', () => {
    expect(() => resolveConfig({ upstream: 'http://s.test', tokenLife: 0 })).toThrow(
      'tokenLife must be a positive number',
    );
    expect(() => resolveConfig({ upstream: 'http://s.test', cacheTtl: Number.NaN })).toThrow(ConfigurationError);
  });

  it('rejects an empty super admin key', () => {
    expect(() => resolveConfig({ upstream: 'http://s.test', superAdminKey: '' })).toThrow(
      'superAdminKey must not be empty',
    );
  });
});

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

describe('normalizeResellerPrefix', () => {
  it('adds the trailing underscore', () => {
    expect(normalizeResellerPrefix('AUTH')).toBe('AUTH_');
    expect(normalizeResellerPrefix('AUTH_')).toBe('AUTH_');
  });

  it('keeps the empty prefix', () => {
    expect(normalizeResellerPrefix('')).toBe('');
  });
});

describe('normalizeAuthPrefix', () => {
  it('adds leading and trailing slashes', () => {
    expect(normalizeAuthPrefix('auth')).toBe('/auth/');
    expect(normalizeAuthPrefix('/auth')).toBe('/auth/');
    expect(normalizeAuthPrefix('/auth/')).toBe('/auth/');
  });

  it('rejects the root', () => {
    expect(() => normalizeAuthPrefix('/')).toThrow('authPrefix must name a path segment');
  });
});

describe('parseCluster', () => {
  it('reads name#url', () => {
    expect(parseCluster('local#http://s.test/v1/')).toEqual({
      name: 'local',
      publicUrl: 'http://s.test/v1',
      internalUrl: 'http://s.test/v1',
    });
  });

  it('reads separate public and internal URLs', () => {
    expect(parseCluster('dc1#https://public.test/v1#http://10.0.0.5:8080/v1')).toEqual({
      name: 'dc1',
      publicUrl: 'https://public.test/v1',
      internalUrl: 'http://10.0.0.5:8080/v1',
    });
  });

  it('rejects malformed values', () => {
    expect(() => parseCluster('http://s.test/v1')).toThrow(ConfigurationError);
    expect(() => parseCluster('#http://s.test/v1')).toThrow(ConfigurationError);
    expect(() => parseCluster('a#b#c#d')).toThrow(ConfigurationError);
    expect(() => parseCluster('local#not a url')).toThrow('defaultCluster must be an absolute URL');
  });
});
