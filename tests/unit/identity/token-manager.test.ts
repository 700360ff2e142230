import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Store } from '@hamicek/noex-store';
import type { EmbeddedBackingStore } from '../../../src/backing/embedded-backing-store.js';
import { TokenManager, type TokenSubject } from '../../../src/identity/token-manager.js';
import { ValidationCache } from '../../../src/identity/validation-cache.js';
import type { ResolvedIdentity } from '../../../src/identity/identity-types.js';
import { tokenObjectLocation, tokenShardContainers } from '../../../src/identity/reserved-layout.js';
import { StorewardError } from '../../../src/errors.js';
import { RESERVED, silentLogger, startBacking } from '../../fixtures.js';

const ALICE: TokenSubject = {
  account: 'acme',
  user: 'alice',
  accountId: 'AUTH_acme',
  groups: [{ name: 'acme:alice' }, { name: 'acme' }, { name: '.admin' }],
};

describe('TokenManager', () => {
  let store: Store;
  let backing: EmbeddedBackingStore;
  let now: number;
  let cache: ValidationCache<ResolvedIdentity>;

  function createManager(generateToken?: () => string): TokenManager {
    return new TokenManager({
      backing,
      cache,
      resellerPrefix: 'AUTH_',
      tokenTtlMs: 60_000,
      now: () => now,
      logger: silentLogger(),
      ...(generateToken !== undefined ? { generateToken } : {}),
    });
  }

  beforeEach(async () => {
    ({ store, backing } = await startBacking());
    now = 1_700_000_000_000;
    cache = new ValidationCache<ResolvedIdentity>({ ttlMs: 30_000, now: () => now });
  });

  afterEach(async () => {
    cache.stop();
    await store.stop();
  });

  // ── Issuing ───────────────────────────────────────────────────

  describe('issueToken', () => {
    it('issues prefixed tokens with the default lifetime', async () => {
      const tokens = createManager();
      const issued = await tokens.issueToken(ALICE);

      expect(issued.token).toMatch(/^AUTH_tk[0-9a-f]{32}$/);
      expect(issued.expiresAt).toBe(now + 60_000);
    });

    it('stores the record under the hashed token name', async () => {
      const tokens = createManager(() => 'AUTH_tkfixed');
      await tokens.issueToken(ALICE, { ttlMs: 5000 });

      const location = tokenObjectLocation('AUTH_tkfixed', RESERVED);
      const object = await backing.getObject(location.container, location.name);
      expect(object).not.toBeNull();
      expect(JSON.parse(object?.body ?? '')).toEqual({
        account: 'acme',
        user: 'alice',
        accountId: 'AUTH_acme',
        groups: [{ name: 'acme:alice' }, { name: 'acme' }, { name: '.admin' }],
        expiresAt: now + 5000,
      });
    });

    it('creates a missing shard container on first use', async () => {
      const tokens = createManager(() => 'AUTH_tkfixed');
      const location = tokenObjectLocation('AUTH_tkfixed', RESERVED);
      expect(await backing.headContainer(location.container)).toBeNull();

      await tokens.issueToken(ALICE);
      expect(await backing.headContainer(location.container)).not.toBeNull();
    });

    it('hands out distinct tokens under concurrent issuance', async () => {
      const tokens = createManager();
      const issued = await Promise.all(
        Array.from({ length: 1000 }, (_, i) => tokens.issueToken({ ...ALICE, user: `user${i}` })),
      );

      expect(new Set(issued.map((entry) => entry.token)).size).toBe(1000);
    }, 20_000);

    it('retries on collision with a fresh token', async () => {
      const sequence = ['AUTH_tkdup', 'AUTH_tkdup', 'AUTH_tknew'];
      let i = 0;
      const tokens = createManager(() => sequence[i++] ?? 'AUTH_tkexhausted');

      expect((await tokens.issueToken(ALICE)).token).toBe('AUTH_tkdup');
      expect((await tokens.issueToken(ALICE)).token).toBe('AUTH_tknew');
    });

    it('gives up after five collisions', async () => {
      const tokens = createManager(() => 'AUTH_tksame');
      await tokens.issueToken(ALICE);

      await expect(tokens.issueToken(ALICE)).rejects.toMatchObject({
        code: 'INTERNAL_ERROR',
        message: 'Could not allocate a unique token',
        details: { attempts: 5 },
      });
    });
  });

  // ── Validation ────────────────────────────────────────────────

  describe('validateToken', () => {
    beforeEach(async () => {
      for (const shard of tokenShardContainers()) await backing.createContainer(shard);
    });

    it('resolves a valid token to its identity', async () => {
      const tokens = createManager();
      const { token } = await tokens.issueToken(ALICE);

      expect(await tokens.validateToken(token)).toEqual({
        status: 'valid',
        identity: {
          account: 'acme',
          user: 'alice',
          accountId: 'AUTH_acme',
          groups: ['acme:alice', 'acme', 'AUTH_acme'],
          expiresAt: now + 60_000,
        },
      });
    });

    it('answers repeat validations from the cache', async () => {
      const tokens = createManager();
      const { token } = await tokens.issueToken(ALICE);
      const getObject = vi.spyOn(backing, 'getObject');

      await tokens.validateToken(token);
      await tokens.validateToken(token);
      expect(getObject).toHaveBeenCalledTimes(1);
    });

    it('rejects tokens outside the reseller namespace without a lookup', async () => {
      const tokens = createManager();
      const getObject = vi.spyOn(backing, 'getObject');

      expect(await tokens.validateToken('OTHER_tk123')).toEqual({ status: 'invalid' });
      expect(await tokens.validateToken(`AUTH_${'x'.repeat(300)}`)).toEqual({ status: 'invalid' });
      expect(getObject).not.toHaveBeenCalled();
    });

    it('reports unknown tokens as invalid', async () => {
      const tokens = createManager();
      expect(await tokens.validateToken('AUTH_tkunknown')).toEqual({ status: 'invalid' });
    });

    it('deletes an expired record and keeps reporting expiry', async () => {
      const tokens = createManager(() => 'AUTH_tkshort');
      await tokens.issueToken(ALICE, { ttlMs: 1000 });
      expect((await tokens.validateToken('AUTH_tkshort')).status).toBe('valid');

      now += 1000;
      expect(await tokens.validateToken('AUTH_tkshort')).toEqual({ status: 'expired' });
      expect(await tokens.readTokenRecord('AUTH_tkshort')).toBeNull();
      expect(await tokens.validateToken('AUTH_tkshort')).toEqual({ status: 'expired' });

      // The tombstone lives for one cache TTL.
      now += 30_000;
      expect(await tokens.validateToken('AUTH_tkshort')).toEqual({ status: 'invalid' });
    });

    it('still reports expiry when the lazy delete fails', async () => {
      const tokens = createManager(() => 'AUTH_tkshort');
      await tokens.issueToken(ALICE, { ttlMs: 1000 });
      now += 2000;
      vi.spyOn(backing, 'deleteObject').mockRejectedValueOnce(new Error('disk full'));

      expect(await tokens.validateToken('AUTH_tkshort')).toEqual({ status: 'expired' });
      expect(await tokens.readTokenRecord('AUTH_tkshort')).not.toBeNull();
    });

    it('propagates backing-store failures', async () => {
      const tokens = createManager();
      vi.spyOn(backing, 'getObject').mockRejectedValueOnce(
        new StorewardError('BACKEND_UNAVAILABLE', 'down'),
      );
      await expect(tokens.validateToken('AUTH_tkany')).rejects.toMatchObject({
        code: 'BACKEND_UNAVAILABLE',
      });
    });
  });

  // ── Revocation ────────────────────────────────────────────────

  describe('revokeToken', () => {
    it('deletes the record and the cached identity', async () => {
      const tokens = createManager();
      const { token } = await tokens.issueToken(ALICE);
      await tokens.validateToken(token);
      expect(cache.size).toBe(1);

      expect(await tokens.revokeToken(token)).toBe(true);
      expect(cache.size).toBe(0);
      expect(await tokens.validateToken(token)).toEqual({ status: 'invalid' });
      expect(await tokens.revokeToken(token)).toBe(false);
    });

    it('ignores tokens it does not own', async () => {
      const tokens = createManager();
      expect(await tokens.revokeToken('OTHER_tk1')).toBe(false);
    });
  });
});
