import { describe, it, expect, afterEach, vi } from 'vitest';
import { ValidationCache } from '../../../src/identity/validation-cache.js';

function clock(start = 1_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

describe('ValidationCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  // ── TTL ───────────────────────────────────────────────────────

  describe('lifetime', () => {
    it('serves an entry until its TTL elapses', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 1000, now: time.now });

      expect(cache.insert('k', 'v')).toBe(true);
      time.advance(999);
      expect(cache.lookup('k')).toBe('v');
      time.advance(1);
      expect(cache.lookup('k')).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it('never outlives notAfter', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 10_000, now: time.now });

      cache.insert('k', 'v', { notAfter: time.now() + 500 });
      time.advance(500);
      expect(cache.lookup('k')).toBeUndefined();
    });

    it('refuses entries whose lifetime is already over', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 1000, now: time.now });

      expect(cache.insert('k', 'v', { notAfter: time.now() })).toBe(false);
      expect(cache.lookup('k')).toBeUndefined();
    });

    it('honours a per-entry TTL', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 1000, now: time.now });

      cache.insert('k', 'v', { ttlMs: 5000 });
      time.advance(4000);
      expect(cache.lookup('k')).toBe('v');
    });
  });

  // ── Invalidation ──────────────────────────────────────────────

  describe('invalidation', () => {
    it('invalidate removes a single key', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      cache.insert('a', '1');
      cache.insert('b', '2');

      cache.invalidate('a');
      expect(cache.lookup('a')).toBeUndefined();
      expect(cache.lookup('b')).toBe('2');
    });

    it('invalidateByIdentity removes every entry bound to the identity', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      const bob = { account: 'acme', user: 'bob' };
      cache.insert('token-1', 'x', { identity: bob });
      cache.insert('token-2', 'y', { identity: bob });
      cache.insert('token-3', 'z', { identity: { account: 'acme', user: 'carol' } });

      expect(cache.invalidateByIdentity('acme', 'bob')).toBe(2);
      expect(cache.lookup('token-1')).toBeUndefined();
      expect(cache.lookup('token-2')).toBeUndefined();
      expect(cache.lookup('token-3')).toBe('z');
    });

    it('returns 0 for an identity with no entries', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      expect(cache.invalidateByIdentity('acme', 'nobody')).toBe(0);
    });
  });

  // ── Load tickets ──────────────────────────────────────────────

  describe('load tickets', () => {
    it('drops a load that raced with invalidate()', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      const ticket = cache.beginLoad('k');

      cache.invalidate('k');
      expect(cache.insert('k', 'stale', { ticket })).toBe(false);
      expect(cache.lookup('k')).toBeUndefined();
    });

    it('drops a load that raced with invalidateByIdentity()', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      const identity = { account: 'acme', user: 'bob' };
      const ticket = cache.beginLoad('token-1');

      cache.invalidateByIdentity('acme', 'bob');
      expect(cache.insert('token-1', 'stale', { ticket, identity })).toBe(false);
    });

    it('accepts a load when only other keys were invalidated', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      const ticket = cache.beginLoad('k');

      cache.invalidate('other');
      cache.invalidateByIdentity('acme', 'carol');
      expect(
        cache.insert('k', 'fresh', { ticket, identity: { account: 'acme', user: 'bob' } }),
      ).toBe(true);
      expect(cache.lookup('k')).toBe('fresh');
    });

    it('drops a load that raced with clear()', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      const ticket = cache.beginLoad('k');

      cache.clear();
      expect(cache.insert('k', 'stale', { ticket })).toBe(false);
    });

    it('drops loads that took longer than a minute', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 120_000, now: time.now });
      const ticket = cache.beginLoad('k');

      time.advance(60_001);
      expect(cache.insert('k', 'slow', { ticket })).toBe(false);
    });
  });

  // ── Capacity & sweeping ───────────────────────────────────────

  describe('capacity', () => {
    it('evicts the oldest entry beyond maxEntries', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000, maxEntries: 2 });
      cache.insert('a', '1');
      cache.insert('b', '2');
      cache.insert('c', '3');

      expect(cache.size).toBe(2);
      expect(cache.lookup('a')).toBeUndefined();
      expect(cache.lookup('b')).toBe('2');
      expect(cache.lookup('c')).toBe('3');
    });

    it('sweep removes expired entries', () => {
      const time = clock();
      const cache = new ValidationCache<string>({ ttlMs: 1000, now: time.now });
      cache.insert('a', '1');
      cache.insert('b', '2', { ttlMs: 5000 });

      time.advance(2000);
      expect(cache.sweep()).toBe(1);
      expect(cache.size).toBe(1);
    });

    it('runs the sweeper on an interval until stopped', () => {
      vi.useFakeTimers();
      const cache = new ValidationCache<string>({ ttlMs: 1000, sweepIntervalMs: 500 });
      cache.insert('a', '1');

      vi.advanceTimersByTime(1500);
      expect(cache.size).toBe(0);

      cache.stop();
      cache.insert('b', '2');
      vi.advanceTimersByTime(5000);
      expect(cache.size).toBe(1);
    });

    it('clear empties the cache', () => {
      const cache = new ValidationCache<string>({ ttlMs: 1000 });
      cache.insert('a', '1', { identity: { account: 'acme', user: 'bob' } });
      cache.clear();
      expect(cache.size).toBe(0);
      expect(cache.invalidateByIdentity('acme', 'bob')).toBe(0);
    });
  });
});
