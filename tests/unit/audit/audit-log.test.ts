import { describe, it, expect, vi } from 'vitest';
import { AuditLog } from '../../../src/audit/audit-log.js';
import type { AuditEntry } from '../../../src/audit/audit-types.js';

// ── Helpers ──────────────────────────────────────────────────────

function entry(overrides?: Partial<AuditEntry>): AuditEntry {
  return {
    timestamp: 1_000,
    surface: 'auth',
    userId: 'acme:alice',
    method: 'GET',
    path: '/auth/v1.0',
    status: 200,
    remoteAddress: '127.0.0.1',
    durationMs: 3,
    ...overrides,
  };
}

function paths(entries: readonly AuditEntry[]): string[] {
  return entries.map((e) => e.path);
}

// ── Tests ────────────────────────────────────────────────────────

describe('AuditLog', () => {
  describe('append', () => {
    it('starts empty', () => {
      expect(new AuditLog().size).toBe(0);
    });

    it('increments size', () => {
      const log = new AuditLog();
      log.append(entry());
      log.append(entry());
      expect(log.size).toBe(2);
    });

    it('calls onEntry callback', () => {
      const onEntry = vi.fn();
      const log = new AuditLog({ onEntry });
      const e = entry();
      log.append(e);
      expect(onEntry).toHaveBeenCalledOnce();
      expect(onEntry).toHaveBeenCalledWith(e);
    });
  });

  // ── Ring buffer overflow ──────────────────────────────────────

  describe('ring buffer', () => {
    it('overwrites oldest entries when maxEntries exceeded', () => {
      const log = new AuditLog({ maxEntries: 3 });
      for (const path of ['/a', '/b', '/c', '/d']) log.append(entry({ path }));

      expect(log.size).toBe(3);
      expect(paths(log.query())).toEqual(['/d', '/c', '/b']);
    });

    it('handles double overflow correctly', () => {
      const log = new AuditLog({ maxEntries: 2 });
      for (const path of ['/a', '/b', '/c', '/d', '/e']) log.append(entry({ path }));

      expect(log.size).toBe(2);
      expect(paths(log.query())).toEqual(['/e', '/d']);
    });

    it('keeps at least one entry', () => {
      const log = new AuditLog({ maxEntries: 0 });
      log.append(entry({ path: '/a' }));
      log.append(entry({ path: '/b' }));
      expect(paths(log.query())).toEqual(['/b']);
    });
  });

  // ── query ─────────────────────────────────────────────────────

  describe('query', () => {
    it('returns empty array when no entries', () => {
      expect(new AuditLog().query()).toEqual([]);
    });

    it('filters by userId', () => {
      const log = new AuditLog();
      log.append(entry({ userId: 'acme:alice', path: '/a' }));
      log.append(entry({ userId: null, path: '/b' }));
      log.append(entry({ userId: 'acme:alice', path: '/c' }));

      expect(paths(log.query({ userId: 'acme:alice' }))).toEqual(['/c', '/a']);
    });

    it('filters by surface', () => {
      const log = new AuditLog();
      log.append(entry({ surface: 'auth', path: '/auth/v1.0' }));
      log.append(entry({ surface: 'storage', path: '/v1/AUTH_acme' }));

      expect(paths(log.query({ surface: 'storage' }))).toEqual(['/v1/AUTH_acme']);
    });

    it('filters by method, ignoring case', () => {
      const log = new AuditLog();
      log.append(entry({ method: 'PUT', path: '/a' }));
      log.append(entry({ method: 'GET', path: '/b' }));

      expect(paths(log.query({ method: 'put' }))).toEqual(['/a']);
    });

    it('filters by minimum status', () => {
      const log = new AuditLog();
      log.append(entry({ status: 200, path: '/a' }));
      log.append(entry({ status: 401, path: '/b' }));
      log.append(entry({ status: 503, path: '/c' }));

      expect(paths(log.query({ minStatus: 400 }))).toEqual(['/c', '/b']);
    });

    it('filters by from + to range', () => {
      const log = new AuditLog();
      for (const timestamp of [1000, 2000, 3000, 4000]) {
        log.append(entry({ timestamp, path: `/${timestamp}` }));
      }

      expect(paths(log.query({ from: 2000, to: 3000 }))).toEqual(['/3000', '/2000']);
      expect(log.query({ from: 2000 })).toHaveLength(3);
      expect(log.query({ to: 2000 })).toHaveLength(2);
    });

    it('limit applies after filter', () => {
      const log = new AuditLog();
      log.append(entry({ status: 401, path: '/a' }));
      log.append(entry({ status: 200, path: '/b' }));
      log.append(entry({ status: 403, path: '/c' }));
      log.append(entry({ status: 401, path: '/d' }));

      expect(paths(log.query({ minStatus: 400, limit: 2 }))).toEqual(['/d', '/c']);
    });

    it('query with limit larger than size returns all entries', () => {
      const log = new AuditLog();
      log.append(entry());
      log.append(entry());
      expect(log.query({ limit: 100 })).toHaveLength(2);
    });
  });
});
