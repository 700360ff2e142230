import { describe, it, expect } from 'vitest';
import {
  tokenObjectLocation,
  tokenShardContainers,
  validateName,
} from '../../../src/identity/reserved-layout.js';
import { resolveGroups, parseTokenRecord, parseServices } from '../../../src/identity/identity-types.js';

describe('reserved account layout', () => {
  it('shards tokens over sixteen containers', () => {
    const shards = tokenShardContainers();
    expect(shards).toHaveLength(16);
    expect(shards[0]).toBe('.token_0');
    expect(shards[15]).toBe('.token_f');
  });

  it('names token objects by a salted sha512 of the token', () => {
    const location = tokenObjectLocation('AUTH_tk0123', 'AUTH_.auth');
    expect(location.name).toMatch(/^[0-9a-f]{128}$/);
    expect(location.name).not.toContain('AUTH_tk0123');
    expect(location.container).toBe(`.token_${location.name.slice(-1)}`);
  });

  it('gives different locations for different salts', () => {
    const a = tokenObjectLocation('AUTH_tk0123', 'one');
    const b = tokenObjectLocation('AUTH_tk0123', 'two');
    expect(a.name).not.toBe(b.name);
  });

  describe('validateName', () => {
    it('accepts ordinary names', () => {
      expect(() => validateName('account', 'acme')).not.toThrow();
      expect(() => validateName('user', 'bob.smith')).not.toThrow();
    });

    it.each([
      ['', 'must not be empty'],
      ['.hidden', 'must not start with "."'],
      ['a/b', 'must not contain "/"'],
      ['a:b', 'must not contain ":"'],
      ['x'.repeat(257), 'must be at most 256 characters'],
    ])('rejects %j', (name, problem) => {
      expect(() => validateName('group', name)).toThrow(`Invalid group name "${name}": ${problem}`);
    });
  });
});

describe('identity records', () => {
  it('replaces .admin with the account id', () => {
    expect(
      resolveGroups([{ name: 'acme:alice' }, { name: 'acme' }, { name: '.admin' }], 'AUTH_acme'),
    ).toEqual(['acme:alice', 'acme', 'AUTH_acme']);
  });

  it('leaves non-admin groups untouched', () => {
    expect(resolveGroups([{ name: 'acme:bob' }, { name: 'acme' }, { name: 'ops' }], 'AUTH_acme')).toEqual([
      'acme:bob',
      'acme',
      'ops',
    ]);
  });

  it('parses token records and rejects incomplete ones', () => {
    const record = {
      account: 'acme',
      user: 'bob',
      accountId: 'AUTH_acme',
      groups: [{ name: 'acme:bob' }],
      expiresAt: 42,
    };
    expect(parseTokenRecord(record)).toEqual(record);
    expect(parseTokenRecord({ ...record, expiresAt: '42' })).toBeNull();
    expect(parseTokenRecord({ ...record, groups: ['acme:bob'] })).toBeNull();
    expect(parseTokenRecord(null)).toBeNull();
  });

  it('parses services as nested string maps', () => {
    expect(parseServices({ storage: { default: 'local', local: 'http://x/v1/AUTH_a' } })).toEqual({
      storage: { default: 'local', local: 'http://x/v1/AUTH_a' },
    });
    expect(parseServices({ storage: { local: 7 } })).toBeNull();
    expect(parseServices([])).toBeNull();
  });
});
