import { randomUUID } from 'node:crypto';
import type { BackingStore } from '../backing/backing-store.js';
import { ErrorCode, StorewardError } from '../errors.js';
import { parseJson } from '../json.js';
import { describeError, logger as rootLogger, type Logger } from '../logger.js';
import {
  resolveGroups,
  parseTokenRecord,
  type GroupEntry,
  type IssuedToken,
  type ResolvedIdentity,
  type TokenRecord,
  type TokenValidation,
} from './identity-types.js';
import { MAX_TOKEN_LENGTH, tokenObjectLocation } from './reserved-layout.js';
import type { ValidationCache } from './validation-cache.js';

const DEFAULT_TOKEN_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours
const MAX_ISSUE_ATTEMPTS = 5;

export interface TokenSubject {
  readonly account: string;
  readonly user: string;
  readonly accountId: string;
  readonly groups: readonly GroupEntry[];
}

export interface TokenManagerOptions {
  readonly backing: BackingStore;
  readonly cache: ValidationCache<ResolvedIdentity>;
  readonly resellerPrefix: string;
  /** Default token lifetime. Default: 24 hours. */
  readonly tokenTtlMs?: number;
  /** Mixed into token object names. Default: the reserved account name. */
  readonly tokenObjectSalt?: string;
  readonly generateToken?: () => string;
  readonly now?: () => number;
  readonly logger?: Logger;
}

// ── TokenManager ─────────────────────────────────────────────────

export class TokenManager {
  readonly #backing: BackingStore;
  readonly #cache: ValidationCache<ResolvedIdentity>;
  readonly #resellerPrefix: string;
  readonly #tokenTtlMs: number;
  readonly #salt: string;
  readonly #generate: () => string;
  readonly #now: () => number;
  readonly #log: Logger;

  constructor(options: TokenManagerOptions) {
    this.#backing = options.backing;
    this.#cache = options.cache;
    this.#resellerPrefix = options.resellerPrefix;
    this.#tokenTtlMs = options.tokenTtlMs ?? DEFAULT_TOKEN_TTL_MS;
    this.#salt = options.tokenObjectSalt ?? options.backing.accountName;
    this.#generate =
      options.generateToken ??
      (() => `${this.#resellerPrefix}tk${randomUUID().replace(/-/g, '')}`);
    this.#now = options.now ?? (() => Date.now());
    this.#log = (options.logger ?? rootLogger).child({ module: 'token-manager' });
  }

  get tokenTtlMs(): number {
    return this.#tokenTtlMs;
  }

  /** Tokens outside the reseller namespace belong to some other auth system. */
  ownsToken(token: string): boolean {
    return token.startsWith(this.#resellerPrefix) && token.length <= MAX_TOKEN_LENGTH;
  }

  async issueToken(subject: TokenSubject, options: { ttlMs?: number } = {}): Promise<IssuedToken> {
    const expiresAt = this.#now() + (options.ttlMs ?? this.#tokenTtlMs);
    const record: TokenRecord = {
      account: subject.account,
      user: subject.user,
      accountId: subject.accountId,
      groups: subject.groups.map((group) => ({ name: group.name })),
      expiresAt,
    };
    const body = JSON.stringify(record);

    for (let attempt = 1; attempt <= MAX_ISSUE_ATTEMPTS; attempt++) {
      const token = this.#generate();
      const location = tokenObjectLocation(token, this.#salt);

      if (await this.#createRecord(location.container, location.name, body)) {
        return { token, expiresAt };
      }
      this.#log.warn('Token collision, retrying', { attempt });
    }

    throw new StorewardError(ErrorCode.INTERNAL_ERROR, 'Could not allocate a unique token', {
      attempts: MAX_ISSUE_ATTEMPTS,
    });
  }

  /**
   * Resolves a token to an identity. Consults the cache first; expired
   * records found in the backing store are deleted on the way out and
   * leave a cached tombstone, so the token keeps answering 'expired'
   * after its record is gone.
   */
  async validateToken(token: string): Promise<TokenValidation> {
    if (!this.ownsToken(token)) return { status: 'invalid' };

    const cached = this.#cache.lookup(token);
    if (cached !== undefined) {
      if (cached.expiresAt > this.#now()) return { status: 'valid', identity: cached };
      return { status: 'expired' };
    }

    const ticket = this.#cache.beginLoad(token);
    const record = await this.readTokenRecord(token);
    if (record === null) return { status: 'invalid' };

    const identity: ResolvedIdentity = {
      account: record.account,
      user: record.user,
      accountId: record.accountId,
      groups: resolveGroups(record.groups, record.accountId),
      expiresAt: record.expiresAt,
    };

    if (record.expiresAt <= this.#now()) {
      await this.#deleteExpired(token);
      this.#cache.insert(token, identity);
      return { status: 'expired' };
    }

    this.#cache.insert(token, identity, {
      ticket,
      notAfter: record.expiresAt,
      identity: { account: record.account, user: record.user },
    });
    return { status: 'valid', identity };
  }

  /** Raw stored record, expired or not. */
  async readTokenRecord(token: string): Promise<TokenRecord | null> {
    if (!this.ownsToken(token)) return null;
    const location = tokenObjectLocation(token, this.#salt);
    const object = await this.#backing.getObject(location.container, location.name);
    if (object === null) return null;

    const record = parseTokenRecord(parseJson(object.body));
    if (record === null) {
      this.#log.warn('Unreadable token record', { container: location.container });
    }
    return record;
  }

  /** Deletes the record, then drops it from the cache. */
  async revokeToken(token: string): Promise<boolean> {
    if (!this.ownsToken(token)) return false;
    const location = tokenObjectLocation(token, this.#salt);
    const deleted = await this.#backing.deleteObject(location.container, location.name);
    this.#cache.invalidate(token);
    return deleted;
  }

  // ── Internals ──────────────────────────────────────────────────

  async #createRecord(container: string, name: string, body: string): Promise<boolean> {
    try {
      return await this.#backing.putObject(container, name, body, { ifNoneMatch: true });
    } catch (error) {
      if (!(error instanceof StorewardError) || error.code !== ErrorCode.NOT_FOUND) throw error;
    }
    // Shard container missing (store never prepared); create it once.
    await this.#backing.createContainer(container);
    return this.#backing.putObject(container, name, body, { ifNoneMatch: true });
  }

  async #deleteExpired(token: string): Promise<void> {
    try {
      await this.revokeToken(token);
    } catch (error) {
      // The caller already gets 'expired'; the record goes on the next attempt.
      this.#log.warn('Failed to delete expired token', describeError(error));
    }
  }
}
