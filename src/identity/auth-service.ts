import { createHash, timingSafeEqual } from 'node:crypto';
import type { AccountProvisioner } from '../backing/account-provisioner.js';
import type { BackingStore } from '../backing/backing-store.js';
import { ErrorCode, StorewardError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { createHasher, verifyCredentials, type AuthType, type CredentialHasher } from './credential-hasher.js';
import {
  ADMIN_GROUP,
  RESELLER_ADMIN_GROUP,
  SUPER_ADMIN_USER,
  hasGroup,
  type GroupEntry,
  type IssuedToken,
  type ResolvedIdentity,
  type ServiceEndpoints,
  type UserRecord,
} from './identity-types.js';
import { IdentityStore, type ClusterEndpoint } from './identity-store.js';
import { LoginRateLimiter, loginLimiterKeys, type LoginRateLimitConfig } from './login-rate-limiter.js';
import { TokenManager } from './token-manager.js';
import { ValidationCache } from './validation-cache.js';

// Issue-and-verify rounds before a login gives up with CONFLICT.
const MAX_LOGIN_ATTEMPTS = 3;

// ── Types ────────────────────────────────────────────────────────

export interface AuthServiceConfig {
  readonly resellerPrefix: string;
  readonly reservedAccountName: string;
  /** `null` disables the admin API and super admin logins. */
  readonly superAdminKey: string | null;
  readonly authType: AuthType;
  readonly authTypeSalt?: string;
  readonly tokenLifeMs: number;
  readonly maxTokenLifeMs: number;
  readonly cacheTtlMs: number;
  readonly cacheSweepIntervalMs?: number;
  readonly tokenObjectSalt?: string;
  readonly cluster: ClusterEndpoint;
  readonly loginRateLimit?: LoginRateLimitConfig;
}

export interface AuthServiceOptions {
  readonly backing: BackingStore;
  readonly config: AuthServiceConfig;
  readonly provisioner?: AccountProvisioner;
  readonly logger?: Logger;
  /** Test seam for token collisions. */
  readonly generateToken?: () => string;
}

export interface AuthenticateOptions {
  /** Revoke any active token and issue a fresh one. */
  readonly newToken?: boolean;
  /** Requested lifetime, capped at maxTokenLife. */
  readonly lifetimeMs?: number;
  readonly remoteAddress?: string;
}

export interface LoginResult {
  readonly token: string;
  readonly expiresAt: number;
  readonly storageUrl: string;
  readonly services: ServiceEndpoints;
}

/** Who is calling the admin API, after checking the admin credentials. */
export type AdminPrincipal =
  | { readonly kind: 'anonymous' }
  | { readonly kind: 'super-admin' }
  | {
      readonly kind: 'user';
      readonly account: string;
      readonly user: string;
      readonly record: UserRecord;
    };

// ── AuthService ──────────────────────────────────────────────────
//
// Wires hasher, caches, token manager and identity store together,
// and implements credential checks for token issuance and for the
// admin API.

export class AuthService {
  readonly #config: AuthServiceConfig;
  readonly #hasher: CredentialHasher;
  readonly #tokenCache: ValidationCache<ResolvedIdentity>;
  readonly #userCache: ValidationCache<UserRecord>;
  readonly #tokens: TokenManager;
  readonly #identities: IdentityStore;
  readonly #loginLimiter: LoginRateLimiter;
  readonly #log: Logger;
  #superAdminToken: IssuedToken | null = null;

  constructor(options: AuthServiceOptions) {
    const { config } = options;
    this.#config = config;
    this.#log = (options.logger ?? rootLogger).child({ module: 'auth-service' });
    this.#hasher = createHasher(config.authType, config.authTypeSalt);

    const cacheOptions = { ttlMs: config.cacheTtlMs, sweepIntervalMs: config.cacheSweepIntervalMs };
    this.#tokenCache = new ValidationCache<ResolvedIdentity>(cacheOptions);
    this.#userCache = new ValidationCache<UserRecord>(cacheOptions);

    this.#tokens = new TokenManager({
      backing: options.backing,
      cache: this.#tokenCache,
      resellerPrefix: config.resellerPrefix,
      tokenTtlMs: config.tokenLifeMs,
      tokenObjectSalt: config.tokenObjectSalt,
      generateToken: options.generateToken,
      logger: options.logger,
    });
    this.#identities = new IdentityStore({
      backing: options.backing,
      hasher: this.#hasher,
      tokens: this.#tokens,
      tokenCache: this.#tokenCache,
      userCache: this.#userCache,
      resellerPrefix: config.resellerPrefix,
      cluster: config.cluster,
      provisioner: options.provisioner,
      logger: options.logger,
    });
    this.#loginLimiter = new LoginRateLimiter(config.loginRateLimit);

    if (config.superAdminKey === null) {
      this.#log.warn('No superAdminKey configured; the admin API is disabled');
    }
  }

  get identities(): IdentityStore {
    return this.#identities;
  }

  get tokens(): TokenManager {
    return this.#tokens;
  }

  get tokenCache(): ValidationCache<ResolvedIdentity> {
    return this.#tokenCache;
  }

  get adminEnabled(): boolean {
    return this.#config.superAdminKey !== null;
  }

  /** Stops cache sweepers. */
  stop(): void {
    this.#tokenCache.stop();
    this.#userCache.stop();
  }

  // ── Token issuance ─────────────────────────────────────────────

  /**
   * Checks credentials and returns the user's token. An unexpired
   * active token is reused unless `newToken` is set.
   */
  async authenticate(
    account: string,
    user: string,
    key: string,
    options: AuthenticateOptions = {},
  ): Promise<LoginResult> {
    if (user === SUPER_ADMIN_USER) {
      return this.#superAdminLogin(key, options.remoteAddress);
    }

    const limiterKeys = loginLimiterKeys(account, user, options.remoteAddress);
    this.#loginLimiter.check(...limiterKeys);

    const issued = await this.#identities.withUserLock(account, user, () =>
      this.#userToken(account, user, key, options, limiterKeys),
    );

    const services = await this.#identities.getServices(account);
    return { ...issued, services, storageUrl: defaultStorageUrl(services) };
  }

  /**
   * Reuses or issues the user's token. Runs under the user lock; the
   * re-read after indexing catches writers in other processes, whose
   * changes would otherwise leave a live token the index no longer
   * points at.
   */
  async #userToken(
    account: string,
    user: string,
    key: string,
    options: AuthenticateOptions,
    limiterKeys: readonly string[],
  ): Promise<IssuedToken> {
    for (let attempt = 1; attempt <= MAX_LOGIN_ATTEMPTS; attempt++) {
      const entry = await this.#identities.getUserEntry(account, user);
      if (entry === null || !(await verifyCredentials(key, entry.record.auth))) {
        this.#loginLimiter.recordFailure(...limiterKeys);
        throw new StorewardError(ErrorCode.UNAUTHORIZED, 'Invalid credentials');
      }
      this.#loginLimiter.reset(...limiterKeys);

      if (entry.token !== null) {
        const reused = await this.#reusableToken(entry.token, options.newToken === true && attempt === 1);
        if (reused !== null) return reused;
      }

      const accountId = await this.#identities.getAccountId(account);
      if (accountId === null) {
        throw new StorewardError(ErrorCode.UNAUTHORIZED, 'Invalid credentials');
      }
      const issued = await this.#tokens.issueToken(
        { account, user, accountId, groups: entry.record.groups },
        { ttlMs: this.#effectiveLifetime(options.lifetimeMs) },
      );
      await this.#identities.setUserToken(account, user, issued.token);

      const current = await this.#identities.getUserEntry(account, user);
      if (
        current !== null &&
        current.token === issued.token &&
        current.record.auth === entry.record.auth &&
        sameGroups(current.record.groups, entry.record.groups)
      ) {
        this.#log.debug('Token issued', { account, user });
        return issued;
      }

      await this.#tokens.revokeToken(issued.token);
      this.#log.warn('User changed during token issuance, retrying', { account, user, attempt });
    }

    throw new StorewardError(ErrorCode.CONFLICT, `User "${account}:${user}" keeps changing; try again`, {
      attempts: MAX_LOGIN_ATTEMPTS,
    });
  }

  /** Clamps a requested lifetime; anything unusable falls back to tokenLife. */
  #effectiveLifetime(requestedMs: number | undefined): number {
    if (requestedMs === undefined || !Number.isFinite(requestedMs) || requestedMs <= 0) {
      return Math.min(this.#config.tokenLifeMs, this.#config.maxTokenLifeMs);
    }
    return Math.min(requestedMs, this.#config.maxTokenLifeMs);
  }

  async #reusableToken(token: string, forceNew: boolean): Promise<IssuedToken | null> {
    if (forceNew) {
      await this.#tokens.revokeToken(token);
      return null;
    }
    const record = await this.#tokens.readTokenRecord(token);
    if (record === null) return null;
    if (record.expiresAt > Date.now()) return { token, expiresAt: record.expiresAt };
    await this.#tokens.revokeToken(token);
    return null;
  }

  async #superAdminLogin(key: string, remoteAddress?: string): Promise<LoginResult> {
    const limiterKeys = loginLimiterKeys('', SUPER_ADMIN_USER, remoteAddress);
    this.#loginLimiter.check(...limiterKeys);
    if (!this.#isSuperAdminKey(key)) {
      this.#loginLimiter.recordFailure(...limiterKeys);
      throw new StorewardError(ErrorCode.UNAUTHORIZED, 'Invalid credentials');
    }
    this.#loginLimiter.reset(...limiterKeys);

    const reserved = this.#config.reservedAccountName;
    let issued = this.#superAdminToken;
    if (issued === null || issued.expiresAt <= Date.now()) {
      issued = await this.#tokens.issueToken({
        account: reserved,
        user: SUPER_ADMIN_USER,
        accountId: reserved,
        groups: [
          { name: `${reserved}:${SUPER_ADMIN_USER}` },
          { name: reserved },
          { name: ADMIN_GROUP },
          { name: RESELLER_ADMIN_GROUP },
        ],
      });
      this.#superAdminToken = issued;
    }

    const { cluster } = this.#config;
    const storageUrl = `${cluster.publicUrl}/${reserved}`;
    return {
      ...issued,
      storageUrl,
      services: { storage: { default: cluster.name, [cluster.name]: storageUrl } },
    };
  }

  // ── Admin credentials ──────────────────────────────────────────

  /**
   * Checks `X-Auth-Admin-User` / `X-Auth-Admin-Key`. Missing or wrong
   * credentials resolve to anonymous; lockouts throw RATE_LIMITED.
   */
  async resolveAdmin(
    adminUser: string | undefined,
    adminKey: string | undefined,
    remoteAddress?: string,
  ): Promise<AdminPrincipal> {
    if (adminUser === undefined || adminKey === undefined || adminKey.length === 0) {
      return { kind: 'anonymous' };
    }

    if (adminUser === SUPER_ADMIN_USER) {
      const limiterKeys = loginLimiterKeys('', SUPER_ADMIN_USER, remoteAddress);
      this.#loginLimiter.check(...limiterKeys);
      if (this.#isSuperAdminKey(adminKey)) {
        this.#loginLimiter.reset(...limiterKeys);
        return { kind: 'super-admin' };
      }
      this.#loginLimiter.recordFailure(...limiterKeys);
      return { kind: 'anonymous' };
    }

    const separator = adminUser.indexOf(':');
    if (separator <= 0) return { kind: 'anonymous' };
    const account = adminUser.slice(0, separator);
    const user = adminUser.slice(separator + 1);

    const limiterKeys = loginLimiterKeys(account, user, remoteAddress);
    this.#loginLimiter.check(...limiterKeys);

    const record = await this.#identities.lookupUser(account, user);
    if (record === null || !(await verifyCredentials(adminKey, record.auth))) {
      this.#loginLimiter.recordFailure(...limiterKeys);
      return { kind: 'anonymous' };
    }
    this.#loginLimiter.reset(...limiterKeys);
    return { kind: 'user', account, user, record };
  }

  #isSuperAdminKey(key: string): boolean {
    const expected = this.#config.superAdminKey;
    if (expected === null) return false;
    // Equal-length digests so the comparison time does not depend on the key.
    return timingSafeEqual(sha256(key), sha256(expected));
  }
}

// ── Principal checks ─────────────────────────────────────────────

export function isSuperAdmin(principal: AdminPrincipal): boolean {
  return principal.kind === 'super-admin';
}

export function isResellerAdmin(principal: AdminPrincipal): boolean {
  if (principal.kind === 'super-admin') return true;
  return principal.kind === 'user' && hasGroup(principal.record.groups, RESELLER_ADMIN_GROUP);
}

export function isAccountAdmin(principal: AdminPrincipal, account: string): boolean {
  if (isResellerAdmin(principal)) return true;
  return (
    principal.kind === 'user' &&
    principal.account === account &&
    hasGroup(principal.record.groups, ADMIN_GROUP)
  );
}

// ── Helpers ──────────────────────────────────────────────────────

function sameGroups(a: readonly GroupEntry[], b: readonly GroupEntry[]): boolean {
  return a.length === b.length && a.every((group, i) => group.name === b[i]?.name);
}

function sha256(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** URL of the default storage endpoint in a services record. */
export function defaultStorageUrl(services: ServiceEndpoints): string {
  const storage = services['storage'];
  const name = storage?.['default'];
  const url = name === undefined ? undefined : storage?.[name];
  if (url === undefined) {
    throw new StorewardError(ErrorCode.INTERNAL_ERROR, 'Services record has no default storage URL');
  }
  return url;
}
