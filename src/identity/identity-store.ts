import { randomUUID } from 'node:crypto';
import type { AccountProvisioner } from '../backing/account-provisioner.js';
import { NOOP_ACCOUNT_PROVISIONER } from '../backing/account-provisioner.js';
import type { BackingStore } from '../backing/backing-store.js';
import { ErrorCode, StorewardError } from '../errors.js';
import { parseJson } from '../json.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { validateCredentials, type CredentialHasher } from './credential-hasher.js';
import {
  ADMIN_GROUP,
  RESELLER_ADMIN_GROUP,
  hasGroup,
  parseServices,
  parseUserRecord,
  type AccountInfo,
  type CreateUserInput,
  type GroupEntry,
  type ResolvedIdentity,
  type ServiceEndpoints,
  type UpdateUserInput,
  type UserInfo,
  type UserRecord,
} from './identity-types.js';
import {
  ACCOUNT_ID_CONTAINER,
  ACCOUNT_ID_META,
  MAX_NAME_LENGTH,
  SERVICES_OBJECT,
  USER_TOKEN_META,
  isReservedName,
  tokenShardContainers,
  validateName,
} from './reserved-layout.js';
import type { TokenManager } from './token-manager.js';
import type { ValidationCache } from './validation-cache.js';

export interface ClusterEndpoint {
  readonly name: string;
  /** Base URL handed to clients in service records. */
  readonly publicUrl: string;
  /** Base URL the middleware reaches the cluster on (backing store, ACLs, provisioning). */
  readonly internalUrl: string;
}

export interface IdentityStoreOptions {
  readonly backing: BackingStore;
  readonly hasher: CredentialHasher;
  readonly tokens: TokenManager;
  readonly tokenCache: ValidationCache<ResolvedIdentity>;
  readonly userCache: ValidationCache<UserRecord>;
  readonly resellerPrefix: string;
  readonly cluster: ClusterEndpoint;
  readonly provisioner?: AccountProvisioner;
  readonly logger?: Logger;
}

export interface CreateAccountResult {
  readonly accountId: string;
  /** false when the account already existed. */
  readonly created: boolean;
}

export interface StoredUser {
  readonly record: UserRecord;
  readonly token: string | null;
}

// ── IdentityStore ────────────────────────────────────────────────
//
// Accounts, users and groups persisted in the reserved account.
// Mutations write through to the backing store first; the user's
// active token and every cache entry derived from the identity are
// dropped only after the write has committed.

export class IdentityStore {
  readonly #backing: BackingStore;
  readonly #hasher: CredentialHasher;
  readonly #tokens: TokenManager;
  readonly #tokenCache: ValidationCache<ResolvedIdentity>;
  readonly #userCache: ValidationCache<UserRecord>;
  readonly #resellerPrefix: string;
  readonly #cluster: ClusterEndpoint;
  readonly #provisioner: AccountProvisioner;
  readonly #log: Logger;

  // `${account}/${user}` → tail of the queued user mutations
  readonly #userLocks = new Map<string, Promise<void>>();

  constructor(options: IdentityStoreOptions) {
    this.#backing = options.backing;
    this.#hasher = options.hasher;
    this.#tokens = options.tokens;
    this.#tokenCache = options.tokenCache;
    this.#userCache = options.userCache;
    this.#resellerPrefix = options.resellerPrefix;
    this.#cluster = options.cluster;
    this.#provisioner = options.provisioner ?? NOOP_ACCOUNT_PROVISIONER;
    this.#log = (options.logger ?? rootLogger).child({ module: 'identity-store' });
  }

  get cluster(): ClusterEndpoint {
    return this.#cluster;
  }

  /**
   * Runs `task` after every earlier task for the same user in this
   * process has settled. User mutations and token issuance go through
   * here so an issued token is never indexed against a record it was
   * not derived from.
   */
  withUserLock<T>(account: string, user: string, task: () => Promise<T>): Promise<T> {
    const key = `${account}/${user}`;
    const previous = this.#userLocks.get(key) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.#userLocks.set(key, tail);
    void tail.then(() => {
      if (this.#userLocks.get(key) === tail) this.#userLocks.delete(key);
    });
    return run;
  }

  /** Creates the reserved account and its system containers. Idempotent. */
  async prepare(): Promise<void> {
    await this.#backing.createAccount();
    await this.#backing.createContainer(ACCOUNT_ID_CONTAINER);
    for (const shard of tokenShardContainers()) {
      await this.#backing.createContainer(shard);
    }
    this.#log.info('Reserved account prepared', { account: this.#backing.accountName });
  }

  // ── Accounts ───────────────────────────────────────────────────

  async listAccounts(): Promise<string[]> {
    const containers = await this.#backing.listContainers();
    return containers.filter((name) => !isReservedName(name));
  }

  async createAccount(name: string, options: { suffix?: string } = {}): Promise<CreateAccountResult> {
    this.#validateName('account', name);

    const existingId = await this.getAccountId(name);
    if (existingId !== null) return { accountId: existingId, created: false };

    const suffix = options.suffix ?? randomUUID();
    if (suffix.length === 0 || suffix.length > MAX_NAME_LENGTH || suffix.includes('/')) {
      throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Invalid account suffix "${suffix}"`);
    }
    const accountId = `${this.#resellerPrefix}${suffix}`;

    await this.#provisioner.createAccount(accountId);
    await this.#backing.createContainer(name);

    const mapped = await this.#backing.putObject(ACCOUNT_ID_CONTAINER, accountId, name, {
      ifNoneMatch: true,
    });
    if (!mapped) {
      const owner = await this.#backing.getObject(ACCOUNT_ID_CONTAINER, accountId);
      if (owner !== null && owner.body !== name) {
        throw new StorewardError(
          ErrorCode.CONFLICT,
          `Account id "${accountId}" already belongs to another account`,
        );
      }
    }

    const services: ServiceEndpoints = {
      storage: {
        default: this.#cluster.name,
        [this.#cluster.name]: `${this.#cluster.publicUrl}/${accountId}`,
      },
    };
    await this.#backing.putObject(name, SERVICES_OBJECT, JSON.stringify(services));

    // The account-id marker goes last: its presence means the account is complete.
    await this.#backing.postContainerMetadata(name, { [ACCOUNT_ID_META]: accountId });
    this.#log.info('Account created', { account: name, accountId });
    return { accountId, created: true };
  }

  /** `null` when the account does not exist (or was never completed). */
  async getAccountId(name: string): Promise<string | null> {
    if (isReservedName(name)) return null;
    const info = await this.#backing.headContainer(name);
    if (info === null) return null;
    const accountId = info.metadata[ACCOUNT_ID_META];
    return accountId !== undefined && accountId.length > 0 ? accountId : null;
  }

  /** Account name for an account id, via the reverse mapping. */
  async getAccountName(accountId: string): Promise<string | null> {
    const object = await this.#backing.getObject(ACCOUNT_ID_CONTAINER, accountId);
    return object === null ? null : object.body;
  }

  async getAccount(name: string): Promise<AccountInfo> {
    const accountId = await this.#requireAccountId(name);
    const [services, users] = await Promise.all([this.getServices(name), this.listUsers(name)]);
    return { name, accountId, services, users };
  }

  async getServices(name: string): Promise<ServiceEndpoints> {
    const object = await this.#backing.getObject(name, SERVICES_OBJECT);
    if (object === null) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `Account "${name}" not found`);
    }
    const services = parseServices(parseJson(object.body));
    if (services === null) {
      throw new StorewardError(ErrorCode.INTERNAL_ERROR, `Unreadable services for "${name}"`);
    }
    return services;
  }

  /** Merges endpoint updates into the stored services, per service. */
  async setServices(name: string, updates: ServiceEndpoints): Promise<ServiceEndpoints> {
    await this.#requireAccountId(name);
    const current = await this.getServices(name);

    const merged: Record<string, Record<string, string>> = {};
    for (const [service, endpoints] of Object.entries(current)) {
      merged[service] = { ...endpoints };
    }
    for (const [service, endpoints] of Object.entries(updates)) {
      merged[service] = { ...merged[service], ...endpoints };
    }

    await this.#backing.putObject(name, SERVICES_OBJECT, JSON.stringify(merged));
    return merged;
  }

  /** Only empty accounts can be deleted. */
  async deleteAccount(name: string): Promise<void> {
    const accountId = await this.#requireAccountId(name);
    const users = await this.listUsers(name);
    if (users.length > 0) {
      throw new StorewardError(
        ErrorCode.CONFLICT,
        `Account "${name}" still has ${users.length} user(s)`,
        { users },
      );
    }

    await this.#provisioner.deleteAccount(accountId);
    await this.#backing.deleteObject(name, SERVICES_OBJECT);
    await this.#backing.deleteObject(ACCOUNT_ID_CONTAINER, accountId);
    await this.#backing.deleteContainer(name);
    this.#log.info('Account deleted', { account: name, accountId });
  }

  // ── Users ──────────────────────────────────────────────────────

  async listUsers(account: string): Promise<string[]> {
    const names = await this.#backing.listObjects(account);
    if (names === null) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `Account "${account}" not found`);
    }
    return names.filter((name) => !isReservedName(name));
  }

  /** Fresh read from the backing store. */
  async getUser(account: string, user: string): Promise<UserRecord | null> {
    const stored = await this.getUserEntry(account, user);
    return stored === null ? null : stored.record;
  }

  /** User record together with its active token. */
  async getUserEntry(account: string, user: string): Promise<StoredUser | null> {
    if (isReservedName(account) || isReservedName(user)) return null;
    const object = await this.#backing.getObject(account, user);
    if (object === null) return null;

    const record = parseUserRecord(parseJson(object.body));
    if (record === null) {
      this.#log.warn('Unreadable user record', { account, user });
      return null;
    }
    const token = object.metadata[USER_TOKEN_META];
    return { record, token: token !== undefined && token.length > 0 ? token : null };
  }

  /** Cached read, for authorization checks on the admin surface. */
  async lookupUser(account: string, user: string): Promise<UserRecord | null> {
    const key = `${account}/${user}`;
    const cached = this.#userCache.lookup(key);
    if (cached !== undefined) return cached;

    const ticket = this.#userCache.beginLoad(key);
    const record = await this.getUser(account, user);
    if (record !== null) {
      this.#userCache.insert(key, record, { ticket, identity: { account, user } });
    }
    return record;
  }

  async getUserInfo(account: string, user: string): Promise<UserInfo> {
    const record = await this.getUser(account, user);
    if (record === null) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `User "${account}:${user}" not found`);
    }
    return toUserInfo(account, user, record);
  }

  /** Conditional create: never overwrites an existing user. */
  async createUser(account: string, user: string, input: CreateUserInput): Promise<UserInfo> {
    this.#validateName('user', user);
    await this.#requireAccountId(account);

    const record: UserRecord = {
      auth: await this.#encodeCredentials(input),
      groups: buildGroups(account, user, {
        admin: input.admin === true || input.resellerAdmin === true,
        resellerAdmin: input.resellerAdmin === true,
        custom: [],
      }),
    };

    const created = await this.#backing.putObject(account, user, JSON.stringify(record), {
      ifNoneMatch: true,
    });
    if (!created) {
      throw new StorewardError(ErrorCode.ALREADY_EXISTS, `User "${account}:${user}" already exists`);
    }
    return toUserInfo(account, user, record);
  }

  /** Changes the secret and/or admin flags; fields left out keep their value. */
  async updateUser(account: string, user: string, input: UpdateUserInput): Promise<UserInfo> {
    return this.withUserLock(account, user, async () => {
      const existing = await this.#requireUser(account, user);

      const wasReseller = hasGroup(existing.record.groups, RESELLER_ADMIN_GROUP);
      const resellerAdmin = input.resellerAdmin ?? wasReseller;
      const admin =
        resellerAdmin || (input.admin ?? hasGroup(existing.record.groups, ADMIN_GROUP));

      const changesSecret = input.key !== undefined || input.keyHash !== undefined;
      const record: UserRecord = {
        auth: changesSecret ? await this.#encodeCredentials(input) : existing.record.auth,
        groups: buildGroups(account, user, {
          admin,
          resellerAdmin,
          custom: customGroups(account, user, existing.record.groups),
        }),
      };

      await this.#writeUser(account, user, record, existing.token);
      return toUserInfo(account, user, record);
    });
  }

  async deleteUser(account: string, user: string): Promise<void> {
    await this.withUserLock(account, user, async () => {
      const existing = await this.#requireUser(account, user);
      const deleted = await this.#backing.deleteObject(account, user);
      if (!deleted) {
        throw new StorewardError(ErrorCode.NOT_FOUND, `User "${account}:${user}" not found`);
      }
      await this.#afterIdentityChange(account, user, existing.token);
    });
  }

  // ── Groups ─────────────────────────────────────────────────────

  /** Every group name held by any user of the account, sorted. */
  async listGroups(account: string): Promise<string[]> {
    const users = await this.listUsers(account);
    const records = await Promise.all(users.map((user) => this.getUser(account, user)));
    const names = new Set<string>();
    for (const record of records) {
      if (record === null) continue;
      for (const group of record.groups) names.add(group.name);
    }
    return [...names].sort();
  }

  async assignGroup(account: string, user: string, group: string): Promise<UserInfo> {
    this.#validateName('group', group);
    return this.withUserLock(account, user, async () => {
      const existing = await this.#requireUser(account, user);
      if (hasGroup(existing.record.groups, group)) {
        return toUserInfo(account, user, existing.record);
      }

      const record: UserRecord = {
        auth: existing.record.auth,
        groups: [...existing.record.groups, { name: group }],
      };
      await this.#writeUser(account, user, record, existing.token);
      return toUserInfo(account, user, record);
    });
  }

  async removeGroup(account: string, user: string, group: string): Promise<UserInfo> {
    if (group === account || group === `${account}:${user}`) {
      throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Group "${group}" is implicit`);
    }
    this.#validateName('group', group);
    return this.withUserLock(account, user, async () => {
      const existing = await this.#requireUser(account, user);
      if (!hasGroup(existing.record.groups, group)) {
        throw new StorewardError(
          ErrorCode.NOT_FOUND,
          `User "${account}:${user}" is not in group "${group}"`,
        );
      }

      const record: UserRecord = {
        auth: existing.record.auth,
        groups: existing.record.groups.filter((entry) => entry.name !== group),
      };
      await this.#writeUser(account, user, record, existing.token);
      return toUserInfo(account, user, record);
    });
  }

  // ── Active token (identity → token reverse index) ──────────────

  async getUserToken(account: string, user: string): Promise<string | null> {
    const stored = await this.getUserEntry(account, user);
    return stored === null ? null : stored.token;
  }

  async setUserToken(account: string, user: string, token: string): Promise<void> {
    const updated = await this.#backing.postObjectMetadata(account, user, {
      [USER_TOKEN_META]: token,
    });
    if (!updated) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `User "${account}:${user}" not found`);
    }
  }

  // ── Internals ──────────────────────────────────────────────────

  #validateName(kind: 'account' | 'user' | 'group', name: string): void {
    validateName(kind, name);
    // Account ids share the reseller namespace; names that look like one
    // would alias another account's admin group.
    if (kind !== 'user' && this.#resellerPrefix.length > 0 && name.startsWith(this.#resellerPrefix)) {
      throw new StorewardError(
        ErrorCode.VALIDATION_ERROR,
        `Invalid ${kind} name "${name}": must not start with "${this.#resellerPrefix}"`,
      );
    }
  }

  async #requireAccountId(name: string): Promise<string> {
    const accountId = await this.getAccountId(name);
    if (accountId === null) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `Account "${name}" not found`);
    }
    return accountId;
  }

  async #requireUser(account: string, user: string): Promise<StoredUser> {
    const stored = await this.getUserEntry(account, user);
    if (stored === null) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `User "${account}:${user}" not found`);
    }
    return stored;
  }

  async #encodeCredentials(input: CreateUserInput): Promise<string> {
    if (input.keyHash !== undefined) return validateCredentials(input.keyHash);
    if (input.key !== undefined && input.key.length > 0) return this.#hasher.encode(input.key);
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, 'A user key or key hash is required');
  }

  /** Overwrites the user record, then revokes whatever it authorized. */
  async #writeUser(
    account: string,
    user: string,
    record: UserRecord,
    previousToken: string | null,
  ): Promise<void> {
    await this.#backing.putObject(account, user, JSON.stringify(record));
    await this.#afterIdentityChange(account, user, previousToken);
  }

  async #afterIdentityChange(account: string, user: string, previousToken: string | null): Promise<void> {
    if (previousToken !== null) await this.#tokens.revokeToken(previousToken);
    this.#tokenCache.invalidateByIdentity(account, user);
    this.#userCache.invalidateByIdentity(account, user);
  }
}

// ── Helpers ──────────────────────────────────────────────────────

function buildGroups(
  account: string,
  user: string,
  options: { admin: boolean; resellerAdmin: boolean; custom: readonly GroupEntry[] },
): GroupEntry[] {
  const groups: GroupEntry[] = [{ name: `${account}:${user}` }, { name: account }];
  if (options.admin) groups.push({ name: ADMIN_GROUP });
  if (options.resellerAdmin) groups.push({ name: RESELLER_ADMIN_GROUP });
  return [...groups, ...options.custom];
}

function customGroups(account: string, user: string, groups: readonly GroupEntry[]): GroupEntry[] {
  const implicit = new Set([`${account}:${user}`, account, ADMIN_GROUP, RESELLER_ADMIN_GROUP]);
  return groups.filter((group) => !implicit.has(group.name));
}

export function toUserInfo(account: string, user: string, record: UserRecord): UserInfo {
  return {
    account,
    user,
    auth: record.auth,
    groups: record.groups.map((group) => group.name),
    isAdmin: hasGroup(record.groups, ADMIN_GROUP),
    isResellerAdmin: hasGroup(record.groups, RESELLER_ADMIN_GROUP),
  };
}
