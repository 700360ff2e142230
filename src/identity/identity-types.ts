import { isRecord, readNumber, readString } from '../json.js';

// ── Identity Types ───────────────────────────────────────────────
//
// Records kept as JSON objects inside the reserved account, and the
// views of them handed to the rest of the middleware.

// ── Groups ───────────────────────────────────────────────────────

/** Account administrators. Replaced by the account id when resolved. */
export const ADMIN_GROUP = '.admin';

/** Cross-account administrators. */
export const RESELLER_ADMIN_GROUP = '.reseller_admin';

/** Internal super admin, never stored as a user. */
export const SUPER_ADMIN_USER = '.super_admin';

export interface GroupEntry {
  readonly name: string;
}

// ── User ─────────────────────────────────────────────────────────

/** Stored body of `<account>/<user>`. */
export interface UserRecord {
  /** `<type>:<payload>` credentials. */
  readonly auth: string;
  /** `<account>:<user>` first, then `<account>`, then everything else. */
  readonly groups: readonly GroupEntry[];
}

/** User details exposed by the admin API (credentials included, as admins may copy them). */
export interface UserInfo {
  readonly account: string;
  readonly user: string;
  readonly auth: string;
  readonly groups: readonly string[];
  readonly isAdmin: boolean;
  readonly isResellerAdmin: boolean;
}

export interface CreateUserInput {
  /** Plain secret, hashed with the configured hasher. */
  readonly key?: string;
  /** Already-encoded credentials. Takes precedence over `key`. */
  readonly keyHash?: string;
  readonly admin?: boolean;
  readonly resellerAdmin?: boolean;
}

export type UpdateUserInput = CreateUserInput;

// ── Account ──────────────────────────────────────────────────────

/** Service name → endpoint name → URL, e.g. `{storage: {default: 'local', local: '…'}}`. */
export type ServiceEndpoints = Readonly<Record<string, Readonly<Record<string, string>>>>;

export interface AccountInfo {
  readonly name: string;
  readonly accountId: string;
  readonly services: ServiceEndpoints;
  readonly users: readonly string[];
}

// ── Token ────────────────────────────────────────────────────────

/** Stored body of a token object. */
export interface TokenRecord {
  readonly account: string;
  readonly user: string;
  readonly accountId: string;
  readonly groups: readonly GroupEntry[];
  /** ms epoch */
  readonly expiresAt: number;
}

/** Identity derived from a valid token, as ACL checks see it. */
export interface ResolvedIdentity {
  readonly account: string;
  readonly user: string;
  readonly accountId: string;
  /** `<account>:<user>`, `<account>`, custom groups, and the account id for admins. */
  readonly groups: readonly string[];
  readonly expiresAt: number;
}

export interface IssuedToken {
  readonly token: string;
  readonly expiresAt: number;
}

export type TokenValidation =
  | { readonly status: 'valid'; readonly identity: ResolvedIdentity }
  | { readonly status: 'invalid' }
  | { readonly status: 'expired' };

// ── Group resolution ─────────────────────────────────────────────

/** Stored group names with `.admin` swapped for the account id. */
export function resolveGroups(groups: readonly GroupEntry[], accountId: string): string[] {
  const names = groups.map((group) => group.name);
  const adminIndex = names.indexOf(ADMIN_GROUP);
  if (adminIndex === -1) return names;
  names.splice(adminIndex, 1);
  if (!names.includes(accountId)) names.push(accountId);
  return names;
}

export function hasGroup(groups: readonly GroupEntry[], name: string): boolean {
  return groups.some((group) => group.name === name);
}

// ── Parsing stored records ───────────────────────────────────────

function parseGroups(value: unknown): GroupEntry[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const groups: GroupEntry[] = [];
  for (const item of value) {
    if (!isRecord(item)) return undefined;
    const name = readString(item, 'name');
    if (name === undefined) return undefined;
    groups.push({ name });
  }
  return groups;
}

export function parseUserRecord(value: unknown): UserRecord | null {
  if (!isRecord(value)) return null;
  const auth = readString(value, 'auth');
  const groups = parseGroups(value['groups']);
  if (auth === undefined || groups === undefined) return null;
  return { auth, groups };
}

export function parseTokenRecord(value: unknown): TokenRecord | null {
  if (!isRecord(value)) return null;
  const account = readString(value, 'account');
  const user = readString(value, 'user');
  const accountId = readString(value, 'accountId');
  const expiresAt = readNumber(value, 'expiresAt');
  const groups = parseGroups(value['groups']);
  if (
    account === undefined ||
    user === undefined ||
    accountId === undefined ||
    expiresAt === undefined ||
    groups === undefined
  ) {
    return null;
  }
  return { account, user, accountId, groups, expiresAt };
}

export function parseServices(value: unknown): ServiceEndpoints | null {
  if (!isRecord(value)) return null;
  const services: Record<string, Record<string, string>> = {};
  for (const [service, endpoints] of Object.entries(value)) {
    if (!isRecord(endpoints)) return null;
    const parsed: Record<string, string> = {};
    for (const [name, url] of Object.entries(endpoints)) {
      if (typeof url !== 'string') return null;
      parsed[name] = url;
    }
    services[service] = parsed;
  }
  return services;
}
