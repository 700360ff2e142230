import type { ResolvedIdentity } from '../identity/identity-types.js';
import { RESELLER_ADMIN_GROUP } from '../identity/identity-types.js';
import { AUTHENTICATED_MARKER, LISTINGS_MARKER, referrerAllowed, type ParsedAcl } from './acl.js';
import type { PermissionLevel, StorageTarget } from './required-permission.js';

// ── Access rules ─────────────────────────────────────────────────
//
// Evaluated in order; the first rule that grants access wins.
//
//   reseller-admin  any account but the bare prefix and `<prefix>.*`
//   account-admin   own account, except account PUT / DELETE
//   container-acl   group named in the read / write ACL
//   referrer        anonymous read by Referer (objects, or listings
//                   with .rlistings)

export type AccessRuleName = 'reseller-admin' | 'account-admin' | 'container-acl' | 'referrer';

export interface AccessRequest {
  readonly target: StorageTarget;
  readonly permission: PermissionLevel;
  /** null for anonymous requests. */
  readonly identity: ResolvedIdentity | null;
  readonly referer?: string;
  /** The ACL that governs `permission` (read ACL for reads, write ACL for writes). */
  readonly acl: ParsedAcl;
}

export interface AccessPolicy {
  readonly resellerPrefix: string;
}

export interface AccessRule {
  readonly name: AccessRuleName;
  /** Owner rules grant full control of the account. */
  readonly owner: boolean;
  grants(request: AccessRequest, policy: AccessPolicy): boolean;
}

export type AccessDecision =
  | { readonly allowed: true; readonly rule: AccessRuleName; readonly isOwner: boolean }
  | { readonly allowed: false };

// ── Rules ────────────────────────────────────────────────────────

const resellerAdminRule: AccessRule = {
  name: 'reseller-admin',
  owner: true,
  grants: ({ identity, target }, { resellerPrefix }) =>
    identity !== null &&
    identity.groups.includes(RESELLER_ADMIN_GROUP) &&
    isResellerManagedAccount(target.account, resellerPrefix),
};

const accountAdminRule: AccessRule = {
  name: 'account-admin',
  owner: true,
  grants: ({ identity, target, permission }) =>
    identity !== null &&
    permission !== 'reseller-admin' &&
    identity.groups.includes(target.account),
};

const containerAclRule: AccessRule = {
  name: 'container-acl',
  owner: false,
  grants: ({ identity, target, permission, acl }) => {
    if (identity === null || target.container === null) return false;
    if (permission !== 'read' && permission !== 'write') return false;
    if (acl.groups.includes(AUTHENTICATED_MARKER)) return true;
    return identity.groups.some((group) => acl.groups.includes(group));
  },
};

const referrerRule: AccessRule = {
  name: 'referrer',
  owner: false,
  grants: ({ target, permission, acl, referer }) => {
    if (permission !== 'read' || target.container === null) return false;
    if (!referrerAllowed(referer, acl.referrers)) return false;
    return target.object !== null || acl.groups.includes(LISTINGS_MARKER);
  },
};

export const ACCESS_RULES: readonly AccessRule[] = [
  resellerAdminRule,
  accountAdminRule,
  containerAclRule,
  referrerRule,
];

// ── Evaluation ───────────────────────────────────────────────────

export function evaluateAccess(
  request: AccessRequest,
  policy: AccessPolicy,
  rules: readonly AccessRule[] = ACCESS_RULES,
): AccessDecision {
  for (const rule of rules) {
    if (rule.grants(request, policy)) {
      return { allowed: true, rule: rule.name, isOwner: rule.owner };
    }
  }
  return { allowed: false };
}

/** Accounts a reseller admin may manage: inside the prefix, but not the bare prefix or `<prefix>.`-names. */
export function isResellerManagedAccount(account: string, resellerPrefix: string): boolean {
  if (!account.startsWith(resellerPrefix) || account === resellerPrefix) return false;
  return account.charAt(resellerPrefix.length) !== '.';
}

/** Whether the ACL rules can ever grant this request, so the ACL needs fetching. */
export function needsContainerAcl(target: StorageTarget, permission: PermissionLevel): boolean {
  return target.container !== null && (permission === 'read' || permission === 'write');
}
