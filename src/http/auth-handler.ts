import { ErrorCode, StorewardError } from '../errors.js';
import {
  isAccountAdmin,
  isResellerAdmin,
  isSuperAdmin,
  type AdminPrincipal,
  type AuthService,
} from '../identity/auth-service.js';
import {
  ADMIN_GROUP,
  RESELLER_ADMIN_GROUP,
  hasGroup,
  parseServices,
  type UserInfo,
} from '../identity/identity-types.js';
import { parseJson } from '../json.js';
import { jsonResponse, textResponse } from './responses.js';
import { header, type InboundRequest, type HttpResponse } from './types.js';

const TRUE_VALUES: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on', 't', 'y']);

export interface AuthHandlerContext {
  readonly service: AuthService;
  readonly resellerPrefix: string;
  /** Applied to token issuance requests only. */
  readonly consumeTokenRateLimit?: (key: string) => Promise<void>;
}

// ── Authorization helpers ───────────────────────────────────────

function deny(principal: AdminPrincipal, message: string): never {
  if (principal.kind === 'anonymous') {
    throw new StorewardError(ErrorCode.UNAUTHORIZED, 'Admin credentials required');
  }
  throw new StorewardError(ErrorCode.FORBIDDEN, message);
}

function requireSuperAdmin(principal: AdminPrincipal): void {
  if (!isSuperAdmin(principal)) deny(principal, 'Super admin required');
}

function requireResellerAdmin(principal: AdminPrincipal): void {
  if (!isResellerAdmin(principal)) deny(principal, 'Reseller admin required');
}

function requireAccountAdmin(principal: AdminPrincipal, account: string): void {
  if (!isAccountAdmin(principal, account)) deny(principal, `Admin of "${account}" required`);
}

function requireAccountSegment(account: string): void {
  if (account.length === 0 || account.startsWith('.')) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Invalid account "${account}"`);
  }
}

function isTrue(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.has(value.toLowerCase());
}

/** `true` / `false` header → boolean; absent → undefined. */
function optionalFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return TRUE_VALUES.has(value.toLowerCase());
}

function decodeValue(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded after all.
    return value;
  }
}

function methodNotAllowed(allowed: readonly string[]): HttpResponse {
  return textResponse(405, undefined, { allow: allowed.join(', ') });
}

// ── Auth request dispatcher ─────────────────────────────────────

/**
 * Handles a request below the auth prefix. `subpath` is the path
 * after the prefix with the query string removed, e.g. `v2/acme/bob`.
 */
export async function handleAuthRequest(
  request: InboundRequest,
  subpath: string,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  const segments = subpath.split('/').map((segment) => decodeValue(segment) ?? segment);
  const method = request.method.toUpperCase();
  const [first, second, third] = segments;

  // Token issuance: v1.0, auth, v1/<act>/auth
  if (
    (segments.length === 1 && (first === 'v1.0' || first === 'auth')) ||
    (segments.length === 3 && first === 'v1' && third === 'auth')
  ) {
    if (method !== 'GET') return methodNotAllowed(['GET']);
    return handleGetToken(request, first === 'v1' ? second : undefined, ctx);
  }

  if (first !== 'v2') return textResponse(404);
  if (!ctx.service.adminEnabled) return textResponse(404);

  // v2/.token/<token> validation does not take admin credentials.
  if (second === '.token' && method === 'GET') {
    return handleValidateToken(segments.slice(2).join('/'), ctx);
  }

  const principal = await ctx.service.resolveAdmin(
    header(request, 'x-auth-admin-user'),
    header(request, 'x-auth-admin-key'),
    request.remoteAddress,
  );
  return dispatchAdmin(request, method, segments.slice(1), principal, ctx);
}

async function dispatchAdmin(
  request: InboundRequest,
  method: string,
  path: readonly string[],
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  const [account, user, sub, group] = path;

  // v2
  if (account === undefined || (account === '' && path.length === 1)) {
    if (method !== 'GET') return methodNotAllowed(['GET']);
    return handleListAccounts(principal, ctx);
  }

  // v2/.prep
  if (account === '.prep' && path.length === 1) {
    if (method !== 'POST') return methodNotAllowed(['POST']);
    return handlePrep(principal, ctx);
  }

  // v2/.token/<token>
  if (account === '.token') {
    if (method !== 'DELETE') return methodNotAllowed(['GET', 'DELETE']);
    return handleRevokeToken(path.slice(1).join('/'), principal, ctx);
  }

  requireAccountSegment(account);

  // v2/<act>
  if (user === undefined || (user === '' && path.length === 2)) {
    switch (method) {
      case 'GET':
        return handleGetAccount(account, principal, ctx);
      case 'PUT':
        return handlePutAccount(request, account, principal, ctx);
      case 'DELETE':
        return handleDeleteAccount(account, principal, ctx);
      default:
        return methodNotAllowed(['GET', 'PUT', 'DELETE']);
    }
  }

  // v2/<act>/.services
  if (user === '.services' && path.length === 2) {
    if (method !== 'POST') return methodNotAllowed(['POST']);
    return handleSetServices(request, account, principal, ctx);
  }

  // v2/<act>/.groups
  if (user === '.groups' && path.length === 2) {
    if (method !== 'GET') return methodNotAllowed(['GET']);
    return handleListGroups(account, principal, ctx);
  }

  if (user.length === 0 || user.startsWith('.')) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Invalid user "${user}"`);
  }

  // v2/<act>/<usr>
  if (path.length === 2) {
    switch (method) {
      case 'GET':
        return handleGetUser(account, user, principal, ctx);
      case 'PUT':
        return handlePutUser(request, account, user, principal, ctx);
      case 'DELETE':
        return handleDeleteUser(account, user, principal, ctx);
      default:
        return methodNotAllowed(['GET', 'PUT', 'DELETE']);
    }
  }

  // v2/<act>/<usr>/.groups/<group>
  if (path.length === 4 && sub === '.groups' && group !== undefined && group.length > 0) {
    switch (method) {
      case 'PUT':
        return handleAssignGroup(account, user, group, principal, ctx);
      case 'DELETE':
        return handleRemoveGroup(account, user, group, principal, ctx);
      default:
        return methodNotAllowed(['PUT', 'DELETE']);
    }
  }

  return textResponse(404);
}

// ── Token issuance ──────────────────────────────────────────────

async function handleGetToken(
  request: InboundRequest,
  pathAccount: string | undefined,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  if (ctx.consumeTokenRateLimit !== undefined) {
    await ctx.consumeTokenRateLimit(request.remoteAddress ?? 'unknown');
  }

  const credentials = readTokenCredentials(request, pathAccount);
  if (credentials === null) {
    throw new StorewardError(ErrorCode.UNAUTHORIZED, 'Missing or malformed credentials');
  }

  const lifetimeHeader = header(request, 'x-auth-token-lifetime');
  const lifetimeSeconds = lifetimeHeader === undefined ? Number.NaN : Number(lifetimeHeader);

  const result = await ctx.service.authenticate(
    credentials.account,
    credentials.user,
    credentials.key,
    {
      newToken: isTrue(header(request, 'x-auth-new-token')),
      lifetimeMs: Number.isInteger(lifetimeSeconds) ? lifetimeSeconds * 1000 : undefined,
      remoteAddress: request.remoteAddress,
    },
  );

  const remainingSeconds = Math.max(0, Math.floor((result.expiresAt - Date.now()) / 1000));
  return jsonResponse(200, result.services, {
    'x-auth-token': result.token,
    'x-storage-token': result.token,
    'x-auth-token-expires': String(remainingSeconds),
    'x-storage-url': result.storageUrl,
  });
}

interface TokenCredentials {
  readonly account: string;
  readonly user: string;
  readonly key: string;
}

/**
 * `v1/<act>/auth` takes `X-Storage-User: <usr>` or `X-Auth-User:
 * <act>:<usr>`; the other forms take `<act>:<usr>` in either header.
 */
function readTokenCredentials(
  request: InboundRequest,
  pathAccount: string | undefined,
): TokenCredentials | null {
  const authUser = decodeValue(header(request, 'x-auth-user'));
  const storageUser = header(request, 'x-storage-user');

  let account: string;
  let user: string;
  let key: string | undefined;

  if (pathAccount !== undefined) {
    if (storageUser !== undefined) {
      account = pathAccount;
      user = storageUser;
    } else {
      const split = splitUserId(authUser);
      if (split === null || split.account !== pathAccount) return null;
      ({ account, user } = split);
    }
    key = header(request, 'x-storage-pass') ?? decodeValue(header(request, 'x-auth-key'));
  } else {
    const split = splitUserId(authUser ?? storageUser);
    if (split === null) return null;
    ({ account, user } = split);
    key = decodeValue(header(request, 'x-auth-key')) ?? header(request, 'x-storage-pass');
  }

  if (account.length === 0 || user.length === 0 || key === undefined || key.length === 0) {
    return null;
  }
  return { account, user, key };
}

function splitUserId(value: string | undefined): { account: string; user: string } | null {
  if (value === undefined) return null;
  const separator = value.indexOf(':');
  if (separator === -1) return null;
  return { account: value.slice(0, separator), user: value.slice(separator + 1) };
}

// ── Tokens ──────────────────────────────────────────────────────

async function handleValidateToken(token: string, ctx: AuthHandlerContext): Promise<HttpResponse> {
  if (!token.startsWith(ctx.resellerPrefix)) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, 'Not a token of this auth system');
  }
  const validation = await ctx.service.tokens.validateToken(token);
  if (validation.status !== 'valid') return textResponse(404);

  const ttlSeconds = Math.max(0, Math.floor((validation.identity.expiresAt - Date.now()) / 1000));
  return textResponse(204, undefined, {
    'x-auth-ttl': String(ttlSeconds),
    'x-auth-groups': validation.identity.groups.join(','),
  });
}

async function handleRevokeToken(
  token: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  if (principal.kind === 'anonymous') deny(principal, 'Admin credentials required');

  const record = await ctx.service.tokens.readTokenRecord(token);
  if (record === null) return textResponse(404);

  const isOwnToken =
    principal.kind === 'user' && principal.account === record.account && principal.user === record.user;
  if (!isOwnToken) requireAccountAdmin(principal, record.account);

  await ctx.service.tokens.revokeToken(token);
  return textResponse(204);
}

// ── Reserved account ────────────────────────────────────────────

async function handlePrep(principal: AdminPrincipal, ctx: AuthHandlerContext): Promise<HttpResponse> {
  requireSuperAdmin(principal);
  await ctx.service.identities.prepare();
  return textResponse(204);
}

// ── Accounts ────────────────────────────────────────────────────

async function handleListAccounts(
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireResellerAdmin(principal);
  const accounts = await ctx.service.identities.listAccounts();
  return jsonResponse(200, { accounts: accounts.map((name) => ({ name })) });
}

async function handleGetAccount(
  account: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireAccountAdmin(principal, account);
  const info = await ctx.service.identities.getAccount(account);
  return jsonResponse(200, {
    account_id: info.accountId,
    services: info.services,
    users: info.users.map((name) => ({ name })),
  });
}

async function handlePutAccount(
  request: InboundRequest,
  account: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireResellerAdmin(principal);
  const suffix = header(request, 'x-account-suffix');
  const result = await ctx.service.identities.createAccount(
    account,
    suffix !== undefined ? { suffix } : {},
  );
  return textResponse(result.created ? 201 : 202, undefined, {
    'x-account-id': result.accountId,
  });
}

async function handleDeleteAccount(
  account: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireResellerAdmin(principal);
  await ctx.service.identities.deleteAccount(account);
  return textResponse(204);
}

async function handleSetServices(
  request: InboundRequest,
  account: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireResellerAdmin(principal);
  const updates = parseServices(parseJson(request.body ?? ''));
  if (updates === null) {
    throw new StorewardError(
      ErrorCode.VALIDATION_ERROR,
      'Body must be a JSON object of service → endpoint → URL',
    );
  }
  const services = await ctx.service.identities.setServices(account, updates);
  return jsonResponse(200, services);
}

async function handleListGroups(
  account: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireAccountAdmin(principal, account);
  const groups = await ctx.service.identities.listGroups(account);
  return jsonResponse(200, { groups: groups.map((name) => ({ name })) });
}

// ── Users ───────────────────────────────────────────────────────

async function handleGetUser(
  account: string,
  user: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireAccountAdmin(principal, account);
  const info = await ctx.service.identities.getUserInfo(account, user);

  // Admin details are shown to resellers only, reseller details to the super admin only.
  if (
    (info.isAdmin && !isResellerAdmin(principal)) ||
    (info.isResellerAdmin && !isSuperAdmin(principal))
  ) {
    deny(principal, 'Not allowed to view this user');
  }
  return jsonResponse(200, userBody(info));
}

async function handlePutUser(
  request: InboundRequest,
  account: string,
  user: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  const key = decodeValue(header(request, 'x-auth-user-key'));
  const keyHash = decodeValue(header(request, 'x-auth-user-key-hash'));
  const resellerAdmin = optionalFlag(header(request, 'x-auth-user-reseller-admin'));
  const adminFlag = optionalFlag(header(request, 'x-auth-user-admin'));
  const admin = resellerAdmin === true ? true : adminFlag;

  const existing = await ctx.service.identities.getUser(account, user);
  const targetIsReseller =
    resellerAdmin === true || (existing !== null && hasGroup(existing.groups, RESELLER_ADMIN_GROUP));

  const self = isChangingOwnUser(principal, account, user, { admin, resellerAdmin });
  if (targetIsReseller) {
    if (!isSuperAdmin(principal) && !self) deny(principal, 'Super admin required');
  } else if (!isAccountAdmin(principal, account) && !self) {
    deny(principal, `Admin of "${account}" required`);
  }

  if (existing === null) {
    if (key === undefined && keyHash === undefined) {
      throw new StorewardError(ErrorCode.VALIDATION_ERROR, 'X-Auth-User-Key or X-Auth-User-Key-Hash required');
    }
    await ctx.service.identities.createUser(account, user, { key, keyHash, admin, resellerAdmin });
    return textResponse(201);
  }

  await ctx.service.identities.updateUser(account, user, { key, keyHash, admin, resellerAdmin });
  return textResponse(204);
}

/**
 * A user may change their own key, but never grant themselves a
 * flag they don't already hold.
 */
function isChangingOwnUser(
  principal: AdminPrincipal,
  account: string,
  user: string,
  requested: { admin?: boolean; resellerAdmin?: boolean },
): boolean {
  if (principal.kind !== 'user' || principal.account !== account || principal.user !== user) {
    return false;
  }
  const groups = principal.record.groups;
  if (requested.admin === true && !hasGroup(groups, ADMIN_GROUP)) return false;
  if (requested.resellerAdmin === true && !hasGroup(groups, RESELLER_ADMIN_GROUP)) return false;
  return true;
}

async function handleDeleteUser(
  account: string,
  user: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  requireAccountAdmin(principal, account);
  const existing = await ctx.service.identities.getUser(account, user);
  if (existing === null) return textResponse(404);
  if (hasGroup(existing.groups, RESELLER_ADMIN_GROUP)) requireSuperAdmin(principal);

  await ctx.service.identities.deleteUser(account, user);
  return textResponse(204);
}

async function handleAssignGroup(
  account: string,
  user: string,
  group: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  await requireGroupManagement(account, user, principal, ctx);
  await ctx.service.identities.assignGroup(account, user, group);
  return textResponse(204);
}

async function handleRemoveGroup(
  account: string,
  user: string,
  group: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<HttpResponse> {
  await requireGroupManagement(account, user, principal, ctx);
  await ctx.service.identities.removeGroup(account, user, group);
  return textResponse(204);
}

async function requireGroupManagement(
  account: string,
  user: string,
  principal: AdminPrincipal,
  ctx: AuthHandlerContext,
): Promise<void> {
  requireAccountAdmin(principal, account);
  const existing = await ctx.service.identities.getUser(account, user);
  if (existing === null) {
    throw new StorewardError(ErrorCode.NOT_FOUND, `User "${account}:${user}" not found`);
  }
  if (hasGroup(existing.groups, RESELLER_ADMIN_GROUP)) requireSuperAdmin(principal);
}

function userBody(info: UserInfo): { auth: string; groups: { name: string }[] } {
  return { auth: info.auth, groups: info.groups.map((name) => ({ name })) };
}
