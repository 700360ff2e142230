import { evaluateAccess, needsContainerAcl, type AccessRequest } from '../auth/access-rules.js';
import { EMPTY_ACL, parseAcl } from '../auth/acl.js';
import {
  parseStoragePath,
  requiredPermission,
  type StorageTarget,
} from '../auth/required-permission.js';
import type { ContainerAcl, ContainerAclSource } from '../backing/container-acl-source.js';
import { ErrorCode, StorewardError } from '../errors.js';
import type { ResolvedIdentity } from '../identity/identity-types.js';
import { MAX_TOKEN_LENGTH } from '../identity/reserved-layout.js';
import type { TokenManager } from '../identity/token-manager.js';
import type { ValidationCache } from '../identity/validation-cache.js';
import { describeError, logger as rootLogger, type Logger } from '../logger.js';
import { header, type InboundRequest, type RequestContext } from './types.js';

export type RejectStatus = 400 | 401 | 403 | 404 | 503;

/** Outcome for one storage request. */
export type InterceptDecision =
  | {
      readonly outcome: 'forwarded';
      readonly context: RequestContext;
      /** Run once the upstream has answered the forwarded request. */
      readonly afterForward?: () => void;
    }
  | { readonly outcome: 'anonymous'; readonly afterForward?: () => void }
  | { readonly outcome: 'rejected'; readonly status: RejectStatus; readonly reason: string };

export interface AuthInterceptorOptions {
  readonly tokens: TokenManager;
  readonly aclSource: ContainerAclSource;
  readonly aclCache: ValidationCache<ContainerAcl>;
  readonly resellerPrefix: string;
  /** Default: x-auth-token, falling back to x-storage-token. */
  readonly tokenHeader?: string;
  readonly logger?: Logger;
}

const DEFAULT_TOKEN_HEADER = 'x-auth-token';
const FALLBACK_TOKEN_HEADER = 'x-storage-token';
const NO_ACL: ContainerAcl = { read: null, write: null };

// ── AuthInterceptor ──────────────────────────────────────────────
//
// Decides, per storage request, whether it is forwarded with an
// identity, passed through anonymously, or rejected. A backing-store
// failure anywhere on the way is a 503, never an allow or a 401.

export class AuthInterceptor {
  readonly #tokens: TokenManager;
  readonly #aclSource: ContainerAclSource;
  readonly #aclCache: ValidationCache<ContainerAcl>;
  readonly #resellerPrefix: string;
  readonly #tokenHeader: string;
  readonly #log: Logger;

  constructor(options: AuthInterceptorOptions) {
    this.#tokens = options.tokens;
    this.#aclSource = options.aclSource;
    this.#aclCache = options.aclCache;
    this.#resellerPrefix = options.resellerPrefix;
    this.#tokenHeader = (options.tokenHeader ?? DEFAULT_TOKEN_HEADER).toLowerCase();
    this.#log = (options.logger ?? rootLogger).child({ module: 'interceptor' });
  }

  async intercept(request: InboundRequest): Promise<InterceptDecision> {
    const method = request.method.toUpperCase();
    if (method === 'OPTIONS') return { outcome: 'anonymous' };

    const token = this.#extractToken(request);
    if (token !== undefined && token.length > MAX_TOKEN_LENGTH) {
      return reject(400, 'Token exceeds maximum length');
    }

    const target = parseStoragePath(request.path);
    if (target === null) return reject(404, 'Not a storage path');

    try {
      return await this.#decide(request, method, target, token);
    } catch (error) {
      if (error instanceof StorewardError && error.code === ErrorCode.BACKEND_UNAVAILABLE) {
        this.#log.error('Backing store unavailable during authorization', {
          ...describeError(error),
          path: request.path,
        });
        return reject(503, 'Authorization backend unavailable');
      }
      throw error;
    }
  }

  async #decide(
    request: InboundRequest,
    method: string,
    target: StorageTarget,
    token: string | undefined,
  ): Promise<InterceptDecision> {
    let identity: ResolvedIdentity | null = null;
    if (token !== undefined) {
      const validation = await this.#tokens.validateToken(token);
      if (validation.status !== 'valid') {
        return reject(401, validation.status === 'expired' ? 'Token expired' : 'Invalid token');
      }
      identity = validation.identity;
    }

    if (!target.account.startsWith(this.#resellerPrefix)) {
      return denied(identity, 'Account outside the reseller namespace');
    }

    const permission = requiredPermission(method, target);
    const base: AccessRequest = {
      target,
      permission,
      identity,
      referer: header(request, 'referer'),
      acl: EMPTY_ACL,
    };

    let decision = evaluateAccess(base, { resellerPrefix: this.#resellerPrefix });
    if (!decision.allowed && needsContainerAcl(target, permission)) {
      const acl = await this.#containerAcl(target);
      const aclString = permission === 'read' ? acl.read : acl.write;
      decision = evaluateAccess(
        { ...base, acl: parseAcl(aclString) },
        { resellerPrefix: this.#resellerPrefix },
      );
    }

    if (!decision.allowed) return denied(identity, `Requires ${permission}`);

    // A container write may replace its ACL; the cached copy goes once
    // the upstream has applied the write.
    const container = target.container;
    const afterForward =
      container !== null && target.object === null && permission !== 'read'
        ? () => this.#aclCache.invalidate(aclKey(target.account, container))
        : undefined;
    const completion = afterForward !== undefined ? { afterForward } : {};

    if (identity === null) return { outcome: 'anonymous', ...completion };
    return {
      ...completion,
      outcome: 'forwarded',
      context: {
        account: identity.account,
        user: identity.user,
        accountId: identity.accountId,
        groups: identity.groups,
        isOwner: decision.isOwner,
        isResellerRequest: decision.rule === 'reseller-admin',
        rule: decision.rule,
      },
    };
  }

  #extractToken(request: InboundRequest): string | undefined {
    const primary = header(request, this.#tokenHeader);
    if (primary !== undefined) return primary;
    return this.#tokenHeader === DEFAULT_TOKEN_HEADER
      ? header(request, FALLBACK_TOKEN_HEADER)
      : undefined;
  }

  async #containerAcl(target: StorageTarget): Promise<ContainerAcl> {
    if (target.container === null) return NO_ACL;
    const key = aclKey(target.account, target.container);
    const cached = this.#aclCache.lookup(key);
    if (cached !== undefined) return cached;

    const ticket = this.#aclCache.beginLoad(key);
    const acl = (await this.#aclSource.getContainerAcl(target.account, target.container)) ?? NO_ACL;
    this.#aclCache.insert(key, acl, { ticket });
    return acl;
  }
}

function aclKey(account: string, container: string): string {
  return `${account}/${container}`;
}

function reject(status: RejectStatus, reason: string): InterceptDecision {
  return { outcome: 'rejected', status, reason };
}

/** 403 for a caller with a valid token, 401 for an anonymous one. */
function denied(identity: ResolvedIdentity | null, reason: string): InterceptDecision {
  return reject(identity === null ? 401 : 403, reason);
}
