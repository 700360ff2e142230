import type { AuditLog } from '../audit/audit-log.js';
import type { AuthService } from '../identity/auth-service.js';
import { describeError, logger as rootLogger, type Logger } from '../logger.js';
import { handleAuthRequest } from './auth-handler.js';
import type { AuthInterceptor, InterceptDecision } from './interceptor.js';
import type { RequestRateLimit } from './rate-limit.js';
import { errorResponse, textResponse } from './responses.js';
import {
  header,
  pathnameOf,
  type HttpResponse,
  type InboundRequest,
  type MiddlewareResult,
  type RequestContext,
} from './types.js';

export interface AuthMiddlewareOptions {
  readonly service: AuthService;
  readonly interceptor: AuthInterceptor;
  readonly resellerPrefix: string;
  /** Leading and trailing slash, e.g. `/auth/`. */
  readonly authPrefix: string;
  readonly audit?: AuditLog | null;
  readonly tokenRateLimit?: RequestRateLimit | null;
  readonly logger?: Logger;
  readonly now?: () => number;
}

// ── AuthMiddleware ───────────────────────────────────────────────
//
// Host-independent entry point: every inbound request either gets a
// response here or is handed back to the host to forward upstream.

export class AuthMiddleware {
  readonly #service: AuthService;
  readonly #interceptor: AuthInterceptor;
  readonly #resellerPrefix: string;
  readonly #authPrefix: string;
  readonly #audit: AuditLog | null;
  readonly #tokenRateLimit: RequestRateLimit | null;
  readonly #log: Logger;
  readonly #now: () => number;

  constructor(options: AuthMiddlewareOptions) {
    this.#service = options.service;
    this.#interceptor = options.interceptor;
    this.#resellerPrefix = options.resellerPrefix;
    this.#authPrefix = options.authPrefix;
    this.#audit = options.audit ?? null;
    this.#tokenRateLimit = options.tokenRateLimit ?? null;
    this.#log = (options.logger ?? rootLogger).child({ module: 'middleware' });
    this.#now = options.now ?? (() => Date.now());
  }

  get authPrefix(): string {
    return this.#authPrefix;
  }

  async handle(request: InboundRequest): Promise<MiddlewareResult> {
    const startedAt = this.#now();
    const pathname = pathnameOf(request.path);

    if (pathname === this.#authPrefix.slice(0, -1)) {
      const query = request.path.slice(pathname.length);
      return respond(textResponse(301, undefined, { location: `${this.#authPrefix}${query}` }));
    }

    if (pathname.startsWith(this.#authPrefix)) {
      const response = await this.#handleAuth(request, pathname.slice(this.#authPrefix.length));
      this.#record(request, 'auth', claimedUser(request), response.status, startedAt);
      return respond(response);
    }

    let decision: InterceptDecision;
    try {
      decision = await this.#interceptor.intercept(request);
    } catch (error) {
      const response = errorResponse(error, this.#log);
      this.#record(request, 'storage', null, response.status, startedAt, 'Authorization failed');
      return respond(response);
    }

    switch (decision.outcome) {
      case 'forwarded':
        return forward(decision.context, decision.afterForward);
      case 'anonymous':
        return forward(null, decision.afterForward);
      case 'rejected':
        this.#log.debug('Request rejected', {
          method: request.method,
          path: pathname,
          status: decision.status,
          reason: decision.reason,
        });
        this.#record(request, 'storage', null, decision.status, startedAt, decision.reason);
        return respond(textResponse(decision.status));
    }
  }

  async #handleAuth(request: InboundRequest, subpath: string): Promise<HttpResponse> {
    const rateLimit = this.#tokenRateLimit;
    try {
      return await handleAuthRequest(request, subpath, {
        service: this.#service,
        resellerPrefix: this.#resellerPrefix,
        ...(rateLimit !== null ? { consumeTokenRateLimit: (key: string) => rateLimit.consume(key) } : {}),
      });
    } catch (error) {
      return errorResponse(error, this.#log);
    }
  }

  #record(
    request: InboundRequest,
    surface: 'auth' | 'storage',
    userId: string | null,
    status: number,
    startedAt: number,
    reason?: string,
  ): void {
    if (this.#audit === null) return;
    try {
      this.#audit.append({
        timestamp: startedAt,
        surface,
        userId,
        method: request.method.toUpperCase(),
        path: pathnameOf(request.path),
        status,
        remoteAddress: request.remoteAddress ?? 'unknown',
        durationMs: this.#now() - startedAt,
        ...(reason !== undefined ? { reason } : {}),
      });
    } catch (error) {
      this.#log.warn('Audit callback failed', describeError(error));
    }
  }
}

function forward(context: RequestContext | null, afterForward: (() => void) | undefined): MiddlewareResult {
  return afterForward !== undefined
    ? { action: 'forward', context, afterForward }
    : { action: 'forward', context };
}

function respond(response: HttpResponse): MiddlewareResult {
  return { action: 'respond', response };
}

/** The identity the caller claims; audit only, never trusted. */
function claimedUser(request: InboundRequest): string | null {
  return (
    header(request, 'x-auth-admin-user') ??
    header(request, 'x-auth-user') ??
    header(request, 'x-storage-user') ??
    null
  );
}
