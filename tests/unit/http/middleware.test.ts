import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { AuditLog } from '../../../src/audit/audit-log.js';
import type { ContainerAcl, ContainerAclSource } from '../../../src/backing/container-acl-source.js';
import { ValidationCache } from '../../../src/identity/validation-cache.js';
import { AuthInterceptor } from '../../../src/http/interceptor.js';
import { AuthMiddleware } from '../../../src/http/middleware.js';
import { RequestRateLimit } from '../../../src/http/rate-limit.js';
import type { InboundRequest, MiddlewareResult } from '../../../src/http/types.js';
import { seedAcme, silentLogger, startService, type ServiceFixture } from '../../fixtures.js';

const BOB_LOGIN = { 'x-auth-user': 'acme:bob', 'x-auth-key': 'bob-key' };

function request(method: string, path: string, headers: Record<string, string> = {}): InboundRequest {
  return { method, path, headers, remoteAddress: '10.0.0.1' };
}

function responseOf(result: MiddlewareResult): { status: number; headers: Readonly<Record<string, string>>; body: string } {
  if (result.action !== 'respond') throw new Error(`expected a response, got ${result.action}`);
  return result.response;
}

describe('AuthMiddleware', () => {
  let fixture: ServiceFixture;
  let aclCache: ValidationCache<ContainerAcl>;
  let getContainerAcl: Mock<ContainerAclSource['getContainerAcl']>;
  let audit: AuditLog;
  let middleware: AuthMiddleware;
  let now: number;

  function build(options: { tokenRateLimit?: RequestRateLimit } = {}): AuthMiddleware {
    return new AuthMiddleware({
      service: fixture.service,
      interceptor: new AuthInterceptor({
        tokens: fixture.service.tokens,
        aclSource: { getContainerAcl },
        aclCache,
        resellerPrefix: 'AUTH_',
        logger: silentLogger(),
      }),
      resellerPrefix: 'AUTH_',
      authPrefix: '/auth/',
      audit,
      tokenRateLimit: options.tokenRateLimit,
      logger: silentLogger(),
      now: () => now,
    });
  }

  beforeEach(async () => {
    fixture = await startService();
    await seedAcme(fixture.service);
    aclCache = new ValidationCache<ContainerAcl>({ ttlMs: 60_000 });
    getContainerAcl = vi.fn<ContainerAclSource['getContainerAcl']>(() =>
      Promise.resolve({ read: null, write: null }),
    );
    audit = new AuditLog();
    now = 1_700_000_000_000;
    middleware = build();
  });

  afterEach(async () => {
    aclCache.stop();
    await fixture.stop();
  });

  // ── Auth surface ──────────────────────────────────────────────

  it('redirects the bare prefix', async () => {
    expect(responseOf(await middleware.handle(request('GET', '/auth?format=json')))).toEqual({
      status: 301,
      headers: { 'content-type': 'text/plain; charset=utf-8', location: '/auth/?format=json' },
      body: '301 Moved Permanently',
    });
  });

  it('answers token requests and audits them', async () => {
    const res = responseOf(await middleware.handle(request('GET', '/auth/v1.0', BOB_LOGIN)));

    expect(res.status).toBe(200);
    expect(audit.query()).toEqual([
      {
        timestamp: now,
        surface: 'auth',
        userId: 'acme:bob',
        method: 'GET',
        path: '/auth/v1.0',
        status: 200,
        remoteAddress: '10.0.0.1',
        durationMs: 0,
      },
    ]);
  });

  it('maps auth errors to responses', async () => {
    const res = responseOf(
      await middleware.handle(request('GET', '/auth/v1.0', { 'x-auth-user': 'acme:bob', 'x-auth-key': 'nope' })),
    );
    expect(res.status).toBe(401);
    expect(res.body).toBe('Invalid credentials');
  });

  it('applies the token rate limit', async () => {
    const tokenRateLimit = await RequestRateLimit.start({ maxRequests: 1, windowMs: 60_000 }, 'middleware-test-limit');
    try {
      middleware = build({ tokenRateLimit });
      expect(responseOf(await middleware.handle(request('GET', '/auth/v1.0', BOB_LOGIN))).status).toBe(200);

      const limited = responseOf(await middleware.handle(request('GET', '/auth/v1.0', BOB_LOGIN)));
      expect(limited.status).toBe(429);
      expect(limited.headers['retry-after']).toMatch(/^\d+$/);
    } finally {
      await tokenRateLimit.stop();
    }
  });

  // ── Storage surface ───────────────────────────────────────────

  it('forwards authorized storage requests with the identity', async () => {
    const { token } = await fixture.service.authenticate('acme', 'alice', 'alice-key');
    const result = await middleware.handle(request('PUT', '/v1/AUTH_acme/photos', { 'x-auth-token': token }));

    expect(result).toMatchObject({
      action: 'forward',
      context: { account: 'acme', user: 'alice', isOwner: true },
    });
    expect(audit.size).toBe(0);
  });

  it('hands container writes a completion hook', async () => {
    const { token } = await fixture.service.authenticate('acme', 'alice', 'alice-key');
    const write = await middleware.handle(request('POST', '/v1/AUTH_acme/photos', { 'x-auth-token': token }));
    const read = await middleware.handle(request('GET', '/v1/AUTH_acme/photos', { 'x-auth-token': token }));

    expect(write.action === 'forward' && typeof write.afterForward).toBe('function');
    expect(read).not.toHaveProperty('afterForward');
  });

  it('forwards anonymous requests without an identity', async () => {
    expect(await middleware.handle(request('OPTIONS', '/v1/AUTH_acme/photos'))).toEqual({
      action: 'forward',
      context: null,
    });
  });

  it('rejects and audits unauthorized storage requests', async () => {
    const res = responseOf(
      await middleware.handle(request('GET', '/v1/AUTH_acme/photos?format=json', { 'x-auth-token': 'AUTH_tkbogus' })),
    );

    expect(res.status).toBe(401);
    expect(res.body).toBe('401 Unauthorized');
    expect(audit.query()).toEqual([
      {
        timestamp: now,
        surface: 'storage',
        userId: null,
        method: 'GET',
        path: '/v1/AUTH_acme/photos',
        status: 401,
        remoteAddress: '10.0.0.1',
        durationMs: 0,
        reason: 'Invalid token',
      },
    ]);
  });

  it('answers 500 when authorization itself fails', async () => {
    getContainerAcl.mockRejectedValueOnce(new Error('bug'));
    const { token } = await fixture.service.authenticate('acme', 'bob', 'bob-key');

    const res = responseOf(
      await middleware.handle(request('GET', '/v1/AUTH_acme/photos/a', { 'x-auth-token': token })),
    );
    expect(res.status).toBe(500);
    expect(audit.query({ minStatus: 500 })).toMatchObject([{ reason: 'Authorization failed' }]);
  });

  it('keeps answering when the audit callback throws', async () => {
    audit = new AuditLog({
      onEntry: () => {
        throw new Error('disk full');
      },
    });
    middleware = build();

    const res = responseOf(await middleware.handle(request('GET', '/v1/AUTH_acme')));
    expect(res.status).toBe(401);
    expect(audit.size).toBe(1);
  });
});
