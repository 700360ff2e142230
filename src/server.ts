import { createServer, type Server as HttpServer } from 'node:http';
import { AuditLog } from './audit/audit-log.js';
import {
  HttpAccountProvisioner,
  NOOP_ACCOUNT_PROVISIONER,
  type AccountProvisioner,
} from './backing/account-provisioner.js';
import type { BackingStore } from './backing/backing-store.js';
import { HttpContainerAclSource, type ContainerAcl } from './backing/container-acl-source.js';
import { EmbeddedBackingStore } from './backing/embedded-backing-store.js';
import { HttpBackingStore } from './backing/http-backing-store.js';
import { ObjectStorageClient } from './backing/object-storage-client.js';
import { resolveConfig, type ResolvedStorewardConfig, type StorewardConfig } from './config.js';
import { AuthInterceptor } from './http/interceptor.js';
import { AuthMiddleware } from './http/middleware.js';
import { createRequestListener } from './http/node-adapter.js';
import { RequestRateLimit } from './http/rate-limit.js';
import { AuthService } from './identity/auth-service.js';
import { ValidationCache } from './identity/validation-cache.js';
import { logger as rootLogger, type Logger } from './logger.js';

// ── Stats ─────────────────────────────────────────────────────────

export interface ServerStats {
  readonly name: string;
  readonly port: number;
  readonly host: string;
  readonly uptimeMs: number;
  readonly adminEnabled: boolean;
  readonly rateLimitEnabled: boolean;
  readonly backend: 'http' | 'embedded';
  readonly cachedTokens: number;
  readonly cachedAcls: number;
  readonly auditEntries: number;
}

// ── StorewardServer ───────────────────────────────────────────────

export class StorewardServer {
  readonly #config: ResolvedStorewardConfig;
  readonly #httpServer: HttpServer;
  readonly #service: AuthService;
  readonly #aclCache: ValidationCache<ContainerAcl>;
  readonly #rateLimit: RequestRateLimit | null;
  readonly #auditLog: AuditLog | null;
  readonly #middleware: AuthMiddleware;
  readonly #log: Logger;
  readonly #startedAt: number;
  #running: boolean;

  private constructor(parts: {
    config: ResolvedStorewardConfig;
    httpServer: HttpServer;
    service: AuthService;
    aclCache: ValidationCache<ContainerAcl>;
    rateLimit: RequestRateLimit | null;
    auditLog: AuditLog | null;
    middleware: AuthMiddleware;
    log: Logger;
  }) {
    this.#config = parts.config;
    this.#httpServer = parts.httpServer;
    this.#service = parts.service;
    this.#aclCache = parts.aclCache;
    this.#rateLimit = parts.rateLimit;
    this.#auditLog = parts.auditLog;
    this.#middleware = parts.middleware;
    this.#log = parts.log;
    this.#startedAt = Date.now();
    this.#running = true;
  }

  /**
   * Starts the middleware in front of `config.upstream`.
   *
   * Builds the backing store for the reserved account, the auth
   * service and the request interceptor, then listens on
   * `config.host:config.port`.
   */
  static async start(config: StorewardConfig): Promise<StorewardServer> {
    const resolved = resolveConfig(config);
    const log = rootLogger.child({ server: resolved.name });

    const client = new ObjectStorageClient({
      endpoint: resolved.storageEndpoint,
      ...(resolved.backend.kind === 'http' && resolved.backend.headers !== undefined
        ? { headers: resolved.backend.headers }
        : {}),
      timeoutMs: resolved.backendTimeoutMs,
      maxConcurrent: resolved.backendMaxConcurrent,
      ...(resolved.fetch !== undefined ? { fetch: resolved.fetch } : {}),
    });

    const backing: BackingStore =
      resolved.backend.kind === 'embedded'
        ? await EmbeddedBackingStore.start(resolved.backend.store, resolved.reservedAccountName)
        : new HttpBackingStore(client, resolved.reservedAccountName);

    const provisioner: AccountProvisioner = resolved.provisionAccounts
      ? new HttpAccountProvisioner(client)
      : NOOP_ACCOUNT_PROVISIONER;

    const service = new AuthService({
      backing,
      provisioner,
      logger: log,
      config: {
        resellerPrefix: resolved.resellerPrefix,
        reservedAccountName: resolved.reservedAccountName,
        superAdminKey: resolved.superAdminKey,
        authType: resolved.authType,
        ...(resolved.authTypeSalt !== undefined ? { authTypeSalt: resolved.authTypeSalt } : {}),
        tokenLifeMs: resolved.tokenLifeMs,
        maxTokenLifeMs: resolved.maxTokenLifeMs,
        cacheTtlMs: resolved.cacheTtlMs,
        tokenObjectSalt: resolved.tokenObjectSalt,
        cluster: resolved.cluster,
        loginRateLimit: resolved.loginRateLimit,
      },
    });

    const aclCache = new ValidationCache<ContainerAcl>({ ttlMs: resolved.cacheTtlMs });
    const interceptor = new AuthInterceptor({
      tokens: service.tokens,
      aclSource: new HttpContainerAclSource(client),
      aclCache,
      resellerPrefix: resolved.resellerPrefix,
      tokenHeader: resolved.tokenHeader,
      logger: log,
    });

    let rateLimit: RequestRateLimit | null = null;
    if (resolved.rateLimit !== null) {
      rateLimit = await RequestRateLimit.start(resolved.rateLimit, `${resolved.name}:rate-limiter`);
    }

    const auditLog = resolved.audit !== null ? new AuditLog(resolved.audit) : null;
    const middleware = new AuthMiddleware({
      service,
      interceptor,
      resellerPrefix: resolved.resellerPrefix,
      authPrefix: resolved.authPrefix,
      audit: auditLog,
      tokenRateLimit: rateLimit,
      logger: log,
    });

    const httpServer = createServer(
      createRequestListener({
        middleware,
        upstream: resolved.upstream,
        maxBodyBytes: resolved.maxBodyBytes,
        ...(resolved.fetch !== undefined ? { fetch: resolved.fetch } : {}),
        logger: log,
      }),
    );

    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.once('listening', resolve);
        httpServer.once('error', reject);
        httpServer.listen(resolved.port, resolved.host);
      });
    } catch (error) {
      if (rateLimit !== null) {
        await rateLimit.stop();
      }
      service.stop();
      aclCache.stop();
      throw error;
    }

    const server = new StorewardServer({
      config: resolved,
      httpServer,
      service,
      aclCache,
      rateLimit,
      auditLog,
      middleware,
      log,
    });
    log.info('Listening', { host: resolved.host, port: server.port, upstream: resolved.upstream });
    return server;
  }

  /**
   * Stops the server.
   *
   * 1. Stops accepting new connections and drops idle keep-alive sockets.
   * 2. Stops the request rate limiter.
   * 3. Stops cache sweepers.
   */
  async stop(): Promise<void> {
    if (!this.#running) return;
    this.#running = false;

    const httpClosed = new Promise<void>((resolve, reject) => {
      this.#httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.#httpServer.closeIdleConnections();

    if (this.#rateLimit !== null) {
      await this.#rateLimit.stop();
    }

    this.#service.stop();
    this.#aclCache.stop();

    await httpClosed;
    this.#log.info('Stopped');
  }

  /** The port the server is listening on. */
  get port(): number {
    const addr = this.#httpServer.address();
    if (addr !== null && typeof addr === 'object') {
      return addr.port;
    }
    return this.#config.port;
  }

  /** Whether the server is currently running. */
  get isRunning(): boolean {
    return this.#running;
  }

  get service(): AuthService {
    return this.#service;
  }

  get middleware(): AuthMiddleware {
    return this.#middleware;
  }

  /** `null` when auditing is disabled. */
  get auditLog(): AuditLog | null {
    return this.#auditLog;
  }

  getStats(): ServerStats {
    return {
      name: this.#config.name,
      port: this.port,
      host: this.#config.host,
      uptimeMs: Date.now() - this.#startedAt,
      adminEnabled: this.#service.adminEnabled,
      rateLimitEnabled: this.#rateLimit !== null,
      backend: this.#config.backend.kind,
      cachedTokens: this.#service.tokenCache.size,
      cachedAcls: this.#aclCache.size,
      auditEntries: this.#auditLog?.size ?? 0,
    };
  }
}
