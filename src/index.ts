// ── Main ─────────────────────────────────────────────────────────

export { StorewardServer } from './server.js';
export type { ServerStats } from './server.js';

// ── Configuration ────────────────────────────────────────────────

export type {
  StorewardConfig,
  ResolvedStorewardConfig,
  BackendConfig,
  RateLimitConfig,
  LoginRateLimitConfig,
  AuditConfig,
  AuditEntry,
  AuditQuery,
} from './config.js';
export { resolveConfig } from './config.js';

// ── Middleware (host-independent) ────────────────────────────────

export { AuthMiddleware } from './http/middleware.js';
export type { AuthMiddlewareOptions } from './http/middleware.js';
export { AuthInterceptor } from './http/interceptor.js';
export type { InterceptDecision, AuthInterceptorOptions } from './http/interceptor.js';
export { createRequestListener, forwardHeaders } from './http/node-adapter.js';
export type {
  InboundRequest,
  HttpResponse,
  MiddlewareResult,
  RequestContext,
} from './http/types.js';

// ── Identity ─────────────────────────────────────────────────────

export { AuthService } from './identity/auth-service.js';
export type { AuthServiceConfig, AdminPrincipal, LoginResult } from './identity/auth-service.js';
export { IdentityStore } from './identity/identity-store.js';
export { TokenManager } from './identity/token-manager.js';
export { ValidationCache } from './identity/validation-cache.js';
export { createHasher, verifyCredentials, AUTH_TYPES } from './identity/credential-hasher.js';
export type { AuthType, CredentialHasher } from './identity/credential-hasher.js';
export type {
  UserInfo,
  AccountInfo,
  ResolvedIdentity,
  TokenValidation,
  ServiceEndpoints,
} from './identity/identity-types.js';

// ── Access control ───────────────────────────────────────────────

export { requiredPermission, parseStoragePath } from './auth/required-permission.js';
export type { PermissionLevel, StorageTarget } from './auth/required-permission.js';
export { evaluateAccess, ACCESS_RULES } from './auth/access-rules.js';
export type { AccessDecision, AccessRuleName } from './auth/access-rules.js';
export { parseAcl, referrerAllowed } from './auth/acl.js';

// ── Backing store ────────────────────────────────────────────────

export type { BackingStore } from './backing/backing-store.js';
export { HttpBackingStore } from './backing/http-backing-store.js';
export { EmbeddedBackingStore } from './backing/embedded-backing-store.js';
export { ObjectStorageClient } from './backing/object-storage-client.js';
export type { ContainerAclSource, ContainerAcl } from './backing/container-acl-source.js';
export type { AccountProvisioner } from './backing/account-provisioner.js';

// ── Audit ────────────────────────────────────────────────────────

export { AuditLog } from './audit/audit-log.js';

// ── Errors & logging ─────────────────────────────────────────────

export {
  StorewardError,
  BackingStoreError,
  ConfigurationError,
  ErrorCode,
  isStorewardError,
} from './errors.js';
export { setLogHandler, setLogLevel, LogLevel } from './logger.js';
export type { Logger, LogEntry, LogHandler } from './logger.js';
