import type { Store } from '@hamicek/noex-store';
import type { FetchFn } from './backing/object-storage-client.js';
import { ConfigurationError } from './errors.js';
import type { AuditConfig } from './audit/audit-types.js';
import { isAuthType, type AuthType } from './identity/credential-hasher.js';
import type { ClusterEndpoint } from './identity/identity-store.js';
import type { LoginRateLimitConfig } from './identity/login-rate-limiter.js';
import type { RateLimitConfig } from './http/rate-limit.js';

export type { AuditEntry, AuditConfig, AuditQuery } from './audit/audit-types.js';
export type { LoginRateLimitConfig } from './identity/login-rate-limiter.js';
export type { RateLimitConfig } from './http/rate-limit.js';

// ── Backend ───────────────────────────────────────────────────────

/** Where the reserved account's objects live. */
export type BackendConfig =
  | {
      readonly kind: 'http';
      /** Storage API root. Default: `<upstream>/v1`. */
      readonly endpoint?: string;
      /** Sent with every backing-store request, e.g. a service token. */
      readonly headers?: Readonly<Record<string, string>>;
    }
  | {
      readonly kind: 'embedded';
      /** Started @hamicek/noex-store instance holding identity data. */
      readonly store: Store;
    };

// ── Defaults ──────────────────────────────────────────────────────

export const DEFAULT_PORT = 8081;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_NAME = 'storeward';
export const DEFAULT_RESELLER_PREFIX = 'AUTH_';
export const DEFAULT_AUTH_PREFIX = '/auth/';
export const DEFAULT_AUTH_TYPE: AuthType = 'plaintext';
export const DEFAULT_TOKEN_HEADER = 'x-auth-token';
export const DEFAULT_TOKEN_LIFE_S = 86_400;
export const DEFAULT_CACHE_TTL_S = 300;
export const DEFAULT_BACKEND_TIMEOUT_S = 10;
export const DEFAULT_BACKEND_MAX_CONCURRENT = 32;
export const DEFAULT_CLUSTER = 'local#http://127.0.0.1:8080/v1';
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024 * 1024;

// ── Storeward Config (user-facing) ────────────────────────────────

export interface StorewardConfig {
  /** Origin of the protected storage API, e.g. `http://127.0.0.1:8080`. */
  readonly upstream: string;

  /** Default: HTTP against the upstream. */
  readonly backend?: BackendConfig;

  /** Listen port. Default: 8081. */
  readonly port?: number;

  /** Listen host. Default: '0.0.0.0'. */
  readonly host?: string;

  /** Name used for process registration and logging. Default: 'storeward'. */
  readonly name?: string;

  /** Enables the admin API and `.super_admin` logins. */
  readonly superAdminKey?: string;

  /** Default: 'plaintext'. */
  readonly authType?: AuthType;
  readonly authTypeSalt?: string;

  /** Token lifetime in seconds. Default: 86400. */
  readonly tokenLife?: number;
  /** Upper bound for X-Auth-Token-Lifetime, seconds. Default: tokenLife. */
  readonly maxTokenLife?: number;
  /** Validation cache TTL in seconds. Default: 300. */
  readonly cacheTtl?: number;

  /** Default: 'AUTH_'. A missing trailing underscore is added. */
  readonly resellerPrefix?: string;
  /** Default: '<resellerPrefix>.auth'. */
  readonly reservedAccountName?: string;
  /** Default: '/auth/'. */
  readonly authPrefix?: string;
  /** Default: 'x-auth-token' (with x-storage-token as fallback). */
  readonly tokenHeader?: string;

  /**
   * `name#url` or `name#publicUrl#internalUrl`. The internal URL (the
   * public one when absent) is where the middleware reaches the cluster.
   */
  readonly defaultCluster?: string;

  /** Backing-store request timeout, seconds. Default: 10. */
  readonly backendTimeout?: number;
  /** Default: 32. */
  readonly backendMaxConcurrent?: number;

  /** Salt for token object names. Default: the reserved account name. */
  readonly tokenObjectSalt?: string;

  /** Create and delete storage accounts upstream. Default: true. */
  readonly provisionAccounts?: boolean;

  /** Request rate limit on token issuance, per client address. */
  readonly rateLimit?: RateLimitConfig;
  /** Failed credential checks. Default: 5 attempts / 15 minutes. */
  readonly loginRateLimit?: LoginRateLimitConfig;

  /** When omitted, audit logging is disabled. */
  readonly audit?: AuditConfig;

  /** Largest auth-surface request body buffered. Storage bodies are streamed. Default: 64 MiB. */
  readonly maxBodyBytes?: number;

  /** Replaces global fetch for upstream and backing-store calls. */
  readonly fetch?: FetchFn;
}

// ── Resolved Config (all defaults applied) ────────────────────────

export interface ResolvedStorewardConfig {
  readonly upstream: string;
  readonly backend: BackendConfig;
  readonly storageEndpoint: string;
  readonly port: number;
  readonly host: string;
  readonly name: string;
  readonly superAdminKey: string | null;
  readonly authType: AuthType;
  readonly authTypeSalt: string | undefined;
  readonly tokenLifeMs: number;
  readonly maxTokenLifeMs: number;
  readonly cacheTtlMs: number;
  readonly resellerPrefix: string;
  readonly reservedAccountName: string;
  readonly authPrefix: string;
  readonly tokenHeader: string;
  readonly cluster: ClusterEndpoint;
  readonly backendTimeoutMs: number;
  readonly backendMaxConcurrent: number;
  readonly tokenObjectSalt: string;
  readonly provisionAccounts: boolean;
  readonly rateLimit: RateLimitConfig | null;
  readonly loginRateLimit: LoginRateLimitConfig;
  readonly audit: AuditConfig | null;
  readonly maxBodyBytes: number;
  readonly fetch: FetchFn | undefined;
}

// ── Resolve ───────────────────────────────────────────────────────

export function resolveConfig(config: StorewardConfig): ResolvedStorewardConfig {
  const upstream = trimTrailingSlashes(requireUrl('upstream', config.upstream));
  const backend: BackendConfig = config.backend ?? { kind: 'http' };
  const cluster = parseCluster(config.defaultCluster ?? DEFAULT_CLUSTER);
  // Identity objects, ACL lookups and provisioning go to the cluster's
  // internal URL unless a backend endpoint overrides it.
  const storageEndpoint =
    backend.kind === 'http' && backend.endpoint !== undefined
      ? trimTrailingSlashes(requireUrl('backend.endpoint', backend.endpoint))
      : config.defaultCluster !== undefined
        ? cluster.internalUrl
        : `${upstream}/v1`;

  const authType = config.authType ?? DEFAULT_AUTH_TYPE;
  if (!isAuthType(authType)) {
    throw new ConfigurationError(`Unknown authType "${String(authType)}"`);
  }

  const tokenLife = positive('tokenLife', config.tokenLife ?? DEFAULT_TOKEN_LIFE_S);
  const maxTokenLife = positive('maxTokenLife', config.maxTokenLife ?? tokenLife);
  const resellerPrefix = normalizeResellerPrefix(config.resellerPrefix ?? DEFAULT_RESELLER_PREFIX);
  const reservedAccountName = config.reservedAccountName ?? `${resellerPrefix}.auth`;

  const superAdminKey = config.superAdminKey ?? null;
  if (superAdminKey !== null && superAdminKey.length === 0) {
    throw new ConfigurationError('superAdminKey must not be empty');
  }

  return {
    upstream,
    backend,
    storageEndpoint,
    port: config.port ?? DEFAULT_PORT,
    host: config.host ?? DEFAULT_HOST,
    name: config.name ?? DEFAULT_NAME,
    superAdminKey,
    authType,
    authTypeSalt: config.authTypeSalt,
    tokenLifeMs: tokenLife * 1000,
    maxTokenLifeMs: maxTokenLife * 1000,
    cacheTtlMs: positive('cacheTtl', config.cacheTtl ?? DEFAULT_CACHE_TTL_S) * 1000,
    resellerPrefix,
    reservedAccountName,
    authPrefix: normalizeAuthPrefix(config.authPrefix ?? DEFAULT_AUTH_PREFIX),
    tokenHeader: (config.tokenHeader ?? DEFAULT_TOKEN_HEADER).toLowerCase(),
    cluster,
    backendTimeoutMs:
      positive('backendTimeout', config.backendTimeout ?? DEFAULT_BACKEND_TIMEOUT_S) * 1000,
    backendMaxConcurrent: positive(
      'backendMaxConcurrent',
      config.backendMaxConcurrent ?? DEFAULT_BACKEND_MAX_CONCURRENT,
    ),
    tokenObjectSalt: config.tokenObjectSalt ?? reservedAccountName,
    provisionAccounts: config.provisionAccounts ?? true,
    rateLimit: config.rateLimit ?? null,
    loginRateLimit: config.loginRateLimit ?? {},
    audit: config.audit ?? null,
    maxBodyBytes: positive('maxBodyBytes', config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES),
    fetch: config.fetch,
  };
}

// ── Normalization ─────────────────────────────────────────────────

/** `AUTH` → `AUTH_`; the empty prefix stays empty. */
export function normalizeResellerPrefix(prefix: string): string {
  const trimmed = prefix.trim();
  if (trimmed.length === 0 || trimmed.endsWith('_')) return trimmed;
  return `${trimmed}_`;
}

/** `auth` → `/auth/`. */
export function normalizeAuthPrefix(prefix: string): string {
  let normalized = prefix.trim();
  if (!normalized.startsWith('/')) normalized = `/${normalized}`;
  if (!normalized.endsWith('/')) normalized = `${normalized}/`;
  if (normalized === '/') {
    throw new ConfigurationError('authPrefix must name a path segment');
  }
  return normalized;
}

/** `name#url` or `name#publicUrl#internalUrl`. */
export function parseCluster(value: string): ClusterEndpoint {
  const parts = value.split('#');
  const [name, publicUrl, internalUrl] = parts;
  if (
    parts.length < 2 ||
    parts.length > 3 ||
    name === undefined ||
    name.length === 0 ||
    publicUrl === undefined ||
    publicUrl.length === 0
  ) {
    throw new ConfigurationError(`Invalid cluster "${value}": expected name#url or name#public#internal`);
  }
  const publicEndpoint = trimTrailingSlashes(requireUrl('defaultCluster', publicUrl));
  return {
    name,
    publicUrl: publicEndpoint,
    internalUrl:
      internalUrl === undefined || internalUrl.length === 0
        ? publicEndpoint
        : trimTrailingSlashes(requireUrl('defaultCluster', internalUrl)),
  };
}

function positive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive number`, { field, value });
  }
  return value;
}

function requireUrl(field: string, value: string): string {
  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`${field} must be an absolute URL`, { field, value });
  }
  return value;
}

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
