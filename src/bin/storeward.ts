#!/usr/bin/env node

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { readFile, realpath } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MemoryAdapter, FileAdapter, SQLiteAdapter } from '@hamicek/noex';
import type { StorageAdapter } from '@hamicek/noex';
import { Store } from '@hamicek/noex-store';
import { StorewardServer } from '../server.js';
import {
  DEFAULT_HOST,
  DEFAULT_NAME,
  DEFAULT_PORT,
  type RateLimitConfig,
  type StorewardConfig,
} from '../config.js';
import { isAuthType } from '../identity/credential-hasher.js';
import type { LoginRateLimitConfig } from '../identity/login-rate-limiter.js';
import { isRecord, readNumber, readString, readStringMap } from '../json.js';
import { parseLogLevel, setLogLevel } from '../logger.js';

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0';

const BACKEND_KINDS = ['http', 'embedded'] as const;
const PERSISTENCE_TYPES = ['memory', 'file', 'sqlite'] as const;

/** Read when --super-admin-key is not given, to keep the key out of `ps`. */
export const SUPER_ADMIN_KEY_ENV = 'STOREWARD_SUPER_ADMIN_KEY';

// =============================================================================
// Types (exported for testing)
// =============================================================================

export interface CliValues {
  port: number | undefined;
  host: string | undefined;
  name: string | undefined;
  upstream: string | undefined;
  backend: string | undefined;
  backendEndpoint: string | undefined;
  persistence: string | undefined;
  dataDir: string | undefined;
  db: string | undefined;
  superAdminKey: string | undefined;
  authType: string | undefined;
  authTypeSalt: string | undefined;
  tokenLife: number | undefined;
  maxTokenLife: number | undefined;
  cacheTtl: number | undefined;
  resellerPrefix: string | undefined;
  authPrefix: string | undefined;
  defaultCluster: string | undefined;
  backendTimeout: number | undefined;
  noProvision: boolean | undefined;
  audit: boolean | undefined;
  logLevel: string | undefined;
}

export interface FileConfig {
  port?: number;
  host?: string;
  name?: string;
  upstream?: string;
  backend?: string;
  backendEndpoint?: string;
  backendHeaders?: Record<string, string>;
  persistence?: string;
  dataDir?: string;
  db?: string;
  superAdminKey?: string;
  authType?: string;
  authTypeSalt?: string;
  tokenLife?: number;
  maxTokenLife?: number;
  cacheTtl?: number;
  resellerPrefix?: string;
  reservedAccountName?: string;
  authPrefix?: string;
  tokenHeader?: string;
  defaultCluster?: string;
  backendTimeout?: number;
  backendMaxConcurrent?: number;
  tokenObjectSalt?: string;
  provisionAccounts?: boolean;
  audit?: boolean;
  logLevel?: string;
  rateLimit?: RateLimitConfig;
  loginRateLimit?: LoginRateLimitConfig;
}

export interface ResolvedCliConfig {
  readonly port: number;
  readonly host: string;
  readonly name: string;
  readonly upstream: string | undefined;
  readonly backend: string;
  readonly backendEndpoint: string | undefined;
  readonly backendHeaders: Record<string, string> | undefined;
  readonly persistence: string;
  readonly dataDir: string;
  readonly db: string;
  readonly superAdminKey: string | undefined;
  readonly authType: string;
  readonly authTypeSalt: string | undefined;
  readonly tokenLife: number | undefined;
  readonly maxTokenLife: number | undefined;
  readonly cacheTtl: number | undefined;
  readonly resellerPrefix: string | undefined;
  readonly reservedAccountName: string | undefined;
  readonly authPrefix: string | undefined;
  readonly tokenHeader: string | undefined;
  readonly defaultCluster: string | undefined;
  readonly backendTimeout: number | undefined;
  readonly backendMaxConcurrent: number | undefined;
  readonly tokenObjectSalt: string | undefined;
  readonly provisionAccounts: boolean;
  readonly audit: boolean;
  readonly logLevel: string;
  readonly rateLimit: RateLimitConfig | undefined;
  readonly loginRateLimit: LoginRateLimitConfig | undefined;
}

// =============================================================================
// CLI Argument Definition
// =============================================================================

const argsConfig = {
  options: {
    port: { type: 'string', short: 'p' },
    host: { type: 'string', short: 'H' },
    config: { type: 'string', short: 'c' },
    name: { type: 'string' },
    upstream: { type: 'string', short: 'u' },
    backend: { type: 'string' },
    'backend-endpoint': { type: 'string' },
    persistence: { type: 'string' },
    'data-dir': { type: 'string' },
    db: { type: 'string' },
    'super-admin-key': { type: 'string' },
    'auth-type': { type: 'string' },
    'auth-type-salt': { type: 'string' },
    'token-life': { type: 'string' },
    'max-token-life': { type: 'string' },
    'cache-ttl': { type: 'string' },
    'reseller-prefix': { type: 'string' },
    'auth-prefix': { type: 'string' },
    'default-cluster': { type: 'string' },
    'backend-timeout': { type: 'string' },
    'no-provision': { type: 'boolean' },
    audit: { type: 'boolean' },
    'log-level': { type: 'string' },
    help: { type: 'boolean', short: 'h' },
    version: { type: 'boolean', short: 'v' },
  },
  strict: true,
  allowPositionals: false,
} as const satisfies ParseArgsConfig;

// =============================================================================
// Help & Version
// =============================================================================

function printHelp(): void {
  const help = `
storeward - token auth and ACL middleware for Swift-style object storage

USAGE:
  storeward --upstream <url> [OPTIONS]

OPTIONS:
  -p, --port <number>           Port (default: ${DEFAULT_PORT})
  -H, --host <address>          Host (default: ${DEFAULT_HOST})
  -c, --config <path>           JSON config file
  -u, --upstream <url>          Storage API origin to protect (required)
      --name <string>           Instance name (default: ${DEFAULT_NAME})
      --log-level <level>       debug | info | warn | error (default: info)

  IDENTITY BACKEND:
      --backend <kind>          http | embedded (default: http)
      --backend-endpoint <url>  Storage API root for the reserved account
                                (default: <upstream>/v1)
      --persistence <type>      memory | file | sqlite, embedded only (default: memory)
      --data-dir <path>         Directory for FileAdapter (default: ./data)
      --db <path>               Path to SQLite DB (default: ./storeward.db)
      --no-provision            Do not create or delete storage accounts upstream

  AUTH:
      --super-admin-key <key>   Enables the admin API (or $${SUPER_ADMIN_KEY_ENV})
      --auth-type <type>        plaintext | sha1 | sha512 | scrypt (default: plaintext)
      --auth-type-salt <salt>   Fixed salt for sha1/sha512/scrypt
      --token-life <seconds>    Token lifetime (default: 86400)
      --max-token-life <seconds> Longest lifetime a client may request
      --cache-ttl <seconds>     Validation cache TTL (default: 300)
      --reseller-prefix <str>   Account and token prefix (default: AUTH_)
      --auth-prefix <path>      Path of the auth surface (default: /auth/)
      --default-cluster <spec>  name#url or name#public#internal
      --backend-timeout <seconds> Backing-store request timeout (default: 10)

  FEATURES:
      --audit                   Enable audit log

  -h, --help                    Show this help message
  -v, --version                 Show version number

CLI flags override values from the config file.

EXAMPLES:
  # Identities in the storage cluster itself
  storeward --upstream http://127.0.0.1:8080 --super-admin-key s3cret

  # Identities in a local SQLite file
  storeward --upstream http://127.0.0.1:8080 --backend embedded \\
    --persistence sqlite --db ./identities.db

  # From config file with a port override
  storeward --config storeward.json --port 9090
`.trim();

  console.log(help);
}

function printVersion(): void {
  console.log(`storeward v${VERSION}`);
}

// =============================================================================
// Pure Functions (exported for testing)
// =============================================================================

const DEFAULTS = {
  port: DEFAULT_PORT,
  host: DEFAULT_HOST,
  name: DEFAULT_NAME,
  backend: 'http',
  persistence: 'memory',
  dataDir: './data',
  db: './storeward.db',
  authType: 'plaintext',
  provisionAccounts: true,
  audit: false,
  logLevel: 'info',
} as const;

export function mergeConfig(
  cli: CliValues,
  file: FileConfig,
  env: Readonly<Record<string, string | undefined>> = {},
): ResolvedCliConfig {
  return {
    port: cli.port ?? file.port ?? DEFAULTS.port,
    host: cli.host ?? file.host ?? DEFAULTS.host,
    name: cli.name ?? file.name ?? DEFAULTS.name,
    upstream: cli.upstream ?? file.upstream,
    backend: cli.backend ?? file.backend ?? DEFAULTS.backend,
    backendEndpoint: cli.backendEndpoint ?? file.backendEndpoint,
    backendHeaders: file.backendHeaders,
    persistence: cli.persistence ?? file.persistence ?? DEFAULTS.persistence,
    dataDir: cli.dataDir ?? file.dataDir ?? DEFAULTS.dataDir,
    db: cli.db ?? file.db ?? DEFAULTS.db,
    superAdminKey: cli.superAdminKey ?? env[SUPER_ADMIN_KEY_ENV] ?? file.superAdminKey,
    authType: cli.authType ?? file.authType ?? DEFAULTS.authType,
    authTypeSalt: cli.authTypeSalt ?? file.authTypeSalt,
    tokenLife: cli.tokenLife ?? file.tokenLife,
    maxTokenLife: cli.maxTokenLife ?? file.maxTokenLife,
    cacheTtl: cli.cacheTtl ?? file.cacheTtl,
    resellerPrefix: cli.resellerPrefix ?? file.resellerPrefix,
    reservedAccountName: file.reservedAccountName,
    authPrefix: cli.authPrefix ?? file.authPrefix,
    tokenHeader: file.tokenHeader,
    defaultCluster: cli.defaultCluster ?? file.defaultCluster,
    backendTimeout: cli.backendTimeout ?? file.backendTimeout,
    backendMaxConcurrent: file.backendMaxConcurrent,
    tokenObjectSalt: file.tokenObjectSalt,
    provisionAccounts:
      cli.noProvision === true ? false : (file.provisionAccounts ?? DEFAULTS.provisionAccounts),
    audit: cli.audit ?? file.audit ?? DEFAULTS.audit,
    logLevel: cli.logLevel ?? file.logLevel ?? DEFAULTS.logLevel,
    rateLimit: file.rateLimit,
    loginRateLimit: file.loginRateLimit,
  };
}

export function validateConfig(config: ResolvedCliConfig): string[] {
  const errors: string[] = [];

  if (
    !Number.isInteger(config.port) ||
    config.port < 0 ||
    config.port > 65535
  ) {
    errors.push(`Invalid port: ${config.port} (must be integer 0-65535)`);
  }

  if (config.upstream === undefined || config.upstream === '') {
    errors.push('--upstream is required');
  } else if (!isAbsoluteUrl(config.upstream)) {
    errors.push(`Invalid upstream: ${config.upstream} (must be an absolute URL)`);
  }

  if (!includes(BACKEND_KINDS, config.backend)) {
    errors.push(`Unknown backend: ${config.backend} (must be http or embedded)`);
  }

  if (!includes(PERSISTENCE_TYPES, config.persistence)) {
    errors.push(
      `Unknown persistence type: ${config.persistence} (must be memory, file, or sqlite)`,
    );
  }

  if (!isAuthType(config.authType)) {
    errors.push(
      `Unknown auth type: ${config.authType} (must be plaintext, sha1, sha512, or scrypt)`,
    );
  }

  if (parseLogLevel(config.logLevel) === undefined) {
    errors.push(`Unknown log level: ${config.logLevel} (must be debug, info, warn, or error)`);
  }

  const durations: [string, number | undefined][] = [
    ['token-life', config.tokenLife],
    ['max-token-life', config.maxTokenLife],
    ['cache-ttl', config.cacheTtl],
    ['backend-timeout', config.backendTimeout],
  ];
  for (const [flag, value] of durations) {
    if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
      errors.push(`Invalid --${flag}: ${value} (must be a positive number of seconds)`);
    }
  }

  if (config.superAdminKey === '') {
    errors.push('--super-admin-key must not be empty');
  }

  return errors;
}

/** Validates the parsed JSON of a config file. */
export function parseFileConfig(value: unknown): FileConfig {
  if (!isRecord(value)) {
    throw new Error('Config file must contain a JSON object');
  }

  const config: FileConfig = {};
  const invalid: string[] = [];

  for (const key of STRING_FIELDS) {
    if (value[key] === undefined) continue;
    const str = readString(value, key);
    if (str === undefined) invalid.push(key);
    else config[key] = str;
  }
  for (const key of NUMBER_FIELDS) {
    if (value[key] === undefined) continue;
    const num = readNumber(value, key);
    if (num === undefined) invalid.push(key);
    else config[key] = num;
  }
  for (const key of BOOLEAN_FIELDS) {
    const flag = value[key];
    if (flag === undefined) continue;
    if (typeof flag !== 'boolean') invalid.push(key);
    else config[key] = flag;
  }

  if (value['backendHeaders'] !== undefined) {
    const headers = readStringMap(value['backendHeaders']);
    if (headers === undefined) invalid.push('backendHeaders');
    else config.backendHeaders = headers;
  }

  if (value['rateLimit'] !== undefined) {
    const section = value['rateLimit'];
    const maxRequests = isRecord(section) ? readNumber(section, 'maxRequests') : undefined;
    const windowMs = isRecord(section) ? readNumber(section, 'windowMs') : undefined;
    if (maxRequests === undefined || windowMs === undefined) invalid.push('rateLimit');
    else config.rateLimit = { maxRequests, windowMs };
  }

  if (value['loginRateLimit'] !== undefined) {
    const section = value['loginRateLimit'];
    if (!isRecord(section)) {
      invalid.push('loginRateLimit');
    } else {
      const maxAttempts = readNumber(section, 'maxAttempts');
      const windowMs = readNumber(section, 'windowMs');
      const maxTrackedKeys = readNumber(section, 'maxTrackedKeys');
      config.loginRateLimit = {
        ...(maxAttempts !== undefined ? { maxAttempts } : {}),
        ...(windowMs !== undefined ? { windowMs } : {}),
        ...(maxTrackedKeys !== undefined ? { maxTrackedKeys } : {}),
      };
    }
  }

  if (invalid.length > 0) {
    throw new Error(`Invalid config field(s): ${invalid.join(', ')}`);
  }
  return config;
}

const STRING_FIELDS = [
  'host',
  'name',
  'upstream',
  'backend',
  'backendEndpoint',
  'persistence',
  'dataDir',
  'db',
  'superAdminKey',
  'authType',
  'authTypeSalt',
  'resellerPrefix',
  'reservedAccountName',
  'authPrefix',
  'tokenHeader',
  'defaultCluster',
  'tokenObjectSalt',
  'logLevel',
] as const satisfies readonly (keyof FileConfig)[];

const NUMBER_FIELDS = [
  'port',
  'tokenLife',
  'maxTokenLife',
  'cacheTtl',
  'backendTimeout',
  'backendMaxConcurrent',
] as const satisfies readonly (keyof FileConfig)[];

const BOOLEAN_FIELDS = ['provisionAccounts', 'audit'] as const satisfies readonly (keyof FileConfig)[];

export function createAdapter(
  type: string,
  options: { dataDir: string; db: string },
): StorageAdapter {
  switch (type) {
    case 'memory':
      return new MemoryAdapter();
    case 'file':
      return new FileAdapter({ directory: options.dataDir });
    case 'sqlite':
      return new SQLiteAdapter({ filename: options.db });
    default:
      throw new Error(`Unknown persistence type: ${type}`);
  }
}

/** Programmatic server config; `store` is required for the embedded backend. */
export function toStorewardConfig(config: ResolvedCliConfig, store: Store | null): StorewardConfig {
  if (config.upstream === undefined) {
    throw new Error('--upstream is required');
  }
  if (!isAuthType(config.authType)) {
    throw new Error(`Unknown auth type: ${config.authType}`);
  }

  let backend: StorewardConfig['backend'];
  if (config.backend === 'embedded') {
    if (store === null) throw new Error('The embedded backend needs a store');
    backend = { kind: 'embedded', store };
  } else {
    backend = {
      kind: 'http',
      ...(config.backendEndpoint !== undefined ? { endpoint: config.backendEndpoint } : {}),
      ...(config.backendHeaders !== undefined ? { headers: config.backendHeaders } : {}),
    };
  }

  return {
    upstream: config.upstream,
    backend,
    port: config.port,
    host: config.host,
    name: config.name,
    authType: config.authType,
    provisionAccounts: config.provisionAccounts,
    ...(config.superAdminKey !== undefined ? { superAdminKey: config.superAdminKey } : {}),
    ...(config.authTypeSalt !== undefined ? { authTypeSalt: config.authTypeSalt } : {}),
    ...(config.tokenLife !== undefined ? { tokenLife: config.tokenLife } : {}),
    ...(config.maxTokenLife !== undefined ? { maxTokenLife: config.maxTokenLife } : {}),
    ...(config.cacheTtl !== undefined ? { cacheTtl: config.cacheTtl } : {}),
    ...(config.resellerPrefix !== undefined ? { resellerPrefix: config.resellerPrefix } : {}),
    ...(config.reservedAccountName !== undefined
      ? { reservedAccountName: config.reservedAccountName }
      : {}),
    ...(config.authPrefix !== undefined ? { authPrefix: config.authPrefix } : {}),
    ...(config.tokenHeader !== undefined ? { tokenHeader: config.tokenHeader } : {}),
    ...(config.defaultCluster !== undefined ? { defaultCluster: config.defaultCluster } : {}),
    ...(config.backendTimeout !== undefined ? { backendTimeout: config.backendTimeout } : {}),
    ...(config.backendMaxConcurrent !== undefined
      ? { backendMaxConcurrent: config.backendMaxConcurrent }
      : {}),
    ...(config.tokenObjectSalt !== undefined ? { tokenObjectSalt: config.tokenObjectSalt } : {}),
    ...(config.rateLimit !== undefined ? { rateLimit: config.rateLimit } : {}),
    ...(config.loginRateLimit !== undefined ? { loginRateLimit: config.loginRateLimit } : {}),
    ...(config.audit ? { audit: {} } : {}),
  };
}

function includes(values: readonly string[], value: string): boolean {
  return values.includes(value);
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function optionalNumber(raw: string | undefined): number | undefined {
  return raw !== undefined ? Number(raw) : undefined;
}

// =============================================================================
// Banner
// =============================================================================

function printBanner(config: ResolvedCliConfig, actualPort: number): void {
  const persistenceDetail =
    config.persistence === 'file'
      ? ` (${config.dataDir})`
      : config.persistence === 'sqlite'
        ? ` (${config.db})`
        : '';
  const backendDetail =
    config.backend === 'embedded' ? `embedded, ${config.persistence}${persistenceDetail}` : 'http';

  const banner = `
storeward v${VERSION}
  URL:          http://${config.host}:${actualPort}
  Upstream:     ${config.upstream ?? ''}
  Identities:   ${backendDetail}
  Auth type:    ${config.authType}
  Admin API:    ${config.superAdminKey !== undefined ? 'enabled' : 'disabled'}
  Audit:        ${config.audit ? 'enabled' : 'disabled'}
`.trim();

  console.log(banner);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  let args: ReturnType<typeof parseArgs<typeof argsConfig>>;

  try {
    args = parseArgs(argsConfig);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "storeward --help" for usage information.');
    process.exit(1);
  }

  const values = args.values;

  if (values.help) {
    printHelp();
    return;
  }

  if (values.version) {
    printVersion();
    return;
  }

  // Load config file
  let fileConfig: FileConfig = {};
  if (values.config !== undefined) {
    const configPath = resolve(values.config);
    try {
      const raw = await readFile(configPath, 'utf-8');
      fileConfig = parseFileConfig(JSON.parse(raw));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error loading config file: ${message}`);
      process.exit(1);
    }
  }

  const cliValues: CliValues = {
    port: optionalNumber(values.port),
    host: values.host,
    name: values.name,
    upstream: values.upstream,
    backend: values.backend,
    backendEndpoint: values['backend-endpoint'],
    persistence: values.persistence,
    dataDir: values['data-dir'],
    db: values.db,
    superAdminKey: values['super-admin-key'],
    authType: values['auth-type'],
    authTypeSalt: values['auth-type-salt'],
    tokenLife: optionalNumber(values['token-life']),
    maxTokenLife: optionalNumber(values['max-token-life']),
    cacheTtl: optionalNumber(values['cache-ttl']),
    resellerPrefix: values['reseller-prefix'],
    authPrefix: values['auth-prefix'],
    defaultCluster: values['default-cluster'],
    backendTimeout: optionalNumber(values['backend-timeout']),
    noProvision: values['no-provision'],
    audit: values.audit,
    logLevel: values['log-level'],
  };

  // Merge & validate
  const config = mergeConfig(cliValues, fileConfig, process.env);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const e of errors) console.error(`Error: ${e}`);
    process.exit(1);
  }

  const logLevel = parseLogLevel(config.logLevel);
  if (logLevel !== undefined) setLogLevel(logLevel);

  // Embedded identities live in a local store
  let store: Store | null = null;
  if (config.backend === 'embedded') {
    const adapter = createAdapter(config.persistence, {
      dataDir: resolve(config.dataDir),
      db: resolve(config.db),
    });

    // Fail fast if the adapter's dependencies are missing
    if (config.persistence !== 'memory') {
      try {
        await adapter.listKeys();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error: Failed to initialize ${config.persistence} persistence: ${message}`);
        process.exit(1);
      }
    }

    store = await Store.start({
      name: `${config.name}:identities`,
      persistence: {
        adapter,
        onError: (error) => {
          console.error(`[persistence] ${error.message}`);
        },
      },
    });
  }

  const server = await StorewardServer.start(toStorewardConfig(config, store));

  printBanner(config, server.port);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    await server.stop();
    if (store !== null) await store.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

// =============================================================================
// Execute (only when run directly, not when imported for testing)
// =============================================================================

async function isMainModule(): Promise<boolean> {
  if (process.argv[1] === undefined) return false;
  const thisFile = fileURLToPath(import.meta.url);
  if (process.argv[1] === thisFile) return true;
  try {
    return (await realpath(process.argv[1])) === thisFile;
  } catch {
    return false;
  }
}

if (await isMainModule()) {
  main().catch((error: unknown) => {
    console.error(
      'Fatal:',
      error instanceof Error ? error.message : error,
    );
    process.exit(1);
  });
}
