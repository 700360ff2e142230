import { Store } from '@hamicek/noex-store';
import { EmbeddedBackingStore } from '../src/backing/embedded-backing-store.js';
import type { AccountProvisioner } from '../src/backing/account-provisioner.js';
import { AuthService, type AuthServiceConfig } from '../src/identity/auth-service.js';
import type { Logger } from '../src/logger.js';

// ── Shared test fixtures ─────────────────────────────────────────

export const RESERVED = 'AUTH_.auth';
export const SUPER_KEY = 'test-secret';

export const CLUSTER = {
  name: 'local',
  publicUrl: 'http://storage.test/v1',
  internalUrl: 'http://storage.test/v1',
} as const;

let storeCounter = 0;

export async function startBacking(): Promise<{ store: Store; backing: EmbeddedBackingStore }> {
  const store = await Store.start({ name: `storeward-test-${++storeCounter}` });
  const backing = await EmbeddedBackingStore.start(store, RESERVED);
  return { store, backing };
}

export function serviceConfig(overrides: Partial<AuthServiceConfig> = {}): AuthServiceConfig {
  return {
    resellerPrefix: 'AUTH_',
    reservedAccountName: RESERVED,
    superAdminKey: SUPER_KEY,
    authType: 'plaintext',
    tokenLifeMs: 3_600_000,
    maxTokenLifeMs: 7_200_000,
    cacheTtlMs: 60_000,
    cluster: CLUSTER,
    ...overrides,
  };
}

export interface ServiceFixture {
  readonly store: Store;
  readonly backing: EmbeddedBackingStore;
  readonly service: AuthService;
  stop(): Promise<void>;
}

export async function startService(
  options: {
    config?: Partial<AuthServiceConfig>;
    provisioner?: AccountProvisioner;
    generateToken?: () => string;
  } = {},
): Promise<ServiceFixture> {
  const { store, backing } = await startBacking();
  const service = new AuthService({
    backing,
    config: serviceConfig(options.config),
    logger: silentLogger(),
    ...(options.provisioner !== undefined ? { provisioner: options.provisioner } : {}),
    ...(options.generateToken !== undefined ? { generateToken: options.generateToken } : {}),
  });
  await service.identities.prepare();
  return {
    store,
    backing,
    service,
    stop: async () => {
      service.stop();
      await store.stop();
    },
  };
}

/** Account `acme` (id AUTH_acme) with admin `alice` and user `bob`. */
export async function seedAcme(service: AuthService): Promise<void> {
  await service.identities.createAccount('acme', { suffix: 'acme' });
  await service.identities.createUser('acme', 'alice', { key: 'alice-key', admin: true });
  await service.identities.createUser('acme', 'bob', { key: 'bob-key' });
}

export function silentLogger(): Logger {
  const logger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => logger,
  };
  return logger;
}
