import type { BucketDefinition, Store } from '@hamicek/noex-store';
import { ErrorCode, StorewardError } from '../errors.js';
import { isRecord, readString, readStringMap } from '../json.js';
import type {
  BackingStore,
  ContainerInfo,
  ObjectMetadata,
  PutObjectOptions,
  StoredObject,
} from './backing-store.js';

// ── Bucket Definitions ───────────────────────────────────────────

export const CONTAINERS_BUCKET_NAME = '_containers';
export const OBJECTS_BUCKET_NAME = '_objects';

export const CONTAINERS_BUCKET: BucketDefinition = {
  key: 'name',
  schema: {
    name:      { type: 'string', required: true, minLength: 1, maxLength: 256 },
    metadata:  { type: 'object' },
    createdAt: { type: 'number', generated: 'timestamp' },
  },
};

export const OBJECTS_BUCKET: BucketDefinition = {
  key: 'path',
  schema: {
    path:      { type: 'string', required: true },
    container: { type: 'string', required: true },
    name:      { type: 'string', required: true, minLength: 1 },
    body:      { type: 'string', required: true },
    metadata:  { type: 'object' },
  },
  indexes: ['container'],
};

interface ContainerRow {
  readonly name: string;
  readonly metadata: Record<string, string>;
}

interface ObjectRow {
  readonly path: string;
  readonly container: string;
  readonly name: string;
  readonly body: string;
  readonly metadata: Record<string, string>;
}

// ── EmbeddedBackingStore ─────────────────────────────────────────
//
// BackingStore kept in a @hamicek/noex-store instance: one bucket of
// containers, one bucket of objects keyed by `<container>/<name>`.
// Suitable for a single node; persistence is whatever adapter the
// Store was started with.

export class EmbeddedBackingStore implements BackingStore {
  readonly accountName: string;
  readonly #store: Store;
  // path → tail of the write chain for that path
  readonly #writeChains = new Map<string, Promise<unknown>>();

  private constructor(store: Store, accountName: string) {
    this.#store = store;
    this.accountName = accountName;
  }

  /** Defines the buckets if they don't exist yet. */
  static async start(store: Store, accountName: string): Promise<EmbeddedBackingStore> {
    if (!store.hasBucket(CONTAINERS_BUCKET_NAME)) {
      await store.defineBucket(CONTAINERS_BUCKET_NAME, CONTAINERS_BUCKET);
    }
    if (!store.hasBucket(OBJECTS_BUCKET_NAME)) {
      await store.defineBucket(OBJECTS_BUCKET_NAME, OBJECTS_BUCKET);
    }
    return new EmbeddedBackingStore(store, accountName);
  }

  async createAccount(): Promise<void> {
    // The account is the store itself.
  }

  async getObject(container: string, name: string): Promise<StoredObject | null> {
    const row = await this.#getObjectRow(objectPath(container, name));
    if (row === undefined) return null;
    return { body: row.body, metadata: row.metadata };
  }

  putObject(
    container: string,
    name: string,
    body: string,
    options: PutObjectOptions = {},
  ): Promise<boolean> {
    const path = objectPath(container, name);
    return this.#exclusive(path, async () => {
      if ((await this.#getContainerRow(container)) === undefined) {
        throw new StorewardError(ErrorCode.NOT_FOUND, `Container "${container}" not found`);
      }

      const existing = await this.#getObjectRow(path);
      const metadata = { ...(options.metadata ?? {}) };
      if (existing === undefined) {
        await this.#store.bucket(OBJECTS_BUCKET_NAME).insert({ path, container, name, body, metadata });
        return true;
      }
      if (options.ifNoneMatch === true) return false;

      await this.#store.bucket(OBJECTS_BUCKET_NAME).update(path, { body, metadata });
      return true;
    });
  }

  postObjectMetadata(container: string, name: string, metadata: ObjectMetadata): Promise<boolean> {
    const path = objectPath(container, name);
    return this.#exclusive(path, async () => {
      if ((await this.#getObjectRow(path)) === undefined) return false;
      await this.#store.bucket(OBJECTS_BUCKET_NAME).update(path, { metadata: { ...metadata } });
      return true;
    });
  }

  deleteObject(container: string, name: string): Promise<boolean> {
    const path = objectPath(container, name);
    return this.#exclusive(path, async () => {
      if ((await this.#getObjectRow(path)) === undefined) return false;
      await this.#store.bucket(OBJECTS_BUCKET_NAME).delete(path);
      return true;
    });
  }

  async listObjects(container: string): Promise<string[] | null> {
    if ((await this.#getContainerRow(container)) === undefined) return null;
    const rows = await this.#objectRows(container);
    return rows.map((row) => row.name).sort(compareNames);
  }

  async createContainer(container: string, metadata: ObjectMetadata = {}): Promise<void> {
    validateContainerName(container);
    return this.#exclusive(containerLock(container), async () => {
      const existing = await this.#getContainerRow(container);
      if (existing === undefined) {
        await this.#store.bucket(CONTAINERS_BUCKET_NAME).insert({
          name: container,
          metadata: { ...metadata },
        });
        return;
      }
      await this.#store.bucket(CONTAINERS_BUCKET_NAME).update(container, {
        metadata: { ...existing.metadata, ...metadata },
      });
    });
  }

  async headContainer(container: string): Promise<ContainerInfo | null> {
    const row = await this.#getContainerRow(container);
    if (row === undefined) return null;
    const objects = await this.#objectRows(container);
    return { metadata: row.metadata, objectCount: objects.length };
  }

  postContainerMetadata(container: string, metadata: ObjectMetadata): Promise<boolean> {
    return this.#exclusive(containerLock(container), async () => {
      const existing = await this.#getContainerRow(container);
      if (existing === undefined) return false;
      await this.#store.bucket(CONTAINERS_BUCKET_NAME).update(container, {
        metadata: { ...existing.metadata, ...metadata },
      });
      return true;
    });
  }

  deleteContainer(container: string): Promise<boolean> {
    return this.#exclusive(containerLock(container), async () => {
      if ((await this.#getContainerRow(container)) === undefined) return false;
      const objects = await this.#objectRows(container);
      if (objects.length > 0) {
        throw new StorewardError(ErrorCode.CONFLICT, `Container "${container}" is not empty`);
      }
      await this.#store.bucket(CONTAINERS_BUCKET_NAME).delete(container);
      return true;
    });
  }

  async listContainers(): Promise<string[]> {
    const records = await this.#store.bucket(CONTAINERS_BUCKET_NAME).all();
    const names: string[] = [];
    for (const record of records) {
      const row = toContainerRow(record);
      if (row !== undefined) names.push(row.name);
    }
    return names.sort(compareNames);
  }

  // ── Internals ──────────────────────────────────────────────────

  async #getObjectRow(path: string): Promise<ObjectRow | undefined> {
    return toObjectRow(await this.#store.bucket(OBJECTS_BUCKET_NAME).get(path));
  }

  async #getContainerRow(name: string): Promise<ContainerRow | undefined> {
    return toContainerRow(await this.#store.bucket(CONTAINERS_BUCKET_NAME).get(name));
  }

  async #objectRows(container: string): Promise<ObjectRow[]> {
    const records = await this.#store.bucket(OBJECTS_BUCKET_NAME).where({ container });
    const rows: ObjectRow[] = [];
    for (const record of records) {
      const row = toObjectRow(record);
      if (row !== undefined) rows.push(row);
    }
    return rows;
  }

  /**
   * Runs `task` after every earlier task for the same key has settled,
   * so a read-check-write sequence on one key is atomic.
   */
  #exclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#writeChains.get(key) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.#writeChains.set(key, tail);
    void tail.then(() => {
      if (this.#writeChains.get(key) === tail) this.#writeChains.delete(key);
    });
    return run;
  }
}

// ── Helpers ──────────────────────────────────────────────────────

function objectPath(container: string, name: string): string {
  return `${container}/${name}`;
}

function containerLock(container: string): string {
  return `${container}/`;
}

function validateContainerName(name: string): void {
  if (name.length === 0 || name.includes('/')) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Invalid container name "${name}"`);
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function toContainerRow(record: unknown): ContainerRow | undefined {
  if (!isRecord(record)) return undefined;
  const name = readString(record, 'name');
  if (name === undefined) return undefined;
  return { name, metadata: readStringMap(record['metadata']) ?? {} };
}

function toObjectRow(record: unknown): ObjectRow | undefined {
  if (!isRecord(record)) return undefined;
  const path = readString(record, 'path');
  const container = readString(record, 'container');
  const name = readString(record, 'name');
  const body = readString(record, 'body');
  if (path === undefined || container === undefined || name === undefined || body === undefined) {
    return undefined;
  }
  return { path, container, name, body, metadata: readStringMap(record['metadata']) ?? {} };
}

