import { ErrorCode, StorewardError } from '../errors.js';
import { isRecord, parseJson, readString } from '../json.js';
import type {
  BackingStore,
  ContainerInfo,
  ObjectMetadata,
  PutObjectOptions,
  StoredObject,
} from './backing-store.js';
import {
  isSuccess,
  readMetadataHeaders,
  unexpectedStatus,
  writeMetadataHeaders,
  type ObjectStorageClient,
} from './object-storage-client.js';

const OBJECT_META = 'x-object-meta-';
const CONTAINER_META = 'x-container-meta-';
const LISTING_PAGE_SIZE = 10_000;

// ── HttpBackingStore ─────────────────────────────────────────────
//
// BackingStore over the storage cluster's own HTTP API. All paths
// are rooted at the reserved account.

export class HttpBackingStore implements BackingStore {
  readonly accountName: string;
  readonly #client: ObjectStorageClient;

  constructor(client: ObjectStorageClient, accountName: string) {
    this.#client = client;
    this.accountName = accountName;
  }

  async createAccount(): Promise<void> {
    const res = await this.#client.request('PUT', [this.accountName]);
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('PUT', this.accountName, res.status);
    }
  }

  async getObject(container: string, name: string): Promise<StoredObject | null> {
    const res = await this.#client.request('GET', [this.accountName, container, name]);
    if (res.status === 404) return null;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('GET', `${container}/${name}`, res.status);
    }
    return { body: res.body, metadata: readMetadataHeaders(res.headers, OBJECT_META) };
  }

  async putObject(
    container: string,
    name: string,
    body: string,
    options: PutObjectOptions = {},
  ): Promise<boolean> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      ...writeMetadataHeaders(options.metadata ?? {}, OBJECT_META),
    };
    if (options.ifNoneMatch === true) headers['if-none-match'] = '*';

    const res = await this.#client.request('PUT', [this.accountName, container, name], {
      headers,
      body,
    });
    if (res.status === 412) return false;
    if (res.status === 404) {
      throw new StorewardError(ErrorCode.NOT_FOUND, `Container "${container}" not found`);
    }
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('PUT', `${container}/${name}`, res.status);
    }
    return true;
  }

  async postObjectMetadata(
    container: string,
    name: string,
    metadata: ObjectMetadata,
  ): Promise<boolean> {
    const res = await this.#client.request('POST', [this.accountName, container, name], {
      headers: writeMetadataHeaders(metadata, OBJECT_META),
    });
    if (res.status === 404) return false;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('POST', `${container}/${name}`, res.status);
    }
    return true;
  }

  async deleteObject(container: string, name: string): Promise<boolean> {
    const res = await this.#client.request('DELETE', [this.accountName, container, name]);
    if (res.status === 404) return false;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('DELETE', `${container}/${name}`, res.status);
    }
    return true;
  }

  async listObjects(container: string): Promise<string[] | null> {
    return this.#listNames([this.accountName, container], container);
  }

  async createContainer(container: string, metadata: ObjectMetadata = {}): Promise<void> {
    const res = await this.#client.request('PUT', [this.accountName, container], {
      headers: writeMetadataHeaders(metadata, CONTAINER_META),
    });
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('PUT', container, res.status);
    }
  }

  async headContainer(container: string): Promise<ContainerInfo | null> {
    const res = await this.#client.request('HEAD', [this.accountName, container]);
    if (res.status === 404) return null;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('HEAD', container, res.status);
    }
    const count = Number(res.headers.get('x-container-object-count') ?? '0');
    return {
      metadata: readMetadataHeaders(res.headers, CONTAINER_META),
      objectCount: Number.isFinite(count) ? count : 0,
    };
  }

  async postContainerMetadata(container: string, metadata: ObjectMetadata): Promise<boolean> {
    const res = await this.#client.request('POST', [this.accountName, container], {
      headers: writeMetadataHeaders(metadata, CONTAINER_META),
    });
    if (res.status === 404) return false;
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('POST', container, res.status);
    }
    return true;
  }

  async deleteContainer(container: string): Promise<boolean> {
    const res = await this.#client.request('DELETE', [this.accountName, container]);
    if (res.status === 404) return false;
    if (res.status === 409) {
      throw new StorewardError(ErrorCode.CONFLICT, `Container "${container}" is not empty`);
    }
    if (!isSuccess(res.status)) {
      throw unexpectedStatus('DELETE', container, res.status);
    }
    return true;
  }

  async listContainers(): Promise<string[]> {
    const names = await this.#listNames([this.accountName], this.accountName);
    if (names === null) {
      throw new StorewardError(
        ErrorCode.NOT_FOUND,
        `Reserved account "${this.accountName}" does not exist`,
      );
    }
    return names;
  }

  // ── Listing ────────────────────────────────────────────────────

  async #listNames(segments: readonly string[], what: string): Promise<string[] | null> {
    const names: string[] = [];
    let marker = '';

    for (;;) {
      const res = await this.#client.request('GET', segments, {
        query: { format: 'json', limit: String(LISTING_PAGE_SIZE), marker },
      });
      if (res.status === 404) return null;
      if (res.status === 204) return names;
      if (!isSuccess(res.status)) {
        throw unexpectedStatus('GET', what, res.status);
      }

      const page = parseListing(res.body);
      if (page === null) {
        throw unexpectedStatus('GET', `${what} (unreadable listing)`, res.status);
      }
      if (page.length === 0) return names;

      names.push(...page);
      if (page.length < LISTING_PAGE_SIZE) return names;
      marker = page[page.length - 1] ?? '';
    }
  }
}

function parseListing(body: string): string[] | null {
  const parsed = parseJson(body);
  if (!Array.isArray(parsed)) return null;

  const names: string[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) return null;
    const name = readString(item, 'name');
    if (name === undefined) return null;
    names.push(name);
  }
  return names;
}
