import { BackingStoreError } from '../errors.js';
import { RequestPool } from './request-pool.js';

// ── Options ──────────────────────────────────────────────────────

export const DEFAULT_BACKEND_TIMEOUT_MS = 10_000;
export const DEFAULT_BACKEND_MAX_CONCURRENT = 32;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ObjectStorageClientOptions {
  /** Storage API root, e.g. `http://127.0.0.1:8080/v1`. */
  readonly endpoint: string;
  /** Headers sent with every request (for instance a service token). */
  readonly headers?: Readonly<Record<string, string>>;
  /** Per-request timeout. Default: 10 s. */
  readonly timeoutMs?: number;
  /** Maximum in-flight requests. Default: 32. */
  readonly maxConcurrent?: number;
  /** How long a request may wait for a free slot. Default: timeoutMs. */
  readonly queueTimeoutMs?: number;
  readonly fetch?: FetchFn;
}

export interface StorageRequest {
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
  readonly query?: Readonly<Record<string, string>>;
}

export interface StorageResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly body: string;
}

// ── ObjectStorageClient ──────────────────────────────────────────
//
// Thin HTTP client for a Swift-style object-storage API. Network
// failures and timeouts become BackingStoreError; every HTTP status
// is returned to the caller.

export class ObjectStorageClient {
  readonly #endpoint: string;
  readonly #headers: Readonly<Record<string, string>>;
  readonly #timeoutMs: number;
  readonly #pool: RequestPool;
  readonly #fetch: FetchFn;

  constructor(options: ObjectStorageClientOptions) {
    this.#endpoint = options.endpoint.replace(/\/+$/, '');
    this.#headers = options.headers ?? {};
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.#pool = new RequestPool(
      options.maxConcurrent ?? DEFAULT_BACKEND_MAX_CONCURRENT,
      options.queueTimeoutMs ?? this.#timeoutMs,
    );
    this.#fetch = options.fetch ?? fetch;
  }

  get endpoint(): string {
    return this.#endpoint;
  }

  urlFor(segments: readonly string[], query?: Readonly<Record<string, string>>): string {
    const path = segments.map((segment) => encodeURIComponent(segment)).join('/');
    const url = path.length > 0 ? `${this.#endpoint}/${path}` : this.#endpoint;
    if (query === undefined) return url;
    const search = new URLSearchParams(query).toString();
    return search.length > 0 ? `${url}?${search}` : url;
  }

  request(
    method: string,
    segments: readonly string[],
    request: StorageRequest = {},
  ): Promise<StorageResponse> {
    const url = this.urlFor(segments, request.query);
    return this.#pool.run(async () => {
      let response: Response;
      try {
        response = await this.#fetch(url, {
          method,
          headers: { ...this.#headers, ...request.headers },
          body: request.body,
          signal: AbortSignal.timeout(this.#timeoutMs),
        });
      } catch (error) {
        throw toBackingStoreError(error, method, url, this.#timeoutMs);
      }

      let body: string;
      try {
        body = method === 'HEAD' ? '' : await response.text();
      } catch (error) {
        throw toBackingStoreError(error, method, url, this.#timeoutMs);
      }
      return { status: response.status, headers: response.headers, body };
    });
  }
}

function toBackingStoreError(
  error: unknown,
  method: string,
  url: string,
  timeoutMs: number,
): BackingStoreError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new BackingStoreError(`Backend request timed out after ${timeoutMs} ms`, { method, url });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new BackingStoreError(`Backend request failed: ${reason}`, { method, url });
}

/** Raised by callers for any status they have no mapping for. */
export function unexpectedStatus(method: string, what: string, status: number): BackingStoreError {
  return new BackingStoreError(`Unexpected ${status} from backend for ${method} ${what}`, {
    status,
  });
}

/** Collects `<prefix>*` headers into a metadata map keyed by the lower-case suffix. */
export function readMetadataHeaders(headers: Headers, prefix: string): Record<string, string> {
  const metadata: Record<string, string> = {};
  headers.forEach((value, name) => {
    if (name.startsWith(prefix)) {
      metadata[name.slice(prefix.length)] = value;
    }
  });
  return metadata;
}

export function writeMetadataHeaders(
  metadata: Readonly<Record<string, string>>,
  prefix: string,
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) {
    headers[`${prefix}${key}`] = value;
  }
  return headers;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
