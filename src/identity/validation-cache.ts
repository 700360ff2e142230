// ── Types ────────────────────────────────────────────────────────

export interface CacheIdentity {
  readonly account: string;
  readonly user: string;
}

/**
 * Handed out by beginLoad() before a backing-store read. An insert
 * carrying a ticket is dropped when the key (or identity) was
 * invalidated after the ticket was issued.
 */
export interface LoadTicket {
  readonly key: string;
  readonly epoch: number;
  readonly startedAt: number;
}

export interface CacheInsertOptions {
  /** Overrides the cache's default TTL. */
  readonly ttlMs?: number;
  /** Absolute upper bound on the entry's lifetime (ms epoch). */
  readonly notAfter?: number;
  /** Binds the entry to an identity for invalidateByIdentity(). */
  readonly identity?: CacheIdentity;
  readonly ticket?: LoadTicket;
}

export interface ValidationCacheOptions {
  /** Default entry lifetime. */
  readonly ttlMs: number;
  /** Oldest entries are evicted beyond this. Default: 100 000. */
  readonly maxEntries?: number;
  /** Runs sweep() on an unref'd interval when set. */
  readonly sweepIntervalMs?: number;
  readonly now?: () => number;
}

interface CacheEntry<V> {
  readonly value: V;
  readonly insertedAt: number;
  readonly expiresAt: number;
  readonly identityKey: string | null;
}

interface InvalidationMark {
  readonly epoch: number;
  readonly at: number;
}

const DEFAULT_MAX_ENTRIES = 100_000;

// A load older than this cannot be checked against pruned marks and
// is never cached.
const MAX_LOAD_MS = 60_000;

// ── ValidationCache ──────────────────────────────────────────────
//
// Process-local TTL cache in front of the backing store. Entries are
// served only while `now < expiresAt`. A reverse index from identity
// to keys lets a credential change drop every derived entry at once.

export class ValidationCache<V> {
  readonly #ttlMs: number;
  readonly #maxEntries: number;
  readonly #now: () => number;

  readonly #entries = new Map<string, CacheEntry<V>>();

  // `${account}:${user}` → keys bound to that identity
  readonly #byIdentity = new Map<string, Set<string>>();

  // `k:${key}` | `i:${identityKey}` → last invalidation
  readonly #marks = new Map<string, InvalidationMark>();

  #epoch = 0;
  #clearedEpoch = 0;
  #sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: ValidationCacheOptions) {
    this.#ttlMs = options.ttlMs;
    this.#maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.#now = options.now ?? (() => Date.now());

    if (options.sweepIntervalMs !== undefined && options.sweepIntervalMs > 0) {
      this.#sweeper = setInterval(() => {
        this.sweep();
      }, options.sweepIntervalMs);
      this.#sweeper.unref();
    }
  }

  get size(): number {
    return this.#entries.size;
  }

  get ttlMs(): number {
    return this.#ttlMs;
  }

  lookup(key: string): V | undefined {
    const entry = this.#entries.get(key);
    if (entry === undefined) return undefined;
    if (this.#now() >= entry.expiresAt) {
      this.#remove(key, entry);
      return undefined;
    }
    return entry.value;
  }

  beginLoad(key: string): LoadTicket {
    return { key, epoch: this.#epoch, startedAt: this.#now() };
  }

  /** Returns false when the entry was not stored (stale ticket or zero lifetime). */
  insert(key: string, value: V, options: CacheInsertOptions = {}): boolean {
    const now = this.#now();
    const identityKey =
      options.identity !== undefined ? toIdentityKey(options.identity) : null;

    if (options.ticket !== undefined && this.#isStale(options.ticket, identityKey, now)) {
      return false;
    }

    let expiresAt = now + (options.ttlMs ?? this.#ttlMs);
    if (options.notAfter !== undefined) expiresAt = Math.min(expiresAt, options.notAfter);
    if (expiresAt <= now) return false;

    const previous = this.#entries.get(key);
    if (previous !== undefined) this.#remove(key, previous);

    this.#entries.set(key, { value, insertedAt: now, expiresAt, identityKey });
    if (identityKey !== null) {
      let keys = this.#byIdentity.get(identityKey);
      if (keys === undefined) {
        keys = new Set();
        this.#byIdentity.set(identityKey, keys);
      }
      keys.add(key);
    }

    this.#evictOverflow();
    return true;
  }

  invalidate(key: string): void {
    this.#mark(`k:${key}`);
    const entry = this.#entries.get(key);
    if (entry !== undefined) this.#remove(key, entry);
  }

  /** Drops every entry bound to the identity. Returns how many were removed. */
  invalidateByIdentity(account: string, user: string): number {
    const identityKey = toIdentityKey({ account, user });
    this.#mark(`i:${identityKey}`);

    const keys = this.#byIdentity.get(identityKey);
    if (keys === undefined) return 0;

    let removed = 0;
    for (const key of [...keys]) {
      const entry = this.#entries.get(key);
      if (entry !== undefined) {
        this.#remove(key, entry);
        removed++;
      }
    }
    this.#byIdentity.delete(identityKey);
    return removed;
  }

  /** Removes expired entries and old invalidation marks. */
  sweep(): number {
    const now = this.#now();
    let removed = 0;
    for (const [key, entry] of this.#entries) {
      if (now >= entry.expiresAt) {
        this.#remove(key, entry);
        removed++;
      }
    }
    this.#pruneMarks(now);
    return removed;
  }

  clear(): void {
    this.#entries.clear();
    this.#byIdentity.clear();
    this.#marks.clear();
    this.#clearedEpoch = ++this.#epoch;
  }

  /** Stops the periodic sweeper. */
  stop(): void {
    if (this.#sweeper !== null) {
      clearInterval(this.#sweeper);
      this.#sweeper = null;
    }
  }

  // ── Internals ──────────────────────────────────────────────────

  #isStale(ticket: LoadTicket, identityKey: string | null, now: number): boolean {
    if (now - ticket.startedAt > MAX_LOAD_MS) return true;
    if (ticket.epoch < this.#clearedEpoch) return true;

    const keyMark = this.#marks.get(`k:${ticket.key}`);
    if (keyMark !== undefined && keyMark.epoch > ticket.epoch) return true;

    if (identityKey !== null) {
      const identityMark = this.#marks.get(`i:${identityKey}`);
      if (identityMark !== undefined && identityMark.epoch > ticket.epoch) return true;
    }
    return false;
  }

  #mark(markKey: string): void {
    const now = this.#now();
    this.#marks.set(markKey, { epoch: ++this.#epoch, at: now });
    if (this.#marks.size > this.#maxEntries) this.#pruneMarks(now);
  }

  #pruneMarks(now: number): void {
    for (const [markKey, mark] of this.#marks) {
      if (now - mark.at > MAX_LOAD_MS) this.#marks.delete(markKey);
    }
  }

  #remove(key: string, entry: CacheEntry<V>): void {
    this.#entries.delete(key);
    if (entry.identityKey === null) return;
    const keys = this.#byIdentity.get(entry.identityKey);
    if (keys === undefined) return;
    keys.delete(key);
    if (keys.size === 0) this.#byIdentity.delete(entry.identityKey);
  }

  #evictOverflow(): void {
    while (this.#entries.size > this.#maxEntries) {
      const oldest = this.#entries.entries().next();
      if (oldest.done === true) return;
      const [key, entry] = oldest.value;
      this.#remove(key, entry);
    }
  }
}

function toIdentityKey(identity: CacheIdentity): string {
  return `${identity.account}:${identity.user}`;
}
