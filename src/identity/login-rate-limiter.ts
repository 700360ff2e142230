import { ErrorCode, StorewardError } from '../errors.js';

interface FailureWindow {
  count: number;
  firstFailureAt: number;
}

export interface LoginRateLimitConfig {
  /** Failed attempts allowed per key within the window. Default: 5. */
  readonly maxAttempts?: number;
  /** Default: 15 minutes. */
  readonly windowMs?: number;
  /** Keys tracked at once; the oldest windows go first. Default: 10 000. */
  readonly maxTrackedKeys?: number;
}

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_WINDOW_MS = 15 * 60 * 1000;
const DEFAULT_MAX_TRACKED_KEYS = 10_000;

// ── LoginRateLimiter ─────────────────────────────────────────────
//
// Counts failed credential checks per key (`user:<act>:<usr>`,
// `ip:<address>`). Successful checks clear the key.

export class LoginRateLimiter {
  readonly #maxAttempts: number;
  readonly #windowMs: number;
  readonly #maxTrackedKeys: number;
  readonly #now: () => number;

  // Insertion order follows firstFailureAt.
  readonly #failures = new Map<string, FailureWindow>();

  constructor(config: LoginRateLimitConfig = {}, now: () => number = () => Date.now()) {
    this.#maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.#windowMs = config.windowMs ?? DEFAULT_WINDOW_MS;
    this.#maxTrackedKeys = config.maxTrackedKeys ?? DEFAULT_MAX_TRACKED_KEYS;
    this.#now = now;
  }

  /** Throws RATE_LIMITED (details.retryAfterMs) when any key is locked out. */
  check(...keys: readonly string[]): void {
    const now = this.#now();
    for (const key of keys) {
      const window = this.#failures.get(key);
      if (window === undefined) continue;

      const elapsed = now - window.firstFailureAt;
      if (elapsed > this.#windowMs) {
        this.#failures.delete(key);
        continue;
      }
      if (window.count >= this.#maxAttempts) {
        throw new StorewardError(
          ErrorCode.RATE_LIMITED,
          'Too many failed authentication attempts. Try again later.',
          { retryAfterMs: this.#windowMs - elapsed },
        );
      }
    }
  }

  recordFailure(...keys: readonly string[]): void {
    const now = this.#now();
    for (const key of keys) {
      const window = this.#failures.get(key);
      if (window === undefined || now - window.firstFailureAt > this.#windowMs) {
        this.#failures.delete(key);
        this.#failures.set(key, { count: 1, firstFailureAt: now });
      } else {
        window.count++;
      }
    }
    if (this.#failures.size > this.#maxTrackedKeys) this.#prune(now);
  }

  reset(...keys: readonly string[]): void {
    for (const key of keys) this.#failures.delete(key);
  }

  get trackedKeys(): number {
    return this.#failures.size;
  }

  #prune(now: number): void {
    for (const [key, window] of this.#failures) {
      if (now - window.firstFailureAt <= this.#windowMs) break;
      this.#failures.delete(key);
    }
    for (const key of this.#failures.keys()) {
      if (this.#failures.size <= this.#maxTrackedKeys) break;
      this.#failures.delete(key);
    }
  }
}

export function loginLimiterKeys(account: string, user: string, remoteAddress?: string): string[] {
  const keys = [`user:${account}:${user}`];
  if (remoteAddress !== undefined && remoteAddress.length > 0) keys.push(`ip:${remoteAddress}`);
  return keys;
}
