import { RateLimiter, RateLimitExceededError, type RateLimiterRef } from '@hamicek/noex';
import { ErrorCode, StorewardError } from '../errors.js';

export interface RateLimitConfig {
  readonly maxRequests: number;
  readonly windowMs: number;
}

// ── RequestRateLimit ─────────────────────────────────────────────
//
// Sliding-window limit per client key, backed by the @hamicek/noex
// RateLimiter process.

export class RequestRateLimit {
  readonly #ref: RateLimiterRef;

  private constructor(ref: RateLimiterRef) {
    this.#ref = ref;
  }

  static async start(config: RateLimitConfig, name: string): Promise<RequestRateLimit> {
    const ref = await RateLimiter.start({
      maxRequests: config.maxRequests,
      windowMs: config.windowMs,
      name,
    });
    return new RequestRateLimit(ref);
  }

  /** Throws RATE_LIMITED (details.retryAfterMs) once the key is over its limit. */
  async consume(key: string): Promise<void> {
    try {
      await RateLimiter.consume(this.#ref, key);
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        throw new StorewardError(
          ErrorCode.RATE_LIMITED,
          `Rate limit exceeded. Retry after ${error.retryAfterMs}ms`,
          { retryAfterMs: error.retryAfterMs },
        );
      }
      throw error;
    }
  }

  async stop(): Promise<void> {
    await RateLimiter.stop(this.#ref);
  }
}
