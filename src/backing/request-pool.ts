import { BackingStoreError } from '../errors.js';

interface Waiter {
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

// ── RequestPool ──────────────────────────────────────────────────
//
// Caps the number of in-flight backend requests. Callers beyond the
// cap wait in FIFO order for at most `queueTimeoutMs`.

export class RequestPool {
  readonly #maxConcurrent: number;
  readonly #queueTimeoutMs: number;
  readonly #queue: Waiter[] = [];
  #active = 0;

  constructor(maxConcurrent: number, queueTimeoutMs: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.#maxConcurrent = maxConcurrent;
    this.#queueTimeoutMs = queueTimeoutMs;
  }

  get active(): number {
    return this.#active;
  }

  get pending(): number {
    return this.#queue.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.#acquire();
    try {
      return await task();
    } finally {
      this.#release();
    }
  }

  #acquire(): Promise<void> {
    if (this.#active < this.#maxConcurrent) {
      this.#active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.#queue.indexOf(waiter);
          if (index !== -1) this.#queue.splice(index, 1);
          reject(
            new BackingStoreError('Timed out waiting for a free backend connection', {
              queueTimeoutMs: this.#queueTimeoutMs,
            }),
          );
        }, this.#queueTimeoutMs),
      };
      this.#queue.push(waiter);
    });
  }

  #release(): void {
    const next = this.#queue.shift();
    if (next === undefined) {
      this.#active--;
      return;
    }
    // The slot passes straight to the next waiter.
    clearTimeout(next.timer);
    next.resolve();
  }
}
