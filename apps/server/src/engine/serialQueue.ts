import { logger } from "@server/logger";

import { OrderTimeoutError } from "../errors";

/**
 * Serial task queue
 * Runs async tasks one at a time in submission order. A failed task does not
 * stall the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    logger.debug({ pending: this.pending }, "Serial queue: task enqueued");

    const result = this.tail.then(fn).finally(() => {
      this.pending--;
    });

    // The chain only orders tasks; each caller observes its own result.
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }

  getStats() {
    return { pending: this.pending };
  }
}

/** Reject with OrderTimeoutError when `promise` has not settled within `timeoutMs`. */
export function withOrderTimeout<T>(promise: Promise<T>, symbol: string, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new OrderTimeoutError(symbol, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
