/**
 * @module
 * Time as an injectable dependency. Effects that wait (`sleepThen`, `debounce`,
 * `timer`) go through a `Clock`, so the same view model runs against real time
 * in production and against a `TestClock` in tests.
 */

import { abortError, isAbortError, onAbort, throwIfAborted } from './cancellation';

export interface Clock {
  /** Current time in milliseconds. */
  now(): number;

  /**
   * Resolves once `ms` milliseconds have elapsed on this clock; a negative
   * `ms` counts as zero, a non-finite one throws a `RangeError`.
   * Rejects with an `AbortError` if `signal` aborts first.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;

  /**
   * A lazy, infinite sequence that yields the clock's time every `intervalMs`.
   * The sequence ends when `signal` aborts or the consumer stops iterating.
   */
  stream(intervalMs: number, signal?: AbortSignal): AsyncIterableIterator<number>;
}

export function assertInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`Stream interval must be a positive number of milliseconds, got ${intervalMs}`);
  }
}

export function assertDuration(ms: number): void {
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Cannot sleep for ${ms}ms`);
  }
}

/**
 * The wall-clock implementation, backed by `setTimeout`.
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    assertDuration(ms);
    return new Promise<void>((resolve, reject) => {
      throwIfAborted(signal);
      let removeListener = () => {};
      const timer = setTimeout(() => {
        removeListener();
        resolve();
      }, Math.max(0, ms));
      removeListener = onAbort(signal, () => {
        clearTimeout(timer);
        reject(abortError());
      });
    });
  }

  stream(intervalMs: number, signal?: AbortSignal): AsyncIterableIterator<number> {
    assertInterval(intervalMs);
    return this.ticks(intervalMs, signal);
  }

  private async *ticks(intervalMs: number, signal?: AbortSignal): AsyncGenerator<number, void, undefined> {
    while (!signal?.aborted) {
      try {
        await this.sleep(intervalMs, signal);
      } catch (error) {
        if (isAbortError(error)) return;
        throw error;
      }
      yield this.now();
    }
  }
}

/** A shared instance for composition roots that do not inject their own clock. */
export const systemClock: Clock = new SystemClock();
