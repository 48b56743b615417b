/**
 * @module
 * A virtual clock for deterministic tests. Time stands still until the test
 * moves it with `advance`, `tick` or `flush`; pending sleeps and stream
 * subscriptions are buffered until then.
 */

import { abortError, onAbort } from './cancellation';
import { assertDuration, assertInterval, type Clock } from './clock';
import { ConfigurationError } from './errors';

export interface TestClockOptions {
  /** Virtual time the clock starts at. @default 0 */
  start?: number;
  /**
   * `run()` stops after this many consecutive event-loop passes without a new
   * sleep resumption or tick.
   * @default 5
   */
  idlePasses?: number;
  /** Upper bound on event-loop passes per `run()`. @default 100 */
  maxPasses?: number;
}

interface PendingSleep {
  readonly deadline: number;
  readonly order: number;
  /** Settles the sleep successfully. Safe to call after an abort. */
  resume(): void;
}

/**
 * The consumer side of `TestClock.stream`. Ticks pushed while nobody is waiting
 * are buffered, so a large jump delivers every tick in order.
 */
class TickSubscription implements AsyncIterableIterator<number> {
  private readonly buffer: number[] = [];
  private waiting: ((result: IteratorResult<number>) => void) | undefined;
  private closed = false;
  private detachAbort: () => void = () => {};

  constructor(
    readonly intervalMs: number,
    public lastTick: number,
    private readonly onClose: (subscription: TickSubscription) => void,
    signal: AbortSignal | undefined,
  ) {
    this.detachAbort = onAbort(signal, () => this.close());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(tick: number): void {
    if (this.closed) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ value: tick, done: false });
    } else {
      this.buffer.push(tick);
    }
  }

  next(): Promise<IteratorResult<number>> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) return Promise.resolve({ value: buffered, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<number>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<number> {
    return this;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;
    this.detachAbort();
    this.onClose(this);
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.({ value: undefined, done: true });
  }
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

export class TestClock implements Clock {
  private currentTime: number;
  private readonly sleeps = new Set<PendingSleep>();
  private readonly subscriptions = new Set<TickSubscription>();
  private readonly idlePasses: number;
  private readonly maxPasses: number;
  private sleepOrder = 0;
  /** Increments on every resumed sleep and emitted tick; `run()` watches it. */
  private completions = 0;

  constructor(options: TestClockOptions = {}) {
    const { start = 0, idlePasses = 5, maxPasses = 100 } = options;
    if (!Number.isInteger(idlePasses) || idlePasses < 1) {
      throw new ConfigurationError('idlePasses', 'must be a positive integer');
    }
    if (!Number.isInteger(maxPasses) || maxPasses < idlePasses) {
      throw new ConfigurationError('maxPasses', 'must be an integer no smaller than idlePasses');
    }
    this.currentTime = start;
    this.idlePasses = idlePasses;
    this.maxPasses = maxPasses;
  }

  now(): number {
    return this.currentTime;
  }

  get pendingSleepCount(): number {
    return this.sleeps.size;
  }

  get activeStreamCount(): number {
    return this.subscriptions.size;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    assertDuration(ms);
    if (signal?.aborted) return Promise.reject(abortError());

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let detachAbort: () => void = () => {};

      const entry: PendingSleep = {
        deadline: this.currentTime + Math.max(0, ms),
        order: this.sleepOrder++,
        resume: () => {
          if (settled) return;
          settled = true;
          detachAbort();
          this.sleeps.delete(entry);
          this.completions++;
          resolve();
        },
      };

      this.sleeps.add(entry);
      detachAbort = onAbort(signal, () => {
        if (settled) return;
        settled = true;
        this.sleeps.delete(entry);
        reject(abortError());
      });
    });
  }

  stream(intervalMs: number, signal?: AbortSignal): AsyncIterableIterator<number> {
    assertInterval(intervalMs);
    const subscription = new TickSubscription(
      intervalMs,
      this.currentTime,
      (closed) => this.subscriptions.delete(closed),
      signal,
    );
    if (!subscription.isClosed) this.subscriptions.add(subscription);
    return subscription;
  }

  /**
   * Moves virtual time forward, resuming every sleep whose deadline has passed
   * and emitting the ticks every stream has accumulated.
   */
  advance(byMs: number): void {
    if (!Number.isFinite(byMs) || byMs < 0) {
      throw new RangeError(`Cannot advance a clock by ${byMs}ms`);
    }
    this.currentTime += byMs;
    this.resumeDue();

    for (const subscription of [...this.subscriptions]) {
      const ticks = Math.floor((this.currentTime - subscription.lastTick) / subscription.intervalMs);
      for (let k = 1; k <= ticks; k++) {
        subscription.push(subscription.lastTick + k * subscription.intervalMs);
        this.completions++;
      }
      subscription.lastTick += ticks * subscription.intervalMs;
    }
  }

  /**
   * Pumps the event loop until the work triggered by resumed sleeps settles.
   * Sleeps registered during the pump with a deadline already reached are
   * resumed as well.
   */
  async run(): Promise<void> {
    let idle = 0;
    for (let pass = 0; pass < this.maxPasses && idle < this.idlePasses; pass++) {
      const before = this.completions;
      this.resumeDue();
      await yieldToEventLoop();
      idle = this.completions === before ? idle + 1 : 0;
    }
  }

  async tick(byMs: number): Promise<void> {
    this.advance(byMs);
    await this.run();
  }

  /** Resumes every pending sleep regardless of its deadline, then `run()`s. */
  async flush(): Promise<void> {
    for (const entry of this.orderedSleeps()) entry.resume();
    await this.run();
  }

  private resumeDue(): void {
    for (const entry of this.orderedSleeps()) {
      if (entry.deadline <= this.currentTime) entry.resume();
    }
  }

  private orderedSleeps(): PendingSleep[] {
    return [...this.sleeps].sort((a, b) => a.deadline - b.deadline || a.order - b.order);
  }
}
