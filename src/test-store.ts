/**
 * @module
 * A harness around a live view model. It records every action the view model
 * reduces, whether it was sent from outside or produced by an effect, and
 * swaps in a `TestClock` so timed effects only fire when the test moves time.
 *
 * Call `cleanup()` when done: it restores the observer and the clock that were
 * installed before the store was created.
 */

import type { Clock } from './clock';
import { TestTimeoutError } from './errors';
import { StateHistoryTracker } from './state-history';
import { TestClock } from './test-clock';
import type { ViewModel } from './view-model';

export interface WaitOptions {
  /** @default 1000 */
  timeoutMs?: number;
  /** Delay between two checks. @default 10 */
  intervalMs?: number;
}

export interface TestStoreOptions {
  /** The virtual clock to inject. A fresh `TestClock` by default. */
  clock?: TestClock;
}

const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function poll(condition: () => boolean, description: string, options: WaitOptions): Promise<void> {
  const { timeoutMs = 1000, intervalMs = 10 } = options;
  const startedAt = Date.now();
  while (!condition()) {
    if (Date.now() - startedAt > timeoutMs) {
      throw new TestTimeoutError(description, timeoutMs);
    }
    await pause(intervalMs);
  }
}

export class TestStore<S extends object, A, I = A, Id extends PropertyKey = string> {
  readonly viewModel: ViewModel<S, A, I, Id>;
  readonly clock: TestClock;

  private receivedActions: A[] = [];
  private readonly originalActionObserver: ((action: A) => void) | undefined;
  private readonly originalStateChangeObserver: ((oldState: S, newState: S) => void) | undefined;
  private readonly originalClock: Clock;

  constructor(viewModel: ViewModel<S, A, I, Id>, options: TestStoreOptions = {}) {
    this.viewModel = viewModel;
    this.clock = options.clock ?? new TestClock();

    this.originalClock = viewModel.clock;
    this.originalActionObserver = viewModel.actionObserver;
    this.originalStateChangeObserver = viewModel.stateChangeObserver;

    viewModel.clock = this.clock;
    const forward = this.originalActionObserver;
    viewModel.actionObserver = (action) => {
      this.receivedActions.push(action);
      forward?.(action);
    };
  }

  get state(): S {
    return this.viewModel.state;
  }

  /** Every action reduced since creation or the last `clearActions()`, in order. */
  get actions(): readonly A[] {
    return [...this.receivedActions];
  }

  clearActions(): void {
    this.receivedActions = [];
  }

  perform(action: A): void {
    this.viewModel.perform(action);
  }

  send(input: I): void {
    this.viewModel.send(input);
  }

  /** Resolves once `predicate` holds for the current state. */
  wait(predicate: (state: S) => boolean, options: WaitOptions = {}): Promise<void> {
    return poll(() => predicate(this.viewModel.state), 'state predicate', options);
  }

  /** Resolves once no task is running and no effect is queued or draining. */
  waitForEffects(options: WaitOptions = {}): Promise<void> {
    return poll(() => this.viewModel.isIdle, 'effects to finish', options);
  }

  advance(byMs: number): void {
    this.clock.advance(byMs);
  }

  tick(byMs: number): Promise<void> {
    return this.clock.tick(byMs);
  }

  flush(): Promise<void> {
    return this.clock.flush();
  }

  /**
   * Starts recording state transitions. The tracker is fed by the view model's
   * state-change observer; any observer already installed keeps receiving them.
   */
  enableStateTracking(): StateHistoryTracker<S> {
    const tracker = new StateHistoryTracker<S>();
    const forward = this.viewModel.stateChangeObserver;
    this.viewModel.stateChangeObserver = (oldState, newState) => {
      tracker.record(oldState, newState);
      forward?.(oldState, newState);
    };
    return tracker;
  }

  cleanup(): void {
    this.viewModel.actionObserver = this.originalActionObserver;
    this.viewModel.stateChangeObserver = this.originalStateChangeObserver;
    this.viewModel.clock = this.originalClock;
  }
}
