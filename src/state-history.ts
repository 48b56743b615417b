export interface StateChangeRecord<S> {
  readonly old: S;
  readonly new: S;
  /** `Date.now()` when the change was recorded. */
  readonly timestamp: number;
}

/**
 * Records state transitions so tests can assert on intermediate states, not
 * only the final one.
 *
 * ```typescript
 * const tracker = new StateHistoryTracker<CounterState>();
 * viewModel.stateChangeObserver = (old, next) => tracker.record(old, next);
 * ```
 */
export class StateHistoryTracker<S> {
  private readonly records: StateChangeRecord<S>[] = [];

  get history(): readonly StateChangeRecord<S>[] {
    return [...this.records];
  }

  get count(): number {
    return this.records.length;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  get first(): StateChangeRecord<S> | undefined {
    return this.records[0];
  }

  get last(): StateChangeRecord<S> | undefined {
    return this.records[this.records.length - 1];
  }

  at(index: number): StateChangeRecord<S> | undefined {
    if (index < 0) return undefined;
    return this.records[index];
  }

  record(oldState: S, newState: S): void {
    this.records.push({ old: oldState, new: newState, timestamp: Date.now() });
  }

  clear(): void {
    this.records.length = 0;
  }
}
