/**
 * @module
 * The effect interpreter. A `ViewModel` owns the state, a FIFO queue of pending
 * effects, and a registry of running tasks keyed by cancellation id. Reducers
 * and queue mutations run synchronously on the caller's turn of the event loop;
 * operation results come back through the same methods, so state is only ever
 * touched from one place.
 *
 * Processing order is breadth-first: effects produced while the queue drains
 * are appended to its tail. If `a` reduces to `[dispatch(b), dispatch(c)]` and
 * `b` reduces to `[dispatch(d)]`, the reducer sees `a, b, c, d`.
 */

import { produce, type Draft } from 'immer';
import { TaskHandle } from './cancellation';
import { systemClock, type Clock } from './clock';
import { getDefaultConfiguration, type RuntimeConfiguration } from './config';
import { describeEffect, detachEffect, type Effect } from './effect';
import { SendableError } from './errors';
import { EventLog, type FieldChange, type Logger, type LoggingMode } from './logging';
import type { Operation, OperationResult } from './operation';

// =================================================================
// Section 1: Definition Types
// =================================================================

/**
 * Mutates the draft in place and returns the effects to run. Must be pure
 * apart from the draft, and must not throw.
 *
 * The draft is revoked as soon as the reducer returns. Draft values placed in
 * the action of `dispatch`, `sleepThen` or `timer` are snapshotted for you,
 * but a `run` body executes later and must only read copies taken inside the
 * reducer (`current(state.items)`, or destructured primitives), never `state`.
 */
export type Reducer<S, A, Id extends PropertyKey> = (state: Draft<S>, action: A) => ReadonlyArray<Effect<A, Id>>;

/** Maps an external input to the actions it stands for. */
export type Transform<I, A> = (input: I) => ReadonlyArray<A>;

export interface ViewModelDefinition<S extends object, A, I, Id extends PropertyKey> {
  /** Used as the log prefix. */
  readonly name?: string;
  readonly initialState: S;
  readonly transform: Transform<I, A>;
  readonly reduce: Reducer<S, A, Id>;
  /**
   * Called once for every failed operation that was not a cancellation.
   * Typically performs an action that records the failure in state.
   */
  readonly handleError?: (error: SendableError, viewModel: ViewModel<S, A, I, Id>) => void;
  /** Opt-in field-level diff attached to logged state changes. */
  readonly diffState?: (oldState: S, newState: S) => readonly FieldChange[];
}

export interface ViewModelOptions {
  /** Defaults to the process-wide configuration at construction time. */
  configuration?: RuntimeConfiguration;
  /** Overrides `configuration.logging` for this view model. */
  logging?: LoggingMode;
  clock?: Clock;
}

// =================================================================
// Section 2: The Runtime
// =================================================================

export class ViewModel<S extends object, A, I = A, Id extends PropertyKey = string> {
  readonly name: string;
  /** Used by every operation started from now on. */
  clock: Clock;

  actionObserver: ((action: A) => void) | undefined;
  stateChangeObserver: ((oldState: S, newState: S) => void) | undefined;
  effectObserver: ((effect: Effect<A, Id>) => void) | undefined;
  performanceObserver: ((operation: string, durationMs: number) => void) | undefined;

  private currentState: S;
  private readonly effectQueue: Effect<A, Id>[] = [];
  private readonly tasks = new Map<Id, TaskHandle>();
  /** Tasks without a cancellation id, and in-flight `concurrent` groups. */
  private readonly anonymousTasks = new Set<TaskHandle>();
  private processing = false;
  private disposed = false;
  private readonly logger: Logger;
  private readonly log: EventLog;

  constructor(
    private readonly definition: ViewModelDefinition<S, A, I, Id>,
    options: ViewModelOptions = {},
  ) {
    const configuration = options.configuration ?? getDefaultConfiguration();
    this.name = definition.name ?? 'ViewModel';
    this.currentState = definition.initialState;
    this.clock = options.clock ?? systemClock;
    this.logger = configuration.logger;
    this.log = new EventLog({
      viewModel: this.name,
      logger: configuration.logger,
      mode: options.logging ?? configuration.logging,
      interceptors: configuration.interceptors,
      performanceThresholdMs: configuration.performanceThresholdMs,
    });
  }

  get state(): S {
    return this.currentState;
  }

  get isProcessingEffects(): boolean {
    return this.processing;
  }

  /** Ids with a registered, still running task. */
  get activeTaskIds(): Id[] {
    return [...this.tasks.keys()];
  }

  hasTask(id: Id): boolean {
    return this.tasks.has(id);
  }

  /**
   * True when nothing is queued, draining, or running, anonymous tasks
   * included.
   */
  get isIdle(): boolean {
    return (
      !this.processing &&
      this.effectQueue.length === 0 &&
      this.tasks.size === 0 &&
      this.anonymousTasks.size === 0
    );
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** The entry point for views: transforms the input and performs each action. */
  send(input: I): void {
    for (const action of this.definition.transform(input)) {
      this.perform(action);
    }
  }

  /**
   * Reduces `action` right away, then drains the effect queue unless a pass is
   * already running, in which case that pass picks the new effects up.
   */
  perform(action: A): void {
    if (this.disposed) {
      this.logger.warn(`[${this.name}] perform() called after dispose(); action ignored`, action);
      return;
    }
    const startedAt = performance.now();
    this.processAction(action);
    this.reportPerformance('Action processing', startedAt);
    this.startProcessing();
  }

  handleError(error: SendableError): void {
    this.definition.handleError?.(error, this);
  }

  /**
   * Cancels every running task and drops queued effects. Results that arrive
   * afterwards are discarded.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.effectQueue.length = 0;
    for (const handle of this.tasks.values()) handle.cancel();
    this.tasks.clear();
    for (const handle of this.anonymousTasks) handle.cancel();
    this.anonymousTasks.clear();
  }

  // =================================================================
  // Section 3: Queue Draining
  // =================================================================

  private startProcessing(): void {
    if (this.processing) return;
    this.processNextEffect().catch((error: unknown) => this.reportUnexpected(error));
  }

  /**
   * Single-flight: a second call while a pass is active returns immediately.
   * Only `concurrent` effects suspend the pass; everything else is handled
   * synchronously.
   */
  private async processNextEffect(): Promise<void> {
    if (this.processing) return;
    this.processing = true;
    try {
      for (let effect = this.effectQueue.shift(); effect !== undefined; effect = this.effectQueue.shift()) {
        const pending = this.handleEffect(effect);
        if (pending) await pending;
      }
    } finally {
      this.processing = false;
    }
  }

  private handleEffect(effect: Effect<A, Id>): Promise<void> | undefined {
    const startedAt = performance.now();
    this.log.emit({ _tag: 'Effect', effect: describeEffect(effect) });
    this.effectObserver?.(effect);

    switch (effect._tag) {
      case 'None':
        break;
      case 'Dispatch':
        this.processAction(effect.action);
        break;
      case 'Run':
        this.processRun(effect.id, effect.operation);
        break;
      case 'Cancel':
        this.cancelExistingTask(effect.id);
        break;
      case 'Concurrent':
        return this.processConcurrent(effect.effects).finally(() =>
          this.reportPerformance('Effect handling', startedAt),
        );
    }
    this.reportPerformance('Effect handling', startedAt);
    return undefined;
  }

  /** Reduces in the current pass; the new effects join the tail of the queue. */
  private processAction(action: A): void {
    this.log.emit({ _tag: 'Action', action });
    this.actionObserver?.(action);

    const oldState = this.currentState;
    let effects: ReadonlyArray<Effect<A, Id>> = [];
    const newState = produce(oldState, (draft) => {
      effects = this.definition.reduce(draft, action).map(detachEffect);
    });

    if (newState !== oldState) {
      this.currentState = newState;
      this.log.emit({
        _tag: 'StateChange',
        oldState,
        newState,
        changes: this.definition.diffState?.(oldState, newState),
      });
      this.stateChangeObserver?.(oldState, newState);
    }

    this.effectQueue.push(...effects);
  }

  // =================================================================
  // Section 4: Tasks
  // =================================================================

  private processRun(id: Id | undefined, operation: Operation<A>): void {
    this.cancelExistingTask(id);

    const handle = new TaskHandle(id === undefined ? operation.name : String(id));
    if (id === undefined) this.anonymousTasks.add(handle);
    else this.tasks.set(id, handle);

    this.executeTask(handle, id, operation).catch((error: unknown) => this.reportUnexpected(error));
  }

  private async executeTask(handle: TaskHandle, id: Id | undefined, operation: Operation<A>): Promise<void> {
    try {
      const result = await this.executeOperation(operation, handle.signal);
      if (handle.isCancelled) {
        // Superseded or cancelled while running: the result must not be applied.
        this.log.emit({ _tag: 'Error', error: SendableError.from(handle.signal.reason) });
        return;
      }
      this.handleOperationResult(result, true);
    } finally {
      handle.markFinished();
      this.deregister(handle, id);
    }
  }

  private async executeOperation(operation: Operation<A>, signal: AbortSignal): Promise<OperationResult<A>> {
    const startedAt = performance.now();
    const result = await operation.invoke({
      scope: { signal },
      clock: this.clock,
      dispatch: (action) => {
        if (signal.aborted || this.disposed) return;
        this.processAction(action);
        this.startProcessing();
      },
    });
    this.reportPerformance('Effect operation', startedAt);
    return result;
  }

  private handleOperationResult(result: OperationResult<A>, triggerProcessing: boolean): void {
    switch (result._tag) {
      case 'Action':
        this.processAction(result.action);
        if (triggerProcessing) this.startProcessing();
        break;
      case 'None':
        break;
      case 'Error':
        this.log.emit({ _tag: 'Error', error: result.error });
        if (!result.error.isCancellationError) this.handleError(result.error);
        break;
    }
  }

  private cancelExistingTask(id: Id | undefined): void {
    if (id === undefined) return;
    this.tasks.get(id)?.cancel();
    this.tasks.delete(id);
  }

  /** A superseded task never removes its successor's entry. */
  private deregister(handle: TaskHandle, id: Id | undefined): void {
    if (id !== undefined && this.tasks.get(id) === handle) this.tasks.delete(id);
    this.anonymousTasks.delete(handle);
  }

  // =================================================================
  // Section 5: Concurrent Effects
  // =================================================================

  /**
   * Every `run` in `effects` starts at once. After all of them settle, the list
   * is walked in declared order: a `run` applies its collected result, any
   * other effect is handled as if it had been dequeued.
   */
  private async processConcurrent(effects: ReadonlyArray<Effect<A, Id>>): Promise<void> {
    const results = await this.executeParallelOperations(effects);

    for (const [index, effect] of effects.entries()) {
      if (this.disposed) return;
      if (effect._tag === 'Run') {
        const result = results.get(index);
        if (result === undefined) continue;
        this.cancelExistingTask(effect.id);
        this.handleOperationResult(result, false);
      } else {
        const pending = this.handleEffect(effect);
        if (pending) await pending;
      }
    }
  }

  private async executeParallelOperations(
    effects: ReadonlyArray<Effect<A, Id>>,
  ): Promise<Map<number, OperationResult<A>>> {
    const group = new TaskHandle('concurrent');
    const results = new Map<number, OperationResult<A>>();
    this.anonymousTasks.add(group);
    try {
      await Promise.all(
        effects.map(async (effect, index) => {
          if (effect._tag !== 'Run') return;
          results.set(index, await this.executeOperation(effect.operation, group.signal));
        }),
      );
    } finally {
      group.markFinished();
      this.anonymousTasks.delete(group);
    }
    return group.isCancelled ? new Map() : results;
  }

  // =================================================================
  // Section 6: Reporting
  // =================================================================

  private reportPerformance(operation: string, startedAt: number): void {
    const durationMs = performance.now() - startedAt;
    this.log.emit({ _tag: 'Performance', operation, durationMs });
    this.performanceObserver?.(operation, durationMs);
  }

  private reportUnexpected(error: unknown): void {
    this.logger.error(`[${this.name}] effect processing failed`, error);
  }
}

/**
 * Creates a view model from its definition.
 *
 * @example
 * ```typescript
 * const counter = createViewModel({
 *   name: 'Counter',
 *   initialState: { count: 0 },
 *   transform: (input: 'tap') => [{ type: 'increment' as const }],
 *   reduce: (state, action) => {
 *     state.count += 1;
 *     return [];
 *   },
 * });
 * counter.send('tap');
 * ```
 */
export function createViewModel<S extends object, A, I = A, Id extends PropertyKey = string>(
  definition: ViewModelDefinition<S, A, I, Id>,
  options: ViewModelOptions = {},
): ViewModel<S, A, I, Id> {
  return new ViewModel(definition, options);
}
