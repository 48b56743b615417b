/**
 * @module
 * Effects are declarations returned by reducers; the view model decides when
 * and how they run. The time-based helpers (`sleepThen`, `debounce`, `timer`,
 * ...) are all `run` effects whose operation waits on the view model's clock.
 */

import { cloneDeepWith, isEqual, isPlainObject } from 'es-toolkit';
import { current, isDraft } from 'immer';
import { Operation, OperationResult, type OperationContext } from './operation';
import type { SendableError } from './errors';

// =================================================================
// Section 1: The Effect Type
// =================================================================

export type Effect<A, Id extends PropertyKey = string> =
  | { readonly _tag: 'None' }
  | { readonly _tag: 'Dispatch'; readonly action: A }
  | { readonly _tag: 'Run'; readonly id?: Id; readonly operation: Operation<A> }
  | { readonly _tag: 'Cancel'; readonly id: Id }
  | { readonly _tag: 'Concurrent'; readonly effects: ReadonlyArray<Effect<A, Id>> };

export type RunEffect<A, Id extends PropertyKey = string> = Extract<Effect<A, Id>, { _tag: 'Run' }>;

export interface RunOptions<Id extends PropertyKey> {
  /** Registers the task under this id, superseding any task already there. */
  id?: Id;
  /** Shown in logs. Defaults to the function's name. */
  name?: string;
}

export type ActionTask<A> = (context: OperationContext<A>) => Promise<A>;

const noneEffect = { _tag: 'None' } as const;

function containsDraft(value: unknown, seen: Set<unknown>): boolean {
  if (typeof value !== 'object' || value === null || seen.has(value)) return false;
  if (isDraft(value)) return true;
  seen.add(value);
  const children: unknown[] = Array.isArray(value) ? value : isPlainObject(value) ? Object.values(value) : [];
  return children.some((child) => containsDraft(child, seen));
}

/**
 * Replaces every immer draft reachable from `value` with a plain snapshot.
 * Reducers receive a draft that is revoked once they return, so an action
 * built from `state.items` must not keep the draft itself. Values without
 * drafts are returned as they are.
 */
export function detachDrafts<T>(value: T): T {
  if (isDraft(value)) return current(value);
  if (!containsDraft(value, new Set())) return value;
  return cloneDeepWith(value, (nested) => (isDraft(nested) ? current(nested) : undefined));
}

function runEffect<A, Id extends PropertyKey>(operation: Operation<A>, id: Id | undefined): Effect<A, Id> {
  return id === undefined ? { _tag: 'Run', operation } : { _tag: 'Run', id, operation };
}

// =================================================================
// Section 2: Constructors
// =================================================================

function none<A, Id extends PropertyKey = string>(): Effect<A, Id> {
  return noneEffect;
}

function dispatch<A, Id extends PropertyKey = string>(action: A): Effect<A, Id> {
  return { _tag: 'Dispatch', action: detachDrafts(action) };
}

function runOperation<A, Id extends PropertyKey = string>(operation: Operation<A>, id?: Id): Effect<A, Id> {
  return runEffect(operation, id);
}

/**
 * Runs `task` and feeds the action it resolves to back into the reducer.
 * A rejection is reported to the view model's `handleError`.
 *
 * @example
 * ```typescript
 * case 'load':
 *   return [Effect.run(async ({ scope }) => ({ type: 'loaded', user: await api.user(scope.signal) }), { id: 'load' })];
 * ```
 */
function run<A, Id extends PropertyKey = string>(task: ActionTask<A>, options: RunOptions<Id> = {}): Effect<A, Id> {
  const operation = new Operation<A>(
    async (context) => OperationResult.action(await task(context)),
    options.name ?? task.name,
  );
  return runEffect(operation, options.id);
}

/**
 * Like `run`, but a failure is mapped to an action instead of `handleError`.
 * Cancellation still ends the task silently.
 */
function runCatchingError<A, Id extends PropertyKey = string>(
  task: ActionTask<A>,
  toAction: (error: SendableError) => A,
  options: RunOptions<Id> = {},
): Effect<A, Id> {
  const operation = new Operation<A>(async (context) => {
    const result = await new Operation<A>(async (inner) => OperationResult.action(await task(inner))).invoke(context);
    if (result._tag === 'Error' && !result.error.isCancellationError) {
      return OperationResult.action(toAction(result.error));
    }
    return result;
  }, options.name ?? task.name);
  return runEffect(operation, options.id);
}

/** Runs `task` for its side effects only; its completion yields no action. */
function fireAndForget<A, Id extends PropertyKey = string>(
  task: (context: OperationContext<A>) => Promise<void>,
  options: RunOptions<Id> = {},
): Effect<A, Id> {
  const operation = new Operation<A>(async (context) => {
    await task(context);
    return OperationResult.none();
  }, options.name ?? task.name);
  return runEffect(operation, options.id);
}

function cancel<A, Id extends PropertyKey = string>(id: Id): Effect<A, Id> {
  return { _tag: 'Cancel', id };
}

/**
 * Runs every `run` effect in parallel. Once all of them have settled, their
 * results and the other effects are applied one by one in declared order.
 */
function concurrent<A, Id extends PropertyKey = string>(...effects: Effect<A, Id>[]): Effect<A, Id> {
  return { _tag: 'Concurrent', effects };
}

function sleep<A, Id extends PropertyKey = string>(ms: number, options: RunOptions<Id> = {}): Effect<A, Id> {
  const operation = new Operation<A>(async ({ clock, scope }) => {
    await clock.sleep(ms, scope.signal);
    return OperationResult.none();
  }, options.name ?? `sleep(${ms}ms)`);
  return runEffect(operation, options.id);
}

function sleepThen<A, Id extends PropertyKey = string>(
  ms: number,
  action: A,
  options: RunOptions<Id> = {},
): Effect<A, Id> {
  const payload = detachDrafts(action);
  const operation = new Operation<A>(async ({ clock, scope }) => {
    await clock.sleep(ms, scope.signal);
    return OperationResult.action(payload);
  }, options.name ?? `sleepThen(${ms}ms)`);
  return runEffect(operation, options.id);
}

/**
 * Waits `ms` on the clock, then runs `task`. Pair it with `cancel(id)` in the
 * reducer so that each new trigger replaces the pending one:
 *
 * ```typescript
 * case 'queryChanged':
 *   draft.query = action.query;
 *   return [Effect.cancel('search'), Effect.debounce('search', 300, () => search(action.query))];
 * ```
 */
function debounce<A, Id extends PropertyKey = string>(id: Id, ms: number, task: ActionTask<A>): Effect<A, Id> {
  const operation = new Operation<A>(async (context) => {
    await context.clock.sleep(ms, context.scope.signal);
    return OperationResult.action(await task(context));
  }, `debounce(${String(id)})`);
  return runEffect(operation, id);
}

/**
 * Registers a delayed run under `id`, exactly like `debounce`: repeated
 * triggers keep only the last one. It does not guarantee one execution per
 * interval.
 */
function throttle<A, Id extends PropertyKey = string>(id: Id, intervalMs: number, task: ActionTask<A>): Effect<A, Id> {
  const operation = new Operation<A>(async (context) => {
    await context.clock.sleep(intervalMs, context.scope.signal);
    return OperationResult.action(await task(context));
  }, `throttle(${String(id)})`);
  return runEffect(operation, id);
}

/**
 * Dispatches `action` on every tick of the clock until the task is cancelled.
 */
function timer<A, Id extends PropertyKey = string>(
  intervalMs: number,
  action: A,
  options: RunOptions<Id> = {},
): Effect<A, Id> {
  const payload = detachDrafts(action);
  const operation = new Operation<A>(async ({ clock, scope, dispatch }) => {
    for await (const _tick of clock.stream(intervalMs, scope.signal)) {
      dispatch(payload);
    }
    return OperationResult.none();
  }, options.name ?? `timer(${intervalMs}ms)`);
  return runEffect(operation, options.id);
}

export const Effect = {
  none,
  dispatch,
  run,
  runOperation,
  runCatchingError,
  fireAndForget,
  cancel,
  concurrent,
  sleep,
  sleepThen,
  debounce,
  throttle,
  timer,
};

/**
 * Detaches the actions a `dispatch` carries, including those nested in a
 * `concurrent` group. `run` operations are closures and are left untouched.
 */
export function detachEffect<A, Id extends PropertyKey>(effect: Effect<A, Id>): Effect<A, Id> {
  switch (effect._tag) {
    case 'Dispatch': {
      const action = detachDrafts(effect.action);
      return action === effect.action ? effect : { _tag: 'Dispatch', action };
    }
    case 'Concurrent':
      return { _tag: 'Concurrent', effects: effect.effects.map(detachEffect) };
    default:
      return effect;
  }
}

// =================================================================
// Section 3: Equality and Description
// =================================================================

/**
 * Structural equality, except that `run` effects compare by id only: the
 * operation inside is never inspected.
 */
export function effectEquals<A, Id extends PropertyKey>(left: Effect<A, Id>, right: Effect<A, Id>): boolean {
  switch (left._tag) {
    case 'None':
      return right._tag === 'None';
    case 'Dispatch':
      return right._tag === 'Dispatch' && isEqual(left.action, right.action);
    case 'Run':
      return right._tag === 'Run' && left.id === right.id;
    case 'Cancel':
      return right._tag === 'Cancel' && left.id === right.id;
    case 'Concurrent':
      return (
        right._tag === 'Concurrent' &&
        left.effects.length === right.effects.length &&
        left.effects.every((effect, index) => {
          const other = right.effects[index];
          return other !== undefined && effectEquals(effect, other);
        })
      );
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function describeEffect<A, Id extends PropertyKey>(effect: Effect<A, Id>): string {
  switch (effect._tag) {
    case 'None':
      return 'none';
    case 'Dispatch':
      return `dispatch(${describeValue(effect.action)})`;
    case 'Run':
      return effect.id === undefined
        ? `run(${effect.operation.name})`
        : `run(id: ${String(effect.id)}, ${effect.operation.name})`;
    case 'Cancel':
      return `cancel(id: ${String(effect.id)})`;
    case 'Concurrent':
      return `concurrent([${effect.effects.map(describeEffect).join(', ')}])`;
  }
}
