/**
 * @module
 * Operations are the asynchronous work behind `run` effects. An operation
 * receives an `OperationContext` (cancellation scope, clock, and a way to feed
 * intermediate actions back into the loop) and always settles to a tagged
 * `OperationResult`; it never rejects.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { isEqual } from 'es-toolkit';
import { createContext as createUnctx } from 'unctx';
import type { Scope } from './cancellation';
import { systemClock, type Clock } from './clock';
import { SendableError, tryCatch } from './errors';

// =================================================================
// Section 1: Results
// =================================================================

export type OperationResult<A> =
  | { readonly _tag: 'Action'; readonly action: A }
  | { readonly _tag: 'None' }
  | { readonly _tag: 'Error'; readonly error: SendableError };

const noneResult = { _tag: 'None' } as const;

export const OperationResult = {
  action<A>(action: A): OperationResult<A> {
    return { _tag: 'Action', action };
  },

  none<A>(): OperationResult<A> {
    return noneResult;
  },

  error<A>(error: unknown): OperationResult<A> {
    return { _tag: 'Error', error: SendableError.from(error) };
  },

  /** Actions compare structurally, errors by description, code and domain. */
  equals<A>(left: OperationResult<A>, right: OperationResult<A>): boolean {
    switch (left._tag) {
      case 'Action':
        return right._tag === 'Action' && isEqual(left.action, right.action);
      case 'None':
        return right._tag === 'None';
      case 'Error':
        return right._tag === 'Error' && left.error.equals(right.error);
    }
  },
};

// =================================================================
// Section 2: Context
// =================================================================

/**
 * What every running operation can reach, explicitly or through
 * `getOperationScope()`.
 */
export interface OperationScope {
  readonly scope: Scope;
  readonly clock: Clock;
}

export interface OperationContext<A> extends OperationScope {
  /**
   * Feeds an action into the owning view model while the operation keeps
   * running. Ignored once the operation has been cancelled.
   */
  readonly dispatch: (action: A) => void;
}

const operationScope = createUnctx<OperationScope>({ asyncContext: true, AsyncLocalStorage });

/**
 * The scope of the operation currently executing on this async path.
 * Throws when called outside of an operation.
 */
export function getOperationScope(): OperationScope {
  const current = operationScope.tryUse();
  if (!current) {
    throw new Error('getOperationScope() must be called while an operation is running');
  }
  return current;
}

export function tryGetOperationScope(): OperationScope | undefined {
  return operationScope.tryUse() ?? undefined;
}

/**
 * Sleeps on the current operation's clock, honouring its cancellation signal.
 * Outside of an operation the system clock is used.
 */
export function sleep(ms: number): Promise<void> {
  const current = tryGetOperationScope();
  if (!current) return systemClock.sleep(ms);
  return current.clock.sleep(ms, current.scope.signal);
}

// =================================================================
// Section 3: Operation
// =================================================================

export type OperationBody<A> = (context: OperationContext<A>) => Promise<OperationResult<A>>;

let anonymousCount = 0;

export class Operation<A> {
  readonly name: string;
  private readonly body: OperationBody<A>;

  constructor(body: OperationBody<A>, name?: string) {
    this.body = body;
    this.name = name || body.name || `operation#${++anonymousCount}`;
  }

  /**
   * Runs the body once. A throw or rejection becomes an `Error` result.
   */
  async invoke(context: OperationContext<A>): Promise<OperationResult<A>> {
    const scope: OperationScope = { scope: context.scope, clock: context.clock };
    const outcome = await tryCatch(
      () => operationScope.callAsync(scope, () => this.body(context)),
      SendableError.from,
    )();
    return outcome.match(
      (result) => result,
      (error) => OperationResult.error<A>(error),
    );
  }
}
