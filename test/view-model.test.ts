import { describe, it, expect, vi } from 'vitest';
import { current, type Draft } from 'immer';
import {
  CancellationError,
  Effect,
  createViewModel,
  defineConfiguration,
  describeEffect,
  type Logger,
  type SendableError,
} from '../src';
import { TestClock, TestStore } from '../src/testing';
import { Gate, settle } from './helpers';

describe('ViewModel effect interpreter', () => {
  describe('queue ordering', () => {
    type Letter = 'A' | 'B' | 'C' | 'D';

    const lettersViewModel = () =>
      createViewModel<{ log: Letter[] }, Letter>({
        initialState: { log: [] },
        transform: (input) => [input],
        reduce: (state, action) => {
          state.log.push(action);
          switch (action) {
            case 'A':
              return [Effect.dispatch('B'), Effect.dispatch('C')];
            case 'B':
              return [Effect.dispatch('D')];
            default:
              return [];
          }
        },
      });

    it('processes generated effects breadth-first', () => {
      const viewModel = lettersViewModel();

      viewModel.perform('A');

      expect(viewModel.state.log).toEqual(['A', 'B', 'C', 'D']);
      expect(viewModel.isIdle).toBe(true);
    });

    it('reports every reduced action to the action observer in order', () => {
      const viewModel = lettersViewModel();
      const seen: Letter[] = [];
      viewModel.actionObserver = (action) => seen.push(action);

      viewModel.perform('A');

      expect(seen).toEqual(['A', 'B', 'C', 'D']);
    });

    it('performs every action a single input transforms into', () => {
      const viewModel = createViewModel<{ total: number }, number, 'double-tap'>({
        initialState: { total: 0 },
        transform: () => [1, 2],
        reduce: (state, amount) => {
          state.total += amount;
          return [];
        },
      });

      viewModel.send('double-tap');

      expect(viewModel.state.total).toBe(3);
    });
  });

  describe('single-flight draining', () => {
    type Action =
      | { type: 'start' }
      | { type: 'loaded' }
      | { type: 'ping' }
      | { type: 'pong' };

    it('queues effects performed during a suspended pass and runs them once', async () => {
      const gate = new Gate();
      const viewModel = createViewModel<{ pongs: number; loads: number }, Action>({
        initialState: { pongs: 0, loads: 0 },
        transform: (input) => [input],
        reduce: (state, action) => {
          switch (action.type) {
            case 'start':
              return [
                Effect.concurrent(
                  Effect.run(async () => {
                    await gate.opened;
                    return { type: 'loaded' };
                  }),
                ),
              ];
            case 'loaded':
              state.loads += 1;
              return [];
            case 'ping':
              return [Effect.dispatch({ type: 'pong' })];
            case 'pong':
              state.pongs += 1;
              return [];
          }
        },
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'start' });
      expect(viewModel.isProcessingEffects).toBe(true);

      store.perform({ type: 'ping' });
      store.perform({ type: 'ping' });
      expect(viewModel.state.pongs).toBe(0);

      gate.open();
      await store.waitForEffects();

      expect(viewModel.state).toEqual({ pongs: 2, loads: 1 });
      expect(store.actions.map((action) => action.type)).toEqual([
        'start',
        'ping',
        'ping',
        'loaded',
        'pong',
        'pong',
      ]);
      expect(viewModel.isProcessingEffects).toBe(false);
      store.cleanup();
    });
  });

  describe('task registry', () => {
    type Action = { type: 'load'; query: string } | { type: 'loaded'; query: string } | { type: 'stop' };

    it('cancels the task a new run with the same id supersedes and drops its late result', async () => {
      const gates = new Map([
        ['first', new Gate()],
        ['second', new Gate()],
      ]);
      const finished: Array<{ query: string; aborted: boolean }> = [];

      const viewModel = createViewModel<{ results: string[] }, Action, Action, 'search'>({
        initialState: { results: [] },
        transform: (input) => [input],
        reduce: (state, action) => {
          switch (action.type) {
            case 'load': {
              const { query } = action;
              return [
                Effect.run(
                  async ({ scope }) => {
                    await gates.get(query)?.opened;
                    finished.push({ query, aborted: scope.signal.aborted });
                    return { type: 'loaded', query };
                  },
                  { id: 'search' },
                ),
              ];
            }
            case 'loaded':
              state.results.push(action.query);
              return [];
            case 'stop':
              return [Effect.cancel('search')];
          }
        },
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'load', query: 'first' });
      store.perform({ type: 'load', query: 'second' });
      expect(viewModel.activeTaskIds).toEqual(['search']);

      gates.get('second')?.open();
      await store.waitForEffects();
      expect(viewModel.state.results).toEqual(['second']);

      gates.get('first')?.open();
      await settle();

      expect(finished).toEqual([
        { query: 'second', aborted: false },
        { query: 'first', aborted: true },
      ]);
      expect(viewModel.state.results).toEqual(['second']);
      expect(store.actions.filter((action) => action.type === 'loaded')).toHaveLength(1);
      expect(viewModel.hasTask('search')).toBe(false);
      store.cleanup();
    });

    it('cancels a running task on cancel(id) without reporting an error', async () => {
      const errors: SendableError[] = [];
      const viewModel = createViewModel<{ results: string[] }, Action, Action, 'search'>({
        initialState: { results: [] },
        transform: (input) => [input],
        reduce: (_state, action) => {
          switch (action.type) {
            case 'load':
              return [Effect.sleepThen(1000, { type: 'loaded', query: action.query }, { id: 'search' })];
            case 'stop':
              return [Effect.cancel('search')];
            default:
              return [];
          }
        },
        handleError: (error) => errors.push(error),
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'load', query: 'slow' });
      expect(store.clock.pendingSleepCount).toBe(1);

      store.perform({ type: 'stop' });
      expect(viewModel.hasTask('search')).toBe(false);
      expect(store.clock.pendingSleepCount).toBe(0);

      await store.tick(5000);
      await store.waitForEffects();

      expect(store.actions).toEqual([
        { type: 'load', query: 'slow' },
        { type: 'stop' },
      ]);
      expect(errors).toEqual([]);
      store.cleanup();
    });

    it('dispose() aborts running work and ignores later actions', async () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const clock = new TestClock();
      const viewModel = createViewModel<{ results: string[] }, Action, Action, 'search'>(
        {
          initialState: { results: [] },
          transform: (input) => [input],
          reduce: (state, action) => {
            if (action.type === 'loaded') state.results.push(action.query);
            if (action.type === 'load') {
              return [Effect.sleepThen(10, { type: 'loaded', query: action.query }, { id: 'search' })];
            }
            return [];
          },
        },
        { clock, configuration: { logger, logging: 'disabled', interceptors: [], performanceThresholdMs: 0 } },
      );

      viewModel.perform({ type: 'load', query: 'a' });
      viewModel.dispose();
      await clock.tick(10);

      expect(viewModel.activeTaskIds).toEqual([]);
      expect(viewModel.isIdle).toBe(true);
      expect(clock.pendingSleepCount).toBe(0);

      viewModel.perform({ type: 'loaded', query: 'late' });
      expect(viewModel.state.results).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('concurrent effects', () => {
    type Action = { type: 'start' } | { type: 'result'; label: string };

    it('applies results and plain effects in declared order', async () => {
      const slow = new Gate();
      const completed: string[] = [];
      const viewModel = createViewModel<{ order: string[] }, Action, Action, 'one' | 'two'>({
        initialState: { order: [] },
        transform: (input) => [input],
        reduce: (state, action) => {
          if (action.type === 'result') {
            state.order.push(action.label);
            return [];
          }
          return [
            Effect.concurrent(
              Effect.run(
                async () => {
                  await slow.opened;
                  completed.push('one');
                  return { type: 'result', label: 'one' };
                },
                { id: 'one' },
              ),
              Effect.dispatch({ type: 'result', label: 'middle' }),
              Effect.run(
                async () => {
                  completed.push('two');
                  return { type: 'result', label: 'two' };
                },
                { id: 'two' },
              ),
            ),
          ];
        },
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'start' });
      await settle();
      expect(completed).toEqual(['two']);
      expect(viewModel.state.order).toEqual([]);

      slow.open();
      await store.waitForEffects();

      expect(completed).toEqual(['two', 'one']);
      expect(viewModel.state.order).toEqual(['one', 'middle', 'two']);
      store.cleanup();
    });

    it('runs the operations in parallel', async () => {
      const clock = new TestClock();
      const viewModel = createViewModel<{ order: string[] }, Action>(
        {
          initialState: { order: [] },
          transform: (input) => [input],
          reduce: (state, action) => {
            if (action.type === 'result') {
              state.order.push(action.label);
              return [];
            }
            return [
              Effect.concurrent(
                Effect.sleepThen(100, { type: 'result', label: 'a' }),
                Effect.sleepThen(100, { type: 'result', label: 'b' }),
              ),
            ];
          },
        },
        { clock },
      );

      viewModel.perform({ type: 'start' });
      expect(clock.pendingSleepCount).toBe(2);

      await clock.tick(100);

      expect(viewModel.state.order).toEqual(['a', 'b']);
      expect(viewModel.isIdle).toBe(true);
    });
  });

  describe('operation failures', () => {
    type Action = { type: 'cancelled' } | { type: 'aborted' } | { type: 'fail' } | { type: 'failed'; message: string };

    const failingViewModel = (errors: SendableError[]) =>
      createViewModel<{ message: string }, Action, Action, 'job'>({
        initialState: { message: '' },
        transform: (input) => [input],
        reduce: (state, action) => {
          switch (action.type) {
            case 'cancelled':
              return [
                Effect.run(
                  async () => {
                    throw new CancellationError('stopped');
                  },
                  { id: 'job' },
                ),
              ];
            case 'aborted':
              return [
                Effect.run(
                  async () => {
                    throw new DOMException('request aborted', 'AbortError');
                  },
                  { id: 'job' },
                ),
              ];
            case 'fail':
              return [
                Effect.run(
                  async () => {
                    throw new Error('boom');
                  },
                  { id: 'job' },
                ),
              ];
            case 'failed':
              state.message = action.message;
              return [];
          }
        },
        handleError: (error, viewModel) => {
          errors.push(error);
          viewModel.perform({ type: 'failed', message: error.description });
        },
      });

    it('does not report cancellation errors but still clears the task', async () => {
      const errors: SendableError[] = [];
      const viewModel = failingViewModel(errors);
      const store = new TestStore(viewModel);

      store.perform({ type: 'cancelled' });
      expect(viewModel.hasTask('job')).toBe(true);
      await store.waitForEffects();
      expect(viewModel.hasTask('job')).toBe(false);

      store.perform({ type: 'aborted' });
      await store.waitForEffects();

      expect(errors).toEqual([]);
      expect(viewModel.state.message).toBe('');
      store.cleanup();
    });

    it('reports other failures to handleError exactly once', async () => {
      const errors: SendableError[] = [];
      const viewModel = failingViewModel(errors);
      const store = new TestStore(viewModel);

      store.perform({ type: 'fail' });
      await store.waitForEffects();

      expect(errors).toHaveLength(1);
      expect(errors[0]?.description).toBe('boom');
      expect(errors[0]?.domain).toBe('Error');
      expect(viewModel.state.message).toBe('boom');
      expect(viewModel.hasTask('job')).toBe(false);
      store.cleanup();
    });

    it('turns failures into actions with runCatchingError', async () => {
      const errors: SendableError[] = [];
      const viewModel = createViewModel<{ message: string }, Action>({
        initialState: { message: '' },
        transform: (input) => [input],
        reduce: (state, action) => {
          if (action.type === 'failed') {
            state.message = action.message;
            return [];
          }
          return [
            Effect.runCatchingError(
              async () => {
                throw new TypeError('bad payload');
              },
              (error) => ({ type: 'failed', message: `${error.domain}: ${error.description}` }),
            ),
          ];
        },
        handleError: (error) => errors.push(error),
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'fail' });
      await store.waitForEffects();

      expect(viewModel.state.message).toBe('TypeError: bad payload');
      expect(errors).toEqual([]);
      store.cleanup();
    });
  });

  describe('operations', () => {
    type Action = { type: 'upload' } | { type: 'progress'; percent: number } | { type: 'done' };

    it('feeds intermediate actions through the operation context', async () => {
      const viewModel = createViewModel<{ percent: number; done: boolean }, Action>({
        initialState: { percent: 0, done: false },
        transform: (input) => [input],
        reduce: (state, action) => {
          switch (action.type) {
            case 'upload':
              return [
                Effect.run(async ({ dispatch, clock, scope }) => {
                  dispatch({ type: 'progress', percent: 50 });
                  await clock.sleep(100, scope.signal);
                  dispatch({ type: 'progress', percent: 100 });
                  return { type: 'done' };
                }),
              ];
            case 'progress':
              state.percent = action.percent;
              return [];
            case 'done':
              state.done = true;
              return [];
          }
        },
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'upload' });
      expect(viewModel.state).toEqual({ percent: 50, done: false });

      await store.tick(100);

      expect(viewModel.state).toEqual({ percent: 100, done: true });
      expect(store.actions.map((action) => action.type)).toEqual(['upload', 'progress', 'progress', 'done']);
      store.cleanup();
    });

    it('treats a fire-and-forget result as no action', async () => {
      const sent: string[] = [];
      const viewModel = createViewModel<{ count: number }, 'track'>({
        initialState: { count: 0 },
        transform: (input) => [input],
        reduce: () => [
          Effect.fireAndForget(async () => {
            sent.push('tracked');
          }),
        ],
      });
      const store = new TestStore(viewModel);

      store.perform('track');
      await store.waitForEffects();

      expect(sent).toEqual(['tracked']);
      expect(store.actions).toEqual(['track']);
      store.cleanup();
    });
  });

  describe('state carried into effects', () => {
    type Action = { type: 'add'; item: string } | { type: 'saved'; items: string[] };

    interface ListState {
      items: string[];
      saved: string[];
    }

    const listViewModel = (save: (state: Draft<ListState>) => Effect<Action>) => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
      const errors: SendableError[] = [];
      const viewModel = createViewModel<ListState, Action>(
        {
          initialState: { items: [], saved: [] },
          transform: (input) => [input],
          reduce: (state, action) => {
            if (action.type === 'saved') {
              state.saved = action.items;
              return [];
            }
            state.items.push(action.item);
            return [save(state)];
          },
          handleError: (error) => errors.push(error),
        },
        { configuration: defineConfiguration({ logger }) },
      );
      return { viewModel, logger, errors };
    };

    it('snapshots draft values dispatched by the reducer', () => {
      const { viewModel, logger, errors } = listViewModel((state) =>
        Effect.dispatch({ type: 'saved', items: state.items }),
      );

      viewModel.perform({ type: 'add', item: 'milk' });
      viewModel.perform({ type: 'add', item: 'eggs' });

      expect(viewModel.state).toEqual({ items: ['milk', 'eggs'], saved: ['milk', 'eggs'] });
      expect(logger.error).not.toHaveBeenCalled();
      expect(errors).toEqual([]);
      expect(viewModel.isIdle).toBe(true);
    });

    it('snapshots draft values in dispatch effects written as literals', async () => {
      const { viewModel, logger } = listViewModel((state) =>
        Effect.concurrent({ _tag: 'Dispatch', action: { type: 'saved', items: state.items } }),
      );

      viewModel.perform({ type: 'add', item: 'milk' });
      await settle();

      expect(viewModel.state.saved).toEqual(['milk']);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('snapshots draft values in a delayed action', async () => {
      const { viewModel, errors } = listViewModel((state) =>
        Effect.sleepThen(10, { type: 'saved', items: state.items }),
      );
      const store = new TestStore(viewModel);

      store.perform({ type: 'add', item: 'milk' });
      await store.tick(10);

      expect(viewModel.state.saved).toEqual(['milk']);
      expect(errors).toEqual([]);
      store.cleanup();
    });

    it('lets a run body use a copy taken inside the reducer', async () => {
      const { viewModel, errors } = listViewModel((state) => {
        const items = current(state.items);
        return Effect.run(async (): Promise<Action> => ({ type: 'saved', items }));
      });
      const store = new TestStore(viewModel);

      store.perform({ type: 'add', item: 'milk' });
      await store.waitForEffects();

      expect(viewModel.state.saved).toEqual(['milk']);
      expect(errors).toEqual([]);
      store.cleanup();
    });
  });

  describe('observers', () => {
    it('fires state, effect and performance observers', () => {
      const viewModel = createViewModel<{ count: number }, 'increment' | 'noop' | 'incrementLater'>({
        initialState: { count: 0 },
        transform: (input) => [input],
        reduce: (state, action) => {
          if (action === 'increment') state.count += 1;
          if (action === 'incrementLater') return [Effect.none(), Effect.dispatch('increment')];
          return [];
        },
      });
      const changes: Array<[number, number]> = [];
      const effects: string[] = [];
      const timings: string[] = [];
      viewModel.stateChangeObserver = (oldState, newState) => changes.push([oldState.count, newState.count]);
      viewModel.effectObserver = (effect) => effects.push(describeEffect(effect));
      viewModel.performanceObserver = (operation) => timings.push(operation);

      viewModel.perform('noop');
      viewModel.perform('incrementLater');

      expect(changes).toEqual([[0, 1]]);
      expect(effects).toEqual(['none', 'dispatch(increment)']);
      expect(timings).toEqual(['Action processing', 'Action processing', 'Effect handling', 'Effect handling']);
    });

    it('keeps the state reference when a reducer changes nothing', () => {
      const viewModel = createViewModel<{ count: number }, 'noop'>({
        initialState: { count: 0 },
        transform: (input) => [input],
        reduce: () => [],
      });
      const before = viewModel.state;

      viewModel.perform('noop');

      expect(viewModel.state).toBe(before);
    });
  });
});
