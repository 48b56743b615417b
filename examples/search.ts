import {
  Effect,
  LoggingMode,
  consoleLogger,
  createViewModel,
  defineConfiguration,
  getOperationScope,
  sleep,
  type SendableError,
} from '../src/index';

// === A search box backed by a slow, cancellable "API" ===

interface SearchState {
  query: string;
  results: string[];
  isLoading: boolean;
  error: string | undefined;
  elapsedSeconds: number;
}

type SearchAction =
  | { type: 'queryChanged'; query: string }
  | { type: 'resultsLoaded'; results: string[] }
  | { type: 'searchFailed'; message: string }
  | { type: 'clockTicked' }
  | { type: 'closed' };

type SearchInput = { kind: 'typed'; text: string } | { kind: 'closed' };

type TaskId = 'search' | 'clock';

const CATALOG = ['apple', 'apricot', 'banana', 'blackberry', 'blueberry', 'cherry'];

// Stands in for a network call. It reaches the clock and the cancellation
// signal of the running operation without having them passed in.
async function searchCatalog(query: string): Promise<string[]> {
  const { clock } = getOperationScope();
  const startedAt = clock.now();
  await sleep(150);
  if (query === 'error') throw new Error('catalog unavailable');
  console.log(`searched '${query}' in ${clock.now() - startedAt}ms`);
  return CATALOG.filter((item) => item.startsWith(query));
}

const searchViewModel = createViewModel<SearchState, SearchAction, SearchInput, TaskId>(
  {
    name: 'Search',
    initialState: { query: '', results: [], isLoading: false, error: undefined, elapsedSeconds: 0 },

    transform: (input) => {
      switch (input.kind) {
        case 'typed':
          return [{ type: 'queryChanged', query: input.text.trim().toLowerCase() }];
        case 'closed':
          return [{ type: 'closed' }];
      }
    },

    reduce: (state, action) => {
      switch (action.type) {
        case 'queryChanged': {
          state.query = action.query;
          state.error = undefined;
          if (action.query === '') {
            state.results = [];
            state.isLoading = false;
            return [Effect.cancel('search')];
          }
          state.isLoading = true;
          const { query } = action;
          return [
            Effect.cancel('search'),
            Effect.debounce('search', 300, async () => ({ type: 'resultsLoaded', results: await searchCatalog(query) })),
            ...(state.elapsedSeconds === 0 ? [Effect.timer<SearchAction, TaskId>(1000, { type: 'clockTicked' }, { id: 'clock' })] : []),
          ];
        }
        case 'resultsLoaded':
          state.results = action.results;
          state.isLoading = false;
          return [];
        case 'searchFailed':
          state.error = action.message;
          state.isLoading = false;
          return [];
        case 'clockTicked':
          state.elapsedSeconds += 1;
          return [];
        case 'closed':
          return [Effect.cancel('search'), Effect.cancel('clock')];
      }
    },

    handleError: (error: SendableError, viewModel) => {
      viewModel.perform({ type: 'searchFailed', message: error.description });
    },
  },
  {
    configuration: defineConfiguration({
      logger: consoleLogger,
      logging: LoggingMode.excluding('performance'),
    }),
  },
);

async function main() {
  searchViewModel.stateChangeObserver = (_old, state) => {
    const status = state.isLoading ? 'loading' : state.error ?? `${state.results.length} result(s)`;
    console.log(`"${state.query}" -> ${status} [${state.results.join(', ')}]`);
  };

  for (const text of ['b', 'bl', 'blu']) {
    searchViewModel.send({ kind: 'typed', text });
    await new Promise((resolve) => setTimeout(resolve, 100));
  }
  await new Promise((resolve) => setTimeout(resolve, 600));

  searchViewModel.send({ kind: 'typed', text: 'error' });
  await new Promise((resolve) => setTimeout(resolve, 600));

  searchViewModel.send({ kind: 'closed' });
  searchViewModel.dispose();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
