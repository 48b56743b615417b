/**
 * @module
 * Logging hooks of the runtime. Output goes through an injected `Logger`
 * (anything with `debug/info/warn/error`, `console` included); every emitted
 * event is also handed to the configured interceptors. Formatting beyond a
 * one-line summary is left to the logger behind the interface.
 */

import type { SendableError } from './errors';

// =================================================================
// Section 1: Logger
// =================================================================

/**
 * Logger interface for view model logging.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const consoleLogger: Logger = console;

// =================================================================
// Section 2: Categories and Modes
// =================================================================

export type LogCategory = 'action' | 'stateChange' | 'effect' | 'performance' | 'error';

export const LOG_CATEGORIES: readonly LogCategory[] = ['action', 'stateChange', 'effect', 'performance', 'error'];

/**
 * - `enabled`: every category.
 * - `disabled`: nothing (observers still fire).
 * - `minimal`: errors only.
 * - `{ only }` / `{ excluding }`: an explicit category set.
 */
export type LoggingMode =
  | 'enabled'
  | 'disabled'
  | 'minimal'
  | { readonly only: readonly LogCategory[] }
  | { readonly excluding: readonly LogCategory[] };

export const LoggingMode = {
  only: (...categories: LogCategory[]): LoggingMode => ({ only: categories }),
  excluding: (...categories: LogCategory[]): LoggingMode => ({ excluding: categories }),
  noStateChanges: { excluding: ['stateChange'] } satisfies LoggingMode,
  performanceOnly: { only: ['performance', 'error'] } satisfies LoggingMode,
};

export function isCategoryEnabled(mode: LoggingMode, category: LogCategory): boolean {
  if (mode === 'enabled') return true;
  if (mode === 'disabled') return false;
  if (mode === 'minimal') return category === 'error';
  if ('only' in mode) return mode.only.includes(category);
  return !mode.excluding.includes(category);
}

// =================================================================
// Section 3: Events and Interceptors
// =================================================================

/** One changed field, as reported by a definition's `diffState`. */
export interface FieldChange {
  readonly field: string;
  readonly before: unknown;
  readonly after: unknown;
}

export type LogEvent =
  | { readonly _tag: 'Action'; readonly action: unknown }
  | {
      readonly _tag: 'StateChange';
      readonly oldState: unknown;
      readonly newState: unknown;
      readonly changes?: readonly FieldChange[];
    }
  | { readonly _tag: 'Effect'; readonly effect: string }
  | { readonly _tag: 'Performance'; readonly operation: string; readonly durationMs: number }
  | { readonly _tag: 'Error'; readonly error: SendableError };

const EVENT_CATEGORY = {
  Action: 'action',
  StateChange: 'stateChange',
  Effect: 'effect',
  Performance: 'performance',
  Error: 'error',
} as const satisfies Record<LogEvent['_tag'], LogCategory>;

/**
 * Receives every event a view model logs, after the mode filter. Useful for
 * forwarding to analytics or an external logging SDK.
 */
export interface Interceptor {
  readonly id: string;
  intercept(event: LogEvent, viewModel: string): void;
}

export interface EventLogOptions {
  readonly viewModel: string;
  readonly logger: Logger;
  readonly mode: LoggingMode;
  readonly interceptors: readonly Interceptor[];
  readonly performanceThresholdMs: number;
}

/**
 * The per-view-model sink: filters by mode, writes one line to the logger and
 * forwards the event to the interceptors.
 */
export class EventLog {
  constructor(private readonly options: EventLogOptions) {}

  isEnabled(category: LogCategory): boolean {
    return isCategoryEnabled(this.options.mode, category);
  }

  emit(event: LogEvent): void {
    if (!this.isEnabled(EVENT_CATEGORY[event._tag])) return;
    if (event._tag === 'Performance' && event.durationMs < this.options.performanceThresholdMs) return;

    this.write(event);
    for (const interceptor of this.options.interceptors) {
      interceptor.intercept(event, this.options.viewModel);
    }
  }

  private write(event: LogEvent): void {
    const { logger, viewModel } = this.options;
    const prefix = `[${viewModel}]`;
    switch (event._tag) {
      case 'Action':
        logger.debug(`${prefix} action`, event.action);
        break;
      case 'StateChange':
        logger.debug(`${prefix} state changed`, event.changes ?? { from: event.oldState, to: event.newState });
        break;
      case 'Effect':
        logger.debug(`${prefix} effect ${event.effect}`);
        break;
      case 'Performance':
        logger.info(`${prefix} ${event.operation} took ${event.durationMs.toFixed(2)}ms`);
        break;
      case 'Error':
        if (event.error.isCancellationError) {
          logger.debug(`${prefix} cancelled: ${event.error.description}`);
        } else {
          logger.error(`${prefix} ${event.error.domain}: ${event.error.description}`, event.error);
        }
        break;
    }
  }
}
