/**
 * @module
 * Runtime configuration is an explicit value handed to each view model. The
 * process-wide default only exists for composition roots; a view model reads
 * it once, when it is constructed without a configuration of its own.
 */

import { ConfigurationError } from './errors';
import { LOG_CATEGORIES, noopLogger, type Interceptor, type Logger, type LoggingMode } from './logging';

export interface RuntimeConfiguration {
  readonly logger: Logger;
  readonly logging: LoggingMode;
  readonly interceptors: readonly Interceptor[];
  /** Performance events faster than this are not logged. Observers still fire. */
  readonly performanceThresholdMs: number;
}

const baseConfiguration: RuntimeConfiguration = Object.freeze({
  logger: noopLogger,
  logging: 'enabled',
  interceptors: [],
  performanceThresholdMs: 0,
});

function validateLoggingMode(mode: LoggingMode): void {
  if (typeof mode === 'string') {
    if (mode !== 'enabled' && mode !== 'disabled' && mode !== 'minimal') {
      throw new ConfigurationError('logging', `unknown mode '${mode}'`);
    }
    return;
  }
  const categories = 'only' in mode ? mode.only : mode.excluding;
  const unknown = categories.filter((category) => !LOG_CATEGORIES.includes(category));
  if (unknown.length > 0) {
    throw new ConfigurationError('logging', `unknown categories ${unknown.join(', ')}`);
  }
}

/**
 * Builds a validated configuration on top of the defaults.
 *
 * @example
 * ```typescript
 * const configuration = defineConfiguration({
 *   logger: console,
 *   logging: LoggingMode.excluding('stateChange'),
 *   performanceThresholdMs: 16,
 * });
 * ```
 */
export function defineConfiguration(overrides: Partial<RuntimeConfiguration> = {}): RuntimeConfiguration {
  const configuration: RuntimeConfiguration = { ...baseConfiguration, ...overrides };

  if (!Number.isFinite(configuration.performanceThresholdMs) || configuration.performanceThresholdMs < 0) {
    throw new ConfigurationError('performanceThresholdMs', 'must be a non-negative number');
  }
  validateLoggingMode(configuration.logging);

  const ids = new Set<string>();
  for (const interceptor of configuration.interceptors) {
    if (ids.has(interceptor.id)) {
      throw new ConfigurationError('interceptors', `duplicate interceptor id '${interceptor.id}'`);
    }
    ids.add(interceptor.id);
  }

  return Object.freeze({ ...configuration, interceptors: Object.freeze([...configuration.interceptors]) });
}

let defaultConfiguration: RuntimeConfiguration = baseConfiguration;

export function getDefaultConfiguration(): RuntimeConfiguration {
  return defaultConfiguration;
}

/** Replaces the process-wide default. Meant for application start-up. */
export function setDefaultConfiguration(configuration: RuntimeConfiguration): void {
  defaultConfiguration = configuration;
}

export function resetDefaultConfiguration(): void {
  defaultConfiguration = baseConfiguration;
}
