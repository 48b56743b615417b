/**
 * @module
 * The main entry point. Exports the view model runtime, effects, operations,
 * clocks, logging hooks and configuration. Test helpers live in `./testing`.
 */

// The effect interpreter
export * from './view-model';

// Effect declarations and the operations behind `run`
export * from './effect';
export * from './operation';

// Time
export * from './clock';

// Cancellation scopes
export * from './cancellation';

// Error normalization (SendableError, tryCatch, createErrorType)
export * from './errors';

// Logger, logging modes and interceptors
export * from './logging';

// Explicit runtime configuration
export * from './config';
