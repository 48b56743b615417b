/**
 * @module
 * Error types shared by the runtime and the test harness. Operation failures are
 * normalized into `SendableError` values so they can be logged, compared and
 * handed to a view model's error hook; throwing code is bridged into `Result`
 * values with `tryCatch`.
 */

import { type Result, ok, err } from 'neverthrow';

// =================================================================
// Section 1: Custom Error Creation
// =================================================================

type ErrorConstructorLike = new (message?: string, options?: ErrorOptions) => Error;

/**
 * Options for creating a new custom error type.
 */
export interface ErrorTypeOptions {
  /** The name of the error class. This is used in `error.name`. */
  name: string;
  /** An optional parent error class for creating a hierarchy. Defaults to `Error`. */
  parent?: ErrorConstructorLike;
}

/**
 * A factory for hierarchical error classes whose `instanceof` checks work for
 * both the created class and its parents.
 *
 * @example
 * ```typescript
 * const StorageError = createErrorType({ name: 'StorageError' });
 * const QuotaError = createErrorType({ name: 'QuotaError', parent: StorageError });
 *
 * new QuotaError('disk full') instanceof StorageError; // true
 * ```
 */
export function createErrorType(options: ErrorTypeOptions): ErrorConstructorLike {
  const { name: errorName, parent: ParentErrorClass = Error } = options;

  class CustomError extends ParentErrorClass {
    constructor(message?: string, errorOptions?: ErrorOptions) {
      super(message, errorOptions);
      this.name = errorName;
      Object.setPrototypeOf(this, new.target.prototype);
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, CustomError);
      }
    }
  }

  Object.defineProperty(CustomError, 'name', { value: errorName, configurable: true });
  return CustomError;
}

/**
 * Thrown (or returned) by operations that stop because they were cancelled.
 * Treated exactly like an `AbortError`: logged, never reported to `handleError`.
 */
export const CancellationError = createErrorType({ name: 'CancellationError' });

// =================================================================
// Section 2: Normalized Operation Errors
// =================================================================

const CANCELLATION_DOMAINS: ReadonlySet<string> = new Set(['AbortError', 'CancellationError']);

/**
 * A value-type wrapper around whatever an operation threw.
 *
 * Two `SendableError`s are equal when their description, code and domain match,
 * regardless of the identity of the errors they were built from.
 */
export class SendableError extends Error {
  public readonly _tag = 'SendableError' as const;
  public readonly description: string;
  public readonly code: number;
  /** The name of the underlying error (`TypeError`, `AbortError`, ...). */
  public readonly domain: string;
  public readonly typeName: string;
  public readonly userInfo: Readonly<Record<string, string>>;

  constructor(fields: {
    description: string;
    code?: number;
    domain?: string;
    typeName?: string;
    userInfo?: Record<string, string>;
  }) {
    super(fields.description);
    this.name = 'SendableError';
    this.description = fields.description;
    this.code = fields.code ?? 0;
    this.domain = fields.domain ?? 'custom';
    this.typeName = fields.typeName ?? 'CustomError';
    this.userInfo = Object.freeze({ ...(fields.userInfo ?? {}) });
    Object.setPrototypeOf(this, SendableError.prototype);
  }

  /**
   * Normalizes any thrown value. A `SendableError` is returned as is.
   */
  static from(error: unknown): SendableError {
    if (error instanceof SendableError) return error;

    if (error instanceof Error) {
      const userInfo: Record<string, string> = {};
      let code = 0;
      if ('code' in error) {
        if (typeof error.code === 'number') code = error.code;
        else if (error.code !== undefined) userInfo.code = String(error.code);
      }
      if (error.cause !== undefined) {
        userInfo.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      }
      return new SendableError({
        description: error.message,
        code,
        domain: error.name,
        typeName: error.constructor.name,
        userInfo,
      });
    }

    return new SendableError({
      description: String(error),
      domain: 'unknown',
      typeName: typeof error,
    });
  }

  /** True for aborted signals and explicit `CancellationError`s. */
  get isCancellationError(): boolean {
    return CANCELLATION_DOMAINS.has(this.domain);
  }

  equals(other: SendableError): boolean {
    return (
      this.description === other.description &&
      this.code === other.code &&
      this.domain === other.domain
    );
  }
}

export function isCancellation(error: unknown): boolean {
  return SendableError.from(error).isCancellationError;
}

// =================================================================
// Section 3: Harness and Configuration Errors
// =================================================================

/**
 * Raised by the test harness when a waited-for condition does not hold in time.
 */
export class TestTimeoutError extends Error {
  public readonly _tag = 'TestTimeoutError' as const;
  public readonly timeoutMs: number;

  constructor(condition: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${condition}`);
    this.name = 'TestTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TestTimeoutError.prototype);
  }
}

export class ConfigurationError extends Error {
  public readonly _tag = 'ConfigurationError' as const;
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid configuration for '${field}': ${reason}`);
    this.name = 'ConfigurationError';
    this.field = field;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// =================================================================
// Section 4: Result-based Error Handling Utility (`tryCatch`)
// =================================================================

function defaultErrorMapper(caughtError: unknown): Error {
  if (caughtError instanceof Error) return caughtError;
  return new Error(String(caughtError !== undefined ? caughtError : 'Unknown error'));
}

/**
 * Wraps a function that may throw so that it always resolves to a `Result`.
 *
 * @example
 * ```typescript
 * const safeParse = tryCatch((text: string) => JSON.parse(text), SendableError.from);
 * const parsed = await safeParse('{');
 * parsed.isErr(); // true
 * ```
 */
export function tryCatch<T, TArgs extends unknown[], E = Error>(
  fn: (...args: TArgs) => T | Promise<T>,
  mapError: (caughtError: unknown) => E,
): (...args: TArgs) => Promise<Result<T, E>>;
export function tryCatch<T, TArgs extends unknown[]>(
  fn: (...args: TArgs) => T | Promise<T>,
): (...args: TArgs) => Promise<Result<T, Error>>;
export function tryCatch<T, TArgs extends unknown[], E>(
  fn: (...args: TArgs) => T | Promise<T>,
  mapError?: (caughtError: unknown) => E,
): (...args: TArgs) => Promise<Result<T, E | Error>> {
  const mapper: (caughtError: unknown) => E | Error = mapError ?? defaultErrorMapper;
  return async (...args: TArgs): Promise<Result<T, E | Error>> => {
    try {
      return ok(await fn(...args));
    } catch (error) {
      return err(mapper(error));
    }
  };
}
