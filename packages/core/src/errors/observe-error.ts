/**
 * ObserveError - Structured error class for observer lifecycles
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an ObserveError
 */
export interface ObserveErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an ObserveError
 */
export interface SerializedObserveError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedObserveError | { name: string; message: string; stack?: string };
}

/**
 * Error class carrying a stable code, a category and debugging context.
 *
 * Only construction-time failures are ever thrown to callers. The lifecycle
 * codes (`OBSERVE_L201`, `OBSERVE_L202`) and delivery code (`OBSERVE_D300`)
 * describe conditions that are logged and otherwise ignored.
 *
 * @example
 * ```typescript
 * try {
 *   new PropertyObserver(plainObject, 'count', onChange);
 * } catch (error) {
 *   if (ObserveError.isCode(error, 'OBSERVE_S100')) {
 *     console.log('Wrap the object with observable() first');
 *   }
 * }
 * ```
 */
export class ObserveError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: ObserveErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'ObserveError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ObserveError);
    }
  }

  /**
   * Create an ObserveError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): ObserveError {
    return new ObserveError({ code, context });
  }

  /**
   * Wrap an existing error with an ObserveError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): ObserveError {
    return new ObserveError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is an ObserveError
   */
  static isObserveError(error: unknown): error is ObserveError {
    return error instanceof ObserveError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return ObserveError.isObserveError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return ObserveError.isObserveError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedObserveError {
    const result: SerializedObserveError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (ObserveError.isObserveError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * The watched source cannot be observed at all.
 */
export class SourceInvalidError extends ObserveError {
  /** Adapter that rejected the source */
  readonly adapter: string;

  constructor(adapter: string, reason: string, context?: Record<string, unknown>) {
    super({
      code: 'OBSERVE_S100',
      message: `Source cannot be observed by "${adapter}": ${reason}`,
      context: { ...context, adapter },
    });

    this.name = 'SourceInvalidError';
    this.adapter = adapter;
  }
}

/**
 * The selector names a property or event the source does not have.
 */
export class SelectorInvalidError extends ObserveError {
  /** Adapter that rejected the selector */
  readonly adapter: string;

  constructor(adapter: string, reason: string, context?: Record<string, unknown>) {
    super({
      code: 'OBSERVE_S101',
      message: `Invalid selector for "${adapter}": ${reason}`,
      context: { ...context, adapter },
    });

    this.name = 'SelectorInvalidError';
    this.adapter = adapter;
  }
}

/**
 * A subscription handle was opened a second time.
 */
export class DoubleRegistrationError extends ObserveError {
  constructor(context?: Record<string, unknown>) {
    super({ code: 'OBSERVE_L200', context });
    this.name = 'DoubleRegistrationError';
  }
}

/**
 * Describes a delivery dropped after teardown. Built for log entries only;
 * the delivery path never throws it.
 */
export class UseAfterTeardownError extends ObserveError {
  constructor(context?: Record<string, unknown>) {
    super({ code: 'OBSERVE_L201', context });
    this.name = 'UseAfterTeardownError';
  }
}

/**
 * Helper function to ensure errors are ObserveErrors
 */
export function ensureObserveError(
  error: unknown,
  defaultCode: ErrorCode = 'OBSERVE_X900'
): ObserveError {
  if (ObserveError.isObserveError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ObserveError.wrap(error, defaultCode);
  }

  return new ObserveError({
    code: defaultCode,
    message: String(error),
  });
}
