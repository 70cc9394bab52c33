/**
 * Observe Error System
 *
 * Structured errors with stable codes (OBSERVE_S100, OBSERVE_L200, ...),
 * suggestions, categories and error chaining.
 *
 * @example
 * ```typescript
 * import { ObserveError } from '@kvobserve/core';
 *
 * try {
 *   new NotificationObserver({ name: '' }, onNotify);
 * } catch (error) {
 *   if (ObserveError.isCategory(error, 'source')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  DoubleRegistrationError,
  ObserveError,
  SelectorInvalidError,
  SourceInvalidError,
  UseAfterTeardownError,
  ensureObserveError,
  type ObserveErrorOptions,
  type SerializedObserveError,
} from './observe-error.js';
