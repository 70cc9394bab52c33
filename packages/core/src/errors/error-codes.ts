/**
 * Observe Error Codes
 *
 * Error codes are structured as OBSERVE_[CATEGORY][NUMBER]:
 * - S: Source errors (S100-S199)
 * - L: Lifecycle errors (L200-L299)
 * - D: Delivery errors (D300-D399)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Source errors (S100-S199)
  OBSERVE_S100: {
    code: 'OBSERVE_S100',
    message: 'Source cannot be observed',
    suggestion: 'Pass an object the adapter supports, e.g. one created with observable().',
  },
  OBSERVE_S101: {
    code: 'OBSERVE_S101',
    message: 'Selector does not match anything the source can emit',
    suggestion: 'Check the property key or event name against the source.',
  },

  // Lifecycle errors (L200-L299)
  OBSERVE_L200: {
    code: 'OBSERVE_L200',
    message: 'Subscription handle registered twice',
    suggestion: 'Create a new handle instead of reopening one.',
  },
  OBSERVE_L201: {
    code: 'OBSERVE_L201',
    message: 'Delivery attempted after teardown',
    suggestion: 'The event was dropped. Nothing to do unless this is unexpected.',
  },
  OBSERVE_L202: {
    code: 'OBSERVE_L202',
    message: 'Observer has been destroyed',
    suggestion: 'Create a new observer; a destroyed observer cannot be resumed.',
  },

  // Delivery errors (D300-D399)
  OBSERVE_D300: {
    code: 'OBSERVE_D300',
    message: 'Observer callback threw',
    suggestion: 'Handle errors inside the callback or pass an onError hook.',
  },

  // Internal errors (X900-X999)
  OBSERVE_X900: {
    code: 'OBSERVE_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'source' | 'lifecycle' | 'delivery' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(8);
  switch (letter) {
    case 'S':
      return 'source';
    case 'L':
      return 'lifecycle';
    case 'D':
      return 'delivery';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
