/**
 * tablesync error codes
 *
 * Error codes are structured as TS_[CATEGORY][NUMBER]:
 * - C: Configuration errors (C100-C199)
 * - N: Network/transport errors (N200-N299)
 * - S: Local storage errors (S300-S399)
 * - Q: Operations queue errors (Q400-Q499)
 * - L: Locking and cancellation (L500-L599)
 * - H: HTTP table service errors (H600-H699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Configuration errors (C100-C199)
  TS_C100: {
    code: 'TS_C100',
    message: 'Invalid configuration option',
    suggestion: 'Check the reported option paths against the documented ranges.',
  },
  TS_C101: {
    code: 'TS_C101',
    message: 'Required configuration option is missing',
    suggestion: 'Provide every required option before starting synchronization.',
  },
  TS_C102: {
    code: 'TS_C102',
    message: 'Unknown collection',
    suggestion: 'Register the collection in the `collections` option of the offline database.',
  },
  TS_C103: {
    code: 'TS_C103',
    message: 'Invalid entity id',
    suggestion:
      'Entity ids are 1-128 characters of letters, digits and "_.|:-", starting with a letter or digit.',
  },

  // Network/transport errors (N200-N299)
  TS_N200: {
    code: 'TS_N200',
    message: 'Remote request failed',
    suggestion: 'Check connectivity to the table service. The operation is kept for a later retry.',
  },
  TS_N201: {
    code: 'TS_N201',
    message: 'Remote request timed out',
    suggestion: 'Increase the transport `timeout` or retry when the service is less loaded.',
  },
  TS_N202: {
    code: 'TS_N202',
    message: 'Invalid response from the table service',
    suggestion: 'The service must return JSON entities carrying id, updatedAt and version.',
  },

  // Local storage errors (S300-S399)
  TS_S300: {
    code: 'TS_S300',
    message: 'Local storage operation failed',
    suggestion: 'Check the local store. Work already completed in this cycle has been kept.',
  },
  TS_S301: {
    code: 'TS_S301',
    message: 'Entity not found in the local store',
    suggestion: 'Read the entity with `get()` first, or insert it before replacing or removing it.',
  },
  TS_S302: {
    code: 'TS_S302',
    message: 'Entity already exists in the local store',
    suggestion: 'Use `replace()` to change an existing entity.',
  },

  // Operations queue errors (Q400-Q499)
  TS_Q400: {
    code: 'TS_Q400',
    message: 'Incompatible pending operation',
    suggestion:
      'The entity already has a pending operation that cannot be combined with this change.',
  },
  TS_Q401: {
    code: 'TS_Q401',
    message: 'Pending operation not found',
    suggestion: 'The operation was already pushed or discarded.',
  },

  // Locking and cancellation (L500-L599)
  TS_L500: {
    code: 'TS_L500',
    message: 'Operation cancelled',
    suggestion: 'The abort signal fired. Already applied changes are kept.',
  },

  // HTTP table service errors (H600-H699)
  TS_H600: {
    code: 'TS_H600',
    message: 'HTTP error',
    suggestion: 'Inspect the status code and payload of the error.',
  },
  TS_H601: {
    code: 'TS_H601',
    message: 'Invalid query option',
    suggestion:
      'Filters use eq, ne, gt, ge, lt, le, and, or, not and parentheses over quoted strings, numbers, booleans, null and ISO-8601 timestamps.',
  },

  // Internal errors (X900-X999)
  TS_X900: {
    code: 'TS_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'configuration'
  | 'network'
  | 'storage'
  | 'queue'
  | 'cancellation'
  | 'http'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(3);
  switch (letter) {
    case 'C':
      return 'configuration';
    case 'N':
      return 'network';
    case 'S':
      return 'storage';
    case 'Q':
      return 'queue';
    case 'L':
      return 'cancellation';
    case 'H':
      return 'http';
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
