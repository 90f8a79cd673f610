import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

export interface TableSyncErrorOptions {
  code: ErrorCode;
  /** Overrides the message registered for the code */
  message?: string;
  /** Overrides the suggestion registered for the code */
  suggestion?: string;
  context?: Record<string, unknown>;
  cause?: Error;
}

type SerializedCause = SerializedTableSyncError | { name: string; message: string; stack?: string };

/**
 * Plain-object form of a {@link TableSyncError}, as written to logs
 */
export interface SerializedTableSyncError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedCause;
}

function serializeCause(cause: Error): SerializedCause {
  return cause instanceof TableSyncError
    ? cause.toJSON()
    : { name: cause.name, message: cause.message, stack: cause.stack };
}

/**
 * Base class of every error raised by tablesync. The code determines the
 * category and the default message and suggestion.
 *
 * @example
 * ```typescript
 * throw new TableSyncError({
 *   code: 'TS_C102',
 *   context: { collection: 'todos' }
 * });
 *
 * if (TableSyncError.isCategory(error, 'network')) {
 *   // retry later
 * }
 * ```
 */
export class TableSyncError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly suggestion?: string;
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor({ code, message, suggestion, context = {}, cause }: TableSyncErrorOptions) {
    const registered = getErrorInfo(code);
    super(message ?? registered.message, { cause });

    this.name = 'TableSyncError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.suggestion = suggestion ?? registered.suggestion;
    this.context = context;
    this.cause = cause;
  }

  static fromCode(code: ErrorCode, context?: Record<string, unknown>): TableSyncError {
    return new TableSyncError({ code, context });
  }

  /**
   * Re-raise a foreign error under a code, keeping its message
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TableSyncError {
    return new TableSyncError({ code, message: error.message, context, cause: error });
  }

  static isTableSyncError(error: unknown): error is TableSyncError {
    return error instanceof TableSyncError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return error instanceof TableSyncError && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return error instanceof TableSyncError && error.category === category;
  }

  /**
   * `[code] message`, then the context and the suggestion when present
   */
  format(): string {
    const hasContext = Object.keys(this.context).length > 0;
    return [
      `[${this.code}] ${this.message}`,
      hasContext ? `Context: ${JSON.stringify(this.context)}` : null,
      this.suggestion ? `Suggestion: ${this.suggestion}` : null,
    ]
      .filter((line): line is string => line !== null)
      .join('\n');
  }

  toJSON(): SerializedTableSyncError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
      ...(this.suggestion ? { suggestion: this.suggestion } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
      ...(this.cause ? { cause: serializeCause(this.cause) } : {}),
    };
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A single invalid option reported by configuration validation
 */
export interface ConfigurationIssue {
  /** Option path (e.g., 'collections.0.name') */
  path: string;
  message: string;
}

/**
 * Invalid or missing configuration. Thrown synchronously, before any
 * network activity.
 */
export class ConfigurationError extends TableSyncError {
  readonly issues: ConfigurationIssue[];

  constructor(
    issues: ConfigurationIssue[],
    code: ErrorCode = 'TS_C100',
    context?: Record<string, unknown>
  ) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');

    super({
      code,
      message: `Invalid configuration: ${detail}`,
      context: { ...context, issues },
    });

    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Network or timeout failure talking to the table service
 */
export class TransportError extends TableSyncError {
  /** Whether repeating the request later may succeed */
  readonly retryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    cause?: Error,
    retryable = true
  ) {
    super({ code, message, context, cause });
    this.name = 'TransportError';
    this.retryable = retryable;
  }
}

/**
 * Failure of the local store. A wrapped cause lends its message.
 */
export class LocalStorageError extends TableSyncError {
  constructor(
    code: Extract<ErrorCode, `TS_S${string}`>,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message: cause?.message, context, cause });
    this.name = 'LocalStorageError';
  }
}

/**
 * Pending operation bookkeeping error
 */
export class OperationsQueueError extends TableSyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super({ code, message, context });
    this.name = 'OperationsQueueError';
  }
}

/**
 * Raised when an abort signal stops a lock wait or a phase of work
 */
export class SyncCancelledError extends TableSyncError {
  constructor(message = 'Operation cancelled', cause?: Error) {
    super({ code: 'TS_L500', message, cause });
    this.name = 'SyncCancelledError';
  }
}

/**
 * Coerce any thrown value into a TableSyncError, wrapping foreign errors
 * under `defaultCode`
 */
export function ensureTableSyncError(
  error: unknown,
  defaultCode: ErrorCode = 'TS_X900'
): TableSyncError {
  if (error instanceof TableSyncError) return error;
  return error instanceof Error
    ? TableSyncError.wrap(error, defaultCode)
    : new TableSyncError({ code: defaultCode, message: String(error) });
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
