/**
 * Log levels for structured logging, least severe first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  /** Component that wrote the entry */
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Prefixed to every line, e.g. 'SyncEngine' */
  context?: string;
  /** Receives every entry instead of the console */
  handler?: (entry: LogEntry) => void;
  /** Write one JSON object per line instead of the text format */
  json?: boolean;
  /** Default: false when NODE_ENV is 'production' */
  enabled?: boolean;
}

/**
 * What components accept for their `logger` option: options to build a
 * logger, a ready logger, or `false` to silence the component.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE_METHODS = {
  debug: (line: string) => console.debug(line),
  info: (line: string) => console.info(line),
  warn: (line: string) => console.warn(line),
  error: (line: string, error?: Error) => console.error(line, error ?? ''),
} satisfies Record<LogLevel, (line: string, error?: Error) => void>;

/**
 * `2024-01-02T03:04:05.006Z INFO[Context] message {"data":1}`
 */
export function formatLogLine(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const context = entry.context ? `[${entry.context}]` : '';
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `${timestamp} ${entry.level.toUpperCase()}${context} ${entry.message}${data}`;
}

function formatJsonLine(entry: LogEntry): string {
  return JSON.stringify({
    time: new Date(entry.timestamp).toISOString(),
    level: entry.level,
    context: entry.context,
    message: entry.message,
    ...entry.data,
    error: entry.error ? { message: entry.error.message, stack: entry.error.stack } : undefined,
  });
}

function consoleHandler(json: boolean): (entry: LogEntry) => void {
  return (entry) => {
    if (json) {
      CONSOLE_METHODS[entry.level](formatJsonLine(entry));
    } else if (entry.level === 'error') {
      CONSOLE_METHODS.error(formatLogLine(entry), entry.error);
    } else {
      CONSOLE_METHODS[entry.level](formatLogLine(entry));
    }
  };
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const enabled = options.enabled ?? process.env.NODE_ENV !== 'production';
  const threshold = SEVERITY[options.level ?? 'info'];
  const handler = options.handler ?? consoleHandler(options.json ?? false);

  const write = (
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void => {
    if (!enabled || SEVERITY[level] < threshold) return;
    handler({ level, message, timestamp: Date.now(), context: options.context, data, error });
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, error, data) => write('error', message, data, error),
  };
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(value: LoggerOptions | Logger): value is Logger {
  return (
    'debug' in value &&
    typeof value.debug === 'function' &&
    'info' in value &&
    typeof value.info === 'function'
  );
}

/**
 * Turn a component's `logger` option into a logger. Options without a
 * context get the component's name.
 */
export function resolveLogger(setting: LoggerSetting | undefined, context: string): Logger {
  if (setting === false) {
    return noopLogger;
  }
  if (setting && isLogger(setting)) {
    return setting;
  }
  return createLogger({ ...setting, context: setting?.context ?? context });
}
