/**
 * Structured Logging
 *
 * A small structured logging interface. Scans accept a `logger` option; the
 * default discards everything.
 *
 * @example
 * ```ts
 * import { scanAvro, createConsoleLogger } from '@avro-columnar/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const frame = await scanAvro('events/*.avro', { logger }).collect();
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level types
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Component emitting the entry */
  component?: string;
  /** Source label (path or stream description) */
  source?: string;
  /** Position of the source in the scan */
  sourceIndex?: number;
  /** Rows in the batch or result */
  rows?: number;
  /** Configured batch size */
  batchSize?: number;
  /** Number of columns */
  columns?: number;
  /** Error code for error logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Configuration options for creating a logger
 */
export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Receives every emitted entry */
  output?: (entry: LogEntry) => void;
}

/**
 * Configuration options for console logger
 */
export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for human-readable lines */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps every entry for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// ============================================================================
// Level Utilities
// ============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Check if a level is at least as severe as a minimum level.
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

// ============================================================================
// Logger Factories
// ============================================================================

/**
 * Create a logger that hands entries at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isLevelEnabled(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
  };
}

/**
 * Render an entry the way the console logger prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message, stack: entry.error.stack },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger that writes to the console (stderr for warnings and errors).
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (entry.level === 'warn' || entry.level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Create a logger that discards everything.
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries in memory.
 *
 * @example
 * ```ts
 * const logger = createTestLogger();
 * await scanAvro(bytes, { logger }).collect();
 * expect(logger.getLogsByLevel('info')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ minLevel: config.minLevel, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter((entry) => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

/**
 * Create a child logger that merges `context` into every entry.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext => (local === undefined ? context : { ...context, ...local });

  return {
    debug: (message, local) => logger.debug(message, merge(local)),
    info: (message, local) => logger.info(message, merge(local)),
    warn: (message, local) => logger.warn(message, merge(local)),
    error: (message, error, local) => logger.error(message, error, merge(local)),
  };
}
