/**
 * Structured leveled logging.
 *
 * Entries are written as JSON lines. Every entry at or above the logger's
 * threshold goes to the log file when one is configured; `debug` entries are
 * echoed to stdout and `warning` and above to stderr.
 *
 * @packageDocumentation
 */

import { safeAppendFileSync } from './safe-fs.js';
import { TypedMap } from './typed-map.js';

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information
 * - `info`: Normal operation (config loaded, file written)
 * - `warning`: Something unexpected that did not stop the operation
 * - `error`: A failure of one step
 * - `critical`: A failure that ends the current operation
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

/**
 * Numeric severities, ascending.
 */
export const LOG_LEVEL_SEVERITY: TypedMap<LogLevel, number> = TypedMap.fromEntries<
  LogLevel,
  number
>([
  ['debug', 10],
  ['info', 20],
  ['warning', 30],
  ['error', 40],
  ['critical', 50],
]);

const SEVERITY_LOG_LEVEL: TypedMap<number, LogLevel> = LOG_LEVEL_SEVERITY.invert();

function severityOf(level: LogLevel): number {
  return LOG_LEVEL_SEVERITY.get(level) ?? 0;
}

/**
 * Reads a log level from user input.
 *
 * Accepts a level name in any case (`"WARNING"`) or its numeric severity
 * (`"30"`).
 *
 * @param value - Raw input.
 * @returns The level, or `undefined` if the input names none.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return SEVERITY_LOG_LEVEL.get(Number(trimmed));
  }
  const lowered = trimmed.toLowerCase();
  for (const level of LOG_LEVEL_SEVERITY.keys()) {
    if (level === lowered) {
      return level;
    }
  }
  return undefined;
}

/**
 * A single log line.
 */
export interface LogEntry {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Component that produced the entry, e.g. `ConfigModel`. */
  readonly component: string;
  /** Short event name, e.g. `config_deserialized`. */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * The logging interface consumed by the config model and the CLI.
 */
export interface LoggingPort {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warning(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  critical(event: string, data?: Record<string, unknown>): void;
}

/**
 * A port that discards everything.
 */
export const silentLogger: LoggingPort = {
  debug: () => undefined,
  info: () => undefined,
  warning: () => undefined,
  error: () => undefined,
  critical: () => undefined,
};

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Lowest level that is written anywhere.
   * @defaultValue 'debug'
   */
  readonly level?: LogLevel;

  /**
   * File that receives every entry at or above `level`. Omit to log to the
   * console only.
   */
  readonly filePath?: string;

  /**
   * Whether to echo entries to stdout/stderr.
   * @defaultValue true
   */
  readonly console?: boolean;
}

/**
 * Serializes an entry, replacing data that `JSON.stringify` rejects
 * (circular references, BigInt) so that one line is always produced.
 */
export function formatLogEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Structured logger writing JSON lines to a file and the standard streams.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConfigModel', filePath: 'log.log' });
 * logger.info('config_deserialized', { sample_int: 3 });
 * logger.critical('config_type_mismatch', { field: 'sample_int' });
 * ```
 */
export class Logger implements LoggingPort {
  private readonly component: string;
  private readonly threshold: number;
  private readonly filePath: string | undefined;
  private readonly toConsole: boolean;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.threshold = severityOf(options.level ?? 'debug');
    this.filePath = options.filePath;
    this.toConsole = options.console ?? true;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warning(event: string, data?: Record<string, unknown>): void {
    this.log('warning', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  critical(event: string, data?: Record<string, unknown>): void {
    this.log('critical', event, data);
  }

  /**
   * Returns a logger sharing this one's sinks under another component name.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      level: SEVERITY_LOG_LEVEL.get(this.threshold) ?? 'debug',
      ...(this.filePath !== undefined ? { filePath: this.filePath } : {}),
      console: this.toConsole,
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const severity = severityOf(level);
    if (severity < this.threshold) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };
    const line = formatLogEntry(entry) + '\n';

    if (this.filePath !== undefined) {
      this.writeToFile(this.filePath, line);
    }

    if (!this.toConsole) {
      return;
    }
    if (level === 'debug') {
      process.stdout.write(line);
    } else if (severity >= severityOf('warning')) {
      process.stderr.write(line);
    }
  }

  private writeToFile(filePath: string, line: string): void {
    try {
      safeAppendFileSync(filePath, line);
    } catch (error) {
      // Delivery failures are reported but never fail the caller.
      process.stderr.write(
        formatLogEntry({
          timestamp: new Date().toISOString(),
          level: 'error',
          component: this.component,
          event: 'log_sink_failed',
          data: { filePath, reason: error instanceof Error ? error.message : String(error) },
        }) + '\n'
      );
    }
  }
}
