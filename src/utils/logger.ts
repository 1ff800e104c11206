/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that generated output on
 * stdout stays clean.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: Normal operation
 * - `warn`: Conditions that don't stop generation
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that generated this log entry.
   * @example "generator"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "batch_generated"
   */
  readonly event: string;
  /** Additional structured data. */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /** Where lines are written. Defaults to stderr. */
  readonly sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'generator', debugMode: true });
 * logger.info('batch_generated', { batch: 'widgets', enums: 2 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is on.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /**
   * Returns a logger for a sub-component sharing this logger's settings.
   *
   * @param component - Name of the sub-component.
   */
  child(component: string): Logger {
    return new Logger({
      component: `${this.component}.${component}`,
      debugMode: this.debugMode,
      sink: this.sink,
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures, BigInt values and throwing toJSON methods
      line = JSON.stringify({
        ...entry,
        data: {
          serializationError: error instanceof Error ? error.message : String(error),
          originalData: '[unserializable]',
        },
      });
    }

    this.sink(line + '\n');
  }
}
