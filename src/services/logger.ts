/**
 * Structured Logger Service
 *
 * JSON Lines logging for machine-readable diagnostics. Records files read
 * and written by the CLI, entities the parsers drop, and hard failures.
 * Output goes to stderr so stdout stays free for generated text.
 */

import { appendFileSync } from "node:fs";

/**
 * Log level enumeration
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Log event type
 */
export enum LogEventType {
  FILE_READ = "file_read",
  FILE_WRITE = "file_write",
  PARSE_COMPLETE = "parse_complete",
  ENTITY_DROPPED = "entity_dropped",
  ERROR = "error",
  DEBUG = "debug",
}

/**
 * Base log entry structure
 */
export interface LogEntry {
  timestamp: string; // ISO 8601 format
  level: LogLevel;
  event_type: LogEventType;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output file path (default: stderr) */
  outputFile?: string;
  /** Pretty print JSON (default: false for JSON Lines) */
  pretty?: boolean;
  /** Sink for flushed output; overrides outputFile and stderr */
  sink?: (chunk: string) => void;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Map a configuration level name onto LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_ORDER.find((level) => level === name.toLowerCase());
}

/**
 * Structured Logger Service
 */
export class Logger {
  private level: LogLevel;
  private outputFile?: string;
  private pretty: boolean;
  private sink?: (chunk: string) => void;
  private buffer: string[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || LogLevel.INFO;
    this.outputFile = options.outputFile;
    this.pretty = options.pretty || false;
    this.sink = options.sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Flush buffered log entries
   */
  flush(): void {
    if (this.buffer.length === 0) {
      return;
    }

    const output = this.buffer.join("\n") + "\n";
    this.buffer = [];

    if (this.sink) {
      this.sink(output);
    } else if (this.outputFile) {
      appendFileSync(this.outputFile, output, "utf-8");
    } else {
      process.stderr.write(output);
    }
  }

  /**
   * Flush remaining entries
   */
  close(): void {
    this.flush();
  }

  /**
   * Entries not yet flushed
   */
  pending(): number {
    return this.buffer.length;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event_type: eventType,
      message,
    };

    if (context) {
      entry.context = context;
    }

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
      };
    }

    const serialized = this.pretty
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    this.buffer.push(serialized);

    // Auto-flush on error or if buffer is large
    if (level === LogLevel.ERROR || this.buffer.length >= 100) {
      this.flush();
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  fileRead(path: string, bytes: number): void {
    this.log(LogLevel.INFO, LogEventType.FILE_READ, `Read ${path}`, { path, bytes });
  }

  fileWrite(path: string, bytes: number): void {
    this.log(LogLevel.INFO, LogEventType.FILE_WRITE, `Wrote ${path}`, { path, bytes });
  }

  parseComplete(format: string, context: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, LogEventType.PARSE_COMPLETE, `Parsed ${format} text`, {
      ...context,
      format,
    });
  }

  /**
   * An incomplete entity left out of the model (selector-less rule,
   * signal without event or action)
   */
  entityDropped(kind: string, reason: string, text: string): void {
    this.log(
      LogLevel.DEBUG,
      LogEventType.ENTITY_DROPPED,
      `Dropped ${kind}: ${reason}`,
      { kind, reason, text },
    );
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, LogEventType.ERROR, message, context, error);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, LogEventType.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, LogEventType.DEBUG, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, LogEventType.DEBUG, message, context);
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: Logger | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(options?: LoggerOptions): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(options);
  }
  return globalLogger;
}

/**
 * Reset global logger (useful for testing)
 */
export function resetLogger(): void {
  if (globalLogger) {
    globalLogger.close();
    globalLogger = null;
  }
}
