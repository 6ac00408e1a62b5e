/**
 * Structured logging utilities for Firestore operations
 */

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * JSON-encode a log context. Integer document values are bigints, which
 * JSON.stringify rejects.
 */
export function formatContext(context: LogContext): string {
  return JSON.stringify(context, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private scope?: string;

  constructor(minLevel: LogLevel = "info", scope?: string) {
    this.minLevel = minLevel;
    this.scope = scope;
  }

  /**
   * Derive a logger that prefixes every line with a component name.
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.minLevel, this.scope ? `${this.scope}.${scope}` : scope);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  /**
   * Render a log line without writing it.
   */
  format(level: LogLevel, message: string, context?: LogContext, time: Date = new Date()): string {
    const scopeStr = this.scope ? ` [${this.scope}]` : "";
    const contextStr = context ? ` ${formatContext(context)}` : "";
    return `[${time.toISOString()}] [${level.toUpperCase()}]${scopeStr} ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const logMessage = this.format(level, message, context);

    switch (level) {
      case "error":
        console.error(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
      case "debug":
      case "trace":
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger, the client default
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}

  trace(_message: string, _context?: LogContext): void {}
}

/**
 * Helper function to log a failed operation
 */
export function logError(logger: Logger, operation: string, error: unknown, context?: LogContext): void {
  logger.error(`Firestore ${operation} failed`, {
    ...context,
    operation,
    errorName: error instanceof Error ? error.name : typeof error,
    errorMessage: error instanceof Error ? error.message : String(error),
  });
}
