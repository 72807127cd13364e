/**
 * Logger
 *
 * Leveled logging over the console. Messages may be passed as thunks, which
 * are only evaluated when their level is enabled:
 *
 * ```typescript
 * logger.debug(() => `queue drained, ${describe(state)}`);
 * ```
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * A log message, or a function producing one on demand
 */
export type LogMessage = string | (() => string);

export interface Logger {
  debug(message: LogMessage, ...args: unknown[]): void;
  info(message: LogMessage, ...args: unknown[]): void;
  warn(message: LogMessage, ...args: unknown[]): void;
  error(message: LogMessage, ...args: unknown[]): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Map a level name (case-insensitive) to a LogLevel.
 * Returns undefined for unknown names.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const key = name.trim().toLowerCase();
  for (const [levelName, level] of Object.entries(LEVEL_NAMES)) {
    if (levelName === key) {
      return level;
    }
  }
  return undefined;
}

/**
 * Resolve a LogMessage to its text
 */
export function renderMessage(message: LogMessage): string {
  return typeof message === "function" ? message() : message;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: INFO) */
  level?: LogLevel;
  /** Prepended as `[prefix]` to every line */
  prefix?: string;
}

/**
 * Console-based logger with level control
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly prefix?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.prefix = options.prefix;
  }

  debug(message: LogMessage, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.debug(this.format(message), ...args);
    }
  }

  info(message: LogMessage, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.INFO)) {
      console.log(this.format(message), ...args);
    }
  }

  warn(message: LogMessage, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.WARN)) {
      console.warn(this.format(message), ...args);
    }
  }

  error(message: LogMessage, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.ERROR)) {
      console.error(this.format(message), ...args);
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.level !== LogLevel.SILENT && level >= this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private format(message: LogMessage): string {
    const text = renderMessage(message);
    return this.prefix ? `[${this.prefix}] ${text}` : text;
  }
}
