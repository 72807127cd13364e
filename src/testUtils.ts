/**
 * Test Utilities
 *
 * Recording logger, polling helper and deferred promises shared by the tests.
 */

import { Logger, LogLevel, LogMessage, renderMessage } from "./logging/Logger";

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

/**
 * Logger that keeps every line in memory.
 * Thunks are evaluated only for levels at or above `level`.
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(private readonly level: LogLevel = LogLevel.DEBUG) {}

  debug(message: LogMessage): void {
    this.record("debug", LogLevel.DEBUG, message);
  }

  info(message: LogMessage): void {
    this.record("info", LogLevel.INFO, message);
  }

  warn(message: LogMessage): void {
    this.record("warn", LogLevel.WARN, message);
  }

  error(message: LogMessage): void {
    this.record("error", LogLevel.ERROR, message);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }

  private record(name: LogEntry["level"], level: LogLevel, message: LogMessage): void {
    if (this.isLevelEnabled(level)) {
      this.entries.push({ level: name, message: renderMessage(message) });
    }
  }
}

/**
 * Poll until `predicate` holds, failing after `timeoutMs`.
 */
export async function waitUntil(
  predicate: () => boolean,
  timeoutMs: number = 1000,
  intervalMs: number = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * Let pending microtasks and one macrotask turn run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
