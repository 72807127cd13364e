/**
 * Dispatcher errors
 *
 * - InvalidStateError: misuse of the fork hooks; thrown synchronously to the caller
 * - FatalDispatchError: raised by a callback to end the worker instead of being logged
 */

import { DispatcherState } from "./DispatcherState";

export type DispatcherErrorCode = "INVALID_STATE" | "FATAL";

export class DispatcherError extends Error {
  readonly code: DispatcherErrorCode;

  constructor(code: DispatcherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DispatcherError";
    this.code = code;
  }
}

/**
 * A lifecycle operation was called in a state that does not allow it.
 */
export class InvalidStateError extends DispatcherError {
  readonly state: DispatcherState;
  readonly workerAlive: boolean;

  constructor(message: string, state: DispatcherState, workerAlive: boolean) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
    this.state = state;
    this.workerAlive = workerAlive;
  }
}

/**
 * An unrecoverable fault. When a callback throws this, the worker stops
 * instead of logging and moving on to the next item.
 */
export class FatalDispatchError extends DispatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FATAL", message, options);
    this.name = "FatalDispatchError";
  }
}

/**
 * Default fatal-fault classifier
 */
export function isFatalDispatchError(error: unknown): boolean {
  return error instanceof FatalDispatchError;
}

/**
 * String(value), falling back to the `[object Tag]` form for values that
 * cannot be converted (null-prototype objects, throwing toString).
 */
function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Render an unknown thrown value for logging, including the stack when present.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return describeValue(error);
}

/**
 * Extract a one-line message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : describeValue(error);
}
