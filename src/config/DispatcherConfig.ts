/**
 * DispatcherConfig
 *
 * Validated configuration for building a CallbackDispatcher, either from a
 * plain object or from CALLBACK_DISPATCHER_* environment variables.
 */

import { z } from "zod";
import {
  CallbackDispatcher,
  DispatchCallback,
  CallbackDispatcherOptions,
  DEFAULT_DISPATCHER_NAME,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from "../dispatch/CallbackDispatcher";
import { DispatcherEvents } from "../dispatch/DispatcherEvents";
import { ConsoleLogger, Logger, parseLogLevel } from "../logging/Logger";

export const DispatcherConfigSchema = z.object({
  name: z.string().min(1).default(DEFAULT_DISPATCHER_NAME),
  shutdownTimeoutMs: z.number().int().positive().default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  maxEventHistory: z.number().int().min(0).default(0),
});

export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;
export type DispatcherConfigInput = z.input<typeof DispatcherConfigSchema>;

/**
 * Environment variable names read by loadDispatcherConfigFromEnv()
 */
export const DispatcherEnvKeys = {
  NAME: "CALLBACK_DISPATCHER_NAME",
  SHUTDOWN_TIMEOUT_MS: "CALLBACK_DISPATCHER_SHUTDOWN_TIMEOUT_MS",
  LOG_LEVEL: "CALLBACK_DISPATCHER_LOG_LEVEL",
  MAX_EVENT_HISTORY: "CALLBACK_DISPATCHER_MAX_EVENT_HISTORY",
} as const;

export class DispatcherConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid dispatcher config: ${issues.join("; ")}`);
    this.name = "DispatcherConfigError";
    this.issues = issues;
  }
}

/**
 * Validate a config object and fill in defaults.
 *
 * @throws DispatcherConfigError listing every invalid field
 */
export function parseDispatcherConfig(input: unknown = {}): DispatcherConfig {
  const result = DispatcherConfigSchema.safeParse(input);
  if (!result.success) {
    throw new DispatcherConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

function numberFromEnv(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  // Keep the raw text so validation reports it as a non-number
  return Number.isNaN(parsed) ? value : parsed;
}

/**
 * Build a config from CALLBACK_DISPATCHER_* variables. Unset variables fall
 * back to the defaults.
 */
export function loadDispatcherConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DispatcherConfig {
  const logLevel = env[DispatcherEnvKeys.LOG_LEVEL];

  return parseDispatcherConfig({
    name: env[DispatcherEnvKeys.NAME] || undefined,
    shutdownTimeoutMs: numberFromEnv(env[DispatcherEnvKeys.SHUTDOWN_TIMEOUT_MS]),
    logLevel: logLevel ? logLevel.trim().toLowerCase() : undefined,
    maxEventHistory: numberFromEnv(env[DispatcherEnvKeys.MAX_EVENT_HISTORY]),
  });
}

export interface CreateDispatcherOverrides
  extends Pick<CallbackDispatcherOptions, "isFatal" | "onFatalError"> {
  logger?: Logger;
  events?: DispatcherEvents;
}

/**
 * Wire a dispatcher, its logger and its event channel from a config.
 */
export function createDispatcher<TArgs extends unknown[]>(
  callback: DispatchCallback<TArgs>,
  config: DispatcherConfigInput = {},
  overrides: CreateDispatcherOverrides = {}
): { dispatcher: CallbackDispatcher<TArgs>; events: DispatcherEvents; config: DispatcherConfig } {
  const parsed = parseDispatcherConfig(config);
  const logger =
    overrides.logger ?? new ConsoleLogger({ level: parseLogLevel(parsed.logLevel), prefix: parsed.name });
  const events = overrides.events ?? new DispatcherEvents({ maxHistorySize: parsed.maxEventHistory, logger });

  const dispatcher = new CallbackDispatcher<TArgs>(callback, {
    name: parsed.name,
    logger,
    events,
    shutdownTimeoutMs: parsed.shutdownTimeoutMs,
    isFatal: overrides.isFatal,
    onFatalError: overrides.onFatalError,
  });

  return { dispatcher, events, config: parsed };
}
