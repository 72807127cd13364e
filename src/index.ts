/**
 * callback-dispatcher
 *
 * Serialized, single-worker delivery of callback invocations, with
 * pause/resume hooks for the fork boundary.
 */

export {
  DispatcherState,
  isTerminalDispatcherState,
  isValidDispatcherTransition,
  getAllowedDispatcherTransitions,
} from "./dispatch/DispatcherState";
export { PendingQueue } from "./dispatch/PendingQueue";
export type { PendingInvocation } from "./dispatch/PendingQueue";
export { WakeSignal } from "./dispatch/WakeSignal";
export {
  CallbackDispatcher,
  DEFAULT_DISPATCHER_NAME,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from "./dispatch/CallbackDispatcher";
export type {
  DispatchCallback,
  DeliveryOutcome,
  CallbackDispatcherOptions,
  DispatcherStats,
} from "./dispatch/CallbackDispatcher";
export { DispatcherEvents } from "./dispatch/DispatcherEvents";
export type {
  DispatcherEvent,
  DispatcherEventMap,
  DispatcherEventType,
  DispatcherEventRecord,
  DispatcherEventHandler,
  WildcardEventHandler,
  WorkerExitReason,
  Subscription,
  SubscriptionOptions,
  DispatcherEventsOptions,
} from "./dispatch/DispatcherEvents";
export { ForkHookRegistry } from "./dispatch/ForkHookRegistry";
export type { ForkAware, ForkHookRegistryOptions } from "./dispatch/ForkHookRegistry";
export {
  DispatcherError,
  InvalidStateError,
  FatalDispatchError,
  isFatalDispatchError,
  formatError,
  errorMessage,
} from "./dispatch/errors";
export type { DispatcherErrorCode } from "./dispatch/errors";
export { ConsoleLogger, LogLevel, parseLogLevel, renderMessage } from "./logging/Logger";
export type { Logger, LogMessage, LogLevelName, ConsoleLoggerOptions } from "./logging/Logger";
export {
  DispatcherConfigSchema,
  DispatcherEnvKeys,
  DispatcherConfigError,
  parseDispatcherConfig,
  loadDispatcherConfigFromEnv,
  createDispatcher,
} from "./config/DispatcherConfig";
export type { DispatcherConfig, DispatcherConfigInput, CreateDispatcherOverrides } from "./config/DispatcherConfig";
