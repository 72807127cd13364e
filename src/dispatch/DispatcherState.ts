/**
 * DispatcherState
 *
 * Lifecycle states of a CallbackDispatcher.
 *
 * State Machine:
 * ```
 *   RUNNING ⇄ PAUSED
 *      ↓        ↓
 *      SHUTDOWN ←
 * ```
 *
 * - RUNNING: a worker drains the pending queue
 * - PAUSED: the worker has been stopped around a fork; the queue is retained
 * - SHUTDOWN: terminal; the queue is abandoned
 */
export enum DispatcherState {
  /** Worker is (or should be) draining the queue */
  RUNNING = "RUNNING",

  /**
   * Worker was joined before a fork.
   * Only reachable from RUNNING and only resumable back to RUNNING.
   */
  PAUSED = "PAUSED",

  /**
   * Dispatcher was shut down.
   * Terminal state - nothing queued afterwards is ever delivered.
   */
  SHUTDOWN = "SHUTDOWN",
}

/**
 * Check if a state is terminal (no further transitions possible)
 */
export function isTerminalDispatcherState(state: DispatcherState): boolean {
  return state === DispatcherState.SHUTDOWN;
}

/**
 * Check if a state transition is valid
 */
export function isValidDispatcherTransition(from: DispatcherState, to: DispatcherState): boolean {
  switch (from) {
    case DispatcherState.RUNNING:
      return to === DispatcherState.PAUSED || to === DispatcherState.SHUTDOWN;
    case DispatcherState.PAUSED:
      return to === DispatcherState.RUNNING || to === DispatcherState.SHUTDOWN;
    default:
      // Terminal states cannot transition
      return false;
  }
}

/**
 * Get the allowed transitions from a state
 */
export function getAllowedDispatcherTransitions(state: DispatcherState): DispatcherState[] {
  switch (state) {
    case DispatcherState.RUNNING:
      return [DispatcherState.PAUSED, DispatcherState.SHUTDOWN];
    case DispatcherState.PAUSED:
      return [DispatcherState.RUNNING, DispatcherState.SHUTDOWN];
    default:
      return [];
  }
}
