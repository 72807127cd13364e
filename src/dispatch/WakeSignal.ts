/**
 * WakeSignal
 *
 * Condition variable for async code. A waiter checks its predicate and calls
 * wait() in the same synchronous step, so a broadcast() can never fall between
 * the check and the wait.
 *
 * Example usage:
 * ```typescript
 * while (queue.isEmpty() && running) {
 *   await signal.wait();
 * }
 * ```
 */
export class WakeSignal {
  private waiters: Array<() => void> = [];

  /**
   * Suspend until the next broadcast().
   */
  wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Wake every current waiter.
   * Waiters registered after this call wait for the next broadcast.
   */
  broadcast(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  /** Number of suspended waiters */
  get waiterCount(): number {
    return this.waiters.length;
  }
}
