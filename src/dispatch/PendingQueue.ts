/**
 * PendingQueue
 *
 * Ordered, unbounded queue of captured argument sets awaiting delivery.
 *
 * Architecture:
 * - Strict FIFO: items leave in the order they were pushed
 * - Each entry is a frozen shallow copy of the arguments given to push()
 * - Only the dispatcher's worker removes items in normal operation
 */

/**
 * A captured, immutable snapshot of the arguments passed to one enqueue call.
 */
export interface PendingInvocation<TArgs extends unknown[]> {
  /** Monotonic sequence number, assigned at enqueue time */
  seq: number;
  /** Captured arguments, frozen at enqueue time */
  args: TArgs;
  /** When the invocation was enqueued */
  enqueuedAt: Date;
}

export class PendingQueue<TArgs extends unknown[]> {
  /** Backing storage; `head` marks the first live entry */
  private items: PendingInvocation<TArgs>[] = [];
  private head: number = 0;

  /** Counter for sequence numbers */
  private seqCounter: number = 0;

  /**
   * Append a snapshot of `args` to the tail of the queue.
   *
   * @returns The captured invocation
   */
  push(args: TArgs): PendingInvocation<TArgs> {
    const snapshot: TArgs = [...args];
    Object.freeze(snapshot);
    const invocation: PendingInvocation<TArgs> = {
      seq: ++this.seqCounter,
      args: snapshot,
      enqueuedAt: new Date(),
    };
    this.items.push(invocation);
    return invocation;
  }

  /**
   * Remove and return the invocation at the head of the queue.
   * Returns undefined if the queue is empty.
   */
  shift(): PendingInvocation<TArgs> | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const invocation = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the array
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return invocation;
  }

  /**
   * Look at the head of the queue without removing it.
   */
  peek(): PendingInvocation<TArgs> | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }

  /**
   * Remove and return every queued invocation, oldest first.
   */
  drain(): PendingInvocation<TArgs>[] {
    const drained = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return drained;
  }

  /** Number of queued invocations */
  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}
