/**
 * CallbackDispatcher
 *
 * Decouples the code that produces events from the code that handles them.
 * Producers call `call(...args)`, which queues the arguments and returns at
 * once; a single background worker delivers queued invocations to the
 * callback one at a time, in the order they were queued.
 *
 * Responsibilities:
 * 1. Keep at most one live worker per dispatcher
 * 2. Deliver in strict FIFO order, never two invocations concurrently
 * 3. Log callback failures and carry on with the next invocation
 * 4. Expose the fork hooks (pause in parent, resume in parent, reopen in child)
 *
 * Lifecycle:
 *   new CallbackDispatcher(cb)         → RUNNING, worker started
 *   dispatcher.pauseBeforeForkInParent() → PAUSED, worker joined, queue kept
 *   dispatcher.resumeAfterForkInParent() → RUNNING, new worker drains the kept queue
 *   dispatcher.reopenAfterFork()         → respawns the worker if RUNNING without one
 *   dispatcher.shutdown()                → SHUTDOWN, anything still queued is abandoned
 *
 * A state change wakes the worker ahead of any backlog: once the state leaves
 * RUNNING, the worker returns without taking another item. After a pause the
 * remaining items are delivered by the next worker; after shutdown they are
 * never delivered.
 */

import { DispatcherState, isValidDispatcherTransition } from "./DispatcherState";
import { PendingQueue, PendingInvocation } from "./PendingQueue";
import { WakeSignal } from "./WakeSignal";
import { DispatcherEvents, WorkerExitReason } from "./DispatcherEvents";
import { InvalidStateError, isFatalDispatchError, formatError, errorMessage } from "./errors";
import { Logger, ConsoleLogger } from "../logging/Logger";

/**
 * The user-supplied handler. Async handlers are awaited before the next
 * invocation is delivered.
 */
export type DispatchCallback<TArgs extends unknown[]> = (...args: TArgs) => void | Promise<void>;

/**
 * Outcome of one delivery attempt
 */
export type DeliveryOutcome = { ok: true } | { ok: false; error: unknown; fatal: boolean };

export const DEFAULT_DISPATCHER_NAME = "CallbackDispatcher";

/** Default bound for shutdown(), in milliseconds */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export interface CallbackDispatcherOptions {
  /** Name used in log lines and events (default: "CallbackDispatcher") */
  name?: string;
  logger?: Logger;
  /** Lifecycle event channel */
  events?: DispatcherEvents;
  /** Default bound for shutdown() (default: 5000ms) */
  shutdownTimeoutMs?: number;
  /**
   * Decides which callback errors end the worker instead of being logged
   * (default: FatalDispatchError instances only)
   */
  isFatal?: (error: unknown) => boolean;
  /**
   * Called after a fatal error has stopped the worker.
   * The default rethrows it on the next tick, which crashes the process.
   */
  onFatalError?: (error: unknown) => void;
}

export interface DispatcherStats {
  state: DispatcherState;
  /** Whether a worker is currently alive */
  workerAlive: boolean;
  /** Total workers spawned over the dispatcher's lifetime */
  workersSpawned: number;
  /** Invocations waiting in the queue */
  pending: number;
  /** Invocations whose callback completed */
  delivered: number;
  /** Invocations whose callback failed */
  failed: number;
  /** Message of the most recent callback failure */
  lastError?: string;
  /** Milliseconds since construction */
  uptimeMs: number;
}

function rethrowOnNextTick(error: unknown): void {
  process.nextTick(() => {
    throw error;
  });
}

/**
 * Handle on one run of the worker loop.
 * `exited` resolves once the loop has returned; it never rejects.
 */
class DispatchWorker {
  alive: boolean = true;
  readonly exited: Promise<void>;

  constructor(
    readonly id: number,
    body: (worker: DispatchWorker) => Promise<void>,
    onCrash: (error: unknown) => void
  ) {
    // Start on a later microtask so the callback never runs on the spawner's stack
    this.exited = Promise.resolve()
      .then(() => body(this))
      .catch(onCrash);
  }

  /**
   * Wait for the loop to return.
   *
   * @returns false if it was still running after `timeoutMs`
   */
  async join(timeoutMs: number): Promise<boolean> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([this.exited.then(() => true), timedOut]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }
}

export class CallbackDispatcher<TArgs extends unknown[] = unknown[]> {
  readonly callback: DispatchCallback<TArgs>;
  readonly name: string;

  private readonly logger: Logger;
  private readonly events?: DispatcherEvents;
  private readonly shutdownTimeoutMs: number;
  private readonly isFatal: (error: unknown) => boolean;
  private readonly onFatalError: (error: unknown) => void;

  /** State register */
  private state: DispatcherState = DispatcherState.RUNNING;
  private worker?: DispatchWorker;
  private workerCounter: number = 0;

  private readonly pending = new PendingQueue<TArgs>();
  private readonly signal = new WakeSignal();

  private readonly createdAt = Date.now();
  private stats: { delivered: number; failed: number; lastError?: string } = {
    delivered: 0,
    failed: 0,
  };

  constructor(callback: DispatchCallback<TArgs>, options: CallbackDispatcherOptions = {}) {
    this.callback = callback;
    this.name = options.name ?? DEFAULT_DISPATCHER_NAME;
    this.logger = options.logger ?? new ConsoleLogger({ prefix: this.name });
    this.events = options.events;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.isFatal = options.isFatal ?? isFatalDispatchError;
    this.onFatalError = options.onFatalError ?? rethrowOnNextTick;

    this.reopenAfterFork();
  }

  /**
   * Queue an invocation and wake the worker. Returns immediately.
   *
   * After shutdown the call is still accepted, but nothing will ever deliver it.
   */
  call(...args: TArgs): void {
    this.pending.push(args);
    this.signal.broadcast();
  }

  /**
   * True iff the state is exactly RUNNING
   */
  isRunning(): boolean {
    return this.state === DispatcherState.RUNNING;
  }

  getState(): DispatcherState {
    return this.state;
  }

  /**
   * Whether a worker loop is currently alive. Advisory: lifecycle
   * operations re-check under their own transition logic.
   */
  isWorkerAlive(): boolean {
    return this.worker?.alive === true;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Move to SHUTDOWN and wait up to `timeoutMs` for the worker to exit.
   * On timeout the failure is logged and the promise still resolves.
   * Calling it again is a no-op.
   */
  async shutdown(timeoutMs: number = this.shutdownTimeoutMs): Promise<void> {
    this.logger.debug(() => `${this.name}#shutdown`);

    if (this.state === DispatcherState.SHUTDOWN) {
      return;
    }

    this.transition(DispatcherState.SHUTDOWN);
    this.signal.broadcast();

    const worker = this.worker;
    if (!worker) {
      return;
    }

    const exited = await worker.join(timeoutMs);
    if (!exited) {
      this.logger.error(
        () =>
          `${this.name} timed out after ${timeoutMs}ms waiting for dispatch worker #${worker.id}, callback: ${this.describeCallback()}`
      );
      this.events?.publish("shutdown.timeout", { dispatcher: this.name, timeoutMs });
    }
  }

  /**
   * Stop the worker but keep the queue, so delivery can continue after
   * resumeAfterForkInParent(). Resolves once the worker has exited; there
   * is no timeout.
   *
   * Without a live worker this returns at once and the state stays as it is.
   */
  async pauseBeforeForkInParent(): Promise<void> {
    this.logger.debug(() => `${this.name}#pauseBeforeForkInParent`);

    const worker = this.worker;
    if (!worker || !worker.alive) {
      return;
    }

    if (this.state === DispatcherState.SHUTDOWN) {
      return;
    }

    // Already PAUSED means another pause is joining this same worker
    if (this.state === DispatcherState.RUNNING) {
      this.transition(DispatcherState.PAUSED);
      this.signal.broadcast();
    }

    this.logger.debug(() => `${this.name} joining dispatch worker #${worker.id}`);
    await worker.exited;

    if (this.worker === worker) {
      this.worker = undefined;
    }
  }

  /**
   * Restart delivery after pauseBeforeForkInParent().
   *
   * @throws InvalidStateError unless PAUSED with the worker already joined
   */
  resumeAfterForkInParent(): void {
    this.logger.debug(() => `${this.name}#resumeAfterForkInParent`);

    if (this.state !== DispatcherState.PAUSED) {
      throw new InvalidStateError(
        `state was not ${DispatcherState.PAUSED}, state: ${this.state}`,
        this.state,
        this.isWorkerAlive()
      );
    }
    if (this.worker) {
      throw new InvalidStateError(
        `worker was not cleared: worker #${this.worker.id}`,
        this.state,
        this.isWorkerAlive()
      );
    }

    this.transition(DispatcherState.RUNNING);
    this.spawnWorker();
  }

  /**
   * Replace a worker that no longer exists, e.g. in a forked child or after
   * a fatal fault. Does nothing unless RUNNING without a live worker.
   * Queued invocations are kept by default and delivered by the new worker.
   *
   * @param options.discardPending - Drop queued invocations first (default:
   *   false); a forked child inherits a copy of the parent's queue, which the
   *   parent delivers
   */
  reopenAfterFork(options: { discardPending?: boolean } = {}): void {
    this.logger.debug(() => `${this.name}#reopenAfterFork`);

    if (this.state !== DispatcherState.RUNNING) {
      this.logger.debug(() => `${this.name}#reopenAfterFork state was not RUNNING: ${this.state}`);
      return;
    }

    if (this.worker?.alive) {
      this.logger.debug(() => `${this.name}#reopenAfterFork worker #${this.worker?.id} was still alive`);
      return;
    }

    if (options.discardPending) {
      const dropped = this.pending.drain();
      this.logger.debug(() => `${this.name}#reopenAfterFork discarded ${dropped.length} inherited invocations`);
    }

    this.spawnWorker();
  }

  getStats(): DispatcherStats {
    return {
      state: this.state,
      workerAlive: this.isWorkerAlive(),
      workersSpawned: this.workerCounter,
      pending: this.pending.size,
      delivered: this.stats.delivered,
      failed: this.stats.failed,
      lastError: this.stats.lastError,
      uptimeMs: Date.now() - this.createdAt,
    };
  }

  private transition(to: DispatcherState): void {
    const from = this.state;
    if (!isValidDispatcherTransition(from, to)) {
      throw new InvalidStateError(`cannot move from ${from} to ${to}`, from, this.isWorkerAlive());
    }

    this.state = to;
    this.logger.debug(() => `${this.name} ${from} -> ${to}`);
    this.events?.publish("state.changed", { dispatcher: this.name, from, to });
  }

  private spawnWorker(): void {
    const worker = new DispatchWorker(
      ++this.workerCounter,
      (w) => this.runWorker(w),
      (error) => this.logger.error(() => `${this.name} dispatch worker crashed: ${formatError(error)}`)
    );
    this.worker = worker;
    this.logger.debug(() => `${this.name} spawned dispatch worker #${worker.id}`);
  }

  /**
   * Worker loop: wait for work or a state change, deliver one item, repeat.
   */
  private async runWorker(worker: DispatchWorker): Promise<void> {
    let reason: WorkerExitReason = "shutdown";

    try {
      this.events?.publish("worker.started", {
        dispatcher: this.name,
        workerId: worker.id,
        pending: this.pending.size,
      });

      for (;;) {
        while (this.pending.isEmpty() && this.state === DispatcherState.RUNNING) {
          await this.signal.wait();
        }

        if (this.state !== DispatcherState.RUNNING) {
          reason = this.state === DispatcherState.PAUSED ? "paused" : "shutdown";
          this.logger.warn(() => `${this.name}, state is ${this.state}, worker #${worker.id} returning`);
          return;
        }

        const invocation = this.pending.shift();
        if (!invocation) {
          continue;
        }

        const outcome = await this.deliver(invocation);
        if (!outcome.ok && outcome.fatal) {
          reason = "fatal";
          worker.alive = false;
          this.handleFatal(worker, outcome.error);
          return;
        }
      }
    } finally {
      worker.alive = false;
      this.logger.debug(() => `${this.name}#runWorker worker #${worker.id} returning (${reason})`);
      this.events?.publish("worker.exited", {
        dispatcher: this.name,
        workerId: worker.id,
        reason,
        pending: this.pending.size,
      });
    }
  }

  private async deliver(invocation: PendingInvocation<TArgs>): Promise<DeliveryOutcome> {
    try {
      await this.callback(...invocation.args);
      this.stats.delivered++;
      return { ok: true };
    } catch (error) {
      const fatal = this.classify(error);
      if (!fatal) {
        this.stats.failed++;
        this.stats.lastError = errorMessage(error);
        this.logger.error(
          () =>
            `${this.name} error caught in callback ${this.describeCallback()} for invocation #${invocation.seq}: ${formatError(error)}`
        );
        this.events?.publish("dispatch.failed", {
          dispatcher: this.name,
          seq: invocation.seq,
          error: errorMessage(error),
        });
      }
      return { ok: false, error, fatal };
    }
  }

  /**
   * A classifier that throws counts the error as non-fatal.
   */
  private classify(error: unknown): boolean {
    try {
      return this.isFatal(error);
    } catch (classifierError) {
      this.logger.error(() => `${this.name} isFatal classifier failed: ${formatError(classifierError)}`);
      return false;
    }
  }

  private handleFatal(worker: DispatchWorker, error: unknown): void {
    this.logger.error(
      () => `${this.name} fatal error in callback ${this.describeCallback()}, worker #${worker.id} stopping: ${formatError(error)}`
    );
    this.events?.publish("worker.fatal", {
      dispatcher: this.name,
      workerId: worker.id,
      error: errorMessage(error),
    });

    try {
      this.onFatalError(error);
    } catch (hookError) {
      this.logger.error(() => `${this.name} onFatalError hook failed: ${formatError(hookError)}`);
    }
  }

  private describeCallback(): string {
    return this.callback.name || "anonymous";
  }
}
