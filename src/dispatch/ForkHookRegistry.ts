/**
 * ForkHookRegistry
 *
 * Host-side integration for the fork boundary. The dispatchers only expose
 * their hooks; whoever forks the process registers them here and calls
 * prepare() before the fork, then afterForkInParent() or afterForkInChild()
 * on the matching side.
 *
 * Example usage:
 * ```typescript
 * const hooks = new ForkHookRegistry();
 * hooks.register(dispatcher);
 *
 * await hooks.prepare();
 * const child = forkTheProcess();
 * if (child.isParent) hooks.afterForkInParent();
 * else hooks.afterForkInChild({ discardPending: true });
 * ```
 */

import { Logger, ConsoleLogger } from "../logging/Logger";
import { DispatcherState } from "./DispatcherState";
import { errorMessage } from "./errors";

/**
 * Anything exposing the three fork hooks
 */
export interface ForkAware {
  readonly name: string;
  getState(): DispatcherState;
  pauseBeforeForkInParent(): Promise<void>;
  resumeAfterForkInParent(): void;
  reopenAfterFork(options?: { discardPending?: boolean }): void;
}

export interface ForkHookRegistryOptions {
  logger?: Logger;
}

export class ForkHookRegistry {
  private readonly targets: Set<ForkAware> = new Set();
  private readonly logger: Logger;

  constructor(options: ForkHookRegistryOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger({ prefix: "ForkHookRegistry" });
  }

  /**
   * @returns A function that unregisters the target
   */
  register(target: ForkAware): () => void {
    this.targets.add(target);
    return () => {
      this.unregister(target);
    };
  }

  unregister(target: ForkAware): boolean {
    return this.targets.delete(target);
  }

  get size(): number {
    return this.targets.size;
  }

  /**
   * Pause every target and wait until all their workers have exited.
   */
  async prepare(): Promise<void> {
    this.logger.debug(() => `pausing ${this.targets.size} dispatchers before fork`);
    await Promise.all([...this.targets].map((target) => target.pauseBeforeForkInParent()));
  }

  /**
   * Resume every paused target. Targets that never paused (no live worker
   * at prepare time) are left alone. Every target is attempted; the first
   * failure is rethrown afterwards.
   */
  afterForkInParent(): void {
    let firstError: unknown;
    let failed = false;

    for (const target of this.targets) {
      if (target.getState() !== DispatcherState.PAUSED) {
        continue;
      }

      try {
        target.resumeAfterForkInParent();
      } catch (err) {
        this.logger.error(() => `failed to resume ${target.name}: ${errorMessage(err)}`);
        if (!failed) {
          failed = true;
          firstError = err;
        }
      }
    }

    if (failed) {
      throw firstError;
    }
  }

  /**
   * Bring every target back to life in the child process: paused targets
   * are resumed, running ones get a fresh worker if theirs is gone.
   * `discardPending` is passed to reopenAfterFork() only. Every target is
   * attempted; the first failure is rethrown afterwards.
   */
  afterForkInChild(options: { discardPending?: boolean } = {}): void {
    this.logger.debug(() => `reopening ${this.targets.size} dispatchers after fork`);
    let firstError: unknown;
    let failed = false;

    for (const target of this.targets) {
      try {
        if (target.getState() === DispatcherState.PAUSED) {
          target.resumeAfterForkInParent();
        } else {
          target.reopenAfterFork(options);
        }
      } catch (err) {
        this.logger.error(() => `failed to reopen ${target.name}: ${errorMessage(err)}`);
        if (!failed) {
          failed = true;
          firstError = err;
        }
      }
    }

    if (failed) {
      throw firstError;
    }
  }
}
