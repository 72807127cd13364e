/**
 * DispatcherEvents
 *
 * Type-safe publish/subscribe channel for CallbackDispatcher lifecycle events.
 * Lets hosts and tests observe worker starts and exits, state changes and
 * delivery failures without reaching into the dispatcher.
 *
 * Design:
 * - Event payloads are typed per event name via DispatcherEventMap
 * - Multiple subscribers per event type, plus wildcard subscribers ('*')
 * - Publishing is synchronous; a failing subscriber is logged and skipped
 * - Optional bounded event history for debugging
 *
 * Example usage:
 * ```typescript
 * const events = new DispatcherEvents();
 * events.subscribe("worker.exited", (event) => console.log(event.payload.reason));
 * const dispatcher = new CallbackDispatcher(handler, { events });
 * ```
 */

import { DispatcherState } from "./DispatcherState";
import { Logger, ConsoleLogger } from "../logging/Logger";
import { formatError } from "./errors";

/**
 * Why a worker loop returned
 */
export type WorkerExitReason = "paused" | "shutdown" | "fatal";

/**
 * Payloads keyed by event name
 */
export interface DispatcherEventMap {
  "worker.started": { dispatcher: string; workerId: number; pending: number };
  "worker.exited": { dispatcher: string; workerId: number; reason: WorkerExitReason; pending: number };
  "state.changed": { dispatcher: string; from: DispatcherState; to: DispatcherState };
  "dispatch.failed": { dispatcher: string; seq: number; error: string };
  "shutdown.timeout": { dispatcher: string; timeoutMs: number };
  "worker.fatal": { dispatcher: string; workerId: number; error: string };
}

export type DispatcherEventType = keyof DispatcherEventMap;

export interface DispatcherEvent<K extends DispatcherEventType> {
  type: K;
  payload: DispatcherEventMap[K];
  timestamp: Date;
}

/**
 * Event as seen by wildcard subscribers and the history
 */
export interface DispatcherEventRecord {
  type: DispatcherEventType;
  payload: DispatcherEventMap[DispatcherEventType];
  timestamp: Date;
}

export type DispatcherEventHandler<K extends DispatcherEventType> = (
  event: DispatcherEvent<K>
) => void | Promise<void>;

export type WildcardEventHandler = (event: DispatcherEventRecord) => void | Promise<void>;

export interface SubscriptionOptions<E> {
  /** If true, handler is removed after first invocation */
  once?: boolean;
  /** Optional filter function to conditionally process events */
  filter?: (event: E) => boolean;
}

/**
 * Subscription handle returned from subscribe()
 */
export interface Subscription {
  id: string;
  eventType: DispatcherEventType | "*";
  unsubscribe: () => void;
}

interface SubscriptionRecord<E> {
  id: string;
  handler: (event: E) => void | Promise<void>;
  options: SubscriptionOptions<E>;
}

type SubscriptionTable = {
  [K in DispatcherEventType]: SubscriptionRecord<DispatcherEvent<K>>[];
};

function emptyTable(): SubscriptionTable {
  return {
    "worker.started": [],
    "worker.exited": [],
    "state.changed": [],
    "dispatch.failed": [],
    "shutdown.timeout": [],
    "worker.fatal": [],
  };
}

export interface DispatcherEventsOptions {
  /** Maximum number of events kept in history (0 disables history) */
  maxHistorySize?: number;
  /** Where failing subscribers are reported */
  logger?: Logger;
}

export class DispatcherEvents {
  private subscriptions: SubscriptionTable = emptyTable();
  private wildcards: SubscriptionRecord<DispatcherEventRecord>[] = [];

  /** Counter for generating unique subscription IDs */
  private subscriptionCounter: number = 0;

  private history: DispatcherEventRecord[] = [];
  private readonly maxHistorySize: number;
  private readonly logger: Logger;

  constructor(options: DispatcherEventsOptions = {}) {
    this.maxHistorySize = options.maxHistorySize ?? 0;
    this.logger = options.logger ?? new ConsoleLogger({ prefix: "DispatcherEvents" });
  }

  private generateSubscriptionId(): string {
    return `sub-${(++this.subscriptionCounter).toString(16)}`;
  }

  /**
   * Subscribe to one event type.
   */
  subscribe<K extends DispatcherEventType>(
    eventType: K,
    handler: DispatcherEventHandler<K>,
    options: SubscriptionOptions<DispatcherEvent<K>> = {}
  ): Subscription {
    const id = this.generateSubscriptionId();
    const subs: SubscriptionRecord<DispatcherEvent<K>>[] = this.subscriptions[eventType];
    subs.push({ id, handler, options });

    return {
      id,
      eventType,
      unsubscribe: () => this.unsubscribe(eventType, id),
    };
  }

  /**
   * Subscribe to every event type.
   */
  subscribeAll(
    handler: WildcardEventHandler,
    options: SubscriptionOptions<DispatcherEventRecord> = {}
  ): Subscription {
    const id = this.generateSubscriptionId();
    this.wildcards.push({ id, handler, options });

    return {
      id,
      eventType: "*",
      unsubscribe: () => this.unsubscribe("*", id),
    };
  }

  /**
   * Subscribe to an event type, automatically unsubscribing after first invocation.
   */
  once<K extends DispatcherEventType>(eventType: K, handler: DispatcherEventHandler<K>): Subscription {
    return this.subscribe(eventType, handler, { once: true });
  }

  /**
   * Unsubscribe from an event type.
   *
   * @returns true if subscription was found and removed
   */
  unsubscribe(eventType: DispatcherEventType | "*", subscriptionId: string): boolean {
    const subs: { id: string }[] = eventType === "*" ? this.wildcards : this.subscriptions[eventType];
    const index = subs.findIndex((s) => s.id === subscriptionId);
    if (index === -1) {
      return false;
    }

    subs.splice(index, 1);
    return true;
  }

  /**
   * Publish an event to all matching subscribers, specific ones first.
   *
   * @returns The published event
   */
  publish<K extends DispatcherEventType>(eventType: K, payload: DispatcherEventMap[K]): DispatcherEvent<K> {
    const event: DispatcherEvent<K> = {
      type: eventType,
      payload,
      timestamp: new Date(),
    };

    if (this.maxHistorySize > 0) {
      this.history.push(event);
      if (this.history.length > this.maxHistorySize) {
        this.history = this.history.slice(-this.maxHistorySize);
      }
    }

    const specific: SubscriptionRecord<DispatcherEvent<K>>[] = this.subscriptions[eventType];
    this.deliver<DispatcherEvent<K>>(eventType, specific, event);
    this.deliver<DispatcherEventRecord>("*", this.wildcards, event);

    return event;
  }

  private deliver<E>(
    eventType: DispatcherEventType | "*",
    subs: SubscriptionRecord<E>[],
    event: E
  ): void {
    // Snapshot: handlers may subscribe or unsubscribe while we iterate
    for (const sub of [...subs]) {
      if (sub.options.filter && !sub.options.filter(event)) {
        continue;
      }
      if (sub.options.once) {
        this.unsubscribe(eventType, sub.id);
      }

      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportHandlerError(eventType, err));
        }
      } catch (err) {
        this.reportHandlerError(eventType, err);
      }
    }
  }

  private reportHandlerError(eventType: DispatcherEventType | "*", err: unknown): void {
    this.logger.error(() => `subscriber for ${eventType} failed: ${formatError(err)}`);
  }

  /**
   * Number of subscribers that would receive an event of this type
   * (use '*' for the wildcard subscriber count alone).
   */
  getSubscriberCount(eventType: DispatcherEventType | "*"): number {
    if (eventType === "*") {
      return this.wildcards.length;
    }
    return this.subscriptions[eventType].length + this.wildcards.length;
  }

  /**
   * Event history, newest last.
   */
  getHistory(limit?: number): DispatcherEventRecord[] {
    if (limit === undefined) {
      return [...this.history];
    }
    return this.history.slice(-limit);
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Remove all subscriptions.
   */
  clear(): void {
    this.subscriptions = emptyTable();
    this.wildcards = [];
    this.subscriptionCounter = 0;
  }

  /**
   * Wait for an event to be published.
   *
   * @param timeoutMs - Reject if nothing arrives within this many ms
   */
  waitFor<K extends DispatcherEventType>(
    eventType: K,
    timeoutMs?: number,
    filter?: (event: DispatcherEvent<K>) => boolean
  ): Promise<DispatcherEvent<K>> {
    return new Promise((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const subscription = this.subscribe(
        eventType,
        (event) => {
          if (timeoutId) {
            clearTimeout(timeoutId);
          }
          resolve(event);
        },
        { once: true, filter }
      );

      if (timeoutMs !== undefined) {
        timeoutId = setTimeout(() => {
          subscription.unsubscribe();
          reject(new Error(`Timeout waiting for event: ${eventType}`));
        }, timeoutMs);
      }
    });
  }
}
