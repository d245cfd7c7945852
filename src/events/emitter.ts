import type { StatusEvent } from "../types";
import { type Logger, describeError } from "../utils/logger";

export type Listener<T> = (event: T) => void | Promise<void>;

export type RefreshFunction = () => Promise<void>;

export type Subscription = {
  cancel: () => void;
};

/** The part of an emitter the bot needs to drive resyncs and teardown. */
export interface Refreshable {
  readonly topic: string;
  requestRefresh(): void;
  dispose(): void;
}

type Entry<T> = { callback: Listener<T> };

/**
 * Publishes one event topic. Keeps the last published value and replays it to
 * new subscribers; `requestRefresh` runs the commands that produce fresh data.
 */
export class EventEmitter<T> implements Refreshable {
  readonly topic: string;
  protected readonly logger: Logger;
  private readonly refreshFunction: RefreshFunction | null;
  private entries: Entry<T>[] = [];
  private last: T | null = null;
  private pending: T[] = [];
  private dispatching = false;
  private disposed = false;

  constructor(topic: string, refreshFunction: RefreshFunction | null, logger: Logger) {
    this.topic = topic;
    this.refreshFunction = refreshFunction;
    this.logger = logger;
  }

  get lastEvent(): T | null {
    return this.last;
  }

  get hasSubscribers(): boolean {
    return this.entries.length > 0;
  }

  protected get isDisposed(): boolean {
    return this.disposed;
  }

  subscribe(callback: Listener<T>): Subscription {
    const entry: Entry<T> = { callback };
    // copy on write: a running notify keeps iterating its own snapshot
    this.entries = [...this.entries, entry];
    if (this.last !== null) {
      this.invoke(entry, this.last);
    }
    if (this.entries.length === 1) {
      this.onFirstSubscription();
    }

    let active = true;
    return {
      cancel: () => {
        if (!active) return;
        active = false;
        this.entries = this.entries.filter((e) => e !== entry);
        if (this.entries.length === 0) {
          this.onLastUnsubscribe();
        }
      },
    };
  }

  notify(event: T): void {
    this.last = event;
    this.pending.push(event);
    // a notify from inside a callback is delivered once the current event reached everyone
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      for (let i = 0; i < this.pending.length; i++) {
        this.dispatch(this.pending[i]);
      }
    } finally {
      this.pending = [];
      this.dispatching = false;
    }
  }

  requestRefresh(): void {
    if (this.disposed || !this.refreshFunction) return;
    this.logger.debug("Refresh requested", { topic: this.topic });
    this.refreshFunction().catch((err) =>
      this.logger.warn("Refresh failed", { topic: this.topic, message: describeError(err) })
    );
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.entries = [];
    this.onLastUnsubscribe();
  }

  protected onFirstSubscription(): void {}

  protected onLastUnsubscribe(): void {}

  private dispatch(event: T): void {
    const snapshot = this.entries;
    for (const entry of snapshot) {
      // skip subscriptions cancelled by an earlier callback of this dispatch
      if (!this.entries.includes(entry)) continue;
      this.invoke(entry, event);
    }
  }

  private invoke(entry: Entry<T>, event: T): void {
    try {
      const result = entry.callback(event);
      if (result instanceof Promise) {
        result.catch((err) => this.logSubscriberError(err));
      }
    } catch (err) {
      this.logSubscriberError(err);
    }
  }

  private logSubscriberError(err: unknown): void {
    this.logger.error("Subscriber failed", { topic: this.topic, message: describeError(err) });
  }
}

/**
 * Emitter for values the device never pushes. While it has subscribers it
 * requests a refresh every `intervalSeconds`, but only while the bot is available.
 */
export class PollingEventEmitter<T> extends EventEmitter<T> {
  private readonly intervalMs: number;
  private readonly statusEmitter: EventEmitter<StatusEvent>;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    topic: string,
    intervalSeconds: number,
    refreshFunction: RefreshFunction,
    statusEmitter: EventEmitter<StatusEvent>,
    logger: Logger
  ) {
    super(topic, refreshFunction, logger);
    this.intervalMs = intervalSeconds * 1000;
    this.statusEmitter = statusEmitter;
  }

  get polling(): boolean {
    return this.timer !== null;
  }

  protected onFirstSubscription(): void {
    if (this.timer || this.isDisposed) return;
    this.logger.debug("Polling started", { topic: this.topic, intervalMs: this.intervalMs });
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  protected onLastUnsubscribe(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.debug("Polling stopped", { topic: this.topic });
  }

  private tick(): void {
    if (this.statusEmitter.lastEvent?.available === true) {
      this.requestRefresh();
    }
  }
}

/** Builds a refresh function that executes every command concurrently. */
export function refreshWith<C>(commands: readonly C[], execute: (command: C) => Promise<void>): RefreshFunction {
  return async () => {
    await Promise.all(commands.map((command) => execute(command)));
  };
}
