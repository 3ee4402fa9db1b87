import { EventEmitter } from 'events';
import { EventPayloads, EventType, HubEvent } from '../types.js';
import { DebugLogger } from '../utils/logger.js';
import { withTimeout } from '../utils.js';

/** What `publish` takes: an event without its timestamp */
export type HubEventInput = {
  [K in EventType]: { type: K; payload: EventPayloads[K] };
}[EventType];

/**
 * Where a subscriber's events go, e.g. one WebSocket connection.
 * A rejected or thrown `send` drops the subscriber.
 */
export interface EventSink {
  send(event: HubEvent): Promise<void> | void;
  close?(reason: string): void;
}

export interface SubscribeOptions {
  /** Events buffered before the subscriber is dropped */
  queueSize?: number;
  /** Longest a single `send` may take */
  timeoutMs?: number;
}

export interface HubOptions {
  queueSize?: number;
  timeoutMs?: number;
  clock?: () => number;
}

/** Handle returned by `subscribe` */
export interface Subscription {
  readonly id: number;
}

interface SubscriberState {
  subscription: Subscription;
  sink: EventSink;
  queue: HubEvent[];
  queueSize: number;
  timeoutMs: number;
  draining: boolean;
}

/**
 * In-process fan-out point.
 *
 * Every subscriber gets its own bounded queue and delivery loop, so a slow
 * observer only ever delays itself. Events reach each subscriber in the
 * order `publish` was called.
 *
 * Emits `subscriber-dropped` with `(subscription, reason)`.
 */
export class EventHub extends EventEmitter {
  private readonly logger = new DebugLogger('EventHub');
  private readonly subscribers = new Map<number, SubscriberState>();
  private readonly queueSize: number;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private nextId = 1;

  constructor(options: HubOptions = {}) {
    super();
    this.queueSize = options.queueSize ?? 256;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.clock = options.clock ?? Date.now;
  }

  subscribe(sink: EventSink, options: SubscribeOptions = {}): Subscription {
    const subscription: Subscription = Object.freeze({ id: this.nextId++ });
    this.subscribers.set(subscription.id, {
      subscription,
      sink,
      queue: [],
      queueSize: options.queueSize ?? this.queueSize,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      draining: false,
    });
    this.logger.debug(`Subscriber ${subscription.id} added (${this.subscribers.size} total)`);
    return subscription;
  }

  /**
   * @returns false when the subscription was already gone
   */
  unsubscribe(subscription: Subscription): boolean {
    const removed = this.subscribers.delete(subscription.id);
    if (removed) {
      this.logger.debug(`Subscriber ${subscription.id} removed`);
    }
    return removed;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Stamp, freeze and enqueue an event for every current subscriber.
   * Never waits on a subscriber.
   */
  publish(input: HubEventInput): HubEvent {
    const event: HubEvent = { ...input, timestamp: this.clock() };
    Object.freeze(event.payload);
    Object.freeze(event);

    for (const state of [...this.subscribers.values()]) {
      if (state.queue.length >= state.queueSize) {
        this.drop(state, `queue full (${state.queueSize} events)`);
        continue;
      }
      state.queue.push(event);
      if (!state.draining) {
        this.drain(state).catch(err => {
          this.logger.error(`Delivery loop for subscriber ${state.subscription.id} failed:`, err);
        });
      }
    }

    this.logger.debug(`Published ${event.type} to ${this.subscribers.size} subscriber(s)`);
    return event;
  }

  /**
   * Drop every subscriber
   */
  close(): void {
    for (const state of [...this.subscribers.values()]) {
      this.drop(state, 'hub closed');
    }
  }

  private async drain(state: SubscriberState): Promise<void> {
    state.draining = true;
    try {
      while (state.queue.length > 0 && this.subscribers.get(state.subscription.id) === state) {
        const event = state.queue[0];
        try {
          await withTimeout(
            Promise.resolve().then(() => state.sink.send(event)),
            state.timeoutMs,
            `send timed out after ${state.timeoutMs}ms`
          );
        } catch (err) {
          this.drop(state, err instanceof Error ? err.message : String(err));
          return;
        }
        state.queue.shift();
      }
    } finally {
      state.draining = false;
    }
  }

  private drop(state: SubscriberState, reason: string): void {
    if (!this.unsubscribe(state.subscription)) {
      return;
    }
    state.queue.length = 0;
    this.logger.warn(`Dropping subscriber ${state.subscription.id}: ${reason}`);
    try {
      state.sink.close?.(reason);
    } catch (err) {
      this.logger.debug('Sink close error (ignoring):', err);
    }
    this.emit('subscriber-dropped', state.subscription, reason);
  }
}
