import { runtimeTimers, type TimeoutHandle } from "../runtime/timers.js";
import type { ResourceKey } from "./resourceKey.js";
import { running, type ResourceState } from "./state.js";

/** Value returned by {@link Subscription.next}. */
export type ChannelEvent =
  | { readonly type: "state"; readonly state: ResourceState }
  | { readonly type: "heartbeat" }
  | { readonly type: "closed" };

const HEARTBEAT_EVENT: ChannelEvent = Object.freeze({ type: "heartbeat" });
const CLOSED_EVENT: ChannelEvent = Object.freeze({ type: "closed" });

/** Pending states kept per subscriber before the oldest ones are dropped. */
const DEFAULT_MAX_PENDING = 16;

export interface BroadcastChannelOptions {
  /**
   * Capacity of each subscriber queue (at least 2). Older pending states are
   * discarded first, except the subscribe-time state while it is unread.
   */
  maxPending?: number;
  /** Clock used for heartbeat bookkeeping (defaults to `Date.now`). */
  now?: () => number;
  /** State reported before anything was published. */
  initial?: ResourceState;
}

/**
 * One observer's registration on a {@link BroadcastChannel}. The handle owns a
 * bounded delivery queue and the timestamp of its last delivery; heartbeat
 * timers exist only while a read is pending.
 */
export interface Subscription {
  readonly id: number;
  readonly closed: boolean;
  /** Number of states waiting to be read. */
  readonly pending: number;
  /**
   * Waits for the next event. With an interval, a heartbeat is returned once
   * that many milliseconds pass since the last delivery with nothing queued.
   * Without one, the call only resolves on a state or on close.
   */
  next(heartbeatIntervalMs?: number): Promise<ChannelEvent>;
  /** Releases the registration. Safe to call any number of times. */
  close(): void;
}

interface PendingRead {
  resolve(event: ChannelEvent): void;
  timer: TimeoutHandle | null;
}

class ChannelSubscription implements Subscription {
  private readonly queue: ResourceState[] = [];
  private read: PendingRead | null = null;
  private lastDeliveryAt: number;
  private released = false;
  /** Whether `queue[0]` is the subscribe-time state, not yet read. */
  private seeded = false;

  constructor(
    public readonly id: number,
    private readonly maxPending: number,
    private readonly now: () => number,
    private readonly release: (subscription: ChannelSubscription) => void,
  ) {
    this.lastDeliveryAt = now();
  }

  get closed(): boolean {
    return this.released;
  }

  get pending(): number {
    return this.queue.length;
  }

  next(heartbeatIntervalMs?: number): Promise<ChannelEvent> {
    if (heartbeatIntervalMs !== undefined && !(Number.isFinite(heartbeatIntervalMs) && heartbeatIntervalMs > 0)) {
      throw new RangeError(`heartbeat interval must be a positive number of milliseconds, got ${heartbeatIntervalMs}`);
    }
    if (this.read) {
      throw new Error(`subscription ${this.id} already has a pending read`);
    }

    const state = this.queue.shift();
    if (state) {
      this.seeded = false;
      this.lastDeliveryAt = this.now();
      return Promise.resolve({ type: "state", state });
    }
    if (this.released) {
      return Promise.resolve(CLOSED_EVENT);
    }

    if (heartbeatIntervalMs !== undefined) {
      const remaining = this.lastDeliveryAt + heartbeatIntervalMs - this.now();
      if (remaining <= 0) {
        this.lastDeliveryAt = this.now();
        return Promise.resolve(HEARTBEAT_EVENT);
      }
    }

    return new Promise<ChannelEvent>((resolve) => {
      const read: PendingRead = { resolve, timer: null };
      if (heartbeatIntervalMs !== undefined) {
        const remaining = this.lastDeliveryAt + heartbeatIntervalMs - this.now();
        read.timer = runtimeTimers.setTimeout(() => {
          if (this.read !== read) {
            return;
          }
          this.read = null;
          this.lastDeliveryAt = this.now();
          resolve(HEARTBEAT_EVENT);
        }, remaining);
      }
      this.read = read;
    });
  }

  close(): void {
    this.release(this);
  }

  /** Queues the state current at subscribe time; it is always read first. */
  seed(state: ResourceState): void {
    this.queue.push(state);
    this.seeded = true;
  }

  /** Hands a published state to the pending read, or queues it. */
  deliver(state: ResourceState): void {
    if (this.released) {
      return;
    }
    const read = this.takeRead();
    if (read) {
      this.lastDeliveryAt = this.now();
      read.resolve({ type: "state", state });
      return;
    }
    this.queue.push(state);
    const excess = this.queue.length - this.maxPending;
    if (excess > 0) {
      this.queue.splice(this.seeded ? 1 : 0, excess);
    }
  }

  /** Marks the subscription released and wakes a pending read with `closed`. */
  terminate(): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    this.queue.length = 0;
    this.takeRead()?.resolve(CLOSED_EVENT);
    return true;
  }

  private takeRead(): PendingRead | null {
    const read = this.read;
    if (!read) {
      return null;
    }
    this.read = null;
    if (read.timer) {
      runtimeTimers.clearTimeout(read.timer);
    }
    return read;
  }
}

/**
 * Publish/subscribe channel for a single resource. Mutations never await, so
 * on the event loop every `publish`, `subscribe` and `unsubscribe` completes
 * before another one starts. That serialisation is what guarantees that
 * subscribers observe states in publish order and that the cached state is
 * always delivered first.
 */
export class BroadcastChannel {
  private currentState: ResourceState;
  private readonly subscriptions = new Map<number, ChannelSubscription>();
  private readonly maxPending: number;
  private readonly now: () => number;
  private nextId = 0;

  constructor(
    public readonly key: ResourceKey,
    options: BroadcastChannelOptions = {},
  ) {
    this.currentState = options.initial ?? running();
    this.maxPending = Math.max(2, options.maxPending ?? DEFAULT_MAX_PENDING);
    this.now = options.now ?? runtimeTimers.now;
  }

  get current(): ResourceState {
    return this.currentState;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  subscribe(): Subscription {
    this.nextId += 1;
    const subscription = new ChannelSubscription(this.nextId, this.maxPending, this.now, (target) =>
      this.unsubscribe(target),
    );
    subscription.seed(this.currentState);
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }

  /** Replaces the cached state and queues it on every live subscription. */
  publish(state: ResourceState): void {
    this.currentState = state;
    for (const subscription of this.subscriptions.values()) {
      subscription.deliver(state);
    }
  }

  nextEvent(subscription: Subscription, heartbeatIntervalMs?: number): Promise<ChannelEvent> {
    return subscription.next(heartbeatIntervalMs);
  }

  /** Removes the subscription. Repeated calls and foreign handles are ignored. */
  unsubscribe(subscription: Subscription): void {
    const owned = this.subscriptions.get(subscription.id);
    if (!owned || owned !== subscription) {
      return;
    }
    this.subscriptions.delete(owned.id);
    owned.terminate();
  }
}
