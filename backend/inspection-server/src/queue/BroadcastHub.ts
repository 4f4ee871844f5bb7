/**
 * BroadcastHub
 *
 * In-process publish/subscribe for state changes observers care about:
 * ingested results, alerts, queue transitions and cart status.
 *
 * Design:
 * - Typed event map keyed by event kind
 * - Every subscription owns a bounded FIFO buffer drained asynchronously,
 *   one event at a time, so a subscriber sees events in publish order
 * - publish() only appends to buffers: it never awaits a handler and never throws
 * - A subscriber whose buffer is full is dropped, not waited for
 * - No history: a late subscriber only sees later events
 *
 * Example usage:
 * ```typescript
 * const hub = new BroadcastHub();
 * hub.subscribe((event) => console.log(event.kind, event.payload), { kinds: ["alert"] });
 * hub.publish({ kind: "alert", payload: alert });
 * ```
 */

import { PushDeliveryError } from "../errors";
import {
  AlertLevel,
  CartStatus,
  Severity,
  TaskResultPayload,
  TaskType,
} from "../types";

export interface TaskResultEvent {
  taskId: string;
  taskType: TaskType;
  stationId: number;
  result: TaskResultPayload;
  status: Severity;
  imageRef: string | null;
  processingTime: number | null;
  recordId: number;
  timestamp: Date;
}

export interface AlertEvent {
  alertId: number;
  level: AlertLevel;
  alertType: string;
  message: string;
  recordId: number | null;
  timestamp: Date;
}

export type QueueUpdateReason = "added" | "assigned" | "completed" | "failed" | "removed";

export interface QueueUpdateEvent {
  reason: QueueUpdateReason;
  taskId: string;
}

/**
 * Payload type per event kind
 */
export interface BroadcastEventMap {
  task_result: TaskResultEvent;
  alert: AlertEvent;
  task_queue_update: QueueUpdateEvent;
  cart_status: CartStatus;
}

export type BroadcastKind = keyof BroadcastEventMap;

/**
 * What publishers hand to the hub, discriminated by kind
 */
export type BroadcastMessage = {
  [K in BroadcastKind]: { kind: K; payload: BroadcastEventMap[K] };
}[BroadcastKind];

/**
 * Event envelope delivered to subscribers
 */
export type BroadcastEvent = BroadcastMessage & { timestamp: Date };

export type BroadcastHandler = (event: BroadcastEvent) => void | Promise<void>;

export interface SubscribeOptions {
  /** Only deliver these kinds (default: all) */
  kinds?: readonly BroadcastKind[];
  /** Buffer capacity for this subscriber (default: the hub's) */
  capacity?: number;
  /** Called once if the hub drops this subscriber */
  onDrop?: (error: PushDeliveryError) => void;
}

/**
 * Subscription handle returned from subscribe()
 */
export interface Subscription {
  id: string;
  unsubscribe: () => void;
}

interface SubscriptionRecord {
  id: string;
  handler: BroadcastHandler;
  kinds: ReadonlySet<BroadcastKind> | null;
  capacity: number;
  buffer: BroadcastEvent[];
  draining: Promise<void> | null;
  onDrop?: (error: PushDeliveryError) => void;
}

export const DEFAULT_SUBSCRIBER_CAPACITY = 256;

export class BroadcastHub {
  private subscriptions: Map<string, SubscriptionRecord> = new Map();

  /** Counter for generating unique subscription IDs */
  private subscriptionCounter: number = 0;

  private defaultCapacity: number;

  /**
   * @param options.capacity - Per-subscriber buffer capacity (default 256)
   */
  constructor(options: { capacity?: number } = {}) {
    this.defaultCapacity = options.capacity ?? DEFAULT_SUBSCRIBER_CAPACITY;
  }

  private generateSubscriptionId(): string {
    return `sub-${Date.now()}-${(++this.subscriptionCounter).toString(16)}`;
  }

  subscribe(handler: BroadcastHandler, options: SubscribeOptions = {}): Subscription {
    const id = this.generateSubscriptionId();

    this.subscriptions.set(id, {
      id,
      handler,
      kinds: options.kinds ? new Set(options.kinds) : null,
      capacity: Math.max(1, options.capacity ?? this.defaultCapacity),
      buffer: [],
      draining: null,
      onDrop: options.onDrop,
    });

    return {
      id,
      unsubscribe: () => {
        this.unsubscribe(id);
      },
    };
  }

  /**
   * @returns true if the subscription was found and removed
   */
  unsubscribe(subscriptionId: string): boolean {
    const record = this.subscriptions.get(subscriptionId);
    if (!record) {
      return false;
    }
    record.buffer.length = 0;
    return this.subscriptions.delete(subscriptionId);
  }

  /**
   * Append an event to every matching subscriber's buffer.
   *
   * @returns number of subscribers the event was queued for
   */
  publish(message: BroadcastMessage): number {
    const event: BroadcastEvent = { ...message, timestamp: new Date() };
    let queued = 0;

    for (const record of [...this.subscriptions.values()]) {
      if (record.kinds && !record.kinds.has(event.kind)) {
        continue;
      }

      if (record.buffer.length >= record.capacity) {
        this.drop(record, `buffer full (${record.capacity} events)`);
        continue;
      }

      record.buffer.push(event);
      queued++;
      this.scheduleDrain(record);
    }

    return queued;
  }

  /**
   * Drop a subscriber from outside the hub, e.g. when its transport
   * reports backpressure.
   */
  disconnect(subscriptionId: string, reason: string): boolean {
    const record = this.subscriptions.get(subscriptionId);
    if (!record) {
      return false;
    }
    this.drop(record, reason);
    return true;
  }

  private drop(record: SubscriptionRecord, reason: string): void {
    this.unsubscribe(record.id);

    const error = new PushDeliveryError(record.id, reason);
    console.warn(`[BroadcastHub] ${error.message}`);

    if (record.onDrop) {
      try {
        record.onDrop(error);
      } catch (callbackError) {
        console.error(`[BroadcastHub] onDrop callback for ${record.id} threw:`, callbackError);
      }
    }
  }

  private scheduleDrain(record: SubscriptionRecord): void {
    if (record.draining) {
      return;
    }
    record.draining = this.drain(record).finally(() => {
      record.draining = null;
      // Events published between the last shift and this callback
      if (record.buffer.length > 0 && this.subscriptions.has(record.id)) {
        this.scheduleDrain(record);
      }
    });
  }

  private async drain(record: SubscriptionRecord): Promise<void> {
    // Let the publisher finish before any handler runs
    await Promise.resolve();

    while (record.buffer.length > 0 && this.subscriptions.has(record.id)) {
      const event = record.buffer.shift();
      if (!event) {
        break;
      }
      try {
        await record.handler(event);
      } catch (error) {
        console.error(`[BroadcastHub] Handler for ${record.id} failed on ${event.kind}:`, error);
      }
    }
  }

  /**
   * Resolve once every subscriber's buffer is empty
   */
  async flush(): Promise<void> {
    for (;;) {
      const pending = [...this.subscriptions.values()]
        .map((record) => record.draining)
        .filter((draining): draining is Promise<void> => draining !== null);

      if (pending.length === 0) {
        return;
      }
      await Promise.all(pending);
    }
  }

  getSubscriberCount(kind?: BroadcastKind): number {
    if (kind === undefined) {
      return this.subscriptions.size;
    }
    let count = 0;
    for (const record of this.subscriptions.values()) {
      if (!record.kinds || record.kinds.has(kind)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Remove all subscriptions without notifying them
   */
  close(): void {
    for (const id of [...this.subscriptions.keys()]) {
      this.unsubscribe(id);
    }
  }
}
