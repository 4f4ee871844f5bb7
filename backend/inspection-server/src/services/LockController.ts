/**
 * LockController
 *
 * Keeps an inspection loop running for an observer: while armed, every
 * ingested result for a locked task type re-enqueues the same
 * (station, task type) after a short debounce.
 *
 * Key responsibilities:
 * - Track the locked task types and whether the lock is armed
 * - Debounce requeues per (task type, station): a repeat result before the
 *   timer fires restarts it instead of stacking a second requeue
 * - Cancel every scheduled requeue on disarm and dispose
 *
 * One controller per observer. It reaches the queue only through
 * Dispatcher.enqueue and learns about results only through the hub.
 */

import { EventEmitter } from "events";
import { BroadcastHub, Subscription, TaskResultEvent } from "../queue/BroadcastHub";
import { Dispatcher } from "../queue/Dispatcher";
import { OperationResult, fail, ok } from "../errors";
import { Task, TaskType } from "../types";

export const DEFAULT_LOCK_DEBOUNCE_MS = 500;

export interface LockState {
  enabled: boolean;
  lockedTaskTypes: TaskType[];
}

export interface LockControllerOptions {
  /** Delay before a locked result is re-enqueued (default: 500ms) */
  debounceMs?: number;
}

export class LockController extends EventEmitter {
  private enabled = false;
  private readonly locked: Set<TaskType> = new Set();
  private readonly timers: Map<string, NodeJS.Timeout> = new Map();
  private subscription?: Subscription;
  private readonly debounceMs: number;

  /** Event types emitted by LockController */
  static readonly Events = {
    REQUEUED: "requeued",
    REQUEUE_FAILED: "requeue_failed",
  } as const;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly hub: BroadcastHub,
    options: LockControllerOptions = {}
  ) {
    super();
    this.debounceMs = options.debounceMs ?? DEFAULT_LOCK_DEBOUNCE_MS;
  }

  /**
   * Enable the lock. Without a seed, the task types that currently have
   * pending tasks become the locked set.
   */
  arm(seed?: readonly TaskType[]): OperationResult<LockState> {
    if (seed === undefined) {
      const pending = this.dispatcher.pendingTaskTypes();
      if (!pending.success) {
        return fail(pending.error);
      }
      seed = pending.value;
    }

    this.locked.clear();
    for (const taskType of seed) {
      this.locked.add(taskType);
    }
    this.enabled = true;
    this.ensureSubscribed();

    console.log(`[LockController] Armed for task types [${this.sortedTypes().join(", ")}]`);
    return ok(this.getState());
  }

  /**
   * Disable the lock and cancel scheduled requeues. The locked set is kept.
   */
  disarm(): LockState {
    this.enabled = false;
    this.cancelAll();
    return this.getState();
  }

  lock(taskType: TaskType): LockState {
    this.locked.add(taskType);
    return this.getState();
  }

  unlock(taskType: TaskType): LockState {
    this.locked.delete(taskType);
    for (const [key, timer] of this.timers) {
      if (key.startsWith(`${taskType}:`)) {
        clearTimeout(timer);
        this.timers.delete(key);
      }
    }
    return this.getState();
  }

  getState(): LockState {
    return { enabled: this.enabled, lockedTaskTypes: this.sortedTypes() };
  }

  /**
   * Number of requeues waiting for their debounce to elapse
   */
  getScheduledCount(): number {
    return this.timers.size;
  }

  /**
   * Disarm and stop listening to the hub
   */
  dispose(): void {
    this.disarm();
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    this.removeAllListeners();
  }

  private ensureSubscribed(): void {
    if (this.subscription) {
      return;
    }
    this.subscription = this.hub.subscribe(
      (event) => {
        if (event.kind === "task_result") {
          this.onTaskResult(event.payload);
        }
      },
      {
        kinds: ["task_result"],
        onDrop: () => {
          this.subscription = undefined;
          // While disarmed, the next arm resubscribes
          if (this.enabled) {
            this.ensureSubscribed();
            console.warn("[LockController] Dropped by the hub, resubscribed");
          }
        },
      }
    );
  }

  private onTaskResult(result: TaskResultEvent): void {
    if (!this.enabled || !this.locked.has(result.taskType)) {
      return;
    }

    const key = `${result.taskType}:${result.stationId}`;
    const existing = this.timers.get(key);
    if (existing) {
      clearTimeout(existing);
    }

    this.timers.set(
      key,
      setTimeout(() => {
        this.timers.delete(key);
        this.requeue(result.stationId, result.taskType);
      }, this.debounceMs)
    );
  }

  private requeue(stationId: number, taskType: TaskType): void {
    if (!this.enabled || !this.locked.has(taskType)) {
      return;
    }

    const result = this.dispatcher.enqueue({ stationId, taskType, params: { origin: "lock" } });
    if (!result.success) {
      console.error(
        `[LockController] Requeue of station ${stationId} type ${taskType} failed: ${result.error.message}`
      );
      this.emit(LockController.Events.REQUEUE_FAILED, result.error);
      return;
    }

    const task: Task = result.value;
    this.emit(LockController.Events.REQUEUED, task);
  }

  private cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private sortedTypes(): TaskType[] {
    return [...this.locked].sort((a, b) => a - b);
  }
}
