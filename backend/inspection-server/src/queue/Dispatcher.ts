/**
 * Dispatcher
 *
 * Owns the live task queue. The Dispatcher:
 * 1. Validates and enqueues inspection tasks
 * 2. Hands pending tasks out to the vision service, one assignee per task
 * 3. Applies terminal transitions on behalf of result ingestion
 * 4. Publishes task_queue_update events via the BroadcastHub
 *
 * Integration:
 * - TaskQueueRepository: durable queue state, the only source of truth
 * - BroadcastHub: fan-out of queue changes to observers
 * - StationRegistry: optional station → task type binding checked on enqueue
 *
 * Every public method returns an OperationResult and never throws.
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { TaskQueueRepository } from "../repositories/TaskQueueRepository";
import { BroadcastHub } from "./BroadcastHub";
import { StationRegistry } from "../services/StationRegistry";
import { TaskTypeSchema, StationIdSchema } from "../types/results";
import { QueueStats, QueueStatus, Task, TaskParams, TaskType } from "../types";
import {
  ConflictError,
  NotFoundError,
  OperationResult,
  ValidationError,
  fail,
  guardPersistence,
  ok,
} from "../errors";
import { TerminalStatus, getAllowedTransitions, isTerminalStatus } from "./TaskState";

export const DEFAULT_PENDING_LIMIT = 10;
export const MAX_LIST_LIMIT = 500;
export const DEFAULT_CLEAR_AGE_MS = 24 * 60 * 60 * 1000;

export const EnqueueInputSchema = z.object({
  stationId: StationIdSchema,
  taskType: TaskTypeSchema,
  params: z.record(z.unknown()).default({}),
});

export type EnqueueInput = z.input<typeof EnqueueInputSchema>;

const LimitSchema = z.number().int().min(1).max(MAX_LIST_LIMIT);

/**
 * Outcome handed to complete() by result ingestion
 */
export interface TaskOutcome {
  status: TerminalStatus;
  error?: string;
}

export interface DispatcherOptions {
  /** Station binding checked on enqueue */
  stations?: StationRegistry;
  /** Clock, for tests */
  now?: () => Date;
}

export class Dispatcher {
  private readonly repository: TaskQueueRepository;
  private readonly hub: BroadcastHub;
  private readonly stations?: StationRegistry;
  private readonly now: () => Date;

  constructor(repository: TaskQueueRepository, hub: BroadcastHub, options: DispatcherOptions = {}) {
    this.repository = repository;
    this.hub = hub;
    this.stations = options.stations;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a pending task. Priority or any other caller metadata in params
   * is stored as-is and does not affect dispatch order.
   */
  enqueue(input: EnqueueInput): OperationResult<Task> {
    const parsed = EnqueueInputSchema.safeParse(input);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "task"));
    }
    const { stationId, taskType, params } = parsed.data;

    const bindingError = this.stations?.checkBinding(stationId, taskType);
    if (bindingError) {
      return fail(new ValidationError(bindingError));
    }

    return guardPersistence("enqueue", () => {
      const task = this.repository.create(
        { taskId: uuidv4(), stationId, taskType, params },
        this.now()
      );
      console.log(
        `[Dispatcher] Enqueued ${task.taskId} (station ${stationId}, type ${taskType})`
      );
      this.hub.publish({
        kind: "task_queue_update",
        payload: { reason: "added", taskId: task.taskId },
      });
      return ok(task);
    });
  }

  /**
   * Pending tasks, oldest first
   */
  listPending(limit: number = DEFAULT_PENDING_LIMIT): OperationResult<Task[]> {
    const parsedLimit = LimitSchema.safeParse(limit);
    if (!parsedLimit.success) {
      return fail(ValidationError.fromZod(parsedLimit.error, "limit"));
    }
    return guardPersistence("listPending", () =>
      ok(this.repository.findPending(parsedLimit.data))
    );
  }

  /**
   * Tasks in any (or one) status, newest first
   */
  list(options: { status?: QueueStatus; limit?: number } = {}): OperationResult<Task[]> {
    const parsedLimit = LimitSchema.optional().safeParse(options.limit);
    if (!parsedLimit.success) {
      return fail(ValidationError.fromZod(parsedLimit.error, "limit"));
    }
    return guardPersistence("list", () =>
      ok(this.repository.findAll({ status: options.status, limit: parsedLimit.data ?? 100 }))
    );
  }

  get(taskId: string): OperationResult<Task> {
    return guardPersistence("get", () => {
      const task = this.repository.findById(taskId);
      return task ? ok(task) : fail(new NotFoundError("task", taskId));
    });
  }

  /**
   * pending → assigned. Of any number of concurrent calls for the same
   * task, exactly one succeeds.
   */
  assign(taskId: string): OperationResult<Task> {
    return guardPersistence("assign", () => {
      if (!this.repository.markAssigned(taskId, this.now())) {
        const current = this.repository.findById(taskId);
        if (!current) {
          return fail(new NotFoundError("task", taskId));
        }
        const next = isTerminalStatus(current.status)
          ? ""
          : ` (next: ${getAllowedTransitions(current.status).join(" or ")})`;
        return fail(
          new ConflictError(`Task ${taskId} is ${current.status} and cannot be assigned${next}`, current.status)
        );
      }

      const task = this.repository.findById(taskId);
      if (!task) {
        return fail(new NotFoundError("task", taskId));
      }
      this.hub.publish({ kind: "task_queue_update", payload: { reason: "assigned", taskId } });
      return ok(task);
    });
  }

  /**
   * Remove a task in any status. History records are untouched.
   */
  delete(taskId: string): OperationResult<void> {
    return guardPersistence("delete", () => {
      if (!this.repository.delete(taskId)) {
        return fail(new NotFoundError("task", taskId));
      }
      console.log(`[Dispatcher] Deleted ${taskId}`);
      this.hub.publish({ kind: "task_queue_update", payload: { reason: "removed", taskId } });
      return ok(undefined);
    });
  }

  /**
   * Remove completed and failed tasks that finished more than
   * `olderThanMs` ago. Pending and assigned tasks are never removed.
   *
   * @returns number of removed tasks
   */
  clearCompleted(olderThanMs: number = DEFAULT_CLEAR_AGE_MS): OperationResult<number> {
    if (!Number.isFinite(olderThanMs) || olderThanMs < 0) {
      return fail(new ValidationError("olderThan must be a non-negative duration"));
    }

    return guardPersistence("clearCompleted", () => {
      const cutoff = new Date(this.now().getTime() - olderThanMs);
      const removed = this.repository.deleteFinishedBefore(cutoff);

      if (removed.length > 0) {
        console.log(`[Dispatcher] Cleared ${removed.length} finished task(s)`);
      }
      for (const taskId of removed) {
        this.hub.publish({ kind: "task_queue_update", payload: { reason: "removed", taskId } });
      }
      return ok(removed.length);
    });
  }

  stats(): OperationResult<QueueStats> {
    return guardPersistence("stats", () => ok(this.repository.countByStatus()));
  }

  /**
   * Task types that currently have pending tasks
   */
  pendingTaskTypes(): OperationResult<TaskType[]> {
    return guardPersistence("pendingTaskTypes", () => ok(this.repository.findPendingTaskTypes()));
  }

  /**
   * Move a pending or assigned task to a terminal status.
   *
   * Does not publish: the caller announces the transition once its own
   * events are out.
   *
   * @returns the updated task, or null when the task is missing or already terminal
   */
  complete(taskId: string, outcome: TaskOutcome): OperationResult<Task | null> {
    return guardPersistence("complete", () => {
      const changed = this.repository.markFinished(
        taskId,
        outcome.status,
        this.now(),
        outcome.error ?? null
      );
      if (!changed) {
        const current = this.repository.findById(taskId);
        console.log(
          current && isTerminalStatus(current.status)
            ? `[Dispatcher] No transition for ${taskId}: already ${current.status}`
            : `[Dispatcher] No transition for ${taskId}: not in the queue`
        );
        return ok(null);
      }
      return ok(this.repository.findById(taskId) ?? null);
    });
  }
}
