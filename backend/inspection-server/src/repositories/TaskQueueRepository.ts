/**
 * TaskQueueRepository
 *
 * Data access layer for the live task queue using Drizzle ORM.
 * State transitions are conditional updates keyed on the current status,
 * so a transition either happens exactly once or not at all.
 */

import { and, asc, desc, eq, inArray, lt, sql } from "drizzle-orm";
import { taskQueue, TaskQueueRow } from "../db/schema";
import { InspectionDatabase } from "../db/connection";
import { QueueStats, QueueStatus, Task, TaskParams, TaskType, isTaskType } from "../types";

export interface CreateQueueEntry {
  taskId: string;
  stationId: number;
  taskType: TaskType;
  params: TaskParams;
}

function parseParams(raw: string): TaskParams {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    console.warn("[TaskQueueRepository] Unreadable params column:", error);
  }
  return {};
}

/**
 * Convert a database row to the Task entity
 */
export function rowToTask(row: TaskQueueRow): Task {
  if (!isTaskType(row.taskType)) {
    throw new Error(`Queue entry ${row.taskId} has unknown task type ${row.taskType}`);
  }
  return {
    taskId: row.taskId,
    stationId: row.stationId,
    taskType: row.taskType,
    status: row.status,
    params: parseParams(row.params),
    createdAt: row.createdAt,
    assignedAt: row.assignedAt,
    completedAt: row.completedAt,
    error: row.error,
  };
}

export class TaskQueueRepository {
  private db: InspectionDatabase;

  constructor(db: InspectionDatabase) {
    this.db = db;
  }

  /**
   * Insert a new pending entry
   */
  create(entry: CreateQueueEntry, createdAt: Date = new Date()): Task {
    this.db
      .insert(taskQueue)
      .values({
        taskId: entry.taskId,
        stationId: entry.stationId,
        taskType: entry.taskType,
        status: "pending",
        params: JSON.stringify(entry.params),
        createdAt,
      })
      .run();

    const created = this.findById(entry.taskId);
    if (!created) {
      throw new Error(`Queue entry ${entry.taskId} was not persisted`);
    }
    return created;
  }

  /**
   * Find a queue entry by its public task id
   */
  findById(taskId: string): Task | undefined {
    const row = this.db.select().from(taskQueue).where(eq(taskQueue.taskId, taskId)).get();
    return row ? rowToTask(row) : undefined;
  }

  /**
   * Pending entries, oldest first
   */
  findPending(limit: number): Task[] {
    return this.db
      .select()
      .from(taskQueue)
      .where(eq(taskQueue.status, "pending"))
      .orderBy(asc(taskQueue.createdAt), asc(taskQueue.id))
      .limit(limit)
      .all()
      .map(rowToTask);
  }

  /**
   * Entries in any (or one) state, newest first
   */
  findAll(options: { status?: QueueStatus; limit?: number } = {}): Task[] {
    const query = this.db
      .select()
      .from(taskQueue)
      .where(options.status ? eq(taskQueue.status, options.status) : undefined)
      .orderBy(desc(taskQueue.createdAt), desc(taskQueue.id));

    const rows = options.limit !== undefined ? query.limit(options.limit).all() : query.all();
    return rows.map(rowToTask);
  }

  /**
   * Distinct task types that currently have pending entries
   */
  findPendingTaskTypes(): TaskType[] {
    return this.db
      .selectDistinct({ taskType: taskQueue.taskType })
      .from(taskQueue)
      .where(eq(taskQueue.status, "pending"))
      .all()
      .map((row) => row.taskType)
      .filter(isTaskType);
  }

  /**
   * pending -> assigned, as a single conditional update.
   *
   * @returns true if this call performed the transition
   */
  markAssigned(taskId: string, at: Date = new Date()): boolean {
    const result = this.db
      .update(taskQueue)
      .set({ status: "assigned", assignedAt: at })
      .where(and(eq(taskQueue.taskId, taskId), eq(taskQueue.status, "pending")))
      .run();
    return result.changes === 1;
  }

  /**
   * {pending, assigned} -> completed | failed.
   *
   * A pending entry is stamped assigned at the same instant first, so the
   * observed sequence never skips the assigned step.
   *
   * @returns true if this call performed the transition
   */
  markFinished(
    taskId: string,
    status: "completed" | "failed",
    at: Date = new Date(),
    error: string | null = null
  ): boolean {
    return this.db.transaction((tx) => {
      tx.update(taskQueue)
        .set({ status: "assigned", assignedAt: at })
        .where(and(eq(taskQueue.taskId, taskId), eq(taskQueue.status, "pending")))
        .run();

      const result = tx
        .update(taskQueue)
        .set({ status, completedAt: at, error })
        .where(and(eq(taskQueue.taskId, taskId), eq(taskQueue.status, "assigned")))
        .run();

      return result.changes === 1;
    });
  }

  /**
   * Delete an entry in any state
   */
  delete(taskId: string): boolean {
    const result = this.db.delete(taskQueue).where(eq(taskQueue.taskId, taskId)).run();
    return result.changes > 0;
  }

  /**
   * Delete completed/failed entries that finished before the cutoff.
   * Pending and assigned entries are never matched.
   *
   * @returns ids of the removed entries
   */
  deleteFinishedBefore(cutoff: Date): string[] {
    return this.db.transaction((tx) => {
      const condition = and(
        inArray(taskQueue.status, ["completed", "failed"]),
        lt(taskQueue.completedAt, cutoff)
      );

      const ids = tx
        .select({ taskId: taskQueue.taskId })
        .from(taskQueue)
        .where(condition)
        .all()
        .map((row) => row.taskId);

      if (ids.length > 0) {
        tx.delete(taskQueue).where(condition).run();
      }

      return ids;
    });
  }

  /**
   * Count entries per status
   */
  countByStatus(): QueueStats {
    const rows = this.db
      .select({ status: taskQueue.status, count: sql<number>`count(*)` })
      .from(taskQueue)
      .groupBy(taskQueue.status)
      .all();

    const stats: QueueStats = { pending: 0, assigned: 0, completed: 0, failed: 0, total: 0 };
    for (const row of rows) {
      stats[row.status] = row.count;
      stats.total += row.count;
    }
    return stats;
  }
}
