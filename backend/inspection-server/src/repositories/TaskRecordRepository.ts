/**
 * TaskRecordRepository
 *
 * Data access layer for the append-only result history.
 * Records are never updated; the only removal is the retention purge.
 */

import { and, desc, eq, gte, lt, lte, sql, SQL } from "drizzle-orm";
import { taskRecords, TaskRecordRow } from "../db/schema";
import { InspectionDatabase } from "../db/connection";
import { TaskResultPayloadSchema } from "../types/results";
import {
  RecordStatistics,
  Severity,
  TaskRecord,
  TaskResultPayload,
  TaskType,
  isTaskType,
} from "../types";

export interface AppendRecordInput {
  taskId: string;
  taskType: TaskType;
  stationId: number;
  imageRef: string | null;
  result: TaskResultPayload;
  status: Severity;
  processingTime: number | null;
  timestamp?: Date;
}

export interface ListRecordsOptions {
  taskType?: TaskType;
  stationId?: number;
  from?: Date;
  to?: Date;
  /** Defaults to 50 */
  limit?: number;
  offset?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function confidenceOf(result: TaskResultPayload): number | null {
  if ("confidence" in result && typeof result.confidence === "number") {
    return result.confidence;
  }
  return null;
}

/**
 * Convert a database row to the TaskRecord entity
 */
export function rowToRecord(row: TaskRecordRow): TaskRecord {
  if (!isTaskType(row.taskType)) {
    throw new Error(`Record ${row.id} has unknown task type ${row.taskType}`);
  }
  const parsed = TaskResultPayloadSchema.safeParse(JSON.parse(row.resultData));
  if (!parsed.success) {
    throw new Error(`Record ${row.id} has an unreadable result payload`);
  }
  return {
    id: row.id,
    taskId: row.taskId,
    taskType: row.taskType,
    stationId: row.stationId,
    imageRef: row.imageRef,
    result: parsed.data,
    status: row.status,
    confidence: row.confidence,
    processingTime: row.processingTime,
    timestamp: row.timestamp,
  };
}

export class TaskRecordRepository {
  private db: InspectionDatabase;

  constructor(db: InspectionDatabase) {
    this.db = db;
  }

  /**
   * Append a record. Returns the new record id.
   */
  append(input: AppendRecordInput): number {
    const result = this.db
      .insert(taskRecords)
      .values({
        taskId: input.taskId,
        taskType: input.taskType,
        stationId: input.stationId,
        imageRef: input.imageRef,
        resultData: JSON.stringify(input.result),
        status: input.status,
        confidence: confidenceOf(input.result),
        processingTime: input.processingTime,
        timestamp: input.timestamp ?? new Date(),
      })
      .run();

    return Number(result.lastInsertRowid);
  }

  findById(id: number): TaskRecord | undefined {
    const row = this.db.select().from(taskRecords).where(eq(taskRecords.id, id)).get();
    return row ? rowToRecord(row) : undefined;
  }

  /**
   * Filtered history, newest first
   */
  list(options: ListRecordsOptions = {}): TaskRecord[] {
    const conditions: SQL[] = [];
    if (options.taskType !== undefined) conditions.push(eq(taskRecords.taskType, options.taskType));
    if (options.stationId !== undefined) conditions.push(eq(taskRecords.stationId, options.stationId));
    if (options.from) conditions.push(gte(taskRecords.timestamp, options.from));
    if (options.to) conditions.push(lte(taskRecords.timestamp, options.to));

    return this.db
      .select()
      .from(taskRecords)
      .where(and(...conditions))
      .orderBy(desc(taskRecords.timestamp), desc(taskRecords.id))
      .limit(options.limit ?? 50)
      .offset(options.offset ?? 0)
      .all()
      .map(rowToRecord);
  }

  /**
   * Most recent record for a station, optionally narrowed to one task type
   */
  findLatest(stationId: number, taskType?: TaskType): TaskRecord | undefined {
    const row = this.db
      .select()
      .from(taskRecords)
      .where(
        and(
          eq(taskRecords.stationId, stationId),
          taskType !== undefined ? eq(taskRecords.taskType, taskType) : undefined
        )
      )
      .orderBy(desc(taskRecords.timestamp), desc(taskRecords.id))
      .limit(1)
      .get();
    return row ? rowToRecord(row) : undefined;
  }

  /**
   * Severity counts and averages over the last `days` days
   */
  statistics(options: { taskType?: TaskType; days?: number; now?: Date } = {}): RecordStatistics {
    const now = options.now ?? new Date();
    const since = new Date(now.getTime() - (options.days ?? 7) * DAY_MS);

    const row = this.db
      .select({
        totalCount: sql<number>`count(*)`,
        normalCount: sql<number>`count(case when ${taskRecords.status} = 'normal' then 1 end)`,
        warningCount: sql<number>`count(case when ${taskRecords.status} = 'warning' then 1 end)`,
        dangerCount: sql<number>`count(case when ${taskRecords.status} = 'danger' then 1 end)`,
        avgConfidence: sql<number | null>`avg(${taskRecords.confidence})`,
        avgProcessingTime: sql<number | null>`avg(${taskRecords.processingTime})`,
      })
      .from(taskRecords)
      .where(
        and(
          gte(taskRecords.timestamp, since),
          options.taskType !== undefined ? eq(taskRecords.taskType, options.taskType) : undefined
        )
      )
      .get();

    return (
      row ?? {
        totalCount: 0,
        normalCount: 0,
        warningCount: 0,
        dangerCount: 0,
        avgConfidence: null,
        avgProcessingTime: null,
      }
    );
  }

  /**
   * Delete records older than the cutoff. Alerts pointing at them keep their
   * rows with record_id nulled by the foreign key.
   * Returns the number of deleted rows.
   */
  purgeBefore(cutoff: Date): number {
    const result = this.db.delete(taskRecords).where(lt(taskRecords.timestamp, cutoff)).run();
    return result.changes;
  }
}
