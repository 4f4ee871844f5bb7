/**
 * HistoryService
 *
 * Read side of the result history and alert log, plus the retention purge.
 */

import { z } from "zod";
import { TaskRecordRepository } from "../repositories/TaskRecordRepository";
import { AlertRepository } from "../repositories/AlertRepository";
import { StationIdSchema, TaskTypeSchema } from "../types/results";
import { Alert, RecordStatistics, TaskRecord } from "../types";
import {
  NotFoundError,
  OperationResult,
  ValidationError,
  fail,
  guardPersistence,
  ok,
} from "../errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export const HistoryQuerySchema = z
  .object({
    taskType: TaskTypeSchema.optional(),
    stationId: StationIdSchema.optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    limit: z.number().int().min(1).max(500).default(50),
    offset: z.number().int().min(0).default(0),
  })
  .default({});

export const LatestRecordQuerySchema = z.object({
  stationId: StationIdSchema,
  taskType: TaskTypeSchema.optional(),
});

export const StatisticsQuerySchema = z
  .object({
    taskType: TaskTypeSchema.optional(),
    days: z.number().int().min(1).max(3650).default(7),
  })
  .default({});

export type HistoryQuery = z.input<typeof HistoryQuerySchema>;
export type LatestRecordQuery = z.input<typeof LatestRecordQuerySchema>;
export type StatisticsQuery = z.input<typeof StatisticsQuerySchema>;

export const DEFAULT_RETENTION_DAYS = 90;

export class HistoryService {
  constructor(
    private readonly records: TaskRecordRepository,
    private readonly alerts: AlertRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  list(query: HistoryQuery = {}): OperationResult<TaskRecord[]> {
    const parsed = HistoryQuerySchema.safeParse(query);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "history query"));
    }
    return guardPersistence("history.list", () => ok(this.records.list(parsed.data)));
  }

  /**
   * Newest record for a station; null when it has none
   */
  latest(query: LatestRecordQuery): OperationResult<TaskRecord | null> {
    const parsed = LatestRecordQuerySchema.safeParse(query);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "latest record query"));
    }
    return guardPersistence("history.latest", () =>
      ok(this.records.findLatest(parsed.data.stationId, parsed.data.taskType) ?? null)
    );
  }

  statistics(query: StatisticsQuery = {}): OperationResult<RecordStatistics> {
    const parsed = StatisticsQuerySchema.safeParse(query);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "statistics query"));
    }
    return guardPersistence("history.statistics", () =>
      ok(this.records.statistics({ ...parsed.data, now: this.now() }))
    );
  }

  /**
   * Delete records older than `olderThanDays`.
   *
   * @returns number of deleted records
   */
  purge(olderThanDays: number = DEFAULT_RETENTION_DAYS): OperationResult<number> {
    if (!Number.isInteger(olderThanDays) || olderThanDays < 0) {
      return fail(new ValidationError("olderThanDays must be a non-negative integer"));
    }
    return guardPersistence("history.purge", () => {
      const deleted = this.records.purgeBefore(new Date(this.now().getTime() - olderThanDays * DAY_MS));
      if (deleted > 0) {
        console.log(`[HistoryService] Purged ${deleted} record(s) older than ${olderThanDays} days`);
      }
      return ok(deleted);
    });
  }

  unhandledAlerts(limit = 50): OperationResult<Alert[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
      return fail(new ValidationError("limit must be an integer between 1 and 500"));
    }
    return guardPersistence("alerts.unhandled", () => ok(this.alerts.findUnhandled(limit)));
  }

  markAlertHandled(alertId: number): OperationResult<Alert> {
    return guardPersistence("alerts.markHandled", () => {
      if (!this.alerts.markHandled(alertId)) {
        return fail(new NotFoundError("alert", alertId));
      }
      const alert = this.alerts.findById(alertId);
      return alert ? ok(alert) : fail(new NotFoundError("alert", alertId));
    });
  }
}
