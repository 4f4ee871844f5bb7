/**
 * ResultIngestion
 *
 * The unit of work run for every result the vision service reports:
 *
 * ```
 * validate envelope → classify → AlertEvaluator → [record + alert in one transaction]
 *                                  → Dispatcher.complete → publish task_result, alert, task_queue_update
 * ```
 *
 * Only the record/alert write is transactional. If it fails nothing is
 * committed, the queue entry is left alone and nothing is published. The
 * queue transition and the broadcast that follow are best-effort.
 */

import { InspectionDatabase } from "../db/connection";
import { TaskRecordRepository } from "../repositories/TaskRecordRepository";
import { AlertRepository } from "../repositories/AlertRepository";
import { Dispatcher, TaskOutcome } from "../queue/Dispatcher";
import { BroadcastHub } from "../queue/BroadcastHub";
import { AlertEvaluator } from "./AlertEvaluator";
import { IngestInput, IngestInputSchema, classifyResult } from "../types/results";
import { Alert, Severity, isProcessingFailure, isUnclassified } from "../types";
import { OperationResult, ValidationError, fail, guardPersistence, ok } from "../errors";

export interface IngestReceipt {
  recordId: number;
  severity: Severity;
  alertId: number | null;
  /** Queue transition applied, or null when the entry was missing or already finished */
  transition: TaskOutcome["status"] | null;
}

export interface ResultIngestionDeps {
  db: InspectionDatabase;
  dispatcher: Dispatcher;
  hub: BroadcastHub;
  evaluator: AlertEvaluator;
  /** Clock, for tests */
  now?: () => Date;
}

export class ResultIngestion {
  private readonly db: InspectionDatabase;
  private readonly dispatcher: Dispatcher;
  private readonly hub: BroadcastHub;
  private readonly evaluator: AlertEvaluator;
  private readonly now: () => Date;

  constructor(deps: ResultIngestionDeps) {
    this.db = deps.db;
    this.dispatcher = deps.dispatcher;
    this.hub = deps.hub;
    this.evaluator = deps.evaluator;
    this.now = deps.now ?? (() => new Date());
  }

  ingest(input: IngestInput): OperationResult<IngestReceipt> {
    const parsed = IngestInputSchema.safeParse(input);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error, "result"));
    }
    const { taskId, taskType, stationId } = parsed.data;
    const result = classifyResult(taskType, parsed.data.result);
    if (isUnclassified(result)) {
      console.warn(`[ResultIngestion] Unclassified result for ${taskId}: ${result.issues.join("; ")}`);
    }
    const imageRef = parsed.data.imageRef ?? null;
    const processingTime = parsed.data.processingTime ?? null;

    const evaluation = this.evaluator.evaluate(stationId, result);
    const timestamp = this.now();

    const written = guardPersistence("ingest", () =>
      ok(
        this.db.transaction((tx) => {
          const recordId = new TaskRecordRepository(tx).append({
            taskId,
            taskType,
            stationId,
            imageRef,
            result,
            status: evaluation.severity,
            processingTime,
            timestamp,
          });

          const alert: Alert | null = evaluation.alert
            ? new AlertRepository(tx).create({ recordId, ...evaluation.alert, timestamp })
            : null;

          return { recordId, alert };
        })
      )
    );
    if (!written.success) {
      console.error(`[ResultIngestion] Result for ${taskId} not stored: ${written.error.message}`);
      return written;
    }
    const { recordId, alert } = written.value;

    const outcome: TaskOutcome = isProcessingFailure(result)
      ? { status: "failed", error: result.error }
      : { status: "completed" };

    let transition: TaskOutcome["status"] | null = null;
    const completed = this.dispatcher.complete(taskId, outcome);
    if (!completed.success) {
      console.error(
        `[ResultIngestion] Record ${recordId} stored but ${taskId} was not transitioned: ${completed.error.message}`
      );
    } else if (completed.value) {
      transition = outcome.status;
    } else {
      console.log(`[ResultIngestion] Record ${recordId} stored for ${taskId} with no live queue entry`);
    }

    this.hub.publish({
      kind: "task_result",
      payload: {
        taskId,
        taskType,
        stationId,
        result,
        status: evaluation.severity,
        imageRef,
        processingTime,
        recordId,
        timestamp,
      },
    });

    if (alert) {
      console.log(`[ResultIngestion] ${alert.level} alert ${alert.id}: ${alert.message}`);
      this.hub.publish({
        kind: "alert",
        payload: {
          alertId: alert.id,
          level: alert.level,
          alertType: alert.alertType,
          message: alert.message,
          recordId: alert.recordId,
          timestamp: alert.timestamp,
        },
      });
    }

    if (transition) {
      this.hub.publish({ kind: "task_queue_update", payload: { reason: transition, taskId } });
    }

    return ok({
      recordId,
      severity: evaluation.severity,
      alertId: alert ? alert.id : null,
      transition,
    });
  }
}
