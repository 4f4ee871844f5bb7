import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { openDatabase, DatabaseHandle } from "../db/connection";
import { TaskQueueRepository } from "../repositories/TaskQueueRepository";
import { TaskRecordRepository } from "../repositories/TaskRecordRepository";
import { AlertRepository } from "../repositories/AlertRepository";
import { BroadcastHub, BroadcastEvent } from "../queue/BroadcastHub";
import { Dispatcher } from "../queue/Dispatcher";
import { AlertEvaluator } from "./AlertEvaluator";
import { ResultIngestion } from "./ResultIngestion";
import { OperationResult } from "../errors";

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    assert.fail(`Expected success, got ${result.error.name}: ${result.error.message}`);
  }
  return result.value;
}

describe("ResultIngestion", () => {
  let handle: DatabaseHandle;
  let hub: BroadcastHub;
  let dispatcher: Dispatcher;
  let records: TaskRecordRepository;
  let alerts: AlertRepository;
  let ingestion: ResultIngestion;
  let events: BroadcastEvent[];

  beforeEach(() => {
    handle = openDatabase(":memory:");
    hub = new BroadcastHub();
    events = [];
    hub.subscribe((event) => {
      events.push(event);
    });
    dispatcher = new Dispatcher(new TaskQueueRepository(handle.db), hub);
    records = new TaskRecordRepository(handle.db);
    alerts = new AlertRepository(handle.db);
    ingestion = new ResultIngestion({
      db: handle.db,
      dispatcher,
      hub,
      evaluator: new AlertEvaluator(),
    });
  });

  afterEach(() => {
    hub.close();
    handle.close();
  });

  function temperatureTask(stationId = 1): string {
    return unwrap(dispatcher.enqueue({ stationId, taskType: 2 })).taskId;
  }

  describe("end to end", () => {
    it("should store, alert, complete and broadcast in order", async () => {
      const taskId = temperatureTask();
      unwrap(dispatcher.assign(taskId));
      await hub.flush();
      events.length = 0;

      const receipt = unwrap(
        ingestion.ingest({
          taskId,
          taskType: 2,
          stationId: 1,
          result: { taskType: 2, maxTemperature: 85 },
          imageRef: "captures/1.jpg",
          processingTime: 2.5,
        })
      );

      assert.equal(receipt.severity, "danger");
      assert.equal(receipt.transition, "completed");
      assert.ok(receipt.alertId !== null);

      const record = records.findById(receipt.recordId);
      assert.equal(record?.status, "danger");
      assert.equal(record?.imageRef, "captures/1.jpg");

      const stored = alerts.findByRecordId(receipt.recordId);
      assert.equal(stored.length, 1);
      assert.equal(stored[0].level, "danger");
      assert.equal(stored[0].alertType, "high_temperature");

      assert.equal(unwrap(dispatcher.get(taskId)).status, "completed");

      await hub.flush();
      assert.deepEqual(
        events.map((e) => e.kind),
        ["task_result", "alert", "task_queue_update"]
      );

      const [result, alert, update] = events;
      assert.equal(result.kind === "task_result" ? result.payload.recordId : undefined, receipt.recordId);
      assert.equal(alert.kind === "alert" ? alert.payload.alertId : undefined, receipt.alertId);
      assert.deepEqual(update.kind === "task_queue_update" ? update.payload : undefined, {
        reason: "completed",
        taskId,
      });
    });

    it("should record a warning at 70°C", () => {
      const taskId = temperatureTask();
      const receipt = unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { taskType: 2, maxTemperature: 70 } })
      );
      assert.equal(receipt.severity, "warning");
      assert.equal(alerts.findByRecordId(receipt.recordId)[0]?.level, "warning");
    });

    it("should not alert at 40°C", async () => {
      const taskId = temperatureTask();
      const receipt = unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { taskType: 2, maxTemperature: 40 } })
      );

      assert.equal(receipt.severity, "normal");
      assert.equal(receipt.alertId, null);
      assert.equal(alerts.findUnhandled().length, 0);

      await hub.flush();
      assert.equal(
        events.some((e) => e.kind === "alert"),
        false
      );
    });
  });

  describe("queue transitions", () => {
    it("should complete a pending task through assigned", () => {
      const taskId = temperatureTask();
      unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { taskType: 2, maxTemperature: 20 } })
      );

      const task = unwrap(dispatcher.get(taskId));
      assert.equal(task.status, "completed");
      assert.ok(task.assignedAt instanceof Date);
      assert.equal(task.assignedAt?.getTime(), task.completedAt?.getTime());
    });

    it("should fail the task on a processing failure", async () => {
      const taskId = temperatureTask();
      await hub.flush();
      events.length = 0;

      const receipt = unwrap(
        ingestion.ingest({
          taskId,
          taskType: 2,
          stationId: 1,
          result: { taskType: 2, error: "thermal camera timeout" },
        })
      );

      assert.equal(receipt.severity, "normal");
      assert.equal(receipt.transition, "failed");
      const task = unwrap(dispatcher.get(taskId));
      assert.equal(task.status, "failed");
      assert.equal(task.error, "thermal camera timeout");

      await hub.flush();
      assert.deepEqual(
        events.map((e) => e.kind),
        ["task_result", "task_queue_update"]
      );
    });

    it("should store the record for an unknown task without failing", async () => {
      await hub.flush();
      events.length = 0;

      const receipt = unwrap(
        ingestion.ingest({
          taskId: "not-queued",
          taskType: 2,
          stationId: 1,
          result: { taskType: 2, maxTemperature: 30 },
        })
      );

      assert.equal(receipt.transition, null);
      assert.ok(records.findById(receipt.recordId));
      await hub.flush();
      assert.deepEqual(
        events.map((e) => e.kind),
        ["task_result"]
      );
    });

    it("should leave a terminal task untouched on a repeated result", () => {
      const taskId = temperatureTask();
      unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { taskType: 2, maxTemperature: 30 } })
      );
      const receipt = unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { taskType: 2, error: "late" } })
      );

      assert.equal(receipt.transition, null);
      assert.equal(unwrap(dispatcher.get(taskId)).status, "completed");
    });
  });

  describe("malformed payloads", () => {
    it("should store a malformed gauge reading as normal", async () => {
      const taskId = unwrap(dispatcher.enqueue({ stationId: 3, taskType: 1 })).taskId;
      const raw = { taskType: 1, value: 3.2, confidence: 1.4, status: "warning" };

      const receipt = unwrap(ingestion.ingest({ taskId, taskType: 1, stationId: 3, result: raw }));

      assert.equal(receipt.severity, "normal");
      assert.equal(receipt.alertId, null);
      assert.equal(receipt.transition, "completed");

      const record = records.findById(receipt.recordId);
      assert.equal(record?.status, "normal");
      assert.equal(record?.confidence, null);
      assert.deepEqual(record && "raw" in record.result ? record.result.raw : undefined, raw);
      assert.equal(unwrap(dispatcher.get(taskId)).status, "completed");

      await hub.flush();
      assert.deepEqual(
        events.map((e) => e.kind),
        ["task_queue_update", "task_result", "task_queue_update"]
      );
    });

    it("should store a temperature result without a reading", () => {
      const taskId = temperatureTask(4);

      const receipt = unwrap(ingestion.ingest({ taskId, taskType: 2, stationId: 4, result: { taskType: 2 } }));

      assert.equal(receipt.severity, "normal");
      assert.deepEqual(records.findById(receipt.recordId)?.result, {
        taskType: 2,
        raw: { taskType: 2 },
        issues: ["maxTemperature: Required"],
      });
      assert.equal(records.list({ stationId: 4 }).length, 1);
    });

    it("should take the task type from the envelope when the payload has none", () => {
      const taskId = temperatureTask();

      const receipt = unwrap(
        ingestion.ingest({ taskId, taskType: 2, stationId: 1, result: { reading: "n/a" } })
      );

      const result = records.findById(receipt.recordId)?.result;
      assert.equal(result?.taskType, 2);
      assert.deepEqual(result && "raw" in result ? result.raw : undefined, { reading: "n/a" });
    });
  });

  describe("validation", () => {
    it("should reject a result whose variant does not match the task type", () => {
      const result = ingestion.ingest({
        taskId: "t-1",
        taskType: 2,
        stationId: 1,
        result: { taskType: 1, value: 1, unit: "bar" },
      });
      assert.equal(result.success ? undefined : result.error.code, "VALIDATION_FAILED");
    });

    it("should reject a negative processing time", () => {
      const result = ingestion.ingest({
        taskId: "t-1",
        taskType: 2,
        stationId: 1,
        result: { taskType: 2, maxTemperature: 30 },
        processingTime: -1,
      });
      assert.equal(result.success ? undefined : result.error.code, "VALIDATION_FAILED");
    });

    it("should reject an out-of-range task type", () => {
      const result = ingestion.ingest({
        taskId: "t-1",
        taskType: 9,
        stationId: 1,
        result: { taskType: 9, error: "x" },
      });
      assert.equal(result.success, false);
    });
  });

  describe("persistence failures", () => {
    it("should leave the queue and broadcast untouched when the record write fails", async () => {
      const taskId = temperatureTask();
      await hub.flush();
      events.length = 0;
      handle.sqlite.exec("DROP TABLE task_records");

      const result = ingestion.ingest({
        taskId,
        taskType: 2,
        stationId: 1,
        result: { taskType: 2, maxTemperature: 30 },
      });

      assert.equal(result.success ? undefined : result.error.code, "PERSISTENCE_FAILED");
      assert.equal(unwrap(dispatcher.get(taskId)).status, "pending");
      await hub.flush();
      assert.deepEqual(events, []);
    });

    it("should roll back the record when the alert write fails", () => {
      const taskId = temperatureTask();
      handle.sqlite.exec("DROP TABLE alert_log");

      const result = ingestion.ingest({
        taskId,
        taskType: 2,
        stationId: 1,
        result: { taskType: 2, maxTemperature: 85 },
      });

      assert.equal(result.success ? undefined : result.error.code, "PERSISTENCE_FAILED");
      assert.deepEqual(records.list(), []);
      assert.equal(unwrap(dispatcher.get(taskId)).status, "pending");
    });
  });
});
