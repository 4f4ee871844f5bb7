import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import { openDatabase, DatabaseHandle } from "../db/connection";
import { TaskQueueRepository } from "../repositories/TaskQueueRepository";
import { BroadcastHub } from "../queue/BroadcastHub";
import { Dispatcher } from "../queue/Dispatcher";
import { AlertEvaluator } from "./AlertEvaluator";
import { ResultIngestion } from "./ResultIngestion";
import { LockController } from "./LockController";
import { OperationResult } from "../errors";
import { createInspectionServices } from "../app";
import { Task } from "../types";

const DEBOUNCE_MS = 20;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    assert.fail(`Expected success, got ${result.error.name}: ${result.error.message}`);
  }
  return result.value;
}

describe("LockController", () => {
  let handle: DatabaseHandle;
  let hub: BroadcastHub;
  let dispatcher: Dispatcher;
  let ingestion: ResultIngestion;
  let lock: LockController;

  beforeEach(() => {
    handle = openDatabase(":memory:");
    hub = new BroadcastHub();
    dispatcher = new Dispatcher(new TaskQueueRepository(handle.db), hub);
    ingestion = new ResultIngestion({
      db: handle.db,
      dispatcher,
      hub,
      evaluator: new AlertEvaluator(),
    });
    lock = new LockController(dispatcher, hub, { debounceMs: DEBOUNCE_MS });
  });

  afterEach(() => {
    lock.dispose();
    hub.close();
    handle.close();
  });

  function runTemperatureTask(stationId: number): string {
    const taskId = unwrap(dispatcher.enqueue({ stationId, taskType: 2 })).taskId;
    unwrap(dispatcher.assign(taskId));
    unwrap(
      ingestion.ingest({ taskId, taskType: 2, stationId, result: { taskType: 2, maxTemperature: 30 } })
    );
    return taskId;
  }

  function pendingFor(stationId: number): Task[] {
    return unwrap(dispatcher.listPending(100)).filter((t) => t.stationId === stationId);
  }

  describe("arm", () => {
    it("should seed the locked set from pending task types", () => {
      unwrap(dispatcher.enqueue({ stationId: 1, taskType: 3 }));
      unwrap(dispatcher.enqueue({ stationId: 2, taskType: 1 }));

      assert.deepEqual(unwrap(lock.arm()), { enabled: true, lockedTaskTypes: [1, 3] });
    });

    it("should use an explicit seed", () => {
      assert.deepEqual(unwrap(lock.arm([5, 2])), { enabled: true, lockedTaskTypes: [2, 5] });
    });
  });

  describe("requeue cycle", () => {
    it("should re-enqueue a locked type after the debounce", async () => {
      const requeued = mock.fn();
      lock.on(LockController.Events.REQUEUED, requeued);
      unwrap(lock.arm([2]));

      runTemperatureTask(1);
      await hub.flush();
      assert.equal(lock.getScheduledCount(), 1);
      assert.equal(pendingFor(1).length, 0);

      await sleep(DEBOUNCE_MS * 4);

      const pending = pendingFor(1);
      assert.equal(pending.length, 1);
      assert.equal(pending[0].taskType, 2);
      assert.deepEqual(pending[0].params, { origin: "lock" });
      assert.equal(requeued.mock.callCount(), 1);
    });

    it("should not requeue after disarm", async () => {
      unwrap(lock.arm([2]));
      runTemperatureTask(1);
      await hub.flush();

      const state = lock.disarm();
      assert.deepEqual(state, { enabled: false, lockedTaskTypes: [2] });

      await sleep(DEBOUNCE_MS * 4);
      assert.equal(pendingFor(1).length, 0);

      runTemperatureTask(1);
      await hub.flush();
      await sleep(DEBOUNCE_MS * 4);
      assert.equal(pendingFor(1).length, 0);
    });

    it("should collapse repeated results for the same station into one requeue", async () => {
      unwrap(lock.arm([2]));
      runTemperatureTask(1);
      runTemperatureTask(1);
      await hub.flush();
      assert.equal(lock.getScheduledCount(), 1);

      await sleep(DEBOUNCE_MS * 4);
      assert.equal(pendingFor(1).length, 1);
    });

    it("should keep separate timers per station", async () => {
      unwrap(lock.arm([2]));
      runTemperatureTask(1);
      runTemperatureTask(2);
      await hub.flush();
      assert.equal(lock.getScheduledCount(), 2);

      await sleep(DEBOUNCE_MS * 4);
      assert.equal(pendingFor(1).length, 1);
      assert.equal(pendingFor(2).length, 1);
    });

    it("should ignore task types that are not locked", async () => {
      unwrap(lock.arm([1]));
      runTemperatureTask(1);
      await hub.flush();

      assert.equal(lock.getScheduledCount(), 0);
    });

    it("should cancel scheduled requeues when a type is unlocked", async () => {
      unwrap(lock.arm([2]));
      runTemperatureTask(1);
      await hub.flush();

      assert.deepEqual(lock.unlock(2), { enabled: true, lockedTaskTypes: [] });
      assert.equal(lock.getScheduledCount(), 0);

      await sleep(DEBOUNCE_MS * 4);
      assert.equal(pendingFor(1).length, 0);
    });
  });

  describe("lock", () => {
    it("should add a task type to the set", () => {
      unwrap(lock.arm([]));
      assert.deepEqual(lock.lock(4), { enabled: true, lockedTaskTypes: [4] });
    });
  });

  describe("failed requeues", () => {
    it("should report failures without throwing", async () => {
      const failed = mock.fn();
      lock.on(LockController.Events.REQUEUE_FAILED, failed);
      unwrap(lock.arm([2]));
      runTemperatureTask(1);
      await hub.flush();

      handle.sqlite.exec("DROP TABLE task_queue");
      await sleep(DEBOUNCE_MS * 4);

      assert.equal(failed.mock.callCount(), 1);
    });
  });

  describe("hub drops", () => {
    it("should keep requeueing after the hub drops its subscription", async () => {
      const services = createInspectionServices(openDatabase(":memory:"), {
        subscriberBuffer: 1,
        lockDebounceMs: DEBOUNCE_MS,
      });
      const dropped = services.createLockController();
      try {
        unwrap(dropped.arm([1]));
        // The second result overflows the one-event buffer before anything drains
        for (const stationId of [1, 2, 3]) {
          const taskId = unwrap(services.dispatcher.enqueue({ stationId, taskType: 1 })).taskId;
          unwrap(
            services.ingestion.ingest({
              taskId,
              taskType: 1,
              stationId,
              result: { taskType: 1, value: 2.5, unit: "bar" },
            })
          );
        }

        await sleep(DEBOUNCE_MS * 4);

        const pending = unwrap(services.dispatcher.listPending());
        assert.deepEqual(
          pending.map((task) => task.stationId),
          [3]
        );
        assert.equal(services.hub.getSubscriberCount("task_result"), 1);
      } finally {
        dropped.dispose();
        services.close();
      }
    });
  });

  describe("dispose", () => {
    it("should unsubscribe from the hub", () => {
      unwrap(lock.arm([2]));
      assert.equal(hub.getSubscriberCount("task_result"), 1);

      lock.dispose();
      assert.equal(hub.getSubscriberCount("task_result"), 0);
      assert.equal(lock.getState().enabled, false);
    });
  });
});
