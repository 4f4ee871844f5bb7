/**
 * tRPC Router Tests
 *
 * Procedures are called through appRouter.createCaller against an
 * in-memory database.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { TRPCError } from "@trpc/server";
import { openDatabase } from "../db/connection";
import { createInspectionServices, InspectionServices } from "../app";
import { StationRegistry } from "../services/StationRegistry";
import { appRouter, createContext } from "./trpc";

describe("appRouter", () => {
  let services: InspectionServices;
  let caller: ReturnType<typeof appRouter.createCaller>;

  beforeEach(() => {
    services = createInspectionServices(openDatabase(":memory:"));
    caller = appRouter.createCaller(createContext(services));
  });

  afterEach(() => {
    services.close();
  });

  describe("tasks", () => {
    it("should add a task and list it as pending", async () => {
      const task = await caller.tasks.add({ stationId: 1, taskType: 2, params: { priority: 5 } });

      assert.equal(task.status, "pending");
      assert.deepEqual(task.params, { priority: 5 });

      const pending = await caller.tasks.pending();
      assert.deepEqual(
        pending.map((t) => t.taskId),
        [task.taskId]
      );
    });

    it("should reject an out-of-range task type with BAD_REQUEST", async () => {
      await assert.rejects(
        () => caller.tasks.add({ stationId: 1, taskType: 9 }),
        (error: unknown) => error instanceof TRPCError && error.code === "BAD_REQUEST"
      );
    });

    it("should assign a pending task once", async () => {
      const task = await caller.tasks.add({ stationId: 1, taskType: 1 });

      const assigned = await caller.tasks.assign({ taskId: task.taskId });
      assert.equal(assigned.status, "assigned");

      await assert.rejects(
        () => caller.tasks.assign({ taskId: task.taskId }),
        (error: unknown) => error instanceof TRPCError && error.code === "CONFLICT"
      );
    });

    it("should return NOT_FOUND for an unknown task", async () => {
      await assert.rejects(
        () => caller.tasks.get({ taskId: "missing" }),
        (error: unknown) =>
          error instanceof TRPCError &&
          error.code === "NOT_FOUND" &&
          error.message === "task 'missing' not found"
      );
    });

    it("should delete a task", async () => {
      const task = await caller.tasks.add({ stationId: 2, taskType: 3 });

      const result = await caller.tasks.delete({ taskId: task.taskId });
      assert.deepEqual(result, { success: true, taskId: task.taskId });

      const stats = await caller.tasks.stats();
      assert.equal(stats.total, 0);
    });

    it("should clear finished tasks with days 0", async () => {
      const task = await caller.tasks.add({ stationId: 1, taskType: 2 });
      await caller.results.ingest({
        taskId: task.taskId,
        taskType: 2,
        stationId: 1,
        result: { taskType: 2, maxTemperature: 30 },
      });

      // completedAt must be strictly before the cutoff
      await new Promise((resolve) => setTimeout(resolve, 5));

      const result = await caller.tasks.clearCompleted({ days: 0 });
      assert.deepEqual(result, { deleted: 1 });
    });
  });

  describe("results", () => {
    it("should ingest a result and raise a danger alert", async () => {
      const task = await caller.tasks.add({ stationId: 4, taskType: 2 });

      const receipt = await caller.results.ingest({
        taskId: task.taskId,
        taskType: 2,
        stationId: 4,
        result: { taskType: 2, maxTemperature: 85 },
      });

      assert.equal(receipt.severity, "danger");
      assert.notEqual(receipt.alertId, null);

      const updated = await caller.tasks.get({ taskId: task.taskId });
      assert.equal(updated.status, "completed");

      const alerts = await caller.alerts.unhandled();
      assert.equal(alerts.length, 1);
      assert.equal(
        alerts[0]?.message,
        "Station 4: max temperature 85°C reached the danger threshold (80°C)"
      );
    });

    it("should reject a payload whose taskType disagrees", async () => {
      await assert.rejects(
        () =>
          caller.results.ingest({
            taskId: "t-1",
            taskType: 2,
            stationId: 1,
            result: { taskType: 1, value: 3, unit: "bar" },
          }),
        (error: unknown) => error instanceof TRPCError && error.code === "BAD_REQUEST"
      );
    });
  });

  describe("history and alerts", () => {
    it("should return the latest record and mark alerts handled", async () => {
      await caller.results.ingest({
        taskId: "external-1",
        taskType: 2,
        stationId: 6,
        result: { taskType: 2, maxTemperature: 70 },
      });

      const latest = await caller.history.latest({ stationId: 6 });
      assert.equal(latest?.status, "warning");

      const list = await caller.history.list({ stationId: 6 });
      assert.equal(list.length, 1);

      const stats = await caller.history.statistics({ days: 1 });
      assert.equal(stats.warningCount, 1);

      const [alert] = await caller.alerts.unhandled();
      assert.ok(alert);
      const handled = await caller.alerts.markHandled({ alertId: alert.id });
      assert.equal(handled.handled, true);

      assert.deepEqual(await caller.alerts.unhandled(), []);
    });

    it("should purge nothing when every record is recent", async () => {
      await caller.results.ingest({
        taskId: "external-2",
        taskType: 2,
        stationId: 1,
        result: { taskType: 2, maxTemperature: 20 },
      });

      assert.deepEqual(await caller.history.purge(), { deleted: 0 });
    });
  });

  describe("cart", () => {
    it("should report offline until the first update", async () => {
      const initial = await caller.cart.get();
      assert.equal(initial.online, false);
      assert.equal(initial.mode, "idle");

      const updated = await caller.cart.update({ mode: "traveling", currentStation: 3, batteryLevel: 80 });
      assert.equal(updated.online, true);
      assert.equal(updated.mode, "traveling");
      assert.equal(updated.currentStation, 3);

      const current = await caller.cart.get();
      assert.equal(current.batteryLevel, 80);
    });
  });

  describe("stations", () => {
    it("should return an empty list without a registry", async () => {
      assert.deepEqual(await caller.stations.list(), []);
    });

    it("should enforce the station binding on add", async () => {
      services.close();
      const stations = new StationRegistry([{ id: 1, taskType: 2 }]);
      services = createInspectionServices(openDatabase(":memory:"), { stations });
      caller = appRouter.createCaller(createContext(services));

      await assert.rejects(
        () => caller.tasks.add({ stationId: 1, taskType: 3 }),
        (error: unknown) =>
          error instanceof TRPCError &&
          error.message === "Station 1 is bound to task type 2 (temperature check), not 3"
      );
    });
  });
});
