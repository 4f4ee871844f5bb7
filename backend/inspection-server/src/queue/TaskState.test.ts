import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  isTerminalStatus,
  getAllowedTransitions,
  isQueueStatus,
} from "./TaskState";

describe("TaskState", () => {
  describe("isTerminalStatus", () => {
    it("should identify completed and failed as terminal", () => {
      assert.equal(isTerminalStatus("completed"), true);
      assert.equal(isTerminalStatus("failed"), true);
    });

    it("should identify pending and assigned as non-terminal", () => {
      assert.equal(isTerminalStatus("pending"), false);
      assert.equal(isTerminalStatus("assigned"), false);
    });
  });

  describe("getAllowedTransitions", () => {
    it("should list next statuses", () => {
      assert.deepEqual(getAllowedTransitions("pending"), ["assigned"]);
      assert.deepEqual(getAllowedTransitions("assigned"), ["completed", "failed"]);
      assert.deepEqual(getAllowedTransitions("completed"), []);
    });
  });

  describe("isQueueStatus", () => {
    it("should accept known statuses only", () => {
      assert.equal(isQueueStatus("assigned"), true);
      assert.equal(isQueueStatus("running"), false);
      assert.equal(isQueueStatus(1), false);
    });
  });
});
