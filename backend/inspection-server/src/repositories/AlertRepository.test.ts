import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { openDatabase, DatabaseHandle } from "../db/connection";
import { AlertRepository } from "./AlertRepository";
import { CartStatusRepository } from "./CartStatusRepository";

describe("AlertRepository", () => {
  let handle: DatabaseHandle;
  let repo: AlertRepository;

  beforeEach(() => {
    handle = openDatabase(":memory:");
    repo = new AlertRepository(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it("should create unhandled alerts", () => {
    const alert = repo.create({
      recordId: null,
      level: "danger",
      alertType: "smoke_detected",
      message: "Station 4: smoke detected (heavy)",
    });

    assert.equal(alert.handled, false);
    assert.equal(alert.level, "danger");
    assert.equal(alert.recordId, null);
  });

  it("should list unhandled alerts newest first", () => {
    const first = repo.create({
      recordId: null,
      level: "warning",
      alertType: "high_temperature",
      message: "a",
      timestamp: new Date(1000),
    });
    const second = repo.create({
      recordId: null,
      level: "danger",
      alertType: "high_temperature",
      message: "b",
      timestamp: new Date(2000),
    });

    assert.deepEqual(
      repo.findUnhandled().map((a) => a.id),
      [second.id, first.id]
    );

    assert.equal(repo.markHandled(second.id), true);
    assert.deepEqual(
      repo.findUnhandled().map((a) => a.id),
      [first.id]
    );
    assert.equal(repo.findUnhandled(0).length, 0);
  });

  it("should report missing alerts on markHandled", () => {
    assert.equal(repo.markHandled(999), false);
  });
});

describe("CartStatusRepository", () => {
  let handle: DatabaseHandle;
  let repo: CartStatusRepository;

  beforeEach(() => {
    handle = openDatabase(":memory:");
    repo = new CartStatusRepository(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it("should return undefined before the first save", () => {
    assert.equal(repo.get(), undefined);
  });

  it("should overwrite the single row", () => {
    repo.save({
      online: true,
      currentStation: 2,
      mode: "loop",
      batteryLevel: 80,
      lastActivity: new Date(1000),
      timestamp: new Date(1000),
    });
    repo.save({
      online: false,
      currentStation: null,
      mode: "idle",
      batteryLevel: 15,
      lastActivity: null,
      timestamp: new Date(2000),
    });

    assert.deepEqual(repo.get(), {
      online: false,
      currentStation: null,
      mode: "idle",
      batteryLevel: 15,
      lastActivity: null,
      timestamp: new Date(2000),
    });
    assert.equal(handle.sqlite.prepare("SELECT COUNT(*) AS n FROM cart_status").pluck().get(), 1);
  });
});
