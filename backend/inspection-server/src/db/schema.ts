/**
 * Drizzle ORM Schema Definitions
 * Database schema for the inspection queue, result history, alerts and cart status
 */

import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";

/**
 * Task queue table - live queue entries
 *
 * Design decisions:
 * - Auto-increment id breaks creation-time ties so FIFO order is stable
 * - taskId is the public identifier handed to callers (unique)
 * - params is JSON-serialized opaque caller metadata
 * - timestamps stored as integer milliseconds so same-second enqueues keep their order
 */
export const taskQueue = sqliteTable(
  "task_queue",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    taskId: text("task_id").notNull().unique(),
    stationId: integer("station_id").notNull(),
    taskType: integer("task_type").notNull(),
    status: text("status", { enum: ["pending", "assigned", "completed", "failed"] })
      .notNull()
      .default("pending"),
    params: text("params").notNull().default("{}"), // JSON-serialized
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    assignedAt: integer("assigned_at", { mode: "timestamp_ms" }),
    completedAt: integer("completed_at", { mode: "timestamp_ms" }),
    error: text("error"),
  },
  (table) => ({
    statusIdx: index("idx_task_queue_status").on(table.status),
    stationTaskIdx: index("idx_task_queue_station_task").on(table.stationId, table.taskType),
  })
);

/**
 * Task records table - append-only result history
 *
 * Design decisions:
 * - Rows are never updated; taskId may outlive its queue entry
 * - resultData holds the JSON-serialized tagged result payload
 */
export const taskRecords = sqliteTable(
  "task_records",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    taskId: text("task_id").notNull(),
    taskType: integer("task_type").notNull(),
    stationId: integer("station_id").notNull(),
    imageRef: text("image_ref"),
    resultData: text("result_data").notNull(), // JSON-serialized
    status: text("status", { enum: ["normal", "warning", "danger"] })
      .notNull()
      .default("normal"),
    confidence: real("confidence"),
    processingTime: real("processing_time"),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    taskTypeIdx: index("idx_task_records_task_type").on(table.taskType),
    stationIdx: index("idx_task_records_station_id").on(table.stationId),
    timestampIdx: index("idx_task_records_timestamp").on(table.timestamp),
  })
);

/**
 * Alert log table
 *
 * recordId is a weak back-reference: purging a record nulls it instead of
 * cascading.
 */
export const alertLog = sqliteTable(
  "alert_log",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    recordId: integer("record_id").references(() => taskRecords.id, { onDelete: "set null" }),
    level: text("level", { enum: ["warning", "danger"] }).notNull(),
    alertType: text("alert_type").notNull(),
    message: text("message").notNull(),
    handled: integer("handled", { mode: "boolean" }).notNull().default(false),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    levelIdx: index("idx_alert_log_level").on(table.level),
    handledIdx: index("idx_alert_log_handled").on(table.handled),
  })
);

/**
 * Cart status table - a single row (id = 1) overwritten in place
 */
export const cartStatus = sqliteTable("cart_status", {
  id: integer("id").primaryKey(),
  online: integer("online", { mode: "boolean" }).notNull().default(false),
  currentStation: integer("current_station"),
  mode: text("mode", { enum: ["idle", "single", "loop", "traveling", "working"] })
    .notNull()
    .default("idle"),
  batteryLevel: integer("battery_level"),
  lastActivity: integer("last_activity", { mode: "timestamp_ms" }),
  timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
});

// Type exports for use in repositories
export type TaskQueueRow = typeof taskQueue.$inferSelect;
export type NewTaskQueueRow = typeof taskQueue.$inferInsert;
export type TaskRecordRow = typeof taskRecords.$inferSelect;
export type NewTaskRecordRow = typeof taskRecords.$inferInsert;
export type AlertRow = typeof alertLog.$inferSelect;
export type NewAlertRow = typeof alertLog.$inferInsert;
export type CartStatusRow = typeof cartStatus.$inferSelect;
