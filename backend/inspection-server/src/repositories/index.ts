/**
 * Repository exports
 * Data access layer for inspection persistence
 */

export { TaskQueueRepository, rowToTask } from "./TaskQueueRepository";
export type { CreateQueueEntry } from "./TaskQueueRepository";
export { TaskRecordRepository, rowToRecord } from "./TaskRecordRepository";
export type { AppendRecordInput, ListRecordsOptions } from "./TaskRecordRepository";
export { AlertRepository } from "./AlertRepository";
export type { CreateAlertInput } from "./AlertRepository";
export { CartStatusRepository } from "./CartStatusRepository";
