/**
 * inspection-server
 * Task queue, result history and live events for the inspection cart
 */

// Database exports
export { openDatabase, initializeDatabase, getDefaultDbPath, schema } from "./db/connection";
export type { DatabaseHandle, InspectionDatabase } from "./db/connection";

// Domain types
export * from "./types";
export {
  IngestInputSchema,
  CartStatusUpdateSchema,
  TaskResultPayloadSchema,
  TaskTypeSchema,
  classifyResult,
  StationIdSchema,
} from "./types/results";
export type { IngestInput, CartStatusUpdate } from "./types/results";

// Errors
export {
  InspectionError,
  ValidationError,
  NotFoundError,
  ConflictError,
  PersistenceError,
  PushDeliveryError,
  StationConfigError,
  ok,
  fail,
} from "./errors";
export type { ErrorCode, OperationError, OperationResult } from "./errors";

// Repository exports
export * from "./repositories";

// Queue exports
export * from "./queue";

// Service exports
export * from "./services";

// Wiring and configuration
export { createInspectionServices } from "./app";
export type { InspectionServices, InspectionServicesOptions } from "./app";
export { loadConfig, ConfigError } from "./config";
export type { ServerConfig } from "./config";

// API exports
export * from "./api";
