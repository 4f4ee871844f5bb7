/**
 * Service layer exports
 * Business logic services for the inspection server
 */

export {
  AlertEvaluator,
  classifyTemperature,
  DEFAULT_TEMPERATURE_THRESHOLDS,
  type AlertDraft,
  type AlertType,
  type Evaluation,
  type TemperatureThresholds,
} from "./AlertEvaluator";

export {
  ResultIngestion,
  type IngestReceipt,
  type ResultIngestionDeps,
} from "./ResultIngestion";

export { CartStatusRegister, defaultCartStatus } from "./CartStatusRegister";

export {
  LockController,
  DEFAULT_LOCK_DEBOUNCE_MS,
  type LockState,
  type LockControllerOptions,
} from "./LockController";

export { StationRegistry, type StationDefinition } from "./StationRegistry";

export {
  HistoryService,
  DEFAULT_RETENTION_DAYS,
  HistoryQuerySchema,
  LatestRecordQuerySchema,
  StatisticsQuerySchema,
  type HistoryQuery,
  type LatestRecordQuery,
  type StatisticsQuery,
} from "./HistoryService";
