/**
 * Domain types for the inspection task queue.
 *
 * Result payloads are a tagged union keyed by taskType so consumers can
 * switch over them exhaustively. The zod schemas that validate incoming
 * payloads live in ./results.
 */

/**
 * The five inspection categories a station can be bound to
 */
export const TaskTypes = {
  GAUGE_READING: 1,
  TEMPERATURE: 2,
  SMOKE_A: 3,
  SMOKE_B: 4,
  OBJECT_DESCRIPTION: 5,
} as const;

export type TaskType = (typeof TaskTypes)[keyof typeof TaskTypes];

export const TASK_TYPE_VALUES: readonly TaskType[] = [1, 2, 3, 4, 5];

export const TASK_TYPE_NAMES: Record<TaskType, string> = {
  1: "gauge reading",
  2: "temperature check",
  3: "smoke check A",
  4: "smoke check B",
  5: "object description",
};

export function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPE_VALUES.some((t) => t === value);
}

export type Severity = "normal" | "warning" | "danger";

export const SEVERITIES: readonly Severity[] = ["normal", "warning", "danger"];

export type AlertLevel = Exclude<Severity, "normal">;

export type QueueStatus = "pending" | "assigned" | "completed" | "failed";

export type CartMode = "idle" | "single" | "loop" | "traveling" | "working";

// ---------------------------------------------------------------------------
// Result payloads
// ---------------------------------------------------------------------------

export interface GaugeReadingResult {
  taskType: 1;
  value: number;
  unit: string;
  confidence?: number;
  /** Severity assigned by the vision service */
  status?: Severity;
}

export interface TemperatureResult {
  taskType: 2;
  maxTemperature: number;
  avgTemperature?: number;
  ambientTemperature?: number;
}

export interface SmokeResult {
  taskType: 3 | 4;
  hasSmoke: boolean;
  density?: "none" | "light" | "medium" | "heavy";
  confidence?: number;
  status?: Severity;
}

export interface ObjectDescriptionResult {
  taskType: 5;
  description: string;
  items: string[];
  status?: Severity;
}

/**
 * Reported instead of a classified result when the vision service failed
 */
export interface ProcessingFailure {
  taskType: TaskType;
  error: string;
}

export type ClassifiedResult =
  | GaugeReadingResult
  | TemperatureResult
  | SmokeResult
  | ObjectDescriptionResult;

/**
 * A payload that does not fit the classified shape for its task type.
 * The reported object is kept as-is and always evaluates to normal.
 */
export interface UnclassifiedResult {
  taskType: TaskType;
  raw: Record<string, unknown>;
  issues: string[];
}

export type TaskResultPayload = ClassifiedResult | ProcessingFailure | UnclassifiedResult;

export function isProcessingFailure(result: TaskResultPayload): result is ProcessingFailure {
  return "error" in result;
}

export function isUnclassified(result: TaskResultPayload): result is UnclassifiedResult {
  return "raw" in result;
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export type TaskParams = Record<string, unknown>;

/**
 * A queue entry
 */
export interface Task {
  taskId: string;
  stationId: number;
  taskType: TaskType;
  status: QueueStatus;
  params: TaskParams;
  createdAt: Date;
  assignedAt: Date | null;
  completedAt: Date | null;
  /** Failure reason when status is failed */
  error: string | null;
}

/**
 * An immutable history entry written once per ingested result
 */
export interface TaskRecord {
  id: number;
  taskId: string;
  taskType: TaskType;
  stationId: number;
  imageRef: string | null;
  result: TaskResultPayload;
  status: Severity;
  confidence: number | null;
  /** Seconds */
  processingTime: number | null;
  timestamp: Date;
}

export interface Alert {
  id: number;
  recordId: number | null;
  level: AlertLevel;
  alertType: string;
  message: string;
  handled: boolean;
  timestamp: Date;
}

export interface CartStatus {
  online: boolean;
  currentStation: number | null;
  mode: CartMode;
  /** 0-100 */
  batteryLevel: number | null;
  lastActivity: Date | null;
  timestamp: Date;
}

export interface QueueStats {
  pending: number;
  assigned: number;
  completed: number;
  failed: number;
  total: number;
}

export interface RecordStatistics {
  totalCount: number;
  normalCount: number;
  warningCount: number;
  dangerCount: number;
  avgConfidence: number | null;
  avgProcessingTime: number | null;
}
