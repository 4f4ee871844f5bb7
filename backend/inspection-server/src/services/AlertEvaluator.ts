/**
 * AlertEvaluator
 *
 * Maps an ingested result to a severity and, for anything above normal,
 * the alert to raise. Pure: no I/O, never throws.
 *
 * - Temperature checks are classified here against the configured thresholds
 * - Every other task type carries its severity in the payload's `status`,
 *   set by the vision service; missing or unknown values count as normal
 * - Processing failures and unclassified payloads are always normal
 */

import {
  AlertLevel,
  ClassifiedResult,
  Severity,
  TaskResultPayload,
  TaskTypes,
  TemperatureResult,
  isProcessingFailure,
  isUnclassified,
} from "../types";

export type AlertType = "high_temperature" | "abnormal_reading" | "smoke_detected" | "abnormal_object";

export interface AlertDraft {
  level: AlertLevel;
  alertType: AlertType;
  message: string;
}

export interface Evaluation {
  severity: Severity;
  alert: AlertDraft | null;
}

/**
 * Temperature thresholds in °C, inclusive lower bounds
 */
export interface TemperatureThresholds {
  warning: number;
  danger: number;
}

export const DEFAULT_TEMPERATURE_THRESHOLDS: TemperatureThresholds = {
  warning: 60,
  danger: 80,
};

const SEVERITY_VALUES: readonly Severity[] = ["normal", "warning", "danger"];

function passThrough(status: unknown): Severity {
  return SEVERITY_VALUES.find((s) => s === status) ?? "normal";
}

export function classifyTemperature(
  maxTemperature: number,
  thresholds: TemperatureThresholds = DEFAULT_TEMPERATURE_THRESHOLDS
): Severity {
  if (!Number.isFinite(maxTemperature)) return "normal";
  if (maxTemperature >= thresholds.danger) return "danger";
  if (maxTemperature >= thresholds.warning) return "warning";
  return "normal";
}

function temperatureMessage(
  stationId: number,
  result: TemperatureResult,
  level: AlertLevel,
  thresholds: TemperatureThresholds
): string {
  const threshold = level === "danger" ? thresholds.danger : thresholds.warning;
  return (
    `Station ${stationId}: max temperature ${result.maxTemperature}°C ` +
    `reached the ${level} threshold (${threshold}°C)`
  );
}

function draftFor(
  stationId: number,
  result: ClassifiedResult,
  level: AlertLevel,
  thresholds: TemperatureThresholds
): AlertDraft {
  switch (result.taskType) {
    case TaskTypes.GAUGE_READING:
      return {
        level,
        alertType: "abnormal_reading",
        message: `Station ${stationId}: gauge reading ${result.value} ${result.unit} flagged ${level}`,
      };
    case TaskTypes.TEMPERATURE:
      return {
        level,
        alertType: "high_temperature",
        message: temperatureMessage(stationId, result, level, thresholds),
      };
    case TaskTypes.SMOKE_A:
    case TaskTypes.SMOKE_B:
      return {
        level,
        alertType: "smoke_detected",
        message: result.hasSmoke
          ? `Station ${stationId}: smoke detected (density ${result.density ?? "unknown"}), ${level}`
          : `Station ${stationId}: smoke check flagged ${level}`,
      };
    case TaskTypes.OBJECT_DESCRIPTION:
      return {
        level,
        alertType: "abnormal_object",
        message: `Station ${stationId}: object inspection flagged ${level}: ${result.description}`,
      };
  }
}

export class AlertEvaluator {
  private readonly thresholds: TemperatureThresholds;

  constructor(thresholds: TemperatureThresholds = DEFAULT_TEMPERATURE_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  severityOf(result: TaskResultPayload): Severity {
    if (isProcessingFailure(result) || isUnclassified(result)) {
      return "normal";
    }
    if (result.taskType === TaskTypes.TEMPERATURE) {
      return classifyTemperature(result.maxTemperature, this.thresholds);
    }
    return passThrough(result.status);
  }

  evaluate(stationId: number, result: TaskResultPayload): Evaluation {
    const severity = this.severityOf(result);
    if (severity === "normal" || isProcessingFailure(result) || isUnclassified(result)) {
      return { severity, alert: null };
    }
    return { severity, alert: draftFor(stationId, result, severity, this.thresholds) };
  }
}
