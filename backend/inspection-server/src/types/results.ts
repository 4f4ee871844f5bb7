/**
 * Zod schemas for payloads that cross the server boundary.
 */

import { z } from "zod";
import { SEVERITIES, TASK_TYPE_VALUES, Severity, TaskType, TaskResultPayload } from "./index";

export const TaskTypeSchema = z
  .number()
  .int()
  .refine((n): n is TaskType => TASK_TYPE_VALUES.some((t) => t === n), {
    message: "task_type must be an integer between 1 and 5",
  });

export const StationIdSchema = z.number().int().positive();

export const SeveritySchema = z.enum(["normal", "warning", "danger"]);

/**
 * Vision-service severity. Anything outside the three allowed values is
 * dropped rather than rejected; the evaluator then defaults to normal.
 */
const PassThroughStatusSchema = z
  .unknown()
  .transform((value): Severity | undefined => SEVERITIES.find((s) => s === value));

const ConfidenceSchema = z.number().min(0).max(1);

const GaugeReadingSchema = z.object({
  taskType: z.literal(1),
  value: z.number(),
  unit: z.string(),
  confidence: ConfidenceSchema.optional(),
  status: PassThroughStatusSchema,
});

const TemperatureSchema = z.object({
  taskType: z.literal(2),
  maxTemperature: z.number(),
  avgTemperature: z.number().optional(),
  ambientTemperature: z.number().optional(),
});

const smokeFields = {
  hasSmoke: z.boolean(),
  density: z.enum(["none", "light", "medium", "heavy"]).optional(),
  confidence: ConfidenceSchema.optional(),
  status: PassThroughStatusSchema,
};

const SmokeASchema = z.object({ taskType: z.literal(3), ...smokeFields });
const SmokeBSchema = z.object({ taskType: z.literal(4), ...smokeFields });

const ObjectDescriptionSchema = z.object({
  taskType: z.literal(5),
  description: z.string(),
  items: z.array(z.string()).default([]),
  status: PassThroughStatusSchema,
});

const ProcessingFailureSchema = z.object({
  taskType: TaskTypeSchema,
  error: z.string().min(1),
});

export const ClassifiedResultSchema = z.discriminatedUnion("taskType", [
  GaugeReadingSchema,
  TemperatureSchema,
  SmokeASchema,
  SmokeBSchema,
  ObjectDescriptionSchema,
]);

const UnclassifiedResultSchema = z.object({
  taskType: TaskTypeSchema,
  raw: z.record(z.unknown()),
  issues: z.array(z.string()),
});

/**
 * Stored form of a result payload
 */
export const TaskResultPayloadSchema: z.ZodType<TaskResultPayload, z.ZodTypeDef, unknown> =
  z.union([ProcessingFailureSchema, ClassifiedResultSchema, UnclassifiedResultSchema]);

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Reads a reported payload. A payload carrying `error` is a processing
 * failure; anything else should match the classified variant for its
 * taskType. Payloads that fit neither are kept as unclassified rather than
 * rejected, so a misbehaving vision service cannot block ingestion.
 */
export function classifyResult(taskType: TaskType, raw: Record<string, unknown>): TaskResultPayload {
  if ("error" in raw) {
    const failure = ProcessingFailureSchema.safeParse(raw);
    if (failure.success) return failure.data;
    return { taskType, raw, issues: issuesOf(failure.error) };
  }
  const classified = ClassifiedResultSchema.safeParse(raw);
  if (classified.success) return classified.data;
  return { taskType, raw, issues: issuesOf(classified.error) };
}

/**
 * Only the envelope is validated here; `result` is any object whose
 * taskType, when present, agrees with the envelope.
 */
export const IngestInputSchema = z
  .object({
    taskId: z.string().min(1),
    taskType: TaskTypeSchema,
    stationId: StationIdSchema,
    result: z.record(z.unknown()),
    imageRef: z.string().nullable().optional(),
    processingTime: z.number().nonnegative().nullable().optional(),
  })
  .refine((input) => input.result.taskType === undefined || input.result.taskType === input.taskType, {
    message: "result.taskType must match taskType",
    path: ["result", "taskType"],
  });

export type IngestInput = z.input<typeof IngestInputSchema>;

export const CartStatusUpdateSchema = z.object({
  online: z.boolean().default(true),
  currentStation: StationIdSchema.nullable().optional(),
  mode: z.enum(["idle", "single", "loop", "traveling", "working"]).default("idle"),
  batteryLevel: z.number().int().min(0).max(100).nullable().optional(),
  lastActivity: z.coerce.date().nullable().optional(),
});

export type CartStatusUpdate = z.input<typeof CartStatusUpdateSchema>;
