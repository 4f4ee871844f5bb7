/**
 * Error taxonomy shared by every public operation.
 *
 * Operations never throw these across their boundary; they return an
 * OperationResult carrying one of them so callers can tell a retryable
 * store failure from a caller mistake.
 */

import { z } from "zod";

export type ErrorCode =
  | "VALIDATION_FAILED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "PERSISTENCE_FAILED"
  | "PUSH_DELIVERY_FAILED"
  | "STATION_CONFIG_INVALID";

/**
 * Base class for all inspection server errors
 */
export abstract class InspectionError extends Error {
  abstract readonly code: ErrorCode;
}

/**
 * Malformed input. The caller's fault, never retried automatically.
 */
export class ValidationError extends InspectionError {
  readonly code = "VALIDATION_FAILED" as const;

  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static fromZod(error: z.ZodError, context: string): ValidationError {
    const issueList = error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return new ValidationError(`Invalid ${context}: ${issueList}`, error.issues);
  }
}

export class NotFoundError extends InspectionError {
  readonly code = "NOT_FOUND" as const;

  constructor(
    public readonly entity: "task" | "record" | "alert",
    public readonly id: string | number
  ) {
    super(`${entity} '${id}' not found`);
    this.name = "NotFoundError";
  }
}

/**
 * A state-transition precondition did not hold (e.g. double assignment)
 */
export class ConflictError extends InspectionError {
  readonly code = "CONFLICT" as const;

  constructor(
    message: string,
    public readonly currentStatus?: string
  ) {
    super(message);
    this.name = "ConflictError";
  }
}

/**
 * The store could not be read or written. Callers may retry with backoff.
 */
export class PersistenceError extends InspectionError {
  readonly code = "PERSISTENCE_FAILED" as const;

  constructor(
    public readonly operation: string,
    public readonly cause: unknown
  ) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "PersistenceError";
  }
}

/**
 * Raised inside the BroadcastHub when a subscriber is dropped.
 * Logged and handed to the subscriber's onDrop callback, never to publishers.
 */
export class PushDeliveryError extends InspectionError {
  readonly code = "PUSH_DELIVERY_FAILED" as const;

  constructor(
    public readonly subscriptionId: string,
    reason: string
  ) {
    super(`Subscriber ${subscriptionId} dropped: ${reason}`);
    this.name = "PushDeliveryError";
  }
}

/**
 * The station registry file could not be loaded. Startup only.
 */
export class StationConfigError extends InspectionError {
  readonly code = "STATION_CONFIG_INVALID" as const;

  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(`Invalid station registry '${filePath}': ${detail}`);
    this.name = "StationConfigError";
  }
}

/**
 * Errors an operation can hand back to its caller
 */
export type OperationError = ValidationError | NotFoundError | ConflictError | PersistenceError;

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: OperationError };

export function ok<T>(value: T): OperationResult<T> {
  return { success: true, value };
}

export function fail<T = never>(error: OperationError): OperationResult<T> {
  return { success: false, error };
}

/**
 * Run an operation body, turning anything the store throws into a
 * PersistenceError result.
 */
export function guardPersistence<T>(
  operation: string,
  fn: () => OperationResult<T>
): OperationResult<T> {
  try {
    return fn();
  } catch (error) {
    const wrapped = new PersistenceError(operation, error);
    console.error(`[Persistence] ${wrapped.message}`);
    return fail(wrapped);
  }
}
