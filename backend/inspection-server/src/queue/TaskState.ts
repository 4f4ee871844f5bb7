/**
 * Queue entry lifecycle
 *
 *   pending → assigned → completed
 *                 ↓
 *               failed
 *
 * - pending: queued, waiting for the vision service to pick it up
 * - assigned: handed to the vision service, result not yet ingested
 * - completed: a classified result was ingested
 * - failed: the vision service reported a processing failure
 *
 * Ingesting a result for a pending entry passes through assigned at the
 * same instant, so no transition ever skips a step.
 */

import { QueueStatus } from "../types";

export const QUEUE_STATUSES: readonly QueueStatus[] = ["pending", "assigned", "completed", "failed"];

export const TERMINAL_STATUSES = ["completed", "failed"] as const;

export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];

/**
 * Check if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: QueueStatus): status is TerminalStatus {
  return status === "completed" || status === "failed";
}

/**
 * Get allowed next statuses from the current one
 */
export function getAllowedTransitions(status: QueueStatus): QueueStatus[] {
  switch (status) {
    case "pending":
      return ["assigned"];
    case "assigned":
      return ["completed", "failed"];
    case "completed":
    case "failed":
      return [];
  }
}

export function isQueueStatus(value: unknown): value is QueueStatus {
  return QUEUE_STATUSES.some((s) => s === value);
}
