/**
 * Task Queue Module
 *
 * Queue lifecycle, dispatch and the in-process broadcast hub.
 */

export {
  QUEUE_STATUSES,
  TERMINAL_STATUSES,
  isTerminalStatus,
  getAllowedTransitions,
  isQueueStatus,
} from "./TaskState";
export type { TerminalStatus } from "./TaskState";
export { BroadcastHub, DEFAULT_SUBSCRIBER_CAPACITY } from "./BroadcastHub";
export type {
  AlertEvent,
  BroadcastEvent,
  BroadcastEventMap,
  BroadcastHandler,
  BroadcastKind,
  BroadcastMessage,
  QueueUpdateEvent,
  QueueUpdateReason,
  SubscribeOptions,
  Subscription,
  TaskResultEvent,
} from "./BroadcastHub";
export {
  Dispatcher,
  EnqueueInputSchema,
  DEFAULT_PENDING_LIMIT,
  DEFAULT_CLEAR_AGE_MS,
  MAX_LIST_LIMIT,
} from "./Dispatcher";
export type { DispatcherOptions, EnqueueInput, TaskOutcome } from "./Dispatcher";
