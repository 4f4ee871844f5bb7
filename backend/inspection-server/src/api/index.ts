/**
 * API Module Exports
 *
 * Barrel exports for the Fastify/TRPC API layer.
 */

// Server exports
export { createServer, startServer } from "./server";
export type { ServerOptions, InspectionServer } from "./server";

// TRPC exports
export {
  appRouter,
  taskRouter,
  resultRouter,
  historyRouter,
  alertRouter,
  cartRouter,
  stationRouter,
  router,
  publicProcedure,
  createContext,
} from "./trpc";
export type { AppRouter, Context } from "./trpc";

// REST API exports
export { registerRestRoutes } from "./rest";

// Transport error mapping
export { trpcCodeFor, httpStatusFor, unwrapOrThrow } from "./errors";

// WebSocket event streaming exports
export { EventStreamBroadcaster, DEFAULT_MAX_BUFFERED_BYTES } from "./EventStreamBroadcaster";
export type {
  EventSocket,
  EventStreamBroadcasterOptions,
  StreamMessage,
} from "./EventStreamBroadcaster";
