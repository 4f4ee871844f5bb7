/**
 * TRPC Router Configuration
 *
 * Defines the TRPC router for the task queue, result ingestion, history,
 * alerts and cart status. Procedures delegate to the services and turn
 * failed OperationResults into TRPCErrors.
 */

import { initTRPC } from "@trpc/server";
import { z } from "zod";
import { InspectionServices } from "../app";
import { Dispatcher } from "../queue/Dispatcher";
import { CartStatusRegister } from "../services/CartStatusRegister";
import { HistoryService, HistoryQuerySchema, LatestRecordQuerySchema, StatisticsQuerySchema } from "../services/HistoryService";
import { ResultIngestion } from "../services/ResultIngestion";
import { StationRegistry } from "../services/StationRegistry";
import { CartStatusUpdateSchema, IngestInputSchema } from "../types/results";
import { unwrapOrThrow } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Context passed to all TRPC procedures
 */
export interface Context {
  dispatcher: Dispatcher;
  ingestion: ResultIngestion;
  history: HistoryService;
  cart: CartStatusRegister;
  stations?: StationRegistry;
}

/**
 * Create context from the wired services
 */
export function createContext(services: InspectionServices): Context {
  return {
    dispatcher: services.dispatcher,
    ingestion: services.ingestion,
    history: services.history,
    cart: services.cart,
    stations: services.stations,
  };
}

const t = initTRPC.context<Context>().create();

export const router = t.router;
export const publicProcedure = t.procedure;

const TaskIdInput = z.object({ taskId: z.string().min(1) });

/**
 * Task router - queue operations
 */
export const taskRouter = router({
  /**
   * Create a pending task
   */
  add: publicProcedure
    .input(
      z.object({
        stationId: z.number(),
        taskType: z.number(),
        params: z.record(z.unknown()).optional(),
      })
    )
    .mutation(({ ctx, input }) => {
      return unwrapOrThrow(ctx.dispatcher.enqueue(input));
    }),

  /**
   * Pending tasks, oldest first
   */
  pending: publicProcedure
    .input(z.object({ limit: z.number().optional() }).optional())
    .query(({ ctx, input }) => {
      return unwrapOrThrow(ctx.dispatcher.listPending(input?.limit));
    }),

  /**
   * Tasks in any status, newest first
   */
  list: publicProcedure
    .input(
      z
        .object({
          status: z.enum(["pending", "assigned", "completed", "failed"]).optional(),
          limit: z.number().optional(),
        })
        .optional()
    )
    .query(({ ctx, input }) => {
      return unwrapOrThrow(ctx.dispatcher.list(input ?? {}));
    }),

  get: publicProcedure.input(TaskIdInput).query(({ ctx, input }) => {
    return unwrapOrThrow(ctx.dispatcher.get(input.taskId));
  }),

  /**
   * Claim a pending task for processing
   */
  assign: publicProcedure.input(TaskIdInput).mutation(({ ctx, input }) => {
    return unwrapOrThrow(ctx.dispatcher.assign(input.taskId));
  }),

  delete: publicProcedure.input(TaskIdInput).mutation(({ ctx, input }) => {
    unwrapOrThrow(ctx.dispatcher.delete(input.taskId));
    return { success: true, taskId: input.taskId };
  }),

  /**
   * Remove completed/failed tasks older than `days` (default 1)
   */
  clearCompleted: publicProcedure
    .input(z.object({ days: z.number().min(0).default(1) }).optional())
    .mutation(({ ctx, input }) => {
      const deleted = unwrapOrThrow(ctx.dispatcher.clearCompleted((input?.days ?? 1) * DAY_MS));
      return { deleted };
    }),

  stats: publicProcedure.query(({ ctx }) => {
    return unwrapOrThrow(ctx.dispatcher.stats());
  }),
});

/**
 * Result router - ingestion from the vision service
 */
export const resultRouter = router({
  ingest: publicProcedure.input(IngestInputSchema).mutation(({ ctx, input }) => {
    return unwrapOrThrow(ctx.ingestion.ingest(input));
  }),
});

/**
 * History router - stored results
 */
export const historyRouter = router({
  list: publicProcedure.input(HistoryQuerySchema).query(({ ctx, input }) => {
    return unwrapOrThrow(ctx.history.list(input));
  }),

  latest: publicProcedure.input(LatestRecordQuerySchema).query(({ ctx, input }) => {
    return unwrapOrThrow(ctx.history.latest(input));
  }),

  statistics: publicProcedure.input(StatisticsQuerySchema).query(({ ctx, input }) => {
    return unwrapOrThrow(ctx.history.statistics(input));
  }),

  /**
   * Retention sweep (default 90 days)
   */
  purge: publicProcedure
    .input(z.object({ olderThanDays: z.number().int().min(0).optional() }).optional())
    .mutation(({ ctx, input }) => {
      const deleted = unwrapOrThrow(ctx.history.purge(input?.olderThanDays));
      return { deleted };
    }),
});

export const alertRouter = router({
  unhandled: publicProcedure
    .input(z.object({ limit: z.number().int().optional() }).optional())
    .query(({ ctx, input }) => {
      return unwrapOrThrow(ctx.history.unhandledAlerts(input?.limit));
    }),

  markHandled: publicProcedure
    .input(z.object({ alertId: z.number().int() }))
    .mutation(({ ctx, input }) => {
      return unwrapOrThrow(ctx.history.markAlertHandled(input.alertId));
    }),
});

export const cartRouter = router({
  get: publicProcedure.query(({ ctx }) => {
    return unwrapOrThrow(ctx.cart.get());
  }),

  update: publicProcedure.input(CartStatusUpdateSchema).mutation(({ ctx, input }) => {
    return unwrapOrThrow(ctx.cart.update(input));
  }),
});

export const stationRouter = router({
  /**
   * Stations from the registry file; empty when none is configured
   */
  list: publicProcedure.query(({ ctx }) => {
    return ctx.stations?.list() ?? [];
  }),
});

/**
 * Main app router - combines all routers
 */
export const appRouter = router({
  tasks: taskRouter,
  results: resultRouter,
  history: historyRouter,
  alerts: alertRouter,
  cart: cartRouter,
  stations: stationRouter,
});

/**
 * Export type for client usage
 */
export type AppRouter = typeof appRouter;
